import { PNG } from "pngjs";
import { KeySynthesisError } from "../errors";
import type { ResolvedKey } from "../types";
import type { FormatPlugin, KeyReading } from "./types";

/** Decoded image; `data` is always 8-bit RGBA regardless of the file's color type. */
export type ImageModel = {
  width: number;
  height: number;
  alpha: boolean;
  data: Buffer;
};

type Contribution = Array<[index: number, weight: number]>;

const MAX_DIMENSION = 8192;

/** Per destination pixel, which source pixels contribute and by how much. */
function axisWeights(srcSize: number, dstSize: number): Contribution[] {
  const weights: Contribution[] = [];
  const scale = srcSize / dstSize;
  for (let d = 0; d < dstSize; d += 1) {
    if (dstSize <= srcSize) {
      // box filter when shrinking
      const start = d * scale;
      const end = (d + 1) * scale;
      const contribution: Contribution = [];
      for (let s = Math.floor(start); s < Math.min(srcSize, Math.ceil(end)); s += 1) {
        const overlap = Math.min(end, s + 1) - Math.max(start, s);
        if (overlap > 0) {
          contribution.push([s, overlap / scale]);
        }
      }
      weights.push(contribution);
    } else {
      const pos = Math.min(srcSize - 1, Math.max(0, (d + 0.5) * scale - 0.5));
      const s0 = Math.floor(pos);
      const s1 = Math.min(s0 + 1, srcSize - 1);
      const f = pos - s0;
      weights.push(s0 === s1 ? [[s0, 1]] : [[s0, 1 - f], [s1, f]]);
    }
  }
  return weights;
}

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

function resampleAxis(image: ImageModel, size: number, axis: "width" | "height"): ImageModel {
  if (!Number.isInteger(size) || size < 1 || size > MAX_DIMENSION) {
    throw new KeySynthesisError(`Unsupported image ${axis}: ${size}`, axis);
  }
  if (image[axis] === size) {
    return image;
  }
  const width = axis === "width" ? size : image.width;
  const height = axis === "height" ? size : image.height;
  const weights = axisWeights(image[axis], size);
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const contribution = axis === "width" ? weights[x] : weights[y];
      for (let channel = 0; channel < 4; channel += 1) {
        let sum = 0;
        for (const [s, weight] of contribution) {
          const sx = axis === "width" ? s : x;
          const sy = axis === "height" ? s : y;
          sum += image.data[(sy * image.width + sx) * 4 + channel] * weight;
        }
        data[(y * width + x) * 4 + channel] = clampByte(sum);
      }
    }
  }
  return { ...image, width, height, data };
}

/** Composites every pixel over white and drops the alpha channel. */
export function flattenAlpha(image: ImageModel): ImageModel {
  const data = Buffer.from(image.data);
  for (let i = 0; i < data.length; i += 4) {
    const a = data[i + 3] / 255;
    data[i] = clampByte(data[i] * a + 255 * (1 - a));
    data[i + 1] = clampByte(data[i + 1] * a + 255 * (1 - a));
    data[i + 2] = clampByte(data[i + 2] * a + 255 * (1 - a));
    data[i + 3] = 255;
  }
  return { ...image, alpha: false, data };
}

export const pngFormat: FormatPlugin<ImageModel> = {
  format: "png",

  parse(bytes) {
    const png = PNG.sync.read(bytes);
    if (!png.width || !png.height || png.data.length < png.width * png.height * 4) {
      throw new SyntaxError("PNG has no pixel data.");
    }
    return { width: png.width, height: png.height, alpha: Boolean(png.alpha), data: Buffer.from(png.data) };
  },

  serialize(model) {
    const png = new PNG({ width: model.width, height: model.height });
    model.data.copy(png.data);
    return PNG.sync.write(png, { colorType: model.alpha ? 6 : 2 });
  },

  read(model, property): KeyReading {
    if (property === "width") return { found: true, value: model.width };
    if (property === "height") return { found: true, value: model.height };
    if (property === "alpha") return { found: true, value: model.alpha };
    return { found: false };
  },

  write(model, key: ResolvedKey) {
    if (key.op !== "set") {
      throw new KeySynthesisError(`Image properties only support set (${key.path})`, key.path);
    }
    if (key.path === "width" || key.path === "height") {
      if (typeof key.value !== "number") {
        throw new KeySynthesisError(`Image ${key.path} must be a number`, key.path);
      }
      return resampleAxis(model, key.value, key.path);
    }
    if (key.path === "alpha") {
      if (typeof key.value !== "boolean") {
        throw new KeySynthesisError("Image alpha must be a boolean", key.path);
      }
      return key.value ? { ...model, alpha: true } : flattenAlpha(model);
    }
    throw new KeySynthesisError(`Unknown image property ${key.path}`, key.path);
  },

  escapeTemplateValue(value) {
    return value;
  }
};
