import { PNG } from "pngjs";
import { describe, expect, it } from "vitest";
import { KeySynthesisError } from "../../errors";
import { flattenAlpha, pngFormat } from "../png";
import type { ImageModel } from "../png";

function encode(width: number, height: number, pixel: (x: number, y: number) => [number, number, number, number]): Buffer {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 4;
      const [r, g, b, a] = pixel(x, y);
      png.data[offset] = r;
      png.data[offset + 1] = g;
      png.data[offset + 2] = b;
      png.data[offset + 3] = a;
    }
  }
  return PNG.sync.write(png);
}

function pixelAt(model: ImageModel, x: number, y: number): number[] {
  const offset = (y * model.width + x) * 4;
  return Array.from(model.data.subarray(offset, offset + 4));
}

describe("pngFormat", () => {
  it("exposes width, height and alpha", () => {
    const model = pngFormat.parse(encode(3, 2, () => [10, 20, 30, 255]));
    expect(pngFormat.read(model, "width")).toEqual({ found: true, value: 3 });
    expect(pngFormat.read(model, "height")).toEqual({ found: true, value: 2 });
    expect(pngFormat.read(model, "alpha")).toEqual({ found: true, value: true });
    expect(pngFormat.read(model, "depth")).toEqual({ found: false });
  });

  it("rejects bytes that are not a PNG", () => {
    expect(() => pngFormat.parse(Buffer.from("<html>not an image</html>"))).toThrow();
  });

  it("derives an opaque 1024x1024 marketing icon from a small logo", () => {
    let model = pngFormat.parse(encode(4, 4, () => [255, 0, 0, 128]));
    model = pngFormat.write(model, { path: "width", op: "set", value: 1024 });
    model = pngFormat.write(model, { path: "height", op: "set", value: 1024 });
    model = pngFormat.write(model, { path: "alpha", op: "set", value: false });

    const reparsed = pngFormat.parse(pngFormat.serialize(model));
    expect(reparsed.width).toBe(1024);
    expect(reparsed.height).toBe(1024);
    expect(reparsed.alpha).toBe(false);
    expect(pixelAt(reparsed, 0, 0)).toEqual([255, 127, 127, 255]);
    expect(pixelAt(reparsed, 1023, 1023)).toEqual([255, 127, 127, 255]);
  });

  it("averages source pixels when shrinking", () => {
    const reds = [0, 100, 200, 255];
    const model = pngFormat.write(pngFormat.parse(encode(4, 1, (x) => [reds[x], 0, 0, 255])), {
      path: "width",
      op: "set",
      value: 2
    });
    expect(model.width).toBe(2);
    expect(pixelAt(model, 0, 0)).toEqual([50, 0, 0, 255]);
    expect(pixelAt(model, 1, 0)).toEqual([228, 0, 0, 255]);
  });

  it("composites transparent pixels over white", () => {
    const model = pngFormat.parse(encode(1, 1, () => [0, 0, 0, 0]));
    const flat = flattenAlpha(model);
    expect(flat.alpha).toBe(false);
    expect(pixelAt(flat, 0, 0)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(model, 0, 0)).toEqual([0, 0, 0, 0]);
  });

  it("refuses properties it cannot produce", () => {
    const model = pngFormat.parse(encode(2, 2, () => [0, 0, 0, 255]));
    expect(() => pngFormat.write(model, { path: "width", op: "set", value: 0 })).toThrow(KeySynthesisError);
    expect(() => pngFormat.write(model, { path: "width", op: "set", value: "48" })).toThrow(
      "Image width must be a number"
    );
    expect(() => pngFormat.write(model, { path: "colorType", op: "set", value: 2 })).toThrow(
      "Unknown image property colorType"
    );
    expect(() => pngFormat.write(model, { path: "width", op: "present" })).toThrow(KeySynthesisError);
  });
});
