import { KeySynthesisError } from "../errors";
import type { PlainValue, ResolvedKey } from "../types";
import type { FormatPlugin, KeyReading } from "./types";
import { deepEqual, isRecord } from "./values";

export type JsonLayout = "xcode" | "standard";

export type JsonModel = {
  value: unknown;
  layout: JsonLayout;
};

export function parsePointer(pointer: string): string[] {
  if (pointer === "") {
    return [];
  }
  if (!pointer.startsWith("/")) {
    throw new KeySynthesisError(`Invalid JSON pointer: ${pointer}`, pointer);
  }
  return pointer
    .slice(1)
    .split("/")
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function arrayIndex(segment: string, length: number): number | null {
  if (!/^(0|[1-9][0-9]*)$/.test(segment)) {
    return null;
  }
  const index = Number.parseInt(segment, 10);
  return index <= length ? index : null;
}

function setIn(container: unknown, segments: string[], value: unknown, pointer: string): unknown {
  if (segments.length === 0) {
    return value;
  }
  const [head, ...rest] = segments;
  if (Array.isArray(container)) {
    const index = arrayIndex(head, container.length);
    if (index === null) {
      throw new KeySynthesisError(`Cannot address array element ${head} in ${pointer}`, pointer);
    }
    const next = [...container];
    next[index] = setIn(container[index] ?? {}, rest, value, pointer);
    return next;
  }
  const base = isRecord(container) ? container : {};
  if (container !== undefined && !isRecord(container)) {
    throw new KeySynthesisError(`Cannot descend into scalar value in ${pointer}`, pointer);
  }
  return { ...base, [head]: setIn(base[head], rest, value, pointer) };
}

/** Xcode writes asset catalogs as `"key" : value`. */
function toXcodeLayout(text: string): string {
  return text.replace(/^(\s*"(?:[^"\\]|\\.)*"): /gm, "$1 : ");
}

export function detectLayout(text: string): JsonLayout {
  return /"\s+:\s/.test(text) ? "xcode" : "standard";
}

function readPointer(value: unknown, pointer: string): KeyReading {
  let current = value;
  for (const segment of parsePointer(pointer)) {
    if (Array.isArray(current)) {
      const index = arrayIndex(segment, current.length - 1);
      if (index === null) {
        return { found: false };
      }
      current = current[index];
    } else if (isRecord(current) && segment in current) {
      current = current[segment];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

function includeValue(model: JsonModel, pointer: string, wanted: PlainValue): JsonModel {
  const reading = readPointer(model.value, pointer);
  const current: unknown[] = [];
  if (reading.found) {
    if (!Array.isArray(reading.value)) {
      throw new KeySynthesisError(`JSON value at ${pointer} is not an array`, pointer);
    }
    current.push(...reading.value);
  }
  if (current.some((item) => deepEqual(item, wanted))) {
    return model;
  }
  return { ...model, value: setIn(model.value, parsePointer(pointer), [...current, wanted], pointer) };
}

export const jsonFormat: FormatPlugin<JsonModel> = {
  format: "json",

  parse(bytes) {
    const text = bytes.toString("utf-8");
    const value: unknown = JSON.parse(text);
    return { value, layout: detectLayout(text) };
  },

  serialize(model) {
    const text = JSON.stringify(model.value, null, 2);
    return Buffer.from(`${model.layout === "xcode" ? toXcodeLayout(text) : text}\n`, "utf-8");
  },

  read(model, pointer) {
    return readPointer(model.value, pointer);
  },

  write(model, key: ResolvedKey) {
    if (key.op === "present") {
      throw new KeySynthesisError(`No value to synthesize for JSON key ${key.path}`, key.path);
    }
    if (key.op === "include") {
      return includeValue(model, key.path, key.value);
    }
    return { ...model, value: setIn(model.value, parsePointer(key.path), key.value, key.path) };
  },

  escapeTemplateValue(value) {
    return JSON.stringify(value).slice(1, -1);
  }
};
