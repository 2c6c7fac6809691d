import { XMLParser, XMLValidator } from "fast-xml-parser";
import { build as buildPlist, parse as parsePlist } from "plist";
import type { PlistObject, PlistValue } from "plist";
import { KeySynthesisError } from "../errors";
import type { ResolvedKey } from "../types";
import type { FormatPlugin, KeyReading } from "./types";
import { deepEqual, escapeXml, isRecord } from "./values";

/**
 * Parsed property list. `reals` maps the key path of every `<real>` element to
 * its source text, since the `plist` package reads `<real>2.0</real>` as the
 * number 2 and would write it back as `<integer>2</integer>`.
 */
export type PlistDocument = {
  root: PlistObject;
  reals: ReadonlyMap<string, string>;
};

type OrderedNode = Record<string, unknown>;

const orderedParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true
});

function pathKey(segments: string[]): string {
  return JSON.stringify(segments);
}

function tagOf(node: OrderedNode): string | undefined {
  return Object.keys(node).find((name) => name !== ":@");
}

function childrenOf(node: OrderedNode, tag: string): OrderedNode[] {
  const children = node[tag];
  return Array.isArray(children) ? children.filter(isRecord) : [];
}

function textOf(node: OrderedNode, tag: string): string {
  return childrenOf(node, tag)
    .map((child) => child["#text"])
    .filter((text) => text !== undefined)
    .map(String)
    .join("");
}

function collectReals(node: OrderedNode, segments: string[], reals: Map<string, string>): void {
  const tag = tagOf(node);
  if (tag === "real") {
    reals.set(pathKey(segments), textOf(node, tag));
  } else if (tag === "dict") {
    let key: string | null = null;
    for (const child of childrenOf(node, tag)) {
      const childTag = tagOf(child);
      if (childTag === "key") {
        key = textOf(child, childTag);
      } else if (childTag && key !== null) {
        collectReals(child, [...segments, key], reals);
        key = null;
      }
    }
  } else if (tag === "array") {
    childrenOf(node, tag)
      .filter((child) => tagOf(child) !== "#text")
      .forEach((child, index) => collectReals(child, [...segments, String(index)], reals));
  }
}

function findReals(text: string): Map<string, string> {
  const reals = new Map<string, string>();
  const document: unknown = orderedParser.parse(text);
  if (!Array.isArray(document)) {
    return reals;
  }
  const plistNode = document.filter(isRecord).find((node) => tagOf(node) === "plist");
  const rootNode = plistNode ? childrenOf(plistNode, "plist").find((node) => tagOf(node) === "dict") : undefined;
  if (rootNode) {
    collectReals(rootNode, [], reals);
  }
  return reals;
}

function unescapeXml(value: string): string {
  return value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

type Frame = { kind: "dict" | "array"; segments: string[]; key: string | null; index: number };

/** Writes numbers back as `<real>` with their source text wherever the parsed file had a real of the same value. */
function restoreReals(xml: string, reals: ReadonlyMap<string, string>): string {
  if (reals.size === 0) {
    return xml;
  }
  const stack: Frame[] = [];
  let openText: string | null = null;

  const nextPath = (): string[] => {
    const frame = stack[stack.length - 1];
    if (!frame) {
      return [];
    }
    if (frame.kind === "array") {
      const segment = String(frame.index);
      frame.index += 1;
      return [...frame.segments, segment];
    }
    return [...frame.segments, frame.key ?? ""];
  };

  return xml
    .split("\n")
    .map((line) => {
      const trimmed = line.trim();
      if (openText) {
        if (trimmed.includes(openText)) {
          openText = null;
        }
        return line;
      }
      const key = /^<key>(.*)<\/key>$/.exec(trimmed);
      if (key) {
        const frame = stack[stack.length - 1];
        if (frame) {
          frame.key = unescapeXml(key[1]);
        }
        return line;
      }
      if (trimmed === "</dict>" || trimmed === "</array>") {
        stack.pop();
        return line;
      }
      if (trimmed === "<dict>" || trimmed === "<array>") {
        stack.push({ kind: trimmed === "<dict>" ? "dict" : "array", segments: nextPath(), key: null, index: 0 });
        return line;
      }
      const element = /^<(string|data|date|integer|real|true|false|dict|array)\b/.exec(trimmed);
      if (!element || stack.length === 0) {
        return line;
      }
      const segments = nextPath();
      const number = /^<(?:integer|real)>([^<]*)<\/(?:integer|real)>$/.exec(trimmed);
      if (number) {
        const original = reals.get(pathKey(segments));
        if (original !== undefined && Number(original) === Number(number[1])) {
          return line.replace(trimmed, `<real>${original}</real>`);
        }
        return line;
      }
      const tag = element[1];
      if (!trimmed.endsWith("/>") && !trimmed.includes(`</${tag}>`)) {
        openText = `</${tag}>`;
      }
      return line;
    })
    .join("\n");
}

function isDict(value: PlistValue | undefined): value is PlistObject {
  return isRecord(value);
}

function splitKeyPath(keyPath: string): string[] {
  const segments = keyPath.split(":").map((segment) => segment.trim());
  if (segments.some((segment) => segment.length === 0)) {
    throw new KeySynthesisError(`Invalid plist key path: ${keyPath}`, keyPath);
  }
  return segments;
}

function setIn(dict: PlistObject, segments: string[], value: PlistValue, keyPath: string): PlistObject {
  const [head, ...rest] = segments;
  if (rest.length === 0) {
    return { ...dict, [head]: value };
  }
  let child: PlistObject = {};
  if (head in dict) {
    const existing = dict[head];
    if (!isDict(existing)) {
      throw new KeySynthesisError(`Cannot descend into non-dictionary value at ${head} (${keyPath})`, keyPath);
    }
    child = existing;
  }
  return { ...dict, [head]: setIn(child, rest, value, keyPath) };
}

export const plistFormat: FormatPlugin<PlistDocument> = {
  format: "plist",

  parse(bytes) {
    const text = bytes.toString("utf-8");
    const check = XMLValidator.validate(text);
    if (check !== true) {
      throw new SyntaxError(`${check.err.msg} (line ${check.err.line})`);
    }
    const value = parsePlist(text);
    if (!isDict(value)) {
      throw new SyntaxError("Property list root is not a dictionary.");
    }
    return { root: value, reals: findReals(text) };
  },

  serialize(model) {
    const xml = restoreReals(buildPlist(model.root), model.reals);
    return Buffer.from(xml.endsWith("\n") ? xml : `${xml}\n`, "utf-8");
  },

  read(model, keyPath): KeyReading {
    let current: PlistValue = model.root;
    for (const segment of splitKeyPath(keyPath)) {
      if (!isDict(current) || !(segment in current)) {
        return { found: false };
      }
      current = current[segment];
    }
    return { found: true, value: current };
  },

  write(model, key: ResolvedKey) {
    const segments = splitKeyPath(key.path);
    if (key.op === "present") {
      throw new KeySynthesisError(`No value to synthesize for plist key ${key.path}`, key.path);
    }
    if (key.op === "set") {
      return { ...model, root: setIn(model.root, segments, key.value, key.path) };
    }
    const wanted = key.value;
    const reading = plistFormat.read(model, key.path);
    const current: PlistValue[] = [];
    if (reading.found) {
      if (!Array.isArray(reading.value)) {
        throw new KeySynthesisError(`Plist key ${key.path} is not an array`, key.path);
      }
      current.push(...reading.value);
    }
    if (current.some((item) => deepEqual(item, wanted))) {
      return model;
    }
    return { ...model, root: setIn(model.root, segments, [...current, wanted], key.path) };
  },

  escapeTemplateValue: escapeXml
};
