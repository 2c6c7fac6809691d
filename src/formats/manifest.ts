import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { KeySynthesisError } from "../errors";
import type { PlainValue, ResolvedKey } from "../types";
import type { FormatPlugin, KeyReading } from "./types";
import { escapeXml, isRecord } from "./values";

// Ordered model produced by fast-xml-parser with preserveOrder: each node is
// `{ [tag]: children[], ":@"?: { "@_attr": value } }`.
type OrderedNode = Record<string, unknown>;
type Attributes = Record<string, string>;

export type ManifestModel = OrderedNode[];

const ATTR_PREFIX = "@_";
const ATTRS_KEY = ":@";
const ROOT_TAG = "manifest";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  commentPropName: "#comment",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  commentPropName: "#comment",
  format: true,
  indentBy: "    ",
  suppressEmptyNode: true
});

export type PathStep = {
  tag: string;
  selector?: { attr: string; value: string };
};

export type ManifestPath = {
  steps: PathStep[];
  attr?: string;
};

const STEP = /^([A-Za-z_][\w.:-]*)(?:\[@([\w.:-]+)=([^\]]*)\])?(?:@([\w.:-]+))?$/;

function splitSteps(keyPath: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of keyPath) {
    if (char === "[") depth += 1;
    if (char === "]") depth -= 1;
    if (char === "/" && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

export function parseManifestPath(keyPath: string): ManifestPath {
  const raw = splitSteps(keyPath.trim());
  const steps: PathStep[] = [];
  let attr: string | undefined;
  raw.forEach((part, index) => {
    const match = STEP.exec(part);
    if (!match) {
      throw new KeySynthesisError(`Invalid manifest path step "${part}" in ${keyPath}`, keyPath);
    }
    if (match[4] && index !== raw.length - 1) {
      throw new KeySynthesisError(`Attribute selector must be the last step in ${keyPath}`, keyPath);
    }
    steps.push({
      tag: match[1],
      selector: match[2] ? { attr: match[2], value: match[3] } : undefined
    });
    attr = match[4] ?? attr;
  });
  return { steps, attr };
}

function tagOf(node: OrderedNode): string | null {
  const key = Object.keys(node).find((name) => name !== ATTRS_KEY);
  return key && !key.startsWith("#") && !key.startsWith("?") ? key : null;
}

function childrenOf(node: OrderedNode, tag: string): OrderedNode[] {
  const value = node[tag];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function attrsOf(node: OrderedNode): Attributes {
  const value = node[ATTRS_KEY];
  const attrs: Attributes = {};
  if (isRecord(value)) {
    for (const [name, raw] of Object.entries(value)) {
      if (typeof raw === "string") {
        attrs[name] = raw;
      }
    }
  }
  return attrs;
}

function matchesStep(node: OrderedNode, step: PathStep): boolean {
  if (tagOf(node) !== step.tag) {
    return false;
  }
  if (!step.selector) {
    return true;
  }
  return attrsOf(node)[`${ATTR_PREFIX}${step.selector.attr}`] === step.selector.value;
}

function makeElement(step: PathStep): OrderedNode {
  const node: OrderedNode = { [step.tag]: [] };
  if (step.selector) {
    node[ATTRS_KEY] = { [`${ATTR_PREFIX}${step.selector.attr}`]: step.selector.value };
  }
  return node;
}

function stringifyAttr(value: PlainValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  throw new KeySynthesisError("Manifest attributes only hold scalar values", JSON.stringify(value));
}

function insertChild(siblings: OrderedNode[], child: OrderedNode, tag: string): OrderedNode[] {
  let lastSameTag = -1;
  siblings.forEach((node, index) => {
    if (tagOf(node) === tag) lastSameTag = index;
  });
  const next = [...siblings];
  if (lastSameTag >= 0) {
    next.splice(lastSameTag + 1, 0, child);
  } else {
    next.push(child);
  }
  return next;
}

/** Walks `steps` below `siblings`, creating missing elements, and applies `leaf` to the final node. */
function upsert(
  siblings: OrderedNode[],
  steps: PathStep[],
  leaf: (node: OrderedNode) => OrderedNode
): OrderedNode[] {
  const [step, ...rest] = steps;
  const index = siblings.findIndex((node) => matchesStep(node, step));
  const existing = index >= 0 ? siblings[index] : makeElement(step);
  const updated =
    rest.length === 0
      ? leaf(existing)
      : { ...existing, [step.tag]: upsert(childrenOf(existing, step.tag), rest, leaf) };
  if (index >= 0) {
    const next = [...siblings];
    next[index] = updated;
    return next;
  }
  return insertChild(siblings, updated, step.tag);
}

function rootIndex(model: ManifestModel): number {
  return model.findIndex((node) => tagOf(node) === ROOT_TAG);
}

export const manifestFormat: FormatPlugin<ManifestModel> = {
  format: "android-manifest",

  parse(bytes) {
    const text = bytes.toString("utf-8");
    const check = XMLValidator.validate(text);
    if (check !== true) {
      throw new SyntaxError(`${check.err.msg} (line ${check.err.line})`);
    }
    const parsed: unknown = parser.parse(text);
    if (!Array.isArray(parsed)) {
      throw new SyntaxError("Unexpected manifest document shape.");
    }
    const model = parsed.filter(isRecord);
    if (rootIndex(model) < 0) {
      throw new SyntaxError(`Root element <${ROOT_TAG}> not found.`);
    }
    return model;
  },

  serialize(model) {
    const xml: string = builder.build(model);
    return Buffer.from(`${xml.trim()}\n`, "utf-8");
  },

  read(model, keyPath): KeyReading {
    const { steps, attr } = parseManifestPath(keyPath);
    let candidates: OrderedNode[] = model;
    let node: OrderedNode | undefined;
    for (const step of steps) {
      node = candidates.find((candidate) => matchesStep(candidate, step));
      if (!node) {
        return { found: false };
      }
      candidates = childrenOf(node, step.tag);
    }
    if (!node) {
      return { found: false };
    }
    if (!attr) {
      return { found: true, value: true };
    }
    const value = attrsOf(node)[`${ATTR_PREFIX}${attr}`];
    return value === undefined ? { found: false } : { found: true, value };
  },

  write(model, key: ResolvedKey) {
    const { steps, attr } = parseManifestPath(key.path);
    if (steps.length === 0 || steps[0].tag !== ROOT_TAG) {
      throw new KeySynthesisError(`Manifest paths must start at <${ROOT_TAG}>: ${key.path}`, key.path);
    }
    if (key.op === "include") {
      throw new KeySynthesisError(`Use a selector step instead of include for ${key.path}`, key.path);
    }
    if (key.op === "present") {
      return upsert(model, steps, (node) => node);
    }
    if (!attr) {
      throw new KeySynthesisError(`Manifest set requires a trailing @attribute: ${key.path}`, key.path);
    }
    const value = stringifyAttr(key.value);
    return upsert(model, steps, (node) => ({
      ...node,
      [ATTRS_KEY]: { ...attrsOf(node), [`${ATTR_PREFIX}${attr}`]: value }
    }));
  },

  escapeTemplateValue: escapeXml,

  matches(actual, expected) {
    return typeof actual === "string" && (typeof expected === "string" || typeof expected === "number" || typeof expected === "boolean")
      ? actual === String(expected)
      : actual === expected;
  }
};
