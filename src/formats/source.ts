import { KeySynthesisError } from "../errors";
import type { PlainValue, ResolvedKey, ValueType } from "../types";
import type { FormatPlugin, KeyReading } from "./types";

/**
 * Line model of a generated Dart configuration class:
 *
 *   class EnvConfig {
 *     static const String appName = "Demo";
 *   }
 */
export type SourceModel = {
  lines: string[];
  className: string;
  closeLine: number;
};

const CLASS_DECL = /^\s*(?:abstract\s+)?class\s+([A-Za-z_]\w*)\b[^{]*\{/;
const CONST_DECL = /^(\s*)static\s+const\s+([A-Za-z_]\w*)\s+([A-Za-z_]\w*)\s*=\s*(.*?);\s*(?:\/\/.*)?$/;
const CONST_START = /^\s*static\s+const\s+[A-Za-z_]\w*\s+([A-Za-z_]\w*)\s*=/;
const STRING_LITERAL = /^"((?:[^"\\]|\\.)*)"$/;
const NUMBER_LITERAL = /^-?\d+(?:\.\d+)?$/;

export function escapeDartString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\$/g, "\\$")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
}

function unescapeDartString(value: string): string {
  return value.replace(/\\(.)/g, (_match, char: string) => {
    if (char === "n") return "\n";
    if (char === "r") return "\r";
    if (char === "t") return "\t";
    return char;
  });
}

/**
 * Returns the line index of the brace closing the first class body, or throws
 * when braces are unbalanced. String literals and line comments are skipped.
 */
function findClassClose(lines: string[], classLine: number): number {
  let depth = 0;
  let opened = false;
  let tripleQuote: string | null = null;
  for (let lineIndex = classLine; lineIndex < lines.length; lineIndex += 1) {
    const line = lines[lineIndex];
    let quote: string | null = null;
    for (let i = 0; i < line.length; i += 1) {
      const char = line[i];
      if (tripleQuote) {
        if (line.startsWith(tripleQuote, i)) {
          i += 2;
          tripleQuote = null;
        }
        continue;
      }
      if (quote) {
        if (char === "\\") {
          i += 1;
        } else if (char === quote) {
          quote = null;
        }
        continue;
      }
      if (char === "/" && line[i + 1] === "/") {
        break;
      }
      if ((char === '"' || char === "'") && line.startsWith(char.repeat(3), i)) {
        tripleQuote = char.repeat(3);
        i += 2;
        continue;
      }
      if (char === '"' || char === "'") {
        quote = char;
        continue;
      }
      if (char === "{") {
        depth += 1;
        opened = true;
      } else if (char === "}") {
        depth -= 1;
        if (depth < 0) {
          throw new SyntaxError(`Unbalanced closing brace on line ${lineIndex + 1}.`);
        }
        if (opened && depth === 0) {
          return lineIndex;
        }
      }
    }
    if (quote) {
      throw new SyntaxError(`Unterminated string literal on line ${lineIndex + 1}.`);
    }
  }
  throw new SyntaxError("Class body is not closed.");
}

function parseLiteral(raw: string): unknown {
  const trimmed = raw.trim();
  const stringMatch = STRING_LITERAL.exec(trimmed);
  if (stringMatch) return unescapeDartString(stringMatch[1]);
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  if (NUMBER_LITERAL.test(trimmed)) return Number(trimmed);
  return trimmed;
}

type FoundConstant = { index: number; span: number; match: RegExpExecArray };

// Declarations may wrap: `static const String logoUrl =\n      "https://...";`
function findConstant(model: SourceModel, name: string): FoundConstant | null {
  for (let index = 0; index < model.closeLine; index += 1) {
    const start = CONST_START.exec(model.lines[index]);
    if (!start || start[1] !== name) {
      continue;
    }
    let joined = model.lines[index];
    let span = 1;
    while (!CONST_DECL.test(joined) && index + span < model.closeLine) {
      joined = `${joined} ${model.lines[index + span].trim()}`;
      span += 1;
    }
    const match = CONST_DECL.exec(joined);
    if (match) {
      return { index, span, match };
    }
  }
  return null;
}

function renderDeclaration(
  indent: string,
  existingType: string | undefined,
  name: string,
  value: PlainValue,
  valueType?: ValueType
): string {
  if (typeof value === "string") {
    return `${indent}static const String ${name} = "${escapeDartString(value)}";`;
  }
  if (typeof value === "boolean") {
    return `${indent}static const bool ${name} = ${value};`;
  }
  if (typeof value === "number") {
    if (existingType === "double" || valueType === "real" || !Number.isInteger(value)) {
      const literal = Number.isInteger(value) ? value.toFixed(1) : String(value);
      return `${indent}static const double ${name} = ${literal};`;
    }
    return `${indent}static const int ${name} = ${value};`;
  }
  throw new KeySynthesisError(`Generated constants only hold scalar values (${name})`, name);
}

export const sourceFormat: FormatPlugin<SourceModel> = {
  format: "generated-source",

  parse(bytes) {
    const lines = bytes.toString("utf-8").replace(/\r\n/g, "\n").split("\n");
    const classLine = lines.findIndex((line) => CLASS_DECL.test(line));
    if (classLine < 0) {
      throw new SyntaxError("No class declaration found.");
    }
    const declaration = CLASS_DECL.exec(lines[classLine]);
    const closeLine = findClassClose(lines, classLine);
    const trailing = lines.slice(closeLine + 1).join("\n");
    if (/[{}]/.test(trailing.replace(/\/\/.*$/gm, ""))) {
      throw new SyntaxError("Unexpected content after class body.");
    }
    return { lines, className: declaration ? declaration[1] : "", closeLine };
  },

  serialize(model) {
    const text = model.lines.join("\n");
    return Buffer.from(text.endsWith("\n") ? text : `${text}\n`, "utf-8");
  },

  read(model, name): KeyReading {
    const found = findConstant(model, name);
    if (!found) {
      return { found: false };
    }
    return { found: true, value: parseLiteral(found.match[4]) };
  },

  write(model, key: ResolvedKey) {
    if (key.op !== "set") {
      throw new KeySynthesisError(`Generated sources only support set keys (${key.path})`, key.path);
    }
    const found = findConstant(model, key.path);
    const lines = [...model.lines];
    if (found) {
      const declaration = renderDeclaration(found.match[1], found.match[2], key.path, key.value, key.type);
      lines.splice(found.index, found.span, declaration);
      return { ...model, lines, closeLine: model.closeLine - (found.span - 1) };
    }
    let closeLine = model.closeLine;
    const closing = lines[closeLine];
    if (closing.trim() !== "}") {
      // `class EnvConfig {}` on one line: move the closing brace to its own line.
      const at = closing.lastIndexOf("}");
      lines.splice(closeLine, 1, closing.slice(0, at).trimEnd(), closing.slice(at));
      closeLine += 1;
    }
    lines.splice(closeLine, 0, renderDeclaration("  ", undefined, key.path, key.value, key.type));
    return { ...model, lines, closeLine: closeLine + 1 };
  },

  escapeTemplateValue: escapeDartString
};
