import { describe, expect, it } from "vitest";
import { KeySynthesisError } from "../../errors";
import { escapeDartString, sourceFormat } from "../source";

const parse = (text: string) => sourceFormat.parse(Buffer.from(text, "utf-8"));
const render = (model: ReturnType<typeof parse>) => sourceFormat.serialize(model).toString("utf-8");

const ENV = `// managed file

class EnvConfig {
  static const String appName = "Demo";
  static const int versionCode = 4;
  static const bool pushNotify = false;
  static const double ratio = 1.5;
}
`;

describe("sourceFormat", () => {
  it("reads typed constant values", () => {
    const model = parse(ENV);
    expect(model.className).toBe("EnvConfig");
    expect(sourceFormat.read(model, "appName")).toEqual({ found: true, value: "Demo" });
    expect(sourceFormat.read(model, "versionCode")).toEqual({ found: true, value: 4 });
    expect(sourceFormat.read(model, "pushNotify")).toEqual({ found: true, value: false });
    expect(sourceFormat.read(model, "ratio")).toEqual({ found: true, value: 1.5 });
    expect(sourceFormat.read(model, "bundleId")).toEqual({ found: false });
  });

  it("replaces an existing constant in place and keeps its type", () => {
    let model = parse(ENV);
    model = sourceFormat.write(model, { path: "appName", op: "set", value: `Say "hi" $x` });
    model = sourceFormat.write(model, { path: "ratio", op: "set", value: 2 });
    expect(render(model)).toBe(`// managed file

class EnvConfig {
  static const String appName = "Say \\"hi\\" \\$x";
  static const int versionCode = 4;
  static const bool pushNotify = false;
  static const double ratio = 2.0;
}
`);
    expect(sourceFormat.read(model, "appName")).toEqual({ found: true, value: `Say "hi" $x` });
  });

  it("appends new constants before the closing brace", () => {
    const model = sourceFormat.write(parse(ENV), { path: "packageName", op: "set", value: "com.example.demo" });
    expect(render(model).split("\n").slice(-3)).toEqual([
      '  static const String packageName = "com.example.demo";',
      "}",
      ""
    ]);
  });

  it("declares whole numbers as double when the key is typed real", () => {
    let model = sourceFormat.write(parse(ENV), { path: "bottommenuFontSize", op: "set", value: 12, type: "real" });
    model = sourceFormat.write(model, { path: "splashDuration", op: "set", value: 3, type: "integer" });
    expect(render(model).split("\n").slice(-4)).toEqual([
      "  static const double bottommenuFontSize = 12.0;",
      "  static const int splashDuration = 3;",
      "}",
      ""
    ]);
    expect(sourceFormat.read(model, "bottommenuFontSize")).toEqual({ found: true, value: 12 });
  });

  it("handles declarations wrapped over several lines", () => {
    const text = `class EnvConfig {
  static const String logoUrl =
      "https://example.test/logo.png";
  static const bool isSplash = true;
}
`;
    let model = parse(text);
    expect(sourceFormat.read(model, "logoUrl")).toEqual({ found: true, value: "https://example.test/logo.png" });

    model = sourceFormat.write(model, { path: "logoUrl", op: "set", value: "https://example.test/new.png" });
    model = sourceFormat.write(model, { path: "splashDuration", op: "set", value: 3 });
    expect(render(model)).toBe(`class EnvConfig {
  static const String logoUrl = "https://example.test/new.png";
  static const bool isSplash = true;
  static const int splashDuration = 3;
}
`);
  });

  it("opens up a class declared on one line", () => {
    const model = sourceFormat.write(parse("class EnvConfig {}\n"), { path: "appName", op: "set", value: "Demo" });
    expect(render(model)).toBe(`class EnvConfig {\n  static const String appName = "Demo";\n}\n`);
  });

  it("rejects unbalanced or unterminated sources", () => {
    expect(() => parse("const x = 1;\n")).toThrow("No class declaration found.");
    expect(() => parse("class EnvConfig {\n  static const String a = \"x;\n}\n")).toThrow(
      "Unterminated string literal on line 2."
    );
    expect(() => parse("class EnvConfig {\n}\n}\n")).toThrow("Unexpected content after class body.");
    expect(() => parse("class EnvConfig {\n  static const int a = 1;\n")).toThrow("Class body is not closed.");
  });

  it("ignores braces inside strings and comments", () => {
    const model = parse(`class EnvConfig {\n  static const String tagline = "{ not a brace }"; // }\n}\n`);
    expect(model.closeLine).toBe(2);
    expect(sourceFormat.read(model, "tagline")).toEqual({ found: true, value: "{ not a brace }" });
  });

  it("only supports set keys with scalar values", () => {
    const model = parse(ENV);
    expect(() => sourceFormat.write(model, { path: "appName", op: "present" })).toThrow(KeySynthesisError);
    expect(() => sourceFormat.write(model, { path: "list", op: "set", value: ["a"] })).toThrow(KeySynthesisError);
  });

  it("escapes template values for a double-quoted string", () => {
    expect(escapeDartString("a\\b\"c$d\ne")).toBe('a\\\\b\\"c\\$d\\ne');
  });
});
