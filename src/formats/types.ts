import type { ArtifactFormat, PlainValue, ResolvedKey } from "../types";

/** Result of reading a key path out of a parsed model. `undefined` means absent. */
export type KeyReading = { found: false } | { found: true; value: unknown };

/**
 * Format-specific half of the reconciler contract. Every method is pure: models
 * are never mutated, `write` returns the next model.
 */
export interface FormatPlugin<M> {
  readonly format: ArtifactFormat;
  /** Throws on any syntax problem. */
  parse(bytes: Buffer): M;
  serialize(model: M): Buffer;
  read(model: M, keyPath: string): KeyReading;
  /** Throws KeySynthesisError when the format cannot produce the key. */
  write(model: M, key: ResolvedKey): M;
  /** Escapes a flag value before it is spliced into a text template. */
  escapeTemplateValue(value: string): string;
  /** Compares a value read from the model with a required value. */
  matches?(actual: unknown, expected: PlainValue): boolean;
}
