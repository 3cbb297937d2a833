import path from "node:path";
import { FilenameGrammarError } from "./FilenameGrammarError";

export type LiteralSlot = { kind: "literal"; text: string };
export type FieldSlot<F extends string> = { kind: "field"; name: F; pattern: string };
export type GrammarSlot<F extends string> = LiteralSlot | FieldSlot<F>;

export type FilenameGrammar<F extends string> = {
  name: string;
  slots: readonly GrammarSlot<F>[];
  separator: string;
  /** Without the leading dot. Empty means the name ends after the last slot. */
  extension: string;
  regex: RegExp;
};

export type ParsedFields<F extends string> = ReadonlyMap<F, string>;

const FIELD_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function literal(text: string): LiteralSlot {
  return { kind: "literal", text };
}

export function field<F extends string>(name: F, pattern: string): FieldSlot<F> {
  return { kind: "field", name, pattern };
}

/** A named field whose only accepted value is `expected`. */
export function fixedField<F extends string>(name: F, expected: string): FieldSlot<F> {
  return { kind: "field", name, pattern: escapeRegex(expected) };
}

export function defineGrammar<F extends string>(params: {
  name: string;
  slots: readonly GrammarSlot<F>[];
  extension: string;
  separator?: string;
}): FilenameGrammar<F> {
  const separator = params.separator ?? "_";
  if (!params.slots.length) {
    throw new Error(`Grammar ${params.name} has no slots`);
  }

  const seen = new Set<string>();
  const parts = params.slots.map((slot) => {
    if (slot.kind === "literal") return escapeRegex(slot.text);
    if (!FIELD_NAME.test(slot.name)) {
      throw new Error(`Grammar ${params.name}: invalid field name '${slot.name}'`);
    }
    if (seen.has(slot.name)) {
      throw new Error(`Grammar ${params.name}: duplicate field '${slot.name}'`);
    }
    seen.add(slot.name);
    return `(?<${slot.name}>${slot.pattern})`;
  });

  const suffix = params.extension ? `\\.${escapeRegex(params.extension)}` : "";
  const regex = new RegExp(`^${parts.join(escapeRegex(separator))}${suffix}$`);

  return {
    name: params.name,
    slots: params.slots,
    separator,
    extension: params.extension,
    regex,
  };
}

export function fieldNames<F extends string>(grammar: FilenameGrammar<F>): F[] {
  const names: F[] = [];
  for (const slot of grammar.slots) {
    if (slot.kind === "field") names.push(slot.name);
  }
  return names;
}

/** Matches the basename of `filePath`; directories are ignored. */
export function matchFilename<F extends string>(
  grammar: FilenameGrammar<F>,
  filePath: string
): ParsedFields<F> | null {
  const match = grammar.regex.exec(path.basename(filePath));
  if (!match) return null;

  const values = new Map<F, string>();
  for (const name of fieldNames(grammar)) {
    const value = match.groups?.[name];
    if (value === undefined) return null;
    values.set(name, value);
  }
  return values;
}

export function parseFilename<F extends string>(
  grammar: FilenameGrammar<F>,
  filePath: string
): ParsedFields<F> {
  const fields = matchFilename(grammar, filePath);
  if (!fields) {
    throw new FilenameGrammarError({
      code: "no_match",
      grammar: grammar.name,
      filename: path.basename(filePath),
    });
  }
  return fields;
}

export function getField<F extends string>(fields: ParsedFields<F>, name: F): string {
  const value = fields.get(name);
  if (value === undefined) {
    throw new Error(`Field ${name} missing from parsed filename`);
  }
  return value;
}

/** Basename without the grammar's extension. */
export function productNameOf<F extends string>(
  grammar: FilenameGrammar<F>,
  filePath: string
): string {
  const base = path.basename(filePath);
  const suffix = grammar.extension ? `.${grammar.extension}` : "";
  return suffix && base.endsWith(suffix) ? base.slice(0, -suffix.length) : base;
}
