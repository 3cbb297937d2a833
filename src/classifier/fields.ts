import path from "node:path";
import { FilenameGrammarError } from "../grammar/FilenameGrammarError";
import { matchFilename, type FilenameGrammar } from "../grammar/filenameGrammar";

export type FieldContext = {
  grammar: string;
  filePath: string;
};

export function identifySingle<F extends string>(
  grammar: FilenameGrammar<F>,
  paths: readonly string[]
): boolean {
  if (paths.length !== 1) return false;
  return matchFilename(grammar, paths[0]) !== null;
}

export function requireSinglePath(grammar: string, paths: readonly string[]): string {
  if (paths.length !== 1) {
    throw new FilenameGrammarError({ code: "path_count", grammar });
  }
  return paths[0];
}

export function requireTimestamp(
  parsed: Date | null,
  field: string,
  value: string,
  context: FieldContext
): Date {
  if (parsed) return parsed;
  throw new FilenameGrammarError({
    code: "invalid_timestamp",
    grammar: context.grammar,
    filename: path.basename(context.filePath),
    field,
    value,
  });
}

export function parseIntegerField(value: string, field: string, context: FieldContext): number {
  if (!/^\d+$/.test(value)) {
    throw new FilenameGrammarError({
      code: "invalid_integer",
      grammar: context.grammar,
      filename: path.basename(context.filePath),
      field,
      value,
    });
  }
  return Number.parseInt(value, 10);
}
