export type FilenameGrammarErrorCode =
  | "path_count"
  | "no_match"
  | "invalid_timestamp"
  | "invalid_integer";

export type FilenameGrammarErrorMeta = {
  code: FilenameGrammarErrorCode;
  grammar: string;
  filename?: string;
  field?: string;
  value?: string;
};

const defaultMessage = (meta: FilenameGrammarErrorMeta): string => {
  const target = meta.filename ? ` in ${meta.filename}` : "";
  switch (meta.code) {
    case "path_count":
      return `${meta.grammar} products consist of exactly one file.`;
    case "no_match":
      return `Not parseable by the ${meta.grammar} filename grammar${target}.`;
    case "invalid_timestamp":
      return `Invalid ${meta.field ?? "timestamp"} '${meta.value ?? ""}'${target}.`;
    case "invalid_integer":
      return `Invalid integer ${meta.field ?? "field"} '${meta.value ?? ""}'${target}.`;
  }
};

export class FilenameGrammarError extends Error {
  readonly code: FilenameGrammarErrorCode;
  readonly grammar: string;
  readonly filename?: string;
  readonly field?: string;
  readonly value?: string;

  constructor(meta: FilenameGrammarErrorMeta, message?: string) {
    super(message ?? defaultMessage(meta));
    this.name = "FilenameGrammarError";
    this.code = meta.code;
    this.grammar = meta.grammar;
    this.filename = meta.filename;
    this.field = meta.field;
    this.value = meta.value;
  }
}
