import type { SourcePosition, SourceRange } from "./graph.ts";

export type DiagnosticCode =
  | "LEX_UNEXPECTED_CHARACTER"
  | "LEX_UNTERMINATED_STRING"
  | "LEX_UNTERMINATED_IRI"
  | "LEX_INVALID_ESCAPE"
  | "PARSE_EXPECTED_TOKEN"
  | "PARSE_UNEXPECTED_TOKEN"
  | "PARSE_UNKNOWN_PREFIX"
  | "PARSE_EMPTY_DOCUMENT";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  range: SourceRange;
}

function clonePosition(position: SourcePosition): SourcePosition {
  return {
    offset: position.offset,
    line: position.line,
    column: position.column
  };
}

export function createRange(start: SourcePosition, end: SourcePosition): SourceRange {
  return {
    start: clonePosition(start),
    end: clonePosition(end)
  };
}

export function createDiagnostic(code: DiagnosticCode, message: string, range: SourceRange): Diagnostic {
  return {
    code,
    message,
    range: createRange(range.start, range.end)
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { line, column } = diagnostic.range.start;
  return `${line}:${column} ${diagnostic.code} ${diagnostic.message}`;
}
