export { lex } from "./lexer.ts";
export { parseTurtleDocument } from "./parser.ts";
export { extractDocumentBody } from "./extract.ts";
export { formatDiagnostic } from "./diagnostics.ts";
export {
  RDF_NAMESPACE,
  RDF_TYPE,
  XSD_NAMESPACE,
  cloneDocument,
  compactIri,
  formatTerm,
  getNode,
  nodesOfType,
  propertyValues,
  resolveTermNode
} from "./graph.ts";
export type {
  BlankTerm,
  GraphNode,
  IriTerm,
  ListTerm,
  LiteralTerm,
  NodeKind,
  PolicyDocument,
  SourcePosition,
  SourceRange,
  Term
} from "./graph.ts";
export type { Diagnostic, DiagnosticCode } from "./diagnostics.ts";
export type { ExtractionResult } from "./extract.ts";
export type { LexResult, Token, TokenKind } from "./lexer.ts";
export type { ParseResult } from "./parser.ts";
