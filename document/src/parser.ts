import {
  RDF_TYPE,
  XSD_NAMESPACE,
  type GraphNode,
  type NodeKind,
  type PolicyDocument,
  type SourceRange,
  type Term
} from "./graph.ts";
import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "./diagnostics.ts";
import { lex, type Token } from "./lexer.ts";

export interface ParseResult {
  document: PolicyDocument | null;
  diagnostics: Diagnostic[];
}

const LITERAL_DATATYPE_BY_TOKEN: Partial<Record<Token["kind"], string>> = {
  IntegerLiteral: `${XSD_NAMESPACE}integer`,
  DecimalLiteral: `${XSD_NAMESPACE}decimal`,
  DoubleLiteral: `${XSD_NAMESPACE}double`,
  BooleanLiteral: `${XSD_NAMESPACE}boolean`
};

class StatementAbort extends Error {
  constructor() {
    super("statement aborted");
    this.name = "StatementAbort";
  }
}

class Parser {
  private readonly tokens: Token[];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly prefixes = new Map<string, string>();
  private readonly nodes = new Map<string, GraphNode>();
  private readonly labelledBlankNodes = new Map<string, GraphNode>();
  private base: string | undefined;
  private blankCounter = 0;
  private tripleCount = 0;
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): ParseResult {
    while (!this.isAt("EOF")) {
      const startIndex = this.index;
      try {
        this.parseStatement();
      } catch (error) {
        if (!(error instanceof StatementAbort)) {
          throw error;
        }
        this.skipToStatementEnd();
      }

      if (this.index === startIndex) {
        this.advance();
      }
    }

    if (this.diagnostics.length === 0 && this.tripleCount === 0) {
      const eof = this.current();
      this.addDiagnosticAtRange(
        "PARSE_EMPTY_DOCUMENT",
        "Document must contain at least one triple",
        eof.range
      );
    }

    if (this.diagnostics.length > 0) {
      return {
        document: null,
        diagnostics: this.diagnostics
      };
    }

    return {
      document: {
        prefixes: Object.fromEntries(this.prefixes),
        nodes: [...this.nodes.values()]
      },
      diagnostics: this.diagnostics
    };
  }

  private parseStatement(): void {
    const token = this.current();

    if (token.kind === "PrefixDirective") {
      this.advance();
      this.parsePrefixBody();
      this.expect("Dot", "Expected '.' after @prefix declaration");
      return;
    }

    if (token.kind === "SparqlPrefix") {
      this.advance();
      this.parsePrefixBody();
      return;
    }

    if (token.kind === "BaseDirective" || token.kind === "SparqlBase") {
      this.advance();
      const iriToken = this.expect("IriRef", "Expected an IRI reference after base declaration");
      this.base = iriToken.value;
      if (token.kind === "BaseDirective") {
        this.expect("Dot", "Expected '.' after @base declaration");
      }
      return;
    }

    if (token.kind === "OpenBracket") {
      const subject = this.parseBlankNodePropertyList();
      if (!this.isAt("Dot")) {
        this.parsePredicateObjectList(subject);
      }
      this.expect("Dot", "Expected '.' at the end of the statement");
      return;
    }

    const subject = this.parseSubject();
    this.parsePredicateObjectList(subject);
    this.expect("Dot", "Expected '.' at the end of the statement");
  }

  private parsePrefixBody(): void {
    const nameToken = this.expect("PrefixedName", "Expected a prefix name ending in ':'");
    const name = nameToken.value ?? "";
    if (!name.endsWith(":")) {
      this.fail("PARSE_UNEXPECTED_TOKEN", `Prefix name "${name}" must end in ':'`, nameToken);
    }
    const iriToken = this.expect("IriRef", "Expected an IRI reference for the prefix namespace");
    this.prefixes.set(name.slice(0, -1), this.resolveRelative(iriToken.value ?? ""));
  }

  private parseSubject(): GraphNode {
    const token = this.current();
    if (token.kind === "IriRef" || token.kind === "PrefixedName") {
      const iri = this.parseIri();
      return this.ensureNode(iri, "iri");
    }
    if (token.kind === "BlankNodeLabel") {
      this.advance();
      return this.labelledBlankNode(token.value ?? token.lexeme);
    }

    this.fail("PARSE_EXPECTED_TOKEN", "Expected a subject IRI or blank node", token);
  }

  private parsePredicateObjectList(subject: GraphNode): void {
    this.parseVerbObjectList(subject);
    while (this.isAt("Semicolon")) {
      this.advance();
      while (this.isAt("Semicolon")) {
        this.advance();
      }
      if (this.isAt("Dot") || this.isAt("CloseBracket") || this.isAt("EOF")) {
        return;
      }
      this.parseVerbObjectList(subject);
    }
  }

  private parseVerbObjectList(subject: GraphNode): void {
    const predicate = this.parseVerb();
    this.parseObject(subject, predicate);
    while (this.isAt("Comma")) {
      this.advance();
      this.parseObject(subject, predicate);
    }
  }

  private parseVerb(): string {
    if (this.isAt("TypeKeyword")) {
      this.advance();
      return RDF_TYPE;
    }
    const token = this.current();
    if (token.kind === "IriRef" || token.kind === "PrefixedName") {
      return this.parseIri();
    }

    this.fail("PARSE_EXPECTED_TOKEN", "Expected a predicate", token);
  }

  private parseObject(subject: GraphNode, predicate: string): void {
    const term = this.parseObjectTerm();
    const values = subject.properties.get(predicate);
    if (values === undefined) {
      subject.properties.set(predicate, [term]);
    } else {
      values.push(term);
    }
    if (predicate === RDF_TYPE && term.kind === "iri" && !subject.types.includes(term.value)) {
      subject.types.push(term.value);
    }
    this.tripleCount += 1;
  }

  private parseObjectTerm(): Term {
    const token = this.current();

    switch (token.kind) {
      case "IriRef":
      case "PrefixedName":
        return { kind: "iri", value: this.parseIri() };
      case "BlankNodeLabel": {
        this.advance();
        const node = this.labelledBlankNode(token.value ?? token.lexeme);
        return { kind: "blank", id: node.id };
      }
      case "OpenBracket": {
        const node = this.parseBlankNodePropertyList();
        return { kind: "blank", id: node.id };
      }
      case "OpenParen":
        return this.parseCollection();
      case "StringLiteral":
        return this.parseStringLiteral();
      case "IntegerLiteral":
      case "DecimalLiteral":
      case "DoubleLiteral":
      case "BooleanLiteral":
        this.advance();
        return {
          kind: "literal",
          value: token.value ?? token.lexeme,
          datatype: LITERAL_DATATYPE_BY_TOKEN[token.kind]
        };
      default:
        this.fail("PARSE_EXPECTED_TOKEN", "Expected an object term", token);
    }
  }

  private parseStringLiteral(): Term {
    const token = this.advance();
    const value = token.value ?? "";

    if (this.isAt("LanguageTag")) {
      const tag = this.advance();
      return { kind: "literal", value, language: tag.value };
    }

    if (this.isAt("DatatypeMarker")) {
      this.advance();
      const datatypeToken = this.current();
      if (datatypeToken.kind !== "IriRef" && datatypeToken.kind !== "PrefixedName") {
        this.fail("PARSE_EXPECTED_TOKEN", "Expected a datatype IRI after '^^'", datatypeToken);
      }
      return { kind: "literal", value, datatype: this.parseIri() };
    }

    return { kind: "literal", value };
  }

  private parseCollection(): Term {
    this.expect("OpenParen", "Expected '('");
    const items: Term[] = [];
    while (!this.isAt("CloseParen")) {
      if (this.isAt("EOF") || this.isAt("Dot")) {
        this.fail("PARSE_EXPECTED_TOKEN", "Expected ')' to close the collection", this.current());
      }
      items.push(this.parseObjectTerm());
    }
    this.advance();
    return { kind: "list", items };
  }

  private parseBlankNodePropertyList(): GraphNode {
    this.expect("OpenBracket", "Expected '['");
    const node = this.ensureNode(this.nextBlankId(), "blank");
    if (!this.isAt("CloseBracket")) {
      this.parsePredicateObjectList(node);
    }
    this.expect("CloseBracket", "Expected ']' to close the blank node");
    return node;
  }

  private parseIri(): string {
    const token = this.advance();
    if (token.kind === "IriRef") {
      return this.resolveRelative(token.value ?? "");
    }

    const name = token.value ?? token.lexeme;
    const separator = name.indexOf(":");
    const prefix = name.slice(0, separator);
    const local = name.slice(separator + 1);
    const namespace = this.prefixes.get(prefix);
    if (namespace === undefined) {
      this.fail("PARSE_UNKNOWN_PREFIX", `Prefix "${prefix}:" is not declared`, token);
    }
    return `${namespace}${local}`;
  }

  private resolveRelative(iri: string): string {
    if (this.base === undefined || /^[A-Za-z][A-Za-z0-9+.-]*:/.test(iri)) {
      return iri;
    }
    return `${this.base}${iri}`;
  }

  private ensureNode(id: string, kind: NodeKind): GraphNode {
    const existing = this.nodes.get(id);
    if (existing !== undefined) {
      return existing;
    }

    const node: GraphNode = {
      id,
      kind,
      types: [],
      properties: new Map()
    };
    this.nodes.set(id, node);
    return node;
  }

  /**
   * Labels and anonymous nodes share the `_:b<n>` space. A label whose id an
   * anonymous node already holds is moved to a fresh id.
   */
  private labelledBlankNode(label: string): GraphNode {
    const existing = this.labelledBlankNodes.get(label);
    if (existing !== undefined) {
      return existing;
    }

    const node = this.ensureNode(this.nodes.has(label) ? this.nextBlankId() : label, "blank");
    this.labelledBlankNodes.set(label, node);
    return node;
  }

  private nextBlankId(): string {
    let candidate: string;
    do {
      this.blankCounter += 1;
      candidate = `_:b${this.blankCounter}`;
    } while (this.nodes.has(candidate));
    return candidate;
  }

  private expect(kind: Token["kind"], message: string): Token {
    const token = this.current();
    if (token.kind === kind) {
      return this.advance();
    }

    this.fail("PARSE_EXPECTED_TOKEN", message, token);
  }

  private fail(code: DiagnosticCode, message: string, token: Token): never {
    this.addDiagnosticAtRange(code, message, token.range);
    throw new StatementAbort();
  }

  private skipToStatementEnd(): void {
    let depth = 0;
    while (!this.isAt("EOF")) {
      const token = this.advance();
      if (token.kind === "OpenBracket" || token.kind === "OpenParen") {
        depth += 1;
      } else if ((token.kind === "CloseBracket" || token.kind === "CloseParen") && depth > 0) {
        depth -= 1;
      } else if (token.kind === "Dot" && depth === 0) {
        return;
      }
    }
  }

  private isAt(kind: Token["kind"]): boolean {
    return this.current().kind === kind;
  }

  private current(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const token = this.current();
    if (this.index < this.tokens.length - 1) {
      this.index += 1;
    }
    return token;
  }

  private addDiagnosticAtRange(code: DiagnosticCode, message: string, range: SourceRange): void {
    this.diagnostics.push(createDiagnostic(code, message, range));
  }
}

export function parseTurtleDocument(input: string): ParseResult {
  const lexResult = lex(input);
  if (lexResult.diagnostics.length > 0) {
    return {
      document: null,
      diagnostics: lexResult.diagnostics
    };
  }

  const parser = new Parser(lexResult.tokens);
  return parser.parse();
}
