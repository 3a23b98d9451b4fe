import type { SourcePosition, SourceRange } from "./graph.ts";
import { createRange, type Diagnostic } from "./diagnostics.ts";

export type TokenKind =
  | "PrefixDirective"
  | "BaseDirective"
  | "SparqlPrefix"
  | "SparqlBase"
  | "IriRef"
  | "PrefixedName"
  | "BlankNodeLabel"
  | "TypeKeyword"
  | "StringLiteral"
  | "LanguageTag"
  | "DatatypeMarker"
  | "IntegerLiteral"
  | "DecimalLiteral"
  | "DoubleLiteral"
  | "BooleanLiteral"
  | "Dot"
  | "Semicolon"
  | "Comma"
  | "OpenBracket"
  | "CloseBracket"
  | "OpenParen"
  | "CloseParen"
  | "EOF";

export interface Token {
  kind: TokenKind;
  lexeme: string;
  value?: string;
  range: SourceRange;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

const PUNCTUATION_KINDS: Record<string, TokenKind> = {
  ".": "Dot",
  ";": "Semicolon",
  ",": "Comma",
  "[": "OpenBracket",
  "]": "CloseBracket",
  "(": "OpenParen",
  ")": "CloseParen"
};

const BARE_WORD_KINDS = new Map<string, TokenKind>([
  ["a", "TypeKeyword"],
  ["true", "BooleanLiteral"],
  ["false", "BooleanLiteral"]
]);

function createPosition(offset: number, line: number, column: number): SourcePosition {
  return { offset, line, column };
}

function isLetter(value: string): boolean {
  return /[A-Za-z]/.test(value);
}

function isDigit(value: string | undefined): boolean {
  return value !== undefined && /[0-9]/.test(value);
}

function isNamePart(value: string): boolean {
  return /[A-Za-z0-9_.%-]/.test(value);
}

function isHexDigit(value: string | undefined): boolean {
  return value !== undefined && /[0-9A-Fa-f]/.test(value);
}

const UNICODE_ESCAPE_LENGTHS: ReadonlyMap<string, number> = new Map([
  ["u", 4],
  ["U", 8]
]);

function decodeEscape(value: string): string | null {
  switch (value) {
    case "\\":
      return "\\";
    case "\"":
      return "\"";
    case "'":
      return "'";
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    default:
      return null;
  }
}

export function lex(input: string): LexResult {
  const diagnostics: Diagnostic[] = [];
  const tokens: Token[] = [];
  const source = input;

  let index = 0;
  let line = 1;
  let column = 1;

  function currentPosition(): SourcePosition {
    return createPosition(index, line, column);
  }

  function currentChar(): string | undefined {
    return source[index];
  }

  function peek(distance: number): string | undefined {
    return source[index + distance];
  }

  function advance(): string {
    const value = source[index] ?? "";
    index += 1;
    if (value === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    return value;
  }

  function addToken(kind: TokenKind, start: SourcePosition, lexeme: string, value?: string): void {
    tokens.push({
      kind,
      lexeme,
      value,
      range: createRange(start, currentPosition())
    });
  }

  function addDiagnostic(code: Diagnostic["code"], message: string, start: SourcePosition): void {
    diagnostics.push({
      code,
      message,
      range: createRange(start, currentPosition())
    });
  }

  /** Reads the hex digits after `\u` or `\U`; `decoded` is null when they do not form a code point. */
  function readUnicodeEscape(length: number): { lexeme: string; decoded: string | null } {
    let hex = "";
    while (hex.length < length && isHexDigit(currentChar())) {
      hex += advance();
    }
    const codePoint = Number.parseInt(hex, 16);
    if (hex.length < length || codePoint > 0x10ffff) {
      return { lexeme: hex, decoded: null };
    }
    return { lexeme: hex, decoded: String.fromCodePoint(codePoint) };
  }

  function readName(): string {
    let lexeme = "";
    while (index < source.length) {
      const part = currentChar();
      if (part === undefined || !isNamePart(part)) {
        break;
      }
      // A trailing dot terminates the statement instead of belonging to the name.
      if (part === "." && !isNamePartAfterDot(peek(1))) {
        break;
      }
      lexeme += advance();
    }
    return lexeme;
  }

  function isNamePartAfterDot(value: string | undefined): boolean {
    return value !== undefined && /[A-Za-z0-9_%-]/.test(value);
  }

  function lexString(start: SourcePosition, quote: string): void {
    const long = peek(1) === quote && peek(2) === quote;
    let lexeme = "";
    let parsedValue = "";

    lexeme += advance();
    if (long) {
      lexeme += advance();
      lexeme += advance();
    }

    let terminated = false;
    while (index < source.length) {
      const char = currentChar();
      if (char === undefined) {
        break;
      }

      if (char === quote) {
        if (!long) {
          lexeme += advance();
          terminated = true;
          break;
        }
        if (peek(1) === quote && peek(2) === quote) {
          lexeme += advance();
          lexeme += advance();
          lexeme += advance();
          terminated = true;
          break;
        }
      }

      if (!long && (char === "\n" || char === "\r")) {
        break;
      }

      if (char === "\\") {
        lexeme += advance();
        const escaped = currentChar();
        if (escaped === undefined) {
          break;
        }

        lexeme += advance();
        const unicodeLength = UNICODE_ESCAPE_LENGTHS.get(escaped);
        if (unicodeLength !== undefined) {
          const unicode = readUnicodeEscape(unicodeLength);
          lexeme += unicode.lexeme;
          if (unicode.decoded === null) {
            addDiagnostic("LEX_INVALID_ESCAPE", `Invalid unicode escape sequence "\\${escaped}${unicode.lexeme}"`, start);
          } else {
            parsedValue += unicode.decoded;
          }
          continue;
        }

        const decoded = decodeEscape(escaped);
        if (decoded === null) {
          addDiagnostic("LEX_INVALID_ESCAPE", `Invalid string escape sequence "\\${escaped}"`, start);
        } else {
          parsedValue += decoded;
        }
        continue;
      }

      parsedValue += char;
      lexeme += advance();
    }

    if (!terminated) {
      addDiagnostic("LEX_UNTERMINATED_STRING", "Unterminated string literal", start);
      return;
    }

    addToken("StringLiteral", start, lexeme, parsedValue);
  }

  function lexIri(start: SourcePosition): void {
    let lexeme = advance();
    let value = "";
    let terminated = false;
    while (index < source.length) {
      const char = currentChar();
      if (char === undefined || char === "\n" || char === " ") {
        break;
      }
      const unicodeLength = char === "\\" ? UNICODE_ESCAPE_LENGTHS.get(peek(1) ?? "") : undefined;
      if (unicodeLength !== undefined) {
        const marker = peek(1) ?? "";
        lexeme += advance();
        lexeme += advance();
        const unicode = readUnicodeEscape(unicodeLength);
        lexeme += unicode.lexeme;
        if (unicode.decoded === null) {
          addDiagnostic("LEX_INVALID_ESCAPE", `Invalid unicode escape sequence "\\${marker}${unicode.lexeme}"`, start);
        } else {
          value += unicode.decoded;
        }
        continue;
      }
      lexeme += advance();
      if (char === ">") {
        terminated = true;
        break;
      }
      value += char;
    }

    if (!terminated) {
      addDiagnostic("LEX_UNTERMINATED_IRI", "Unterminated IRI reference", start);
      return;
    }

    addToken("IriRef", start, lexeme, value);
  }

  function lexNumber(start: SourcePosition): void {
    let lexeme = "";
    let kind: TokenKind = "IntegerLiteral";
    if (currentChar() === "+" || currentChar() === "-") {
      lexeme += advance();
    }
    while (isDigit(currentChar())) {
      lexeme += advance();
    }
    if (currentChar() === "." && isDigit(peek(1))) {
      kind = "DecimalLiteral";
      lexeme += advance();
      while (isDigit(currentChar())) {
        lexeme += advance();
      }
    }
    const exponent = currentChar();
    if (
      (exponent === "e" || exponent === "E") &&
      (isDigit(peek(1)) || ((peek(1) === "+" || peek(1) === "-") && isDigit(peek(2))))
    ) {
      kind = "DoubleLiteral";
      lexeme += advance();
      if (currentChar() === "+" || currentChar() === "-") {
        lexeme += advance();
      }
      while (isDigit(currentChar())) {
        lexeme += advance();
      }
    }

    addToken(kind, start, lexeme, lexeme);
  }

  while (index < source.length) {
    const value = currentChar();
    if (value === undefined) {
      break;
    }

    if (value === " " || value === "\t" || value === "\n" || value === "\r") {
      advance();
      continue;
    }

    if (value === "#") {
      while (index < source.length && currentChar() !== "\n") {
        advance();
      }
      continue;
    }

    const start = currentPosition();

    if (value === "\"" || value === "'") {
      lexString(start, value);
      continue;
    }

    if (value === "<") {
      lexIri(start);
      continue;
    }

    if (value === "^" && peek(1) === "^") {
      advance();
      advance();
      addToken("DatatypeMarker", start, "^^");
      continue;
    }

    if (value === "@") {
      advance();
      const word = readName();
      if (word === "prefix") {
        addToken("PrefixDirective", start, "@prefix");
      } else if (word === "base") {
        addToken("BaseDirective", start, "@base");
      } else if (word.length > 0 && isLetter(word[0] ?? "")) {
        addToken("LanguageTag", start, `@${word}`, word);
      } else {
        addDiagnostic("LEX_UNEXPECTED_CHARACTER", 'Unexpected character "@"', start);
      }
      continue;
    }

    if (isDigit(value) || ((value === "+" || value === "-") && isDigit(peek(1)))) {
      lexNumber(start);
      continue;
    }

    if (value === "_" && peek(1) === ":") {
      advance();
      advance();
      const label = readName();
      addToken("BlankNodeLabel", start, `_:${label}`, `_:${label}`);
      continue;
    }

    if (isLetter(value) || value === ":") {
      const head = value === ":" ? "" : readName();
      if (currentChar() === ":") {
        advance();
        const local = readName();
        addToken("PrefixedName", start, `${head}:${local}`, `${head}:${local}`);
        continue;
      }

      const upper = head.toUpperCase();
      if (upper === "PREFIX") {
        addToken("SparqlPrefix", start, head);
        continue;
      }
      if (upper === "BASE") {
        addToken("SparqlBase", start, head);
        continue;
      }

      const bareKind = BARE_WORD_KINDS.get(head);
      if (bareKind !== undefined) {
        addToken(bareKind, start, head, head);
        continue;
      }

      addDiagnostic("LEX_UNEXPECTED_CHARACTER", `Unexpected bare word "${head}"`, start);
      continue;
    }

    const punctuationKind = PUNCTUATION_KINDS[value];
    if (punctuationKind !== undefined) {
      advance();
      addToken(punctuationKind, start, value);
      continue;
    }

    const unexpected = advance();
    addDiagnostic("LEX_UNEXPECTED_CHARACTER", `Unexpected character "${unexpected}"`, start);
  }

  const eofPosition = currentPosition();
  tokens.push({
    kind: "EOF",
    lexeme: "",
    range: createRange(eofPosition, eofPosition)
  });

  return {
    tokens,
    diagnostics
  };
}
