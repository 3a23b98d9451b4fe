export type ExtractionResult =
  | {
      ok: true;
      body: string;
    }
  | {
      ok: false;
      reason: "EMPTY_OUTPUT" | "NO_DOCUMENT_BODY";
    };

const FENCED_BLOCK_PATTERN = /```[A-Za-z0-9_-]*[ \t]*\r?\n([\s\S]*?)```/;
const STRAY_FENCE_PATTERN = /```[A-Za-z0-9_-]*[ \t]*/g;
const DIRECTIVE_LINE_PATTERN = /^\s*(@prefix|@base|PREFIX\s|BASE\s)/i;

/**
 * Isolates a serialized document from raw transducer output. The first
 * fenced block wins when there is one; anything before the first prefix or
 * base declaration is treated as commentary. Output without any directive
 * is returned whole, trimmed, so a bare triple block still reaches the
 * parser.
 */
export function extractDocumentBody(raw: string): ExtractionResult {
  if (raw.trim().length === 0) {
    return { ok: false, reason: "EMPTY_OUTPUT" };
  }

  const fenced = FENCED_BLOCK_PATTERN.exec(raw);
  const candidate = (fenced?.[1] ?? raw).replace(STRAY_FENCE_PATTERN, "");
  const lines = candidate.split(/\r?\n/);
  const firstDirective = lines.findIndex((line) => DIRECTIVE_LINE_PATTERN.test(line));
  const body = (firstDirective === -1 ? lines : lines.slice(firstDirective)).join("\n").trim();

  if (body.length === 0) {
    return { ok: false, reason: "NO_DOCUMENT_BODY" };
  }

  return { ok: true, body };
}
