import assert from "node:assert/strict";
import test from "node:test";

import { extractDocumentBody } from "../src/index.ts";

const BODY = "@prefix ex: <http://example.com/> .\nex:a ex:b ex:c .";

test("extractDocumentBody takes the first fenced block and drops commentary", () => {
  const raw = `Here is the corrected policy:\n\`\`\`turtle\n${BODY}\n\`\`\`\nLet me know if anything else is needed.`;

  assert.deepEqual(extractDocumentBody(raw), { ok: true, body: BODY });
});

test("extractDocumentBody starts at the first directive when there is no fence", () => {
  const raw = "Sure, the document follows.\nPREFIX ex: <http://example.com/>\nex:a ex:b ex:c .";

  assert.deepEqual(extractDocumentBody(raw), {
    ok: true,
    body: "PREFIX ex: <http://example.com/>\nex:a ex:b ex:c ."
  });
});

test("extractDocumentBody keeps directive-free output whole", () => {
  assert.deepEqual(extractDocumentBody("  <http://example.com/a> <http://example.com/b> 1 .\n"), {
    ok: true,
    body: "<http://example.com/a> <http://example.com/b> 1 ."
  });
});

test("extractDocumentBody strips an unclosed fence", () => {
  assert.deepEqual(extractDocumentBody(`\`\`\`turtle\n${BODY}`), { ok: true, body: BODY });
});

test("extractDocumentBody rejects empty output", () => {
  assert.deepEqual(extractDocumentBody("  \n\t"), { ok: false, reason: "EMPTY_OUTPUT" });
});

test("extractDocumentBody rejects an empty fenced block", () => {
  assert.deepEqual(extractDocumentBody("```turtle\n```"), { ok: false, reason: "NO_DOCUMENT_BODY" });
});
