import assert from "node:assert/strict";
import test from "node:test";

import {
  TransducerError,
  callTransducer,
  chatCompletionUrl,
  createChatCompletionTransducer,
  renderPromptPayload,
  type ChatCompletionConfig,
  type PromptPayload,
  type TextTransducer
} from "../src/index.ts";

const GENERATE: PromptPayload = {
  kind: "generate",
  policyId: "policy-7",
  policyText: "  Researchers may read dataset 42 until 2027. ",
  currentDate: "2026-03-01"
};

const REGENERATE: PromptPayload = {
  kind: "regenerate",
  attempt: 2,
  currentDate: "2026-03-01",
  feedback: "# Conformance Report\n",
  previousDocument: "\nex:p a odrl:Set .\n"
};

const OPENAI_CONFIG: ChatCompletionConfig = {
  kind: "openai_compatible",
  model: "test-model",
  baseUrl: "http://localhost:8080/v1/",
  apiKeyEnv: "TEST_KEY",
  temperature: 0
};

const AZURE_CONFIG: ChatCompletionConfig = {
  kind: "azure",
  model: "policy-deployment",
  baseUrl: "https://example.invalid",
  apiKeyEnv: "TEST_KEY",
  apiVersion: "2024-10-21",
  temperature: 0.2,
  maxTokens: 2048
};

interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(response: () => Response): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetch: async (input, init) => {
      requests.push({ url: String(input), init });
      return response();
    }
  };
}

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), { status: 200 });
}

function readBody(request: RecordedRequest | undefined): unknown {
  return JSON.parse(String(request?.init?.body));
}

test("renderPromptPayload renders the generation prompt", () => {
  const prompt = renderPromptPayload(GENERATE);

  assert.equal(
    prompt.user,
    "Current date: 2026-03-01\nPolicy identifier: policy-7\n\nPolicy text:\nResearchers may read dataset 42 until 2027."
  );
  assert.match(prompt.system, /^You translate natural-language data usage policies/);
});

test("renderPromptPayload renders the repair prompt with the previous document", () => {
  const prompt = renderPromptPayload(REGENERATE);

  assert.equal(
    prompt.user,
    [
      "Current date: 2026-03-01",
      "Repair attempt: 2",
      "",
      "# Conformance Report",
      "",
      "Previous document:",
      "```turtle",
      "ex:p a odrl:Set .",
      "```"
    ].join("\n")
  );
  assert.match(prompt.system, /^You correct ODRL 2\.2 Turtle documents/);
});

test("chatCompletionUrl builds endpoint URLs per provider kind", () => {
  assert.equal(chatCompletionUrl(OPENAI_CONFIG), "http://localhost:8080/v1/chat/completions");
  assert.equal(
    chatCompletionUrl(AZURE_CONFIG),
    "https://example.invalid/openai/deployments/policy-deployment/chat/completions?api-version=2024-10-21"
  );
  assert.equal(
    chatCompletionUrl({ ...AZURE_CONFIG, apiVersion: undefined }),
    "https://example.invalid/openai/deployments/policy-deployment/chat/completions?api-version=2024-06-01"
  );
});

test("openai-compatible transducer sends a bearer token and the model name", async () => {
  const stub = fakeFetch(() => completion("ex:p a odrl:Set ."));
  const transducer = createChatCompletionTransducer(OPENAI_CONFIG, {
    fetch: stub.fetch,
    env: { TEST_KEY: "test-secret" }
  });

  const text = await transducer.transform(GENERATE, { signal: new AbortController().signal });

  assert.equal(text, "ex:p a odrl:Set .");
  assert.equal(stub.requests.length, 1);
  assert.equal(stub.requests[0]?.url, "http://localhost:8080/v1/chat/completions");
  assert.equal(stub.requests[0]?.init?.method, "POST");
  assert.deepEqual(stub.requests[0]?.init?.headers, {
    "Content-Type": "application/json",
    Authorization: "Bearer test-secret"
  });
  const prompt = renderPromptPayload(GENERATE);
  assert.deepEqual(readBody(stub.requests[0]), {
    model: "test-model",
    messages: [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user }
    ],
    temperature: 0,
    stream: false
  });
});

test("azure transducer sends an api-key header and the token limit", async () => {
  const stub = fakeFetch(() => completion("ex:p a odrl:Set ."));
  const transducer = createChatCompletionTransducer(AZURE_CONFIG, {
    fetch: stub.fetch,
    env: { TEST_KEY: "test-secret" }
  });

  await transducer.transform(REGENERATE, { signal: new AbortController().signal });

  assert.deepEqual(stub.requests[0]?.init?.headers, {
    "Content-Type": "application/json",
    "api-key": "test-secret"
  });
  const prompt = renderPromptPayload(REGENERATE);
  assert.deepEqual(readBody(stub.requests[0]), {
    messages: [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user }
    ],
    temperature: 0.2,
    max_tokens: 2048,
    stream: false
  });
});

test("chat transducer reports missing credentials, provider errors and empty replies", async () => {
  const signal = new AbortController().signal;

  const noKey = createChatCompletionTransducer(OPENAI_CONFIG, { fetch: fakeFetch(() => completion("x")).fetch, env: {} });
  await assert.rejects(noKey.transform(GENERATE, { signal }), (error: unknown) => {
    assert.ok(error instanceof TransducerError);
    assert.equal(error.code, "missing_credentials");
    assert.equal(error.message, "TEST_KEY is not set");
    return true;
  });

  const failing = createChatCompletionTransducer(OPENAI_CONFIG, {
    fetch: fakeFetch(() => new Response("overloaded", { status: 503 })).fetch,
    env: { TEST_KEY: "test-secret" }
  });
  await assert.rejects(failing.transform(GENERATE, { signal }), {
    name: "TransducerError",
    code: "provider_error",
    message: "Chat completion request failed with 503: overloaded"
  });

  const empty = createChatCompletionTransducer(OPENAI_CONFIG, {
    fetch: fakeFetch(() => completion("   ")).fetch,
    env: { TEST_KEY: "test-secret" }
  });
  await assert.rejects(empty.transform(GENERATE, { signal }), {
    name: "TransducerError",
    code: "invalid_response",
    message: "Chat completion returned no message content"
  });
});

test("callTransducer returns the transducer text", async () => {
  const transducer: TextTransducer = { transform: async () => "ex:p a odrl:Set ." };

  assert.deepEqual(await callTransducer(transducer, GENERATE, { timeoutMs: 1000 }), {
    ok: true,
    text: "ex:p a odrl:Set ."
  });
});

test("callTransducer times out and aborts the transducer signal", async () => {
  let received: AbortSignal | undefined;
  const transducer: TextTransducer = {
    transform: (_payload, { signal }) => {
      received = signal;
      return new Promise<string>(() => undefined);
    }
  };

  const outcome = await callTransducer(transducer, GENERATE, { timeoutMs: 10 });

  assert.deepEqual(outcome, {
    ok: false,
    failure: "timeout",
    message: "Transducer did not respond within 10ms"
  });
  assert.equal(received?.aborted, true);
});

test("callTransducer does not start a call for an already cancelled session", async () => {
  const controller = new AbortController();
  controller.abort();
  let calls = 0;
  const transducer: TextTransducer = {
    transform: async () => {
      calls += 1;
      return "unused";
    }
  };

  const outcome = await callTransducer(transducer, GENERATE, { timeoutMs: 1000, signal: controller.signal });

  assert.equal(calls, 0);
  assert.equal(outcome.ok, false);
  assert.equal(!outcome.ok && outcome.failure, "cancelled");
  assert.equal(!outcome.ok && outcome.message, "Session was cancelled");
});

test("callTransducer reports cancellation during a pending call", async () => {
  const controller = new AbortController();
  const transducer: TextTransducer = {
    transform: () => {
      setTimeout(() => controller.abort(), 5);
      return new Promise<string>(() => undefined);
    }
  };

  const outcome = await callTransducer(transducer, GENERATE, { timeoutMs: 1000, signal: controller.signal });

  assert.equal(!outcome.ok && outcome.failure, "cancelled");
});

test("callTransducer wraps transducer failures", async () => {
  const cause = new Error("connection reset");
  const transducer: TextTransducer = {
    transform: async () => {
      throw cause;
    }
  };

  assert.deepEqual(await callTransducer(transducer, GENERATE, { timeoutMs: 1000 }), {
    ok: false,
    failure: "failed",
    message: "Transducer failed: connection reset",
    cause
  });
});
