export type PromptPayload =
  | {
      kind: "generate";
      policyId: string;
      policyText: string;
      currentDate: string;
    }
  | {
      kind: "regenerate";
      attempt: number;
      currentDate: string;
      feedback: string;
      previousDocument: string;
    };

export interface TransformOptions {
  signal: AbortSignal;
}

/**
 * Text collaborator that turns a prompt payload into a candidate document
 * body. Implementations throw on failure and must stop work when the
 * signal aborts.
 */
export interface TextTransducer {
  transform(payload: PromptPayload, options: TransformOptions): Promise<string>;
}

export interface RenderedPrompt {
  system: string;
  user: string;
}

const GENERATION_SYSTEM_PROMPT = [
  "You translate natural-language data usage policies into ODRL 2.2 documents serialized as Turtle.",
  "Declare the odrl, ex, xsd and dct prefixes before any triple.",
  "Type the policy as odrl:Set, odrl:Offer or odrl:Agreement and give it exactly one odrl:uid.",
  "Type every permission, prohibition and obligation node, and give each an odrl:action.",
  "Type every constraint as odrl:Constraint with one odrl:leftOperand, one odrl:operator and one odrl:rightOperand.",
  "Use only ODRL core operators and left operands, and type literal right operands with their xsd datatype.",
  "Return only the Turtle document."
].join("\n");

const REPAIR_SYSTEM_PROMPT = [
  "You correct ODRL 2.2 Turtle documents that failed shape validation.",
  "Fix every reported finding while preserving the meaning of the original policy.",
  "Do not drop rules or constraints to silence a finding.",
  "Return only the complete corrected Turtle document."
].join("\n");

export function renderPromptPayload(payload: PromptPayload): RenderedPrompt {
  if (payload.kind === "generate") {
    return {
      system: GENERATION_SYSTEM_PROMPT,
      user: [
        `Current date: ${payload.currentDate}`,
        `Policy identifier: ${payload.policyId}`,
        "",
        "Policy text:",
        payload.policyText.trim()
      ].join("\n")
    };
  }

  return {
    system: REPAIR_SYSTEM_PROMPT,
    user: [
      `Current date: ${payload.currentDate}`,
      `Repair attempt: ${payload.attempt}`,
      "",
      payload.feedback.trim(),
      "",
      "Previous document:",
      "```turtle",
      payload.previousDocument.trim(),
      "```"
    ].join("\n")
  };
}

export type TransducerEndpointKind = "azure" | "openai_compatible";

export interface ChatCompletionConfig {
  kind: TransducerEndpointKind;
  model: string;
  baseUrl: string;
  apiKeyEnv: string;
  apiVersion?: string;
  temperature: number;
  maxTokens?: number;
}

export type TransducerErrorType = "missing_credentials" | "provider_error" | "invalid_response";

export class TransducerError extends Error {
  readonly code: TransducerErrorType;

  constructor(code: TransducerErrorType, message: string) {
    super(message);
    this.name = "TransducerError";
    this.code = code;
  }
}

export interface ChatCompletionTransducerOptions {
  fetch?: typeof fetch;
  env?: Record<string, string | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

export function chatCompletionUrl(config: ChatCompletionConfig): string {
  const baseUrl = trimTrailingSlash(config.baseUrl);
  if (config.kind === "azure") {
    const apiVersion = encodeURIComponent(config.apiVersion ?? "2024-06-01");
    return `${baseUrl}/openai/deployments/${encodeURIComponent(config.model)}/chat/completions?api-version=${apiVersion}`;
  }
  return `${baseUrl}/chat/completions`;
}

function extractContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return undefined;
  }
  const firstChoice: unknown = data.choices[0];
  if (!isRecord(firstChoice) || !isRecord(firstChoice.message)) {
    return undefined;
  }
  const content = firstChoice.message.content;
  return typeof content === "string" ? content : undefined;
}

async function readErrorBody(response: Response): Promise<string> {
  const text = await response.text();
  return text.length > 500 ? `${text.slice(0, 500)}...` : text;
}

export function createChatCompletionTransducer(
  config: ChatCompletionConfig,
  options: ChatCompletionTransducerOptions = {}
): TextTransducer {
  const fetchImpl = options.fetch ?? fetch;
  const env = options.env ?? process.env;

  return {
    async transform(payload, { signal }) {
      const apiKey = env[config.apiKeyEnv];
      if (!apiKey) {
        throw new TransducerError("missing_credentials", `${config.apiKeyEnv} is not set`);
      }

      const prompt = renderPromptPayload(payload);
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (config.kind === "azure") {
        headers["api-key"] = apiKey;
      } else {
        headers.Authorization = `Bearer ${apiKey}`;
      }

      const response = await fetchImpl(chatCompletionUrl(config), {
        method: "POST",
        signal,
        headers,
        body: JSON.stringify({
          ...(config.kind === "openai_compatible" ? { model: config.model } : {}),
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user }
          ],
          temperature: config.temperature,
          ...(config.maxTokens !== undefined ? { max_tokens: config.maxTokens } : {}),
          stream: false
        })
      });

      if (!response.ok) {
        throw new TransducerError(
          "provider_error",
          `Chat completion request failed with ${response.status}: ${await readErrorBody(response)}`
        );
      }

      const content = extractContent(await response.json());
      if (content === undefined || content.trim().length === 0) {
        throw new TransducerError("invalid_response", "Chat completion returned no message content");
      }

      return content;
    }
  };
}

export type TransducerCallFailure = "timeout" | "cancelled" | "failed";

export type TransducerCallOutcome =
  | {
      ok: true;
      text: string;
    }
  | {
      ok: false;
      failure: TransducerCallFailure;
      message: string;
      cause?: unknown;
    };

class TransducerTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`Transducer did not respond within ${timeoutMs}ms`);
    this.name = "TransducerTimeout";
  }
}

/**
 * Runs one transducer call under a timer and the caller's cancellation
 * signal. The timer is always cleared before returning.
 */
export async function callTransducer(
  transducer: TextTransducer,
  payload: PromptPayload,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<TransducerCallOutcome> {
  const { timeoutMs, signal: outerSignal } = options;
  if (outerSignal?.aborted) {
    return { ok: false, failure: "cancelled", message: "Session was cancelled", cause: outerSignal.reason };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new TransducerTimeout(timeoutMs));
  }, timeoutMs);
  const forwardAbort = (): void => controller.abort(outerSignal?.reason);
  outerSignal?.addEventListener("abort", forwardAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    const text = await Promise.race([transducer.transform(payload, { signal: controller.signal }), aborted]);
    return { ok: true, text };
  } catch (error) {
    if (timedOut) {
      return { ok: false, failure: "timeout", message: `Transducer did not respond within ${timeoutMs}ms` };
    }
    if (outerSignal?.aborted) {
      return { ok: false, failure: "cancelled", message: "Session was cancelled", cause: error };
    }
    return {
      ok: false,
      failure: "failed",
      message: `Transducer failed: ${error instanceof Error ? error.message : String(error)}`,
      cause: error
    };
  } finally {
    clearTimeout(timer);
    outerSignal?.removeEventListener("abort", forwardAbort);
  }
}
