import { extractDocumentBody, formatDiagnostic, parseTurtleDocument } from "../../document/src/index.ts";

import { assessConflicts, type ConflictAssessment } from "./conflict-assessment.ts";
import type { ConflictSignal } from "./conflict-taxonomy.ts";
import type { ConformanceEnvironment } from "./environment.ts";
import {
  TRANSDUCER_FAILURE_CODES,
  createRepairOrchestrator,
  normalizeAttemptTimeout,
  type RepairSessionErrorCode,
  type RepairSessionOptions,
  type RepairSessionResult
} from "./repair-orchestrator.ts";
import { callTransducer, type TextTransducer } from "./transducer.ts";

export interface PolicyPipelineInput {
  policyId: string;
  policyText: string;
  signals: readonly ConflictSignal[];
}

export type PolicyPipelineResult =
  | {
      status: "rejected" | "needs_input";
      assessment: ConflictAssessment;
    }
  | {
      status: "completed";
      assessment: ConflictAssessment;
      generatedSource: string;
      session: RepairSessionResult;
    };

export class PolicyGenerationError extends Error {
  readonly code: RepairSessionErrorCode;
  readonly assessment: ConflictAssessment;

  constructor(code: RepairSessionErrorCode, message: string, assessment: ConflictAssessment, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PolicyGenerationError";
    this.code = code;
    this.assessment = assessment;
  }
}

/**
 * Assessment, first generation, then a repair session over the parsed
 * candidate. Only approved policies reach the transducer.
 */
export async function runPolicyPipeline(
  input: PolicyPipelineInput,
  environment: ConformanceEnvironment,
  transducer: TextTransducer,
  options: RepairSessionOptions = {}
): Promise<PolicyPipelineResult> {
  const assessment = assessConflicts(input.signals, environment.taxonomy);
  if (assessment.decision === "reject") {
    return { status: "rejected", assessment };
  }
  if (assessment.decision === "needs_input") {
    return { status: "needs_input", assessment };
  }

  const now = options.now ?? (() => new Date());
  const generation = await callTransducer(
    transducer,
    {
      kind: "generate",
      policyId: input.policyId,
      policyText: input.policyText,
      currentDate: now().toISOString().slice(0, 10)
    },
    {
      timeoutMs: normalizeAttemptTimeout(options.attemptTimeoutMs ?? environment.config.attemptTimeoutMs),
      signal: options.signal
    }
  );

  if (!generation.ok) {
    throw new PolicyGenerationError(
      TRANSDUCER_FAILURE_CODES[generation.failure],
      generation.message,
      assessment,
      generation.cause
    );
  }

  const extraction = extractDocumentBody(generation.text);
  if (!extraction.ok) {
    throw new PolicyGenerationError(
      "TRANSDUCER_OUTPUT_UNUSABLE",
      `Generated output is unusable (${extraction.reason})`,
      assessment
    );
  }

  const parsed = parseTurtleDocument(extraction.body);
  if (!parsed.document) {
    throw new PolicyGenerationError(
      "DOCUMENT_PARSE_FAILED",
      `Generated document failed to parse: ${parsed.diagnostics.map(formatDiagnostic).join("; ")}`,
      assessment
    );
  }

  const orchestrator = createRepairOrchestrator(environment.engine, transducer, environment.config);
  const session = await orchestrator.run(
    { document: parsed.document, documentSource: extraction.body, policyText: input.policyText },
    options
  );

  return { status: "completed", assessment, generatedSource: extraction.body, session };
}
