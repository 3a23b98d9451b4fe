import { randomUUID } from "node:crypto";

import {
  cloneDocument,
  extractDocumentBody,
  formatDiagnostic,
  parseTurtleDocument,
  type Diagnostic,
  type PolicyDocument
} from "../../document/src/index.ts";

import type { ConformanceEngine } from "./conformance.ts";
import {
  ConfigurationError,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  MAX_ATTEMPT_TIMEOUT_MS
} from "./contracts.ts";
import {
  SESSION_LEDGER_SCHEMA_VERSION,
  recordSession,
  type LedgerEmission,
  type SessionLedgerEntry
} from "./session-ledger.ts";
import { callTransducer, type TextTransducer, type TransducerCallFailure } from "./transducer.ts";
import type { Violation } from "./violation.ts";
import { ViolationReport } from "./violation-report.ts";

export const REPAIR_STATES = ["validating", "awaiting_regeneration", "conformant", "exhausted_budget"] as const;
export type RepairState = (typeof REPAIR_STATES)[number];
export type TerminalRepairState = Extract<RepairState, "conformant" | "exhausted_budget">;

export const ABSOLUTE_MAX_ATTEMPTS = 10;

export type RepairSessionErrorCode =
  | "TRANSDUCER_FAILED"
  | "TRANSDUCER_TIMEOUT"
  | "TRANSDUCER_OUTPUT_UNUSABLE"
  | "DOCUMENT_PARSE_FAILED"
  | "SESSION_CANCELLED";

export interface ConformanceAttempt {
  readonly attempt: number;
  readonly candidate: PolicyDocument;
  readonly documentSource: string;
  readonly report: ViolationReport;
  readonly terminal: boolean;
}

export interface StateTransition {
  readonly attempt: number;
  readonly from: RepairState;
  readonly to: RepairState;
  readonly reason: string;
}

export interface RepairSessionInput {
  document: PolicyDocument;
  documentSource: string;
  policyText?: string;
}

export interface RepairSessionOptions {
  maxAttempts?: number;
  attemptTimeoutMs?: number;
  signal?: AbortSignal;
  sessionLedgerPath?: string;
  sessionReportPath?: string;
  sessionId?: string;
  now?: () => Date;
  sessionIdFactory?: () => string;
}

export interface RepairSessionResult {
  sessionId: string;
  success: boolean;
  finalState: TerminalRepairState;
  finalDocument: PolicyDocument;
  finalDocumentSource: string;
  finalReport: ViolationReport;
  attemptsUsed: number;
  maxAttempts: number;
  transducerCalls: number;
  attempts: readonly ConformanceAttempt[];
  transitions: readonly StateTransition[];
  unresolvedViolations?: readonly Violation[];
  ledger: LedgerEmission;
}

export class RepairSessionError extends Error {
  readonly code: RepairSessionErrorCode;
  readonly sessionId: string;
  readonly attempt: number;
  readonly finalState: "exhausted_budget" = "exhausted_budget";
  readonly attempts: readonly ConformanceAttempt[];
  readonly transitions: readonly StateTransition[];
  readonly lastReport: ViolationReport | undefined;
  readonly diagnostics: readonly Diagnostic[];
  ledger: LedgerEmission = { configured: false };

  constructor(params: {
    code: RepairSessionErrorCode;
    message: string;
    sessionId: string;
    attempt: number;
    attempts: readonly ConformanceAttempt[];
    transitions: readonly StateTransition[];
    lastReport?: ViolationReport;
    diagnostics?: readonly Diagnostic[];
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "RepairSessionError";
    this.code = params.code;
    this.sessionId = params.sessionId;
    this.attempt = params.attempt;
    this.attempts = params.attempts;
    this.transitions = params.transitions;
    this.lastReport = params.lastReport;
    this.diagnostics = params.diagnostics ?? [];
  }
}

export interface RepairOrchestratorConfig {
  maxAttempts?: number;
  attemptTimeoutMs?: number;
}

function normalizeMaxAttempts(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_MAX_ATTEMPTS;
  }

  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError({
      contract: "EngineConfig",
      code: "INVALID_INPUT",
      message: "maxAttempts must be an integer greater than or equal to 1"
    });
  }

  if (value > ABSOLUTE_MAX_ATTEMPTS) {
    throw new ConfigurationError({
      contract: "EngineConfig",
      code: "INVALID_INPUT",
      message: `maxAttempts must be less than or equal to ${ABSOLUTE_MAX_ATTEMPTS}`
    });
  }

  return value;
}

export function normalizeAttemptTimeout(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_ATTEMPT_TIMEOUT_MS;
  }

  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError({
      contract: "EngineConfig",
      code: "INVALID_INPUT",
      message: "attemptTimeoutMs must be a positive integer"
    });
  }

  if (value > MAX_ATTEMPT_TIMEOUT_MS) {
    throw new ConfigurationError({
      contract: "EngineConfig",
      code: "INVALID_INPUT",
      message: `attemptTimeoutMs must be less than or equal to ${MAX_ATTEMPT_TIMEOUT_MS}`
    });
  }

  return value;
}

function normalizeOptionalNonEmptyString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed !== undefined && trimmed.length > 0 ? trimmed : undefined;
}

function resolveSessionId(options: RepairSessionOptions): string {
  return (
    normalizeOptionalNonEmptyString(options.sessionId) ??
    normalizeOptionalNonEmptyString(options.sessionIdFactory?.()) ??
    randomUUID()
  );
}

export const TRANSDUCER_FAILURE_CODES: Record<TransducerCallFailure, RepairSessionErrorCode> = {
  timeout: "TRANSDUCER_TIMEOUT",
  cancelled: "SESSION_CANCELLED",
  failed: "TRANSDUCER_FAILED"
};

function toCurrentDate(now: () => Date): string {
  return now().toISOString().slice(0, 10);
}

function buildLedgerEntry(params: {
  sessionId: string;
  startedAt: string;
  completedAt: string;
  maxAttempts: number;
  transducerCalls: number;
  attempts: readonly ConformanceAttempt[];
  transitions: readonly StateTransition[];
  outcome: { status: TerminalRepairState; unresolved: number } | { status: "failed"; error: RepairSessionError };
}): SessionLedgerEntry {
  const base = {
    attempts_used: params.attempts.length,
    max_attempts: params.maxAttempts,
    transducer_calls: params.transducerCalls
  };

  return {
    schema_version: SESSION_LEDGER_SCHEMA_VERSION,
    session_id: params.sessionId,
    started_at: params.startedAt,
    completed_at: params.completedAt,
    outcome:
      params.outcome.status === "failed"
        ? {
            status: "failed",
            ...base,
            error: {
              name: params.outcome.error.name,
              code: params.outcome.error.code,
              message: params.outcome.error.message
            }
          }
        : { status: params.outcome.status, ...base, unresolved_violation_count: params.outcome.unresolved },
    attempts: params.attempts.map((attempt) => ({
      attempt: attempt.attempt,
      terminal: attempt.terminal,
      is_valid: attempt.report.isValid,
      violation_count: attempt.report.violations.length,
      counts_by_issue: attempt.report.countsByIssue(),
      violations: attempt.report.violations.map((violation) => ({
        issue: violation.issue,
        rule_id: violation.ruleId,
        focus_node: violation.focusNode,
        property_path: violation.propertyPath,
        severity: violation.severity
      }))
    })),
    transitions: params.transitions.map((transition) => ({ ...transition }))
  };
}

/**
 * Bounded validate/regenerate loop. Each validation pass appends one
 * attempt record; the transducer is never called after the final pass.
 */
export class RepairOrchestrator {
  private readonly engine: ConformanceEngine;
  private readonly transducer: TextTransducer;
  private readonly maxAttempts: number;
  private readonly attemptTimeoutMs: number;

  constructor(engine: ConformanceEngine, transducer: TextTransducer, config: RepairOrchestratorConfig = {}) {
    this.engine = engine;
    this.transducer = transducer;
    this.maxAttempts = normalizeMaxAttempts(config.maxAttempts);
    this.attemptTimeoutMs = normalizeAttemptTimeout(config.attemptTimeoutMs);
  }

  async run(input: RepairSessionInput, options: RepairSessionOptions = {}): Promise<RepairSessionResult> {
    const maxAttempts = normalizeMaxAttempts(options.maxAttempts ?? this.maxAttempts);
    const attemptTimeoutMs = normalizeAttemptTimeout(options.attemptTimeoutMs ?? this.attemptTimeoutMs);
    const now = options.now ?? (() => new Date());
    const sessionId = resolveSessionId(options);
    const startedAt = now().toISOString();
    const ledgerPaths = {
      sessionLedgerPath: normalizeOptionalNonEmptyString(options.sessionLedgerPath),
      sessionReportPath: normalizeOptionalNonEmptyString(options.sessionReportPath)
    };

    const attempts: ConformanceAttempt[] = [];
    const transitions: StateTransition[] = [];
    let transducerCalls = 0;
    let state: RepairState = "validating";
    let document = input.document;
    let documentSource = input.documentSource;

    const transition = (attempt: number, to: RepairState, reason: string): void => {
      transitions.push(Object.freeze({ attempt, from: state, to, reason }));
      state = to;
    };

    const fail = (params: {
      code: RepairSessionErrorCode;
      message: string;
      attempt: number;
      diagnostics?: readonly Diagnostic[];
      cause?: unknown;
    }): RepairSessionError => {
      transition(params.attempt, "exhausted_budget", params.code);
      const error = new RepairSessionError({
        ...params,
        sessionId,
        attempts: Object.freeze([...attempts]),
        transitions: Object.freeze([...transitions]),
        lastReport: attempts.at(-1)?.report
      });
      error.ledger = recordSession(
        buildLedgerEntry({
          sessionId,
          startedAt,
          completedAt: now().toISOString(),
          maxAttempts,
          transducerCalls,
          attempts,
          transitions,
          outcome: { status: "failed", error }
        }),
        ledgerPaths
      );
      return error;
    };

    const finish = (finalState: TerminalRepairState, report: ViolationReport): RepairSessionResult => {
      const ledger = recordSession(
        buildLedgerEntry({
          sessionId,
          startedAt,
          completedAt: now().toISOString(),
          maxAttempts,
          transducerCalls,
          attempts,
          transitions,
          outcome: { status: finalState, unresolved: report.violations.length }
        }),
        ledgerPaths
      );

      return {
        sessionId,
        success: finalState === "conformant",
        finalState,
        finalDocument: document,
        finalDocumentSource: documentSource,
        finalReport: report,
        attemptsUsed: attempts.length,
        maxAttempts,
        transducerCalls,
        attempts: Object.freeze([...attempts]),
        transitions: Object.freeze([...transitions]),
        ...(finalState === "exhausted_budget" ? { unresolvedViolations: report.violations } : {}),
        ledger
      };
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        throw fail({ code: "SESSION_CANCELLED", message: "Repair session was cancelled", attempt });
      }

      const report = ViolationReport.from(
        { policyText: input.policyText, documentSource },
        this.engine.evaluate(document)
      );
      const record = (terminal: boolean): void => {
        attempts.push(
          Object.freeze({ attempt, candidate: cloneDocument(document), documentSource, report, terminal })
        );
      };

      if (report.isValid) {
        record(true);
        transition(attempt, "conformant", "no violations");
        return finish("conformant", report);
      }

      if (attempt === maxAttempts) {
        record(true);
        transition(attempt, "exhausted_budget", `${report.violations.length} violation(s) after final attempt`);
        return finish("exhausted_budget", report);
      }

      transition(attempt, "awaiting_regeneration", `${report.violations.length} violation(s)`);
      transducerCalls += 1;
      const outcome = await callTransducer(
        this.transducer,
        {
          kind: "regenerate",
          attempt,
          currentDate: toCurrentDate(now),
          feedback: report.renderFeedback(),
          previousDocument: documentSource
        },
        { timeoutMs: attemptTimeoutMs, signal: options.signal }
      );

      if (!outcome.ok) {
        record(true);
        throw fail({
          code: TRANSDUCER_FAILURE_CODES[outcome.failure],
          message: outcome.message,
          attempt,
          cause: outcome.cause
        });
      }

      if (options.signal?.aborted) {
        record(true);
        throw fail({ code: "SESSION_CANCELLED", message: "Repair session was cancelled", attempt });
      }

      const extraction = extractDocumentBody(outcome.text);
      if (!extraction.ok) {
        record(true);
        throw fail({
          code: "TRANSDUCER_OUTPUT_UNUSABLE",
          message: `Transducer output is unusable (${extraction.reason})`,
          attempt
        });
      }

      const parsed = parseTurtleDocument(extraction.body);
      if (!parsed.document) {
        record(true);
        throw fail({
          code: "DOCUMENT_PARSE_FAILED",
          message: `Regenerated document failed to parse: ${parsed.diagnostics.map(formatDiagnostic).join("; ")}`,
          attempt,
          diagnostics: parsed.diagnostics
        });
      }

      record(false);
      document = parsed.document;
      documentSource = extraction.body;
      transition(attempt, "validating", "regenerated candidate received");
    }

    // maxAttempts >= 1, so the loop has already returned or thrown.
    throw fail({
      code: "SESSION_CANCELLED",
      message: "Repair session ended without a terminal state",
      attempt: maxAttempts
    });
  }
}

export function createRepairOrchestrator(
  engine: ConformanceEngine,
  transducer: TextTransducer,
  config: RepairOrchestratorConfig = {}
): RepairOrchestrator {
  return new RepairOrchestrator(engine, transducer, config);
}
