import { appendFileSync } from "node:fs";

import type { IssueCategory, Severity } from "./violation.ts";

export const SESSION_LEDGER_SCHEMA_VERSION = "1.0.0";

export interface SessionLedgerEntry {
  schema_version: string;
  session_id: string;
  started_at: string;
  completed_at: string;
  outcome:
    | {
        status: "conformant" | "exhausted_budget";
        attempts_used: number;
        max_attempts: number;
        transducer_calls: number;
        unresolved_violation_count: number;
      }
    | {
        status: "failed";
        attempts_used: number;
        max_attempts: number;
        transducer_calls: number;
        error: {
          name: string;
          code: string;
          message: string;
        };
      };
  attempts: Array<{
    attempt: number;
    terminal: boolean;
    is_valid: boolean;
    violation_count: number;
    counts_by_issue: Record<IssueCategory, number>;
    violations: Array<{
      issue: IssueCategory;
      rule_id: string;
      focus_node: string;
      property_path: string;
      severity: Severity;
    }>;
  }>;
  transitions: Array<{
    attempt: number;
    from: string;
    to: string;
    reason: string;
  }>;
}

export interface EmitSessionLedgerOptions {
  outputPath?: string;
}

export type LedgerEmission =
  | {
      configured: false;
    }
  | {
      configured: true;
      emitted: true;
    }
  | {
      configured: true;
      emitted: false;
      error: string;
    };

function formatOutcome(entry: SessionLedgerEntry): string[] {
  const { outcome } = entry;
  const lines = [
    `Attempts: ${outcome.attempts_used}/${outcome.max_attempts}`,
    `Transducer Calls: ${outcome.transducer_calls}`
  ];

  if (outcome.status === "failed") {
    lines.unshift("Outcome: failed");
    lines.push(`Failure Code: ${outcome.error.code}`);
    lines.push(`Failure Error: ${outcome.error.name}: ${outcome.error.message}`);
  } else {
    lines.unshift(`Outcome: ${outcome.status}`);
    lines.push(`Unresolved Violations: ${outcome.unresolved_violation_count}`);
  }

  return lines;
}

export function formatSessionReport(entry: SessionLedgerEntry): string {
  const lines: string[] = [
    "[Repair Session]",
    `Session ID: ${entry.session_id}`,
    `Started At: ${entry.started_at}`,
    `Completed At: ${entry.completed_at}`,
    ...formatOutcome(entry)
  ];

  if (entry.attempts.length === 0) {
    lines.push("Validation Passes: none");
  } else {
    lines.push("Validation Passes:");
    for (const attempt of entry.attempts) {
      const status = attempt.is_valid ? "conformant" : `${attempt.violation_count} violation(s)`;
      lines.push(`- #${attempt.attempt} ${status}${attempt.terminal ? " (terminal)" : ""}`);
      for (const violation of attempt.violations) {
        lines.push(
          `  ${violation.issue} ${violation.focus_node} ${violation.property_path} [${violation.rule_id}, ${violation.severity}]`
        );
      }
    }
  }

  if (entry.transitions.length === 0) {
    lines.push("Transitions: none");
  } else {
    lines.push("Transitions:");
    for (const transition of entry.transitions) {
      lines.push(`- #${transition.attempt} ${transition.from} -> ${transition.to}: ${transition.reason}`);
    }
  }

  return lines.join("\n");
}

export function emitSessionLedgerEntry(entry: SessionLedgerEntry, options: EmitSessionLedgerOptions = {}): void {
  if (!options.outputPath) {
    return;
  }

  appendFileSync(options.outputPath, `${JSON.stringify(entry)}\n`, "utf8");
}

export function emitSessionReport(entry: SessionLedgerEntry, options: EmitSessionLedgerOptions = {}): void {
  if (!options.outputPath) {
    return;
  }

  appendFileSync(options.outputPath, `${formatSessionReport(entry)}\n`, "utf8");
}

/**
 * Writes the ledger entry and report where paths are configured. A write
 * failure is returned as data so it never replaces the session outcome.
 */
export function recordSession(
  entry: SessionLedgerEntry,
  paths: { sessionLedgerPath?: string; sessionReportPath?: string }
): LedgerEmission {
  if (!paths.sessionLedgerPath && !paths.sessionReportPath) {
    return { configured: false };
  }

  try {
    emitSessionLedgerEntry(entry, { outputPath: paths.sessionLedgerPath });
    emitSessionReport(entry, { outputPath: paths.sessionReportPath });
  } catch (error) {
    return {
      configured: true,
      emitted: false,
      error: error instanceof Error ? error.message : String(error)
    };
  }

  return { configured: true, emitted: true };
}
