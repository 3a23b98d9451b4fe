import { formatIssueCategory, type IssueCategory, type Violation } from "./violation.ts";

export interface ReportContext {
  policyText?: string;
  documentSource: string;
}

export interface ViolationReportJson {
  policy_text: string | null;
  document_source: string;
  is_valid: boolean;
  violation_count: number;
  counts_by_issue: Record<IssueCategory, number>;
  violations: Array<{
    issue: IssueCategory;
    rule_id: string;
    focus_node: string;
    property_path: string;
    observed_value: string;
    constraint: string;
    severity: Violation["severity"];
  }>;
}

/**
 * Immutable record of one conformance pass. Validity is derived from the
 * violation list and is never stored separately.
 */
export class ViolationReport {
  readonly policyText: string | undefined;
  readonly documentSource: string;
  readonly violations: readonly Violation[];

  private constructor(context: ReportContext, violations: readonly Violation[]) {
    this.policyText = context.policyText;
    this.documentSource = context.documentSource;
    this.violations = Object.freeze([...violations]);
    Object.freeze(this);
  }

  static from(context: ReportContext, violations: readonly Violation[]): ViolationReport {
    return new ViolationReport(context, violations);
  }

  get isValid(): boolean {
    return this.violations.length === 0;
  }

  countsByIssue(): Record<IssueCategory, number> {
    const counts: Record<IssueCategory, number> = {
      missing_required_field: 0,
      invalid_enumerated_value: 0,
      cardinality_violation: 0,
      incompatible_operand_operator: 0,
      structural_error: 0
    };
    for (const violation of this.violations) {
      counts[violation.issue] += 1;
    }
    return counts;
  }

  /** Violations grouped by issue category, groups in order of first appearance. */
  groupByIssue(): Map<IssueCategory, Violation[]> {
    const groups = new Map<IssueCategory, Violation[]>();
    for (const violation of this.violations) {
      const group = groups.get(violation.issue);
      if (group) {
        group.push(violation);
      } else {
        groups.set(violation.issue, [violation]);
      }
    }
    return groups;
  }

  renderFeedback(): string {
    const lines: string[] = ["# Conformance Report", ""];

    if (this.policyText !== undefined && this.policyText.trim().length > 0) {
      lines.push("## Policy Request", `"${this.policyText.trim()}"`, "");
    }

    lines.push("## Candidate Document", "```turtle", this.documentSource.trim(), "```", "");
    lines.push("## Findings");

    if (this.isValid) {
      lines.push("**Status**: CONFORMANT", "", "The candidate document satisfies every shape rule.");
      return lines.join("\n");
    }

    lines.push(`**Status**: NON-CONFORMANT (${this.violations.length} issue(s))`, "");

    for (const [issue, group] of this.groupByIssue()) {
      lines.push(`### ${formatIssueCategory(issue)}`);
      group.forEach((violation, index) => {
        lines.push(`${index + 1}. **Node**: \`${violation.focusNode}\``);
        lines.push(`   **Property**: \`${violation.propertyPath}\``);
        lines.push(`   **Observed**: \`${violation.observedValue}\``);
        lines.push(`   **Constraint**: ${violation.constraint}`);
        if (violation.severity !== "Violation") {
          lines.push(`   **Severity**: ${violation.severity}`);
        }
        lines.push("");
      });
    }

    lines.push("Correct each finding above and return the complete document.");
    return lines.join("\n");
  }

  toJSON(): ViolationReportJson {
    return {
      policy_text: this.policyText ?? null,
      document_source: this.documentSource,
      is_valid: this.isValid,
      violation_count: this.violations.length,
      counts_by_issue: this.countsByIssue(),
      violations: this.violations.map((violation) => ({
        issue: violation.issue,
        rule_id: violation.ruleId,
        focus_node: violation.focusNode,
        property_path: violation.propertyPath,
        observed_value: violation.observedValue,
        constraint: violation.constraint,
        severity: violation.severity
      }))
    };
  }
}
