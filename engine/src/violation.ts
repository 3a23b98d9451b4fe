export const ISSUE_CATEGORIES = [
  "missing_required_field",
  "invalid_enumerated_value",
  "cardinality_violation",
  "incompatible_operand_operator",
  "structural_error"
] as const;

export const SEVERITIES = ["Violation", "Warning"] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];
export type Severity = (typeof SEVERITIES)[number];

export const NOT_SPECIFIED = "not specified";

export interface Violation {
  readonly issue: IssueCategory;
  readonly ruleId: string;
  readonly focusNode: string;
  readonly propertyPath: string;
  readonly observedValue: string;
  readonly constraint: string;
  readonly severity: Severity;
}

export function createViolation(params: {
  issue: IssueCategory;
  ruleId: string;
  focusNode: string;
  propertyPath: string;
  observedValue?: string;
  constraint: string;
  severity?: Severity;
}): Violation {
  const observedValue = params.observedValue?.trim();

  return Object.freeze({
    issue: params.issue,
    ruleId: params.ruleId,
    focusNode: params.focusNode,
    propertyPath: params.propertyPath,
    observedValue: observedValue === undefined || observedValue.length === 0 ? NOT_SPECIFIED : observedValue,
    constraint: params.constraint,
    severity: params.severity ?? "Violation"
  });
}

export function formatIssueCategory(issue: IssueCategory): string {
  return issue
    .split("_")
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
    .join(" ");
}
