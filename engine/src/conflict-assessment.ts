import type { ConflictSignal, ConflictTaxonomy, ConflictType, RemediationAction } from "./conflict-taxonomy.ts";

export type AssessmentDecision = "approve" | "reject" | "needs_input";
export type RiskLevel = "critical" | "high" | "medium" | "low";

export type ClassifiedSignal =
  | {
      classified: true;
      signal: ConflictSignal;
      conflictType: ConflictType;
      defaultAction: RemediationAction;
      principle: string;
    }
  | {
      classified: false;
      signal: ConflictSignal;
    };

export interface ConflictAssessment {
  decision: AssessmentDecision;
  riskLevel: RiskLevel;
  findings: ClassifiedSignal[];
}

const CRITICAL_TYPES: readonly ConflictType[] = ["unmeasurable_terms", "overly_broad", "temporal_impossible_sequence"];

function classifySignal(signal: ConflictSignal, taxonomy: ConflictTaxonomy): ClassifiedSignal {
  const conflictType = taxonomy.tryClassify(signal);
  if (conflictType === undefined) {
    return { classified: false, signal };
  }

  const explanation = taxonomy.explain(conflictType);
  return {
    classified: true,
    signal,
    conflictType,
    defaultAction: explanation.strategy.defaultAction,
    principle: explanation.principle
  };
}

/**
 * Folds classified signals into a single decision. Unclassified signals
 * are kept as findings and push the decision to needs_input.
 */
export function assessConflicts(signals: readonly ConflictSignal[], taxonomy: ConflictTaxonomy): ConflictAssessment {
  const findings = signals.map((signal) => classifySignal(signal, taxonomy));

  let rejects = 0;
  let clarifications = 0;
  let critical = false;

  for (const finding of findings) {
    if (!finding.classified) {
      clarifications += 1;
      continue;
    }
    if (CRITICAL_TYPES.includes(finding.conflictType)) {
      critical = true;
    }
    if (finding.defaultAction === "reject") {
      rejects += 1;
    } else if (finding.defaultAction === "clarify") {
      clarifications += 1;
    }
  }

  const decision: AssessmentDecision = rejects > 0 ? "reject" : clarifications > 0 ? "needs_input" : "approve";

  let riskLevel: RiskLevel = "low";
  if (critical) {
    riskLevel = "critical";
  } else if (rejects > 0) {
    riskLevel = "high";
  } else if (clarifications > 0) {
    riskLevel = "medium";
  }

  return { decision, riskLevel, findings };
}
