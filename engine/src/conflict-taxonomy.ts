import { ConfigurationError } from "./contracts.ts";

export const CONFLICT_FAMILIES = ["vagueness", "temporal", "spatial", "action", "dependency", "role"] as const;
export type ConflictFamily = (typeof CONFLICT_FAMILIES)[number];

export const CONFLICT_TYPES = [
  "unmeasurable_terms",
  "overly_broad",
  "temporal_expired",
  "temporal_overlap",
  "temporal_impossible_sequence",
  "spatial_hierarchy_violation",
  "spatial_overlap",
  "action_hierarchy_violation",
  "action_subsumption_conflict",
  "action_direct_conflict",
  "circular_approval",
  "workflow_cycle",
  "role_hierarchy_violation",
  "party_inconsistency"
] as const;
export type ConflictType = (typeof CONFLICT_TYPES)[number];

export const REMEDIATION_ACTIONS = ["reject", "clarify", "warn"] as const;
export type RemediationAction = (typeof REMEDIATION_ACTIONS)[number];

export type ResolutionPrinciple =
  | "reject_with_measurable_alternative"
  | "require_specification"
  | "flag_as_inactive"
  | "prohibit_on_ambiguity"
  | "require_consistent_sequence"
  | "specific_over_general"
  | "prohibit_on_conflict"
  | "apply_role_hierarchy"
  | "break_cycle_at_weakest_link";

export type FactValue = string | boolean;
export type StructuralPattern = Readonly<Record<string, FactValue>>;

export interface DetectionStrategy {
  readonly conflictType: ConflictType;
  readonly family: ConflictFamily;
  readonly priority: number;
  readonly requiresOntology: boolean;
  readonly requiresGraphAnalysis: boolean;
  readonly keywordPatterns: readonly string[];
  readonly structuralPatterns: readonly StructuralPattern[];
  readonly resolutionPrinciple: ResolutionPrinciple;
  readonly defaultAction: RemediationAction;
}

/** Externally supplied description of a suspected conflict. */
export interface ConflictSignal {
  keywords?: readonly string[];
  facts?: Readonly<Record<string, FactValue>>;
}

export type PriorityTier = "critical" | "high" | "standard";

export interface ConflictExplanation {
  conflictType: ConflictType;
  strategy: DetectionStrategy;
  rank: number;
  tier: PriorityTier;
  principle: string;
}

export class NoMatchingStrategyError extends Error {
  readonly code = "NO_MATCHING_STRATEGY";
  readonly signal: ConflictSignal;

  constructor(signal: ConflictSignal) {
    super("Conflict signal does not satisfy any detection strategy");
    this.name = "NoMatchingStrategyError";
    this.signal = signal;
  }
}

type StrategyDefinition = Omit<DetectionStrategy, "conflictType">;

const DEFAULT_STRATEGIES: Record<ConflictType, StrategyDefinition> = {
  unmeasurable_terms: {
    family: "vagueness",
    priority: 1,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [
      "urgent",
      "soon",
      "later",
      "promptly",
      "quickly",
      "responsibly",
      "appropriately",
      "properly",
      "when necessary",
      "if important",
      "as needed",
      "everyone",
      "anyone",
      "nobody"
    ],
    structuralPatterns: [],
    resolutionPrinciple: "reject_with_measurable_alternative",
    defaultAction: "reject"
  },
  overly_broad: {
    family: "vagueness",
    priority: 2,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: ["everything", "anything", "all data", "any purpose", "everyone can access everything"],
    structuralPatterns: [
      { actors: "universal_quantifier", assets: "universal_quantifier" },
      { actors: "unspecified", actions: "unspecified" }
    ],
    resolutionPrinciple: "require_specification",
    defaultAction: "reject"
  },
  temporal_expired: {
    family: "temporal",
    priority: 3,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ constraint_type: "temporal", end_date: "before_current_date" }],
    resolutionPrinciple: "flag_as_inactive",
    defaultAction: "reject"
  },
  temporal_overlap: {
    family: "temporal",
    priority: 4,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ overlapping_intervals: true, contradictory_actions: true }],
    resolutionPrinciple: "prohibit_on_ambiguity",
    defaultAction: "reject"
  },
  temporal_impossible_sequence: {
    family: "temporal",
    priority: 5,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ constraint_type: "temporal", sequence: "end_before_start" }],
    resolutionPrinciple: "require_consistent_sequence",
    defaultAction: "reject"
  },
  spatial_hierarchy_violation: {
    family: "spatial",
    priority: 6,
    requiresOntology: true,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ narrow_scope: "permitted", broad_scope: "prohibited", containment: true }],
    resolutionPrinciple: "specific_over_general",
    defaultAction: "reject"
  },
  spatial_overlap: {
    family: "spatial",
    priority: 7,
    requiresOntology: true,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ overlapping_regions: true, contradictory_actions: true }],
    resolutionPrinciple: "prohibit_on_ambiguity",
    defaultAction: "clarify"
  },
  action_hierarchy_violation: {
    family: "action",
    priority: 8,
    requiresOntology: true,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ parent_action: "permitted", child_action: "prohibited" }],
    resolutionPrinciple: "prohibit_on_conflict",
    defaultAction: "reject"
  },
  action_subsumption_conflict: {
    family: "action",
    priority: 9,
    requiresOntology: true,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ action_subsumption: true }],
    resolutionPrinciple: "prohibit_on_conflict",
    defaultAction: "clarify"
  },
  action_direct_conflict: {
    family: "action",
    priority: 10,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ same_action: true, permitted: true, prohibited: true }],
    resolutionPrinciple: "prohibit_on_conflict",
    defaultAction: "reject"
  },
  role_hierarchy_violation: {
    family: "role",
    priority: 11,
    requiresOntology: true,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ broader_role: "required", narrower_role: "prohibited", role_containment: true }],
    resolutionPrinciple: "apply_role_hierarchy",
    defaultAction: "reject"
  },
  party_inconsistency: {
    family: "role",
    priority: 12,
    requiresOntology: false,
    requiresGraphAnalysis: false,
    keywordPatterns: [],
    structuralPatterns: [{ party_specification: "inconsistent" }],
    resolutionPrinciple: "apply_role_hierarchy",
    defaultAction: "warn"
  },
  circular_approval: {
    family: "dependency",
    priority: 13,
    requiresOntology: false,
    requiresGraphAnalysis: true,
    keywordPatterns: [],
    structuralPatterns: [{ dependency_chain: "contains_cycle", dependency_kind: "approval" }],
    resolutionPrinciple: "break_cycle_at_weakest_link",
    defaultAction: "reject"
  },
  workflow_cycle: {
    family: "dependency",
    priority: 14,
    requiresOntology: false,
    requiresGraphAnalysis: true,
    keywordPatterns: [],
    structuralPatterns: [{ dependency_chain: "contains_cycle" }],
    resolutionPrinciple: "break_cycle_at_weakest_link",
    defaultAction: "reject"
  }
};

export const RESOLUTION_PRINCIPLES: Readonly<Record<ResolutionPrinciple, string>> = {
  reject_with_measurable_alternative:
    "Subjective terms cannot be enforced. Replace them with objective criteria such as a deadline in hours or a named purpose.",
  require_specification:
    "Universal actors, assets or actions must be narrowed to named parties, identified datasets and an enumerated action list.",
  flag_as_inactive: "A policy whose validity window has already closed is inactive and must not be enforced.",
  prohibit_on_ambiguity:
    "Where time windows or regions overlap with contradictory rules, the overlap is prohibited until the intent is clarified.",
  require_consistent_sequence: "A validity window whose end precedes its start can never hold and must be restated.",
  specific_over_general: "The narrower scope takes precedence over the broader one when the two contradict.",
  prohibit_on_conflict:
    "When a permitted action subsumes or equals a prohibited one, the prohibition applies to the contested action.",
  apply_role_hierarchy:
    "Constraints on a role apply to every role it contains; inconsistent party specifications are flagged for review.",
  break_cycle_at_weakest_link:
    "A dependency cycle can never start. Remove or delegate the least critical dependency to open the chain."
};

const CONFLICT_EXAMPLES: Partial<Record<ConflictType, { input: string; explanation: string }>> = {
  unmeasurable_terms: {
    input: "Data must be used responsibly for urgent requests",
    explanation: "'responsibly' and 'urgent' have no measurable criterion"
  },
  overly_broad: {
    input: "Everyone can access everything for any purpose",
    explanation: "universal actors and assets leave nothing to enforce"
  },
  temporal_expired: {
    input: "Access is permitted until 1 January 2020",
    explanation: "the validity window closed before the current date"
  },
  spatial_hierarchy_violation: {
    input: "Access is permitted in Germany but prohibited in the EU",
    explanation: "Germany is contained in the EU, so the permission and prohibition contradict"
  },
  action_hierarchy_violation: {
    input: "Users may distribute the dataset but may not share it",
    explanation: "share is a narrower form of distribute"
  },
  circular_approval: {
    input: "Access needs committee approval, the committee needs a rights check, the rights check needs access",
    explanation: "the approval chain returns to its starting point"
  },
  role_hierarchy_violation: {
    input: "Managers must review data weekly; administrators may not access data; managers are administrators",
    explanation: "the required role is contained in the prohibited one"
  }
};

function normalizeKeyword(value: string): string {
  return value.trim().toLowerCase();
}

function patternMatches(pattern: StructuralPattern, facts: Readonly<Record<string, FactValue>>): boolean {
  const entries = Object.entries(pattern);
  return entries.length > 0 && entries.every(([fact, expected]) => facts[fact] === expected);
}

function strategyMatches(strategy: DetectionStrategy, keywords: ReadonlySet<string>, signal: ConflictSignal): boolean {
  if (strategy.keywordPatterns.some((pattern) => keywords.has(normalizeKeyword(pattern)))) {
    return true;
  }

  const facts = signal.facts;
  return facts !== undefined && strategy.structuralPatterns.some((pattern) => patternMatches(pattern, facts));
}

function tierForRank(rank: number): PriorityTier {
  if (rank <= 2) {
    return "critical";
  }
  return rank <= 5 ? "high" : "standard";
}

function formatConflictTitle(conflictType: ConflictType): string {
  return conflictType
    .split("_")
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
    .join(" ");
}

export class ConflictTaxonomy {
  /** Strategies in ascending priority. */
  readonly strategies: readonly DetectionStrategy[];

  constructor(strategies: readonly DetectionStrategy[]) {
    const byType = new Map<ConflictType, DetectionStrategy>();
    const byPriority = new Map<number, ConflictType>();

    for (const strategy of strategies) {
      if (byType.has(strategy.conflictType)) {
        throw new ConfigurationError({
          contract: "ConflictTaxonomy",
          code: "DUPLICATE_STRATEGY",
          message: `Conflict type "${strategy.conflictType}" has more than one detection strategy`
        });
      }
      if (!Number.isInteger(strategy.priority) || strategy.priority < 1) {
        throw new ConfigurationError({
          contract: "ConflictTaxonomy",
          code: "INVALID_PRIORITY",
          message: `Priority for "${strategy.conflictType}" must be a positive integer`
        });
      }
      const holder = byPriority.get(strategy.priority);
      if (holder !== undefined) {
        throw new ConfigurationError({
          contract: "ConflictTaxonomy",
          code: "DUPLICATE_PRIORITY",
          message: `Priority ${strategy.priority} is shared by "${holder}" and "${strategy.conflictType}"`
        });
      }
      byType.set(strategy.conflictType, strategy);
      byPriority.set(strategy.priority, strategy.conflictType);
    }

    const missing = CONFLICT_TYPES.filter((conflictType) => !byType.has(conflictType));
    if (missing.length > 0) {
      throw new ConfigurationError({
        contract: "ConflictTaxonomy",
        code: "MISSING_STRATEGY",
        message: `No detection strategy for: ${missing.join(", ")}`
      });
    }

    this.strategies = Object.freeze(
      [...strategies]
        .sort((left, right) => left.priority - right.priority)
        .map((strategy) => Object.freeze({ ...strategy }))
    );
    Object.freeze(this);
  }

  getStrategy(conflictType: ConflictType): DetectionStrategy {
    const strategy = this.strategies.find((candidate) => candidate.conflictType === conflictType);
    if (!strategy) {
      throw new ConfigurationError({
        contract: "ConflictTaxonomy",
        code: "MISSING_STRATEGY",
        message: `No detection strategy for: ${conflictType}`
      });
    }
    return strategy;
  }

  /** First strategy, in ascending priority, whose triggers the signal satisfies. */
  classify(signal: ConflictSignal): ConflictType {
    const keywords = new Set((signal.keywords ?? []).map(normalizeKeyword));
    const match = this.strategies.find((strategy) => strategyMatches(strategy, keywords, signal));
    if (!match) {
      throw new NoMatchingStrategyError(signal);
    }
    return match.conflictType;
  }

  tryClassify(signal: ConflictSignal): ConflictType | undefined {
    const keywords = new Set((signal.keywords ?? []).map(normalizeKeyword));
    return this.strategies.find((strategy) => strategyMatches(strategy, keywords, signal))?.conflictType;
  }

  explain(conflictType: ConflictType): ConflictExplanation {
    const strategy = this.getStrategy(conflictType);
    const rank = this.strategies.indexOf(strategy) + 1;
    return {
      conflictType,
      strategy,
      rank,
      tier: tierForRank(rank),
      principle: RESOLUTION_PRINCIPLES[strategy.resolutionPrinciple]
    };
  }

  describeConflictType(conflictType: ConflictType): string {
    const { strategy, rank, tier, principle } = this.explain(conflictType);
    const example = CONFLICT_EXAMPLES[conflictType];
    const keywords =
      strategy.keywordPatterns.length > 0 ? strategy.keywordPatterns.join(", ") : "none (structural patterns only)";

    const lines = [
      `## ${formatConflictTitle(conflictType)}`,
      "",
      `**Detection Order:** ${rank} (${tier})`,
      `**Family:** ${strategy.family}`,
      `**Keywords:** ${keywords}`,
      `**Default Action:** ${strategy.defaultAction}`,
      `**Resolution Principle:** ${strategy.resolutionPrinciple}`,
      principle
    ];
    if (example) {
      lines.push("", `**Example:** "${example.input}"`, `**Why:** ${example.explanation}`);
    }
    return lines.join("\n");
  }
}

export function listDefaultStrategies(): DetectionStrategy[] {
  return CONFLICT_TYPES.map((conflictType) => ({ conflictType, ...DEFAULT_STRATEGIES[conflictType] }));
}

export function createConflictTaxonomy(
  priorityOverrides: Partial<Record<ConflictType, number>> = {}
): ConflictTaxonomy {
  for (const key of Object.keys(priorityOverrides)) {
    if (!CONFLICT_TYPES.some((conflictType) => conflictType === key)) {
      throw new ConfigurationError({
        contract: "ConflictTaxonomy",
        code: "INVALID_INPUT",
        message: `Priority override names unknown conflict type "${key}"`
      });
    }
  }

  return new ConflictTaxonomy(
    listDefaultStrategies().map((strategy) => ({
      ...strategy,
      priority: priorityOverrides[strategy.conflictType] ?? strategy.priority
    }))
  );
}

export function familyOf(conflictType: ConflictType): ConflictFamily {
  return DEFAULT_STRATEGIES[conflictType].family;
}
