import assert from "node:assert/strict";
import test from "node:test";

import {
  CONFLICT_TYPES,
  ConfigurationError,
  ConflictTaxonomy,
  NoMatchingStrategyError,
  RESOLUTION_PRINCIPLES,
  createConflictTaxonomy,
  familyOf,
  listDefaultStrategies
} from "../src/index.ts";

function expectTaxonomyError(build: () => unknown, code: string, message: string): void {
  assert.throws(build, (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.equal(error.contract, "ConflictTaxonomy");
    assert.equal(error.code, code);
    assert.equal(error.message, message);
    return true;
  });
}

test("default strategies cover every conflict type with unique ascending priorities", () => {
  const taxonomy = createConflictTaxonomy();

  assert.deepEqual(
    taxonomy.strategies.map((strategy) => strategy.conflictType),
    [...CONFLICT_TYPES]
  );
  assert.deepEqual(
    taxonomy.strategies.map((strategy) => strategy.priority),
    [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14]
  );
  assert.equal(Object.isFrozen(taxonomy.strategies), true);
  assert.equal(Object.isFrozen(taxonomy.strategies[0]), true);
});

test("classify prefers the highest priority strategy a signal satisfies", () => {
  const taxonomy = createConflictTaxonomy();

  assert.equal(
    taxonomy.classify({ keywords: ["urgent"], facts: { dependency_chain: "contains_cycle" } }),
    "unmeasurable_terms"
  );
  assert.equal(
    taxonomy.classify({ facts: { dependency_chain: "contains_cycle", dependency_kind: "approval" } }),
    "circular_approval"
  );
  assert.equal(taxonomy.classify({ facts: { dependency_chain: "contains_cycle" } }), "workflow_cycle");
});

test("classify matches keywords as whole phrases regardless of case and padding", () => {
  const taxonomy = createConflictTaxonomy();

  assert.equal(taxonomy.classify({ keywords: ["  URGENT "] }), "unmeasurable_terms");
  assert.equal(taxonomy.classify({ keywords: ["When Necessary"] }), "unmeasurable_terms");
  assert.equal(taxonomy.classify({ keywords: ["all data"] }), "overly_broad");
  assert.equal(taxonomy.tryClassify({ keywords: ["urgently"] }), undefined);
});

test("structural patterns require every listed fact", () => {
  const taxonomy = createConflictTaxonomy();

  assert.equal(taxonomy.classify({ facts: { actors: "unspecified", actions: "unspecified" } }), "overly_broad");
  assert.equal(taxonomy.tryClassify({ facts: { actors: "unspecified" } }), undefined);
  assert.equal(
    taxonomy.classify({ facts: { constraint_type: "temporal", sequence: "end_before_start" } }),
    "temporal_impossible_sequence"
  );
  assert.equal(taxonomy.tryClassify({ facts: {} }), undefined);
});

test("classify throws when no strategy matches", () => {
  const taxonomy = createConflictTaxonomy();
  const signal = { keywords: ["clearly defined"] };

  assert.throws(
    () => taxonomy.classify(signal),
    (error: unknown) => {
      assert.ok(error instanceof NoMatchingStrategyError);
      assert.equal(error.code, "NO_MATCHING_STRATEGY");
      assert.equal(error.signal, signal);
      return true;
    }
  );
});

test("priority overrides change the detection order", () => {
  const taxonomy = createConflictTaxonomy({ circular_approval: 14, workflow_cycle: 13 });

  assert.equal(
    taxonomy.classify({ facts: { dependency_chain: "contains_cycle", dependency_kind: "approval" } }),
    "workflow_cycle"
  );
  assert.equal(taxonomy.explain("circular_approval").rank, 14);
});

test("explain reports rank, tier and the resolution principle", () => {
  const taxonomy = createConflictTaxonomy();

  const sequence = taxonomy.explain("temporal_impossible_sequence");
  assert.equal(sequence.rank, 5);
  assert.equal(sequence.tier, "high");
  assert.equal(sequence.principle, RESOLUTION_PRINCIPLES.require_consistent_sequence);

  assert.equal(taxonomy.explain("overly_broad").tier, "critical");
  assert.equal(taxonomy.explain("spatial_overlap").tier, "standard");
  assert.equal(familyOf("party_inconsistency"), "role");
});

test("describeConflictType renders a markdown summary", () => {
  const taxonomy = createConflictTaxonomy();

  assert.equal(
    taxonomy.describeConflictType("workflow_cycle"),
    [
      "## Workflow Cycle",
      "",
      "**Detection Order:** 14 (standard)",
      "**Family:** dependency",
      "**Keywords:** none (structural patterns only)",
      "**Default Action:** reject",
      "**Resolution Principle:** break_cycle_at_weakest_link",
      RESOLUTION_PRINCIPLES.break_cycle_at_weakest_link
    ].join("\n")
  );

  const overlyBroad = taxonomy.describeConflictType("overly_broad").split("\n");
  assert.equal(overlyBroad[4], "**Keywords:** everything, anything, all data, any purpose, everyone can access everything");
  assert.deepEqual(overlyBroad.slice(-2), [
    '**Example:** "Everyone can access everything for any purpose"',
    "**Why:** universal actors and assets leave nothing to enforce"
  ]);
});

test("ConflictTaxonomy rejects inconsistent strategy tables", () => {
  const defaults = listDefaultStrategies();

  expectTaxonomyError(
    () => createConflictTaxonomy({ workflow_cycle: 1 }),
    "DUPLICATE_PRIORITY",
    'Priority 1 is shared by "unmeasurable_terms" and "workflow_cycle"'
  );
  expectTaxonomyError(
    () => createConflictTaxonomy({ overly_broad: 0 }),
    "INVALID_PRIORITY",
    'Priority for "overly_broad" must be a positive integer'
  );
  expectTaxonomyError(
    () => new ConflictTaxonomy(defaults.slice(0, 13)),
    "MISSING_STRATEGY",
    "No detection strategy for: workflow_cycle"
  );
  expectTaxonomyError(
    () => new ConflictTaxonomy([...defaults, { ...defaults[0], priority: 99 }]),
    "DUPLICATE_STRATEGY",
    'Conflict type "unmeasurable_terms" has more than one detection strategy'
  );
});

test("createConflictTaxonomy rejects overrides for unknown conflict types", () => {
  const overrides = { workflow_cycle: 20, not_a_conflict: 3 };

  expectTaxonomyError(
    () => createConflictTaxonomy(overrides),
    "INVALID_INPUT",
    'Priority override names unknown conflict type "not_a_conflict"'
  );
});
