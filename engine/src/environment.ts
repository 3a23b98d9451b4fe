import { createConformanceEngine, type ConformanceEngine } from "./conformance.ts";
import { createConflictTaxonomy, type ConflictTaxonomy } from "./conflict-taxonomy.ts";
import {
  readDefaultEngineConfig,
  readDefaultOperandTable,
  type EngineConfig,
  type OperandTableContract
} from "./contracts.ts";
import { createOperandRegistry, type OperandRegistry } from "./operand-registry.ts";
import { buildOdrlShapeRules, createShapeRuleSet, type ShapeRule, type ShapeRuleSet } from "./shape-rules.ts";

export interface ConformanceEnvironment {
  readonly config: EngineConfig;
  readonly registry: OperandRegistry;
  readonly ruleSet: ShapeRuleSet;
  readonly engine: ConformanceEngine;
  readonly taxonomy: ConflictTaxonomy;
}

export interface ConformanceEnvironmentOptions {
  config?: EngineConfig;
  operandTable?: OperandTableContract;
  /** Rules evaluated after the built-in ODRL shapes. */
  extraRules?: readonly ShapeRule[];
}

/**
 * Builds every piece of frozen configuration a session needs. All
 * validation happens here, before any document is evaluated.
 */
export function createConformanceEnvironment(options: ConformanceEnvironmentOptions = {}): ConformanceEnvironment {
  const config = options.config ?? readDefaultEngineConfig();
  const registry = createOperandRegistry(options.operandTable ?? readDefaultOperandTable());
  const ruleSet = createShapeRuleSet([
    ...buildOdrlShapeRules(registry, {
      compatibilitySeverity: config.compatibilitySeverity,
      datatypeSeverity: config.datatypeSeverity
    }),
    ...(options.extraRules ?? [])
  ]);

  return Object.freeze({
    config,
    registry,
    ruleSet,
    engine: createConformanceEngine(ruleSet, registry),
    taxonomy: createConflictTaxonomy(config.priorityOverrides)
  });
}
