export {
  ConfigurationError,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  MAX_ATTEMPT_TIMEOUT_MS,
  SUPPORTED_ENGINE_CONFIG_SCHEMA_VERSION,
  SUPPORTED_OPERAND_TABLE_SCHEMA_VERSION,
  loadEngineConfig,
  loadOperandTable,
  readDefaultEngineConfig,
  readDefaultOperandTable,
  readJsonFile
} from "./contracts.ts";
export type {
  ConfigurationErrorCode,
  ConfigurationIssue,
  ContractName,
  EngineConfig,
  EngineConfigContract,
  OperandTableContract,
  OperandTableEntryContract
} from "./contracts.ts";

export { ODRL, OPERATORS, XSD, isOperator, odrl, odrlLocalName } from "./vocabulary.ts";
export type { Operator } from "./vocabulary.ts";

export { ISSUE_CATEGORIES, NOT_SPECIFIED, SEVERITIES, createViolation, formatIssueCategory } from "./violation.ts";
export type { IssueCategory, Severity, Violation } from "./violation.ts";

export { OperandRegistry, createOperandRegistry } from "./operand-registry.ts";
export type { Operand, OperandLookup } from "./operand-registry.ts";

export {
  DEFAULT_PROPERTY_MESSAGES,
  NODE_KINDS,
  ShapeRuleSet,
  buildOdrlShapeRules,
  collectCheckPaths,
  createShapeRuleSet,
  renderMessage
} from "./shape-rules.ts";
export type {
  AndCheck,
  NotCheck,
  OdrlShapeRuleOptions,
  OperandCompatibilityCheck,
  OrCheck,
  PropertyCheck,
  PropertyConstraintKey,
  ShapeCheck,
  ShapeRule,
  ValueNodeKind,
  XoneCheck
} from "./shape-rules.ts";

export { ConformanceEngine, createConformanceEngine } from "./conformance.ts";

export { ViolationReport } from "./violation-report.ts";
export type { ReportContext, ViolationReportJson } from "./violation-report.ts";

export {
  CONFLICT_FAMILIES,
  CONFLICT_TYPES,
  ConflictTaxonomy,
  NoMatchingStrategyError,
  REMEDIATION_ACTIONS,
  RESOLUTION_PRINCIPLES,
  createConflictTaxonomy,
  familyOf,
  listDefaultStrategies
} from "./conflict-taxonomy.ts";
export type {
  ConflictExplanation,
  ConflictFamily,
  ConflictSignal,
  ConflictType,
  DetectionStrategy,
  FactValue,
  PriorityTier,
  RemediationAction,
  ResolutionPrinciple,
  StructuralPattern
} from "./conflict-taxonomy.ts";

export { assessConflicts } from "./conflict-assessment.ts";
export type { AssessmentDecision, ClassifiedSignal, ConflictAssessment, RiskLevel } from "./conflict-assessment.ts";

export {
  TransducerError,
  callTransducer,
  chatCompletionUrl,
  createChatCompletionTransducer,
  renderPromptPayload
} from "./transducer.ts";
export type {
  ChatCompletionConfig,
  ChatCompletionTransducerOptions,
  PromptPayload,
  RenderedPrompt,
  TextTransducer,
  TransducerCallFailure,
  TransducerCallOutcome,
  TransducerEndpointKind,
  TransducerErrorType,
  TransformOptions
} from "./transducer.ts";

export {
  SESSION_LEDGER_SCHEMA_VERSION,
  emitSessionLedgerEntry,
  emitSessionReport,
  formatSessionReport,
  recordSession
} from "./session-ledger.ts";
export type { EmitSessionLedgerOptions, LedgerEmission, SessionLedgerEntry } from "./session-ledger.ts";

export {
  ABSOLUTE_MAX_ATTEMPTS,
  REPAIR_STATES,
  RepairOrchestrator,
  RepairSessionError,
  TRANSDUCER_FAILURE_CODES,
  createRepairOrchestrator,
  normalizeAttemptTimeout
} from "./repair-orchestrator.ts";
export type {
  ConformanceAttempt,
  RepairOrchestratorConfig,
  RepairSessionErrorCode,
  RepairSessionInput,
  RepairSessionOptions,
  RepairSessionResult,
  RepairState,
  StateTransition,
  TerminalRepairState
} from "./repair-orchestrator.ts";

export { createConformanceEnvironment } from "./environment.ts";
export type { ConformanceEnvironment, ConformanceEnvironmentOptions } from "./environment.ts";

export { PolicyGenerationError, runPolicyPipeline } from "./pipeline.ts";
export type { PolicyPipelineInput, PolicyPipelineResult } from "./pipeline.ts";
