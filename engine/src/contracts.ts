import { readFileSync } from "node:fs";
import { createRequire } from "node:module";

import type { ErrorObject, ValidateFunction } from "ajv/dist/2020.js";

import type { ConflictType } from "./conflict-taxonomy.ts";
import type { Severity } from "./violation.ts";

export interface OperandTableEntryContract {
  name: string;
  uri: string;
  label: string;
  definition?: string;
  compatible_operators: string[];
  expected_datatypes?: string[];
}

export interface OperandTableContract {
  schema_version: string;
  table_version: string;
  operands: OperandTableEntryContract[];
}

export interface EngineConfigContract {
  schema_version: string;
  repair?: {
    max_attempts?: number;
    attempt_timeout_ms?: number;
  };
  conformance?: {
    compatibility_severity?: Severity;
    datatype_severity?: Severity;
  };
  conflicts?: {
    priority_overrides?: Partial<Record<ConflictType, number>>;
  };
}

export interface EngineConfig {
  schemaVersion: string;
  maxAttempts: number;
  attemptTimeoutMs: number;
  compatibilitySeverity: Severity;
  datatypeSeverity: Severity;
  priorityOverrides: Partial<Record<ConflictType, number>>;
}

export type ContractName = "EngineConfig" | "OperandTable" | "ShapeRuleSet" | "ConflictTaxonomy";
export type ConfigurationErrorCode =
  | "INVALID_INPUT"
  | "VERSION_INCOMPATIBLE"
  | "SCHEMA_VALIDATION_FAILED"
  | "UNKNOWN_OPERATOR"
  | "EMPTY_OPERATOR_SET"
  | "DUPLICATE_OPERAND"
  | "DUPLICATE_RULE_ID"
  | "INVALID_RULE"
  | "DUPLICATE_PRIORITY"
  | "INVALID_PRIORITY"
  | "MISSING_STRATEGY"
  | "DUPLICATE_STRATEGY";

export interface ConfigurationIssue {
  instancePath: string;
  keyword: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly contract: ContractName;
  readonly code: ConfigurationErrorCode;
  readonly issues: ConfigurationIssue[];

  constructor(params: {
    contract: ContractName;
    code: ConfigurationErrorCode;
    message: string;
    issues?: ConfigurationIssue[];
  }) {
    super(params.message);
    this.name = "ConfigurationError";
    this.contract = params.contract;
    this.code = params.code;
    this.issues = params.issues ?? [];
  }
}

export const SUPPORTED_ENGINE_CONFIG_SCHEMA_VERSION = "1.0.0";
export const SUPPORTED_OPERAND_TABLE_SCHEMA_VERSION = "1.0.0";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 60_000;
/** Largest delay a timer accepts. */
export const MAX_ATTEMPT_TIMEOUT_MS = 2_147_483_647;

type Ajv2020Constructor = new (options: { allErrors: boolean }) => {
  compile<T>(schema: object): ValidateFunction<T>;
};

interface ContractValidators {
  validateEngineConfig: ValidateFunction<EngineConfigContract>;
  validateOperandTable: ValidateFunction<OperandTableContract>;
}

let contractValidators: ContractValidators | null = null;
let ajv2020Constructor: Ajv2020Constructor | null = null;

function resolveAjv2020Constructor(moduleValue: unknown): Ajv2020Constructor {
  const candidate = moduleValue as
    | Ajv2020Constructor
    | { default?: Ajv2020Constructor; Ajv2020?: Ajv2020Constructor };

  if (typeof candidate === "function") {
    return candidate;
  }
  if (candidate.default && typeof candidate.default === "function") {
    return candidate.default;
  }
  if (candidate.Ajv2020 && typeof candidate.Ajv2020 === "function") {
    return candidate.Ajv2020;
  }

  throw new Error("Unable to resolve Ajv2020 constructor");
}

function getAjv2020Constructor(): Ajv2020Constructor {
  if (ajv2020Constructor) {
    return ajv2020Constructor;
  }

  const nodeRequire = createRequire(import.meta.url);
  ajv2020Constructor = resolveAjv2020Constructor(nodeRequire("ajv/dist/2020.js"));
  return ajv2020Constructor;
}

function getContractValidators(): ContractValidators {
  if (contractValidators) {
    return contractValidators;
  }

  const Ajv2020Constructor = getAjv2020Constructor();
  const ajv = new Ajv2020Constructor({ allErrors: true });
  contractValidators = {
    validateEngineConfig: ajv.compile<EngineConfigContract>(
      readJsonResource("../schemas/engine-config.v1.schema.json")
    ),
    validateOperandTable: ajv.compile<OperandTableContract>(
      readJsonResource("../schemas/operand-table.v1.schema.json")
    )
  };

  return contractValidators;
}

function readJsonResource(relativePathFromContractsSource: string): object {
  const fileContents = readFileSync(new URL(relativePathFromContractsSource, import.meta.url), "utf8");
  return JSON.parse(fileContents) as object;
}

export function readJsonFile(path: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, contract: ContractName): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigurationError({
      contract,
      code: "INVALID_INPUT",
      message: `${contract} input must be an object`
    });
  }

  return value;
}

function mapAjvIssues(errors: ErrorObject[] | null | undefined): ConfigurationIssue[] {
  return (errors ?? []).map((error) => ({
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? "validation failed"
  }));
}

function requireCompatibleSchemaVersion(
  contract: "EngineConfig" | "OperandTable",
  value: Record<string, unknown>,
  expectedVersion: string
): void {
  const schemaVersion = value.schema_version;
  if (typeof schemaVersion !== "string" || schemaVersion.trim().length === 0) {
    throw new ConfigurationError({
      contract,
      code: "SCHEMA_VALIDATION_FAILED",
      message: `${contract} schema_version is required`,
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "required",
          message: "schema_version is required"
        }
      ]
    });
  }

  if (schemaVersion.trim() !== expectedVersion) {
    throw new ConfigurationError({
      contract,
      code: "VERSION_INCOMPATIBLE",
      message: `${contract} schema_version "${schemaVersion}" is incompatible; expected "${expectedVersion}"`,
      issues: [
        {
          instancePath: "/schema_version",
          keyword: "const",
          message: `expected "${expectedVersion}"`
        }
      ]
    });
  }
}

function validateContract<T>(
  contract: "EngineConfig" | "OperandTable",
  validator: ValidateFunction<T>,
  value: Record<string, unknown>
): T {
  if (validator(value)) {
    return value;
  }

  const issues = mapAjvIssues(validator.errors);
  const firstIssue = issues[0];
  const issuePath = firstIssue?.instancePath || "/";
  const issueMessage = firstIssue?.message ?? "validation failed";

  throw new ConfigurationError({
    contract,
    code: "SCHEMA_VALIDATION_FAILED",
    message: `${contract} validation failed at ${issuePath}: ${issueMessage}`,
    issues
  });
}

export function loadOperandTable(input: unknown): OperandTableContract {
  const candidate = requireRecord(input, "OperandTable");
  const { validateOperandTable } = getContractValidators();
  requireCompatibleSchemaVersion("OperandTable", candidate, SUPPORTED_OPERAND_TABLE_SCHEMA_VERSION);
  return validateContract("OperandTable", validateOperandTable, candidate);
}

export function loadEngineConfig(input: unknown): EngineConfig {
  const candidate = requireRecord(input, "EngineConfig");
  const { validateEngineConfig } = getContractValidators();
  requireCompatibleSchemaVersion("EngineConfig", candidate, SUPPORTED_ENGINE_CONFIG_SCHEMA_VERSION);
  const contract = validateContract("EngineConfig", validateEngineConfig, candidate);

  return {
    schemaVersion: contract.schema_version.trim(),
    maxAttempts: contract.repair?.max_attempts ?? DEFAULT_MAX_ATTEMPTS,
    attemptTimeoutMs: contract.repair?.attempt_timeout_ms ?? DEFAULT_ATTEMPT_TIMEOUT_MS,
    compatibilitySeverity: contract.conformance?.compatibility_severity ?? "Warning",
    datatypeSeverity: contract.conformance?.datatype_severity ?? "Warning",
    priorityOverrides: { ...(contract.conflicts?.priority_overrides ?? {}) }
  };
}

export function readDefaultOperandTable(): OperandTableContract {
  return loadOperandTable(readJsonResource("../config/operands.v1.json"));
}

export function readDefaultEngineConfig(): EngineConfig {
  return loadEngineConfig(readJsonResource("../config/engine.default.json"));
}
