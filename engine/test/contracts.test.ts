import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import {
  ConfigurationError,
  loadEngineConfig,
  loadOperandTable,
  readDefaultEngineConfig,
  readDefaultOperandTable,
  readJsonFile
} from "../src/index.ts";

test("readDefaultEngineConfig loads the shipped configuration", () => {
  assert.deepEqual(readDefaultEngineConfig(), {
    schemaVersion: "1.0.0",
    maxAttempts: 3,
    attemptTimeoutMs: 60000,
    compatibilitySeverity: "Warning",
    datatypeSeverity: "Warning",
    priorityOverrides: {}
  });
});

test("loadEngineConfig applies defaults to a minimal configuration", () => {
  const config = loadEngineConfig({ schema_version: "1.0.0", repair: { max_attempts: 5 } });

  assert.equal(config.maxAttempts, 5);
  assert.equal(config.attemptTimeoutMs, 60000);
  assert.equal(config.compatibilitySeverity, "Warning");
  assert.deepEqual(config.priorityOverrides, {});
});

test("loadEngineConfig keeps severity and priority overrides", () => {
  const config = loadEngineConfig({
    schema_version: "1.0.0",
    conformance: { compatibility_severity: "Violation" },
    conflicts: { priority_overrides: { workflow_cycle: 20 } }
  });

  assert.equal(config.compatibilitySeverity, "Violation");
  assert.equal(config.datatypeSeverity, "Warning");
  assert.deepEqual(config.priorityOverrides, { workflow_cycle: 20 });
});

test("loadEngineConfig rejects a retry ceiling below one", () => {
  assert.throws(
    () => loadEngineConfig({ schema_version: "1.0.0", repair: { max_attempts: 0 } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.contract, "EngineConfig");
      assert.equal(error.code, "SCHEMA_VALIDATION_FAILED");
      assert.equal(error.message, "EngineConfig validation failed at /repair/max_attempts: must be >= 1");
      assert.deepEqual(
        error.issues.map((issue) => [issue.instancePath, issue.keyword]),
        [["/repair/max_attempts", "minimum"]]
      );
      return true;
    }
  );
});

test("loadEngineConfig rejects an attempt timeout beyond the timer range", () => {
  assert.throws(() => loadEngineConfig({ schema_version: "1.0.0", repair: { attempt_timeout_ms: 2_147_483_648 } }), {
    name: "ConfigurationError",
    code: "SCHEMA_VALIDATION_FAILED",
    message: "EngineConfig validation failed at /repair/attempt_timeout_ms: must be <= 2147483647"
  });
});

test("loadEngineConfig rejects incompatible schema versions", () => {
  assert.throws(
    () => loadEngineConfig({ schema_version: "2.0.0" }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.code, "VERSION_INCOMPATIBLE");
      assert.equal(error.message, "EngineConfig schema_version \"2.0.0\" is incompatible; expected \"1.0.0\"");
      return true;
    }
  );
});

test("loadEngineConfig rejects non-object input and unknown conflict types", () => {
  assert.throws(() => loadEngineConfig("nope"), {
    name: "ConfigurationError",
    code: "INVALID_INPUT",
    message: "EngineConfig input must be an object"
  });
  assert.throws(
    () =>
      loadEngineConfig({
        schema_version: "1.0.0",
        conflicts: { priority_overrides: { not_a_conflict: 1 } }
      }),
    { name: "ConfigurationError", code: "SCHEMA_VALIDATION_FAILED" }
  );
});

test("readDefaultOperandTable lists the core operands in declaration order", () => {
  const table = readDefaultOperandTable();

  assert.equal(table.table_version, "odrl-core-2.2");
  assert.deepEqual(
    table.operands.map((operand) => operand.name),
    ["dateTime", "count", "elapsedTime", "payAmount", "percentage", "spatial", "purpose", "recipient"]
  );
});

test("loadOperandTable rejects an operand without compatible operators", () => {
  assert.throws(
    () =>
      loadOperandTable({
        schema_version: "1.0.0",
        table_version: "test",
        operands: [{ name: "count", uri: "http://www.w3.org/ns/odrl/2/count", label: "Count", compatible_operators: [] }]
      }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.contract, "OperandTable");
      assert.equal(error.code, "SCHEMA_VALIDATION_FAILED");
      assert.equal(error.issues[0]?.instancePath, "/operands/0/compatible_operators");
      return true;
    }
  );
});

test("readJsonFile loads a custom operand table from disk", () => {
  const tmpRoot = mkdtempSync(join(tmpdir(), "policy-conformance-contracts-"));
  const tablePath = join(tmpRoot, "operands.json");

  try {
    writeFileSync(
      tablePath,
      JSON.stringify({
        schema_version: "1.0.0",
        table_version: "custom-1",
        operands: [
          {
            name: "industry",
            uri: "http://www.w3.org/ns/odrl/2/industry",
            label: "Industry Context",
            compatible_operators: ["eq", "isAnyOf"]
          }
        ]
      }),
      "utf8"
    );

    const table = loadOperandTable(readJsonFile(tablePath));
    assert.equal(table.table_version, "custom-1");
    assert.deepEqual(table.operands[0]?.compatible_operators, ["eq", "isAnyOf"]);
  } finally {
    rmSync(tmpRoot, { recursive: true, force: true });
  }
});
