import assert from "node:assert/strict";
import test from "node:test";

import { ConfigurationError, createOperandRegistry, readDefaultOperandTable } from "../src/index.ts";

const COUNT_URI = "http://www.w3.org/ns/odrl/2/count";

test("OperandRegistry looks up operands by name and by IRI", () => {
  const registry = createOperandRegistry(readDefaultOperandTable());

  const count = registry.lookup("count");
  assert.equal(count.found, true);
  if (!count.found) {
    return;
  }
  assert.equal(count.operand.uri, COUNT_URI);
  assert.deepEqual(count.operand.compatibleOperators, ["lt", "lteq", "gt", "gteq", "eq"]);

  const byUri = registry.lookupByUri(COUNT_URI);
  assert.equal(byUri.found && byUri.operand.name, "count");
});

test("OperandRegistry reports unknown operands without throwing", () => {
  const registry = createOperandRegistry(readDefaultOperandTable());

  assert.deepEqual(registry.lookup("temperature"), { found: false, name: "temperature" });
});

test("OperandRegistry checks operator compatibility", () => {
  const registry = createOperandRegistry(readDefaultOperandTable());
  const lookup = registry.lookup("count");
  assert.ok(lookup.found);
  if (!lookup.found) {
    return;
  }

  assert.equal(registry.isCompatible(lookup.operand, "lteq"), true);
  assert.equal(registry.isCompatible(lookup.operand, "isAnyOf"), false);
});

test("OperandRegistry keeps declaration order and is frozen", () => {
  const registry = createOperandRegistry(readDefaultOperandTable());

  assert.deepEqual(registry.listNames(), [
    "dateTime",
    "count",
    "elapsedTime",
    "payAmount",
    "percentage",
    "spatial",
    "purpose",
    "recipient"
  ]);
  assert.equal(Object.isFrozen(registry), true);
  const lookup = registry.lookup("spatial");
  assert.equal(lookup.found && Object.isFrozen(lookup.operand.compatibleOperators), true);
});

test("OperandRegistry rejects unknown operators, empty sets and duplicate names", () => {
  const entry = { name: "count", uri: COUNT_URI, label: "Count", compatible_operators: ["eq"] };

  assert.throws(
    () =>
      createOperandRegistry({
        schema_version: "1.0.0",
        table_version: "test",
        operands: [{ ...entry, compatible_operators: ["eq", "approximately"] }]
      }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.code, "UNKNOWN_OPERATOR");
      assert.equal(error.message, "Operand \"count\" references unknown operator \"approximately\"");
      assert.equal(error.issues[0]?.instancePath, "/operands/0/compatible_operators/1");
      return true;
    }
  );

  assert.throws(
    () =>
      createOperandRegistry({
        schema_version: "1.0.0",
        table_version: "test",
        operands: [{ ...entry, compatible_operators: [] }]
      }),
    { name: "ConfigurationError", code: "EMPTY_OPERATOR_SET" }
  );

  assert.throws(
    () =>
      createOperandRegistry({
        schema_version: "1.0.0",
        table_version: "test",
        operands: [entry, entry]
      }),
    { name: "ConfigurationError", code: "DUPLICATE_OPERAND", message: "Operand \"count\" is declared more than once" }
  );
});
