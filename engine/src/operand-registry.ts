import { ConfigurationError, type OperandTableContract } from "./contracts.ts";
import { isOperator, type Operator } from "./vocabulary.ts";

export interface Operand {
  readonly name: string;
  readonly uri: string;
  readonly label: string;
  readonly definition: string;
  readonly compatibleOperators: readonly Operator[];
  readonly expectedDatatypes: readonly string[];
}

export type OperandLookup =
  | {
      found: true;
      operand: Operand;
    }
  | {
      found: false;
      name: string;
    };

export class OperandRegistry {
  readonly tableVersion: string;
  private readonly operands: ReadonlyMap<string, Operand>;
  private readonly operandsByUri: ReadonlyMap<string, Operand>;

  constructor(table: OperandTableContract) {
    const operands = new Map<string, Operand>();
    const operandsByUri = new Map<string, Operand>();

    table.operands.forEach((entry, index) => {
      const name = entry.name.trim();
      if (operands.has(name)) {
        throw new ConfigurationError({
          contract: "OperandTable",
          code: "DUPLICATE_OPERAND",
          message: `Operand "${name}" is declared more than once`,
          issues: [{ instancePath: `/operands/${index}/name`, keyword: "unique", message: "duplicate operand name" }]
        });
      }

      if (entry.compatible_operators.length === 0) {
        throw new ConfigurationError({
          contract: "OperandTable",
          code: "EMPTY_OPERATOR_SET",
          message: `Operand "${name}" must declare at least one compatible operator`,
          issues: [
            {
              instancePath: `/operands/${index}/compatible_operators`,
              keyword: "minItems",
              message: "compatible_operators must not be empty"
            }
          ]
        });
      }

      const compatibleOperators = entry.compatible_operators.map((operator, operatorIndex) => {
        if (!isOperator(operator)) {
          throw new ConfigurationError({
            contract: "OperandTable",
            code: "UNKNOWN_OPERATOR",
            message: `Operand "${name}" references unknown operator "${operator}"`,
            issues: [
              {
                instancePath: `/operands/${index}/compatible_operators/${operatorIndex}`,
                keyword: "enum",
                message: "operator is not a member of the operator vocabulary"
              }
            ]
          });
        }
        return operator;
      });

      const operand: Operand = Object.freeze({
        name,
        uri: entry.uri,
        label: entry.label,
        definition: entry.definition ?? "",
        compatibleOperators: Object.freeze(compatibleOperators),
        expectedDatatypes: Object.freeze([...(entry.expected_datatypes ?? [])])
      });
      operands.set(name, operand);
      operandsByUri.set(operand.uri, operand);
    });

    this.tableVersion = table.table_version;
    this.operands = operands;
    this.operandsByUri = operandsByUri;
    Object.freeze(this);
  }

  lookup(name: string): OperandLookup {
    const operand = this.operands.get(name);
    return operand ? { found: true, operand } : { found: false, name };
  }

  lookupByUri(uri: string): OperandLookup {
    const operand = this.operandsByUri.get(uri);
    return operand ? { found: true, operand } : { found: false, name: uri };
  }

  listNames(): string[] {
    return [...this.operands.keys()];
  }

  listOperands(): Operand[] {
    return [...this.operands.values()];
  }

  isCompatible(operand: Operand, operator: Operator): boolean {
    return operand.compatibleOperators.includes(operator);
  }
}

export function createOperandRegistry(table: OperandTableContract): OperandRegistry {
  return new OperandRegistry(table);
}
