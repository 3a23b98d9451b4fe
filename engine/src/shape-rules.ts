import { ConfigurationError } from "./contracts.ts";
import type { OperandRegistry } from "./operand-registry.ts";
import type { IssueCategory, Severity } from "./violation.ts";
import {
  ODRL_POLICY_CLASSES,
  ODRL_RULE_CLASSES,
  ODRL_RULE_PROPERTIES,
  OPERATORS,
  isOperator,
  odrl,
  odrlLocalName
} from "./vocabulary.ts";

export const NODE_KINDS = ["iri", "blank", "node", "literal"] as const;
export type ValueNodeKind = (typeof NODE_KINDS)[number];

export type PropertyConstraintKey = "minCount" | "maxCount" | "nodeKind" | "in" | "class";

export interface PropertyCheck {
  kind: "property";
  path: string;
  minCount?: number;
  maxCount?: number;
  nodeKind?: ValueNodeKind;
  in?: readonly string[];
  class?: readonly string[];
  messages?: Partial<Record<PropertyConstraintKey, string>>;
}

export interface AndCheck {
  kind: "and";
  checks: readonly ShapeCheck[];
}

export interface OrCheck {
  kind: "or";
  checks: readonly ShapeCheck[];
  issue?: IssueCategory;
  message?: string;
}

export interface XoneCheck {
  kind: "xone";
  checks: readonly ShapeCheck[];
  message?: string;
}

export interface NotCheck {
  kind: "not";
  check: ShapeCheck;
  issue?: IssueCategory;
  message?: string;
}

export interface OperandCompatibilityCheck {
  kind: "operand_compatibility";
  severity: Severity;
  datatypeSeverity: Severity;
}

export type ShapeCheck = PropertyCheck | AndCheck | OrCheck | XoneCheck | NotCheck | OperandCompatibilityCheck;

export interface ShapeRule {
  id: string;
  description?: string;
  targetClasses: readonly string[];
  check: ShapeCheck;
  severity?: Severity;
}

export const DEFAULT_PROPERTY_MESSAGES: Readonly<Record<PropertyConstraintKey, string>> = {
  minCount: "Requires at least {min} value(s) for {path}",
  maxCount: "Allows at most {max} value(s) for {path}",
  nodeKind: "Values of {path} must be of node kind {nodeKind}",
  in: "Values of {path} must be one of: {allowed}",
  class: "Values of {path} must be instances of {classes}"
};

export function renderMessage(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{([A-Za-z]+)\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : String(value);
  });
}

/** Property paths a check reads, in declaration order, without duplicates. */
export function collectCheckPaths(check: ShapeCheck): string[] {
  const paths: string[] = [];
  const visit = (node: ShapeCheck): void => {
    switch (node.kind) {
      case "property":
        if (!paths.includes(node.path)) {
          paths.push(node.path);
        }
        return;
      case "and":
      case "or":
      case "xone":
        node.checks.forEach(visit);
        return;
      case "not":
        visit(node.check);
        return;
      case "operand_compatibility":
        for (const path of [odrl("leftOperand"), odrl("operator"), odrl("rightOperand")]) {
          if (!paths.includes(path)) {
            paths.push(path);
          }
        }
        return;
    }
  };

  visit(check);
  return paths;
}

export class ShapeRuleSet {
  readonly rules: readonly ShapeRule[];

  constructor(rules: readonly ShapeRule[]) {
    const seen = new Set<string>();
    rules.forEach((rule, index) => {
      const id = rule.id.trim();
      if (id.length === 0) {
        throw invalidRule(index, "Shape rule id must be a non-empty string");
      }
      if (seen.has(id)) {
        throw new ConfigurationError({
          contract: "ShapeRuleSet",
          code: "DUPLICATE_RULE_ID",
          message: `Shape rule id "${id}" is declared more than once`,
          issues: [{ instancePath: `/rules/${index}/id`, keyword: "unique", message: "duplicate rule id" }]
        });
      }
      if (rule.targetClasses.length === 0) {
        throw invalidRule(index, `Shape rule "${id}" must target at least one class`);
      }
      validateCheck(rule.check, index, id);
      seen.add(id);
    });

    this.rules = Object.freeze([...rules]);
    Object.freeze(this);
  }

  getRule(id: string): ShapeRule | undefined {
    return this.rules.find((rule) => rule.id === id);
  }

  listRuleIds(): string[] {
    return this.rules.map((rule) => rule.id);
  }
}

export function createShapeRuleSet(rules: readonly ShapeRule[]): ShapeRuleSet {
  return new ShapeRuleSet(rules);
}

function invalidRule(index: number, message: string): ConfigurationError {
  return new ConfigurationError({
    contract: "ShapeRuleSet",
    code: "INVALID_RULE",
    message,
    issues: [{ instancePath: `/rules/${index}`, keyword: "rule", message }]
  });
}

function validateCheck(check: ShapeCheck, ruleIndex: number, ruleId: string): void {
  switch (check.kind) {
    case "property": {
      if (check.minCount !== undefined && check.maxCount !== undefined && check.minCount > check.maxCount) {
        throw invalidRule(ruleIndex, `Shape rule "${ruleId}" has minCount greater than maxCount on ${check.path}`);
      }
      if (check.path === odrl("operator")) {
        for (const allowed of check.in ?? []) {
          const local = odrlLocalName(allowed);
          if (local === undefined || !isOperator(local)) {
            throw new ConfigurationError({
              contract: "ShapeRuleSet",
              code: "UNKNOWN_OPERATOR",
              message: `Shape rule "${ruleId}" references unknown operator "${allowed}"`,
              issues: [{ instancePath: `/rules/${ruleIndex}/check`, keyword: "enum", message: "unknown operator" }]
            });
          }
        }
      }
      return;
    }
    case "and":
    case "or":
    case "xone":
      if (check.checks.length === 0) {
        throw invalidRule(ruleIndex, `Shape rule "${ruleId}" has an empty ${check.kind} group`);
      }
      check.checks.forEach((child) => validateCheck(child, ruleIndex, ruleId));
      return;
    case "not":
      validateCheck(check.check, ruleIndex, ruleId);
      return;
    case "operand_compatibility":
      return;
  }
}

export interface OdrlShapeRuleOptions {
  compatibilitySeverity?: Severity;
  datatypeSeverity?: Severity;
}

const ODRL_RULE_TARGETS = [
  ...ODRL_RULE_CLASSES.permission,
  ...ODRL_RULE_CLASSES.prohibition,
  ...ODRL_RULE_CLASSES.obligation
];

export function buildOdrlShapeRules(registry: OperandRegistry, options: OdrlShapeRuleOptions = {}): ShapeRule[] {
  const operandUris = registry.listOperands().map((operand) => operand.uri);

  return [
    {
      id: "policy_structure",
      description: "A policy has exactly one uid and at least one rule",
      targetClasses: ODRL_POLICY_CLASSES,
      check: {
        kind: "and",
        checks: [
          {
            kind: "property",
            path: odrl("uid"),
            minCount: 1,
            maxCount: 1,
            nodeKind: "iri",
            messages: {
              minCount: "Policy must have a unique identifier (odrl:uid)",
              maxCount: "Policy must have exactly one odrl:uid",
              nodeKind: "odrl:uid must be an IRI"
            }
          },
          {
            kind: "or",
            issue: "missing_required_field",
            message: "Policy must contain at least one permission, prohibition or obligation",
            checks: [
              { kind: "property", path: ODRL_RULE_PROPERTIES.permission, minCount: 1 },
              { kind: "property", path: ODRL_RULE_PROPERTIES.prohibition, minCount: 1 },
              { kind: "property", path: ODRL_RULE_PROPERTIES.obligation, minCount: 1 }
            ]
          }
        ]
      }
    },
    {
      id: "policy_rule_typing",
      description: "Rule values carry the class matching the property that holds them",
      targetClasses: ODRL_POLICY_CLASSES,
      check: {
        kind: "and",
        checks: [
          {
            kind: "property",
            path: ODRL_RULE_PROPERTIES.permission,
            class: ODRL_RULE_CLASSES.permission,
            messages: { class: "Each odrl:permission must be typed as odrl:Permission" }
          },
          {
            kind: "property",
            path: ODRL_RULE_PROPERTIES.prohibition,
            class: ODRL_RULE_CLASSES.prohibition,
            messages: { class: "Each odrl:prohibition must be typed as odrl:Prohibition" }
          },
          {
            kind: "property",
            path: ODRL_RULE_PROPERTIES.obligation,
            class: ODRL_RULE_CLASSES.obligation,
            messages: { class: "Each odrl:obligation must be typed as odrl:Duty" }
          }
        ]
      }
    },
    {
      id: "rule_structure",
      description: "Rules name an action and type their constraints",
      targetClasses: ODRL_RULE_TARGETS,
      check: {
        kind: "and",
        checks: [
          {
            kind: "property",
            path: odrl("action"),
            minCount: 1,
            messages: { minCount: "Rule must specify an odrl:action" }
          },
          {
            kind: "property",
            path: odrl("constraint"),
            class: [odrl("Constraint")],
            messages: { class: "Each odrl:constraint must be typed as odrl:Constraint" }
          }
        ]
      }
    },
    {
      id: "constraint_structure",
      description: "Constraints are left operand, operator, right operand triples",
      targetClasses: [odrl("Constraint")],
      check: {
        kind: "and",
        checks: [
          {
            kind: "property",
            path: odrl("leftOperand"),
            minCount: 1,
            maxCount: 1,
            nodeKind: "iri",
            in: operandUris,
            messages: {
              minCount: "Constraint must have an odrl:leftOperand",
              maxCount: "Constraint must have exactly one odrl:leftOperand",
              in: "odrl:leftOperand must be a registered operand: {allowed}"
            }
          },
          {
            kind: "property",
            path: odrl("operator"),
            minCount: 1,
            maxCount: 1,
            nodeKind: "iri",
            in: OPERATORS.map((operator) => odrl(operator)),
            messages: {
              minCount: "Constraint must have an odrl:operator",
              maxCount: "Constraint must have exactly one odrl:operator",
              in: "odrl:operator must be one of: {allowed}"
            }
          },
          {
            kind: "xone",
            message: "Constraint must have exactly one of odrl:rightOperand or odrl:rightOperandReference",
            checks: [
              { kind: "property", path: odrl("rightOperand"), minCount: 1 },
              { kind: "property", path: odrl("rightOperandReference"), minCount: 1 }
            ]
          }
        ]
      }
    },
    {
      id: "operand_compatibility",
      description: "Operators and right operand datatypes suit the left operand",
      targetClasses: [odrl("Constraint")],
      check: {
        kind: "operand_compatibility",
        severity: options.compatibilitySeverity ?? "Warning",
        datatypeSeverity: options.datatypeSeverity ?? "Warning"
      }
    }
  ];
}
