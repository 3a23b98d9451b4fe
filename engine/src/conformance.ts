import {
  compactIri,
  formatTerm,
  nodesOfType,
  propertyValues,
  resolveTermNode,
  type GraphNode,
  type PolicyDocument,
  type Term
} from "../../document/src/index.ts";

import type { OperandRegistry } from "./operand-registry.ts";
import {
  DEFAULT_PROPERTY_MESSAGES,
  collectCheckPaths,
  renderMessage,
  type NotCheck,
  type OperandCompatibilityCheck,
  type OrCheck,
  type PropertyCheck,
  type PropertyConstraintKey,
  type ShapeCheck,
  type ShapeRule,
  type ShapeRuleSet,
  type ValueNodeKind,
  type XoneCheck
} from "./shape-rules.ts";
import { createViolation, type IssueCategory, type Severity, type Violation } from "./violation.ts";
import { XSD, isOperator, odrl, odrlLocalName } from "./vocabulary.ts";

interface EvaluationContext {
  document: PolicyDocument;
  rule: ShapeRule;
  node: GraphNode;
  focusNode: string;
  severity: Severity;
}

const XSD_STRING = `${XSD}string`;

/**
 * Evaluates a shape rule set against parsed documents. The result depends
 * only on the rule set, the registry and the document: rules run in
 * declaration order, focus nodes and property values in document order.
 */
export class ConformanceEngine {
  readonly ruleSet: ShapeRuleSet;
  readonly registry: OperandRegistry;

  constructor(ruleSet: ShapeRuleSet, registry: OperandRegistry) {
    this.ruleSet = ruleSet;
    this.registry = registry;
    Object.freeze(this);
  }

  evaluate(document: PolicyDocument): readonly Violation[] {
    const violations: Violation[] = [];

    for (const rule of this.ruleSet.rules) {
      for (const node of nodesOfType(document, rule.targetClasses)) {
        const context: EvaluationContext = {
          document,
          rule,
          node,
          focusNode: node.kind === "iri" ? compactIri(node.id, document.prefixes) : node.id,
          severity: rule.severity ?? "Violation"
        };
        violations.push(...this.evaluateCheck(rule.check, context));
      }
    }

    return Object.freeze(violations);
  }

  private evaluateCheck(check: ShapeCheck, context: EvaluationContext): Violation[] {
    switch (check.kind) {
      case "property":
        return evaluatePropertyCheck(check, context);
      case "and":
        return check.checks.flatMap((child) => this.evaluateCheck(child, context));
      case "or":
        return this.evaluateOr(check, context);
      case "xone":
        return this.evaluateXone(check, context);
      case "not":
        return this.evaluateNot(check, context);
      case "operand_compatibility":
        return this.evaluateOperandCompatibility(check, context);
    }
  }

  private evaluateOr(check: OrCheck, context: EvaluationContext): Violation[] {
    const branchesHold = check.checks.some((child) => this.evaluateCheck(child, context).length === 0);
    if (branchesHold) {
      return [];
    }

    const paths = collectCheckPaths(check).map((path) => compactIri(path, context.document.prefixes));
    return [
      createViolation({
        issue: check.issue ?? "structural_error",
        ruleId: context.rule.id,
        focusNode: context.focusNode,
        propertyPath: paths.join("|"),
        constraint: check.message ?? `At least one of ${paths.join(", ")} must hold`,
        severity: context.severity
      })
    ];
  }

  private evaluateXone(check: XoneCheck, context: EvaluationContext): Violation[] {
    const holding = check.checks.filter((child) => this.evaluateCheck(child, context).length === 0);
    if (holding.length === 1) {
      return [];
    }

    const prefixes = context.document.prefixes;
    const paths = collectCheckPaths(check).map((path) => compactIri(path, prefixes));
    const observed = holding.flatMap((child) => collectCheckPaths(child)).map((path) => compactIri(path, prefixes));

    return [
      createViolation({
        issue: holding.length === 0 ? "missing_required_field" : "cardinality_violation",
        ruleId: context.rule.id,
        focusNode: context.focusNode,
        propertyPath: paths.join("|"),
        observedValue: observed.join(", "),
        constraint: check.message ?? `Exactly one of ${paths.join(", ")} must hold`,
        severity: context.severity
      })
    ];
  }

  private evaluateNot(check: NotCheck, context: EvaluationContext): Violation[] {
    if (this.evaluateCheck(check.check, context).length > 0) {
      return [];
    }

    const prefixes = context.document.prefixes;
    const paths = collectCheckPaths(check.check).map((path) => compactIri(path, prefixes));
    const observed = check.check.kind === "property" ? describeValues(context, check.check.path) : undefined;

    return [
      createViolation({
        issue: check.issue ?? "structural_error",
        ruleId: context.rule.id,
        focusNode: context.focusNode,
        propertyPath: paths.join("|"),
        observedValue: observed,
        constraint: check.message ?? `${paths.join(", ")} must not satisfy the negated shape`,
        severity: context.severity
      })
    ];
  }

  private evaluateOperandCompatibility(check: OperandCompatibilityCheck, context: EvaluationContext): Violation[] {
    const { document, node } = context;
    const prefixes = document.prefixes;
    const violations: Violation[] = [];

    for (const leftTerm of propertyValues(node, odrl("leftOperand"))) {
      if (leftTerm.kind !== "iri") {
        continue;
      }
      const lookup = this.registry.lookupByUri(leftTerm.value);
      if (!lookup.found) {
        continue;
      }
      const operand = lookup.operand;
      const operandName = compactIri(operand.uri, prefixes);

      for (const operatorTerm of propertyValues(node, odrl("operator"))) {
        const local = operatorTerm.kind === "iri" ? odrlLocalName(operatorTerm.value) : undefined;
        if (local === undefined || !isOperator(local) || this.registry.isCompatible(operand, local)) {
          continue;
        }

        violations.push(
          createViolation({
            issue: "incompatible_operand_operator",
            ruleId: context.rule.id,
            focusNode: context.focusNode,
            propertyPath: compactIri(odrl("operator"), prefixes),
            observedValue: formatTerm(operatorTerm, prefixes),
            constraint:
              `Operator ${formatTerm(operatorTerm, prefixes)} is not compatible with left operand ${operandName}; ` +
              `compatible operators: ${operand.compatibleOperators.join(", ")}`,
            severity: check.severity
          })
        );
      }

      if (operand.expectedDatatypes.length === 0) {
        continue;
      }

      for (const rightTerm of propertyValues(node, odrl("rightOperand"))) {
        if (rightTerm.kind !== "literal" || rightTerm.language !== undefined) {
          continue;
        }
        const datatype = rightTerm.datatype ?? XSD_STRING;
        if (operand.expectedDatatypes.includes(datatype)) {
          continue;
        }

        const expected = operand.expectedDatatypes.map((type) => compactIri(type, prefixes));
        violations.push(
          createViolation({
            issue: "structural_error",
            ruleId: context.rule.id,
            focusNode: context.focusNode,
            propertyPath: compactIri(odrl("rightOperand"), prefixes),
            observedValue: formatTerm(rightTerm, prefixes),
            constraint: `Right operand for ${operandName} must be typed as ${expected.join(" or ")}`,
            severity: check.datatypeSeverity
          })
        );
      }
    }

    return violations;
  }
}

export function createConformanceEngine(ruleSet: ShapeRuleSet, registry: OperandRegistry): ConformanceEngine {
  return new ConformanceEngine(ruleSet, registry);
}

function describeValues(context: EvaluationContext, path: string): string {
  return propertyValues(context.node, path)
    .map((value) => formatTerm(value, context.document.prefixes))
    .join(", ");
}

function propertyMessage(check: PropertyCheck, key: PropertyConstraintKey, context: EvaluationContext): string {
  const prefixes = context.document.prefixes;
  return renderMessage(check.messages?.[key] ?? DEFAULT_PROPERTY_MESSAGES[key], {
    path: compactIri(check.path, prefixes),
    min: check.minCount ?? 0,
    max: check.maxCount ?? 0,
    nodeKind: check.nodeKind ?? "",
    allowed: (check.in ?? []).map((value) => compactIri(value, prefixes)).join(", "),
    classes: (check.class ?? []).map((value) => compactIri(value, prefixes)).join(" or ")
  });
}

function matchesNodeKind(term: Term, nodeKind: ValueNodeKind): boolean {
  switch (nodeKind) {
    case "iri":
      return term.kind === "iri";
    case "blank":
      return term.kind === "blank";
    case "node":
      return term.kind === "iri" || term.kind === "blank";
    case "literal":
      return term.kind === "literal";
  }
}

function evaluatePropertyCheck(check: PropertyCheck, context: EvaluationContext): Violation[] {
  const { document, node } = context;
  const prefixes = document.prefixes;
  const values = propertyValues(node, check.path);
  const propertyPath = compactIri(check.path, prefixes);
  const violations: Violation[] = [];

  const report = (issue: IssueCategory, key: PropertyConstraintKey, observedValue?: string): void => {
    violations.push(
      createViolation({
        issue,
        ruleId: context.rule.id,
        focusNode: context.focusNode,
        propertyPath,
        observedValue,
        constraint: propertyMessage(check, key, context),
        severity: context.severity
      })
    );
  };

  if (check.minCount !== undefined && values.length < check.minCount) {
    if (values.length === 0) {
      report("missing_required_field", "minCount");
    } else {
      report("cardinality_violation", "minCount", describeValues(context, check.path));
    }
  }

  if (check.maxCount !== undefined && values.length > check.maxCount) {
    report("cardinality_violation", "maxCount", describeValues(context, check.path));
  }

  for (const value of values) {
    if (check.nodeKind !== undefined && !matchesNodeKind(value, check.nodeKind)) {
      report("structural_error", "nodeKind", formatTerm(value, prefixes));
    }

    if (check.in !== undefined && (value.kind !== "iri" || !check.in.includes(value.value))) {
      report("invalid_enumerated_value", "in", formatTerm(value, prefixes));
    }

    if (check.class !== undefined) {
      const classes = check.class;
      const valueNode = resolveTermNode(document, value);
      if (!valueNode || !valueNode.types.some((type) => classes.includes(type))) {
        report("structural_error", "class", formatTerm(value, prefixes));
      }
    }
  }

  return violations;
}
