export const ODRL = "http://www.w3.org/ns/odrl/2/";
export const XSD = "http://www.w3.org/2001/XMLSchema#";

export const OPERATORS = [
  "eq",
  "neq",
  "lt",
  "lteq",
  "gt",
  "gteq",
  "isA",
  "hasPart",
  "isPartOf",
  "isAllOf",
  "isAnyOf",
  "isNoneOf"
] as const;

export type Operator = (typeof OPERATORS)[number];

export function isOperator(value: string): value is Operator {
  return OPERATORS.some((operator) => operator === value);
}

export function odrl(local: string): string {
  return `${ODRL}${local}`;
}

/** Local name of an IRI in the ODRL namespace, or undefined for any other IRI. */
export function odrlLocalName(iri: string): string | undefined {
  return iri.startsWith(ODRL) ? iri.slice(ODRL.length) : undefined;
}

export const ODRL_POLICY_CLASSES = [
  odrl("Policy"),
  odrl("Set"),
  odrl("Offer"),
  odrl("Agreement")
] as const;

export const ODRL_RULE_PROPERTIES = {
  permission: odrl("permission"),
  prohibition: odrl("prohibition"),
  obligation: odrl("obligation")
} as const;

export const ODRL_RULE_CLASSES: Record<keyof typeof ODRL_RULE_PROPERTIES, readonly string[]> = {
  permission: [odrl("Permission")],
  prohibition: [odrl("Prohibition")],
  obligation: [odrl("Duty"), odrl("Obligation")]
};
