export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export interface SourceRange {
  start: SourcePosition;
  end: SourcePosition;
}

export const RDF_NAMESPACE = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
export const RDF_TYPE = `${RDF_NAMESPACE}type`;
export const XSD_NAMESPACE = "http://www.w3.org/2001/XMLSchema#";

export interface IriTerm {
  kind: "iri";
  value: string;
}

export interface BlankTerm {
  kind: "blank";
  id: string;
}

export interface LiteralTerm {
  kind: "literal";
  value: string;
  datatype?: string;
  language?: string;
}

export interface ListTerm {
  kind: "list";
  items: Term[];
}

export type Term = IriTerm | BlankTerm | LiteralTerm | ListTerm;

export type NodeKind = "iri" | "blank";

export interface GraphNode {
  id: string;
  kind: NodeKind;
  types: string[];
  properties: Map<string, Term[]>;
}

/**
 * Parsed rights-expression document. Nodes keep the order in which the
 * source first mentions them as subjects or blank nodes, so evaluation over
 * an unchanged document always visits them in the same order.
 */
export interface PolicyDocument {
  prefixes: Record<string, string>;
  nodes: GraphNode[];
}

export function getNode(document: PolicyDocument, id: string): GraphNode | undefined {
  return document.nodes.find((node) => node.id === id);
}

export function nodesOfType(document: PolicyDocument, typeIris: readonly string[]): GraphNode[] {
  return document.nodes.filter((node) => node.types.some((type) => typeIris.includes(type)));
}

export function propertyValues(node: GraphNode, path: string): Term[] {
  return node.properties.get(path) ?? [];
}

export function resolveTermNode(document: PolicyDocument, term: Term): GraphNode | undefined {
  if (term.kind === "blank") {
    return getNode(document, term.id);
  }
  if (term.kind === "iri") {
    return getNode(document, term.value);
  }
  return undefined;
}

export function compactIri(iri: string, prefixes: Record<string, string>): string {
  let bestPrefix: string | undefined;
  let bestNamespace = "";
  for (const [prefix, namespace] of Object.entries(prefixes)) {
    if (namespace.length > bestNamespace.length && iri.startsWith(namespace)) {
      bestPrefix = prefix;
      bestNamespace = namespace;
    }
  }

  if (bestPrefix === undefined) {
    return iri;
  }

  const local = iri.slice(bestNamespace.length);
  if (!/^[A-Za-z0-9_.-]*$/.test(local)) {
    return iri;
  }

  return `${bestPrefix}:${local}`;
}

export function formatTerm(term: Term, prefixes: Record<string, string>): string {
  if (term.kind === "iri") {
    return compactIri(term.value, prefixes);
  }
  if (term.kind === "blank") {
    return term.id;
  }
  if (term.kind === "list") {
    return `( ${term.items.map((item) => formatTerm(item, prefixes)).join(" ")} )`;
  }

  const lexical = `"${term.value}"`;
  if (term.language !== undefined) {
    return `${lexical}@${term.language}`;
  }
  if (term.datatype !== undefined) {
    return `${lexical}^^${compactIri(term.datatype, prefixes)}`;
  }
  return lexical;
}

export function cloneDocument(document: PolicyDocument): PolicyDocument {
  return {
    prefixes: { ...document.prefixes },
    nodes: document.nodes.map((node) => ({
      id: node.id,
      kind: node.kind,
      types: [...node.types],
      properties: new Map(
        [...node.properties.entries()].map(([path, values]) => [path, values.map(cloneTerm)])
      )
    }))
  };
}

function cloneTerm(term: Term): Term {
  if (term.kind === "list") {
    return { kind: "list", items: term.items.map(cloneTerm) };
  }
  return { ...term };
}
