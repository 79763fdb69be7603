/**
 * RDF term and triple types
 */

export interface IriNode {
    type: 'iri';
    value: string;
}

/**
 * Graph-local node. Two blank nodes are equal iff their labels are equal.
 */
export interface BlankNode {
    type: 'blank';
    value: string;
}

export interface LiteralNode {
    type: 'literal';
    value: string;
    datatype: string;
    language?: string;
}

export type NodeRef = IriNode | BlankNode;
export type ObjectTerm = NodeRef | LiteralNode;

export interface Triple {
    readonly subject: NodeRef;
    readonly predicate: string;
    readonly object: ObjectTerm;
}

/**
 * Pattern for store lookups; absent fields are wildcards.
 */
export interface TriplePattern {
    subject?: NodeRef;
    predicate?: string;
    object?: ObjectTerm;
}
