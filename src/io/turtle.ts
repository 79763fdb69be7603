/**
 * Turtle loader
 *
 * Splits a Turtle or N-Triples document into engine triples with the n3
 * parser. Blank-node labels are kept as written, so diagnostics point at the
 * labels the author used; a label n3 generates for `[]` or a collection is
 * renamed when the document already uses it. Quads from named graphs are
 * flattened.
 */

import { Parser, type Quad } from 'n3';
import type { NodeRef, ObjectTerm, Triple } from '../types/rdf.js';
import { blank, iri, literal, triple } from '../model/terms.js';
import { createLoadError } from '../types/errors.js';

export interface ParseTurtleOptions {
    /** Base IRI for relative references in the document. */
    baseIri?: string;
}

const RDF_XML_SUGGESTION = 'Convert the document to Turtle (.ttl) or N-Triples (.nt) first';

// n3 puts this before every label written in the document, never before the
// `n3-<counter>` labels it generates.
const WRITTEN_PREFIX = 'w_';

type LabelMap = (value: string) => string;

/**
 * Parse a Turtle or N-Triples document into triples.
 */
export function parseTurtle(text: string, options: ParseTurtleOptions = {}): Triple[] {
    const head = text.trimStart();
    if (head.startsWith('<?xml') || text.includes('<rdf:RDF')) {
        throw createLoadError('RDF/XML documents are not supported', RDF_XML_SUGGESTION);
    }

    const parser = new Parser({ baseIRI: options.baseIri, blankNodePrefix: WRITTEN_PREFIX });
    let quads: Quad[];
    try {
        quads = parser.parse(text);
    } catch (e) {
        throw createLoadError(
            `Failed to parse document: ${e instanceof Error ? e.message : String(e)}`,
            'Check the Turtle syntax near the reported line'
        );
    }

    const label = blankLabels(quads);
    return quads.map(quad => toTriple(quad, label));
}

/**
 * Written labels lose the parser prefix; generated ones keep their name
 * unless a written label already has it.
 */
function blankLabels(quads: Quad[]): LabelMap {
    const written = new Set<string>();
    for (const quad of quads) {
        for (const term of [quad.subject, quad.object]) {
            if (term.termType === 'BlankNode' && term.value.startsWith(WRITTEN_PREFIX)) {
                written.add(term.value.slice(WRITTEN_PREFIX.length));
            }
        }
    }

    const renamed = new Map<string, string>();
    return value => {
        if (value.startsWith(WRITTEN_PREFIX)) {
            return value.slice(WRITTEN_PREFIX.length);
        }
        let label = renamed.get(value);
        if (label === undefined) {
            label = value;
            for (let n = 1; written.has(label); n++) {
                label = `${value}_${n}`;
            }
            renamed.set(value, label);
        }
        return label;
    };
}

function toTriple(quad: Quad, label: LabelMap): Triple {
    if (quad.predicate.termType !== 'NamedNode') {
        throw createLoadError(`Unsupported predicate term ${quad.predicate.termType}`);
    }
    return triple(toSubject(quad, label), quad.predicate.value, toObject(quad, label));
}

function toSubject(quad: Quad, label: LabelMap): NodeRef {
    const { subject } = quad;
    switch (subject.termType) {
        case 'NamedNode':
            return iri(subject.value);
        case 'BlankNode':
            return blank(label(subject.value));
        default:
            throw createLoadError(`Unsupported subject term ${quad.subject.termType}`);
    }
}

function toObject(quad: Quad, label: LabelMap): ObjectTerm {
    const { object } = quad;
    switch (object.termType) {
        case 'NamedNode':
            return iri(object.value);
        case 'BlankNode':
            return blank(label(object.value));
        case 'Literal':
            return object.language
                ? literal(object.value, object.datatype.value, object.language)
                : literal(object.value, object.datatype.value);
        default:
            throw createLoadError(`Unsupported object term ${quad.object.termType}`);
    }
}
