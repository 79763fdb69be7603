import type { ObjectTerm } from '../types/rdf.js';

/**
 * Local name of an IRI: the part after the last '#' or '/'.
 * Falls back to the full IRI when that part is empty.
 */
export function shortForm(iri: string): string {
    const cut = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'));
    const local = cut >= 0 ? iri.substring(cut + 1) : iri;
    return local.length > 0 ? local : iri;
}

/**
 * Short human-readable form of any term, for diagnostic messages.
 */
export function describeTerm(term: ObjectTerm): string {
    switch (term.type) {
        case 'iri':
            return `:${shortForm(term.value)}`;
        case 'blank':
            return `_:${term.value}`;
        case 'literal':
            return term.language ? `"${term.value}"@${term.language}` : `"${term.value}"`;
    }
}
