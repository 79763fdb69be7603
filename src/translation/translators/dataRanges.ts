/**
 * Data range translators
 */

import type { DataRange, FacetRestriction, Literal } from '../../types/model.js';
import type { Triple } from '../../types/rdf.js';
import { createDatatype } from '../../model/factory.js';
import { termKey } from '../../model/terms.js';
import { createMalformedError, createUnsupportedError } from '../../types/errors.js';
import { shortForm } from '../../utils/shortForm.js';
import { OWL, RDFS, XSD_FACETS } from '../../vocab/index.js';
import { required } from '../dependency.js';
import { readList } from '../lists.js';
import { readOperands, resolveEach, typeTriples, type Translator } from './common.js';

export const datatypeRestriction: Translator<DataRange> = {
    kind: 'DatatypeRestriction',
    guard: (node, ctx) => ctx.store.has(node, OWL.onDatatype),
    build: (node, ctx) => {
        const datatypeTriple = ctx.store.singletonTriple(node, OWL.onDatatype);
        if (datatypeTriple.object.type !== 'iri') {
            throw createMalformedError(
                `<${OWL.onDatatype}> on ${termKey(node)} must name a datatype`,
                termKey(node),
                OWL.onDatatype
            );
        }
        const restrictionsTriple = ctx.store.singletonTriple(node, OWL.withRestrictions);
        const list = readList(restrictionsTriple.object, ctx);

        const facets: FacetRestriction[] = [];
        const facetTriples: Triple[] = [];
        for (const item of list.items) {
            const itemKey = termKey(item);
            const triples = item.type === 'literal' ? [] : ctx.store.match({ subject: item });
            if (item.type !== 'blank' || triples.length !== 1) {
                throw createMalformedError(
                    `Facet ${itemKey} of ${termKey(node)} must be a blank node with exactly one facet triple`,
                    termKey(node),
                    OWL.withRestrictions
                );
            }
            const [facetTriple] = triples;
            if (!XSD_FACETS.has(facetTriple.predicate)) {
                throw createUnsupportedError(
                    `Facet ${shortForm(facetTriple.predicate)} on ${termKey(node)} is not a known constraining facet`,
                    termKey(node),
                    facetTriple.predicate
                );
            }
            const value = facetTriple.object;
            if (value.type !== 'literal') {
                throw createMalformedError(
                    `Facet ${shortForm(facetTriple.predicate)} on ${termKey(node)} must have a literal value`,
                    itemKey,
                    facetTriple.predicate
                );
            }
            facets.push({ facet: facetTriple.predicate, value: required(ctx.resolver.resolveLiteral(value)) });
            facetTriples.push(facetTriple);
        }

        ctx.consume([
            datatypeTriple,
            restrictionsTriple,
            ...list.triples,
            ...facetTriples,
            ...typeTriples(node, ctx, RDFS.Datatype),
        ]);
        return { type: 'DatatypeRestriction', datatype: createDatatype(datatypeTriple.object.value), facets };
    },
};

export const dataComplementOf: Translator<DataRange> = {
    kind: 'DataComplementOf',
    guard: (node, ctx) => ctx.store.has(node, OWL.datatypeComplementOf),
    build: (node, ctx) => {
        const triple = ctx.store.singletonTriple(node, OWL.datatypeComplementOf);
        const operand = required(ctx.resolver.resolveDataRange(triple.object), termKey(node));
        ctx.consume([triple, ...typeTriples(node, ctx, RDFS.Datatype)]);
        return { type: 'DataComplementOf', operand };
    },
};

export const dataOneOf: Translator<DataRange> = {
    kind: 'DataOneOf',
    guard: (node, ctx) => ctx.store.has(node, OWL.oneOf),
    build: (node, ctx) => {
        const { terms, triples } = readOperands(node, OWL.oneOf, ctx);
        const values: Literal[] = resolveEach(node, OWL.oneOf, terms, ctx, term => ctx.resolver.resolveLiteral(term));
        ctx.consume([...triples, ...typeTriples(node, ctx, RDFS.Datatype)]);
        return { type: 'DataOneOf', values };
    },
};

function naryData(kind: 'DataIntersectionOf' | 'DataUnionOf', predicate: string): Translator<DataRange> {
    return {
        kind,
        guard: (node, ctx) => ctx.store.has(node, predicate),
        build: (node, ctx) => {
            const { terms, triples } = readOperands(node, predicate, ctx);
            const operands = resolveEach(node, predicate, terms, ctx, term => ctx.resolver.resolveDataRange(term));
            ctx.consume([...triples, ...typeTriples(node, ctx, RDFS.Datatype)]);
            return kind === 'DataIntersectionOf'
                ? { type: 'DataIntersectionOf', operands }
                : { type: 'DataUnionOf', operands };
        },
    };
}

export const dataIntersectionOf = naryData('DataIntersectionOf', OWL.intersectionOf);

export const dataUnionOf = naryData('DataUnionOf', OWL.unionOf);
