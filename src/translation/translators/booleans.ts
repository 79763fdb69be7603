/**
 * Boolean and enumeration class-expression translators
 */

import type { ClassExpression, Individual } from '../../types/model.js';
import {
    createComplementOf,
    createIntersectionOf,
    createOneOf,
    createUnionOf,
} from '../../model/factory.js';
import { termKey } from '../../model/terms.js';
import { OWL } from '../../vocab/index.js';
import { required } from '../dependency.js';
import { readOperands, resolveEach, typeTriples, type Translator } from './common.js';

function naryClass(
    kind: string,
    predicate: string,
    create: (operands: ClassExpression[]) => ClassExpression
): Translator<ClassExpression> {
    return {
        kind,
        guard: (node, ctx) => ctx.store.has(node, predicate),
        build: (node, ctx) => {
            const { terms, triples } = readOperands(node, predicate, ctx);
            const operands = resolveEach(node, predicate, terms, ctx, term => ctx.resolver.resolveClassExpression(term));
            ctx.consume([...triples, ...typeTriples(node, ctx, OWL.Class)]);
            return create(operands);
        },
    };
}

export const objectIntersectionOf = naryClass('ObjectIntersectionOf', OWL.intersectionOf, createIntersectionOf);

export const objectUnionOf = naryClass('ObjectUnionOf', OWL.unionOf, createUnionOf);

export const objectComplementOf: Translator<ClassExpression> = {
    kind: 'ObjectComplementOf',
    guard: (node, ctx) => ctx.store.has(node, OWL.complementOf),
    build: (node, ctx) => {
        const triple = ctx.store.singletonTriple(node, OWL.complementOf);
        const operand = required(ctx.resolver.resolveClassExpression(triple.object), termKey(node));
        ctx.consume([triple, ...typeTriples(node, ctx, OWL.Class)]);
        return createComplementOf(operand);
    },
};

export const objectOneOf: Translator<ClassExpression> = {
    kind: 'ObjectOneOf',
    guard: (node, ctx) => ctx.store.has(node, OWL.oneOf),
    build: (node, ctx) => {
        const { terms, triples } = readOperands(node, OWL.oneOf, ctx);
        const individuals: Individual[] = resolveEach(node, OWL.oneOf, terms, ctx, term => ctx.resolver.resolveIndividual(term));
        ctx.consume([...triples, ...typeTriples(node, ctx, OWL.Class)]);
        return createOneOf(individuals);
    },
};
