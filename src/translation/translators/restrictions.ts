/**
 * Restriction translators
 *
 * All restrictions share the `owl:onProperty` triple and differ in the
 * predicate that carries their filler. Object and data variants have the same
 * algorithm and differ only in how the property and filler are resolved.
 */

import type { TranslationContext } from '../context.js';
import type {
    CardinalityKind,
    ClassExpression,
    DataRange,
    NamedDataProperty,
    ObjectPropertyExpression,
} from '../../types/model.js';
import type { BlankNode, ObjectTerm, Triple } from '../../types/rdf.js';
import {
    createAllValuesFrom,
    createDataAllValuesFrom,
    createDataCardinality,
    createDataHasValue,
    createDataSomeValuesFrom,
    createHasSelf,
    createHasValue,
    createObjectCardinality,
    createSomeValuesFrom,
} from '../../model/factory.js';
import { termKey } from '../../model/terms.js';
import { createMalformedError } from '../../types/errors.js';
import { OWL } from '../../vocab/index.js';
import { required } from '../dependency.js';
import { isDataRestriction, parseCardinality, typeTriples, type Translator } from './common.js';

/**
 * How one family of restrictions resolves its property and its filler.
 */
interface RestrictionShape<P, F> {
    readonly data: boolean;
    readonly fillerPredicate: string;
    resolveProperty(term: ObjectTerm, ctx: TranslationContext): P | undefined;
    resolveFiller(term: ObjectTerm, ctx: TranslationContext): F | undefined;
}

const OBJECT_SHAPE: RestrictionShape<ObjectPropertyExpression, ClassExpression> = {
    data: false,
    fillerPredicate: OWL.onClass,
    resolveProperty: (term, ctx) => ctx.resolver.resolveObjectProperty(term),
    resolveFiller: (term, ctx) => ctx.resolver.resolveClassExpression(term),
};

const DATA_SHAPE: RestrictionShape<NamedDataProperty, DataRange> = {
    data: true,
    fillerPredicate: OWL.onDataRange,
    resolveProperty: (term, ctx) => ctx.resolver.resolveDataProperty(term),
    resolveFiller: (term, ctx) => ctx.resolver.resolveDataRange(term),
};

function restrictionTriples(node: BlankNode, ctx: TranslationContext): Triple[] {
    return typeTriples(node, ctx, OWL.Restriction);
}

function translateOnProperty<P>(node: BlankNode, ctx: TranslationContext, shape: RestrictionShape<P, unknown>): { property: P; triple: Triple } {
    const triple = ctx.store.singletonTriple(node, OWL.onProperty);
    const property = required(shape.resolveProperty(triple.object, ctx), termKey(node));
    return { property, triple };
}

/**
 * Quantified restriction: read the filler, translate the property, resolve
 * the filler, then build with the construct's own constructor.
 */
function quantified<P, F>(
    kind: string,
    predicate: string,
    shape: RestrictionShape<P, F>,
    create: (property: P, filler: F) => ClassExpression
): Translator<ClassExpression> {
    return {
        kind,
        guard: (node, ctx) => ctx.store.has(node, predicate) && isDataRestriction(node, ctx) === shape.data,
        build: (node, ctx) => {
            const fillerTriple = ctx.store.singletonTriple(node, predicate);
            const { property, triple } = translateOnProperty(node, ctx, shape);
            const filler = required(shape.resolveFiller(fillerTriple.object, ctx), termKey(node));
            ctx.consume([fillerTriple, triple, ...restrictionTriples(node, ctx)]);
            return create(property, filler);
        },
    };
}

function cardinality<P, F>(
    kind: string,
    predicate: string,
    cardinalityKind: CardinalityKind,
    qualified: boolean,
    shape: RestrictionShape<P, F>,
    create: (kind: CardinalityKind, property: P, n: number, filler?: F) => ClassExpression
): Translator<ClassExpression> {
    return {
        kind,
        guard: (node, ctx) => ctx.store.has(node, predicate) && isDataRestriction(node, ctx) === shape.data,
        build: (node, ctx) => {
            const valueTriple = ctx.store.singletonTriple(node, predicate);
            const n = parseCardinality(valueTriple);
            const consumed = [valueTriple];

            let fillerTriple: Triple | undefined;
            if (qualified) {
                fillerTriple = ctx.store.optionalTriple(node, shape.fillerPredicate);
                if (!fillerTriple) {
                    throw createMalformedError(
                        `Qualified cardinality on ${termKey(node)} has no <${shape.fillerPredicate}> triple`,
                        termKey(node),
                        shape.fillerPredicate
                    );
                }
            }

            const { property, triple } = translateOnProperty(node, ctx, shape);
            consumed.push(triple);

            let filler: F | undefined;
            if (fillerTriple) {
                filler = required(shape.resolveFiller(fillerTriple.object, ctx), termKey(node));
                consumed.push(fillerTriple);
            }

            ctx.consume([...consumed, ...restrictionTriples(node, ctx)]);
            return create(cardinalityKind, property, n, filler);
        },
    };
}

const objectHasValue: Translator<ClassExpression> = {
    kind: 'ObjectHasValue',
    guard: (node, ctx) => ctx.store.has(node, OWL.hasValue) && !isDataRestriction(node, ctx),
    build: (node, ctx) => {
        const valueTriple = ctx.store.singletonTriple(node, OWL.hasValue);
        const { property, triple } = translateOnProperty(node, ctx, OBJECT_SHAPE);
        const individual = required(ctx.resolver.resolveIndividual(valueTriple.object), termKey(node));
        ctx.consume([valueTriple, triple, ...restrictionTriples(node, ctx)]);
        return createHasValue(property, individual);
    },
};

const dataHasValue: Translator<ClassExpression> = {
    kind: 'DataHasValue',
    guard: (node, ctx) => ctx.store.has(node, OWL.hasValue) && isDataRestriction(node, ctx),
    build: (node, ctx) => {
        const valueTriple = ctx.store.singletonTriple(node, OWL.hasValue);
        const { property, triple } = translateOnProperty(node, ctx, DATA_SHAPE);
        const value = required(ctx.resolver.resolveLiteral(valueTriple.object), termKey(node));
        ctx.consume([valueTriple, triple, ...restrictionTriples(node, ctx)]);
        return createDataHasValue(property, value);
    },
};

const objectHasSelf: Translator<ClassExpression> = {
    kind: 'ObjectHasSelf',
    guard: (node, ctx) => ctx.store.has(node, OWL.hasSelf),
    build: (node, ctx) => {
        const selfTriple = ctx.store.singletonTriple(node, OWL.hasSelf);
        const { object } = selfTriple;
        if (object.type !== 'literal' || !['true', '1'].includes(object.value)) {
            throw createMalformedError(
                `<${OWL.hasSelf}> on ${termKey(node)} must be the literal true`,
                termKey(node),
                OWL.hasSelf
            );
        }
        const { property, triple } = translateOnProperty(node, ctx, OBJECT_SHAPE);
        ctx.consume([selfTriple, triple, ...restrictionTriples(node, ctx)]);
        return createHasSelf(property);
    },
};

const CARDINALITY_PREDICATES: ReadonlyArray<{ predicate: string; kind: CardinalityKind; qualified: boolean }> = [
    { predicate: OWL.qualifiedCardinality, kind: 'exact', qualified: true },
    { predicate: OWL.minQualifiedCardinality, kind: 'min', qualified: true },
    { predicate: OWL.maxQualifiedCardinality, kind: 'max', qualified: true },
    { predicate: OWL.cardinality, kind: 'exact', qualified: false },
    { predicate: OWL.minCardinality, kind: 'min', qualified: false },
    { predicate: OWL.maxCardinality, kind: 'max', qualified: false },
];

/**
 * Cardinality translators, qualified forms first, data before object within
 * each predicate.
 */
export const CARDINALITY_TRANSLATORS: ReadonlyArray<Translator<ClassExpression>> = CARDINALITY_PREDICATES.flatMap(
    ({ predicate, kind, qualified }) => {
        const suffix = `${kind}${qualified ? ' qualified' : ''}`;
        return [
            cardinality(`DataCardinality(${suffix})`, predicate, kind, qualified, DATA_SHAPE, createDataCardinality),
            cardinality(`ObjectCardinality(${suffix})`, predicate, kind, qualified, OBJECT_SHAPE, createObjectCardinality),
        ];
    }
);

export const HAS_SELF_TRANSLATORS: ReadonlyArray<Translator<ClassExpression>> = [objectHasSelf];

export const HAS_VALUE_TRANSLATORS: ReadonlyArray<Translator<ClassExpression>> = [dataHasValue, objectHasValue];

export const SOME_VALUES_TRANSLATORS: ReadonlyArray<Translator<ClassExpression>> = [
    quantified('DataSomeValuesFrom', OWL.someValuesFrom, DATA_SHAPE, createDataSomeValuesFrom),
    quantified('ObjectSomeValuesFrom', OWL.someValuesFrom, OBJECT_SHAPE, createSomeValuesFrom),
];

export const ALL_VALUES_TRANSLATORS: ReadonlyArray<Translator<ClassExpression>> = [
    quantified('DataAllValuesFrom', OWL.allValuesFrom, DATA_SHAPE, createDataAllValuesFrom),
    quantified('ObjectAllValuesFrom', OWL.allValuesFrom, OBJECT_SHAPE, createAllValuesFrom),
];
