/**
 * Translator Dispatcher
 *
 * Picks the translator for an anonymous main node. Registries are closed,
 * ordered lists: guards are tried in the order below and the first match
 * builds. The order never depends on how the triples were inserted.
 *
 * Class expressions, most specific pattern first:
 *   1. owl:hasSelf
 *   2. owl:hasValue               (data, then object)
 *   3. qualified cardinality      (exact, min, max; data, then object)
 *   4. unqualified cardinality    (exact, min, max; data, then object)
 *   5. owl:someValuesFrom         (data, then object)
 *   6. owl:allValuesFrom          (data, then object)
 *   7. owl:intersectionOf
 *   8. owl:unionOf
 *   9. owl:complementOf
 *  10. owl:oneOf
 *
 * Data ranges: onDatatype, datatypeComplementOf, oneOf, intersectionOf, unionOf.
 * Property expressions: inverseOf.
 */

import type { TranslationContext } from './context.js';
import type { ClassExpression, DataRange, ObjectPropertyExpression } from '../types/model.js';
import type { BlankNode } from '../types/rdf.js';
import { iri, termKey } from '../model/terms.js';
import { createMalformedError, createUnsupportedError } from '../types/errors.js';
import { OWL, RDF } from '../vocab/index.js';
import type { Translator } from './translators/common.js';
import {
    ALL_VALUES_TRANSLATORS,
    CARDINALITY_TRANSLATORS,
    HAS_SELF_TRANSLATORS,
    HAS_VALUE_TRANSLATORS,
    SOME_VALUES_TRANSLATORS,
} from './translators/restrictions.js';
import { objectComplementOf, objectIntersectionOf, objectOneOf, objectUnionOf } from './translators/booleans.js';
import {
    dataComplementOf,
    dataIntersectionOf,
    dataOneOf,
    dataUnionOf,
    datatypeRestriction,
} from './translators/dataRanges.js';
import { inverseObjectProperty } from './translators/properties.js';

export interface DispatchResult {
    classExpression: ClassExpression;
    dataRange: DataRange;
    propertyExpression: ObjectPropertyExpression;
}

export type DispatchCategory = keyof DispatchResult;

type Registry = { readonly [K in DispatchCategory]: ReadonlyArray<Translator<DispatchResult[K]>> };

export const TRANSLATORS: Registry = {
    classExpression: [
        ...HAS_SELF_TRANSLATORS,
        ...HAS_VALUE_TRANSLATORS,
        ...CARDINALITY_TRANSLATORS,
        ...SOME_VALUES_TRANSLATORS,
        ...ALL_VALUES_TRANSLATORS,
        objectIntersectionOf,
        objectUnionOf,
        objectComplementOf,
        objectOneOf,
    ],
    dataRange: [
        datatypeRestriction,
        dataComplementOf,
        dataOneOf,
        dataIntersectionOf,
        dataUnionOf,
    ],
    propertyExpression: [
        inverseObjectProperty,
    ],
};

const CATEGORY_LABELS: Record<DispatchCategory, string> = {
    classExpression: 'class expression',
    dataRange: 'data range',
    propertyExpression: 'property expression',
};

/**
 * The first translator in precedence order whose guard accepts the node.
 */
export function selectTranslator<K extends DispatchCategory>(
    category: K,
    node: BlankNode,
    ctx: TranslationContext
): Translator<DispatchResult[K]> | undefined {
    const translators: ReadonlyArray<Translator<DispatchResult[K]>> = TRANSLATORS[category];
    return translators.find(translator => translator.guard(node, ctx));
}

/**
 * Translate an anonymous node with the first matching translator.
 * When nothing matches, no triple of the node is consumed.
 */
export function dispatch<K extends DispatchCategory>(
    category: K,
    node: BlankNode,
    ctx: TranslationContext
): DispatchResult[K] {
    const translator = selectTranslator(category, node, ctx);
    if (translator) {
        return translator.build(node, ctx);
    }

    const key = termKey(node);
    if (category === 'classExpression' && ctx.store.has(node, RDF.type, iri(OWL.Restriction))) {
        throw createMalformedError(
            `Restriction ${key} has no quantifier, value, self or cardinality triple`,
            key,
            OWL.Restriction
        );
    }
    throw createUnsupportedError(
        `No translator recognizes ${key} as a ${CATEGORY_LABELS[category]}`,
        key,
        undefined,
        { category }
    );
}
