/**
 * Tests for translator precedence and the no-match fallbacks
 */

import { TranslationContext } from '../src/translation/context.js';
import { TRANSLATORS, dispatch, selectTranslator } from '../src/translation/dispatcher.js';
import { translateDocument } from '../src/translation/assembler.js';
import { triple } from '../src/model/terms.js';
import { OWL, RDFS } from '../src/vocab/index.js';
import { b, ex, int, restriction, thrownDiagnostic, typed } from './fixtures.js';

describe('Translator precedence', () => {
    test('class expression translators are tried most specific first', () => {
        expect(TRANSLATORS.classExpression.map(t => t.kind)).toEqual([
            'ObjectHasSelf',
            'DataHasValue',
            'ObjectHasValue',
            'DataCardinality(exact qualified)',
            'ObjectCardinality(exact qualified)',
            'DataCardinality(min qualified)',
            'ObjectCardinality(min qualified)',
            'DataCardinality(max qualified)',
            'ObjectCardinality(max qualified)',
            'DataCardinality(exact)',
            'ObjectCardinality(exact)',
            'DataCardinality(min)',
            'ObjectCardinality(min)',
            'DataCardinality(max)',
            'ObjectCardinality(max)',
            'DataSomeValuesFrom',
            'ObjectSomeValuesFrom',
            'DataAllValuesFrom',
            'ObjectAllValuesFrom',
            'ObjectIntersectionOf',
            'ObjectUnionOf',
            'ObjectComplementOf',
            'ObjectOneOf',
        ]);
    });

    test('data range and property expression translators', () => {
        expect(TRANSLATORS.dataRange.map(t => t.kind)).toEqual([
            'DatatypeRestriction',
            'DataComplementOf',
            'DataOneOf',
            'DataIntersectionOf',
            'DataUnionOf',
        ]);
        expect(TRANSLATORS.propertyExpression.map(t => t.kind)).toEqual(['InverseObjectProperty']);
    });

    test('hasValue wins over someValuesFrom on the same node', () => {
        const ctx = new TranslationContext([
            ...restriction(b('r'), ex('p'), OWL.someValuesFrom, ex('C')),
            triple(b('r'), OWL.hasValue, ex('i')),
        ]);
        expect(selectTranslator('classExpression', b('r'), ctx)?.kind).toBe('ObjectHasValue');
    });

    test('a qualified cardinality wins over the unqualified form', () => {
        const ctx = new TranslationContext([
            ...restriction(b('r'), ex('p'), OWL.minQualifiedCardinality, int(1)),
            triple(b('r'), OWL.maxCardinality, int(3)),
            triple(b('r'), OWL.onClass, ex('C')),
        ]);
        expect(selectTranslator('classExpression', b('r'), ctx)?.kind).toBe('ObjectCardinality(min qualified)');
    });

    test('a data range node is matched by data range translators only', () => {
        const ctx = new TranslationContext([triple(b('d'), OWL.datatypeComplementOf, ex('T'))]);
        expect(selectTranslator('dataRange', b('d'), ctx)?.kind).toBe('DataComplementOf');
        expect(selectTranslator('classExpression', b('d'), ctx)).toBeUndefined();
    });

    test('leftover triples on an ambiguous node surface as residue', () => {
        const result = translateDocument([
            ...restriction(b('r'), ex('p'), OWL.someValuesFrom, ex('C')),
            triple(b('r'), OWL.hasValue, ex('i')),
        ]);
        expect(result.expressions).toEqual([{
            type: 'ObjectHasValue',
            property: { type: 'NamedObjectProperty', iri: 'http://example.org/p' },
            individual: { type: 'NamedIndividual', iri: 'http://example.org/i' },
        }]);
        expect(result.residue).toEqual([triple(b('r'), OWL.someValuesFrom, ex('C'))]);
    });
});

describe('dispatch', () => {
    test('builds with the selected translator', () => {
        const ctx = new TranslationContext(restriction(b('r'), ex('p'), OWL.allValuesFrom, ex('C')));
        expect(dispatch('classExpression', b('r'), ctx)).toEqual({
            type: 'ObjectAllValuesFrom',
            property: { type: 'NamedObjectProperty', iri: 'http://example.org/p' },
            filler: { type: 'NamedClass', iri: 'http://example.org/C' },
        });
    });

    test('a restriction no translator recognizes is malformed', () => {
        const ctx = new TranslationContext([typed(b('r'), OWL.Restriction), triple(b('r'), OWL.onProperty, ex('p'))]);
        const diagnostic = thrownDiagnostic(() => dispatch('classExpression', b('r'), ctx));
        expect(diagnostic).toMatchObject({
            code: 'MALFORMED_CONSTRUCT',
            message: 'Restriction _:r has no quantifier, value, self or cardinality triple',
            node: '_:r',
            predicate: OWL.Restriction,
        });
        expect(ctx.store.consumed()).toEqual([]);
    });

    test('any other unrecognized node is unsupported', () => {
        const ctx = new TranslationContext([triple(b('x'), RDFS.comment, ex('C'))]);
        const diagnostic = thrownDiagnostic(() => dispatch('classExpression', b('x'), ctx));
        expect(diagnostic).toMatchObject({
            code: 'UNSUPPORTED_CONSTRUCT',
            message: 'No translator recognizes _:x as a class expression',
            node: '_:x',
            details: { category: 'classExpression' },
        });
    });

    test('an unrecognized property expression is unsupported', () => {
        const ctx = new TranslationContext([typed(b('x'), OWL.Restriction)]);
        const diagnostic = thrownDiagnostic(() => dispatch('propertyExpression', b('x'), ctx));
        expect(diagnostic.code).toBe('UNSUPPORTED_CONSTRUCT');
        expect(diagnostic.message).toBe('No translator recognizes _:x as a property expression');
    });
});
