/**
 * Tests for the axiom assembler
 */

import { translateDocument } from '../src/lib.js';
import { iri, literal, triple } from '../src/model/terms.js';
import type { TranslationDiagnostic } from '../src/types/errors.js';
import { OWL, RDF, RDFS, XSD } from '../src/vocab/index.js';
import { axiomsOfType, b, codes, EX, ex, exIri, list, pizzaGraph, restriction, str, typed, withCode } from './fixtures.js';

const named = (type: string, local: string) => ({ type, iri: `${EX}${local}` });

describe('translateDocument', () => {
    test('translates a small ontology completely', () => {
        const result = translateDocument(pizzaGraph());

        expect(result.axioms.map(a => a.type)).toEqual([
            'Declaration',
            'Declaration',
            'Declaration',
            'Declaration',
            'Declaration',
            'ObjectPropertyCharacteristic',
            'SubClassOf',
            'SubClassOf',
            'ObjectPropertyDomain',
            'DataPropertyRange',
            'AnnotationAssertion',
            'DataPropertyAssertion',
            'ClassAssertion',
        ]);
        expect(axiomsOfType(result.axioms, 'Declaration')).toEqual([
            { type: 'Declaration', kind: 'Class', iri: `${EX}Margherita` },
            { type: 'Declaration', kind: 'Class', iri: `${EX}Pizza` },
            { type: 'Declaration', kind: 'Class', iri: `${EX}Topping` },
            { type: 'Declaration', kind: 'ObjectProperty', iri: `${EX}hasTopping` },
            { type: 'Declaration', kind: 'DataProperty', iri: `${EX}price` },
        ]);
        expect(axiomsOfType(result.axioms, 'SubClassOf')[1]).toEqual({
            type: 'SubClassOf',
            subClass: named('NamedClass', 'Margherita'),
            superClass: {
                type: 'ObjectSomeValuesFrom',
                property: named('NamedObjectProperty', 'hasTopping'),
                filler: {
                    type: 'ObjectUnionOf',
                    operands: [named('NamedClass', 'Mozzarella'), named('NamedClass', 'Tomato')],
                },
            },
        });
        expect(axiomsOfType(result.axioms, 'DataPropertyRange')).toEqual([{
            type: 'DataPropertyRange',
            property: named('NamedDataProperty', 'price'),
            range: { type: 'NamedDatatype', iri: XSD.integer },
        }]);
        expect(axiomsOfType(result.axioms, 'AnnotationAssertion')).toEqual([{
            type: 'AnnotationAssertion',
            property: { type: 'NamedAnnotationProperty', iri: RDFS.label },
            subject: { type: 'IRI', iri: `${EX}Pizza` },
            value: { type: 'Literal', lexicalForm: 'Pizza', datatype: RDF.langString, language: 'en' },
        }]);
        expect(axiomsOfType(result.axioms, 'DataPropertyAssertion')).toEqual([{
            type: 'DataPropertyAssertion',
            property: named('NamedDataProperty', 'price'),
            subject: named('NamedIndividual', 'm1'),
            value: { type: 'Literal', lexicalForm: '9', datatype: XSD.integer },
        }]);
        expect(result.ontology).toEqual({ iri: `${EX}pizza`, imports: [] });
        expect(result.expressions).toEqual([]);
        expect(result.residue).toEqual([]);
        expect(result.diagnostics).toEqual([]);
    });

    describe('scenarios', () => {
        test('a dangling restriction is produced with an empty residue', () => {
            const result = translateDocument(restriction(b('r'), ex('hasPart'), OWL.someValuesFrom, ex('Engine')));
            expect(result.expressions).toEqual([{
                type: 'ObjectSomeValuesFrom',
                property: named('NamedObjectProperty', 'hasPart'),
                filler: named('NamedClass', 'Engine'),
            }]);
            expect(result.residue).toEqual([]);
            expect(result.diagnostics).toEqual([]);
        });

        test('a restriction missing someValuesFrom is malformed and left as residue', () => {
            const result = translateDocument([
                typed(b('r'), OWL.Restriction),
                triple(b('r'), OWL.onProperty, ex('hasPart')),
            ]);
            expect(result.expressions).toEqual([]);
            expect(withCode(result.diagnostics, 'MALFORMED_CONSTRUCT')).toHaveLength(1);
            expect(withCode(result.diagnostics, 'MALFORMED_CONSTRUCT')[0].node).toBe('_:r');
            expect(result.residue).toEqual([
                typed(b('r'), OWL.Restriction),
                triple(b('r'), OWL.onProperty, ex('hasPart')),
            ]);
        });

        test('a self-referential restriction ends in a cyclic diagnostic', () => {
            const result = translateDocument(restriction(b('a'), ex('p'), OWL.someValuesFrom, b('a')));
            expect(codes(result.diagnostics)).toEqual(['CYCLIC_CONSTRUCT', 'RESIDUE_TRIPLES']);
            expect(result.diagnostics[0].node).toBe('_:a');
            expect(result.expressions).toEqual([]);
            expect(result.residue).toHaveLength(3);
        });
    });

    test('the residue diagnostic carries the count', () => {
        const result = translateDocument([
            typed(b('r'), OWL.Restriction),
            triple(b('r'), OWL.onProperty, ex('hasPart')),
        ]);
        expect(result.diagnostics[result.diagnostics.length - 1]).toEqual({
            code: 'RESIDUE_TRIPLES',
            message: '2 triples could not be assigned to any axiom',
            details: { count: 2 },
        });
    });

    test('a failed axiom leaves its own triple unconsumed', () => {
        const result = translateDocument([
            triple(ex('A'), RDFS.subClassOf, b('r')),
            typed(b('r'), OWL.Restriction),
            triple(b('r'), OWL.onProperty, ex('p')),
        ]);
        expect(axiomsOfType(result.axioms, 'SubClassOf')).toEqual([]);
        expect(codes(result.diagnostics)).toEqual(['MALFORMED_CONSTRUCT', 'RESIDUE_TRIPLES']);
        expect(result.residue).toHaveLength(3);
        expect(result.residue).toContainEqual(triple(ex('A'), RDFS.subClassOf, b('r')));
    });

    test('a part that succeeded in an abandoned axiom is still returned', () => {
        const result = translateDocument([
            ...restriction(b('r'), ex('p'), OWL.someValuesFrom, ex('C')),
            triple(b('r'), RDFS.subClassOf, str('not a class')),
        ]);
        expect(result.axioms).toEqual([]);
        expect(result.expressions).toEqual([{
            type: 'ObjectSomeValuesFrom',
            property: named('NamedObjectProperty', 'p'),
            filler: named('NamedClass', 'C'),
        }]);
        expect(result.residue).toEqual([triple(b('r'), RDFS.subClassOf, str('not a class'))]);
        expect(codes(result.diagnostics)).toEqual(['UNSUPPORTED_CONSTRUCT', 'RESIDUE_TRIPLES']);
    });

    test('orphan translation can be switched off', () => {
        const triples = restriction(b('r'), ex('p'), OWL.someValuesFrom, ex('C'));
        const result = translateDocument(triples, { translateOrphans: false });
        expect(result.expressions).toEqual([]);
        expect(result.residue).toHaveLength(3);
    });

    test('reports diagnostics and progress through callbacks', () => {
        const seen: TranslationDiagnostic[] = [];
        const progress: Array<[number | undefined, string]> = [];
        translateDocument([typed(b('r'), OWL.Restriction), triple(b('r'), OWL.onProperty, ex('p'))], {
            onDiagnostic: d => seen.push(d),
            onProgress: (p, message) => progress.push([p, message]),
        });
        expect(codes(seen)).toEqual(['MALFORMED_CONSTRUCT', 'RESIDUE_TRIPLES']);
        expect(progress).toHaveLength(9);
        expect(progress[0]).toEqual([0, 'Reading ontology header']);
        expect(progress[8]).toEqual([1, 'Translation complete']);
    });
});

describe('Ontology header and declarations', () => {
    test('reads the ontology IRI, version and imports', () => {
        const result = translateDocument([
            typed(ex('onto'), OWL.Ontology),
            triple(ex('onto'), OWL.versionIRI, ex('onto/1.0')),
            triple(ex('onto'), OWL.imports, ex('base')),
            triple(ex('onto'), OWL.imports, ex('extra')),
        ]);
        expect(result.ontology).toEqual({
            iri: `${EX}onto`,
            versionIri: `${EX}onto/1.0`,
            imports: [`${EX}base`, `${EX}extra`],
        });
        expect(result.residue).toEqual([]);
    });

    test('declares every entity kind', () => {
        const result = translateDocument([
            typed(ex('C'), OWL.Class),
            typed(ex('op'), OWL.ObjectProperty),
            typed(ex('dp'), OWL.DatatypeProperty),
            typed(ex('ap'), OWL.AnnotationProperty),
            typed(ex('i'), OWL.NamedIndividual),
            typed(ex('T'), RDFS.Datatype),
        ]);
        expect(result.axioms).toEqual([
            { type: 'Declaration', kind: 'Class', iri: `${EX}C` },
            { type: 'Declaration', kind: 'ObjectProperty', iri: `${EX}op` },
            { type: 'Declaration', kind: 'DataProperty', iri: `${EX}dp` },
            { type: 'Declaration', kind: 'AnnotationProperty', iri: `${EX}ap` },
            { type: 'Declaration', kind: 'NamedIndividual', iri: `${EX}i` },
            { type: 'Declaration', kind: 'Datatype', iri: `${EX}T` },
        ]);
    });
});

describe('Property axioms', () => {
    test('characteristics of object and data properties', () => {
        const result = translateDocument([
            typed(ex('age'), OWL.DatatypeProperty),
            typed(ex('age'), OWL.FunctionalProperty),
            typed(ex('knows'), OWL.SymmetricProperty),
            triple(b('inv'), OWL.inverseOf, ex('hasParent')),
            typed(b('inv'), OWL.InverseFunctionalProperty),
        ]);
        expect(axiomsOfType(result.axioms, 'FunctionalDataProperty')).toEqual([
            { type: 'FunctionalDataProperty', property: named('NamedDataProperty', 'age') },
        ]);
        expect(axiomsOfType(result.axioms, 'ObjectPropertyCharacteristic')).toEqual([
            {
                type: 'ObjectPropertyCharacteristic',
                characteristic: 'InverseFunctional',
                property: { type: 'InverseObjectProperty', property: named('NamedObjectProperty', 'hasParent') },
            },
            {
                type: 'ObjectPropertyCharacteristic',
                characteristic: 'Symmetric',
                property: named('NamedObjectProperty', 'knows'),
            },
        ]);
        expect(result.residue).toEqual([]);
    });

    test('sub-properties, chains, inverses and disjointness', () => {
        const chain = list('c', [ex('hasParent'), ex('hasBrother')]);
        const result = translateDocument([
            triple(ex('hasMother'), RDFS.subPropertyOf, ex('hasParent')),
            triple(ex('hasUncle'), OWL.propertyChainAxiom, chain.head),
            ...chain.triples,
            triple(ex('hasChild'), OWL.inverseOf, ex('hasParent')),
            typed(ex('height'), OWL.DatatypeProperty),
            triple(ex('height'), OWL.propertyDisjointWith, ex('weight')),
            triple(ex('likes'), OWL.equivalentProperty, ex('enjoys')),
        ]);
        expect(axiomsOfType(result.axioms, 'SubObjectPropertyOf')).toEqual([{
            type: 'SubObjectPropertyOf',
            subProperty: named('NamedObjectProperty', 'hasMother'),
            superProperty: named('NamedObjectProperty', 'hasParent'),
        }]);
        expect(axiomsOfType(result.axioms, 'SubPropertyChainOf')).toEqual([{
            type: 'SubPropertyChainOf',
            chain: [named('NamedObjectProperty', 'hasParent'), named('NamedObjectProperty', 'hasBrother')],
            superProperty: named('NamedObjectProperty', 'hasUncle'),
        }]);
        expect(axiomsOfType(result.axioms, 'InverseObjectProperties')).toEqual([{
            type: 'InverseObjectProperties',
            first: named('NamedObjectProperty', 'hasChild'),
            second: named('NamedObjectProperty', 'hasParent'),
        }]);
        expect(axiomsOfType(result.axioms, 'DisjointDataProperties')).toEqual([{
            type: 'DisjointDataProperties',
            properties: [named('NamedDataProperty', 'height'), named('NamedDataProperty', 'weight')],
        }]);
        expect(axiomsOfType(result.axioms, 'EquivalentObjectProperties')).toEqual([{
            type: 'EquivalentObjectProperties',
            properties: [named('NamedObjectProperty', 'likes'), named('NamedObjectProperty', 'enjoys')],
        }]);
        expect(result.residue).toEqual([]);
    });

    test('domain and range follow the property kind', () => {
        const result = translateDocument([
            typed(ex('age'), OWL.DatatypeProperty),
            triple(ex('age'), RDFS.domain, ex('Person')),
            triple(ex('owns'), RDFS.range, ex('Thing')),
            triple(ex('code'), RDFS.range, iri(XSD.string)),
        ]);
        expect(axiomsOfType(result.axioms, 'DataPropertyDomain')).toEqual([{
            type: 'DataPropertyDomain',
            property: named('NamedDataProperty', 'age'),
            domain: named('NamedClass', 'Person'),
        }]);
        expect(axiomsOfType(result.axioms, 'DataPropertyRange')).toEqual([{
            type: 'DataPropertyRange',
            property: named('NamedDataProperty', 'code'),
            range: { type: 'NamedDatatype', iri: XSD.string },
        }]);
        expect(axiomsOfType(result.axioms, 'ObjectPropertyRange')).toEqual([{
            type: 'ObjectPropertyRange',
            property: named('NamedObjectProperty', 'owns'),
            range: named('NamedClass', 'Thing'),
        }]);
    });

    test('annotation property axioms are unsupported', () => {
        const result = translateDocument([
            typed(ex('note'), OWL.AnnotationProperty),
            triple(ex('note'), RDFS.subPropertyOf, iri(RDFS.comment)),
        ]);
        expect(withCode(result.diagnostics, 'UNSUPPORTED_CONSTRUCT')).toEqual([{
            code: 'UNSUPPORTED_CONSTRUCT',
            message: `Annotation property axiom on <${EX}note> cannot be represented`,
            node: `<${EX}note>`,
            predicate: RDFS.subPropertyOf,
            details: undefined,
        }]);
        expect(result.residue).toEqual([triple(ex('note'), RDFS.subPropertyOf, iri(RDFS.comment))]);
    });
});

describe('Class axioms', () => {
    test('equivalence, disjointness, disjoint unions and keys', () => {
        const parts = list('u', [ex('Mother'), ex('Father')]);
        const key = list('k', [ex('ssn'), ex('knows')]);
        const result = translateDocument([
            triple(ex('Human'), OWL.equivalentClass, ex('Person')),
            triple(ex('Cat'), OWL.disjointWith, ex('Dog')),
            triple(ex('Parent'), OWL.disjointUnionOf, parts.head),
            ...parts.triples,
            typed(ex('ssn'), OWL.DatatypeProperty),
            triple(ex('Person'), OWL.hasKey, key.head),
            ...key.triples,
        ]);
        expect(axiomsOfType(result.axioms, 'EquivalentClasses')).toEqual([{
            type: 'EquivalentClasses',
            classes: [named('NamedClass', 'Human'), named('NamedClass', 'Person')],
        }]);
        expect(axiomsOfType(result.axioms, 'DisjointClasses')).toEqual([{
            type: 'DisjointClasses',
            classes: [named('NamedClass', 'Cat'), named('NamedClass', 'Dog')],
        }]);
        expect(axiomsOfType(result.axioms, 'DisjointUnion')).toEqual([{
            type: 'DisjointUnion',
            owner: named('NamedClass', 'Parent'),
            classes: [named('NamedClass', 'Mother'), named('NamedClass', 'Father')],
        }]);
        expect(axiomsOfType(result.axioms, 'HasKey')).toEqual([{
            type: 'HasKey',
            classExpression: named('NamedClass', 'Person'),
            objectProperties: [named('NamedObjectProperty', 'knows')],
            dataProperties: [named('NamedDataProperty', 'ssn')],
        }]);
        expect(result.residue).toEqual([]);
    });

    test('explicit axiom nodes', () => {
        const classes = list('c', [ex('A'), ex('B'), ex('C')]);
        const people = list('p', [ex('ann'), ex('bob')]);
        const result = translateDocument([
            typed(b('dc'), OWL.AllDisjointClasses),
            triple(b('dc'), OWL.members, classes.head),
            ...classes.triples,
            typed(b('ad'), OWL.AllDifferent),
            triple(b('ad'), OWL.distinctMembers, people.head),
            ...people.triples,
        ]);
        expect(result.axioms).toEqual([
            {
                type: 'DisjointClasses',
                classes: [named('NamedClass', 'A'), named('NamedClass', 'B'), named('NamedClass', 'C')],
            },
            {
                type: 'DifferentIndividuals',
                individuals: [named('NamedIndividual', 'ann'), named('NamedIndividual', 'bob')],
            },
        ]);
        expect(result.residue).toEqual([]);
    });
});

describe('Assertions', () => {
    test('class, property, identity and annotation assertions', () => {
        const result = translateDocument([
            typed(ex('note'), OWL.AnnotationProperty),
            triple(ex('ann'), RDF.type, ex('Person')),
            triple(ex('ann'), exIri('knows'), ex('bob')),
            triple(ex('ann'), exIri('age'), literal('42', XSD.integer)),
            triple(ex('ann'), OWL.sameAs, ex('anna')),
            triple(ex('ann'), OWL.differentFrom, ex('bob')),
            triple(ex('ann'), exIri('note'), str('met at the conference')),
        ]);
        expect(result.axioms.map(a => a.type)).toEqual([
            'Declaration',
            'DataPropertyAssertion',
            'ObjectPropertyAssertion',
            'AnnotationAssertion',
            'ClassAssertion',
            'DifferentIndividuals',
            'SameIndividual',
        ]);
        expect(axiomsOfType(result.axioms, 'ObjectPropertyAssertion')).toEqual([{
            type: 'ObjectPropertyAssertion',
            property: named('NamedObjectProperty', 'knows'),
            subject: named('NamedIndividual', 'ann'),
            object: named('NamedIndividual', 'bob'),
        }]);
        expect(axiomsOfType(result.axioms, 'AnnotationAssertion')).toEqual([{
            type: 'AnnotationAssertion',
            property: { type: 'NamedAnnotationProperty', iri: `${EX}note` },
            subject: { type: 'IRI', iri: `${EX}ann` },
            value: { type: 'Literal', lexicalForm: 'met at the conference', datatype: XSD.string },
        }]);
        expect(result.residue).toEqual([]);
    });

    test('an anonymous class in a class assertion', () => {
        const result = translateDocument([
            triple(ex('ann'), RDF.type, b('r')),
            ...restriction(b('r'), ex('hasPet'), OWL.someValuesFrom, ex('Cat')),
        ]);
        expect(result.axioms).toEqual([{
            type: 'ClassAssertion',
            classExpression: {
                type: 'ObjectSomeValuesFrom',
                property: named('NamedObjectProperty', 'hasPet'),
                filler: named('NamedClass', 'Cat'),
            },
            individual: named('NamedIndividual', 'ann'),
        }]);
        expect(result.residue).toEqual([]);
    });

    test('a declared object property with a literal value is unsupported', () => {
        const result = translateDocument([
            typed(ex('knows'), OWL.ObjectProperty),
            triple(ex('ann'), exIri('knows'), str('Bob')),
        ]);
        expect(withCode(result.diagnostics, 'UNSUPPORTED_CONSTRUCT').map(d => d.message)).toEqual([
            '"Bob" cannot be used as an individual',
        ]);
        expect(result.residue).toEqual([triple(ex('ann'), exIri('knows'), str('Bob'))]);
    });

    test('negative property assertions', () => {
        const result = translateDocument([
            typed(b('n1'), OWL.NegativePropertyAssertion),
            triple(b('n1'), OWL.sourceIndividual, ex('ann')),
            triple(b('n1'), OWL.assertionProperty, ex('knows')),
            triple(b('n1'), OWL.targetIndividual, ex('bob')),
            typed(b('n2'), OWL.NegativePropertyAssertion),
            triple(b('n2'), OWL.sourceIndividual, ex('ann')),
            triple(b('n2'), OWL.assertionProperty, ex('age')),
            triple(b('n2'), OWL.targetValue, literal('7', XSD.integer)),
        ]);
        expect(result.axioms).toEqual([
            {
                type: 'NegativeObjectPropertyAssertion',
                property: named('NamedObjectProperty', 'knows'),
                subject: named('NamedIndividual', 'ann'),
                object: named('NamedIndividual', 'bob'),
            },
            {
                type: 'NegativeDataPropertyAssertion',
                property: named('NamedDataProperty', 'age'),
                subject: named('NamedIndividual', 'ann'),
                value: { type: 'Literal', lexicalForm: '7', datatype: XSD.integer },
            },
        ]);
        expect(result.residue).toEqual([]);
    });

    test('a negative assertion with two targets is malformed', () => {
        const triples = [
            typed(b('n'), OWL.NegativePropertyAssertion),
            triple(b('n'), OWL.sourceIndividual, ex('ann')),
            triple(b('n'), OWL.assertionProperty, ex('knows')),
            triple(b('n'), OWL.targetIndividual, ex('bob')),
            triple(b('n'), OWL.targetValue, str('Bob')),
        ];
        const result = translateDocument(triples);
        expect(result.axioms).toEqual([]);
        expect(result.diagnostics[0]).toMatchObject({
            code: 'MALFORMED_CONSTRUCT',
            node: '_:n',
            predicate: OWL.targetValue,
        });
        expect(result.residue).toHaveLength(5);
    });
});
