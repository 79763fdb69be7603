/**
 * Axiom Assembler
 *
 * Drives translation from axiom-shaped triples. The phases run in a fixed
 * order and each one visits its triples in canonical key order, so the result
 * never depends on the order the triples were inserted in:
 *
 *   1. ontology header
 *   2. entity declarations
 *   3. property characteristics
 *   4. explicit axiom nodes (AllDisjointClasses, AllDisjointProperties,
 *      AllDifferent, NegativePropertyAssertion)
 *   5. class axioms
 *   6. property axioms
 *   7. assertions and annotations
 *   8. orphan class expressions
 *   9. residue
 *
 * Every axiom is built inside its own failure boundary. A failure is
 * recorded against the axiom's node and predicate, every triple the axiom
 * consumed on the way is released, and translation carries on with the next
 * one.
 */

import { TranslationContext } from './context.js';
import type { TripleStore } from '../store/tripleStore.js';
import type { NodeResolver } from './resolver.js';
import type {
    AnnotationSubject,
    AnnotationValue,
    AnonymousIndividual,
    Axiom,
    ClassExpression,
    EntityKind,
    Individual,
    NamedDataProperty,
    ObjectPropertyExpression,
} from '../types/model.js';
import type { BlankNode, NodeRef, ObjectTerm, Triple, TriplePattern } from '../types/rdf.js';
import type { OntologyHeader, TranslationResult } from '../types/responses.js';
import type { TranslateOptions } from '../types/options.js';
import {
    createInvariantViolation,
    createMalformedError,
    createResidueDiagnostic,
    createUnsupportedError,
    isLocalFailure,
} from '../types/errors.js';
import { createAnnotationProperty, createDataProperty, createLiteral, createNamedClass, createObjectProperty } from '../model/factory.js';
import { iri, termKey } from '../model/terms.js';
import { CHARACTERISTIC_TYPES, OWL, RDF, RDFS, isReservedIri } from '../vocab/index.js';
import { UnresolvedDependency } from './dependency.js';
import { declaredPropertyKind, isDatatypeTerm, type PropertyKind } from './kinds.js';
import { readList } from './lists.js';
import { selectTranslator } from './dispatcher.js';
import { typeTriples } from './translators/common.js';

const DECLARATION_TYPES: ReadonlyArray<[string, EntityKind]> = [
    [OWL.Class, 'Class'],
    [OWL.ObjectProperty, 'ObjectProperty'],
    [OWL.DatatypeProperty, 'DataProperty'],
    [OWL.AnnotationProperty, 'AnnotationProperty'],
    [OWL.NamedIndividual, 'NamedIndividual'],
    [RDFS.Datatype, 'Datatype'],
];

type TripleAxiomBuilder = (t: Triple) => Axiom | undefined;

interface Location {
    subject: NodeRef;
    predicate: string;
}

/**
 * Translate a triple set (or a filled store) into axioms.
 */
export function translateDocument(
    source: TripleStore | Iterable<Triple>,
    options: TranslateOptions = {}
): TranslationResult {
    const ctx = new TranslationContext(source, options);
    return new AxiomAssembler(ctx).run();
}

export class AxiomAssembler {
    private readonly axioms: Axiom[] = [];
    private readonly expressions: ClassExpression[] = [];
    private ontology: OntologyHeader = { imports: [] };

    private readonly classAxioms: ReadonlyArray<[string, TripleAxiomBuilder]> = [
        [RDFS.subClassOf, t => this.subClassOf(t)],
        [OWL.equivalentClass, t => this.equivalentClasses(t)],
        [OWL.disjointWith, t => this.disjointClasses(t)],
        [OWL.disjointUnionOf, t => this.disjointUnion(t)],
        [OWL.hasKey, t => this.hasKey(t)],
    ];

    private readonly propertyAxioms: ReadonlyArray<[string, TripleAxiomBuilder]> = [
        [RDFS.subPropertyOf, t => this.subPropertyOf(t)],
        [OWL.propertyChainAxiom, t => this.propertyChain(t)],
        [OWL.equivalentProperty, t => this.equivalentProperties(t)],
        [OWL.propertyDisjointWith, t => this.disjointProperties(t)],
        [OWL.inverseOf, t => this.inverseProperties(t)],
        [RDFS.domain, t => this.domain(t)],
        [RDFS.range, t => this.range(t)],
    ];

    constructor(private readonly ctx: TranslationContext) {}

    private get store(): TripleStore {
        return this.ctx.store;
    }

    private get resolver(): NodeResolver {
        return this.ctx.resolver;
    }

    run(): TranslationResult {
        const phases: Array<[string, () => void]> = [
            ['Reading ontology header', () => this.translateHeader()],
            ['Collecting declarations', () => this.translateDeclarations()],
            ['Translating property characteristics', () => this.translateCharacteristics()],
            ['Translating axiom nodes', () => this.translateAxiomNodes()],
            ['Translating class axioms', () => this.translateTable(this.classAxioms)],
            ['Translating property axioms', () => this.translateTable(this.propertyAxioms)],
            ['Translating assertions', () => this.translateAssertions()],
        ];
        if (this.ctx.options.translateOrphans) {
            phases.push(['Translating orphan expressions', () => this.translateOrphans()]);
        }

        phases.forEach(([label, phase], index) => {
            this.ctx.progress(index / phases.length, label);
            phase();
        });

        const residue = this.store.unconsumed();
        if (residue.length > 0) {
            this.ctx.report(createResidueDiagnostic(residue.length));
        }
        this.ctx.progress(1, 'Translation complete');

        return {
            axioms: this.axioms,
            expressions: this.expressions,
            residue,
            diagnostics: [...this.ctx.diagnostics],
            ontology: this.ontology,
        };
    }

    // === Phases ===

    private translateHeader(): void {
        const [node] = this.store.subjects(RDF.type, iri(OWL.Ontology));
        if (!node) return;

        const header = this.attempt({ subject: node, predicate: OWL.Ontology }, () => {
            const importTriples = this.store.match({ subject: node, predicate: OWL.imports });
            const versionTriple = this.store.optionalTriple(node, OWL.versionIRI);
            const result: OntologyHeader = { imports: importTriples.map(t => this.namedObject(t)) };
            if (node.type === 'iri') result.iri = node.value;
            if (versionTriple) result.versionIri = this.namedObject(versionTriple);

            this.ctx.consume([
                ...typeTriples(node, this.ctx, OWL.Ontology),
                ...importTriples,
                ...(versionTriple ? [versionTriple] : []),
            ]);
            return result;
        });
        if (header) {
            this.ontology = header;
        }
    }

    private translateDeclarations(): void {
        for (const [typeIri, kind] of DECLARATION_TYPES) {
            for (const t of this.open({ predicate: RDF.type, object: iri(typeIri) })) {
                // Blank nodes typed owl:Class and the like are expression nodes
                if (t.subject.type !== 'iri') continue;
                this.ctx.consume([t]);
                this.axioms.push({ type: 'Declaration', kind, iri: t.subject.value });
            }
        }
    }

    private translateCharacteristics(): void {
        for (const [typeIri, characteristic] of CHARACTERISTIC_TYPES) {
            for (const t of this.open({ predicate: RDF.type, object: iri(typeIri) })) {
                this.add(t, () => {
                    if (characteristic === 'Functional' && this.kindOf(t.subject) === 'data') {
                        const property = this.dataProperty(t.subject);
                        this.ctx.consume([t]);
                        return { type: 'FunctionalDataProperty', property };
                    }
                    const property = this.objectProperty(t.subject);
                    this.ctx.consume([t]);
                    return { type: 'ObjectPropertyCharacteristic', characteristic, property };
                });
            }
        }
    }

    private translateAxiomNodes(): void {
        for (const node of this.store.subjects(RDF.type, iri(OWL.AllDisjointClasses))) {
            this.add({ subject: node, predicate: OWL.AllDisjointClasses }, () => {
                const { terms, triples } = this.memberList(node, OWL.members);
                const classes = this.resolveAll(node, terms, term => this.resolver.resolveClassExpression(term));
                this.ctx.consume([...triples, ...typeTriples(node, this.ctx, OWL.AllDisjointClasses)]);
                return { type: 'DisjointClasses', classes };
            });
        }

        for (const node of this.store.subjects(RDF.type, iri(OWL.AllDisjointProperties))) {
            this.add({ subject: node, predicate: OWL.AllDisjointProperties }, () => {
                const { terms, triples } = this.memberList(node, OWL.members);
                const consumed = [...triples, ...typeTriples(node, this.ctx, OWL.AllDisjointProperties)];
                if (terms.some(term => this.kindOf(term) === 'data')) {
                    const properties = this.resolveAll(node, terms, term => this.resolver.resolveDataProperty(term));
                    this.ctx.consume(consumed);
                    return { type: 'DisjointDataProperties', properties };
                }
                const properties = this.resolveAll(node, terms, term => this.resolver.resolveObjectProperty(term));
                this.ctx.consume(consumed);
                return { type: 'DisjointObjectProperties', properties };
            });
        }

        for (const node of this.store.subjects(RDF.type, iri(OWL.AllDifferent))) {
            this.add({ subject: node, predicate: OWL.AllDifferent }, () => {
                const { terms, triples } = this.memberList(node, OWL.members, OWL.distinctMembers);
                const individuals = this.resolveAll(node, terms, term => this.resolver.resolveIndividual(term));
                this.ctx.consume([...triples, ...typeTriples(node, this.ctx, OWL.AllDifferent)]);
                return { type: 'DifferentIndividuals', individuals };
            });
        }

        for (const node of this.store.subjects(RDF.type, iri(OWL.NegativePropertyAssertion))) {
            this.add({ subject: node, predicate: OWL.NegativePropertyAssertion }, () => this.negativeAssertion(node));
        }
    }

    private translateTable(table: ReadonlyArray<[string, TripleAxiomBuilder]>): void {
        for (const [predicate, build] of table) {
            for (const t of this.open({ predicate })) {
                this.add(t, () => build(t));
            }
        }
    }

    private translateAssertions(): void {
        for (const t of this.open({})) {
            this.add(t, () => this.assertion(t));
        }
    }

    /**
     * Anonymous class expressions no produced construct refers to. Nodes an
     * abandoned axiom already translated come from the resolver's cache,
     * which claims their triples again; the rest are translated now.
     */
    private translateOrphans(): void {
        for (const node of this.blankSubjects()) {
            const referenced = this.store.match({ object: node }).some(t => this.store.isConsumed(t));
            if (referenced) continue;
            if (this.resolver.hasFailed('classExpression', node)) continue;

            if (!this.resolver.cached('classExpression', node)) {
                if (!this.store.match({ subject: node }).some(t => !this.store.isConsumed(t))) continue;
                if (isDatatypeTerm(this.store, node)) continue;
                const claimed = selectTranslator('classExpression', node, this.ctx) !== undefined
                    || this.store.has(node, RDF.type, iri(OWL.Restriction));
                if (!claimed) continue;
            }

            const expression = this.resolver.resolveClassExpression(node);
            if (expression) {
                this.expressions.push(expression);
            }
        }
    }

    // === Class axioms ===

    private subClassOf(t: Triple): Axiom {
        const [subClass, superClass] = this.classPair(t);
        this.ctx.consume([t]);
        return { type: 'SubClassOf', subClass, superClass };
    }

    private equivalentClasses(t: Triple): Axiom {
        if (isDatatypeTerm(this.store, t.subject) || isDatatypeTerm(this.store, t.object)) {
            throw createUnsupportedError(
                `Datatype definition ${termKey(t.subject)} cannot be represented`,
                termKey(t.subject),
                t.predicate
            );
        }
        const classes = this.classPair(t);
        this.ctx.consume([t]);
        return { type: 'EquivalentClasses', classes };
    }

    private disjointClasses(t: Triple): Axiom {
        const classes = this.classPair(t);
        this.ctx.consume([t]);
        return { type: 'DisjointClasses', classes };
    }

    private disjointUnion(t: Triple): Axiom {
        if (t.subject.type !== 'iri') {
            throw createMalformedError(
                `Disjoint union owner ${termKey(t.subject)} must be a named class`,
                termKey(t.subject),
                t.predicate
            );
        }
        const list = readList(t.object, this.ctx);
        const classes = this.resolveAll(t.subject, list.items, term => this.resolver.resolveClassExpression(term));
        this.ctx.consume([t, ...list.triples]);
        return { type: 'DisjointUnion', owner: createNamedClass(t.subject.value), classes };
    }

    private hasKey(t: Triple): Axiom {
        const list = readList(t.object, this.ctx);
        const classExpression = this.resolver.resolveClassExpression(t.subject);
        const objectProperties: ObjectPropertyExpression[] = [];
        const dataProperties: NamedDataProperty[] = [];
        let complete = true;
        for (const item of list.items) {
            if (this.kindOf(item) === 'data') {
                const property = this.resolver.resolveDataProperty(item);
                if (property) dataProperties.push(property);
                else complete = false;
            } else {
                const property = this.resolver.resolveObjectProperty(item);
                if (property) objectProperties.push(property);
                else complete = false;
            }
        }
        if (!classExpression || !complete) {
            throw new UnresolvedDependency(termKey(t.subject));
        }
        this.ctx.consume([t, ...list.triples]);
        return { type: 'HasKey', classExpression, objectProperties, dataProperties };
    }

    // === Property axioms ===

    private subPropertyOf(t: Triple): Axiom {
        const kind = this.pairKind(t);
        if (kind === 'data') {
            const [subProperty, superProperty] = this.dataPropertyPair(t);
            this.ctx.consume([t]);
            return { type: 'SubDataPropertyOf', subProperty, superProperty };
        }
        const [subProperty, superProperty] = this.objectPropertyPair(t);
        this.ctx.consume([t]);
        return { type: 'SubObjectPropertyOf', subProperty, superProperty };
    }

    private propertyChain(t: Triple): Axiom {
        const list = readList(t.object, this.ctx);
        const superProperty = this.resolver.resolveObjectProperty(t.subject);
        const chain = this.resolveAll(t.subject, list.items, term => this.resolver.resolveObjectProperty(term));
        if (!superProperty) {
            throw new UnresolvedDependency(termKey(t.subject));
        }
        this.ctx.consume([t, ...list.triples]);
        return { type: 'SubPropertyChainOf', chain, superProperty };
    }

    private equivalentProperties(t: Triple): Axiom {
        if (this.pairKind(t) === 'data') {
            const properties = this.dataPropertyPair(t);
            this.ctx.consume([t]);
            return { type: 'EquivalentDataProperties', properties };
        }
        const properties = this.objectPropertyPair(t);
        this.ctx.consume([t]);
        return { type: 'EquivalentObjectProperties', properties };
    }

    private disjointProperties(t: Triple): Axiom {
        if (this.pairKind(t) === 'data') {
            const properties = this.dataPropertyPair(t);
            this.ctx.consume([t]);
            return { type: 'DisjointDataProperties', properties };
        }
        const properties = this.objectPropertyPair(t);
        this.ctx.consume([t]);
        return { type: 'DisjointObjectProperties', properties };
    }

    private inverseProperties(t: Triple): Axiom | undefined {
        // A blank subject is an inverse property expression, read by the resolver
        if (t.subject.type === 'blank') return undefined;
        const [first, second] = this.objectPropertyPair(t);
        this.ctx.consume([t]);
        return { type: 'InverseObjectProperties', first, second };
    }

    private domain(t: Triple): Axiom {
        const kind = this.kindOf(t.subject);
        this.rejectAnnotationProperty(t, kind);
        const domainExpression = this.resolver.resolveClassExpression(t.object);
        if (kind === 'data') {
            const property = this.resolver.resolveDataProperty(t.subject);
            const [p, domain] = this.both(t, property, domainExpression);
            this.ctx.consume([t]);
            return { type: 'DataPropertyDomain', property: p, domain };
        }
        const property = this.resolver.resolveObjectProperty(t.subject);
        const [p, domain] = this.both(t, property, domainExpression);
        this.ctx.consume([t]);
        return { type: 'ObjectPropertyDomain', property: p, domain };
    }

    private range(t: Triple): Axiom {
        const kind = this.kindOf(t.subject) ?? (isDatatypeTerm(this.store, t.object) ? 'data' : 'object');
        this.rejectAnnotationProperty(t, kind);
        if (kind === 'data') {
            const [property, range] = this.both(
                t,
                this.resolver.resolveDataProperty(t.subject),
                this.resolver.resolveDataRange(t.object)
            );
            this.ctx.consume([t]);
            return { type: 'DataPropertyRange', property, range };
        }
        const [property, range] = this.both(
            t,
            this.resolver.resolveObjectProperty(t.subject),
            this.resolver.resolveClassExpression(t.object)
        );
        this.ctx.consume([t]);
        return { type: 'ObjectPropertyRange', property, range };
    }

    // === Assertions ===

    private assertion(t: Triple): Axiom | undefined {
        const { subject, predicate, object } = t;

        if (predicate === RDF.type) {
            if (object.type === 'literal') return undefined;
            if (object.type === 'iri' && isReservedIri(object.value) && object.value !== OWL.Thing) return undefined;
            const [classExpression, individual] = this.both(
                t,
                this.resolver.resolveClassExpression(object),
                this.resolver.resolveIndividual(subject)
            );
            this.ctx.consume([t]);
            return { type: 'ClassAssertion', classExpression, individual };
        }

        if (predicate === OWL.sameAs || predicate === OWL.differentFrom) {
            const individuals = this.individualPair(t);
            this.ctx.consume([t]);
            return predicate === OWL.sameAs
                ? { type: 'SameIndividual', individuals }
                : { type: 'DifferentIndividuals', individuals };
        }

        const kind = declaredPropertyKind(this.store, predicate);
        if (kind === 'annotation') {
            const annotationSubject = this.annotationSubject(subject);
            const value = this.annotationValue(object);
            this.ctx.consume([t]);
            return {
                type: 'AnnotationAssertion',
                property: createAnnotationProperty(predicate),
                subject: annotationSubject,
                value,
            };
        }

        if (isReservedIri(predicate)) return undefined;

        if (kind === 'data' || (kind === undefined && object.type === 'literal')) {
            const [individual, value] = this.both(
                t,
                this.resolver.resolveIndividual(subject),
                this.resolver.resolveLiteral(object)
            );
            this.ctx.consume([t]);
            return { type: 'DataPropertyAssertion', property: createDataProperty(predicate), subject: individual, value };
        }

        const [individual, target] = this.individualPair(t);
        this.ctx.consume([t]);
        return {
            type: 'ObjectPropertyAssertion',
            property: createObjectProperty(predicate),
            subject: individual,
            object: target,
        };
    }

    private negativeAssertion(node: NodeRef): Axiom {
        const key = termKey(node);
        const sourceTriple = this.store.singletonTriple(node, OWL.sourceIndividual);
        const propertyTriple = this.store.singletonTriple(node, OWL.assertionProperty);
        const individualTriple = this.store.optionalTriple(node, OWL.targetIndividual);
        const valueTriple = this.store.optionalTriple(node, OWL.targetValue);
        const typed = typeTriples(node, this.ctx, OWL.NegativePropertyAssertion);

        if (valueTriple && !individualTriple) {
            const subject = this.resolver.resolveIndividual(sourceTriple.object);
            const property = this.resolver.resolveDataProperty(propertyTriple.object);
            const value = this.resolver.resolveLiteral(valueTriple.object);
            if (!subject || !property || !value) {
                throw new UnresolvedDependency(key);
            }
            this.ctx.consume([sourceTriple, propertyTriple, valueTriple, ...typed]);
            return { type: 'NegativeDataPropertyAssertion', property, subject, value };
        }

        if (individualTriple && !valueTriple) {
            const subject = this.resolver.resolveIndividual(sourceTriple.object);
            const property = this.resolver.resolveObjectProperty(propertyTriple.object);
            const object = this.resolver.resolveIndividual(individualTriple.object);
            if (!subject || !property || !object) {
                throw new UnresolvedDependency(key);
            }
            this.ctx.consume([sourceTriple, propertyTriple, individualTriple, ...typed]);
            return { type: 'NegativeObjectPropertyAssertion', property, subject, object };
        }

        throw createMalformedError(
            `Negative property assertion ${key} needs exactly one of <${OWL.targetIndividual}> and <${OWL.targetValue}>`,
            key,
            individualTriple ? OWL.targetValue : OWL.targetIndividual
        );
    }

    // === Helpers ===

    /**
     * Run one axiom build inside a failure boundary.
     */
    private attempt<T>(at: Location, build: () => T | undefined): T | undefined {
        try {
            return this.ctx.transaction(build).value;
        } catch (e) {
            if (e instanceof UnresolvedDependency) {
                return undefined;
            }
            if (!isLocalFailure(e)) {
                throw e;
            }
            this.ctx.report({
                ...e.diagnostic,
                node: e.diagnostic.node ?? termKey(at.subject),
                predicate: e.diagnostic.predicate ?? at.predicate,
            });
            return undefined;
        }
    }

    private add(at: Location, build: () => Axiom | undefined): void {
        const axiom = this.attempt(at, build);
        if (axiom) {
            this.axioms.push(axiom);
        }
    }

    /**
     * Matching triples that are still unconsumed when the iteration reaches them.
     */
    private *open(pattern: TriplePattern): Generator<Triple> {
        for (const t of this.store.match(pattern)) {
            if (!this.store.isConsumed(t)) {
                yield t;
            }
        }
    }

    private blankSubjects(): BlankNode[] {
        const seen = new Map<string, BlankNode>();
        for (const t of this.store.match()) {
            if (t.subject.type === 'blank') {
                seen.set(termKey(t.subject), t.subject);
            }
        }
        return [...seen.values()];
    }

    private memberList(node: NodeRef, ...predicates: string[]): { terms: ObjectTerm[]; triples: Triple[] } {
        const present = predicates.filter(predicate => this.store.has(node, predicate));
        if (present.length !== 1) {
            throw createMalformedError(
                `${termKey(node)} must carry exactly one member list`,
                termKey(node),
                predicates[0],
                { found: present.length }
            );
        }
        const triple = this.store.singletonTriple(node, present[0]);
        const list = readList(triple.object, this.ctx);
        return { terms: list.items, triples: [triple, ...list.triples] };
    }

    /**
     * Resolve every member; the axiom is abandoned when any of them fails.
     */
    private resolveAll<T>(node: NodeRef, terms: ObjectTerm[], resolve: (term: ObjectTerm) => T | undefined): T[] {
        if (terms.length === 0) {
            throw createMalformedError(`${termKey(node)} has an empty member list`, termKey(node));
        }
        const resolved = terms.map(resolve);
        const values: T[] = [];
        for (const value of resolved) {
            if (value === undefined) {
                throw new UnresolvedDependency(termKey(node));
            }
            values.push(value);
        }
        return values;
    }

    private both<A, B>(t: Triple, a: A | undefined, b: B | undefined): [A, B] {
        if (a === undefined || b === undefined) {
            throw new UnresolvedDependency(termKey(t.subject));
        }
        return [a, b];
    }

    private classPair(t: Triple): [ClassExpression, ClassExpression] {
        return this.both(t, this.resolver.resolveClassExpression(t.subject), this.resolver.resolveClassExpression(t.object));
    }

    private objectPropertyPair(t: Triple): [ObjectPropertyExpression, ObjectPropertyExpression] {
        return this.both(t, this.resolver.resolveObjectProperty(t.subject), this.resolver.resolveObjectProperty(t.object));
    }

    private dataPropertyPair(t: Triple): [NamedDataProperty, NamedDataProperty] {
        return this.both(t, this.resolver.resolveDataProperty(t.subject), this.resolver.resolveDataProperty(t.object));
    }

    private individualPair(t: Triple): [Individual, Individual] {
        return this.both(t, this.resolver.resolveIndividual(t.subject), this.resolver.resolveIndividual(t.object));
    }

    private objectProperty(term: ObjectTerm): ObjectPropertyExpression {
        const property = this.resolver.resolveObjectProperty(term);
        if (!property) throw new UnresolvedDependency(termKey(term));
        return property;
    }

    private dataProperty(term: ObjectTerm): NamedDataProperty {
        const property = this.resolver.resolveDataProperty(term);
        if (!property) throw new UnresolvedDependency(termKey(term));
        return property;
    }

    private kindOf(term: ObjectTerm): PropertyKind | undefined {
        switch (term.type) {
            case 'iri':
                return declaredPropertyKind(this.store, term.value);
            case 'blank':
                return 'object';
            case 'literal':
                return undefined;
        }
    }

    /**
     * Kind of a property-to-property axiom: either side's declaration decides.
     */
    private pairKind(t: Triple): PropertyKind {
        const kind = this.kindOf(t.subject) ?? this.kindOf(t.object) ?? 'object';
        this.rejectAnnotationProperty(t, kind);
        return kind;
    }

    private rejectAnnotationProperty(t: Triple, kind: PropertyKind | undefined): void {
        if (kind === 'annotation') {
            throw createUnsupportedError(
                `Annotation property axiom on ${termKey(t.subject)} cannot be represented`,
                termKey(t.subject),
                t.predicate
            );
        }
    }

    private namedObject(t: Triple): string {
        if (t.object.type !== 'iri') {
            throw createMalformedError(
                `<${t.predicate}> on ${termKey(t.subject)} must name an IRI`,
                termKey(t.subject),
                t.predicate
            );
        }
        return t.object.value;
    }

    private anonymousIndividual(node: BlankNode): AnonymousIndividual {
        const individual = this.resolver.resolveIndividual(node);
        if (!individual || individual.type !== 'AnonymousIndividual') {
            throw createInvariantViolation(`${termKey(node)} did not resolve to an anonymous individual`);
        }
        return individual;
    }

    private annotationSubject(subject: NodeRef): AnnotationSubject {
        return subject.type === 'iri' ? { type: 'IRI', iri: subject.value } : this.anonymousIndividual(subject);
    }

    private annotationValue(object: ObjectTerm): AnnotationValue {
        switch (object.type) {
            case 'iri':
                return { type: 'IRI', iri: object.value };
            case 'blank':
                return this.anonymousIndividual(object);
            case 'literal':
                return createLiteral(object);
        }
    }
}
