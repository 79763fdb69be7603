/**
 * Typed object model for OWL 2 axioms and expressions
 *
 * Every variant is discriminated by `type`. Operands are always fully
 * resolved values; nothing in this model refers back to a raw graph node.
 */

export type IRI = string;

// === Entities and values ===

export interface NamedClass {
    type: 'NamedClass';
    iri: IRI;
}

export interface NamedObjectProperty {
    type: 'NamedObjectProperty';
    iri: IRI;
}

export interface InverseObjectProperty {
    type: 'InverseObjectProperty';
    property: ObjectPropertyExpression;
}

export interface NamedDataProperty {
    type: 'NamedDataProperty';
    iri: IRI;
}

export interface NamedAnnotationProperty {
    type: 'NamedAnnotationProperty';
    iri: IRI;
}

export interface NamedDatatype {
    type: 'NamedDatatype';
    iri: IRI;
}

export interface NamedIndividual {
    type: 'NamedIndividual';
    iri: IRI;
}

export interface AnonymousIndividual {
    type: 'AnonymousIndividual';
    id: string;
}

export interface Literal {
    type: 'Literal';
    lexicalForm: string;
    datatype: IRI;
    language?: string;
}

export type ObjectPropertyExpression = NamedObjectProperty | InverseObjectProperty;
export type PropertyExpression = ObjectPropertyExpression | NamedDataProperty;
export type Individual = NamedIndividual | AnonymousIndividual;

// === Class expressions ===

export type CardinalityKind = 'min' | 'max' | 'exact';

export interface ObjectSomeValuesFrom {
    type: 'ObjectSomeValuesFrom';
    property: ObjectPropertyExpression;
    filler: ClassExpression;
}

export interface ObjectAllValuesFrom {
    type: 'ObjectAllValuesFrom';
    property: ObjectPropertyExpression;
    filler: ClassExpression;
}

export interface ObjectHasValue {
    type: 'ObjectHasValue';
    property: ObjectPropertyExpression;
    individual: Individual;
}

export interface ObjectHasSelf {
    type: 'ObjectHasSelf';
    property: ObjectPropertyExpression;
}

export interface ObjectCardinality {
    type: 'ObjectCardinality';
    kind: CardinalityKind;
    property: ObjectPropertyExpression;
    cardinality: number;
    filler?: ClassExpression;
}

export interface ObjectIntersectionOf {
    type: 'ObjectIntersectionOf';
    operands: ClassExpression[];
}

export interface ObjectUnionOf {
    type: 'ObjectUnionOf';
    operands: ClassExpression[];
}

export interface ObjectComplementOf {
    type: 'ObjectComplementOf';
    operand: ClassExpression;
}

export interface ObjectOneOf {
    type: 'ObjectOneOf';
    individuals: Individual[];
}

export interface DataSomeValuesFrom {
    type: 'DataSomeValuesFrom';
    property: NamedDataProperty;
    filler: DataRange;
}

export interface DataAllValuesFrom {
    type: 'DataAllValuesFrom';
    property: NamedDataProperty;
    filler: DataRange;
}

export interface DataHasValue {
    type: 'DataHasValue';
    property: NamedDataProperty;
    value: Literal;
}

export interface DataCardinality {
    type: 'DataCardinality';
    kind: CardinalityKind;
    property: NamedDataProperty;
    cardinality: number;
    filler?: DataRange;
}

export type ClassExpression =
    | NamedClass
    | ObjectSomeValuesFrom
    | ObjectAllValuesFrom
    | ObjectHasValue
    | ObjectHasSelf
    | ObjectCardinality
    | ObjectIntersectionOf
    | ObjectUnionOf
    | ObjectComplementOf
    | ObjectOneOf
    | DataSomeValuesFrom
    | DataAllValuesFrom
    | DataHasValue
    | DataCardinality;

// === Data ranges ===

export interface FacetRestriction {
    facet: IRI;
    value: Literal;
}

export interface DataIntersectionOf {
    type: 'DataIntersectionOf';
    operands: DataRange[];
}

export interface DataUnionOf {
    type: 'DataUnionOf';
    operands: DataRange[];
}

export interface DataComplementOf {
    type: 'DataComplementOf';
    operand: DataRange;
}

export interface DataOneOf {
    type: 'DataOneOf';
    values: Literal[];
}

export interface DatatypeRestriction {
    type: 'DatatypeRestriction';
    datatype: NamedDatatype;
    facets: FacetRestriction[];
}

export type DataRange =
    | NamedDatatype
    | DataIntersectionOf
    | DataUnionOf
    | DataComplementOf
    | DataOneOf
    | DatatypeRestriction;

// === Axioms ===

export type EntityKind = 'Class' | 'ObjectProperty' | 'DataProperty' | 'AnnotationProperty' | 'NamedIndividual' | 'Datatype';

export interface Declaration {
    type: 'Declaration';
    kind: EntityKind;
    iri: IRI;
}

export interface SubClassOf {
    type: 'SubClassOf';
    subClass: ClassExpression;
    superClass: ClassExpression;
}

export interface EquivalentClasses {
    type: 'EquivalentClasses';
    classes: ClassExpression[];
}

export interface DisjointClasses {
    type: 'DisjointClasses';
    classes: ClassExpression[];
}

export interface DisjointUnion {
    type: 'DisjointUnion';
    owner: NamedClass;
    classes: ClassExpression[];
}

export interface HasKey {
    type: 'HasKey';
    classExpression: ClassExpression;
    objectProperties: ObjectPropertyExpression[];
    dataProperties: NamedDataProperty[];
}

export interface SubObjectPropertyOf {
    type: 'SubObjectPropertyOf';
    subProperty: ObjectPropertyExpression;
    superProperty: ObjectPropertyExpression;
}

export interface SubPropertyChainOf {
    type: 'SubPropertyChainOf';
    chain: ObjectPropertyExpression[];
    superProperty: ObjectPropertyExpression;
}

export interface EquivalentObjectProperties {
    type: 'EquivalentObjectProperties';
    properties: ObjectPropertyExpression[];
}

export interface DisjointObjectProperties {
    type: 'DisjointObjectProperties';
    properties: ObjectPropertyExpression[];
}

export interface InverseObjectProperties {
    type: 'InverseObjectProperties';
    first: ObjectPropertyExpression;
    second: ObjectPropertyExpression;
}

export interface ObjectPropertyDomain {
    type: 'ObjectPropertyDomain';
    property: ObjectPropertyExpression;
    domain: ClassExpression;
}

export interface ObjectPropertyRange {
    type: 'ObjectPropertyRange';
    property: ObjectPropertyExpression;
    range: ClassExpression;
}

export type ObjectPropertyCharacteristicKind =
    | 'Functional'
    | 'InverseFunctional'
    | 'Transitive'
    | 'Symmetric'
    | 'Asymmetric'
    | 'Reflexive'
    | 'Irreflexive';

export interface ObjectPropertyCharacteristic {
    type: 'ObjectPropertyCharacteristic';
    characteristic: ObjectPropertyCharacteristicKind;
    property: ObjectPropertyExpression;
}

export interface SubDataPropertyOf {
    type: 'SubDataPropertyOf';
    subProperty: NamedDataProperty;
    superProperty: NamedDataProperty;
}

export interface EquivalentDataProperties {
    type: 'EquivalentDataProperties';
    properties: NamedDataProperty[];
}

export interface DisjointDataProperties {
    type: 'DisjointDataProperties';
    properties: NamedDataProperty[];
}

export interface DataPropertyDomain {
    type: 'DataPropertyDomain';
    property: NamedDataProperty;
    domain: ClassExpression;
}

export interface DataPropertyRange {
    type: 'DataPropertyRange';
    property: NamedDataProperty;
    range: DataRange;
}

export interface FunctionalDataProperty {
    type: 'FunctionalDataProperty';
    property: NamedDataProperty;
}

export interface ClassAssertion {
    type: 'ClassAssertion';
    classExpression: ClassExpression;
    individual: Individual;
}

export interface ObjectPropertyAssertion {
    type: 'ObjectPropertyAssertion';
    property: ObjectPropertyExpression;
    subject: Individual;
    object: Individual;
}

export interface DataPropertyAssertion {
    type: 'DataPropertyAssertion';
    property: NamedDataProperty;
    subject: Individual;
    value: Literal;
}

export interface NegativeObjectPropertyAssertion {
    type: 'NegativeObjectPropertyAssertion';
    property: ObjectPropertyExpression;
    subject: Individual;
    object: Individual;
}

export interface NegativeDataPropertyAssertion {
    type: 'NegativeDataPropertyAssertion';
    property: NamedDataProperty;
    subject: Individual;
    value: Literal;
}

export interface SameIndividual {
    type: 'SameIndividual';
    individuals: Individual[];
}

export interface DifferentIndividuals {
    type: 'DifferentIndividuals';
    individuals: Individual[];
}

export type AnnotationSubject =
    | { type: 'IRI'; iri: IRI }
    | AnonymousIndividual;

export type AnnotationValue =
    | { type: 'IRI'; iri: IRI }
    | AnonymousIndividual
    | Literal;

export interface AnnotationAssertion {
    type: 'AnnotationAssertion';
    property: NamedAnnotationProperty;
    subject: AnnotationSubject;
    value: AnnotationValue;
}

export type ClassAxiom = SubClassOf | EquivalentClasses | DisjointClasses | DisjointUnion | HasKey;

export type ObjectPropertyAxiom =
    | SubObjectPropertyOf
    | SubPropertyChainOf
    | EquivalentObjectProperties
    | DisjointObjectProperties
    | InverseObjectProperties
    | ObjectPropertyDomain
    | ObjectPropertyRange
    | ObjectPropertyCharacteristic;

export type DataPropertyAxiom =
    | SubDataPropertyOf
    | EquivalentDataProperties
    | DisjointDataProperties
    | DataPropertyDomain
    | DataPropertyRange
    | FunctionalDataProperty;

export type Assertion =
    | ClassAssertion
    | ObjectPropertyAssertion
    | DataPropertyAssertion
    | NegativeObjectPropertyAssertion
    | NegativeDataPropertyAssertion
    | SameIndividual
    | DifferentIndividuals;

export type Axiom =
    | Declaration
    | ClassAxiom
    | ObjectPropertyAxiom
    | DataPropertyAxiom
    | Assertion
    | AnnotationAssertion;

export type AxiomType = Axiom['type'];
