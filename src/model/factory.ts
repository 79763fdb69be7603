import type {
    AnonymousIndividual,
    CardinalityKind,
    ClassExpression,
    DataCardinality,
    DataRange,
    Individual,
    InverseObjectProperty,
    Literal,
    NamedAnnotationProperty,
    NamedClass,
    NamedDataProperty,
    NamedDatatype,
    NamedIndividual,
    NamedObjectProperty,
    ObjectCardinality,
    ObjectPropertyExpression,
} from '../types/model.js';
import type { LiteralNode } from '../types/rdf.js';

export function createNamedClass(iri: string): NamedClass {
    return { type: 'NamedClass', iri };
}

export function createObjectProperty(iri: string): NamedObjectProperty {
    return { type: 'NamedObjectProperty', iri };
}

export function createInverseProperty(property: ObjectPropertyExpression): InverseObjectProperty {
    return { type: 'InverseObjectProperty', property };
}

export function createDataProperty(iri: string): NamedDataProperty {
    return { type: 'NamedDataProperty', iri };
}

export function createAnnotationProperty(iri: string): NamedAnnotationProperty {
    return { type: 'NamedAnnotationProperty', iri };
}

export function createDatatype(iri: string): NamedDatatype {
    return { type: 'NamedDatatype', iri };
}

export function createNamedIndividual(iri: string): NamedIndividual {
    return { type: 'NamedIndividual', iri };
}

export function createAnonymousIndividual(id: string): AnonymousIndividual {
    return { type: 'AnonymousIndividual', id };
}

export function createLiteral(node: LiteralNode): Literal {
    return node.language !== undefined
        ? { type: 'Literal', lexicalForm: node.value, datatype: node.datatype, language: node.language }
        : { type: 'Literal', lexicalForm: node.value, datatype: node.datatype };
}

export function createSomeValuesFrom(property: ObjectPropertyExpression, filler: ClassExpression): ClassExpression {
    return { type: 'ObjectSomeValuesFrom', property, filler };
}

export function createAllValuesFrom(property: ObjectPropertyExpression, filler: ClassExpression): ClassExpression {
    return { type: 'ObjectAllValuesFrom', property, filler };
}

export function createDataSomeValuesFrom(property: NamedDataProperty, filler: DataRange): ClassExpression {
    return { type: 'DataSomeValuesFrom', property, filler };
}

export function createDataAllValuesFrom(property: NamedDataProperty, filler: DataRange): ClassExpression {
    return { type: 'DataAllValuesFrom', property, filler };
}

export function createObjectCardinality(
    kind: CardinalityKind,
    property: ObjectPropertyExpression,
    cardinality: number,
    filler?: ClassExpression
): ObjectCardinality {
    return filler
        ? { type: 'ObjectCardinality', kind, property, cardinality, filler }
        : { type: 'ObjectCardinality', kind, property, cardinality };
}

export function createDataCardinality(
    kind: CardinalityKind,
    property: NamedDataProperty,
    cardinality: number,
    filler?: DataRange
): DataCardinality {
    return filler
        ? { type: 'DataCardinality', kind, property, cardinality, filler }
        : { type: 'DataCardinality', kind, property, cardinality };
}

export function createHasValue(property: ObjectPropertyExpression, individual: Individual): ClassExpression {
    return { type: 'ObjectHasValue', property, individual };
}

export function createDataHasValue(property: NamedDataProperty, value: Literal): ClassExpression {
    return { type: 'DataHasValue', property, value };
}

export function createHasSelf(property: ObjectPropertyExpression): ClassExpression {
    return { type: 'ObjectHasSelf', property };
}

export function createIntersectionOf(operands: ClassExpression[]): ClassExpression {
    return { type: 'ObjectIntersectionOf', operands };
}

export function createUnionOf(operands: ClassExpression[]): ClassExpression {
    return { type: 'ObjectUnionOf', operands };
}

export function createComplementOf(operand: ClassExpression): ClassExpression {
    return { type: 'ObjectComplementOf', operand };
}

export function createOneOf(individuals: Individual[]): ClassExpression {
    return { type: 'ObjectOneOf', individuals };
}
