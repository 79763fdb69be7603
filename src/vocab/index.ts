/**
 * RDF, RDFS, OWL and XSD vocabulary used by the OWL 2 RDF mapping
 */

import type { ObjectPropertyCharacteristicKind } from '../types/model.js';

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

export const RDF = {
    type: `${RDF_NS}type`,
    first: `${RDF_NS}first`,
    rest: `${RDF_NS}rest`,
    nil: `${RDF_NS}nil`,
    List: `${RDF_NS}List`,
    Property: `${RDF_NS}Property`,
    PlainLiteral: `${RDF_NS}PlainLiteral`,
    langString: `${RDF_NS}langString`,
    XMLLiteral: `${RDF_NS}XMLLiteral`,
} as const;

export const RDFS = {
    subClassOf: `${RDFS_NS}subClassOf`,
    subPropertyOf: `${RDFS_NS}subPropertyOf`,
    domain: `${RDFS_NS}domain`,
    range: `${RDFS_NS}range`,
    label: `${RDFS_NS}label`,
    comment: `${RDFS_NS}comment`,
    seeAlso: `${RDFS_NS}seeAlso`,
    isDefinedBy: `${RDFS_NS}isDefinedBy`,
    Datatype: `${RDFS_NS}Datatype`,
    Literal: `${RDFS_NS}Literal`,
    Class: `${RDFS_NS}Class`,
} as const;

export const OWL = {
    Ontology: `${OWL_NS}Ontology`,
    imports: `${OWL_NS}imports`,
    versionIRI: `${OWL_NS}versionIRI`,
    versionInfo: `${OWL_NS}versionInfo`,
    deprecated: `${OWL_NS}deprecated`,

    Class: `${OWL_NS}Class`,
    ObjectProperty: `${OWL_NS}ObjectProperty`,
    DatatypeProperty: `${OWL_NS}DatatypeProperty`,
    AnnotationProperty: `${OWL_NS}AnnotationProperty`,
    NamedIndividual: `${OWL_NS}NamedIndividual`,
    Thing: `${OWL_NS}Thing`,
    Nothing: `${OWL_NS}Nothing`,

    Restriction: `${OWL_NS}Restriction`,
    onProperty: `${OWL_NS}onProperty`,
    someValuesFrom: `${OWL_NS}someValuesFrom`,
    allValuesFrom: `${OWL_NS}allValuesFrom`,
    hasValue: `${OWL_NS}hasValue`,
    hasSelf: `${OWL_NS}hasSelf`,
    cardinality: `${OWL_NS}cardinality`,
    minCardinality: `${OWL_NS}minCardinality`,
    maxCardinality: `${OWL_NS}maxCardinality`,
    qualifiedCardinality: `${OWL_NS}qualifiedCardinality`,
    minQualifiedCardinality: `${OWL_NS}minQualifiedCardinality`,
    maxQualifiedCardinality: `${OWL_NS}maxQualifiedCardinality`,
    onClass: `${OWL_NS}onClass`,
    onDataRange: `${OWL_NS}onDataRange`,
    intersectionOf: `${OWL_NS}intersectionOf`,
    unionOf: `${OWL_NS}unionOf`,
    complementOf: `${OWL_NS}complementOf`,
    oneOf: `${OWL_NS}oneOf`,

    onDatatype: `${OWL_NS}onDatatype`,
    withRestrictions: `${OWL_NS}withRestrictions`,
    datatypeComplementOf: `${OWL_NS}datatypeComplementOf`,
    real: `${OWL_NS}real`,
    rational: `${OWL_NS}rational`,

    inverseOf: `${OWL_NS}inverseOf`,
    equivalentClass: `${OWL_NS}equivalentClass`,
    disjointWith: `${OWL_NS}disjointWith`,
    disjointUnionOf: `${OWL_NS}disjointUnionOf`,
    hasKey: `${OWL_NS}hasKey`,
    equivalentProperty: `${OWL_NS}equivalentProperty`,
    propertyDisjointWith: `${OWL_NS}propertyDisjointWith`,
    propertyChainAxiom: `${OWL_NS}propertyChainAxiom`,

    FunctionalProperty: `${OWL_NS}FunctionalProperty`,
    InverseFunctionalProperty: `${OWL_NS}InverseFunctionalProperty`,
    TransitiveProperty: `${OWL_NS}TransitiveProperty`,
    SymmetricProperty: `${OWL_NS}SymmetricProperty`,
    AsymmetricProperty: `${OWL_NS}AsymmetricProperty`,
    ReflexiveProperty: `${OWL_NS}ReflexiveProperty`,
    IrreflexiveProperty: `${OWL_NS}IrreflexiveProperty`,

    AllDisjointClasses: `${OWL_NS}AllDisjointClasses`,
    AllDisjointProperties: `${OWL_NS}AllDisjointProperties`,
    AllDifferent: `${OWL_NS}AllDifferent`,
    members: `${OWL_NS}members`,
    distinctMembers: `${OWL_NS}distinctMembers`,
    NegativePropertyAssertion: `${OWL_NS}NegativePropertyAssertion`,
    sourceIndividual: `${OWL_NS}sourceIndividual`,
    assertionProperty: `${OWL_NS}assertionProperty`,
    targetIndividual: `${OWL_NS}targetIndividual`,
    targetValue: `${OWL_NS}targetValue`,

    sameAs: `${OWL_NS}sameAs`,
    differentFrom: `${OWL_NS}differentFrom`,
} as const;

export const XSD = {
    string: `${XSD_NS}string`,
    boolean: `${XSD_NS}boolean`,
    integer: `${XSD_NS}integer`,
    nonNegativeInteger: `${XSD_NS}nonNegativeInteger`,
} as const;

/**
 * Constraining facets accepted in datatype restrictions.
 */
export const XSD_FACETS: ReadonlySet<string> = new Set([
    'minInclusive',
    'maxInclusive',
    'minExclusive',
    'maxExclusive',
    'length',
    'minLength',
    'maxLength',
    'pattern',
    'totalDigits',
    'fractionDigits',
].map(name => `${XSD_NS}${name}`).concat(`${RDF_NS}langRange`));

/**
 * Datatypes that are not in the XSD namespace but are built into OWL 2.
 */
export const BUILTIN_DATATYPES: ReadonlySet<string> = new Set([
    RDFS.Literal,
    RDF.PlainLiteral,
    RDF.langString,
    RDF.XMLLiteral,
    OWL.real,
    OWL.rational,
]);

/**
 * Annotation properties defined by RDFS and OWL themselves.
 */
export const BUILTIN_ANNOTATION_PROPERTIES: ReadonlySet<string> = new Set([
    RDFS.label,
    RDFS.comment,
    RDFS.seeAlso,
    RDFS.isDefinedBy,
    OWL.versionInfo,
    OWL.deprecated,
]);

/**
 * Property characteristic types and the characteristic each one declares.
 * FunctionalProperty also applies to data properties.
 */
export const CHARACTERISTIC_TYPES: ReadonlyMap<string, ObjectPropertyCharacteristicKind> = new Map<string, ObjectPropertyCharacteristicKind>([
    [OWL.FunctionalProperty, 'Functional'],
    [OWL.InverseFunctionalProperty, 'InverseFunctional'],
    [OWL.TransitiveProperty, 'Transitive'],
    [OWL.SymmetricProperty, 'Symmetric'],
    [OWL.AsymmetricProperty, 'Asymmetric'],
    [OWL.ReflexiveProperty, 'Reflexive'],
    [OWL.IrreflexiveProperty, 'Irreflexive'],
]);

/**
 * True for IRIs in the reserved RDF, RDFS, OWL or XSD namespaces.
 */
export function isReservedIri(iri: string): boolean {
    return iri.startsWith(RDF_NS) || iri.startsWith(RDFS_NS) || iri.startsWith(OWL_NS) || iri.startsWith(XSD_NS);
}
