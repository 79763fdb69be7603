/**
 * Shared type definitions for the translation engine
 */

// Re-export error types
export {
    TranslationException,
    LOCAL_ERROR_CODES,
    isLocalFailure,
    createMalformedError,
    createUnsupportedError,
    createCyclicError,
    createResidueDiagnostic,
    createResidueRejectedError,
    createInvariantViolation,
    createLoadError,
    createConfigError,
    serializeDiagnostic,
} from './errors.js';

export type {
    TranslationErrorCode,
    TranslationDiagnostic,
} from './errors.js';

// Re-export RDF term types
export type {
    IriNode,
    BlankNode,
    LiteralNode,
    NodeRef,
    ObjectTerm,
    Triple,
    TriplePattern,
} from './rdf.js';

// Re-export the object model
export type {
    IRI,
    NamedClass,
    NamedObjectProperty,
    InverseObjectProperty,
    NamedDataProperty,
    NamedAnnotationProperty,
    NamedDatatype,
    NamedIndividual,
    AnonymousIndividual,
    Literal,
    ObjectPropertyExpression,
    PropertyExpression,
    Individual,
    CardinalityKind,
    ClassExpression,
    FacetRestriction,
    DataRange,
    EntityKind,
    ObjectPropertyCharacteristicKind,
    AnnotationSubject,
    AnnotationValue,
    ClassAxiom,
    ObjectPropertyAxiom,
    DataPropertyAxiom,
    Assertion,
    Axiom,
    AxiomType,
} from './model.js';

// Re-export result types
export type {
    OntologyHeader,
    TranslationResult,
    TranslationSummary,
} from './responses.js';

// Re-export options
export type {
    TranslateOptions,
    ResiduePolicy,
    OutputFormat,
} from './options.js';
