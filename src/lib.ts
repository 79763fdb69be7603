/**
 * OWL RDF Translator - Library Entry Point
 *
 * Exports the translation engine and its outer collaborators for use in
 * other projects. The engine performs no I/O; the Turtle loader and the
 * residue policy are optional helpers around it.
 */

// Core Engine
export { translateDocument, AxiomAssembler } from './translation/assembler.js';
export { TranslationContext } from './translation/context.js';
export { NodeResolver } from './translation/resolver.js';
export { dispatch, selectTranslator, TRANSLATORS } from './translation/dispatcher.js';
export type { DispatchCategory, DispatchResult } from './translation/dispatcher.js';
export type { Translator } from './translation/translators/common.js';

// Triple Store
export { TripleStore } from './store/tripleStore.js';
export { iri, blank, literal, triple, termKey, tripleKey, termEquals } from './model/terms.js';

// Model constructors
export * from './model/factory.js';

// Loader, policy and configuration
export { parseTurtle } from './io/turtle.js';
export type { ParseTurtleOptions } from './io/turtle.js';
export { applyResiduePolicy } from './policy.js';
export { loadConfig, cliConfigSchema } from './config.js';
export type { CliConfig, CliConfigOverrides } from './config.js';

// Reporting
export { shortForm, describeTerm } from './utils/shortForm.js';
export { formatTriple, formatDiagnostic, formatSummary, summarize } from './utils/formatting.js';

// Vocabulary
export { RDF, RDFS, OWL, XSD, RDF_NS, RDFS_NS, OWL_NS, XSD_NS } from './vocab/index.js';

// Types and Interfaces
export * from './types/index.js';

// Constants
export { DEFAULTS } from './types/options.js';
