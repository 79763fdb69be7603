/**
 * Translation Context
 *
 * Per-document state: the triple store, the node resolver with its
 * memoization caches, and the diagnostics collected so far. A context is
 * created for one document and discarded once its result is handed out.
 *
 * Consumption is transactional: a construct or axiom that fails releases
 * every triple it consumed, including those of sub-constructs that had
 * already succeeded.
 */

import { TripleStore } from '../store/tripleStore.js';
import type { TranslationDiagnostic } from '../types/errors.js';
import type { TranslateOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import type { Triple } from '../types/rdf.js';
import { NodeResolver } from './resolver.js';

export interface ResolvedOptions {
    translateOrphans: boolean;
    maxListLength: number;
    onDiagnostic?: TranslateOptions['onDiagnostic'];
    onProgress?: TranslateOptions['onProgress'];
}

export class TranslationContext {
    readonly store: TripleStore;
    readonly resolver: NodeResolver;
    readonly options: ResolvedOptions;
    readonly diagnostics: TranslationDiagnostic[] = [];
    private readonly recorders: Triple[][] = [];
    private readonly held: TranslationDiagnostic[][] = [];

    constructor(source: TripleStore | Iterable<Triple>, options: TranslateOptions = {}) {
        this.store = source instanceof TripleStore ? source : new TripleStore(source);
        this.options = {
            translateOrphans: options.translateOrphans ?? DEFAULTS.translateOrphans,
            maxListLength: options.maxListLength ?? DEFAULTS.maxListLength,
            onDiagnostic: options.onDiagnostic,
            onProgress: options.onProgress,
        };
        this.resolver = new NodeResolver(this);
    }

    report(diagnostic: TranslationDiagnostic): void {
        const held = this.held[this.held.length - 1];
        if (held) {
            held.push(diagnostic);
            return;
        }
        this.diagnostics.push(diagnostic);
        this.options.onDiagnostic?.(diagnostic);
    }

    /**
     * Run `fn`, holding back the diagnostics it reports so the caller can
     * pass them on or fold them into one. If `fn` throws they are reported
     * as they are.
     */
    collect<T>(fn: () => T): { value: T; diagnostics: TranslationDiagnostic[] } {
        const diagnostics: TranslationDiagnostic[] = [];
        this.held.push(diagnostics);
        try {
            const value = fn();
            this.held.pop();
            return { value, diagnostics };
        } catch (e) {
            this.held.pop();
            diagnostics.forEach(d => this.report(d));
            throw e;
        }
    }

    /**
     * Mark every triple a finished construct was built from as used.
     */
    consume(triples: Iterable<Triple>): void {
        for (const t of triples) {
            this.store.consume(t);
            for (const recorder of this.recorders) {
                recorder.push(t);
            }
        }
    }

    /**
     * Run `build` and return its value with every triple consumed on the
     * way. When `build` throws, the triples it newly consumed are released.
     */
    transaction<T>(build: () => T): { value: T; triples: Triple[] } {
        const mark = this.store.mark();
        const triples: Triple[] = [];
        this.recorders.push(triples);
        try {
            return { value: build(), triples };
        } catch (e) {
            this.store.rollback(mark);
            throw e;
        } finally {
            this.recorders.pop();
        }
    }

    progress(progress: number | undefined, message: string): void {
        this.options.onProgress?.(progress, message);
    }
}
