/**
 * Triple Store
 *
 * Owns every ingested triple in an arena addressed by canonical triple key.
 * Consumption is tracked by flags keyed on that identifier; triples are never
 * removed, so lookups and consumption stay independent. Consumption is logged
 * in order so that a construct which fails part way can be rolled back.
 */

import type { NodeRef, ObjectTerm, Triple, TriplePattern } from '../types/rdf.js';
import { termKey, tripleKey } from '../model/terms.js';
import { createInvariantViolation, createMalformedError } from '../types/errors.js';

export class TripleStore {
    private readonly triples = new Map<string, Triple>();
    private readonly bySubject = new Map<string, Set<string>>();
    private readonly byPredicate = new Map<string, Set<string>>();
    private readonly byObject = new Map<string, Set<string>>();
    private readonly consumedKeys = new Set<string>();
    private readonly consumeLog: string[] = [];

    constructor(triples: Iterable<Triple> = []) {
        for (const t of triples) {
            this.assert(t);
        }
    }

    get size(): number {
        return this.triples.size;
    }

    /**
     * Insert a fact. Returns false when an identical triple is already stored.
     */
    assert(t: Triple): boolean {
        const key = tripleKey(t);
        if (this.triples.has(key)) {
            return false;
        }
        this.triples.set(key, t);
        addToIndex(this.bySubject, termKey(t.subject), key);
        addToIndex(this.byPredicate, t.predicate, key);
        addToIndex(this.byObject, termKey(t.object), key);
        return true;
    }

    /**
     * All triples matching the pattern, ordered by canonical key.
     */
    match(pattern: TriplePattern = {}): Triple[] {
        const candidates = this.candidateKeys(pattern);
        const predicate = pattern.predicate;
        const objectKey = pattern.object ? termKey(pattern.object) : undefined;
        const subjectKey = pattern.subject ? termKey(pattern.subject) : undefined;

        const keys: string[] = [];
        for (const key of candidates) {
            const t = this.triples.get(key);
            if (!t) continue;
            if (predicate !== undefined && t.predicate !== predicate) continue;
            if (subjectKey !== undefined && termKey(t.subject) !== subjectKey) continue;
            if (objectKey !== undefined && termKey(t.object) !== objectKey) continue;
            keys.push(key);
        }
        keys.sort();
        return keys.map(key => this.getByKey(key));
    }

    has(subject: NodeRef, predicate: string, object?: ObjectTerm): boolean {
        if (object) {
            return this.triples.has(tripleKey({ subject, predicate, object }));
        }
        return this.match({ subject, predicate }).length > 0;
    }

    objects(subject: NodeRef, predicate: string): ObjectTerm[] {
        return this.match({ subject, predicate }).map(t => t.object);
    }

    /**
     * Distinct subjects of triples with the given predicate (and object), in key order.
     */
    subjects(predicate: string, object?: ObjectTerm): NodeRef[] {
        const seen = new Map<string, NodeRef>();
        for (const t of this.match({ predicate, object })) {
            seen.set(termKey(t.subject), t.subject);
        }
        return [...seen.entries()]
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([, node]) => node);
    }

    /**
     * The unique triple for a functional predicate.
     * Zero or several matches make the construct malformed.
     */
    singletonTriple(subject: NodeRef, predicate: string): Triple {
        const matches = this.match({ subject, predicate });
        if (matches.length !== 1) {
            throw createMalformedError(
                matches.length === 0
                    ? `${termKey(subject)} has no <${predicate}> triple`
                    : `${termKey(subject)} has ${matches.length} <${predicate}> triples where one is required`,
                termKey(subject),
                predicate,
                { found: matches.length }
            );
        }
        return matches[0];
    }

    getSingleton(subject: NodeRef, predicate: string): ObjectTerm {
        return this.singletonTriple(subject, predicate).object;
    }

    /**
     * Like singletonTriple, but absence is allowed.
     */
    optionalTriple(subject: NodeRef, predicate: string): Triple | undefined {
        const matches = this.match({ subject, predicate });
        if (matches.length > 1) {
            throw createMalformedError(
                `${termKey(subject)} has ${matches.length} <${predicate}> triples where at most one is allowed`,
                termKey(subject),
                predicate,
                { found: matches.length }
            );
        }
        return matches[0];
    }

    getOptional(subject: NodeRef, predicate: string): ObjectTerm | undefined {
        return this.optionalTriple(subject, predicate)?.object;
    }

    consume(t: Triple): void {
        const key = tripleKey(t);
        if (!this.triples.has(key)) {
            throw createInvariantViolation(`cannot consume unknown triple ${key}`);
        }
        if (!this.consumedKeys.has(key)) {
            this.consumedKeys.add(key);
            this.consumeLog.push(key);
        }
    }

    /**
     * Position in the consumption log, to roll back to.
     */
    mark(): number {
        return this.consumeLog.length;
    }

    /**
     * Release every triple consumed since the mark was taken.
     */
    rollback(mark: number): void {
        for (const key of this.consumeLog.splice(mark)) {
            this.consumedKeys.delete(key);
        }
    }

    isConsumed(t: Triple): boolean {
        return this.consumedKeys.has(tripleKey(t));
    }

    consumed(): Triple[] {
        return [...this.consumedKeys].sort().map(key => this.getByKey(key));
    }

    unconsumed(): Triple[] {
        return this.match().filter(t => !this.consumedKeys.has(tripleKey(t)));
    }

    private candidateKeys(pattern: TriplePattern): Iterable<string> {
        const lists: Set<string>[] = [];
        if (pattern.subject) lists.push(this.bySubject.get(termKey(pattern.subject)) ?? new Set());
        if (pattern.predicate !== undefined) lists.push(this.byPredicate.get(pattern.predicate) ?? new Set());
        if (pattern.object) lists.push(this.byObject.get(termKey(pattern.object)) ?? new Set());
        if (lists.length === 0) {
            return this.triples.keys();
        }
        return lists.reduce((smallest, list) => (list.size < smallest.size ? list : smallest));
    }

    private getByKey(key: string): Triple {
        const t = this.triples.get(key);
        if (!t) {
            throw createInvariantViolation(`triple ${key} missing from arena`);
        }
        return t;
    }
}

function addToIndex(index: Map<string, Set<string>>, key: string, tripleId: string): void {
    let bucket = index.get(key);
    if (!bucket) {
        bucket = new Set();
        index.set(key, bucket);
    }
    bucket.add(tripleId);
}
