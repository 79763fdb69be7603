/**
 * Raised when a construct cannot be finished because one of its parts
 * failed. The part's own diagnostic already explains the failure, so the
 * enclosing construct is abandoned without a second report.
 */
export class UnresolvedDependency extends Error {
    constructor(readonly node?: string) {
        super(node ? `Dependency of ${node} could not be translated` : 'Dependency could not be translated');
        this.name = 'UnresolvedDependency';
    }
}

/**
 * Unwrap a resolution result inside a translator, abandoning the construct
 * when the part is missing.
 */
export function required<T>(value: T | undefined, node?: string): T {
    if (value === undefined) {
        throw new UnresolvedDependency(node);
    }
    return value;
}
