/**
 * Error types raised by the tree.
 * Messages carry the same `Kind: detail` prefix so they read well in test logs.
 */

export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(`InvalidArgument: ${message}`);
        this.name = 'InvalidArgumentError';
    }
}

/** Raised by an iterator whose tree was mutated after the iterator was created. */
export class ConcurrentModificationError extends Error {
    constructor(message = 'the tree was modified during iteration') {
        super(`ConcurrentModification: ${message}`);
        this.name = 'ConcurrentModificationError';
    }
}

export class UnsupportedOperationError extends Error {
    constructor(operation: string) {
        super(`UnsupportedOperation: ${operation}`);
        this.name = 'UnsupportedOperationError';
    }
}

/** Rejects `null` / `undefined` where a node handle is required. */
export function requireNode<N>(node: N | null | undefined, op: string): N {
    if (node === null || node === undefined) {
        throw new InvalidArgumentError(`${op}() requires a node, got ${String(node)}`);
    }
    return node;
}
