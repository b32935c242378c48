import type { StorageTierName } from '../types/index.js';

/**
 * Caller-input error (empty query, non-positive result cap, ...).
 * Raised before any work is performed.
 */
export class InvalidRequestError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'InvalidRequestError';
    }
}

/** Which step of a save failed */
export type StoragePhase = 'init' | 'metadata' | 'pdf' | 'scan';

/**
 * Fatal filesystem failure for a tier. Surfaced immediately; a failed
 * PDF write leaves the pair in the "metadata without PDF" state.
 */
export class StorageError extends Error {
    constructor(
        message: string,
        public readonly tier: StorageTierName,
        public readonly path: string,
        public readonly phase: StoragePhase,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'StorageError';
    }
}

/**
 * Retrieval aborted through the caller's AbortSignal.
 */
export class RetrievalCancelledError extends Error {
    constructor(message = 'Retrieval cancelled') {
        super(message);
        this.name = 'RetrievalCancelledError';
    }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
