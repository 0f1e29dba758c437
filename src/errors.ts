/**
 * Raised when a similarity backend (embeddings or the reasoning service) cannot produce scores.
 * The similarity scorer catches it and falls back to lexical scoring.
 */
export class ScoringUnavailableError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ScoringUnavailableError';
    }
}

/**
 * Raised when no JSON array can be recovered from a reasoning-service reply.
 */
export class MalformedResponseError extends Error {
    constructor(message: string, readonly rawText: string) {
        super(message);
        this.name = 'MalformedResponseError';
    }
}
