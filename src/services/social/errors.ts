// src/services/social/errors.ts

import type { PublishErrorKind, PublishStage } from '@/types';

export interface PublishErrorOptions {
    stage: PublishStage;
    attempts?: number;
    cause?: unknown;
}

/**
 * Base of the publish-side error taxonomy. `attempts` is filled in once the retry loop ends.
 */
export abstract class PublishError extends Error {
    public abstract readonly kind: PublishErrorKind;
    public readonly stage: PublishStage;
    public attempts: number;

    constructor(message: string, options: PublishErrorOptions) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.stage = options.stage;
        this.attempts = options.attempts ?? 0;
    }
}

export class AuthError extends PublishError {
    public readonly kind = 'AuthError';
}

export class RateLimitError extends PublishError {
    public readonly kind = 'RateLimitError';
    /** Provider hint for when the next attempt may succeed */
    public readonly retryAfterMs: number | null;

    constructor(message: string, options: PublishErrorOptions & { retryAfterMs?: number | null }) {
        super(message, options);
        this.retryAfterMs = options.retryAfterMs ?? null;
    }
}

export class NetworkError extends PublishError {
    public readonly kind = 'NetworkError';
}

export class ValidationError extends PublishError {
    public readonly kind = 'ValidationError';
}

export class UnknownProviderError extends PublishError {
    public readonly kind = 'UnknownProviderError';
}

export const isPublishError = (error: unknown): error is PublishError => error instanceof PublishError;
