// src/services/social/retry-policy.ts

import { RETRY_CONFIG } from '@/config/apis';
import type { PublishErrorKind, RetryPolicy, RetryState } from '@/types';

type BackoffState = Extract<RetryState, { state: 'Backoff' }>;
type ExhaustedState = Extract<RetryState, { state: 'ExhaustedFailed' }>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = { ...RETRY_CONFIG };

const RETRYABLE: ReadonlySet<PublishErrorKind> = new Set<PublishErrorKind>(['NetworkError', 'RateLimitError']);

export const isRetryable = (kind: PublishErrorKind): boolean => RETRYABLE.has(kind);

/**
 * Exponential backoff after the given (1-based) failed attempt, capped at maxDelayMs
 */
export const backoffDelay = (attempt: number, policy: RetryPolicy): number => {
    return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
};

export const initialRetryState = (): RetryState => ({ state: 'Attempting', attempt: 1 });

/**
 * Next state after `attempt` failed with `kind`.
 *
 * Retryable kinds back off while attempts remain; a rate-limit hint wins when it is
 * longer than the computed backoff. Everything else ends the sequence.
 */
export const nextRetryState = (
    kind: PublishErrorKind,
    attempt: number,
    policy: RetryPolicy,
    retryAfterMs?: number | null
): BackoffState | ExhaustedState => {
    if (!isRetryable(kind) || attempt >= policy.maxAttempts) {
        return { state: 'ExhaustedFailed', attempts: attempt, kind };
    }

    const backoff = backoffDelay(attempt, policy);
    const delayMs = kind === 'RateLimitError' && retryAfterMs != null
        ? Math.max(backoff, retryAfterMs)
        : backoff;

    return { state: 'Backoff', attempt, delayMs };
};

/**
 * State after leaving Backoff
 */
export const resumeAfterBackoff = (state: BackoffState): RetryState => ({
    state: 'Attempting',
    attempt: state.attempt + 1
});
