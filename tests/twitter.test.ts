// tests/twitter.test.ts

import { ClientRequest, IncomingMessage } from 'http';
import { Socket } from 'net';
import { ApiRequestError, ApiResponseError, type TwitterRateLimit } from 'twitter-api-v2';
import { describe, expect, it } from 'vitest';
import { StaticCredentialSource } from '../src/services/social/credentials';
import { PublishError, RateLimitError } from '../src/services/social/errors';
import { mapHttpFailure, TwitterPublisher } from '../src/services/social/twitter';
import type { PublishStage } from '../src/types';
import { draft, FakeClock, pngImage, START } from './helpers/fakes';

const settings = {
    retry: { maxAttempts: 3, baseDelayMs: 5000, maxDelayMs: 60000 },
    callTimeoutMs: 1000,
    maxMediaBytes: 1024,
    hashtagCount: 15,
    characterBudget: 280
};

class ClassifyingPublisher extends TwitterPublisher {
    public classify(error: unknown, stage: PublishStage = 'create-post'): PublishError {
        return this.classifyError(error, stage);
    }
}

// A request that is never sent: its socket is created but never connected
const unsentRequest = (): ClientRequest => new ClientRequest({ createConnection: () => new Socket() });

const responseError = (code: number, data: Record<string, unknown>, rateLimit?: TwitterRateLimit): ApiResponseError =>
    new ApiResponseError(`Request failed with code ${code}`, {
        code,
        data,
        rateLimit,
        headers: {},
        request: unsentRequest(),
        response: new IncomingMessage(new Socket())
    });

describe('mapHttpFailure', () => {
    it.each([
        [401, 'Unauthorized', 'AuthError'],
        [403, 'Forbidden', 'AuthError'],
        [403, 'You are not allowed to create a Tweet with duplicate content.', 'ValidationError'],
        [400, 'Bad Request', 'ValidationError'],
        [413, 'Payload Too Large', 'ValidationError'],
        [422, 'Unprocessable', 'ValidationError'],
        [429, 'Too Many Requests', 'RateLimitError'],
        [500, 'Internal Server Error', 'NetworkError'],
        [503, 'Service Unavailable', 'NetworkError'],
        [409, 'Conflict', 'UnknownProviderError']
    ])('maps HTTP %i (%s) to %s', (status, detail, kind) => {
        const error = mapHttpFailure({ status, detail }, 'create-post');
        expect(error.kind).toBe(kind);
        expect(error.message).toBe(`HTTP ${status}: ${detail}`);
        expect(error.stage).toBe('create-post');
    });

    it('treats a failure without a response as a network error', () => {
        const error = mapHttpFailure({ detail: 'ECONNRESET' }, 'media-upload');
        expect(error.kind).toBe('NetworkError');
        expect(error.message).toBe('ECONNRESET');
    });

    it('keeps the retry-after hint on rate limits', () => {
        const error = mapHttpFailure({ status: 429, detail: 'Too Many Requests', retryAfterMs: 10_000 }, 'create-post');
        expect(error).toBeInstanceOf(RateLimitError);
        expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(10_000);
    });
});

describe('TwitterPublisher.classifyError', () => {
    const publisher = new ClassifyingPublisher({
        postingEnabled: true,
        credentials: new StaticCredentialSource(null),
        clock: new FakeClock()
    });

    it('maps a 401 response to AuthError', () => {
        const error = publisher.classify(responseError(401, { detail: 'Unauthorized' }));

        expect(error.kind).toBe('AuthError');
        expect(error.message).toBe('HTTP 401: Request failed with code 401 {"detail":"Unauthorized"}');
        expect(error.stage).toBe('create-post');
    });

    it('turns the rate-limit reset into a retry-after delay', () => {
        const reset = START / 1000 + 30;
        const error = publisher.classify(responseError(429, { title: 'Too Many Requests' }, { limit: 300, remaining: 0, reset }));

        expect(error).toBeInstanceOf(RateLimitError);
        expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(30_000);
    });

    it('leaves the retry-after empty when the response has no rate-limit headers', () => {
        const error = publisher.classify(responseError(429, { title: 'Too Many Requests' }));

        expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBeNull();
    });

    it('maps an oversized upload to ValidationError at the upload stage', () => {
        const error = publisher.classify(responseError(413, { error: 'File size exceeds limit' }), 'media-upload');

        expect(error.kind).toBe('ValidationError');
        expect(error.stage).toBe('media-upload');
    });

    it('maps a duplicate-content rejection to ValidationError', () => {
        const error = publisher.classify(responseError(403, {
            detail: 'You are not allowed to create a Tweet with duplicate content.'
        }));

        expect(error.kind).toBe('ValidationError');
    });

    it('maps a 503 response to NetworkError', () => {
        expect(publisher.classify(responseError(503, { title: 'Service Unavailable' })).kind).toBe('NetworkError');
    });

    it('maps a request that never got a response to NetworkError', () => {
        const error = publisher.classify(new ApiRequestError('Request failed: ECONNRESET', {
            request: unsentRequest(),
            error: new Error('ECONNRESET')
        }));

        expect(error.kind).toBe('NetworkError');
        expect(error.message).toBe('Request failed: ECONNRESET');
    });

    it('maps anything else to UnknownProviderError', () => {
        const error = publisher.classify(new Error('unexpected payload'), 'media-upload');

        expect(error.kind).toBe('UnknownProviderError');
        expect(error.message).toBe('unexpected payload');
        expect(error.stage).toBe('media-upload');
    });
});

describe('TwitterPublisher', () => {
    it('simulates upload and post when posting is disabled', async () => {
        const publisher = new TwitterPublisher({
            postingEnabled: false,
            credentials: new StaticCredentialSource(null),
            settings,
            clock: new FakeClock()
        });

        const result = await publisher.publish(draft(), pngImage());

        expect(publisher.isDryRun()).toBe(true);
        expect(result.platformPostId).toBe(`dry-run-${START}`);
        expect(result.url).toBe(`https://x.com/i/status/dry-run-${START}`);
        expect(result.attempts).toBe(1);
    });

    it('skips the token check in dry-run mode', async () => {
        const publisher = new TwitterPublisher({ postingEnabled: false, credentials: new StaticCredentialSource(null) });

        await expect(publisher.validateToken()).resolves.toEqual({
            successful: true,
            message: 'Posting disabled, token not checked',
            data: true
        });
    });

    it('reports missing credentials from the token check', async () => {
        const publisher = new TwitterPublisher({ postingEnabled: true, credentials: new StaticCredentialSource(null) });

        await expect(publisher.validateToken()).resolves.toEqual({
            successful: false,
            message: 'Twitter token validation failed',
            data: false,
            error: 'AuthError: X API credentials not configured. Set X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN, X_ACCESS_SECRET'
        });
    });

    it('fails with a non-retried AuthError when credentials are missing', async () => {
        const clock = new FakeClock();
        const publisher = new TwitterPublisher({
            postingEnabled: true,
            credentials: new StaticCredentialSource(null),
            settings,
            clock
        });

        let failure: unknown;
        try {
            await publisher.publish(draft(), pngImage());
        } catch (error: unknown) {
            failure = error;
        }

        expect(failure).toBeInstanceOf(PublishError);
        expect(failure instanceof PublishError ? [failure.kind, failure.stage, failure.attempts] : null)
            .toEqual(['AuthError', 'media-upload', 1]);
        expect(clock.sleeps).toEqual([]);
    });
});
