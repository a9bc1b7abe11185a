// src/services/social/base-publisher.ts

import { config } from '@/config';
import type {
    ApiResponse,
    Clock,
    ContentDraft,
    ImageArtifact,
    PublishOptions,
    PublishResult,
    PublishStage,
    RetryPolicy,
    RetryState,
    SocialPlatform
} from '@/types';
import { systemClock, TimeoutError, withTimeout, AbortedError } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { composePostText } from '@/services/content/post-text';
import { NetworkError, PublishError, RateLimitError, ValidationError } from './errors';
import { DEFAULT_RETRY_POLICY, initialRetryState, nextRetryState, resumeAfterBackoff } from './retry-policy';

const logger = createServiceLogger('BasePublisher');

export interface PublisherSettings {
    retry: RetryPolicy;
    callTimeoutMs: number;
    maxMediaBytes: number;
    hashtagCount: number;
    /** Limit on the composed text, body and hashtags together */
    characterBudget: number;
}

const defaultSettings = (): PublisherSettings => ({
    retry: DEFAULT_RETRY_POLICY,
    callTimeoutMs: config.publisher.callTimeoutMs,
    maxMediaBytes: config.platform.maxMediaBytes,
    hashtagCount: config.content.hashtagCount,
    characterBudget: config.content.characterBudget
});

/**
 * Upload-then-post publishing with a retry state machine.
 * Platforms implement the two calls and map their failures onto the error taxonomy.
 */
export abstract class BasePublisher {
    protected readonly settings: PublisherSettings;

    constructor(
        protected readonly platformName: SocialPlatform,
        settings: Partial<PublisherSettings> = {},
        protected readonly clock: Clock = systemClock
    ) {
        this.settings = { ...defaultSettings(), ...settings };
    }

    /** Upload image bytes, returning the platform's media reference */
    protected abstract uploadMedia(image: ImageArtifact): Promise<string>;

    /** Create the post, returning the platform-assigned post id */
    protected abstract createPost(text: string, hashtags: string[], mediaRef?: string): Promise<string>;

    /** Map anything thrown by a platform call onto the taxonomy */
    protected abstract classifyError(error: unknown, stage: PublishStage): PublishError;

    protected abstract postUrl(postId: string): string;

    /**
     * Check that the configured credentials are accepted
     */
    public abstract validateToken(): Promise<ApiResponse<boolean>>;

    /** Whether the platform can take this artifact as an attachment */
    protected acceptsMedia(image: ImageArtifact): boolean {
        return image.mimeType === 'image/png';
    }

    /**
     * Publish a draft with its image. Rejects with a PublishError whose `attempts`
     * is the number of attempts made.
     */
    public async publish(draft: ContentDraft, image: ImageArtifact, options: PublishOptions = {}): Promise<PublishResult> {
        const invalid = this.validateDraft(draft, image);
        if (invalid) {
            logger.warn(`${this.platformName} draft rejected before publishing`, { reason: invalid.message });
            throw invalid;
        }

        const withMedia = this.acceptsMedia(image);
        if (!withMedia) {
            logger.warn(`${this.platformName} does not accept ${image.mimeType}, posting without media`);
        }

        const { signal, onAttempt } = options;
        let mediaRef: string | undefined;
        let state: RetryState = initialRetryState();

        for (;;) {
            switch (state.state) {
                case 'Attempting': {
                    const attempt = state.attempt;
                    let stage = this.pendingStage(withMedia, mediaRef);
                    this.throwIfAborted(signal, attempt - 1, stage);
                    onAttempt?.(attempt);

                    try {
                        if (stage === 'media-upload') {
                            mediaRef = await this.callPlatform(() => this.uploadMedia(image), stage);
                            logger.debug(`${this.platformName} media uploaded`, { mediaRef, bytes: image.data.length });
                        }
                        stage = 'create-post';
                        const postId = await this.callPlatform(
                            () => this.createPost(draft.body, draft.hashtags, mediaRef),
                            stage
                        );
                        return this.successResult(postId, attempt);
                    } catch (error: unknown) {
                        const failure = error instanceof PublishError ? error : this.classifyError(error, stage);
                        const retryAfterMs = failure instanceof RateLimitError ? failure.retryAfterMs : null;
                        state = nextRetryState(failure.kind, attempt, this.settings.retry, retryAfterMs);

                        if (state.state === 'ExhaustedFailed') {
                            failure.attempts = attempt;
                            logger.error(`${this.platformName} publish failed`, failure, {
                                kind: failure.kind,
                                stage: failure.stage,
                                attempts: attempt
                            });
                            throw failure;
                        }

                        logger.warn(`${this.platformName} ${failure.kind} at ${failure.stage}, retrying`, {
                            attempt,
                            delayMs: state.delayMs,
                            error: failure.message
                        });
                    }
                    break;
                }

                case 'Backoff': {
                    try {
                        await this.clock.sleep(state.delayMs, signal);
                    } catch (error: unknown) {
                        if (error instanceof AbortedError) {
                            this.throwIfAborted(signal, state.attempt, this.pendingStage(withMedia, mediaRef));
                        }
                        throw error;
                    }
                    state = resumeAfterBackoff(state);
                    break;
                }

                case 'Succeeded':
                case 'ExhaustedFailed':
                    throw new Error(`Retry loop reached terminal state ${state.state}`);
            }
        }
    }

    /**
     * Compose the post text from body and hashtags
     */
    protected composeText(body: string, hashtags: string[]): string {
        return composePostText(body, hashtags);
    }

    /**
     * Validate post content before any attempt is made
     */
    protected validateDraft(draft: ContentDraft, image: ImageArtifact): ValidationError | null {
        const stage: PublishStage = 'validation';

        if (draft.body.trim().length === 0) {
            return new ValidationError('Post body is empty', { stage });
        }
        if (draft.hashtags.length !== this.settings.hashtagCount) {
            return new ValidationError(
                `Expected ${this.settings.hashtagCount} hashtags, got ${draft.hashtags.length}`,
                { stage }
            );
        }
        const textLength = this.composeText(draft.body, draft.hashtags).length;
        if (textLength > this.settings.characterBudget) {
            return new ValidationError(
                `Post is ${textLength} characters, limit is ${this.settings.characterBudget}`,
                { stage }
            );
        }
        if (image.data.length > this.settings.maxMediaBytes) {
            return new ValidationError(
                `Media is ${image.data.length} bytes, limit is ${this.settings.maxMediaBytes}`,
                { stage }
            );
        }
        return null;
    }

    /**
     * Bound a platform call by the call timeout. A timeout is a NetworkError.
     */
    private async callPlatform<T>(call: () => Promise<T>, stage: PublishStage): Promise<T> {
        try {
            return await withTimeout(call(), this.settings.callTimeoutMs, `${this.platformName} ${stage}`);
        } catch (error: unknown) {
            if (error instanceof TimeoutError) {
                throw new NetworkError(error.message, { stage, cause: error });
            }
            throw error;
        }
    }

    /** The call the next attempt starts with; an uploaded media ref is reused */
    private pendingStage(withMedia: boolean, mediaRef: string | undefined): PublishStage {
        return withMedia && mediaRef === undefined ? 'media-upload' : 'create-post';
    }

    private throwIfAborted(signal: AbortSignal | undefined, attemptsMade: number, stage: PublishStage): void {
        if (signal?.aborted) {
            throw new NetworkError(`${this.platformName} publish abandoned`, {
                stage,
                attempts: attemptsMade
            });
        }
    }

    private successResult(postId: string, attempts: number): PublishResult {
        const result: PublishResult = {
            platform: this.platformName,
            platformPostId: postId,
            url: this.postUrl(postId),
            attempts,
            publishedAt: new Date(this.clock.now()).toISOString()
        };

        logger.info(`${this.platformName} post published successfully`, {
            postId: result.platformPostId,
            url: result.url,
            attempts
        });
        return result;
    }
}
