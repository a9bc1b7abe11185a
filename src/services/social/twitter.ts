// src/services/social/twitter.ts

import { ApiPartialResponseError, ApiRequestError, ApiResponseError, TwitterApi } from 'twitter-api-v2';
import { config } from '@/config';
import { API_ENDPOINTS } from '@/config/apis';
import type { ApiResponse, Clock, CredentialSource, ImageArtifact, PublishStage } from '@/types';
import { createApiResponse, errorMessage, systemClock } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { BasePublisher, type PublisherSettings } from './base-publisher';
import { EnvCredentialSource } from './credentials';
import {
    AuthError,
    NetworkError,
    PublishError,
    RateLimitError,
    UnknownProviderError,
    ValidationError
} from './errors';

const logger = createServiceLogger('TwitterPublisher');

export interface HttpFailure {
    status?: number;
    retryAfterMs?: number | null;
    detail: string;
}

/**
 * Map an HTTP-level failure onto the publish error taxonomy
 */
export const mapHttpFailure = (failure: HttpFailure, stage: PublishStage): PublishError => {
    const { status, detail } = failure;
    const message = status ? `HTTP ${status}: ${detail}` : detail;

    if (status === undefined) {
        return new NetworkError(message, { stage });
    }
    if (status === 403 && /duplicate/i.test(detail)) {
        return new ValidationError(message, { stage });
    }
    if (status === 401 || status === 403) {
        return new AuthError(message, { stage });
    }
    if (status === 429) {
        return new RateLimitError(message, { stage, retryAfterMs: failure.retryAfterMs ?? null });
    }
    if (status === 400 || status === 413 || status === 422) {
        return new ValidationError(message, { stage });
    }
    if (status >= 500) {
        return new NetworkError(message, { stage });
    }
    return new UnknownProviderError(message, { stage });
};

export interface TwitterPublisherOptions {
    credentials?: CredentialSource;
    postingEnabled?: boolean;
    settings?: Partial<PublisherSettings>;
    clock?: Clock;
}

/**
 * X (Twitter) publisher: v1 media upload, v2 post creation
 */
export class TwitterPublisher extends BasePublisher {
    private static instance: TwitterPublisher;
    private readonly credentials: CredentialSource;
    private readonly postingEnabled: boolean;
    private client: TwitterApi | null = null;

    constructor(options: TwitterPublisherOptions = {}) {
        super('twitter', options.settings, options.clock ?? systemClock);
        this.credentials = options.credentials ?? new EnvCredentialSource();
        this.postingEnabled = options.postingEnabled ?? config.platform.postingEnabled;
    }

    public static getInstance(): TwitterPublisher {
        if (!TwitterPublisher.instance) {
            TwitterPublisher.instance = new TwitterPublisher();
        }
        return TwitterPublisher.instance;
    }

    public isDryRun(): boolean {
        return !this.postingEnabled;
    }

    public async validateToken(): Promise<ApiResponse<boolean>> {
        if (this.isDryRun()) {
            return createApiResponse(true, 'Posting disabled, token not checked', true);
        }

        try {
            const me = await this.getClient('validation').v2.me();
            logger.info('Twitter token validated successfully', { username: me.data.username });
            return createApiResponse(true, 'Twitter token is valid', true);
        } catch (error: unknown) {
            const failure = error instanceof PublishError ? error : this.classifyError(error, 'validation');
            logger.error('Twitter token validation failed', failure);
            return createApiResponse(false, 'Twitter token validation failed', false, `${failure.kind}: ${failure.message}`);
        }
    }

    protected async uploadMedia(image: ImageArtifact): Promise<string> {
        if (this.isDryRun()) {
            logger.info('[DRY RUN] Would upload media', { bytes: image.data.length, mimeType: image.mimeType });
            return `dry-run-media-${this.clock.now()}`;
        }
        return this.getClient('media-upload').v1.uploadMedia(image.data, { mimeType: image.mimeType });
    }

    protected async createPost(text: string, hashtags: string[], mediaRef?: string): Promise<string> {
        const content = this.composeText(text, hashtags);

        if (this.isDryRun()) {
            logger.info('[DRY RUN] Would post', { length: content.length, mediaRef });
            return `dry-run-${this.clock.now()}`;
        }

        const client = this.getClient('create-post');
        const result = mediaRef
            ? await client.v2.tweet(content, { media: { media_ids: [mediaRef] } })
            : await client.v2.tweet(content);
        return result.data.id;
    }

    protected classifyError(error: unknown, stage: PublishStage): PublishError {
        if (error instanceof PublishError) return error;

        if (error instanceof ApiResponseError) {
            const reset = error.rateLimit?.reset;
            return mapHttpFailure({
                status: error.code,
                retryAfterMs: reset !== undefined ? Math.max(0, reset * 1000 - this.clock.now()) : null,
                detail: `${error.message} ${JSON.stringify(error.data)}`
            }, stage);
        }

        if (error instanceof ApiRequestError || error instanceof ApiPartialResponseError) {
            return new NetworkError(error.message, { stage, cause: error });
        }

        return new UnknownProviderError(errorMessage(error), { stage, cause: error });
    }

    protected postUrl(postId: string): string {
        return API_ENDPOINTS.twitter.statusUrl(postId);
    }

    private getClient(stage: PublishStage): TwitterApi {
        if (!this.client) {
            const credentials = this.credentials.getPlatformCredentials();
            if (!credentials) {
                throw new AuthError(
                    'X API credentials not configured. Set X_API_KEY, X_API_SECRET, X_ACCESS_TOKEN, X_ACCESS_SECRET',
                    { stage }
                );
            }
            this.client = new TwitterApi(credentials);
        }
        return this.client;
    }
}

export default TwitterPublisher;
