// src/types/social.ts

export type SocialPlatform = 'twitter';

export type PublishErrorKind =
    | 'AuthError'
    | 'RateLimitError'
    | 'NetworkError'
    | 'ValidationError'
    | 'UnknownProviderError';

export type PublishStage = 'validation' | 'media-upload' | 'create-post';

export interface PublishResult {
    platform: SocialPlatform;
    platformPostId: string;
    url: string;
    attempts: number;
    publishedAt: string;
}

export interface PublishOptions {
    signal?: AbortSignal;
    /** Called with the 1-based attempt number before each attempt starts */
    onAttempt?: (attempt: number) => void;
}

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export type RetryState =
    | { state: 'Attempting'; attempt: number }
    | { state: 'Backoff'; attempt: number; delayMs: number }
    | { state: 'Succeeded'; attempts: number }
    | { state: 'ExhaustedFailed'; attempts: number; kind: PublishErrorKind };

export interface PlatformCredentials {
    appKey: string;
    appSecret: string;
    accessToken: string;
    accessSecret: string;
}

export interface CredentialSource {
    getPlatformCredentials(): PlatformCredentials | null;
    getTextProviderKey(): string | null;
}

export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
