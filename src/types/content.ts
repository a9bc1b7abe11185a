// src/types/content.ts

import type { TopicCategory } from './topic';

export type AspectProfile = 'wide' | 'square' | 'portrait';

export type GenerationMethod = 'primary' | 'fallback';

export type GenerationFailureKind =
    | 'GenerationTimeout'
    | 'NotConfigured'
    | 'AuthError'
    | 'RateLimitError'
    | 'NetworkError'
    | 'MalformedResponse';

export interface ContentDraft {
    topicId: string;
    topicName: string;
    category: TopicCategory;
    body: string;
    hashtags: string[];
    method: GenerationMethod;
    fallbackReason: GenerationFailureKind | null;
}

export interface ImageArtifact {
    data: Buffer;
    mimeType: 'image/png' | 'image/svg+xml';
    profile: AspectProfile;
    width: number;
    height: number;
    degraded: boolean;
}

export interface ImageDimensions {
    width: number;
    height: number;
    aspectRatio: '16:9' | '1:1' | '4:5';
}
