// src/config/apis.ts

import { config } from './index';

export const API_ENDPOINTS = {
    openRouter: {
        baseUrl: config.textProvider.baseUrl,
        chat: '/chat/completions'
    },

    twitter: {
        statusUrl: (postId: string) => `https://x.com/i/status/${postId}`
    }
};

export const REQUEST_TIMEOUTS = {
    openRouter: config.textProvider.timeoutMs
};

export const RETRY_CONFIG = {
    maxAttempts: config.publisher.maxAttempts,
    baseDelayMs: config.publisher.baseDelayMs,
    maxDelayMs: config.publisher.maxDelayMs
};

export const DEFAULT_HEADERS = {
    openRouter: {
        'Content-Type': 'application/json',
        'X-Title': 'Content Autopilot'
    }
};

export const COMPLETION_PARAMS = {
    maxTokens: 150,
    temperature: 0.7,
    systemPrompt:
        'You are an expert in Bitcoin, Lightning Network, Nostr and online privacy, ' +
        'creating educational content for social media. Never include hashtags.'
};
