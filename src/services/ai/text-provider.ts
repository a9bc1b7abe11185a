// src/services/ai/text-provider.ts

import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { config } from '@/config';
import { API_ENDPOINTS, COMPLETION_PARAMS, DEFAULT_HEADERS, REQUEST_TIMEOUTS } from '@/config/apis';
import type { CredentialSource, GenerationFailureKind } from '@/types';
import { EnvCredentialSource } from '@/services/social/credentials';
import { createServiceLogger, logApiRequest } from '@/utils/logger';

const logger = createServiceLogger('TextProvider');

export class GenerationError extends Error {
    constructor(public readonly kind: GenerationFailureKind, message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}

/**
 * External text-generation API. Implementations reject with GenerationError.
 */
export interface TextProvider {
    readonly name: string;
    complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

interface ChatCompletion {
    choices: Array<{ message: { content: string } }>;
}

const chatCompletionSchema = Joi.object<ChatCompletion>({
    choices: Joi.array()
        .items(
            Joi.object({
                message: Joi.object({
                    content: Joi.string().trim().min(1).required()
                }).unknown(true).required()
            }).unknown(true)
        )
        .min(1)
        .required()
}).unknown(true);

/**
 * Map a failed HTTP call onto the generation failure kinds
 */
export const classifyTextProviderError = (error: unknown): GenerationError => {
    if (error instanceof GenerationError) return error;

    if (axios.isCancel(error)) {
        return new GenerationError('GenerationTimeout', 'Text generation request was cancelled');
    }

    if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new GenerationError('GenerationTimeout', error.message);
        }

        const status = error.response?.status;
        if (status === 401 || status === 403) {
            return new GenerationError('AuthError', `Text provider rejected credentials (HTTP ${status})`);
        }
        if (status === 429) {
            return new GenerationError('RateLimitError', 'Text provider quota or rate limit reached');
        }
        if (status !== undefined && status < 500) {
            return new GenerationError('MalformedResponse', `Text provider refused the request (HTTP ${status})`);
        }
        return new GenerationError('NetworkError', status ? `Text provider error (HTTP ${status})` : error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new GenerationError('NetworkError', message);
};

/**
 * OpenAI-compatible chat completions through OpenRouter
 */
export class OpenRouterTextProvider implements TextProvider {
    public readonly name = 'openrouter';
    private readonly axiosInstance: AxiosInstance;
    private readonly apiKey: string | null;

    constructor(
        credentials: CredentialSource = new EnvCredentialSource(),
        private readonly model: string = config.textProvider.model
    ) {
        const apiKey = credentials.getTextProviderKey();
        this.apiKey = apiKey;
        this.axiosInstance = axios.create({
            baseURL: API_ENDPOINTS.openRouter.baseUrl,
            timeout: REQUEST_TIMEOUTS.openRouter,
            headers: {
                ...DEFAULT_HEADERS.openRouter,
                ...(apiKey ? { 'Authorization': `Bearer ${apiKey}` } : {})
            }
        });

        this.axiosInstance.interceptors.request.use((requestConfig) => {
            logger.debug('AI API request', { model: this.model, endpoint: requestConfig.url });
            return requestConfig;
        });

        this.axiosInstance.interceptors.response.use(
            (response) => {
                logApiRequest('openrouter', response.config.url || '',
                    response.config.method?.toUpperCase() || 'POST',
                    response.status);
                return response;
            },
            (error: unknown) => {
                if (axios.isAxiosError(error)) {
                    logApiRequest('openrouter', error.config?.url || '',
                        error.config?.method?.toUpperCase() || 'POST',
                        error.response?.status);
                }
                return Promise.reject(error);
            }
        );
    }

    public async complete(prompt: string, signal?: AbortSignal): Promise<string> {
        if (!this.apiKey) {
            throw new GenerationError('NotConfigured', 'No text provider API key configured');
        }

        let data: unknown;
        try {
            const response = await this.axiosInstance.post<unknown>(
                API_ENDPOINTS.openRouter.chat,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: COMPLETION_PARAMS.systemPrompt },
                        { role: 'user', content: prompt }
                    ],
                    max_tokens: COMPLETION_PARAMS.maxTokens,
                    temperature: COMPLETION_PARAMS.temperature
                },
                { signal }
            );
            data = response.data;
        } catch (error: unknown) {
            throw classifyTextProviderError(error);
        }

        const { error, value } = chatCompletionSchema.validate(data);
        const content = value?.choices[0]?.message.content;
        if (error || !content) {
            throw new GenerationError('MalformedResponse', error ? error.message : 'Empty completion');
        }
        return content.trim();
    }
}
