// src/utils/validators.ts

import Joi from 'joi';
import {
    TOPIC_CATEGORIES,
    type ApiResponse,
    type CategorySeed,
    type PostRecord,
    type ScheduleState,
    type Topic,
    type TopicCategory,
    type TopicUpdate
} from '@/types';
import { createApiResponse } from './helpers';

export interface CatalogData {
    categories: Record<TopicCategory, CategorySeed>;
    topics: Topic[];
}

const hexColor = Joi.string().pattern(/^#[0-9a-fA-F]{6}$/);
const hashtag = Joi.string().pattern(/^#\w+$/);

/**
 * Environment variables needed for live posting
 */
const postingEnvSchema = Joi.object({
    X_API_KEY: Joi.string().required(),
    X_API_SECRET: Joi.string().required(),
    X_ACCESS_TOKEN: Joi.string().required(),
    X_ACCESS_SECRET: Joi.string().required()
});

const categorySeedSchema = Joi.object({
    palette: Joi.array().items(hexColor).length(4).required(),
    hashtags: Joi.array().items(hashtag).min(1).required()
});

const topicSchema = Joi.object({
    id: Joi.string().pattern(/^[a-z0-9-]+$/).required(),
    name: Joi.string().min(1).required(),
    category: Joi.string().valid(...TOPIC_CATEGORIES).required(),
    enabled: Joi.boolean().required(),
    priority: Joi.number().integer().required()
});

const catalogSchema = Joi.object<CatalogData>({
    categories: Joi.object(
        Object.fromEntries(TOPIC_CATEGORIES.map(category => [category, categorySeedSchema.required()]))
    ).required(),
    topics: Joi.array().items(topicSchema).unique('id').required()
});

const topicUpdateSchema = Joi.object<TopicUpdate>({
    enabled: Joi.boolean(),
    priority: Joi.number().integer()
}).min(1);

const topicOverridesSchema = Joi.object<Record<string, TopicUpdate>>().pattern(Joi.string(), topicUpdateSchema);

const scheduleStateSchema = Joi.object<ScheduleState>({
    intervalMs: Joi.number().integer().positive().required(),
    nextFireAt: Joi.string().isoDate().allow(null).required(),
    enabled: Joi.boolean().required(),
    lastCycleStatus: Joi.string().valid('succeeded', 'failed').allow(null).required(),
    lastCycleAt: Joi.string().isoDate().allow(null).required(),
    rotation: Joi.object({
        recent: Joi.array().items(Joi.string()).required(),
        lastUsed: Joi.object().pattern(Joi.string(), Joi.number().integer()).required(),
        cycleCount: Joi.number().integer().min(0).required()
    }).required()
});

const postRecordSchema = Joi.object<PostRecord>({
    id: Joi.string().required(),
    trigger: Joi.string().valid('timed', 'manual').required(),
    topicId: Joi.string().allow(null).required(),
    topicName: Joi.string().allow(null).required(),
    category: Joi.string().valid(...TOPIC_CATEGORIES).allow(null).required(),
    body: Joi.string().allow('').required(),
    hashtags: Joi.array().items(Joi.string()).required(),
    generationMethod: Joi.string().valid('primary', 'fallback').allow(null).required(),
    imageRef: Joi.string().allow(null).required(),
    platformPostId: Joi.string().allow(null).required(),
    status: Joi.string().valid('succeeded', 'failed').required(),
    failureReason: Joi.string()
        .valid('NoTopicsAvailable', 'AuthError', 'RateLimitError', 'NetworkError', 'ValidationError', 'UnknownProviderError')
        .allow(null)
        .required(),
    failureDetail: Joi.string().allow(null).required(),
    timestamp: Joi.string().isoDate().required(),
    attemptCount: Joi.number().integer().min(0).required()
});

const validateWith = <T>(schema: Joi.ObjectSchema<T>, input: unknown, label: string): ApiResponse<T | undefined> => {
    const { error, value } = schema.validate(input, { abortEarly: false, convert: false });

    if (error) {
        return createApiResponse<T | undefined>(
            false,
            `${label} validation failed`,
            undefined,
            error.details.map(d => d.message).join(', ')
        );
    }

    return createApiResponse<T | undefined>(true, `${label} validated`, value);
};

/**
 * Validate environment variables needed for posting
 */
export const validateEnv = (env: NodeJS.ProcessEnv = process.env, postingEnabled: boolean = true): ApiResponse<boolean> => {
    if (!postingEnabled) {
        return createApiResponse(true, 'Posting disabled, credentials not required', true);
    }

    const { error } = postingEnvSchema.validate(env, {
        allowUnknown: true,
        stripUnknown: true,
        abortEarly: false
    });

    if (error) {
        return createApiResponse(
            false,
            'Environment validation failed',
            false,
            error.details.map(d => d.message).join(', ')
        );
    }

    return createApiResponse(true, 'Environment variables validated', true);
};

export const validateCatalog = (input: unknown): ApiResponse<CatalogData | undefined> =>
    validateWith(catalogSchema, input, 'Topic catalog');

export const validateTopicOverrides = (input: unknown): ApiResponse<Record<string, TopicUpdate> | undefined> =>
    validateWith(topicOverridesSchema, input, 'Topic overrides');

export const validateTopicUpdate = (input: unknown): ApiResponse<TopicUpdate | undefined> =>
    validateWith(topicUpdateSchema, input, 'Topic update');

export const validateScheduleState = (input: unknown): ApiResponse<ScheduleState | undefined> =>
    validateWith(scheduleStateSchema, input, 'Schedule state');

export const validatePostRecord = (input: unknown): ApiResponse<PostRecord | undefined> =>
    validateWith(postRecordSchema, input, 'Post record');
