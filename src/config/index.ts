// src/config/index.ts

import dotenv from 'dotenv';
import Joi from 'joi';
import path from 'path';
import type { AppConfig, AspectProfile, LogLevel, NodeEnv, ApiResponse } from '@/types';

dotenv.config();

const HOUR_MS = 60 * 60 * 1000;

interface EnvValues {
    NODE_ENV: NodeEnv;
    LOG_LEVEL: LogLevel;
    DATA_DIR: string;
    AI_MODEL: string;
    OPENROUTER_BASE_URL: string;
    TEXT_TIMEOUT_MS: number;
    POSTING_ENABLED: boolean;
    MAX_MEDIA_BYTES: number;
    CHARACTER_BUDGET: number;
    HASHTAG_COUNT: number;
    ROTATION_MEMORY: number;
    IMAGE_PROFILE: AspectProfile;
    BRAND_HANDLE: string;
    PUBLISH_MAX_ATTEMPTS: number;
    PUBLISH_BASE_DELAY_MS: number;
    PUBLISH_MAX_DELAY_MS: number;
    PUBLISH_CALL_TIMEOUT_MS: number;
    POSTING_INTERVAL_HOURS: number;
    SCHEDULER_ENABLED: boolean;
    POLL_SECONDS: number;
    CYCLE_TIMEOUT_MS: number;
    BACKUP_ENABLED: boolean;
    MAX_BACKUPS: number;
}

const envSchema = Joi.object<EnvValues>({
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),
    DATA_DIR: Joi.string().default(path.join(process.cwd(), 'data')),
    AI_MODEL: Joi.string().default('meta-llama/llama-3.1-8b-instruct:free'),
    OPENROUTER_BASE_URL: Joi.string().uri().default('https://openrouter.ai/api/v1'),
    TEXT_TIMEOUT_MS: Joi.number().integer().min(1000).default(20000),
    POSTING_ENABLED: Joi.boolean().truthy('1').falsy('0').default(false),
    MAX_MEDIA_BYTES: Joi.number().integer().positive().default(5 * 1024 * 1024),
    CHARACTER_BUDGET: Joi.number().integer().min(40).default(280),
    HASHTAG_COUNT: Joi.number().integer().min(1).max(30).default(15),
    ROTATION_MEMORY: Joi.number().integer().min(1).max(20).default(1),
    IMAGE_PROFILE: Joi.string().valid('wide', 'square', 'portrait').default('wide'),
    BRAND_HANDLE: Joi.string().allow('').default(''),
    PUBLISH_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
    PUBLISH_BASE_DELAY_MS: Joi.number().integer().min(0).default(5000),
    PUBLISH_MAX_DELAY_MS: Joi.number().integer().min(0).default(60000),
    PUBLISH_CALL_TIMEOUT_MS: Joi.number().integer().min(1000).default(30000),
    POSTING_INTERVAL_HOURS: Joi.number().min(1 / 60).max(168).default(24),
    SCHEDULER_ENABLED: Joi.boolean().truthy('1').falsy('0').default(true),
    POLL_SECONDS: Joi.number().integer().min(1).max(59).default(5),
    CYCLE_TIMEOUT_MS: Joi.number().integer().min(1000).default(10 * 60 * 1000),
    BACKUP_ENABLED: Joi.boolean().truthy('1').falsy('0').default(false),
    MAX_BACKUPS: Joi.number().integer().min(1).default(7)
});

/**
 * Build the application config from an environment map. Unknown variables are ignored.
 */
export const loadConfig = (env: NodeJS.ProcessEnv): AppConfig => {
    const { error, value } = envSchema.validate(env, {
        allowUnknown: true,
        stripUnknown: true,
        convert: true,
        abortEarly: false
    });

    if (error || !value) {
        const details = error ? error.details.map(d => d.message).join(', ') : 'empty result';
        throw new Error(`Invalid configuration: ${details}`);
    }

    return {
        textProvider: {
            model: value.AI_MODEL,
            baseUrl: value.OPENROUTER_BASE_URL,
            timeoutMs: value.TEXT_TIMEOUT_MS
        },
        platform: {
            postingEnabled: value.POSTING_ENABLED,
            maxMediaBytes: value.MAX_MEDIA_BYTES
        },
        content: {
            characterBudget: value.CHARACTER_BUDGET,
            hashtagCount: value.HASHTAG_COUNT,
            rotationMemory: value.ROTATION_MEMORY
        },
        image: {
            profile: value.IMAGE_PROFILE,
            brandHandle: value.BRAND_HANDLE
        },
        publisher: {
            maxAttempts: value.PUBLISH_MAX_ATTEMPTS,
            baseDelayMs: value.PUBLISH_BASE_DELAY_MS,
            maxDelayMs: value.PUBLISH_MAX_DELAY_MS,
            callTimeoutMs: value.PUBLISH_CALL_TIMEOUT_MS
        },
        scheduler: {
            intervalMs: Math.round(value.POSTING_INTERVAL_HOURS * HOUR_MS),
            enabledByDefault: value.SCHEDULER_ENABLED,
            pollSeconds: value.POLL_SECONDS,
            cycleTimeoutMs: value.CYCLE_TIMEOUT_MS
        },
        storage: {
            dataDir: path.resolve(value.DATA_DIR),
            backupEnabled: value.BACKUP_ENABLED,
            maxBackups: value.MAX_BACKUPS
        },
        app: {
            nodeEnv: value.NODE_ENV,
            logLevel: value.LOG_LEVEL
        }
    };
};

class ConfigManager {
    private static instance: ConfigManager;
    private config: AppConfig;

    private constructor() {
        this.config = loadConfig(process.env);
    }

    public static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    public getConfig(): AppConfig {
        return this.config;
    }

    public validateConfig(): ApiResponse<boolean> {
        const { publisher, scheduler } = this.config;

        if (publisher.baseDelayMs > publisher.maxDelayMs) {
            return {
                successful: false,
                message: 'Invalid publisher backoff',
                error: 'PUBLISH_BASE_DELAY_MS must not exceed PUBLISH_MAX_DELAY_MS'
            };
        }

        if (scheduler.cycleTimeoutMs <= publisher.callTimeoutMs) {
            return {
                successful: false,
                message: 'Invalid cycle timeout',
                error: 'CYCLE_TIMEOUT_MS must exceed PUBLISH_CALL_TIMEOUT_MS'
            };
        }

        return {
            successful: true,
            message: 'Configuration validated successfully',
            data: true
        };
    }
}

export const configManager = ConfigManager.getInstance();
export const config = configManager.getConfig();
export default config;
