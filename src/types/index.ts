// src/types/index.ts

import type { AspectProfile } from './content';

export interface ApiResponse<T = unknown> {
    data?: T;
    error?: string;
    message: string;
    successful: boolean;
}

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface AppConfig {
    textProvider: {
        model: string;
        baseUrl: string;
        timeoutMs: number;
    };
    platform: {
        postingEnabled: boolean;
        maxMediaBytes: number;
    };
    content: {
        characterBudget: number;
        hashtagCount: number;
        rotationMemory: number;
    };
    image: {
        profile: AspectProfile;
        brandHandle: string;
    };
    publisher: {
        maxAttempts: number;
        baseDelayMs: number;
        maxDelayMs: number;
        callTimeoutMs: number;
    };
    scheduler: {
        intervalMs: number;
        enabledByDefault: boolean;
        pollSeconds: number;
        cycleTimeoutMs: number;
    };
    storage: {
        dataDir: string;
        backupEnabled: boolean;
        maxBackups: number;
    };
    app: {
        nodeEnv: NodeEnv;
        logLevel: LogLevel;
    };
}

export * from './topic';
export * from './content';
export * from './history';
export * from './social';
