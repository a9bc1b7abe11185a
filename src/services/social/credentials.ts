// src/services/social/credentials.ts

import type { CredentialSource, PlatformCredentials } from '@/types';

/**
 * Tokens read from environment variables. Values are passed through untouched.
 */
export class EnvCredentialSource implements CredentialSource {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    public getPlatformCredentials(): PlatformCredentials | null {
        const appKey = this.env.X_API_KEY;
        const appSecret = this.env.X_API_SECRET;
        const accessToken = this.env.X_ACCESS_TOKEN;
        const accessSecret = this.env.X_ACCESS_SECRET;

        if (!appKey || !appSecret || !accessToken || !accessSecret) {
            return null;
        }
        return { appKey, appSecret, accessToken, accessSecret };
    }

    public getTextProviderKey(): string | null {
        return this.env.OPENROUTER_API_KEY || null;
    }
}

/**
 * Fixed credentials, for tests and embedding
 */
export class StaticCredentialSource implements CredentialSource {
    constructor(
        private readonly platform: PlatformCredentials | null,
        private readonly textProviderKey: string | null = null
    ) {}

    public getPlatformCredentials(): PlatformCredentials | null {
        return this.platform;
    }

    public getTextProviderKey(): string | null {
        return this.textProviderKey;
    }
}
