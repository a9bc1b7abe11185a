// src/services/content/prompt-store.ts

import Joi from 'joi';
import { STORAGE_PATHS } from '@/config/storage';
import { fileUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('PromptStore');

const promptsSchema = Joi.object<Record<string, string>>().pattern(Joi.string(), Joi.string().min(1));

/**
 * Custom prompts keyed by topic id. A custom prompt replaces the default one for its topic.
 */
export class PromptStore {
    private static instance: PromptStore;
    private prompts: Record<string, string> = {};

    constructor(private readonly filePath: string | null = null) {}

    public static getInstance(): PromptStore {
        if (!PromptStore.instance) {
            PromptStore.instance = new PromptStore(STORAGE_PATHS.data.customPrompts);
        }
        return PromptStore.instance;
    }

    public async load(): Promise<void> {
        if (!this.filePath) return;

        const raw = await fileUtils.readJson(this.filePath);
        if (raw === undefined) return;

        const { error, value } = promptsSchema.validate(raw, { convert: false });
        if (error || !value) {
            logger.warn('Ignoring invalid custom prompts file', { error: error?.message });
            return;
        }
        this.prompts = value;
        logger.info('Custom prompts loaded', { count: Object.keys(value).length });
    }

    public get(topicId: string): string | undefined {
        return this.prompts[topicId];
    }

    public async set(topicId: string, prompt: string): Promise<void> {
        this.prompts = { ...this.prompts, [topicId]: prompt };
        await this.save();
    }

    public async remove(topicId: string): Promise<boolean> {
        if (!(topicId in this.prompts)) return false;
        const { [topicId]: _removed, ...rest } = this.prompts;
        this.prompts = rest;
        await this.save();
        return true;
    }

    private async save(): Promise<void> {
        if (this.filePath) {
            await fileUtils.writeJsonAtomic(this.filePath, this.prompts);
        }
    }
}

export default PromptStore;
