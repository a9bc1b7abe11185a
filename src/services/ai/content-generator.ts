// src/services/ai/content-generator.ts

import { config } from '@/config';
import { CONTENT_GENERATION_PROMPTS, FALLBACK_TEMPLATES, fillTemplate } from '@/data/templates/prompts';
import type { ContentDraft, GenerationMethod, Topic } from '@/types';
import { TopicCatalog } from '@/services/content/topic-catalog';
import { PromptStore } from '@/services/content/prompt-store';
import { bodyBudget } from '@/services/content/post-text';
import { EnvCredentialSource } from '@/services/social/credentials';
import { seededRandom, stringUtils, TimeoutError, withTimeout } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { buildHashtags } from './hashtags';
import {
    classifyTextProviderError,
    GenerationError,
    OpenRouterTextProvider,
    type TextProvider
} from './text-provider';

const logger = createServiceLogger('ContentGenerator');

export interface ContentSettings {
    characterBudget: number;
    hashtagCount: number;
    timeoutMs: number;
}

export interface GenerateOptions {
    variation?: number | string;
    signal?: AbortSignal;
}

/**
 * One way of turning a topic into a draft. Both variants share this contract.
 */
export interface ContentStrategy {
    readonly method: GenerationMethod;
    generate(topic: Topic, options: GenerateOptions): Promise<ContentDraft>;
}

const draftFor = (
    topic: Topic,
    body: string,
    hashtags: string[],
    method: GenerationMethod
): ContentDraft => ({
    topicId: topic.id,
    topicName: topic.name,
    category: topic.category,
    body,
    hashtags,
    method,
    fallbackReason: null
});

/**
 * External text provider under a bounded timeout. Rejects with GenerationError.
 */
export class PrimaryTextStrategy implements ContentStrategy {
    public readonly method = 'primary';

    constructor(
        private readonly provider: TextProvider,
        private readonly catalog: TopicCatalog,
        private readonly prompts: PromptStore,
        private readonly settings: ContentSettings
    ) {}

    public async generate(topic: Topic, options: GenerateOptions): Promise<ContentDraft> {
        const hashtags = buildHashtags({
            topic,
            seeds: this.catalog.getSeeds(),
            count: this.settings.hashtagCount,
            variation: options.variation
        });
        const budget = bodyBudget(this.settings.characterBudget, hashtags);
        const prompt = this.prompts.get(topic.id)
            ?? CONTENT_GENERATION_PROMPTS.topicPost({ topic, characterBudget: budget });

        const controller = new AbortController();
        const forwardAbort = (): void => controller.abort();
        options.signal?.addEventListener('abort', forwardAbort, { once: true });

        let text: string;
        try {
            text = await withTimeout(
                this.provider.complete(prompt, controller.signal),
                this.settings.timeoutMs,
                `${this.provider.name} completion`
            );
        } catch (error: unknown) {
            if (error instanceof TimeoutError) {
                throw new GenerationError('GenerationTimeout', error.message);
            }
            throw classifyTextProviderError(error);
        } finally {
            options.signal?.removeEventListener('abort', forwardAbort);
            controller.abort();
        }

        const body = stringUtils.removeHashtags(text);
        if (!body) {
            throw new GenerationError('MalformedResponse', 'Completion contained no text besides hashtags');
        }

        return draftFor(topic, stringUtils.truncateAtWord(body, budget), hashtags, this.method);
    }
}

/**
 * Local templates keyed by category. Pure computation; cannot fail.
 */
export class TemplateStrategy implements ContentStrategy {
    public readonly method = 'fallback';

    constructor(
        private readonly catalog: TopicCatalog,
        private readonly settings: ContentSettings
    ) {}

    public async generate(topic: Topic, options: GenerateOptions): Promise<ContentDraft> {
        const random = seededRandom.create(seededRandom.hash(`${topic.id}:${options.variation ?? 0}:template`));
        const template = seededRandom.pick(FALLBACK_TEMPLATES, random) ?? '{topic}';
        const hashtags = buildHashtags({
            topic,
            seeds: this.catalog.getSeeds(),
            count: this.settings.hashtagCount,
            variation: options.variation
        });

        return draftFor(
            topic,
            stringUtils.truncateAtWord(fillTemplate(template, topic), bodyBudget(this.settings.characterBudget, hashtags)),
            hashtags,
            this.method
        );
    }
}

export interface ContentGeneratorDeps {
    catalog: TopicCatalog;
    /** null disables the primary strategy */
    provider: TextProvider | null;
    prompts?: PromptStore;
    settings?: Partial<ContentSettings>;
}

export class ContentGenerator {
    private static instance: ContentGenerator;
    private readonly primary: PrimaryTextStrategy | null;
    private readonly fallback: TemplateStrategy;

    constructor(deps: ContentGeneratorDeps) {
        const settings: ContentSettings = {
            characterBudget: config.content.characterBudget,
            hashtagCount: config.content.hashtagCount,
            timeoutMs: config.textProvider.timeoutMs,
            ...deps.settings
        };

        this.primary = deps.provider
            ? new PrimaryTextStrategy(deps.provider, deps.catalog, deps.prompts ?? new PromptStore(), settings)
            : null;
        this.fallback = new TemplateStrategy(deps.catalog, settings);
    }

    public static getInstance(): ContentGenerator {
        if (!ContentGenerator.instance) {
            const credentials = new EnvCredentialSource();
            ContentGenerator.instance = new ContentGenerator({
                catalog: TopicCatalog.getInstance(),
                provider: credentials.getTextProviderKey() ? new OpenRouterTextProvider(credentials) : null,
                prompts: PromptStore.getInstance()
            });
        }
        return ContentGenerator.instance;
    }

    /**
     * Draft for a topic. Never rejects: any primary failure falls back to templates.
     */
    public async generate(topic: Topic, options: GenerateOptions = {}): Promise<ContentDraft> {
        if (!this.primary) {
            logger.debug('No text provider configured, using templates', { topicId: topic.id });
            const draft = await this.fallback.generate(topic, options);
            return { ...draft, fallbackReason: 'NotConfigured' };
        }

        try {
            const draft = await this.primary.generate(topic, options);
            logger.info('Content generated by text provider', {
                topicId: topic.id,
                bodyLength: draft.body.length
            });
            return draft;
        } catch (error: unknown) {
            const failure = classifyTextProviderError(error);
            logger.warn('Text provider failed, falling back to templates', {
                topicId: topic.id,
                kind: failure.kind,
                error: failure.message
            });
            const draft = await this.fallback.generate(topic, options);
            return { ...draft, fallbackReason: failure.kind };
        }
    }
}

export default ContentGenerator;
