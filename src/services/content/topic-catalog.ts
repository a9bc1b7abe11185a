// src/services/content/topic-catalog.ts

import catalogData from '@/data/catalog.json';
import { STORAGE_PATHS } from '@/config/storage';
import type { CategorySeed, Topic, TopicCategory, TopicUpdate } from '@/types';
import { ConfigurationError } from '@/utils/errors';
import { fileUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { validateCatalog, validateTopicOverrides, validateTopicUpdate, type CatalogData } from '@/utils/validators';

const logger = createServiceLogger('TopicCatalog');

/**
 * Stable indexed table of topics plus per-category seeds.
 * Only `enabled` and `priority` change, through `update`, and the changes
 * are persisted as overrides on top of the bundled catalog.
 */
export class TopicCatalog {
    private static instance: TopicCatalog;
    private readonly topics: Topic[];
    private readonly seeds: Record<TopicCategory, CategorySeed>;
    private overrides: Record<string, TopicUpdate> = {};

    constructor(data: CatalogData, private readonly overridesPath: string | null = null) {
        this.topics = data.topics.map(topic => Object.freeze({ ...topic }));
        this.seeds = data.categories;
    }

    public static getInstance(): TopicCatalog {
        if (!TopicCatalog.instance) {
            TopicCatalog.instance = TopicCatalog.fromData(catalogData, STORAGE_PATHS.data.topicOverrides);
        }
        return TopicCatalog.instance;
    }

    /**
     * Build a catalog from raw data, throwing ConfigurationError when it does not validate
     */
    public static fromData(input: unknown, overridesPath: string | null = null): TopicCatalog {
        const validation = validateCatalog(input);
        if (!validation.successful || !validation.data) {
            throw new ConfigurationError(validation.error ?? 'Topic catalog is invalid');
        }
        return new TopicCatalog(validation.data, overridesPath);
    }

    /**
     * Apply persisted overrides. Unknown topic ids are ignored.
     */
    public async load(): Promise<void> {
        if (!this.overridesPath) return;

        const raw = await fileUtils.readJson(this.overridesPath);
        if (raw === undefined) return;

        const validation = validateTopicOverrides(raw);
        if (!validation.successful || !validation.data) {
            logger.warn('Ignoring invalid topic overrides', { error: validation.error });
            return;
        }

        for (const [id, update] of Object.entries(validation.data)) {
            const index = this.indexOf(id);
            if (index < 0) {
                logger.warn('Override for unknown topic ignored', { topicId: id });
                continue;
            }
            this.applyAt(index, update);
        }
        this.overrides = validation.data;

        logger.info('Topic overrides applied', { count: Object.keys(this.overrides).length });
    }

    public list(): readonly Topic[] {
        return this.topics;
    }

    public listEnabled(): Topic[] {
        return this.topics.filter(topic => topic.enabled);
    }

    public get(id: string): Topic | undefined {
        return this.topics.find(topic => topic.id === id);
    }

    /** Table index of a topic, -1 when unknown */
    public indexOf(id: string): number {
        return this.topics.findIndex(topic => topic.id === id);
    }

    public getSeed(category: TopicCategory): CategorySeed {
        return this.seeds[category];
    }

    public getSeeds(): Readonly<Record<TopicCategory, CategorySeed>> {
        return this.seeds;
    }

    /**
     * Change a topic's enabled flag and/or priority and persist the override
     */
    public async update(id: string, update: unknown): Promise<Topic> {
        const index = this.indexOf(id);
        if (index < 0) {
            throw new ConfigurationError(`Unknown topic: ${id}`);
        }

        const validation = validateTopicUpdate(update);
        if (!validation.successful || !validation.data) {
            throw new ConfigurationError(validation.error ?? 'Invalid topic update');
        }

        const updated = this.applyAt(index, validation.data);
        this.overrides = {
            ...this.overrides,
            [id]: { ...this.overrides[id], ...validation.data }
        };

        if (this.overridesPath) {
            await fileUtils.writeJsonAtomic(this.overridesPath, this.overrides);
        }

        logger.info('Topic updated', { topicId: id, enabled: updated.enabled, priority: updated.priority });
        return updated;
    }

    private applyAt(index: number, update: TopicUpdate): Topic {
        const current = this.topics[index];
        if (!current) {
            throw new ConfigurationError(`No topic at index ${index}`);
        }
        const next: Topic = Object.freeze({
            ...current,
            enabled: update.enabled ?? current.enabled,
            priority: update.priority ?? current.priority
        });
        this.topics[index] = next;
        return next;
    }
}

export default TopicCatalog;
