// src/app.ts

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs/promises';
import path from 'path';
import { config, configManager } from '@/config';
import { validateEnv } from '@/utils/validators';
import { createServiceLogger } from '@/utils/logger';
import { TopicCatalog } from '@/services/content/topic-catalog';
import { PromptStore } from '@/services/content/prompt-store';
import { HistoryStore } from '@/services/history/store';
import { Scheduler } from '@/scheduler/controller';
import { CronJobsService } from '@/scheduler/cron-jobs';
import { TwitterPublisher } from '@/services/social/twitter';
import { createApiResponse, errorMessage } from '@/utils/helpers';
import type { ApiResponse, ContentDraft, HistoryFilter, PostRecord, ScheduleStatus, Topic } from '@/types';

const logger = createServiceLogger('Application');

const HOUR_MS = 60 * 60 * 1000;

/** The platform side of a connection test */
export interface ConnectionCheck {
    validateToken(): Promise<ApiResponse<boolean>>;
}

export interface ApplicationDeps {
    catalog: TopicCatalog;
    prompts: PromptStore;
    history: HistoryStore;
    scheduler: Scheduler;
    cronJobs: CronJobsService;
    publisher: ConnectionCheck;
    env?: NodeJS.ProcessEnv;
    postingEnabled?: boolean;
}

/**
 * Trigger surface over the scheduler and stores. Every call answers with an ApiResponse.
 */
export class Application {
    private static instance: Application;
    private isInitialized: boolean = false;

    constructor(private readonly deps: ApplicationDeps) { }

    public static getInstance(): Application {
        if (!Application.instance) {
            Application.instance = new Application({
                catalog: TopicCatalog.getInstance(),
                prompts: PromptStore.getInstance(),
                history: HistoryStore.getInstance(),
                scheduler: Scheduler.getInstance(),
                cronJobs: CronJobsService.getInstance(),
                publisher: TwitterPublisher.getInstance()
            });
        }
        return Application.instance;
    }

    /**
     * Validate configuration and load persisted state
     */
    public async initialize(): Promise<ApiResponse<ScheduleStatus | undefined>> {
        if (this.isInitialized) {
            return createApiResponse(true, 'Application already initialized', this.deps.scheduler.getStatus());
        }

        try {
            logger.info('Starting content pipeline');

            const configValidation = configManager.validateConfig();
            if (!configValidation.successful) {
                return createApiResponse(false, 'Configuration validation failed', undefined, configValidation.error);
            }

            const envValidation = validateEnv(
                this.deps.env ?? process.env,
                this.deps.postingEnabled ?? config.platform.postingEnabled
            );
            if (!envValidation.successful) {
                return createApiResponse(false, 'Environment validation failed', undefined, envValidation.error);
            }

            await this.deps.catalog.load();
            await this.deps.prompts.load();
            const status = await this.deps.scheduler.initialize();

            this.isInitialized = true;
            logger.info('Application initialized successfully', {
                topics: this.deps.catalog.list().length,
                enabledTopics: this.deps.catalog.listEnabled().length,
                records: this.deps.history.count()
            });

            return createApiResponse(true, 'Application initialized successfully', status);
        } catch (error: unknown) {
            logger.error('Failed to initialize application', error);
            return createApiResponse(false, 'Application initialization failed', undefined, errorMessage(error));
        }
    }

    /**
     * Start the timer jobs that drive timed cycles
     */
    public async start(): Promise<ApiResponse<ScheduleStatus | undefined>> {
        const init = await this.initialize();
        if (!init.successful) return init;

        const cronStart = this.deps.cronJobs.start();
        if (!cronStart.successful) {
            return createApiResponse(false, 'Failed to start scheduler', undefined, cronStart.error);
        }
        return createApiResponse(true, 'Scheduler started', this.deps.scheduler.getStatus());
    }

    /**
     * Run one manual cycle now. Rejected while another cycle is running.
     */
    public async postNow(): Promise<ApiResponse<PostRecord | undefined>> {
        return this.guarded('Manual cycle', async () => {
            const record = await this.deps.scheduler.runCycle('manual');
            const message = record.status === 'succeeded'
                ? `Posted ${record.topicName ?? 'topic'} (${record.platformPostId ?? 'no id'})`
                : `Cycle failed: ${record.failureReason ?? 'unknown'}`;
            return createApiResponse(record.status === 'succeeded', message, record, record.failureDetail ?? undefined);
        });
    }

    /**
     * Draft the next post (or one for the given topic) without publishing or recording it
     */
    public async preview(topicId?: string): Promise<ApiResponse<ContentDraft | undefined>> {
        return this.guarded<ContentDraft>('Preview', async () => {
            const draft = await this.deps.scheduler.preview(topicId);
            if (!draft) {
                return createApiResponse<ContentDraft | undefined>(
                    false, 'Nothing to preview', undefined, 'No enabled topics in the catalog'
                );
            }
            return createApiResponse(true, `Preview for ${draft.topicName} (${draft.method}), not posted`, draft);
        });
    }

    /**
     * Ask the platform whether the configured credentials are accepted
     */
    public async checkConnection(): Promise<ApiResponse<boolean | undefined>> {
        return this.guarded<boolean>('Connection check', () => this.deps.publisher.validateToken());
    }

    public async setEnabled(enabled: boolean): Promise<ApiResponse<ScheduleStatus | undefined>> {
        return this.guarded('Enable toggle', async () => {
            const status = await this.deps.scheduler.setEnabled(enabled);
            return createApiResponse(true, `Scheduler ${enabled ? 'enabled' : 'disabled'}`, status);
        });
    }

    public async setInterval(hours: number): Promise<ApiResponse<ScheduleStatus | undefined>> {
        return this.guarded('Interval change', async () => {
            const status = await this.deps.scheduler.setInterval(Math.round(hours * HOUR_MS));
            return createApiResponse(true, `Posting interval set to ${hours}h`, status);
        });
    }

    public async status(): Promise<ApiResponse<ScheduleStatus | undefined>> {
        return this.guarded('Status', async () =>
            createApiResponse(true, 'Scheduler status', this.deps.scheduler.getStatus()));
    }

    public async history(filter: HistoryFilter = {}): Promise<ApiResponse<PostRecord[] | undefined>> {
        return this.guarded('History', async () => {
            const records = [...this.deps.history.list(filter)];
            return createApiResponse(true, `${records.length} record(s)`, records);
        });
    }

    /**
     * Write every record as CSV to the given file, returning its resolved path
     */
    public async exportHistory(file: string): Promise<ApiResponse<string | undefined>> {
        return this.guarded('History export', async () => {
            const target = path.resolve(file);
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, this.deps.history.exportAll(), 'utf8');
            logger.info('History exported', { path: target, records: this.deps.history.count() });
            return createApiResponse(true, `Exported ${this.deps.history.count()} record(s)`, target);
        });
    }

    /**
     * Irreversible. Refuses to run without explicit confirmation.
     */
    public async clearHistory(confirmed: boolean): Promise<ApiResponse<number | undefined>> {
        if (!confirmed) {
            return createApiResponse(false, 'History not cleared', undefined, 'Clearing history needs confirmation');
        }
        return this.guarded('History clear', async () => {
            const removed = await this.deps.history.clear();
            return createApiResponse(true, `Removed ${removed} record(s)`, removed);
        });
    }

    public async setTopic(id: string, update: unknown): Promise<ApiResponse<Topic | undefined>> {
        return this.guarded('Topic update', async () => {
            const topic = await this.deps.catalog.update(id, update);
            return createApiResponse(true, `Topic ${topic.id} updated`, topic);
        });
    }

    /**
     * Stop timer jobs and take a final history backup
     */
    public async shutdown(): Promise<void> {
        logger.info('Shutting down application');
        this.deps.cronJobs.stop();

        try {
            await this.deps.history.createBackup();
        } catch (error: unknown) {
            logger.error('Final backup failed', error);
        }
        logger.info('Application shutdown complete');
    }

    private async guarded<T>(
        label: string,
        run: () => Promise<ApiResponse<T | undefined>>
    ): Promise<ApiResponse<T | undefined>> {
        const init = await this.initialize();
        if (!init.successful) {
            return createApiResponse<T | undefined>(false, init.message, undefined, init.error);
        }

        try {
            return await run();
        } catch (error: unknown) {
            logger.error(`${label} failed`, error);
            return createApiResponse<T | undefined>(false, `${label} failed`, undefined, errorMessage(error));
        }
    }
}

export default Application;
