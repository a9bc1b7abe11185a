// tests/app.test.ts

import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Application } from '../src/app';
import { ContentGenerator } from '../src/services/ai/content-generator';
import { ImageGenerator } from '../src/services/ai/image-generator';
import { PromptStore } from '../src/services/content/prompt-store';
import { TopicCatalog } from '../src/services/content/topic-catalog';
import { HistoryStore } from '../src/services/history/store';
import { Scheduler } from '../src/scheduler/controller';
import { CronJobsService } from '../src/scheduler/cron-jobs';
import { ScheduleStateStore } from '../src/scheduler/schedule-state';
import {
    catalogData,
    FakeClock,
    makeTempDir,
    removeDir,
    ScriptedPublisher,
    START,
    stubRasterizer,
    topic
} from './helpers/fakes';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('Application', () => {
    let dir: string;
    let history: HistoryStore;
    let publisher: ScriptedPublisher;

    const build = (
        env: NodeJS.ProcessEnv = {},
        postingEnabled: boolean = false,
        topics = [topic('bitcoin-basics'), topic('nostr-basics', { category: 'Nostr' })]
    ): Application => {
        const clock = new FakeClock();
        const catalog = new TopicCatalog(catalogData(topics));
        publisher = new ScriptedPublisher([], [], {}, clock);
        history = new HistoryStore({
            historyPath: path.join(dir, 'history.json'),
            imagesDir: path.join(dir, 'images'),
            backupDir: path.join(dir, 'backups'),
            maxBackups: 3
        });
        const scheduler = new Scheduler({
            catalog,
            content: new ContentGenerator({ catalog, provider: null, settings: { hashtagCount: 15 } }),
            images: new ImageGenerator({ catalog, rasterizer: stubRasterizer, brandHandle: '' }),
            publisher,
            history,
            stateStore: new ScheduleStateStore(path.join(dir, 'schedule-state.json'), () => ({
                intervalMs: DAY_MS,
                nextFireAt: null,
                enabled: true,
                lastCycleStatus: null,
                lastCycleAt: null,
                rotation: { recent: [], lastUsed: {}, cycleCount: 0 }
            })),
            clock,
            settings: { archiveImages: false, cycleTimeoutMs: 5000 }
        });

        return new Application({
            catalog,
            prompts: new PromptStore(null),
            history,
            scheduler,
            cronJobs: new CronJobsService(scheduler, history, { pollSeconds: 5, backupEnabled: false, backupSchedule: '0 2 * * *' }),
            publisher,
            env,
            postingEnabled
        });
    };

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('refuses to start without platform credentials when posting is enabled', async () => {
        const app = build({}, true);

        const result = await app.initialize();

        expect(result.successful).toBe(false);
        expect(result.message).toBe('Environment validation failed');
        await expect(app.postNow()).resolves.toMatchObject({
            successful: false,
            message: 'Environment validation failed'
        });
    });

    it('accepts placeholder credentials when posting is enabled', async () => {
        const app = build({
            X_API_KEY: 'test-key',
            X_API_SECRET: 'test-secret',
            X_ACCESS_TOKEN: 'test-token',
            X_ACCESS_SECRET: 'test-secret'
        }, true);

        await expect(app.initialize()).resolves.toMatchObject({ successful: true });
    });

    it('posts now and wraps the record', async () => {
        const app = build();

        const result = await app.postNow();

        expect(result.successful).toBe(true);
        expect(result.message).toBe('Posted Bitcoin Basics (post-1)');
        expect(result.data?.status).toBe('succeeded');
    });

    it('previews the next draft without posting or recording it', async () => {
        const app = build();

        const result = await app.preview();

        expect(result.successful).toBe(true);
        expect(result.message).toBe('Preview for Bitcoin Basics (fallback), not posted');
        expect(result.data?.topicId).toBe('bitcoin-basics');
        expect(result.data?.hashtags).toHaveLength(15);
        expect(publisher.posts).toHaveLength(0);
        expect(history.count()).toBe(0);

        const status = await app.status();
        expect(status.data?.rotation.cycleCount).toBe(0);
        await expect(app.postNow()).resolves.toMatchObject({ message: 'Posted Bitcoin Basics (post-1)' });
    });

    it('previews a chosen topic and rejects an unknown one', async () => {
        const app = build();

        await expect(app.preview('nostr-basics')).resolves.toMatchObject({
            successful: true,
            data: { topicId: 'nostr-basics', category: 'Nostr' }
        });
        await expect(app.preview('nope')).resolves.toEqual({
            successful: false,
            message: 'Preview failed',
            error: 'Unknown topic: nope'
        });
    });

    it('has nothing to preview when every topic is disabled', async () => {
        const app = build({}, false, [topic('bitcoin-basics', { enabled: false })]);

        await expect(app.preview()).resolves.toEqual({
            successful: false,
            message: 'Nothing to preview',
            error: 'No enabled topics in the catalog'
        });
    });

    it('checks the connection through the publisher', async () => {
        const app = build();

        await expect(app.checkConnection()).resolves.toEqual({
            successful: true,
            message: 'Token accepted',
            data: true
        });
    });

    it('reports a busy scheduler to the second caller', async () => {
        const app = build();
        await app.initialize();

        const [first, second] = await Promise.all([app.postNow(), app.postNow()]);

        expect(first.successful).toBe(true);
        expect(second).toEqual({
            successful: false,
            message: 'Manual cycle failed',
            error: `A cycle is already running (started ${new Date(START).toISOString()})`
        });
    });

    it('lists and exports history', async () => {
        const app = build();
        await app.postNow();
        await app.postNow();

        const listed = await app.history({ limit: 1 });
        expect(listed.data?.map(record => record.topicId)).toEqual(['nostr-basics']);

        const file = path.join(dir, 'exports', 'history.csv');
        const exported = await app.exportHistory(file);
        expect(exported).toEqual({ successful: true, message: 'Exported 2 record(s)', data: file });
        expect(history.parseExport(await fs.readFile(file, 'utf-8')).map(record => record.topicId))
            .toEqual(['bitcoin-basics', 'nostr-basics']);
    });

    it('clears history only when confirmed', async () => {
        const app = build();
        await app.postNow();

        await expect(app.clearHistory(false)).resolves.toEqual({
            successful: false,
            message: 'History not cleared',
            error: 'Clearing history needs confirmation'
        });
        expect(history.count()).toBe(1);

        await expect(app.clearHistory(true)).resolves.toEqual({ successful: true, message: 'Removed 1 record(s)', data: 1 });
        expect(history.count()).toBe(0);
    });

    it('reports a rejected interval without throwing', async () => {
        const app = build();

        const result = await app.setInterval(0.01);

        expect(result).toEqual({
            successful: false,
            message: 'Interval change failed',
            error: 'Interval must be between 60000ms and 604800000ms, got 36000'
        });
    });

    it('changes the interval in hours', async () => {
        const app = build();

        const result = await app.setInterval(6);

        expect(result.data?.intervalMs).toBe(6 * 60 * 60 * 1000);
        expect(result.data?.countdown).toBe('06:00:00');
    });

    it('toggles timed cycles', async () => {
        const app = build();

        const result = await app.setEnabled(false);

        expect(result.message).toBe('Scheduler disabled');
        expect(result.data?.enabled).toBe(false);
    });

    it('updates topics through the catalog', async () => {
        const app = build();

        await expect(app.setTopic('nostr-basics', { priority: 3 })).resolves.toMatchObject({
            successful: true,
            data: { id: 'nostr-basics', priority: 3 }
        });
        await expect(app.setTopic('nope', { enabled: false })).resolves.toEqual({
            successful: false,
            message: 'Topic update failed',
            error: 'Unknown topic: nope'
        });
    });

    it('starts the timer jobs and backs up on shutdown', async () => {
        const app = build();

        const started = await app.start();
        expect(started.successful).toBe(true);
        expect(started.message).toBe('Scheduler started');

        await app.shutdown();
        const backups = await fs.readdir(path.join(dir, 'backups'));
        expect(backups).toHaveLength(1);
    });
});
