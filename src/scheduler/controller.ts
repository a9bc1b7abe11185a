// src/scheduler/controller.ts

import { config } from '@/config';
import { VALIDATION_RULES } from '@/config/storage';
import type {
    AspectProfile,
    Clock,
    ContentDraft,
    CycleTrigger,
    FailureKind,
    ImageArtifact,
    PostRecord,
    PublishOptions,
    PublishResult,
    RotationState,
    ScheduleState,
    ScheduleStatus,
    Topic
} from '@/types';
import { ContentGenerator, type GenerateOptions } from '@/services/ai/content-generator';
import { ImageGenerator } from '@/services/ai/image-generator';
import { TopicCatalog } from '@/services/content/topic-catalog';
import { HistoryStore } from '@/services/history/store';
import { isPublishError } from '@/services/social/errors';
import { TwitterPublisher } from '@/services/social/twitter';
import { ConfigurationError, SchedulerBusyError } from '@/utils/errors';
import { dateUtils, errorMessage, generateId, systemClock } from '@/utils/helpers';
import { createServiceLogger, logPerformance } from '@/utils/logger';
import { ScheduleStateStore } from './schedule-state';

const logger = createServiceLogger('Scheduler');

export interface DraftSource {
    generate(topic: Topic, options?: GenerateOptions): Promise<ContentDraft>;
}

export interface ImageSource {
    generate(draft: ContentDraft, profile?: AspectProfile): Promise<ImageArtifact>;
}

export interface PostPublisher {
    publish(draft: ContentDraft, image: ImageArtifact, options?: PublishOptions): Promise<PublishResult>;
}

export interface SchedulerSettings {
    cycleTimeoutMs: number;
    rotationMemory: number;
    imageProfile: AspectProfile;
    archiveImages: boolean;
}

export interface SchedulerDeps {
    catalog: TopicCatalog;
    content: DraftSource;
    images: ImageSource;
    publisher: PostPublisher;
    history: HistoryStore;
    stateStore: ScheduleStateStore;
    clock?: Clock;
    settings?: Partial<SchedulerSettings>;
}

/** What a cycle has got to so far; read when the ceiling cuts it short */
interface CycleProgress {
    attempts: number;
    draft: ContentDraft | null;
    imageRef: string | null;
}

interface RecordFields {
    id: string;
    trigger: CycleTrigger;
    topic: Topic | null;
    progress: CycleProgress;
    finishedAt: number;
}

/**
 * Owns the schedule state and runs one produce-and-publish cycle at a time
 */
export class Scheduler {
    private static instance: Scheduler;
    private readonly catalog: TopicCatalog;
    private readonly content: DraftSource;
    private readonly images: ImageSource;
    private readonly publisher: PostPublisher;
    private readonly history: HistoryStore;
    private readonly stateStore: ScheduleStateStore;
    private readonly clock: Clock;
    private readonly settings: SchedulerSettings;

    private state: ScheduleState | null = null;
    // The single exclusion flag: start time of the running cycle
    private runningSince: string | null = null;

    constructor(deps: SchedulerDeps) {
        this.catalog = deps.catalog;
        this.content = deps.content;
        this.images = deps.images;
        this.publisher = deps.publisher;
        this.history = deps.history;
        this.stateStore = deps.stateStore;
        this.clock = deps.clock ?? systemClock;
        this.settings = {
            cycleTimeoutMs: config.scheduler.cycleTimeoutMs,
            rotationMemory: config.content.rotationMemory,
            imageProfile: config.image.profile,
            archiveImages: true,
            ...deps.settings
        };
    }

    public static getInstance(): Scheduler {
        if (!Scheduler.instance) {
            Scheduler.instance = new Scheduler({
                catalog: TopicCatalog.getInstance(),
                content: ContentGenerator.getInstance(),
                images: ImageGenerator.getInstance(),
                publisher: TwitterPublisher.getInstance(),
                history: HistoryStore.getInstance(),
                stateStore: new ScheduleStateStore()
            });
        }
        return Scheduler.instance;
    }

    /**
     * Load persisted state. An enabled schedule without a next-fire time is armed one interval from now.
     */
    public async initialize(): Promise<ScheduleStatus> {
        await this.history.initialize();
        const loaded = await this.stateStore.load();

        this.state = loaded.enabled && loaded.nextFireAt === null
            ? { ...loaded, nextFireAt: this.isoIn(loaded.intervalMs) }
            : loaded;
        await this.persistState();

        logger.info('Scheduler initialized', {
            enabled: this.state.enabled,
            intervalMs: this.state.intervalMs,
            nextFireAt: this.state.nextFireAt
        });
        return this.getStatus();
    }

    public isRunning(): boolean {
        return this.runningSince !== null;
    }

    /**
     * Run one cycle. Resolves with the cycle's record, success or failure alike;
     * rejects only with SchedulerBusyError when a cycle is already running.
     */
    public runCycle(trigger: CycleTrigger): Promise<PostRecord> {
        if (this.runningSince !== null) {
            logger.warn('Cycle requested while another is running', { trigger, runningSince: this.runningSince });
            return Promise.reject(new SchedulerBusyError(this.runningSince));
        }

        // Claimed before the first await so no second caller can slip in
        this.runningSince = new Date(this.clock.now()).toISOString();

        return this.executeCycle(trigger).finally(() => {
            this.runningSince = null;
        });
    }

    /**
     * Timer entry point. Runs a timed cycle when enabled, idle and due; otherwise resolves null.
     */
    public async tick(now: number = this.clock.now()): Promise<PostRecord | null> {
        const state = this.state;
        if (!state || !state.enabled || this.runningSince !== null || state.nextFireAt === null) {
            return null;
        }
        if (now < Date.parse(state.nextFireAt)) {
            return null;
        }

        logger.info('Posting interval elapsed, starting timed cycle', { nextFireAt: state.nextFireAt });
        return this.runCycle('timed');
    }

    public async setEnabled(enabled: boolean): Promise<ScheduleStatus> {
        const state = this.requireState();
        this.state = {
            ...state,
            enabled,
            nextFireAt: enabled && state.nextFireAt === null ? this.isoIn(state.intervalMs) : state.nextFireAt
        };
        await this.persistState();

        logger.info(`Scheduler ${enabled ? 'enabled' : 'disabled'}`, { nextFireAt: this.state.nextFireAt });
        return this.getStatus();
    }

    /**
     * Change the posting interval; the next cycle is due one new interval from now
     */
    public async setInterval(intervalMs: number): Promise<ScheduleStatus> {
        const { minIntervalMs, maxIntervalMs } = VALIDATION_RULES.schedule;
        if (!Number.isFinite(intervalMs) || intervalMs < minIntervalMs || intervalMs > maxIntervalMs) {
            throw new ConfigurationError(
                `Interval must be between ${minIntervalMs}ms and ${maxIntervalMs}ms, got ${intervalMs}`
            );
        }

        const state = this.requireState();
        this.state = { ...state, intervalMs, nextFireAt: this.isoIn(intervalMs) };
        await this.persistState();

        logger.info('Posting interval updated', { intervalMs, nextFireAt: this.state.nextFireAt });
        return this.getStatus();
    }

    /**
     * Frozen snapshot of the schedule state
     */
    public getStatus(now: number = this.clock.now()): ScheduleStatus {
        const state = this.requireState();
        const msUntilNextFire = state.nextFireAt === null ? null : Math.max(0, Date.parse(state.nextFireAt) - now);

        return Object.freeze({
            ...state,
            rotation: Object.freeze({
                recent: [...state.rotation.recent],
                lastUsed: { ...state.rotation.lastUsed },
                cycleCount: state.rotation.cycleCount
            }),
            running: this.runningSince !== null,
            msUntilNextFire,
            countdown: msUntilNextFire === null ? null : dateUtils.formatCountdown(msUntilNextFire)
        });
    }

    /**
     * Enabled topics minus the recently used ones (all enabled when that leaves none),
     * highest priority first, then least recently used, then table order
     */
    public selectTopic(): Topic | null {
        const rotation = this.requireState().rotation;
        const enabled = this.catalog.listEnabled();
        if (enabled.length === 0) return null;

        const recent = new Set(rotation.recent);
        const fresh = enabled.filter(topic => !recent.has(topic.id));
        const candidates = fresh.length > 0 ? fresh : enabled;

        const topPriority = Math.max(...candidates.map(topic => topic.priority));
        const lastUsed = (topic: Topic): number => rotation.lastUsed[topic.id] ?? -1;

        const [chosen] = candidates
            .filter(topic => topic.priority === topPriority)
            .sort((a, b) => lastUsed(a) - lastUsed(b) || this.catalog.indexOf(a.id) - this.catalog.indexOf(b.id));

        return chosen ?? null;
    }

    /**
     * Draft the next cycle would post, or one for the given topic. Publishes nothing,
     * records nothing and leaves the rotation untouched.
     */
    public async preview(topicId?: string): Promise<ContentDraft | null> {
        const state = this.requireState();
        let topic: Topic | null;
        if (topicId === undefined) {
            topic = this.selectTopic();
        } else {
            topic = this.catalog.get(topicId) ?? null;
            if (!topic) throw new ConfigurationError(`Unknown topic: ${topicId}`);
        }
        if (!topic) return null;

        return this.content.generate(topic, { variation: state.rotation.cycleCount });
    }

    private async executeCycle(trigger: CycleTrigger): Promise<PostRecord> {
        const startedAt = this.clock.now();
        const id = generateId(startedAt);
        const progress: CycleProgress = { attempts: 0, draft: null, imageRef: null };

        logger.info('Cycle started', { id, trigger });

        let topic: Topic | null = null;
        let record: PostRecord;
        try {
            topic = this.selectTopic();
            if (!topic) {
                logger.warn('No enabled topics, cycle fails fast', { id });
                record = this.failedRecord({ id, trigger, topic, progress, finishedAt: this.clock.now() },
                    'NoTopicsAvailable', 'No enabled topics in the catalog');
            } else {
                record = await this.runWithCeiling(id, trigger, topic, progress);
            }
        } catch (error: unknown) {
            logger.error('Cycle failed unexpectedly', error, { id });
            record = this.failedRecord({ id, trigger, topic, progress, finishedAt: this.clock.now() },
                'UnknownProviderError', `internal: ${errorMessage(error)}`);
        }

        this.applyCycleOutcome(topic, record);
        await this.persistState();

        let stored: PostRecord = record;
        try {
            stored = await this.history.append(record);
        } catch (error: unknown) {
            logger.error('Failed to append post record', error, { id: record.id });
        }

        logPerformance('cycle', this.clock.now() - startedAt, { id, trigger, status: record.status, attempts: record.attemptCount });
        return stored;
    }

    /**
     * Race the cycle against the wall-clock ceiling. On expiry the work is aborted and abandoned.
     */
    private async runWithCeiling(
        id: string,
        trigger: CycleTrigger,
        topic: Topic,
        progress: CycleProgress
    ): Promise<PostRecord> {
        const controller = new AbortController();
        const work = this.produceAndPublish(id, trigger, topic, progress, controller.signal);

        let timer: NodeJS.Timeout | undefined;
        const ceiling = new Promise<PostRecord>(resolve => {
            timer = setTimeout(() => {
                controller.abort();
                logger.error('Cycle exceeded its time ceiling, abandoning pending work', undefined, {
                    id,
                    cycleTimeoutMs: this.settings.cycleTimeoutMs
                });
                resolve(this.failedRecord({ id, trigger, topic, progress, finishedAt: this.clock.now() },
                    'NetworkError', `timeout: cycle exceeded ${this.settings.cycleTimeoutMs}ms`));
            }, this.settings.cycleTimeoutMs);
        });

        try {
            return await Promise.race([work, ceiling]);
        } finally {
            clearTimeout(timer);
            if (controller.signal.aborted) {
                work.then(
                    late => logger.warn('Abandoned cycle settled after its ceiling', { id, status: late.status }),
                    (error: unknown) => logger.error('Abandoned cycle failed after its ceiling', error, { id })
                );
            }
        }
    }

    private async produceAndPublish(
        id: string,
        trigger: CycleTrigger,
        topic: Topic,
        progress: CycleProgress,
        signal: AbortSignal
    ): Promise<PostRecord> {
        const draft = await this.content.generate(topic, { variation: this.requireState().rotation.cycleCount, signal });
        progress.draft = draft;

        const image = await this.images.generate(draft, this.settings.imageProfile);
        progress.imageRef = await this.archiveImage(id, image);

        try {
            const result = await this.publisher.publish(draft, image, {
                signal,
                onAttempt: attempt => {
                    progress.attempts = attempt;
                }
            });

            const record: PostRecord = {
                ...this.baseRecord({ id, trigger, topic, progress, finishedAt: this.clock.now() }),
                platformPostId: result.platformPostId,
                status: 'succeeded',
                attemptCount: result.attempts
            };
            logger.info('Cycle published', { id, topicId: topic.id, postId: result.platformPostId, url: result.url });
            return Object.freeze(record);
        } catch (error: unknown) {
            if (isPublishError(error)) {
                return this.failedRecord(
                    { id, trigger, topic, progress: { ...progress, attempts: error.attempts }, finishedAt: this.clock.now() },
                    error.kind,
                    `${error.stage}: ${error.message}`
                );
            }
            throw error;
        }
    }

    private async archiveImage(id: string, image: ImageArtifact): Promise<string | null> {
        if (!this.settings.archiveImages) return null;
        try {
            return await this.history.archiveImage(id, image);
        } catch (error: unknown) {
            logger.warn('Could not archive post image', { id, error: errorMessage(error) });
            return null;
        }
    }

    private baseRecord({ id, trigger, topic, progress, finishedAt }: RecordFields): PostRecord {
        const draft = progress.draft;
        return {
            id,
            trigger,
            topicId: topic?.id ?? null,
            topicName: topic?.name ?? null,
            category: topic?.category ?? null,
            body: draft?.body ?? '',
            hashtags: draft ? [...draft.hashtags] : [],
            generationMethod: draft?.method ?? null,
            imageRef: progress.imageRef,
            platformPostId: null,
            status: 'failed',
            failureReason: null,
            failureDetail: null,
            timestamp: new Date(finishedAt).toISOString(),
            attemptCount: progress.attempts
        };
    }

    private failedRecord(fields: RecordFields, reason: FailureKind, detail: string): PostRecord {
        const record: PostRecord = {
            ...this.baseRecord(fields),
            status: 'failed',
            failureReason: reason,
            failureDetail: detail
        };
        return Object.freeze(record);
    }

    /**
     * Rotation, last-cycle status and next fire time after every cycle, manual or timed
     */
    private applyCycleOutcome(topic: Topic | null, record: PostRecord): void {
        const state = this.requireState();
        const finishedAt = Date.parse(record.timestamp);

        let rotation: RotationState = state.rotation;
        if (topic) {
            const cycleCount = rotation.cycleCount + 1;
            rotation = {
                recent: [...rotation.recent.filter(topicId => topicId !== topic.id), topic.id]
                    .slice(-this.settings.rotationMemory),
                lastUsed: { ...rotation.lastUsed, [topic.id]: cycleCount },
                cycleCount
            };
        }

        this.state = {
            ...state,
            rotation,
            lastCycleStatus: record.status,
            lastCycleAt: record.timestamp,
            nextFireAt: new Date(finishedAt + state.intervalMs).toISOString()
        };
    }

    private async persistState(): Promise<void> {
        try {
            await this.stateStore.save(this.requireState());
        } catch (error: unknown) {
            logger.error('Failed to persist schedule state', error);
        }
    }

    private requireState(): ScheduleState {
        if (!this.state) {
            throw new ConfigurationError('Scheduler used before initialize()');
        }
        return this.state;
    }

    private isoIn(ms: number): string {
        return new Date(this.clock.now() + ms).toISOString();
    }
}

export default Scheduler;
