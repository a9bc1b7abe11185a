// src/scheduler/cron-jobs.ts

import cron from 'node-cron';
import { config } from '@/config';
import { BACKUP_CONFIG } from '@/config/storage';
import type { ApiResponse, PostRecord } from '@/types';
import { HistoryStore } from '@/services/history/store';
import { createApiResponse, errorMessage } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { Scheduler } from './controller';

const logger = createServiceLogger('CronJobs');

interface JobInfo {
    name: string;
    schedule: string;
    task: cron.ScheduledTask | null;
    lastRun?: string;
}

export interface TickSource {
    tick(): Promise<PostRecord | null>;
}

export interface BackupTarget {
    createBackup(): Promise<string>;
}

export interface CronJobsOptions {
    pollSeconds: number;
    backupEnabled: boolean;
    backupSchedule: string;
}

/**
 * Timer source for the scheduler: a short poll that calls tick, plus the optional history backup
 */
export class CronJobsService {
    private static instance: CronJobsService;
    private jobs: Map<string, JobInfo> = new Map();
    private isRunning: boolean = false;

    constructor(
        private readonly scheduler: TickSource,
        private readonly history: BackupTarget,
        private readonly options: CronJobsOptions = {
            pollSeconds: config.scheduler.pollSeconds,
            backupEnabled: BACKUP_CONFIG.enabled,
            backupSchedule: BACKUP_CONFIG.schedule
        }
    ) { }

    public static getInstance(): CronJobsService {
        if (!CronJobsService.instance) {
            CronJobsService.instance = new CronJobsService(Scheduler.getInstance(), HistoryStore.getInstance());
        }
        return CronJobsService.instance;
    }

    /**
     * Start all cron jobs
     */
    public start(): ApiResponse<boolean> {
        if (this.isRunning) {
            return createApiResponse(true, 'Cron jobs already running', true);
        }

        try {
            this.schedulePollJob();
            if (this.options.backupEnabled) {
                this.scheduleBackupJob();
            }
        } catch (error: unknown) {
            this.stopAll();
            logger.error('Failed to start cron jobs', error);
            return createApiResponse(false, 'Failed to start cron jobs', false, errorMessage(error));
        }

        this.isRunning = true;
        logger.info('All cron jobs started successfully', {
            totalJobs: this.jobs.size,
            pollSeconds: this.options.pollSeconds
        });
        return createApiResponse(true, 'Cron jobs started successfully', true);
    }

    /**
     * Stop all cron jobs. A cycle already in flight is left to finish.
     */
    public stop(): ApiResponse<boolean> {
        this.stopAll();
        this.isRunning = false;
        logger.info('All cron jobs stopped successfully');
        return createApiResponse(true, 'Cron jobs stopped successfully', true);
    }

    public getStatus(): { isRunning: boolean; jobs: Array<{ name: string; schedule: string; lastRun?: string }> } {
        return {
            isRunning: this.isRunning,
            jobs: Array.from(this.jobs.values()).map(({ name, schedule, lastRun }) =>
                lastRun === undefined ? { name, schedule } : { name, schedule, lastRun })
        };
    }

    /**
     * Poll every few seconds; the scheduler decides whether a cycle is due
     */
    private schedulePollJob(): void {
        const schedule = `*/${this.options.pollSeconds} * * * * *`;
        const jobInfo = this.register('poll', schedule, async () => {
            try {
                const record = await this.scheduler.tick();
                if (record) {
                    jobInfo.lastRun = record.timestamp;
                    logger.info('Timed cycle finished', { id: record.id, status: record.status });
                }
            } catch (error: unknown) {
                logger.error('Scheduler tick failed', error);
            }
        });
    }

    /**
     * Daily copy of the post history
     */
    private scheduleBackupJob(): void {
        const jobInfo = this.register('backup', this.options.backupSchedule, async () => {
            logger.info('Backup job triggered');
            jobInfo.lastRun = new Date().toISOString();

            try {
                const backupPath = await this.history.createBackup();
                logger.info('Scheduled backup completed successfully', { path: backupPath });
            } catch (error: unknown) {
                logger.error('Backup job error', error);
            }
        });
    }

    private register(name: string, schedule: string, run: () => Promise<void>): JobInfo {
        if (!cron.validate(schedule)) {
            throw new Error(`Invalid cron schedule for ${name}: ${schedule}`);
        }

        const jobInfo: JobInfo = { name, schedule, task: null };
        const task = cron.schedule(schedule, () => {
            run().catch((error: unknown) => logger.error(`Cron job ${name} failed`, error));
        }, {
            scheduled: false
        });

        jobInfo.task = task;
        this.jobs.set(name, jobInfo);
        task.start();

        logger.info(`${name} job scheduled`, { schedule });
        return jobInfo;
    }

    private stopAll(): void {
        this.jobs.forEach((jobInfo, name) => {
            if (jobInfo.task) {
                jobInfo.task.stop();
                jobInfo.task = null;
                logger.debug(`Stopped cron job: ${name}`);
            }
        });
        this.jobs.clear();
    }
}

export default CronJobsService;
