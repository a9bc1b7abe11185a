// src/config/storage.ts

import path from 'path';
import { config } from './index';
import type { ScheduleState } from '@/types';

export const storagePaths = (dataDir: string) => ({
    history: path.join(dataDir, 'history.json'),
    scheduleState: path.join(dataDir, 'schedule-state.json'),
    customPrompts: path.join(dataDir, 'custom-prompts.json'),
    topicOverrides: path.join(dataDir, 'topic-overrides.json'),
    images: path.join(dataDir, 'images')
});

export const STORAGE_PATHS = {
    data: storagePaths(config.storage.dataDir),
    logs: {
        app: path.join(process.cwd(), 'logs', 'app.log'),
        error: path.join(process.cwd(), 'logs', 'error.log')
    }
};

export const BACKUP_CONFIG = {
    enabled: config.storage.backupEnabled,
    maxBackups: config.storage.maxBackups,
    backupPath: path.join(process.cwd(), 'backups'),
    schedule: '0 2 * * *'
};

export const defaultScheduleState = (): ScheduleState => ({
    intervalMs: config.scheduler.intervalMs,
    nextFireAt: null,
    enabled: config.scheduler.enabledByDefault,
    lastCycleStatus: null,
    lastCycleAt: null,
    rotation: {
        recent: [],
        lastUsed: {},
        cycleCount: 0
    }
});

export const VALIDATION_RULES = {
    schedule: {
        minIntervalMs: 60 * 1000,
        maxIntervalMs: 168 * 60 * 60 * 1000
    }
};
