// src/services/history/store.ts

import fs from 'fs/promises';
import path from 'path';
import { BACKUP_CONFIG, STORAGE_PATHS } from '@/config/storage';
import type { HistoryFilter, HistoryOrder, ImageArtifact, PostRecord } from '@/types';
import { dateUtils, fileUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { validatePostRecord } from '@/utils/validators';
import { fromCsv, toCsv } from './csv';

const logger = createServiceLogger('HistoryStore');

const BACKUP_PREFIX = 'history-backup-';

export interface HistoryStoreOptions {
    historyPath: string;
    imagesDir: string;
    backupDir: string;
    maxBackups: number;
}

export class DuplicateRecordError extends Error {
    constructor(public readonly recordId: string) {
        super(`Post record ${recordId} already exists`);
        this.name = 'DuplicateRecordError';
    }
}

/**
 * Append-only store of PostRecords, persisted as one JSON array.
 * Records are frozen on append and never change afterwards.
 */
export class HistoryStore {
    private static instance: HistoryStore;
    private records: ReadonlyArray<Readonly<PostRecord>> = [];
    private readonly ids = new Set<string>();
    private isInitialized: boolean = false;
    // Serializes disk writes so appends land in order
    private writeChain: Promise<void> = Promise.resolve();

    constructor(private readonly options: HistoryStoreOptions) {}

    public static getInstance(): HistoryStore {
        if (!HistoryStore.instance) {
            HistoryStore.instance = new HistoryStore({
                historyPath: STORAGE_PATHS.data.history,
                imagesDir: STORAGE_PATHS.data.images,
                backupDir: BACKUP_CONFIG.backupPath,
                maxBackups: BACKUP_CONFIG.maxBackups
            });
        }
        return HistoryStore.instance;
    }

    /**
     * Load persisted records. Entries that fail validation are skipped.
     */
    public async initialize(): Promise<void> {
        if (this.isInitialized) return;

        const raw = await fileUtils.readJson(this.options.historyPath);
        const loaded: PostRecord[] = [];

        if (Array.isArray(raw)) {
            raw.forEach((entry: unknown, index) => {
                const validation = validatePostRecord(entry);
                if (!validation.successful || !validation.data) {
                    logger.warn('Skipping invalid history entry', { index, error: validation.error });
                    return;
                }
                if (this.ids.has(validation.data.id)) {
                    logger.warn('Skipping duplicate history entry', { index, id: validation.data.id });
                    return;
                }
                this.ids.add(validation.data.id);
                loaded.push(Object.freeze(validation.data));
            });
        } else if (raw !== undefined) {
            logger.warn('History file is not a list, starting empty', { path: this.options.historyPath });
        } else {
            logger.info('No existing post history found, starting fresh');
        }

        this.records = loaded;
        this.isInitialized = true;
        logger.info('History store initialized', { records: loaded.length });
    }

    /**
     * The only mutation entry point. Freezes a copy of the record and persists the log.
     */
    public async append(record: PostRecord): Promise<Readonly<PostRecord>> {
        await this.initialize();

        if (this.ids.has(record.id)) {
            throw new DuplicateRecordError(record.id);
        }

        const frozen = Object.freeze({ ...record, hashtags: Object.freeze([...record.hashtags]) });
        this.ids.add(frozen.id);
        this.records = [...this.records, frozen];

        await this.persist();
        logger.info('Post record appended', { id: frozen.id, status: frozen.status });
        return frozen;
    }

    /**
     * Lazy, restartable, finite sequence. Each iteration walks the snapshot taken at call time.
     */
    public list(filter: HistoryFilter = {}, order: HistoryOrder = 'newest-first'): Iterable<Readonly<PostRecord>> {
        const snapshot = this.records;
        const now = Date.now();

        const matches = (record: Readonly<PostRecord>): boolean =>
            (filter.status === undefined || record.status === filter.status)
            && (filter.topicId === undefined || record.topicId === filter.topicId)
            && (filter.trigger === undefined || record.trigger === filter.trigger)
            && (filter.sinceDays === undefined || dateUtils.isWithinDays(record.timestamp, filter.sinceDays, now));

        return {
            *[Symbol.iterator]() {
                let yielded = 0;
                const newestFirst = order === 'newest-first';
                for (let n = 0; n < snapshot.length; n++) {
                    if (filter.limit !== undefined && yielded >= filter.limit) return;
                    const record = snapshot[newestFirst ? snapshot.length - 1 - n : n];
                    if (record && matches(record)) {
                        yielded++;
                        yield record;
                    }
                }
            }
        };
    }

    public count(): number {
        return this.records.length;
    }

    /**
     * Every record as CSV, oldest first
     */
    public exportAll(): string {
        return toCsv(this.list({}, 'oldest-first'));
    }

    public parseExport(csv: string): PostRecord[] {
        return fromCsv(csv);
    }

    /**
     * Destructive and irreversible. Callers must confirm with the user first.
     */
    public async clear(): Promise<number> {
        await this.initialize();
        const removed = this.records.length;
        this.records = [];
        this.ids.clear();
        await this.persist();
        logger.warn('Post history cleared', { removed });
        return removed;
    }

    /**
     * Keep a copy of the published image beside the history, returning its path
     */
    public async archiveImage(recordId: string, artifact: ImageArtifact): Promise<string> {
        const extension = artifact.mimeType === 'image/png' ? 'png' : 'svg';
        const imagePath = path.join(this.options.imagesDir, `${recordId}.${extension}`);
        await fs.mkdir(this.options.imagesDir, { recursive: true });
        await fs.writeFile(imagePath, artifact.data);
        return imagePath;
    }

    /**
     * Timestamped copy of the history, pruning old copies beyond maxBackups
     */
    public async createBackup(date: Date = new Date()): Promise<string> {
        await this.initialize();
        const backupPath = path.join(this.options.backupDir, `${BACKUP_PREFIX}${dateUtils.fileStamp(date)}.json`);
        await fileUtils.writeJsonAtomic(backupPath, this.records);
        await this.cleanOldBackups();
        logger.info('History backup created', { backupPath });
        return backupPath;
    }

    private async persist(): Promise<void> {
        const snapshot = this.records;
        const write = this.writeChain.then(() => fileUtils.writeJsonAtomic(this.options.historyPath, snapshot));
        // Keep the chain alive after a failed write; the caller still sees the failure
        this.writeChain = write.catch((error: unknown) => {
            logger.error('History write failed', error);
        });
        await write;
    }

    private async cleanOldBackups(): Promise<void> {
        const files = await fs.readdir(this.options.backupDir);
        // File names carry a sortable timestamp
        const backups = files
            .filter(file => file.startsWith(BACKUP_PREFIX))
            .sort()
            .reverse();

        for (const file of backups.slice(this.options.maxBackups)) {
            await fs.unlink(path.join(this.options.backupDir, file));
            logger.info('Old backup deleted', { fileName: file });
        }
    }
}

export default HistoryStore;
