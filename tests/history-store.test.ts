// tests/history-store.test.ts

import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CSV_COLUMNS, fromCsv, parseCsvRows, toCsv } from '../src/services/history/csv';
import { DuplicateRecordError, HistoryStore } from '../src/services/history/store';
import type { PostRecord } from '../src/types';
import { makeTempDir, pngImage, removeDir } from './helpers/fakes';

const record = (id: string, overrides: Partial<PostRecord> = {}): PostRecord => ({
    id,
    trigger: 'timed',
    topicId: 'bitcoin-basics',
    topicName: 'Bitcoin basics',
    category: 'Bitcoin',
    body: 'Hi',
    hashtags: ['#Bitcoin', '#BTC'],
    generationMethod: 'primary',
    imageRef: null,
    platformPostId: '123',
    status: 'succeeded',
    failureReason: null,
    failureDetail: null,
    timestamp: '2026-03-01T12:00:00.000Z',
    attemptCount: 1,
    ...overrides
});

const failed = (id: string, overrides: Partial<PostRecord> = {}): PostRecord => record(id, {
    topicId: null,
    topicName: null,
    category: null,
    body: '',
    hashtags: [],
    generationMethod: null,
    platformPostId: null,
    status: 'failed',
    failureReason: 'NoTopicsAvailable',
    failureDetail: 'No enabled topics in the catalog',
    attemptCount: 0,
    ...overrides
});

describe('HistoryStore', () => {
    let dir: string;
    let store: HistoryStore;

    const open = (maxBackups: number = 7): HistoryStore => new HistoryStore({
        historyPath: path.join(dir, 'history.json'),
        imagesDir: path.join(dir, 'images'),
        backupDir: path.join(dir, 'backups'),
        maxBackups
    });

    const ids = (records: Iterable<PostRecord>): string[] => [...records].map(entry => entry.id);

    beforeEach(async () => {
        dir = await makeTempDir();
        store = open();
        await store.initialize();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('lists newest first by default and oldest first on request', async () => {
        await store.append(record('a'));
        await store.append(record('b'));
        await store.append(failed('c'));

        expect(ids(store.list())).toEqual(['c', 'b', 'a']);
        expect(ids(store.list({}, 'oldest-first'))).toEqual(['a', 'b', 'c']);
    });

    it('persists records across restarts', async () => {
        await store.append(record('a'));
        await store.append(failed('b'));

        const reopened = open();
        await reopened.initialize();

        expect(reopened.count()).toBe(2);
        expect([...reopened.list()]).toEqual([failed('b'), record('a')]);
    });

    it('freezes appended records', async () => {
        const source = record('a');
        const stored = await store.append(source);
        source.body = 'changed later';

        expect(Object.isFrozen(stored)).toBe(true);
        expect(Object.isFrozen(stored.hashtags)).toBe(true);
        expect([...store.list()][0]?.body).toBe('Hi');
    });

    it('rejects a duplicate id', async () => {
        await store.append(record('a'));

        await expect(store.append(record('a'))).rejects.toThrow(DuplicateRecordError);
        expect(store.count()).toBe(1);
    });

    it('filters by status, topic, trigger and limit', async () => {
        await store.append(record('a', { topicId: 'nostr-basics', category: 'Nostr' }));
        await store.append(failed('b', { trigger: 'manual' }));
        await store.append(record('c', { trigger: 'manual' }));
        await store.append(record('d'));

        expect(ids(store.list({ status: 'failed' }))).toEqual(['b']);
        expect(ids(store.list({ topicId: 'nostr-basics' }))).toEqual(['a']);
        expect(ids(store.list({ trigger: 'manual' }))).toEqual(['c', 'b']);
        expect(ids(store.list({ status: 'succeeded', limit: 2 }))).toEqual(['d', 'c']);
    });

    it('filters by age in days', async () => {
        const day = 24 * 60 * 60 * 1000;
        await store.append(record('old', { timestamp: new Date(Date.now() - 10 * day).toISOString() }));
        await store.append(record('recent', { timestamp: new Date(Date.now() - day).toISOString() }));

        expect(ids(store.list({ sinceDays: 3 }))).toEqual(['recent']);
    });

    it('iterates the snapshot taken when list was called', async () => {
        await store.append(record('a'));
        const listing = store.list();
        await store.append(record('b'));

        expect(ids(listing)).toEqual(['a']);
        expect(ids(listing)).toEqual(['a']);
        expect(ids(store.list())).toEqual(['b', 'a']);
    });

    it('skips invalid entries found on disk', async () => {
        await fs.writeFile(
            path.join(dir, 'history.json'),
            JSON.stringify([record('a'), { id: 'broken' }, record('a'), failed('b')])
        );

        const reopened = open();
        await reopened.initialize();

        expect(ids(reopened.list())).toEqual(['b', 'a']);
    });

    it('exports CSV that parses back to the same records', async () => {
        await store.append(record('a', { body: 'Commas, "quotes"\nand newlines' }));
        await store.append(failed('b'));
        await store.append(record('c', { body: '', imageRef: '/data/images/c.png' }));

        const csv = store.exportAll();

        expect(store.parseExport(csv)).toEqual([...store.list({}, 'oldest-first')]);
    });

    it('clears every record when asked', async () => {
        await store.append(record('a'));
        await store.append(record('b'));

        await expect(store.clear()).resolves.toBe(2);

        const reopened = open();
        await reopened.initialize();
        expect(store.count()).toBe(0);
        expect(reopened.count()).toBe(0);
    });

    it('archives images beside the history', async () => {
        const imagePath = await store.archiveImage('abc', pngImage(8));

        expect(imagePath).toBe(path.join(dir, 'images', 'abc.png'));
        await expect(fs.readFile(imagePath)).resolves.toEqual(Buffer.alloc(8, 1));
    });

    it('keeps only the newest backups', async () => {
        const limited = open(2);
        await limited.initialize();
        await limited.append(record('a'));

        await limited.createBackup(new Date(2026, 0, 1, 2, 0, 0));
        await limited.createBackup(new Date(2026, 0, 2, 2, 0, 0));
        const newest = await limited.createBackup(new Date(2026, 0, 3, 2, 0, 0));

        expect((await fs.readdir(path.join(dir, 'backups'))).sort()).toEqual([
            'history-backup-20260102_020000.json',
            'history-backup-20260103_020000.json'
        ]);
        expect(JSON.parse(await fs.readFile(newest, 'utf-8'))).toEqual([record('a')]);
    });
});

describe('history CSV', () => {
    it('writes a fixed header and quotes every present value', () => {
        const csv = toCsv([record('a')]);

        expect(csv.split('\r\n')).toEqual([
            CSV_COLUMNS.join(','),
            '"a","timed","bitcoin-basics","Bitcoin basics","Bitcoin","Hi","#Bitcoin #BTC","primary",,"123","succeeded",,,"2026-03-01T12:00:00.000Z","1"',
            ''
        ]);
    });

    it('tells empty strings from missing values', () => {
        expect(parseCsvRows('"",,"x"\r\n')).toEqual([['', null, 'x']]);
    });

    it('rejects an unexpected header', () => {
        expect(() => fromCsv('id,body\r\n"a","Hi"\r\n')).toThrow('Unexpected CSV header: id,body');
    });

    it('rejects rows that do not validate', () => {
        const csv = toCsv([record('a')]).replace('"succeeded"', '"pending"');
        expect(() => fromCsv(csv)).toThrow('Invalid record on CSV row 2');
    });
});
