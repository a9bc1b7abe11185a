// src/utils/helpers.ts

import fs from 'fs/promises';
import path from 'path';
import moment from 'moment';
import type { ApiResponse, Clock } from '@/types';

export class TimeoutError extends Error {
    constructor(public readonly label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export class AbortedError extends Error {
    constructor(message: string = 'Operation aborted') {
        super(message);
        this.name = 'AbortedError';
    }
}

/**
 * Sleep/delay function. Rejects with AbortedError when the signal fires first.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortedError());
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
};

/**
 * Race a promise against a timer. The losing promise is left to settle on its own.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep
};

export const errorMessage = (error: unknown): string => {
    return error instanceof Error ? error.message : String(error);
};

/**
 * Create standardized API response
 */
export const createApiResponse = <T>(
    successful: boolean,
    message: string,
    data?: T,
    error?: string | Error
): ApiResponse<T> => {
    const response: ApiResponse<T> = { successful, message };
    if (error !== undefined) {
        response.error = error instanceof Error ? error.message : error;
    }
    if (data !== undefined) {
        response.data = data;
    }
    return response;
};

let tempFileCounter = 0;

const isMissingFile = (error: unknown): boolean => {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

/**
 * JSON file utilities
 */
export const fileUtils = {
    /** Parsed file contents, or undefined when the file does not exist */
    readJson: async (filePath: string): Promise<unknown> => {
        let raw: string;
        try {
            raw = await fs.readFile(filePath, 'utf-8');
        } catch (error: unknown) {
            if (isMissingFile(error)) return undefined;
            throw error;
        }
        return JSON.parse(raw);
    },

    /** Write through a temp file and rename, so readers never see a partial file */
    writeJsonAtomic: async (filePath: string, data: unknown): Promise<void> => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        tempFileCounter += 1;
        const tempPath = `${filePath}.${process.pid}.${tempFileCounter}.tmp`;
        await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
        await fs.rename(tempPath, filePath);
    },

    isMissingFile
};

/**
 * Date and time utilities
 */
export const dateUtils = {
    isWithinDays: (date: string, days: number, now: number = Date.now()): boolean => {
        return moment(date).isAfter(moment(now).subtract(days, 'days'));
    },

    formatCountdown: (ms: number): string => {
        const duration = moment.duration(Math.max(0, ms));
        const hours = Math.floor(duration.asHours());
        const pad = (n: number): string => String(n).padStart(2, '0');
        return `${pad(hours)}:${pad(duration.minutes())}:${pad(duration.seconds())}`;
    },

    fileStamp: (date: Date = new Date()): string => {
        return moment(date).format('YYYYMMDD_HHmmss');
    }
};

/**
 * String utilities
 */
export const stringUtils = {
    /**
     * Cut at the last whole word that fits, then append the marker.
     * The result never exceeds maxLength.
     */
    truncateAtWord: (text: string, maxLength: number, marker: string = '…'): string => {
        if (text.length <= maxLength) return text;

        const cut = text.slice(0, Math.max(0, maxLength - marker.length));
        let head = cut;
        if (!/\s/.test(text.charAt(cut.length))) {
            const boundary = cut.search(/\s\S*$/);
            if (boundary > 0) head = cut.slice(0, boundary);
        }
        return head.trimEnd() + marker;
    },

    /** "Lightning Network basics" -> "#LightningNetworkBasics" */
    toHashtag: (text: string): string => {
        const words = text.replace(/['’]/g, '').match(/[A-Za-z0-9]+/g) ?? [];
        return '#' + words.map(w => w.charAt(0).toUpperCase() + w.slice(1)).join('');
    },

    removeHashtags: (text: string): string => {
        return text.replace(/#[\w]+/g, '').replace(/[ \t]{2,}/g, ' ').trim();
    },

    escapeXml: (text: string): string => {
        return text
            .replace(/&/g, '&amp;')
            .replace(/</g, '&lt;')
            .replace(/>/g, '&gt;')
            .replace(/"/g, '&quot;')
            .replace(/'/g, '&apos;');
    }
};

/**
 * Deterministic pseudo-random numbers for reproducible variation
 */
export const seededRandom = {
    hash: (input: string): number => {
        // FNV-1a
        let h = 0x811c9dc5;
        for (let i = 0; i < input.length; i++) {
            h ^= input.charCodeAt(i);
            h = Math.imul(h, 0x01000193);
        }
        return h >>> 0;
    },

    /** mulberry32; returns floats in [0, 1) */
    create: (seed: number): (() => number) => {
        let a = seed >>> 0;
        return () => {
            a = (a + 0x6d2b79f5) >>> 0;
            let t = a;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        };
    },

    shuffle: <T>(array: readonly T[], random: () => number): T[] => {
        const shuffled = [...array];
        for (let i = shuffled.length - 1; i > 0; i--) {
            const j = Math.floor(random() * (i + 1));
            const a = shuffled[i];
            const b = shuffled[j];
            if (a !== undefined && b !== undefined) {
                shuffled[i] = b;
                shuffled[j] = a;
            }
        }
        return shuffled;
    },

    pick: <T>(array: readonly T[], random: () => number): T | undefined => {
        return array[Math.floor(random() * array.length)];
    }
};

/**
 * Generate unique ID (time-derived, so ordering survives restarts)
 */
export const generateId = (now: number = Date.now()): string => {
    return now.toString(36).padStart(9, '0') + Math.random().toString(36).slice(2, 10);
};
