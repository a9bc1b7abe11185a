// src/types/history.ts

import type { GenerationMethod } from './content';
import type { PublishErrorKind } from './social';
import type { TopicCategory } from './topic';

export type CycleTrigger = 'timed' | 'manual';
export type PostStatus = 'succeeded' | 'failed';
export type FailureKind = 'NoTopicsAvailable' | PublishErrorKind;

export interface PostRecord {
    id: string;
    trigger: CycleTrigger;
    topicId: string | null;
    topicName: string | null;
    category: TopicCategory | null;
    body: string;
    hashtags: readonly string[];
    generationMethod: GenerationMethod | null;
    imageRef: string | null;
    platformPostId: string | null;
    status: PostStatus;
    failureReason: FailureKind | null;
    failureDetail: string | null;
    timestamp: string;
    attemptCount: number;
}

export interface HistoryFilter {
    status?: PostStatus;
    topicId?: string;
    trigger?: CycleTrigger;
    sinceDays?: number;
    limit?: number;
}

export type HistoryOrder = 'newest-first' | 'oldest-first';

export interface RotationState {
    /** Most recently selected topic ids, newest last */
    recent: string[];
    /** Topic id -> cycle sequence number of its last selection */
    lastUsed: Record<string, number>;
    cycleCount: number;
}

export interface ScheduleState {
    intervalMs: number;
    nextFireAt: string | null;
    enabled: boolean;
    lastCycleStatus: PostStatus | null;
    lastCycleAt: string | null;
    rotation: RotationState;
}

export interface ScheduleStatus extends ScheduleState {
    running: boolean;
    msUntilNextFire: number | null;
    countdown: string | null;
}
