// src/scheduler/schedule-state.ts

import { STORAGE_PATHS, defaultScheduleState } from '@/config/storage';
import type { ScheduleState } from '@/types';
import { fileUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { validateScheduleState } from '@/utils/validators';

const logger = createServiceLogger('ScheduleStateStore');

/**
 * Persists the scheduler's state between runs
 */
export class ScheduleStateStore {
    constructor(
        private readonly filePath: string = STORAGE_PATHS.data.scheduleState,
        private readonly defaults: () => ScheduleState = defaultScheduleState
    ) {}

    public async load(): Promise<ScheduleState> {
        let raw: unknown;
        try {
            raw = await fileUtils.readJson(this.filePath);
        } catch (error: unknown) {
            logger.error('Schedule state unreadable, using defaults', error, { path: this.filePath });
            return this.defaults();
        }

        if (raw === undefined) {
            logger.info('No saved schedule state, using defaults');
            return this.defaults();
        }

        const validation = validateScheduleState(raw);
        if (!validation.successful || !validation.data) {
            logger.warn('Saved schedule state is invalid, using defaults', { error: validation.error });
            return this.defaults();
        }
        return validation.data;
    }

    public async save(state: ScheduleState): Promise<void> {
        await fileUtils.writeJsonAtomic(this.filePath, state);
    }
}

export default ScheduleStateStore;
