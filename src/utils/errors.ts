// src/utils/errors.ts

/**
 * Invalid configuration input: bad interval, unknown topic, malformed data file.
 */
export class ConfigurationError extends Error {
    public readonly kind = 'ConfigurationError';

    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A manual cycle was requested while another cycle is in flight.
 */
export class SchedulerBusyError extends Error {
    public readonly kind = 'SchedulerBusy';

    constructor(public readonly runningSince: string) {
        super(`A cycle is already running (started ${runningSince})`);
        this.name = 'SchedulerBusyError';
    }
}
