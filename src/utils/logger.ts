// src/utils/logger.ts

import winston from 'winston';
import { config } from '@/config';
import { STORAGE_PATHS } from '@/config/storage';

type LogMeta = Record<string, unknown>;

const isTest = config.app.nodeEnv === 'test';

// Custom log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, stack, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
        const serviceStr = service ? `[${String(service)}] ` : '';
        const stackStr = typeof stack === 'string' ? stack : '';
        return `${String(timestamp)} [${level.toUpperCase()}] ${serviceStr}${String(message)} ${stackStr} ${metaStr}`.trimEnd();
    })
);

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            logFormat
        )
    })
];

if (!isTest) {
    transports.push(
        // All logs
        new winston.transports.File({
            filename: STORAGE_PATHS.logs.app,
            maxsize: 5242880, // 5MB
            maxFiles: 5
        }),

        // Errors only
        new winston.transports.File({
            filename: STORAGE_PATHS.logs.error,
            level: 'error',
            maxsize: 5242880, // 5MB
            maxFiles: 3
        })
    );
}

const logger = winston.createLogger({
    level: config.app.logLevel,
    format: logFormat,
    defaultMeta: { service: 'content-autopilot' },
    silent: isTest,
    transports
});

const describeError = (error: unknown): LogMeta => {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name, stack: error.stack };
    }
    return error === undefined ? {} : { error: String(error) };
};

export interface ServiceLogger {
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    debug(message: string, meta?: LogMeta): void;
    error(message: string, error?: unknown, meta?: LogMeta): void;
}

// Service-specific loggers
export const createServiceLogger = (serviceName: string): ServiceLogger => {
    return {
        info: (message, meta) =>
            logger.info(message, { service: serviceName, ...meta }),

        error: (message, error, meta) =>
            logger.error(message, {
                service: serviceName,
                ...describeError(error),
                ...meta
            }),

        warn: (message, meta) =>
            logger.warn(message, { service: serviceName, ...meta }),

        debug: (message, meta) =>
            logger.debug(message, { service: serviceName, ...meta })
    };
};

// Performance logging
export const logPerformance = (operation: string, duration: number, meta?: LogMeta): void => {
    logger.info(`Performance: ${operation} completed in ${duration}ms`, {
        service: 'performance',
        operation,
        duration,
        ...meta
    });
};

// API request logging
export const logApiRequest = (
    service: string,
    endpoint: string,
    method: string,
    statusCode?: number,
    duration?: number
): void => {
    const level = statusCode && statusCode >= 400 ? 'error' : 'info';
    logger.log(level, `API Request: ${method} ${endpoint}`, {
        service,
        endpoint,
        method,
        statusCode,
        duration
    });
};

export default logger;
