// src/cli.ts

import { Application } from '@/app';
import type { ApiResponse, HistoryFilter, PostStatus } from '@/types';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('CLI');

const USAGE = `
Usage: content-autopilot <command>

  start                               Run the scheduler until interrupted
  post-now                            Run one cycle immediately
  preview [topic-id]                  Draft the next post without publishing it
  check-connection                    Check the platform credentials
  status                              Show schedule state and countdown
  history [--status s] [--topic id] [--days n] [--limit n]
                                      List post records, newest first
  export <file>                       Write the full history as CSV
  clear-history --yes                 Delete every post record
  enable | disable                    Turn timed cycles on or off
  interval <hours>                    Change the posting interval
  topic <id> enable|disable           Include or exclude a topic
  topic <id> priority <n>             Change a topic's priority
`;

const print = (response: ApiResponse): void => {
    if (response.successful) {
        console.log(`✅ ${response.message}`);
    } else {
        console.error(`❌ ${response.message}${response.error ? `: ${response.error}` : ''}`);
    }
    if (response.data !== undefined) {
        console.log(JSON.stringify(response.data, null, 2));
    }
};

const optionValue = (args: string[], flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index >= 0 ? args[index + 1] : undefined;
};

const parseStatus = (value: string | undefined): PostStatus | undefined =>
    value === 'succeeded' || value === 'failed' ? value : undefined;

export const parseHistoryFilter = (args: string[]): HistoryFilter => {
    const filter: HistoryFilter = {};
    const status = parseStatus(optionValue(args, '--status'));
    const topicId = optionValue(args, '--topic');
    const days = Number(optionValue(args, '--days'));
    const limit = Number(optionValue(args, '--limit'));

    if (status) filter.status = status;
    if (topicId) filter.topicId = topicId;
    if (Number.isFinite(days) && days > 0) filter.sinceDays = days;
    if (Number.isInteger(limit) && limit > 0) filter.limit = limit;
    return filter;
};

const waitForShutdown = (app: Application): void => {
    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down gracefully`);
        app.shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Error during shutdown', error);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
};

export async function main(args: string[]): Promise<number> {
    const app = Application.getInstance();
    const [command, ...rest] = args;

    switch (command) {
        case 'start': {
            const result = await app.start();
            print(result);
            if (!result.successful) return 1;
            waitForShutdown(app);
            return 0;
        }

        case 'post-now': {
            const result = await app.postNow();
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'preview': {
            const result = await app.preview(rest[0]);
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'check-connection': {
            const result = await app.checkConnection();
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'status': {
            const result = await app.status();
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'history': {
            const result = await app.history(parseHistoryFilter(rest));
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'export': {
            const [file] = rest;
            if (!file) break;
            const result = await app.exportHistory(file);
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'clear-history': {
            const result = await app.clearHistory(rest.includes('--yes'));
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'enable':
        case 'disable': {
            const result = await app.setEnabled(command === 'enable');
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'interval': {
            const hours = Number(rest[0]);
            if (!Number.isFinite(hours)) break;
            const result = await app.setInterval(hours);
            print(result);
            return result.successful ? 0 : 1;
        }

        case 'topic': {
            const [id, action, value] = rest;
            if (!id || !action) break;

            let update: { enabled?: boolean; priority?: number } | null = null;
            if (action === 'enable' || action === 'disable') {
                update = { enabled: action === 'enable' };
            } else if (action === 'priority' && value !== undefined) {
                update = { priority: Number(value) };
            }
            if (!update) break;

            const result = await app.setTopic(id, update);
            print(result);
            return result.successful ? 0 : 1;
        }

        default:
            break;
    }

    console.log(USAGE);
    return command === undefined || command === 'help' ? 0 : 1;
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => {
            // `start` keeps the process alive through its cron jobs
            if (process.argv[2] !== 'start' || code !== 0) {
                process.exit(code);
            }
        })
        .catch((error: unknown) => {
            logger.error('Command failed', error);
            process.exit(1);
        });
}
