/**
 * 📝 STRUCTURED LOGGER
 *
 * Static façade over winston. Errors are categorised automatically so that
 * oracle failures and store failures can be told apart in the run logs.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export enum ErrorCategory {
    NETWORK = 'NETWORK',       // Timeout, DNS, connection refused
    PARSING = 'PARSING',       // JSON / verdict parsing failures
    VALIDATION = 'VALIDATION', // Schema validation failures (zod)
    AUTH = 'AUTH',             // API key invalid, rate limited
    DATABASE = 'DATABASE',     // SQLite constraint / IO failures
    LOGIC = 'LOGIC',           // Programmer error (bugs)
}

export interface LogContext {
    run_id?: string;
    commoncrawl_id?: string;
    abn?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

/**
 * Single-line development output. `service` is constant for the process, so only
 * per-call context is appended.
 */
export function formatConsoleLine({ level, message, timestamp, service, ...meta }: winston.Logform.TransformableInfo): string {
    const brief = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] [${level}] ${message}${brief}`;
}

function buildLogger(): winston.Logger {
    const env = process.env.NODE_ENV || 'development';
    const isDev = env !== 'production';

    const transports: Array<winston.transports.ConsoleTransportInstance | DailyRotateFile> = [
        new winston.transports.Console({
            format: isDev
                ? winston.format.combine(
                      winston.format.colorize(),
                      winston.format.printf(formatConsoleLine)
                  )
                : winston.format.json(),
        }),
    ];

    if (process.env.LOG_DIR) {
        transports.push(
            new DailyRotateFile({
                dirname: process.env.LOG_DIR,
                filename: 'company-matcher-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
            })
        );
    }

    return winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        silent: env === 'test',
        defaultMeta: { service: process.env.SERVICE_NAME || 'company-matcher' },
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        transports,
    });
}

export class Logger {
    private static instance: winston.Logger | null = null;

    private static get winston(): winston.Logger {
        if (!Logger.instance) {
            Logger.instance = buildLogger();
        }
        return Logger.instance;
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    /**
     * 🔥 Categorize an error from its name and message
     */
    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();
        const name = error.name.toLowerCase();

        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (name.includes('sqlite') || msg.includes('sqlite') || msg.includes('constraint') || msg.includes('no such table')) {
            return ErrorCategory.DATABASE;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('zod') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }

    /**
     * 📊 Log an error with automatic categorization
     */
    static logError(msg: string, error: unknown, extraContext?: Partial<LogContext>) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.error(msg, {
            ...extraContext,
            error: err,
            error_category: this.categorizeError(err),
        });
    }

    private static log(level: string, msg: string, context?: LogContext) {
        if (!context) {
            this.winston.log(level, msg);
            return;
        }

        const { error, ...rest } = context;
        const meta: Record<string, unknown> = { ...rest };
        if (error instanceof Error) {
            meta.error_message = error.message;
            meta.error_stack = error.stack;
        }
        this.winston.log(level, msg, meta);
    }
}
