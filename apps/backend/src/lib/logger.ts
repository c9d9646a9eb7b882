import pino from 'pino';
import type { ILogger, ILoggerChildOptions } from '@terminal-connector/types';

/**
 * Logger utilities for the connector backend.
 *
 * Services never import Pino directly; they receive an `ILogger` through their
 * constructor. The bootstrap creates one root logger with `createLogger()` and
 * hands out module-scoped children with `forModule()`, which also applies the
 * per-module level overrides from `MODULE_LOG_LEVELS`.
 *
 * ```typescript
 * const logger = createLogger({ level: 'info', pretty: false, moduleLevels: { upstream: 'warn' } });
 * const upstreamLogger = logger.forModule('upstream'); // only warn and above
 * upstreamLogger.warn({ attempt: 1 }, 'Retrying upstream request');
 * ```
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

/**
 * Paths scrubbed from every log entry. Credentials can reach a log line through
 * request headers or the provider token query parameter.
 */
export const REDACTED_PATHS = [
    'req.headers.authorization',
    'req.headers["x-api-key"]',
    'headers.authorization',
    'headers["x-api-key"]',
    'config.params.token',
    'credential',
    'apiKey',
    'token',
    '*.credential',
    '*.apiKey',
    '*.token'
];

export interface LoggerOptions {
    level: LogLevel;

    /**
     * Human-readable output through pino-pretty instead of JSON lines.
     */
    pretty: boolean;

    moduleLevels?: Readonly<Record<string, LogLevel>>;
}

function isLogLevel(value: string): value is LogLevel {
    return (LEVELS as readonly string[]).includes(value);
}

/**
 * Parse `module:level` pairs such as `upstream:warn,translator:debug`.
 *
 * Entries without a colon or with an unknown level are skipped.
 */
export function parseModuleLevels(spec: string): Record<string, LogLevel> {
    const levels: Record<string, LogLevel> = {};

    for (const entry of spec.split(',')) {
        const separator = entry.indexOf(':');
        if (separator === -1) {
            continue;
        }
        const moduleName = entry.slice(0, separator).trim();
        const level = entry.slice(separator + 1).trim().toLowerCase();
        if (moduleName && isLogLevel(level)) {
            levels[moduleName] = level;
        }
    }

    return levels;
}

/**
 * ILogger implementation backed by a Pino instance.
 */
export class ConnectorLogger implements ILogger {
    constructor(
        private readonly pino: pino.Logger,
        private readonly moduleLevels: Readonly<Record<string, LogLevel>> = {}
    ) {}

    public get level(): string {
        return this.pino.level;
    }

    public fatal(objOrMessage: object | string, message?: string): void {
        this.write('fatal', objOrMessage, message);
    }

    public error(objOrMessage: object | string, message?: string): void {
        this.write('error', objOrMessage, message);
    }

    public warn(objOrMessage: object | string, message?: string): void {
        this.write('warn', objOrMessage, message);
    }

    public info(objOrMessage: object | string, message?: string): void {
        this.write('info', objOrMessage, message);
    }

    public debug(objOrMessage: object | string, message?: string): void {
        this.write('debug', objOrMessage, message);
    }

    public trace(objOrMessage: object | string, message?: string): void {
        this.write('trace', objOrMessage, message);
    }

    public child(bindings: Record<string, unknown>, options?: ILoggerChildOptions): ConnectorLogger {
        const level = options?.level;
        const child = level && isLogLevel(level)
            ? this.pino.child(bindings, { level })
            : this.pino.child(bindings);
        return new ConnectorLogger(child, this.moduleLevels);
    }

    /**
     * Child logger bound to `{ module: name }` with that module's level override, if any.
     */
    public forModule(name: string): ConnectorLogger {
        return this.child({ module: name }, { level: this.moduleLevels[name] });
    }

    private write(level: pino.Level, objOrMessage: object | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino[level](objOrMessage);
            return;
        }
        this.pino[level](objOrMessage, message);
    }
}

/**
 * Creates the root logger.
 *
 * Pretty output goes through a `pino-pretty` transport (worker thread), JSON
 * output is written synchronously to stdout.
 */
export function createLogger(options: LoggerOptions): ConnectorLogger {
    const pinoOptions: pino.LoggerOptions = {
        level: options.level,
        base: { service: 'terminal-connector' },
        redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
    };

    const instance = options.pretty
        ? pino(
            pinoOptions,
            pino.transport({
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname'
                }
            })
        )
        : pino(pinoOptions);

    return new ConnectorLogger(instance, options.moduleLevels);
}
