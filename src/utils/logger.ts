import { AppError } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

type EmitLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    /**
     * Nested logger. Scopes join with "."; `bindings` are merged into the
     * context of every line it writes.
     */
    child: (scope: string, bindings?: LogContext) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const CONSOLE_METHODS: Record<EmitLevel, (...args: unknown[]) => void> = {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Level from LOG_LEVEL; `warn` in production and `debug` elsewhere when unset.
 * Unrecognised values silence output.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return env.NODE_ENV === "production" ? "warn" : "debug";
    }
    return isLogLevel(configured) ? configured : "silent";
}

const activeLevel = resolveLogLevel();

function toLoggable(value: unknown): unknown {
    if (value instanceof AppError) {
        return { ...value.toJSON(), stack: value.stack };
    }
    if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
    }
    return value;
}

function isContext(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function mergeContext(bindings: LogContext, context: LogContext | null): LogContext | null {
    const merged: LogContext = { ...bindings, ...(context ?? {}) };
    const keys = Object.keys(merged);
    if (keys.length === 0) {
        return null;
    }
    for (const key of keys) {
        merged[key] = toLoggable(merged[key]);
    }
    return merged;
}

function write(
    level: EmitLevel,
    scope: string | null,
    bindings: LogContext,
    message: string,
    args: unknown[]
): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[activeLevel]) {
        return;
    }

    const label = `[${level.toUpperCase()}]`;
    const line = scope ? `${label} [${scope}] ${message}` : `${label} ${message}`;

    const [first, ...rest] = args;
    const hasContext = isContext(first);
    const context = mergeContext(bindings, hasContext ? first : null);
    const extras = (hasContext ? rest : args).map(toLoggable);

    const output = context ? [line, context, ...extras] : [line, ...extras];
    CONSOLE_METHODS[level](...output);
}

export function createLogger(scope?: string, bindings: LogContext = {}): Logger {
    const scoped = scope?.trim() || null;
    const at =
        (level: EmitLevel) =>
        (message: string, ...args: unknown[]) =>
            write(level, scoped, bindings, message, args);

    return {
        debug: at("debug"),
        info: at("info"),
        warn: at("warn"),
        error: at("error"),
        child: (childScope, childBindings = {}) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed, {
                ...bindings,
                ...childBindings,
            });
        },
    };
}

/**
 * Runs `run` between "started" and "completed" debug lines carrying its
 * duration. Failures are logged at error level and rethrown.
 */
export async function withLogTiming<T>(
    log: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    log.debug(`${operation} started`, context);

    try {
        const result = await run();
        log.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        log.error(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger("flow");
