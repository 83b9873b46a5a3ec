// Logger
// Scoped console logging with a level threshold
// Every line carries a [scope] prefix so output can be grepped per module
// NO secrets in logs

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext, error?: unknown): void;
    child(scope: string): Logger;
}

/** Where formatted lines go; swapped out in tests */
export interface LogSink {
    write(level: LogLevel, line: string): void;
}

const consoleSink: LogSink = {
    write(level, line) {
        if (level === 'error') {
            console.error(line);
        } else if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    },
};

let activeLevel: LogLevel = 'info';
let activeSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

export function setLogSink(sink: LogSink | null): void {
    activeSink = sink ?? consoleSink;
}

export function formatLogLine(
    level: LogLevel,
    scope: string,
    message: string,
    context?: LogContext,
    timestamp: Date = new Date()
): string {
    const base = `${timestamp.toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    if (!context || Object.keys(context).length === 0) {
        return base;
    }
    return `${base} ${JSON.stringify(context)}`;
}

class ScopedLogger implements Logger {
    constructor(private readonly scope: string) {}

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
        activeSink.write(level, formatLogLine(level, this.scope, message, context));
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: LogContext, error?: unknown): void {
        if (error === undefined) {
            this.log('error', message, context);
            return;
        }
        const detail = error instanceof Error ? error.message : String(error);
        this.log('error', `${message}: ${detail}`, context);
        if (error instanceof Error && error.stack && LEVEL_ORDER.debug >= LEVEL_ORDER[activeLevel]) {
            activeSink.write('debug', error.stack);
        }
    }

    child(scope: string): Logger {
        return new ScopedLogger(`${this.scope}:${scope}`);
    }
}

export function createLogger(scope: string): Logger {
    return new ScopedLogger(scope);
}
