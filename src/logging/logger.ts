import chalk from 'chalk';

// ─── Logger ───
//
// Diagnostic output goes to stderr so command results on stdout stay
// pipeable. Level comes from config (logLevel) or WORKBENCH_LOG_LEVEL.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export type LogSink = (line: string) => void;

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
    private level: LogLevel;
    private sink: LogSink;
    private scope?: string;

    constructor(options: { level?: LogLevel; sink?: LogSink; scope?: string } = {}) {
        this.level = options.level ?? levelFromEnv() ?? 'warn';
        this.sink = options.sink ?? ((line) => process.stderr.write(line + '\n'));
        this.scope = options.scope;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    /**
     * Logger sharing this one's sink and level, prefixed with a scope name
     */
    child(scope: string): Logger {
        return new Logger({ level: this.level, sink: this.sink, scope });
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
        if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
            return;
        }

        const timestamp = new Date().toISOString();
        const tag = COLOURS[level](level.toUpperCase().padEnd(5));
        const scope = this.scope ? chalk.dim(`[${this.scope}] `) : '';

        let line = `${chalk.dim(timestamp)} ${tag} ${scope}${message}`;
        if (context && Object.keys(context).length > 0) {
            line += ' ' + chalk.dim(safeStringify(context));
        }
        this.sink(line);
    }
}

const COLOURS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

function levelFromEnv(): LogLevel | undefined {
    const raw = process.env['WORKBENCH_LOG_LEVEL']?.trim().toLowerCase();
    return raw && isLogLevel(raw) ? raw : undefined;
}

function safeStringify(value: unknown): string {
    try {
        return JSON.stringify(value);
    } catch {
        return '[unserializable context]';
    }
}

/** Shared process-wide logger */
export const logger = new Logger();
