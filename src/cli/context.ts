import { ConfigLoader } from '../config/loader.js';
import type { WorkbenchConfig } from '../config/schema.js';
import { ConfigError, errorMessage } from '../errors.js';
import { HistoryStore } from '../history/store.js';
import { logger } from '../logging/logger.js';
import { renderError } from './ui/render.js';

export interface CliContext {
    root: string;
    config: WorkbenchConfig;
    configLoader: ConfigLoader;
    /** Resolve a configured path against the project root */
    resolve(configured: string): string;
}

/**
 * Load workbench.config.json from the working directory and apply its log level
 */
export async function loadContext(root: string = process.cwd()): Promise<CliContext> {
    const configLoader = new ConfigLoader(root);
    const config = await configLoader.load();

    if (!process.env['WORKBENCH_LOG_LEVEL']) {
        logger.setLevel(config.logLevel);
    }

    return {
        root,
        config,
        configLoader,
        resolve: configured => configLoader.resolvePath(configured),
    };
}

/**
 * Run `fn` against the project's history database, closing it afterwards
 */
export function withHistory<T>(ctx: CliContext, fn: (store: HistoryStore) => T): T {
    const store = HistoryStore.open(ctx.resolve(ctx.config.history.dbPath));
    try {
        return fn(store);
    } finally {
        store.close();
    }
}

/**
 * Wrap a command action: errors print as `✗ message` and set the exit code
 * (2 for configuration errors, 1 otherwise).
 */
export function runAction<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await fn(...args);
        } catch (err) {
            renderError(errorMessage(err));
            logger.debug('Command failed', { stack: err instanceof Error ? err.stack : undefined });
            process.exitCode = err instanceof ConfigError ? 2 : 1;
        }
    };
}

/**
 * commander option parser collecting repeated values
 */
export function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export function parsePositiveInt(value: string): number {
    const n = Number.parseInt(value, 10);
    if (!Number.isInteger(n) || n <= 0) {
        throw new ConfigError(`Expected a positive integer, got "${value}"`);
    }
    return n;
}
