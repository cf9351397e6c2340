import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigError, errorMessage } from '../errors.js';
import { isNotFound } from '../utils/fs.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './defaults.js';
import { WorkbenchConfigSchema, type WorkbenchConfig } from './schema.js';

/**
 * Config Loader — reads workbench.config.json and merges it over defaults
 *
 * A missing file is not an error: the defaults apply. Malformed JSON or a
 * value that fails the schema raises ConfigError naming the field.
 */
export class ConfigLoader {
    private cached: WorkbenchConfig | null = null;

    constructor(private projectRoot: string = process.cwd()) {}

    get configPath(): string {
        return path.join(this.projectRoot, CONFIG_FILENAME);
    }

    async load(): Promise<WorkbenchConfig> {
        if (this.cached) return this.cached;

        let raw: string | null = null;
        try {
            raw = await readFile(this.configPath, 'utf-8');
        } catch (err) {
            if (!isNotFound(err)) {
                throw new ConfigError(`Cannot read ${this.configPath}: ${errorMessage(err)}`, { cause: err });
            }
        }

        let overrides: unknown = {};
        if (raw !== null) {
            try {
                overrides = JSON.parse(raw);
            } catch (err) {
                throw new ConfigError(`Invalid JSON in ${this.configPath}: ${errorMessage(err)}`, { cause: err });
            }
        }

        this.cached = parseConfig(overrides, this.configPath);
        return this.cached;
    }

    /**
     * Resolve a configured path against the project root, expanding a leading ~
     */
    resolvePath(configured: string): string {
        return resolveConfigPath(configured, this.projectRoot);
    }
}

/**
 * Validate a partial config object merged over DEFAULT_CONFIG
 */
export function parseConfig(overrides: unknown, source = CONFIG_FILENAME): WorkbenchConfig {
    if (!isPlainObject(overrides)) {
        throw new ConfigError(`${source} must contain a JSON object`);
    }

    const merged = deepMerge(DEFAULT_CONFIG, overrides);
    const result = WorkbenchConfigSchema.safeParse(merged);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
    }
    return result.data;
}

export function resolveConfigPath(configured: string, projectRoot: string): string {
    if (configured === '~') return os.homedir();
    if (configured.startsWith('~/')) {
        return path.join(os.homedir(), configured.slice(2));
    }
    return path.resolve(projectRoot, configured);
}

function deepMerge(base: object, overrides: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(overrides)) {
        const current = out[key];
        if (isPlainObject(current) && isPlainObject(value)) {
            out[key] = deepMerge(current, value);
        } else {
            out[key] = value;
        }
    }
    return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
