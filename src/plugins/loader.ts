import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { DocumentLoader } from '../documents/loader.js';
import type { DocumentDiagnostic } from '../documents/types.js';
import { ManifestError, errorMessage } from '../errors.js';
import { McpServerConfigSchema, type McpServerConfig } from '../evaluation/server-config.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { isDirectory, isFile, pathExists } from '../utils/fs.js';
import { MANIFEST_DIR, MANIFEST_FILENAME, PluginManifestSchema } from './types.js';
import type { LoadedPlugin, PluginManifest } from './types.js';

export const PLUGIN_ROOT_VARIABLE = '${CLAUDE_PLUGIN_ROOT}';

export interface ManifestLocation {
    manifest: PluginManifest;
    manifestPath: string;
}

/**
 * Read and validate a plugin manifest.
 *
 * Looks in `.claude-plugin/plugin.json`, then `plugin.json` at the plugin
 * root. Returns null when neither exists.
 */
export async function readManifest(pluginDir: string): Promise<ManifestLocation | null> {
    const candidates = [
        path.join(pluginDir, MANIFEST_DIR, MANIFEST_FILENAME),
        path.join(pluginDir, MANIFEST_FILENAME),
    ];

    for (const manifestPath of candidates) {
        if (!(await isFile(manifestPath))) continue;

        let data: unknown;
        try {
            data = JSON.parse(await readFile(manifestPath, 'utf-8'));
        } catch (err) {
            throw new ManifestError(`Invalid JSON in ${manifestPath}: ${errorMessage(err)}`, manifestPath, { cause: err });
        }

        const result = PluginManifestSchema.safeParse(data);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || 'manifest'}: ${issue.message}`)
                .join('; ');
            throw new ManifestError(`Invalid plugin manifest at ${manifestPath}: ${issues}`, manifestPath);
        }
        return { manifest: result.data, manifestPath };
    }

    return null;
}

/**
 * Sorted plugin directories (those holding a manifest) under `pluginsDir`
 */
export async function discoverPlugins(pluginsDir: string): Promise<string[]> {
    if (!(await isDirectory(pluginsDir))) {
        throw new ManifestError(`Plugins directory does not exist: ${pluginsDir}`);
    }

    const found: string[] = [];
    for (const name of (await readdir(pluginsDir)).sort()) {
        const dir = path.join(pluginsDir, name);
        if (!(await isDirectory(dir))) continue;

        const hasManifest = await isFile(path.join(dir, MANIFEST_DIR, MANIFEST_FILENAME))
            || await isFile(path.join(dir, MANIFEST_FILENAME));
        if (hasManifest) found.push(dir);
    }
    return found;
}

/**
 * Recursively replace ${CLAUDE_PLUGIN_ROOT} in config values
 */
export function expandPluginRoot(value: unknown, pluginRoot: string): unknown {
    if (typeof value === 'string') {
        return value.split(PLUGIN_ROOT_VARIABLE).join(pluginRoot);
    }
    if (Array.isArray(value)) {
        return value.map(item => expandPluginRoot(item, pluginRoot));
    }
    if (value && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            out[k] = expandPluginRoot(v, pluginRoot);
        }
        return out;
    }
    return value;
}

/**
 * Manifest path entries, or the conventional directory when none are listed
 */
export function componentPaths(declared: string | string[] | undefined, conventional: string): { paths: string[]; declared: boolean } {
    if (declared === undefined) return { paths: [conventional], declared: false };
    return { paths: Array.isArray(declared) ? declared : [declared], declared: true };
}

export interface PluginLoadFailure {
    path: string;
    error: string;
}

/**
 * Plugin Loader — discovers, validates, and loads plugin bundles
 *
 * A plugin is a directory containing a `.claude-plugin/plugin.json`
 * manifest. Components are read from the paths the manifest lists, or
 * from the conventional `skills/`, `agents/` and `commands/` directories.
 * MCP servers come from the manifest or `.mcp.json`.
 */
export class PluginLoader {
    private plugins: Map<string, LoadedPlugin> = new Map();
    private failed: PluginLoadFailure[] = [];
    private log: Logger;

    constructor(log: Logger = rootLogger) {
        this.log = log.child('plugins');
    }

    /**
     * Load every plugin under a plugins directory
     */
    async loadAll(pluginsDir: string): Promise<LoadedPlugin[]> {
        this.plugins.clear();
        this.failed = [];

        for (const dir of await discoverPlugins(pluginsDir)) {
            try {
                await this.loadPlugin(dir);
            } catch (err) {
                this.log.warn(`Failed to load plugin from ${dir}`, { error: errorMessage(err) });
                this.failed.push({ path: dir, error: errorMessage(err) });
            }
        }

        return this.list();
    }

    /**
     * Load a single plugin. Throws ManifestError when the manifest is
     * missing or invalid.
     */
    async loadPlugin(pluginDir: string): Promise<LoadedPlugin> {
        const absDir = path.resolve(pluginDir);
        const location = await readManifest(absDir);
        if (!location) {
            throw new ManifestError(`No ${MANIFEST_DIR}/${MANIFEST_FILENAME} found in ${absDir}`);
        }

        const { manifest, manifestPath } = location;
        const documents = new DocumentLoader();
        const diagnostics: DocumentDiagnostic[] = [];

        const missingPath = (kind: string, rel: string) => diagnostics.push({
            severity: 'error',
            path: manifestPath,
            message: `${kind} path "${rel}" does not exist`,
        });

        // Skills
        const skills = componentPaths(manifest.skills, 'skills');
        for (const rel of skills.paths) {
            const abs = path.resolve(absDir, rel);
            if (!(await pathExists(abs))) {
                if (skills.declared) missingPath('skills', rel);
                continue;
            }
            await documents.loadSkills(abs, manifest.name);
        }

        // Agents and commands: directories of .md files, or single files
        for (const [kind, declared] of [['agent', manifest.agents], ['command', manifest.commands]] as const) {
            const conventional = `${kind}s`;
            const entries = componentPaths(declared, conventional);
            for (const rel of entries.paths) {
                const abs = path.resolve(absDir, rel);
                if (await isFile(abs)) {
                    await documents.loadFile(kind, abs, manifest.name);
                } else if (await isDirectory(abs)) {
                    if (kind === 'agent') await documents.loadAgents(abs, manifest.name);
                    else await documents.loadCommands(abs, manifest.name);
                } else if (entries.declared) {
                    missingPath(conventional, rel);
                }
            }
        }

        const mcpServers = await this.loadMcpServers(absDir, manifest, manifestPath, diagnostics);

        const loaded: LoadedPlugin = {
            manifest,
            path: absDir,
            manifestPath,
            skills: documents.list('skill'),
            agents: documents.list('agent'),
            commands: documents.list('command'),
            mcpServers,
            diagnostics: [...diagnostics, ...documents.diagnostics],
        };

        this.log.debug(`Loaded plugin ${manifest.name}`, {
            skills: loaded.skills.length,
            agents: loaded.agents.length,
            commands: loaded.commands.length,
            mcpServers: Object.keys(mcpServers).length,
        });

        this.plugins.set(manifest.name, loaded);
        return loaded;
    }

    /**
     * Collect MCP server configs, namespaced `pluginName__serverName`
     */
    private async loadMcpServers(
        pluginDir: string,
        manifest: PluginManifest,
        manifestPath: string,
        diagnostics: DocumentDiagnostic[]
    ): Promise<Record<string, McpServerConfig>> {
        let source: unknown;
        let sourcePath = manifestPath;

        if (manifest.mcpServers !== undefined && typeof manifest.mcpServers !== 'string') {
            source = manifest.mcpServers;
        } else {
            const rel = manifest.mcpServers ?? '.mcp.json';
            const filePath = path.resolve(pluginDir, rel);
            if (!(await isFile(filePath))) {
                if (manifest.mcpServers !== undefined) {
                    diagnostics.push({ severity: 'error', path: manifestPath, message: `mcpServers path "${rel}" does not exist` });
                }
                return {};
            }
            sourcePath = filePath;
            try {
                source = JSON.parse(await readFile(filePath, 'utf-8'));
            } catch (err) {
                diagnostics.push({ severity: 'error', path: filePath, message: `invalid JSON: ${errorMessage(err)}` });
                return {};
            }
        }

        const servers = unwrapServers(source);
        const result: Record<string, McpServerConfig> = {};
        for (const [serverName, raw] of Object.entries(servers)) {
            const parsed = McpServerConfigSchema.safeParse(expandPluginRoot(raw, pluginDir));
            if (!parsed.success) {
                diagnostics.push({
                    severity: 'error',
                    path: sourcePath,
                    message: `MCP server "${serverName}" is not a valid stdio, sse or http config`,
                });
                continue;
            }
            result[`${manifest.name}__${serverName}`] = parsed.data;
        }
        return result;
    }

    list(): LoadedPlugin[] {
        return Array.from(this.plugins.values());
    }

    get(name: string): LoadedPlugin | undefined {
        return this.plugins.get(name);
    }

    /**
     * Plugins that could not be loaded during the last loadAll()
     */
    get failures(): PluginLoadFailure[] {
        return [...this.failed];
    }

    get size(): number {
        return this.plugins.size;
    }
}

/**
 * Accept both `{ "mcpServers": { ... } }` and a bare server map
 */
function unwrapServers(source: unknown): Record<string, unknown> {
    if (!source || typeof source !== 'object' || Array.isArray(source)) return {};
    if ('mcpServers' in source) {
        const inner = source.mcpServers;
        if (inner && typeof inner === 'object' && !Array.isArray(inner)) {
            return Object.fromEntries(Object.entries(inner));
        }
        return {};
    }
    return Object.fromEntries(Object.entries(source));
}
