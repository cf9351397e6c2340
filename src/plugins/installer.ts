import { lstat, mkdir, readdir, realpath, symlink, unlink } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { isDirectory, isFile } from '../utils/fs.js';
import { componentPaths, discoverPlugins, readManifest } from './loader.js';
import type { PluginManifest } from './types.js';

export type InstallStatus = 'already_installed' | 'newly_installed' | 'skipped' | 'error';

export interface InstallResult {
    status: InstallStatus;
    message: string;
}

export interface InstallerOptions {
    /** Directory holding the plugin bundles */
    pluginsDir: string;
    skillsDir?: string;
    commandsDir?: string;
    agentsDir?: string;
    log?: Logger;
}

/**
 * Plugin Installer — links plugin components into the host's directories
 *
 * Skills are linked as whole directories; commands and agents are linked
 * one `.md` file at a time. Links and files at the target are replaced;
 * a real directory there is left alone and reported as an error.
 */
export class PluginInstaller {
    readonly pluginsDir: string;
    readonly skillsDir: string;
    readonly commandsDir: string;
    readonly agentsDir: string;
    private log: Logger;

    constructor(options: InstallerOptions) {
        const claudeDir = path.join(os.homedir(), '.claude');
        this.pluginsDir = options.pluginsDir;
        this.skillsDir = options.skillsDir ?? path.join(claudeDir, 'skills');
        this.commandsDir = options.commandsDir ?? path.join(claudeDir, 'commands');
        this.agentsDir = options.agentsDir ?? path.join(claudeDir, 'agents');
        this.log = (options.log ?? rootLogger).child('install');
    }

    /**
     * True when `target` is a symlink resolving to `source`
     */
    async isCorrectlySymlinked(source: string, target: string): Promise<boolean> {
        try {
            if (!(await lstat(target)).isSymbolicLink()) return false;
            return (await realpath(target)) === (await realpath(source));
        } catch {
            // dangling link or missing target
            return false;
        }
    }

    async createSymlink(source: string, targetDir: string, targetName: string, dryRun = false): Promise<InstallResult> {
        const target = path.join(targetDir, targetName);

        if (await this.isCorrectlySymlinked(source, target)) {
            return { status: 'already_installed', message: 'Already correctly symlinked' };
        }

        if (dryRun) {
            return { status: 'newly_installed', message: 'Would install' };
        }

        try {
            await removeExisting(target);
        } catch (err) {
            return { status: 'error', message: `Failed to remove existing link: ${errorMessage(err)}` };
        }

        try {
            await mkdir(targetDir, { recursive: true });
        } catch (err) {
            return { status: 'error', message: `Failed to create target directory: ${errorMessage(err)}` };
        }

        try {
            await symlink(source, target);
            this.log.debug(`Linked ${target} -> ${source}`);
            return { status: 'newly_installed', message: 'Successfully installed' };
        } catch (err) {
            return { status: 'error', message: `Failed to create symlink: ${errorMessage(err)}` };
        }
    }

    /**
     * Install every component of one plugin, keyed `kind:name`
     */
    async installPlugin(pluginDir: string, dryRun = false): Promise<Record<string, InstallResult>> {
        const results: Record<string, InstallResult> = {};
        const absDir = path.resolve(pluginDir);

        let manifest: PluginManifest | undefined;
        try {
            manifest = (await readManifest(absDir))?.manifest;
        } catch (err) {
            this.log.warn(`Cannot read manifest in ${absDir}`, { error: errorMessage(err) });
        }
        if (!manifest) {
            results[path.basename(absDir)] = { status: 'error', message: 'Failed to load plugin.json' };
            return results;
        }

        for (const rel of componentPaths(manifest.skills, 'skills').paths) {
            const dir = path.resolve(absDir, rel);
            if (!(await isDirectory(dir))) continue;

            for (const skillDir of await skillDirectories(dir)) {
                const name = path.basename(skillDir);
                results[`skill:${name}`] = await this.createSymlink(skillDir, this.skillsDir, name, dryRun);
            }
        }

        const fileComponents = [
            ['command', manifest.commands, this.commandsDir],
            ['agent', manifest.agents, this.agentsDir],
        ] as const;

        for (const [kind, declared, targetDir] of fileComponents) {
            for (const rel of componentPaths(declared, `${kind}s`).paths) {
                const dir = path.resolve(absDir, rel);
                if (!(await isDirectory(dir))) continue;

                for (const name of (await readdir(dir)).sort()) {
                    const file = path.join(dir, name);
                    if (!name.endsWith('.md') || !(await isFile(file))) continue;
                    results[`${kind}:${path.basename(name, '.md')}`] = await this.createSymlink(file, targetDir, name, dryRun);
                }
            }
        }

        return results;
    }

    /**
     * Install every plugin under pluginsDir, keyed by plugin directory name
     */
    async installAll(dryRun = false): Promise<Record<string, Record<string, InstallResult>>> {
        const all: Record<string, Record<string, InstallResult>> = {};
        for (const dir of await discoverPlugins(this.pluginsDir)) {
            all[path.basename(dir)] = await this.installPlugin(dir, dryRun);
        }
        return all;
    }
}

/**
 * Count results by status across all plugins
 */
export function summarize(results: Record<string, Record<string, InstallResult>>): Record<InstallStatus, number> & { total: number } {
    const counts = { already_installed: 0, newly_installed: 0, skipped: 0, error: 0, total: 0 };
    for (const components of Object.values(results)) {
        for (const result of Object.values(components)) {
            counts[result.status]++;
            counts.total++;
        }
    }
    return counts;
}

/**
 * A skills path may be a single skill directory or a directory of them
 */
async function skillDirectories(dir: string): Promise<string[]> {
    if (await isFile(path.join(dir, 'SKILL.md'))) return [dir];

    const found: string[] = [];
    for (const name of (await readdir(dir)).sort()) {
        const child = path.join(dir, name);
        if (await isFile(path.join(child, 'SKILL.md'))) found.push(child);
    }
    return found;
}

/**
 * Unlink a symlink or file at `target`; refuses real directories
 */
async function removeExisting(target: string): Promise<void> {
    const stats = await lstat(target).catch((err: unknown) => {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
        throw err;
    });
    if (!stats) return;
    if (stats.isDirectory()) {
        throw new Error(`${target} is a directory`);
    }
    await unlink(target);
}
