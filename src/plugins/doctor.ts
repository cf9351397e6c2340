import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { isFile } from '../utils/fs.js';
import type { LoadedPlugin } from './types.js';

export const DEFAULT_MAX_SKILL_LINES = 500;

export interface PluginIssue {
    severity: 'error' | 'warning';
    message: string;
    path?: string;
}

export interface PluginReport {
    plugin: string;
    healthy: boolean;
    issues: PluginIssue[];
}

export interface PluginDoctorOptions {
    /** Skill bodies longer than this are flagged */
    maxSkillLines?: number;
}

/**
 * Static health checks for a loaded plugin.
 *
 * A plugin is healthy when it has no error-level issues; warnings are
 * reported but do not fail validation.
 */
export class PluginDoctor {
    private maxSkillLines: number;

    constructor(options: PluginDoctorOptions = {}) {
        this.maxSkillLines = options.maxSkillLines ?? DEFAULT_MAX_SKILL_LINES;
    }

    async check(plugin: LoadedPlugin): Promise<PluginReport> {
        const issues: PluginIssue[] = plugin.diagnostics.map(d => ({
            severity: d.severity,
            message: d.message,
            path: d.path,
        }));

        // 1. Skills referenced by agents must ship with the plugin
        const skillNames = new Set(plugin.skills.map(s => s.name));
        for (const agent of plugin.agents) {
            for (const skill of agent.skills) {
                if (!skillNames.has(skill)) {
                    issues.push({
                        severity: 'warning',
                        message: `agent "${agent.name}" references skill "${skill}" which this plugin does not provide`,
                        path: agent.path,
                    });
                }
            }
        }

        // 2. Commands show their description in the host's picker
        for (const command of plugin.commands) {
            if (!command.description) {
                issues.push({ severity: 'warning', message: `command "${command.name}" has no description`, path: command.path });
            }
        }

        // 3. Skill length
        for (const skill of plugin.skills) {
            const lines = skill.body.split('\n').length;
            if (lines > this.maxSkillLines) {
                issues.push({
                    severity: 'warning',
                    message: `skill "${skill.name}" body is ${lines} lines (limit ${this.maxSkillLines})`,
                    path: skill.path,
                });
            }
        }

        // 4. Hooks
        const hookIssue = await this.checkHooks(plugin);
        if (hookIssue) issues.push(hookIssue);

        return {
            plugin: plugin.manifest.name,
            healthy: !issues.some(i => i.severity === 'error'),
            issues,
        };
    }

    async checkAll(plugins: LoadedPlugin[]): Promise<PluginReport[]> {
        const reports: PluginReport[] = [];
        for (const plugin of plugins) {
            reports.push(await this.check(plugin));
        }
        return reports;
    }

    private async checkHooks(plugin: LoadedPlugin): Promise<PluginIssue | null> {
        const declared = plugin.manifest.hooks;
        if (declared !== undefined && typeof declared !== 'string') return null;

        const hooksPath = path.resolve(plugin.path, declared ?? path.join('hooks', 'hooks.json'));
        if (!(await isFile(hooksPath))) {
            return declared === undefined
                ? null
                : { severity: 'error', message: `hooks path "${declared}" does not exist`, path: plugin.manifestPath };
        }

        try {
            JSON.parse(await readFile(hooksPath, 'utf-8'));
            return null;
        } catch (err) {
            return { severity: 'error', message: `hooks file is not valid JSON: ${errorMessage(err)}`, path: hooksPath };
        }
    }
}
