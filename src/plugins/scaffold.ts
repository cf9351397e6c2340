import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';
import { ManifestError } from '../errors.js';
import { pathExists } from '../utils/fs.js';
import { MANIFEST_DIR, MANIFEST_FILENAME, PluginManifestSchema, type PluginManifest } from './types.js';

export interface ScaffoldOptions {
    /** Repository root; the plugin is created under `<root>/<pluginsDir>/<name>` */
    root: string;
    pluginsDir?: string;
    name: string;
    description: string;
    version?: string;
    author?: string;
    withSkill?: boolean;
    withAgent?: boolean;
    withCommand?: boolean;
}

export interface ScaffoldResult {
    pluginDir: string;
    /** Paths written, relative to the plugin directory */
    files: string[];
}

function markdown(frontmatter: Record<string, unknown>, body: string): string {
    return `---\n${stringify(frontmatter).trimEnd()}\n---\n\n${body.trim()}\n`;
}

/**
 * Create a new plugin skeleton with an optional starter skill, agent and
 * command.
 */
export async function scaffoldPlugin(options: ScaffoldOptions): Promise<ScaffoldResult> {
    const manifestInput: PluginManifest = {
        name: options.name,
        version: options.version ?? '0.1.0',
        description: options.description,
        ...(options.author ? { author: { name: options.author } } : {}),
    };

    const parsed = PluginManifestSchema.safeParse(manifestInput);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ManifestError(`Cannot scaffold plugin: ${issues}`);
    }

    const pluginDir = path.join(options.root, options.pluginsDir ?? 'plugins', options.name);
    if (await pathExists(pluginDir)) {
        throw new ManifestError(`Plugin directory already exists: ${pluginDir}`);
    }

    const files = new Map<string, string>();
    const manifest: PluginManifest = { ...parsed.data };

    if (options.withSkill) {
        manifest.skills = ['./skills'];
        files.set(path.join('skills', options.name, 'SKILL.md'), markdown(
            { name: options.name, description: `Use when working with ${options.name}. ${options.description}` },
            `# ${options.name}\n\nDescribe when this skill applies and the steps to follow.`
        ));
    }

    if (options.withAgent) {
        const agentName = `${options.name}-agent`;
        manifest.agents = ['./agents'];
        files.set(path.join('agents', `${agentName}.md`), markdown(
            {
                name: agentName,
                description: `Delegate ${options.name} tasks to this agent.`,
                model: 'inherit',
                ...(options.withSkill ? { skills: options.name } : {}),
            },
            `You are a focused assistant for ${options.name}.`
        ));
    }

    if (options.withCommand) {
        manifest.commands = ['./commands'];
        files.set(path.join('commands', `${options.name}.md`), markdown(
            { description: options.description, 'argument-hint': '[arguments]' },
            `Run the ${options.name} workflow for: $ARGUMENTS`
        ));
    }

    files.set(path.join(MANIFEST_DIR, MANIFEST_FILENAME), `${JSON.stringify(manifest, null, 2)}\n`);

    for (const [rel, content] of files) {
        const abs = path.join(pluginDir, rel);
        await mkdir(path.dirname(abs), { recursive: true });
        await writeFile(abs, content, 'utf-8');
    }

    return { pluginDir, files: Array.from(files.keys()).sort() };
}
