import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { WorkbenchError } from '../errors.js';
import { isFile } from '../utils/fs.js';
import { findGitRoot, type CommandRunner } from '../utils/exec.js';

export type InstallScope = 'user' | 'project';

export type AgentInstallOutcome =
    | { status: 'installed'; target: string }
    | { status: 'unchanged'; target: string }
    | { status: 'updated'; target: string }
    | { status: 'conflict'; target: string; existingPreview: string[]; incomingPreview: string[] };

/** Lines of each side shown when contents differ */
export const PREVIEW_LINES = 20;

export function sha256(content: string): string {
    return createHash('sha256').update(content, 'utf-8').digest('hex');
}

/**
 * Copy an agent definition into `targetDir`, refusing to clobber a
 * locally modified copy unless forced.
 */
export async function installAgentFile(
    sourceFile: string,
    targetDir: string,
    options: { force?: boolean } = {}
): Promise<AgentInstallOutcome> {
    if (!(await isFile(sourceFile))) {
        throw new WorkbenchError(`Source agent file not found: ${sourceFile}`);
    }

    const target = path.join(targetDir, path.basename(sourceFile));
    const incoming = await readFile(sourceFile, 'utf-8');
    await mkdir(targetDir, { recursive: true });

    if (await isFile(target)) {
        const existing = await readFile(target, 'utf-8');
        if (sha256(existing) === sha256(incoming)) {
            return { status: 'unchanged', target };
        }
        if (!options.force) {
            return {
                status: 'conflict',
                target,
                existingPreview: existing.split(/\r?\n/).slice(0, PREVIEW_LINES),
                incomingPreview: incoming.split(/\r?\n/).slice(0, PREVIEW_LINES),
            };
        }
        await writeFile(target, incoming, 'utf-8');
        return { status: 'updated', target };
    }

    await writeFile(target, incoming, 'utf-8');
    return { status: 'installed', target };
}

/**
 * `~/.claude/agents` for user scope, `<git root>/.claude/agents` for project scope
 */
export async function resolveAgentsDir(
    scope: InstallScope,
    runner: CommandRunner,
    options: { cwd?: string; home?: string } = {}
): Promise<string> {
    if (scope === 'user') {
        return path.join(options.home ?? os.homedir(), '.claude', 'agents');
    }

    const gitRoot = await findGitRoot(runner, options.cwd);
    if (!gitRoot) {
        throw new WorkbenchError('Not in a git repository: project scope requires one');
    }
    return path.join(gitRoot, '.claude', 'agents');
}
