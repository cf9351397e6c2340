import { lstat, readFile, readlink, symlink, writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ManifestError, WorkbenchError } from '../src/errors.js';
import { installAgentFile, resolveAgentsDir, sha256 } from '../src/plugins/agent-installer.js';
import { PluginInstaller, summarize } from '../src/plugins/installer.js';
import { PluginLoader } from '../src/plugins/loader.js';
import { PluginDoctor } from '../src/plugins/doctor.js';
import { scaffoldPlugin } from '../src/plugins/scaffold.js';
import { FakeRunner, captureLogger, makeTempDir, removeDir, writeTree } from './helpers.js';

describe('PluginInstaller', () => {
    let root: string;
    let installer: PluginInstaller;

    beforeEach(async () => {
        root = await makeTempDir();
        installer = new PluginInstaller({
            pluginsDir: path.join(root, 'plugins'),
            skillsDir: path.join(root, 'home', 'skills'),
            commandsDir: path.join(root, 'home', 'commands'),
            agentsDir: path.join(root, 'home', 'agents'),
            log: captureLogger().log,
        });
        await writeTree(root, {
            'plugins/alpha/.claude-plugin/plugin.json': JSON.stringify({ name: 'alpha' }),
            'plugins/alpha/skills/pdf/SKILL.md': '---\nname: pdf\ndescription: PDFs\n---\n',
            'plugins/alpha/skills/notes.txt': 'not a skill',
            'plugins/alpha/commands/go.md': '---\ndescription: Go\n---\n',
            'plugins/alpha/commands/readme.txt': 'ignored',
            'plugins/alpha/agents/helper.md': '---\nname: helper\ndescription: Helps\n---\n',
        });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('links skills as directories and commands and agents as files', async () => {
        const results = await installer.installPlugin(path.join(root, 'plugins', 'alpha'));

        expect(results).toEqual({
            'skill:pdf': { status: 'newly_installed', message: 'Successfully installed' },
            'command:go': { status: 'newly_installed', message: 'Successfully installed' },
            'agent:helper': { status: 'newly_installed', message: 'Successfully installed' },
        });
        expect(await readlink(path.join(root, 'home', 'skills', 'pdf')))
            .toBe(path.join(root, 'plugins', 'alpha', 'skills', 'pdf'));
        expect((await lstat(path.join(root, 'home', 'commands', 'go.md'))).isSymbolicLink()).toBe(true);
    });

    it('reports existing correct links as already installed', async () => {
        await installer.installAll();
        const second = await installer.installAll();

        expect(summarize(second)).toEqual({ already_installed: 3, newly_installed: 0, skipped: 0, error: 0, total: 3 });
        expect(second['alpha']?.['skill:pdf']?.message).toBe('Already correctly symlinked');
    });

    it('changes nothing on a dry run', async () => {
        const results = await installer.installAll(true);

        expect(results['alpha']?.['agent:helper']).toEqual({ status: 'newly_installed', message: 'Would install' });
        await expect(lstat(path.join(root, 'home', 'agents', 'helper.md'))).rejects.toThrow();
    });

    it('replaces a file or stale link at the target', async () => {
        await mkdir(path.join(root, 'home', 'agents'), { recursive: true });
        await writeFile(path.join(root, 'home', 'agents', 'helper.md'), 'local copy');
        await mkdir(path.join(root, 'home', 'commands'), { recursive: true });
        await symlink(path.join(root, 'nowhere.md'), path.join(root, 'home', 'commands', 'go.md'));

        const results = await installer.installPlugin(path.join(root, 'plugins', 'alpha'));

        expect(results['agent:helper']?.status).toBe('newly_installed');
        expect(results['command:go']?.status).toBe('newly_installed');
        expect(await readlink(path.join(root, 'home', 'commands', 'go.md')))
            .toBe(path.join(root, 'plugins', 'alpha', 'commands', 'go.md'));
    });

    it('leaves a real directory at the target in place', async () => {
        await writeTree(root, { 'home/skills/pdf/my-own-work.md': 'keep me' });

        const results = await installer.installPlugin(path.join(root, 'plugins', 'alpha'));

        expect(results['skill:pdf']).toEqual({
            status: 'error',
            message: `Failed to remove existing link: ${path.join(root, 'home', 'skills', 'pdf')} is a directory`,
        });
        expect((await lstat(path.join(root, 'home', 'skills', 'pdf'))).isSymbolicLink()).toBe(false);
        expect(await readFile(path.join(root, 'home', 'skills', 'pdf', 'my-own-work.md'), 'utf-8')).toBe('keep me');
        expect(results['command:go']?.status).toBe('newly_installed');
    });

    it('reports a plugin whose manifest cannot be read', async () => {
        await writeTree(root, { 'plugins/broken/.claude-plugin/plugin.json': '{' });
        const results = await installer.installPlugin(path.join(root, 'plugins', 'broken'));

        expect(results).toEqual({ broken: { status: 'error', message: 'Failed to load plugin.json' } });
    });

    it('checks symlink targets by resolved path', async () => {
        const source = path.join(root, 'plugins', 'alpha', 'commands', 'go.md');
        const target = path.join(root, 'link.md');
        expect(await installer.isCorrectlySymlinked(source, target)).toBe(false);

        await symlink(source, target);
        expect(await installer.isCorrectlySymlinked(source, target)).toBe(true);
        expect(await installer.isCorrectlySymlinked(path.join(root, 'plugins', 'alpha', 'agents', 'helper.md'), target)).toBe(false);
    });
});

describe('installAgentFile', () => {
    let root: string;
    let source: string;
    let targetDir: string;

    beforeEach(async () => {
        root = await makeTempDir();
        source = path.join(root, 'src', 'linter.md');
        targetDir = path.join(root, 'agents');
        await writeTree(root, { 'src/linter.md': 'line 1\nline 2\n' });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('copies a new agent', async () => {
        const outcome = await installAgentFile(source, targetDir);

        expect(outcome).toEqual({ status: 'installed', target: path.join(targetDir, 'linter.md') });
        expect(await readFile(path.join(targetDir, 'linter.md'), 'utf-8')).toBe('line 1\nline 2\n');
    });

    it('leaves identical content alone', async () => {
        await installAgentFile(source, targetDir);
        expect((await installAgentFile(source, targetDir)).status).toBe('unchanged');
    });

    it('reports a conflict with previews unless forced', async () => {
        await writeTree(targetDir, { 'linter.md': 'edited\n' });

        const conflict = await installAgentFile(source, targetDir);
        expect(conflict).toEqual({
            status: 'conflict',
            target: path.join(targetDir, 'linter.md'),
            existingPreview: ['edited', ''],
            incomingPreview: ['line 1', 'line 2', ''],
        });

        const forced = await installAgentFile(source, targetDir, { force: true });
        expect(forced.status).toBe('updated');
        expect(await readFile(path.join(targetDir, 'linter.md'), 'utf-8')).toBe('line 1\nline 2\n');
    });

    it('throws for a missing source', async () => {
        await expect(installAgentFile(path.join(root, 'nope.md'), targetDir)).rejects.toThrow(WorkbenchError);
    });

    it('hashes content with sha256', () => {
        expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
});

describe('resolveAgentsDir', () => {
    it('uses the home directory for user scope', async () => {
        const runner = new FakeRunner();
        expect(await resolveAgentsDir('user', runner, { home: '/home/dev' })).toBe(path.join('/home/dev', '.claude', 'agents'));
        expect(runner.calls).toEqual([]);
    });

    it('uses the git root for project scope', async () => {
        const runner = new FakeRunner((command, args) =>
            command === 'git' && args[0] === 'rev-parse' ? { stdout: '/work/repo\n' } : undefined
        );
        expect(await resolveAgentsDir('project', runner, { cwd: '/work/repo/sub' }))
            .toBe(path.join('/work/repo', '.claude', 'agents'));
        expect(runner.calls[0]?.options?.cwd).toBe('/work/repo/sub');
    });

    it('requires a git repository for project scope', async () => {
        await expect(resolveAgentsDir('project', new FakeRunner())).rejects.toThrow(
            'Not in a git repository: project scope requires one'
        );
    });
});

describe('scaffoldPlugin', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('writes a manifest and starter components that validate', async () => {
        const result = await scaffoldPlugin({
            root,
            name: 'chart-kit',
            description: 'Draw charts',
            author: 'Dev Person',
            withSkill: true,
            withAgent: true,
            withCommand: true,
        });

        expect(result.pluginDir).toBe(path.join(root, 'plugins', 'chart-kit'));
        expect(result.files).toEqual([
            path.join('.claude-plugin', 'plugin.json'),
            path.join('agents', 'chart-kit-agent.md'),
            path.join('commands', 'chart-kit.md'),
            path.join('skills', 'chart-kit', 'SKILL.md'),
        ]);

        const manifest = await readFile(path.join(result.pluginDir, '.claude-plugin', 'plugin.json'), 'utf-8');
        expect(manifest.endsWith('}\n')).toBe(true);
        expect(JSON.parse(manifest)).toEqual({
            name: 'chart-kit',
            version: '0.1.0',
            description: 'Draw charts',
            author: { name: 'Dev Person' },
            skills: ['./skills'],
            agents: ['./agents'],
            commands: ['./commands'],
        });

        const plugin = await new PluginLoader(captureLogger().log).loadPlugin(result.pluginDir);
        expect(plugin.diagnostics).toEqual([]);
        expect(plugin.agents[0]?.skills).toEqual(['chart-kit']);
        expect((await new PluginDoctor().check(plugin)).issues).toEqual([]);
    });

    it('writes only the manifest when no components are requested', async () => {
        const result = await scaffoldPlugin({ root, name: 'bare', description: 'Nothing yet' });
        expect(result.files).toEqual([path.join('.claude-plugin', 'plugin.json')]);
    });

    it('refuses invalid names and existing directories', async () => {
        await expect(scaffoldPlugin({ root, name: 'Bad Name', description: 'x' })).rejects.toThrow(ManifestError);

        await scaffoldPlugin({ root, name: 'twice', description: 'x' });
        await expect(scaffoldPlugin({ root, name: 'twice', description: 'x' })).rejects.toThrow(
            `Plugin directory already exists: ${path.join(root, 'plugins', 'twice')}`
        );
    });
});
