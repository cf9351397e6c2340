import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LintConfigError } from '../src/errors.js';
import {
    checkGitHooks,
    detectPreCommitTool,
    discoverLinters,
    scanPreCommitConfig,
} from '../src/linting/discovery.js';
import { LintOrchestrator, collectFiles, summarizeLint } from '../src/linting/orchestrator.js';
import { KNOWN_TOOLS, mapHookToLinter, matchesPattern, PRETTIER_PATTERNS } from '../src/linting/patterns.js';
import {
    generateLintersSection,
    parseLintersSection,
    parseToolLine,
    upsertLintersSection,
} from '../src/linting/section.js';
import type { LintersConfig, ProjectLinters, ToolRun } from '../src/linting/types.js';
import { FakeRunner, captureLogger, makeTempDir, removeDir, writeTree } from './helpers.js';

describe('patterns', () => {
    it('matches on the basename with brace expansion', () => {
        expect(matchesPattern('src/deep/app.tsx', KNOWN_TOOLS.eslint().patterns)).toBe(true);
        expect(matchesPattern('src/app.py', KNOWN_TOOLS.eslint().patterns)).toBe(false);
        expect(matchesPattern('/repo/.eslintrc.json', PRETTIER_PATTERNS)).toBe(true);
        expect(matchesPattern('deploy.sh', KNOWN_TOOLS.shfmt().patterns)).toBe(true);
    });

    it('maps pre-commit hook ids to tools', () => {
        expect(mapHookToLinter('ruff')?.name).toBe('ruff check');
        expect(mapHookToLinter('ruff-format')).toEqual({
            name: 'ruff format',
            patterns: ['*.py'],
            isFormatter: true,
            isLinter: false,
        });
        expect(mapHookToLinter('trailing-whitespace')).toBeNull();
    });

    it('returns a fresh tool each time', () => {
        const a = KNOWN_TOOLS.mypy();
        a.patterns.push('*.pyi');
        expect(KNOWN_TOOLS.mypy().patterns).toEqual(['*.py']);
    });
});

describe('discovery', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('merges every config source, first mention wins', async () => {
        await writeTree(root, {
            '.pre-commit-config.yaml': [
                'repos:',
                '  - repo: https://example.test/ruff-pre-commit',
                '    hooks:',
                '      - id: ruff',
                '      - id: ruff-format',
                '  - repo: local',
                '    hooks:',
                '      - id: custom-thing',
                '',
            ].join('\n'),
            'pyproject.toml': '[tool.ruff]\nline-length = 100\n\n[tool.mypy]\nstrict = true\n',
            'package.json': JSON.stringify({ devDependencies: { prettier: '^3.0.0', 'eslint-plugin-x': '^1.0.0' } }),
            '.markdownlint.json': '{}',
        });

        const result = await discoverLinters(root, { git: new FakeRunner(), log: captureLogger().log });

        expect(result.gitHooksEnabled).toBe(false);
        expect(result.preCommitTool).toBe('pre-commit');
        expect(result.formatters.map(t => t.name)).toEqual(['ruff format', 'prettier']);
        expect(result.linters.map(t => t.name)).toEqual(['ruff check', 'mypy', 'eslint', 'markdownlint']);
    });

    it('logs and skips an unreadable pre-commit config', async () => {
        await writeTree(root, { '.pre-commit-config.yaml': 'repos: [unclosed\n' });
        const { log, lines } = captureLogger();

        expect(await scanPreCommitConfig(path.join(root, '.pre-commit-config.yaml'), log)).toEqual([]);
        expect(lines).toHaveLength(1);
        expect(lines[0]).toContain('Failed to parse .pre-commit-config.yaml');
    });

    it('detects the hook manager', async () => {
        expect(await detectPreCommitTool(root)).toBeNull();
        await mkdir(path.join(root, '.husky'));
        expect(await detectPreCommitTool(root)).toBe('husky');
    });

    it('checks for a non-empty pre-commit hook', async () => {
        const git = new FakeRunner((_command, args) => (args[0] === 'rev-parse' ? { stdout: '.git\n' } : undefined));

        await writeTree(root, { '.git/hooks/pre-commit': '' });
        expect(await checkGitHooks(root, git)).toBe(false);

        await writeTree(root, { '.git/hooks/pre-commit': '#!/bin/sh\nexit 0\n' });
        expect(await checkGitHooks(root, git)).toBe(true);
        expect(git.commandLines()).toContain('git config --get core.hooksPath');
    });

    it('follows core.hooksPath', async () => {
        await writeTree(root, { 'tools/hooks/pre-commit': '#!/bin/sh\n' });
        const git = new FakeRunner((_command, args) => {
            if (args[0] === 'rev-parse') return { stdout: '.git\n' };
            if (args[0] === 'config') return { stdout: 'tools/hooks\n' };
            return undefined;
        });
        expect(await checkGitHooks(root, git)).toBe(true);
    });

    it('reports no hooks outside a repository', async () => {
        await writeTree(root, { '.git/hooks/pre-commit': '#!/bin/sh\n' });
        expect(await checkGitHooks(root, new FakeRunner())).toBe(false);
    });
});

describe('LINTERS section', () => {
    const project: ProjectLinters = {
        gitHooksEnabled: true,
        preCommitTool: 'pre-commit',
        formatters: [KNOWN_TOOLS['ruff format'](), KNOWN_TOOLS.prettier()],
        linters: [KNOWN_TOOLS.mypy()],
    };

    const section = [
        '## LINTERS',
        '',
        'git pre-commit hooks: enabled',
        'pre-commit tool: pre-commit',
        '',
        '### Formatters',
        '',
        '- prettier [*.{ts,tsx,js,jsx,json,md}]',
        '- ruff format [*.py]',
        '',
        '### Static Checking and Linting',
        '',
        '- mypy [*.py]',
        '',
    ].join('\n');

    it('renders sorted tool lines', () => {
        expect(generateLintersSection(project)).toBe(section);
    });

    it('omits empty subsections', () => {
        const bare = generateLintersSection({ gitHooksEnabled: false, preCommitTool: null, formatters: [], linters: [] });
        expect(bare).toBe('## LINTERS\n\ngit pre-commit hooks: disabled\npre-commit tool: none\n');
    });

    it('parses tool lines with brace patterns intact', () => {
        expect(parseToolLine('- ruff format [*.py, *.pyi]')).toEqual({ name: 'ruff format', patterns: ['*.py', '*.pyi'] });
        expect(parseToolLine('- prettier [*.{ts,md}]')).toEqual({ name: 'prettier', patterns: ['*.{ts,md}'] });
        expect(parseToolLine('not a tool')).toBeNull();
    });

    it('reads back what it renders', () => {
        const config = parseLintersSection(`# Project\n\n${section}\n## Next\n\n- other [*.x]\n`);
        expect(config).toEqual({
            formatters: [
                { ...KNOWN_TOOLS.prettier() },
                { ...KNOWN_TOOLS['ruff format']() },
            ],
            linters: [KNOWN_TOOLS.mypy()],
        });
    });

    it('requires the section', () => {
        expect(() => parseLintersSection('# Nothing here\n')).toThrow(LintConfigError);
    });

    it('creates, appends and replaces', () => {
        expect(upsertLintersSection(null, section, false)).toEqual({ updated: true, content: section });
        expect(upsertLintersSection('# Project\n\nIntro\n', section, false).content).toBe(`# Project\n\nIntro\n\n${section}`);

        const existing = '# P\n\n## LINTERS\n\nold\n\n## Other\n\ntext\n';
        expect(upsertLintersSection(existing, section, false)).toEqual({
            updated: false,
            content: existing,
            existingSection: '## LINTERS\n\nold',
        });
        expect(upsertLintersSection(existing, section, true)).toEqual({
            updated: true,
            content: `# P\n\n## Other\n\ntext\n\n${section}`,
        });
    });
});

describe('LintOrchestrator', () => {
    const config: LintersConfig = {
        formatters: [KNOWN_TOOLS.prettier()],
        linters: [KNOWN_TOOLS.eslint(), KNOWN_TOOLS.mypy()],
    };
    const files = ['a.ts', 'b.py', 'c.md'];

    const runner = () => new FakeRunner((command, args) =>
        command === 'npx' && args[0] === 'eslint' ? { exitCode: 1, stdout: '1 problem' } : {}
    );

    it('runs formatters then linters on matching files', async () => {
        const fake = runner();
        const seen: string[] = [];
        const orchestrator = new LintOrchestrator(config, {
            runner: fake,
            log: captureLogger().log,
            onRun: (run, category) => seen.push(`${category}:${run.tool}:${run.file}`),
        });

        const report = await orchestrator.run(files);

        expect(fake.commandLines()).toEqual([
            'npx prettier --write a.ts',
            'npx prettier --write c.md',
            'npx eslint a.ts',
            'uv run mypy b.py',
        ]);
        expect(seen).toEqual([
            'formatter:prettier:a.ts',
            'formatter:prettier:c.md',
            'linter:eslint:a.ts',
            'linter:mypy:b.py',
        ]);
        expect(report.linters[0]?.stdout).toBe('1 problem');
        expect(summarizeLint(report)).toEqual({
            formatters: { files: 2, tools: 1, errors: 0 },
            linters: { files: 2, tools: 2, errors: 1 },
            totalErrors: 1,
        });
    });

    it('honours the execution mode', async () => {
        const formatOnly = runner();
        await new LintOrchestrator(config, { runner: formatOnly, log: captureLogger().log }).run(files, 'format-only');
        expect(formatOnly.commandLines()).toEqual(['npx prettier --write a.ts', 'npx prettier --write c.md']);

        const lintOnly = runner();
        const report = await new LintOrchestrator(config, { runner: lintOnly, log: captureLogger().log }).run(files, 'lint-only');
        expect(report.formatters).toEqual([]);
        expect(lintOnly.calls).toHaveLength(2);
    });

    it('uses command overrides and reports unknown tools', async () => {
        const fake = runner();
        const orchestrator = new LintOrchestrator(
            { formatters: [], linters: [KNOWN_TOOLS.mypy(), { name: 'nope', patterns: ['*.py'], isFormatter: false, isLinter: true }] },
            { runner: fake, commands: { mypy: ['mypy', '--strict'] }, cwd: '/repo', log: captureLogger().log }
        );

        const report = await orchestrator.run(['b.py']);
        const unknown: ToolRun | undefined = report.linters[1];

        expect(fake.commandLines()).toEqual(['mypy --strict b.py']);
        expect(fake.calls[0]?.options?.cwd).toBe('/repo');
        expect(unknown).toEqual({
            tool: 'nope',
            file: 'b.py',
            exitCode: 1,
            stdout: '',
            stderr: '',
            durationMs: 0,
            error: 'Unknown tool: nope',
        });
        expect(orchestrator.commandFor('eslint', 'x.ts')).toEqual(['npx', 'eslint', 'x.ts']);
    });
});

describe('collectFiles', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('walks directories in sorted order, skipping VCS and dependencies', async () => {
        await writeTree(root, {
            'dir/b.txt': 'b',
            'dir/a.txt': 'a',
            'dir/sub/c.txt': 'c',
            'dir/node_modules/x.js': 'x',
            'dir/.git/HEAD': 'ref',
            'single.md': 's',
        });

        const files = await collectFiles([path.join(root, 'single.md'), path.join(root, 'dir'), path.join(root, 'missing')]);

        expect(files).toEqual([
            path.join(root, 'single.md'),
            path.join(root, 'dir', 'a.txt'),
            path.join(root, 'dir', 'b.txt'),
            path.join(root, 'dir', 'sub', 'c.txt'),
        ]);
    });
});
