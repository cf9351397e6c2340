import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { parse as parseYaml } from 'yaml';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { CommandRunner } from '../utils/exec.js';
import { isDirectory, isFile, pathExists } from '../utils/fs.js';
import { KNOWN_TOOLS, mapHookToLinter } from './patterns.js';
import type { LinterTool, PreCommitTool, ProjectLinters } from './types.js';

// ─── Config file scanners ───

const ESLINT_CONFIGS = ['.eslintrc', '.eslintrc.js', '.eslintrc.json', '.eslintrc.yml', '.eslintrc.yaml'];
const PRETTIER_CONFIGS = ['.prettierrc', '.prettierrc.js', '.prettierrc.json', '.prettierrc.yml', '.prettierrc.yaml'];
const MARKDOWNLINT_CONFIGS = ['.markdownlint.json', '.markdownlint.yaml', '.markdownlintrc'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

/**
 * Hooks of a `.pre-commit-config.yaml` that map to known tools
 */
export async function scanPreCommitConfig(configFile: string, log: Logger = rootLogger): Promise<LinterTool[]> {
    const tools: LinterTool[] = [];
    try {
        const config: unknown = parseYaml(await readFile(configFile, 'utf-8'));
        const repos = isRecord(config) ? asArray(config['repos']) : [];

        for (const repo of repos) {
            if (!isRecord(repo)) continue;
            for (const hook of asArray(repo['hooks'])) {
                if (!isRecord(hook) || typeof hook['id'] !== 'string') continue;
                const tool = mapHookToLinter(hook['id']);
                if (tool) tools.push(tool);
            }
        }
    } catch (err) {
        log.warn(`Failed to parse ${path.basename(configFile)}`, { error: errorMessage(err) });
    }
    return tools;
}

/**
 * `[tool.*]` tables in pyproject.toml
 */
export async function scanPyproject(configFile: string, log: Logger = rootLogger): Promise<LinterTool[]> {
    const tools: LinterTool[] = [];
    try {
        const config = parseToml(await readFile(configFile, 'utf-8'));
        const section = config['tool'];
        const configured = isRecord(section) ? section : {};

        if ('ruff' in configured) {
            tools.push(KNOWN_TOOLS['ruff format'](), KNOWN_TOOLS['ruff check']());
        }
        if ('mypy' in configured) tools.push(KNOWN_TOOLS.mypy());
        if ('pyright' in configured) tools.push(KNOWN_TOOLS.pyright());
        if ('bandit' in configured) tools.push(KNOWN_TOOLS.bandit());
    } catch (err) {
        log.warn('Failed to parse pyproject.toml', { error: errorMessage(err) });
    }
    return tools;
}

/**
 * JavaScript tooling in package.json devDependencies
 */
export async function scanPackageJson(configFile: string, log: Logger = rootLogger): Promise<LinterTool[]> {
    const tools: LinterTool[] = [];
    try {
        const pkg: unknown = JSON.parse(await readFile(configFile, 'utf-8'));
        const devDeps = isRecord(pkg) && isRecord(pkg['devDependencies']) ? Object.keys(pkg['devDependencies']) : [];

        if (devDeps.includes('prettier')) tools.push(KNOWN_TOOLS.prettier());
        if (devDeps.some(dep => dep.includes('eslint'))) tools.push(KNOWN_TOOLS.eslint());
        if (devDeps.some(dep => dep.includes('markdownlint'))) tools.push(KNOWN_TOOLS.markdownlint());
    } catch (err) {
        log.warn('Failed to parse package.json', { error: errorMessage(err) });
    }
    return tools;
}

/**
 * Standalone tool config files at the project root
 */
export async function scanConfigFiles(projectRoot: string): Promise<LinterTool[]> {
    const anyExists = async (names: string[]) => {
        for (const name of names) {
            if (await pathExists(path.join(projectRoot, name))) return true;
        }
        return false;
    };

    const tools: LinterTool[] = [];
    if (await anyExists(ESLINT_CONFIGS)) tools.push(KNOWN_TOOLS.eslint());
    if (await anyExists(PRETTIER_CONFIGS)) tools.push(KNOWN_TOOLS.prettier());
    if (await anyExists(MARKDOWNLINT_CONFIGS)) tools.push(KNOWN_TOOLS.markdownlint());
    return tools;
}

// ─── Git hooks ───

export async function detectPreCommitTool(projectRoot: string): Promise<PreCommitTool | null> {
    if (await pathExists(path.join(projectRoot, '.pre-commit-config.yaml'))) return 'pre-commit';
    if (await isDirectory(path.join(projectRoot, '.husky'))) return 'husky';
    if (await pathExists(path.join(projectRoot, '.git', 'hooks', 'pre-commit'))) return 'manual';
    return null;
}

/**
 * True when a non-empty pre-commit hook is installed
 */
export async function checkGitHooks(projectRoot: string, git: CommandRunner): Promise<boolean> {
    const inRepo = await git.run('git', ['rev-parse', '--git-dir'], { cwd: projectRoot, timeoutMs: 5_000 });
    if (inRepo.exitCode !== 0 || inRepo.error) return false;

    const configured = await git.run('git', ['config', '--get', 'core.hooksPath'], { cwd: projectRoot, timeoutMs: 5_000 });
    const hooksPath = configured.exitCode === 0 && configured.stdout.trim()
        ? path.resolve(projectRoot, configured.stdout.trim())
        : path.join(projectRoot, '.git', 'hooks');

    const hook = path.join(hooksPath, 'pre-commit');
    if (!(await isFile(hook))) return false;
    return (await stat(hook)).size > 0;
}

// ─── Discovery ───

export interface DiscoverOptions {
    git: CommandRunner;
    log?: Logger;
}

/**
 * Scan a project for formatters and linters. The first source that names
 * a tool wins: pre-commit config, pyproject.toml, package.json, then
 * standalone config files.
 */
export async function discoverLinters(projectRoot: string, options: DiscoverOptions): Promise<ProjectLinters> {
    const log = (options.log ?? rootLogger).child('lint');
    const found: LinterTool[] = [];

    const preCommit = path.join(projectRoot, '.pre-commit-config.yaml');
    if (await isFile(preCommit)) found.push(...await scanPreCommitConfig(preCommit, log));

    const pyproject = path.join(projectRoot, 'pyproject.toml');
    if (await isFile(pyproject)) found.push(...await scanPyproject(pyproject, log));

    const packageJson = path.join(projectRoot, 'package.json');
    if (await isFile(packageJson)) found.push(...await scanPackageJson(packageJson, log));

    found.push(...await scanConfigFiles(projectRoot));

    const result: ProjectLinters = {
        gitHooksEnabled: await checkGitHooks(projectRoot, options.git),
        preCommitTool: await detectPreCommitTool(projectRoot),
        formatters: [],
        linters: [],
    };

    const seen = new Set<string>();
    for (const tool of found) {
        if (seen.has(tool.name)) continue;
        seen.add(tool.name);
        if (tool.isFormatter) result.formatters.push(tool);
        if (tool.isLinter) result.linters.push(tool);
    }

    log.debug('Discovered linting tools', {
        formatters: result.formatters.map(t => t.name),
        linters: result.linters.map(t => t.name),
    });
    return result;
}
