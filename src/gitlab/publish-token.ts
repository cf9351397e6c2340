import { appendFile, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { GitLabError, errorMessage } from '../errors.js';
import type { CommandRunner } from '../utils/exec.js';
import { isDirectory, isFile, isNotFound } from '../utils/fs.js';

export const TOKEN_NAME = 'ci-publish-token';
export const VARIABLE_NAME = 'CI_PUBLISH_TOKEN';
export const MAINTAINER_ACCESS = 40;
export const TOKEN_SCOPES = ['api', 'write_repository'] as const;
export const TOKEN_DURATION = '8760h';

const TOKEN_DESCRIPTION = 'CI/CD token for publishing releases and uploading artifacts';
const VARIABLE_DESCRIPTION = 'Project access token for CI/CD release publishing and artifact uploads';

// ─── Pure helpers ───

export interface GitRemote {
    host: string;
    projectPath: string;
}

/**
 * Host and project path of the first `url =` line in a .git/config
 */
export function parseRemote(gitConfig: string): GitRemote | null {
    for (const line of gitConfig.split('\n')) {
        const url = /^\s*url\s*=\s*(\S+)\s*$/.exec(line)?.[1];
        if (!url) continue;

        const match = /^git@([^:]+):(.+?)(?:\.git)?$/.exec(url) ?? /^https:\/\/([^/]+)\/(.+?)(?:\.git)?$/.exec(url);
        if (match?.[1] && match[2]) {
            return { host: match[1], projectPath: match[2] };
        }
    }
    return null;
}

export function encodeProjectPath(projectPath: string): string {
    return projectPath.replace(/\//g, '%2F');
}

export interface ProjectToken {
    name: string;
    expires_at: string | null;
}

export type PublishTokenAction = 'create' | 'rotate-expired' | 'rotate-missing-variable' | 'skip';

/**
 * What to do given the current token and variable state.
 * Dates are compared as `YYYY-MM-DD`.
 */
export function decidePublishTokenAction(state: {
    token: ProjectToken | null;
    variableExists: boolean;
    today: string;
}): PublishTokenAction {
    if (!state.token) return 'create';

    const expires = state.token.expires_at;
    if (expires && Number(expires.replace(/-/g, '')) < Number(state.today.replace(/-/g, ''))) {
        return 'rotate-expired';
    }
    if (!state.variableExists) return 'rotate-missing-variable';
    return 'skip';
}

export function todayUtc(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}

// ─── Setup flow ───

export interface PublishTokenSetupOptions {
    /** Repository root; must contain .git */
    cwd: string;
    runner: CommandRunner;
    env?: NodeJS.ProcessEnv;
    /** Receives each `ERROR:` / `INFO:` / `DONE:` / `OK:` line */
    report?: (line: string) => void;
    today?: string;
}

export interface PublishTokenOutcome {
    exitCode: 0 | 1;
    action?: PublishTokenAction;
}

class SetupAbort extends Error {}

/**
 * Publish Token Setup — creates or renews the project access token that CI
 * uses to publish, and stores it in a masked, protected CI variable.
 */
export class PublishTokenSetup {
    private env: NodeJS.ProcessEnv = {};
    private report: (line: string) => void;

    constructor(private options: PublishTokenSetupOptions) {
        this.report = options.report ?? (line => console.log(line));
    }

    async run(): Promise<PublishTokenOutcome> {
        try {
            const action = await this.execute();
            return { exitCode: 0, action };
        } catch (err) {
            if (!(err instanceof SetupAbort)) {
                this.report(`ERROR: ${errorMessage(err)}`);
            }
            return { exitCode: 1 };
        }
    }

    private fail(message: string): never {
        this.report(`ERROR: ${message}`);
        throw new SetupAbort(message);
    }

    private async execute(): Promise<PublishTokenAction> {
        const { cwd } = this.options;
        const dotenvPath = path.join(cwd, '.env');
        let dotenv = await readDotenv(dotenvPath);
        this.env = { ...(this.options.env ?? process.env), ...dotenv };

        const token = this.env['GITLAB_TOKEN'] || this.env['GL_TOKEN'] || this.env['CI_JOB_TOKEN'];
        if (!token) this.fail('You need a GITLAB_TOKEN set in your environment to do this.');
        this.env['GITLAB_TOKEN'] = token;

        if (!(await isDirectory(path.join(cwd, '.git')))) {
            this.fail('You must be in the git root directory to do this.');
        }

        const version = await this.options.runner.run('glab', ['--version'], { cwd, env: this.env });
        if (version.error || version.exitCode !== 0) {
            this.fail("You need glab installed. Try 'brew install glab'");
        }

        // Environment detection
        const defined = (key: string) => Boolean(this.env[key]);
        let remote: GitRemote | null = null;
        const gitRemote = async () => {
            remote ??= parseRemote(await readFile(path.join(cwd, '.git', 'config'), 'utf-8'));
            return remote;
        };

        if (!defined('GITLAB_HOST')) {
            this.env['GITLAB_HOST'] = this.env['CI_SERVER_HOST'] || (await gitRemote())?.host || '';
        }
        if (!defined('CI_PROJECT_PATH')) {
            this.env['CI_PROJECT_PATH'] = (await gitRemote())?.projectPath ?? '';
        }
        if (!defined('GITLAB_USER_ID')) {
            const user = await this.api('user');
            this.env['GITLAB_USER_ID'] = isRecord(user) && user['id'] !== undefined ? String(user['id']) : '';
        }

        const projectPath = this.env['CI_PROJECT_PATH'] ?? '';
        if (!projectPath) this.fail('Could not determine CI_PROJECT_PATH from .git/config.');

        if (!this.env['GITLAB_CI']) {
            await ensureGitignored(path.join(cwd, '.gitignore'));
            dotenv = await readDotenv(dotenvPath);
            const missing = ['GITLAB_HOST', 'CI_PROJECT_PATH', 'GITLAB_USER_ID']
                .filter(key => !(key in dotenv))
                .map(key => `${key}=${this.env[key] ?? ''}\n`);
            await appendFile(dotenvPath, missing.join(''), 'utf-8');
        }

        const encoded = encodeProjectPath(projectPath);

        // Permission checks
        const self = await this.api('personal_access_tokens/self');
        const scopes = isRecord(self) && Array.isArray(self['scopes']) ? self['scopes'] : [];
        if (!scopes.includes('api')) {
            this.fail("The current GITLAB_TOKEN does not have the 'api' scope.");
        }

        const member = await this.api(`projects/${encoded}/members/all/${this.env['GITLAB_USER_ID'] ?? ''}`);
        const accessLevel = isRecord(member) ? Number(member['access_level'] ?? 0) : 0;
        if (!(accessLevel >= MAINTAINER_ACCESS)) {
            this.fail(`The current GITLAB_TOKEN does not have Maintainer (${MAINTAINER_ACCESS}) or higher access to ${projectPath}.`);
        }

        // Token and variable state
        const existing = findToken(await this.glabJson(['token', 'list', '--repo', projectPath, '--output', 'json']));
        const variables = await this.listVariables(projectPath);
        const variableExists = variables.some(v => isRecord(v) && v['key'] === VARIABLE_NAME);

        const action = decidePublishTokenAction({
            token: existing,
            variableExists,
            today: this.options.today ?? todayUtc(),
        });

        switch (action) {
            case 'create': {
                this.report(`INFO: Creating project access token '${TOKEN_NAME}'...`);
                const value = await this.glabText([
                    'token', 'create', TOKEN_NAME,
                    '--repo', projectPath,
                    '--access-level', 'maintainer',
                    ...TOKEN_SCOPES.flatMap(scope => ['--scope', scope]),
                    '--duration', TOKEN_DURATION,
                    '--description', TOKEN_DESCRIPTION,
                    '--output', 'text',
                ]);
                this.report(`INFO: Setting CI variable '${VARIABLE_NAME}'...`);
                await this.setVariable(projectPath, value);
                this.report('DONE: Token and variable created.');
                break;
            }
            case 'rotate-expired': {
                this.report(`INFO: Token expired (${existing?.expires_at ?? 'unknown'}). Rotating...`);
                const value = await this.rotate(projectPath);
                this.report(`INFO: Updating CI variable '${VARIABLE_NAME}'...`);
                await this.glabText(['variable', 'update', VARIABLE_NAME, '--repo', projectPath], value);
                this.report('DONE: Token rotated and variable updated.');
                break;
            }
            case 'rotate-missing-variable': {
                this.report(`INFO: Token '${TOKEN_NAME}' exists (expires ${existing?.expires_at ?? 'never'}) but CI variable '${VARIABLE_NAME}' is missing.`);
                this.report('INFO: Rotating token to obtain a new value...');
                const value = await this.rotate(projectPath);
                this.report(`INFO: Setting CI variable '${VARIABLE_NAME}'...`);
                await this.setVariable(projectPath, value);
                this.report('DONE: Token rotated and variable created.');
                break;
            }
            case 'skip':
                this.report(`OK: Already configured. Token '${TOKEN_NAME}' expires ${existing?.expires_at ?? 'never'}.`);
                break;
        }

        return action;
    }

    private rotate(projectPath: string): Promise<string> {
        return this.glabText(['token', 'rotate', TOKEN_NAME, '--repo', projectPath, '--output', 'text']);
    }

    private async setVariable(projectPath: string, value: string): Promise<void> {
        await this.glabText([
            'variable', 'set', VARIABLE_NAME,
            '--repo', projectPath,
            '--masked',
            '--protected',
            '--description', VARIABLE_DESCRIPTION,
        ], value);
    }

    private async listVariables(projectPath: string): Promise<unknown[]> {
        const result = await this.options.runner.run(
            'glab',
            ['variable', 'list', '--repo', projectPath, '--output', 'json'],
            { cwd: this.options.cwd, env: this.env }
        );
        // glab prints a "Listing variables..." line before the JSON
        const jsonLine = result.stdout.split('\n').find(line => line.startsWith('['));
        if (!jsonLine) return [];
        try {
            const parsed: unknown = JSON.parse(jsonLine);
            return Array.isArray(parsed) ? parsed : [];
        } catch {
            return [];
        }
    }

    private async glabText(args: string[], input?: string): Promise<string> {
        const result = await this.options.runner.run('glab', args, { cwd: this.options.cwd, env: this.env, input });
        if (result.error || result.exitCode !== 0) {
            throw new GitLabError(`glab ${args.slice(0, 2).join(' ')} failed: ${(result.error ?? result.stderr).trim()}`);
        }
        return result.stdout.trim();
    }

    private async glabJson(args: string[]): Promise<unknown> {
        const text = await this.glabText(args);
        try {
            return JSON.parse(text || 'null');
        } catch (err) {
            throw new GitLabError(`glab ${args.slice(0, 2).join(' ')} returned invalid JSON`, undefined, { cause: err });
        }
    }

    private api(endpoint: string): Promise<unknown> {
        return this.glabJson(['api', endpoint]);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findToken(list: unknown): ProjectToken | null {
    if (!Array.isArray(list)) return null;
    for (const entry of list) {
        if (isRecord(entry) && entry['name'] === TOKEN_NAME) {
            const expires = entry['expires_at'];
            return { name: TOKEN_NAME, expires_at: typeof expires === 'string' ? expires : null };
        }
    }
    return null;
}

async function readDotenv(filePath: string): Promise<Record<string, string>> {
    try {
        return parseDotenv(await readFile(filePath, 'utf-8'));
    } catch (err) {
        if (isNotFound(err)) return {};
        throw err;
    }
}

/**
 * Append `.env` to .gitignore unless already listed
 */
export async function ensureGitignored(gitignorePath: string): Promise<boolean> {
    const content = (await isFile(gitignorePath)) ? await readFile(gitignorePath, 'utf-8') : '';
    if (/^\s*\/?\.env\s*$/m.test(content)) return false;

    await appendFile(gitignorePath, '# Ignore localized environment variables\n.env\n', 'utf-8');
    return true;
}
