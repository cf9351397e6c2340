import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { GitLabError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { isNotFound } from '../utils/fs.js';

export type FetchLike = typeof fetch;

const TOKEN_EXPORT = 'export GITLAB_TOKEN=';

function stripQuotes(value: string): string {
    return value.trim().replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');
}

/**
 * GITLAB_TOKEN from the environment, else from an `export` line in ~/.bashrc
 */
export async function resolveGitLabToken(
    env: NodeJS.ProcessEnv = process.env,
    bashrcPath: string = path.join(os.homedir(), '.bashrc'),
    log: Logger = rootLogger
): Promise<string | null> {
    const fromEnv = env['GITLAB_TOKEN'];
    if (fromEnv) return fromEnv;

    let content: string;
    try {
        content = await readFile(bashrcPath, 'utf-8');
    } catch (err) {
        if (!isNotFound(err)) {
            log.warn(`Could not read ${bashrcPath}`, { error: errorMessage(err) });
        }
        return null;
    }

    for (const line of content.split('\n')) {
        if (line.startsWith(TOKEN_EXPORT)) {
            const value = stripQuotes(line.slice(TOKEN_EXPORT.length));
            return value || null;
        }
    }
    return null;
}

export interface RenderOptions {
    text: string;
    gitlabUrl: string;
    token: string;
    /** `group/project`, for resolving issue and MR references */
    project?: string;
    fetch?: FetchLike;
    timeoutMs?: number;
}

/**
 * Render GitLab Flavored Markdown through the instance's markdown API
 */
export async function renderMarkdown(options: RenderOptions): Promise<string> {
    const doFetch = options.fetch ?? fetch;
    const url = `${options.gitlabUrl.replace(/\/+$/, '')}/api/v4/markdown`;
    const body: Record<string, unknown> = { text: options.text, gfm: true };
    if (options.project) body['project'] = options.project;

    let response: Response;
    try {
        response = await doFetch(url, {
            method: 'POST',
            headers: { 'PRIVATE-TOKEN': options.token, 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(options.timeoutMs ?? 30_000),
        });
    } catch (err) {
        throw new GitLabError(`Request error: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const raw = await response.text();
    if (!response.ok) {
        throw new GitLabError(`HTTP Error ${response.status}: ${raw}`, response.status);
    }

    let result: unknown;
    try {
        result = JSON.parse(raw);
    } catch (err) {
        throw new GitLabError(`Invalid JSON response: ${raw}`, response.status, { cause: err });
    }

    if (result && typeof result === 'object') {
        if ('html' in result) return String(result.html);
        if ('error' in result) throw new GitLabError(`API Error: ${String(result.error)}`, response.status);
    }
    throw new GitLabError(`Unexpected response: ${raw}`, response.status);
}
