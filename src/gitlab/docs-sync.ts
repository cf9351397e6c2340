import { createWriteStream } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { extract } from 'tar';
import { DownloadError, ExtractionError, UpdateError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { isNotFound, pathExists } from '../utils/fs.js';
import type { FetchLike } from './glfm.js';
import { generateFileTree, groomMarkdownFiles, updateSkillIndex, validateExtraction } from './grooming.js';

export const LOCK_FILENAME = '.sync-gitlab-docs.lock';
export const DEFAULT_COOLDOWN_DAYS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export type SyncStatus = 'success' | 'failure';

export interface LockData {
    last_run: string;
    last_status: SyncStatus | string;
    files_processed: number;
}

export type CooldownResult =
    | { proceed: true }
    | { proceed: false; lastRun: Date; remainingMs: number };

/**
 * Whether a sync may run now. Only a successful last run starts a cooldown.
 */
export async function checkCooldown(
    workingDir: string,
    force: boolean,
    now: Date = new Date(),
    days: number = DEFAULT_COOLDOWN_DAYS
): Promise<CooldownResult> {
    if (force) return { proceed: true };

    const lockFile = path.join(workingDir, LOCK_FILENAME);
    let data: unknown;
    try {
        data = JSON.parse(await readFile(lockFile, 'utf-8'));
    } catch (err) {
        if (isNotFound(err)) return { proceed: true };
        throw new UpdateError(`Failed to read lock file ${lockFile}: ${errorMessage(err)}`, { cause: err });
    }

    if (!data || typeof data !== 'object' || !('last_status' in data) || data.last_status !== 'success') {
        return { proceed: true };
    }

    const raw = 'last_run' in data ? data.last_run : undefined;
    const lastRun = typeof raw === 'string' ? new Date(raw) : new Date(Number.NaN);
    if (Number.isNaN(lastRun.getTime())) {
        throw new UpdateError(`Invalid timestamp in lock file: ${String(raw)}`);
    }

    const elapsed = now.getTime() - lastRun.getTime();
    const cooldown = days * DAY_MS;
    if (elapsed < cooldown) {
        return { proceed: false, lastRun, remainingMs: cooldown - elapsed };
    }
    return { proceed: true };
}

/**
 * Record the outcome of a run (written to a temp file, then renamed)
 */
export async function writeLockFile(
    workingDir: string,
    status: SyncStatus,
    filesProcessed = 0,
    now: Date = new Date()
): Promise<LockData> {
    const lockFile = path.join(workingDir, LOCK_FILENAME);
    const tempFile = `${lockFile}.tmp`;
    const data: LockData = { last_run: now.toISOString(), last_status: status, files_processed: filesProcessed };

    try {
        await writeFile(tempFile, JSON.stringify(data, null, 2), 'utf-8');
        await rename(tempFile, lockFile);
    } catch (err) {
        throw new UpdateError(`Failed to write lock file ${lockFile}: ${errorMessage(err)}`, { cause: err });
    }
    return data;
}

/**
 * Stream a URL to a file
 */
export async function downloadArchive(url: string, outputPath: string, doFetch: FetchLike = fetch): Promise<void> {
    let response: Response;
    try {
        response = await doFetch(url, { redirect: 'follow', signal: AbortSignal.timeout(60_000) });
    } catch (err) {
        throw new DownloadError(`Network error downloading archive: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
        throw new DownloadError(`HTTP ${response.status} error downloading archive`);
    }
    if (!response.body) {
        throw new DownloadError('Empty response body downloading archive');
    }

    try {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(outputPath));
    } catch (err) {
        throw new DownloadError(`Failed to write archive to ${outputPath}: ${errorMessage(err)}`, { cause: err });
    }
}

export async function extractArchive(archivePath: string, extractTo: string): Promise<void> {
    try {
        await extract({ file: archivePath, cwd: extractTo });
    } catch (err) {
        throw new ExtractionError(`Failed to extract archive: ${errorMessage(err)}`, { cause: err });
    }
}

export interface DocsSyncOptions {
    /** Skill directory holding SKILL.md; docs land in references/ci */
    workingDir: string;
    url: string;
    force?: boolean;
    cleanup?: boolean;
    cooldownDays?: number;
    fetch?: FetchLike;
    now?: () => Date;
    log?: Logger;
    /** Called as each stage starts */
    onStage?: (stage: 'download' | 'extract' | 'validate' | 'groom' | 'index' | 'replace') => void;
}

export type DocsSyncResult =
    | { status: 'updated'; filesProcessed: number; docsDir: string }
    | { status: 'cooldown'; lastRun: Date; remainingMs: number };

/**
 * Docs Sync — refreshes a skill's bundled GitLab CI reference pages
 */
export class DocsSync {
    private log: Logger;

    constructor(private options: DocsSyncOptions) {
        this.log = (options.log ?? rootLogger).child('docs-sync');
    }

    async run(): Promise<DocsSyncResult> {
        const { workingDir } = this.options;
        const now = this.options.now ?? (() => new Date());

        const cooldown = await checkCooldown(
            workingDir,
            this.options.force ?? false,
            now(),
            this.options.cooldownDays ?? DEFAULT_COOLDOWN_DAYS
        );
        if (!cooldown.proceed) {
            return { status: 'cooldown', lastRun: cooldown.lastRun, remainingMs: cooldown.remainingMs };
        }

        try {
            const result = await this.update();
            await writeLockFile(workingDir, 'success', result.filesProcessed, now());
            return result;
        } catch (err) {
            await writeLockFile(workingDir, 'failure', 0, now());
            if (err instanceof UpdateError) throw err;
            throw new UpdateError(`Unexpected error during update: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async update(): Promise<{ status: 'updated'; filesProcessed: number; docsDir: string }> {
        const { workingDir, onStage } = this.options;
        const referencesDir = path.join(workingDir, 'references');
        const ciDir = path.join(referencesDir, 'ci');
        const stagingDir = path.join(referencesDir, 'ci-new');
        const archivePath = path.join(workingDir, 'gitlab-ci-docs.tar.gz');

        await mkdir(referencesDir, { recursive: true });

        try {
            onStage?.('download');
            this.log.info(`Downloading ${this.options.url}`);
            await downloadArchive(this.options.url, archivePath, this.options.fetch);

            onStage?.('extract');
            await mkdir(stagingDir, { recursive: true });
            await extractArchive(archivePath, stagingDir);

            onStage?.('validate');
            const docsPath = await validateExtraction(stagingDir);

            onStage?.('groom');
            const filesProcessed = await groomMarkdownFiles(docsPath);
            this.log.info(`Groomed ${filesProcessed} markdown files`);

            onStage?.('index');
            await updateSkillIndex(path.join(workingDir, 'SKILL.md'), await generateFileTree(docsPath));

            onStage?.('replace');
            if (await pathExists(ciDir)) await rm(ciDir, { recursive: true, force: true });
            await rename(docsPath, ciDir);

            return { status: 'updated', filesProcessed, docsDir: ciDir };
        } finally {
            if (this.options.cleanup ?? true) {
                await rm(archivePath, { force: true });
                await rm(stagingDir, { recursive: true, force: true });
            }
        }
    }
}
