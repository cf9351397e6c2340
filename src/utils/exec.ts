import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface RunOptions {
    cwd?: string;
    timeoutMs?: number;
    env?: Record<string, string | undefined>;
    /** Written to the child's stdin */
    input?: string;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    durationMs: number;
    /** Set when the process could not be started or was killed */
    error?: string;
}

/**
 * Runs external programs. Tests substitute a fake.
 */
export interface CommandRunner {
    run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Command Runner — executes programs as child processes without a shell
 *
 * Non-zero exits are returned, not thrown; only failures to start the
 * process (or a timeout) set `error`.
 */
export class ExecFileRunner implements CommandRunner {
    constructor(private defaults: RunOptions = {}) {}

    async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
        const start = Date.now();
        const cwd = options.cwd ?? this.defaults.cwd;
        const timeout = options.timeoutMs ?? this.defaults.timeoutMs ?? 60_000;

        try {
            const pending = execFileAsync(command, args, {
                cwd,
                timeout,
                maxBuffer: 16 * 1024 * 1024,
                env: { ...process.env, ...this.defaults.env, ...options.env },
            });
            if (options.input !== undefined) {
                pending.child.stdin?.end(options.input);
            }
            const { stdout, stderr } = await pending;

            return {
                exitCode: 0,
                stdout: stdout.toString(),
                stderr: stderr.toString(),
                durationMs: Date.now() - start,
            };
        } catch (err) {
            const failure = describeFailure(err);
            return { ...failure, durationMs: Date.now() - start };
        }
    }
}

function describeFailure(err: unknown): Omit<CommandResult, 'durationMs'> {
    if (!(err instanceof Error)) {
        return { exitCode: 1, stdout: '', stderr: '', error: String(err) };
    }

    const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
    const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
    const code = 'code' in err ? err.code : undefined;
    const killed = 'killed' in err && err.killed === true;

    if (typeof code === 'number' && !killed) {
        return { exitCode: code, stdout, stderr };
    }
    if (code === 'ENOENT') {
        return { exitCode: 127, stdout, stderr, error: `command not found: ${err.message}` };
    }
    return { exitCode: 1, stdout, stderr, error: err.message };
}

/**
 * Top-level directory of the git repository containing `cwd`, or null
 */
export async function findGitRoot(runner: CommandRunner, cwd?: string): Promise<string | null> {
    const result = await runner.run('git', ['rev-parse', '--show-toplevel'], { cwd, timeoutMs: 5_000 });
    if (result.exitCode !== 0 || result.error) return null;
    const root = result.stdout.trim();
    return root || null;
}
