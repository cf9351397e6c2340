import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Logger } from '../src/logging/logger.js';
import type { CommandResult, CommandRunner, RunOptions } from '../src/utils/exec.js';

export async function makeTempDir(prefix = 'workbench-'): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Write files given as `{ 'relative/path': content }` under root
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [rel, content] of Object.entries(files)) {
        const file = path.join(root, rel);
        await mkdir(path.dirname(file), { recursive: true });
        await writeFile(file, content, 'utf-8');
    }
}

/** Logger that records lines instead of printing them */
export function captureLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'debug'): { log: Logger; lines: string[] } {
    const lines: string[] = [];
    return { log: new Logger({ level, sink: line => lines.push(line) }), lines };
}

export interface RecordedCall {
    command: string;
    args: string[];
    options?: RunOptions;
}

type Responder = (command: string, args: string[], options?: RunOptions) => Partial<CommandResult> | undefined;

/**
 * CommandRunner double: answers from a responder, records every call,
 * and exits 1 for anything the responder does not handle.
 */
export class FakeRunner implements CommandRunner {
    readonly calls: RecordedCall[] = [];

    constructor(private responder: Responder = () => undefined) {}

    async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
        this.calls.push({ command, args, options });
        const answer = this.responder(command, args, options);
        if (!answer) {
            return { exitCode: 1, stdout: '', stderr: `unexpected: ${command} ${args.join(' ')}`, durationMs: 0 };
        }
        return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, ...answer };
    }

    commandLines(): string[] {
        return this.calls.map(call => [call.command, ...call.args].join(' '));
    }
}
