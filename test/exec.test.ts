import { describe, expect, it } from 'vitest';
import { ExecFileRunner } from '../src/utils/exec.js';

const NODE = process.execPath;

describe('ExecFileRunner', () => {
    const runner = new ExecFileRunner();

    it('captures output of a successful run', async () => {
        const result = await runner.run(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err")']);

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe('out');
        expect(result.stderr).toBe('err');
        expect(result.error).toBeUndefined();
    });

    it('writes input to stdin', async () => {
        const echo = 'let s = ""; process.stdin.on("data", d => { s += d; }); process.stdin.on("end", () => process.stdout.write(s.toUpperCase()));';
        const result = await runner.run(NODE, ['-e', echo], { input: 'hello' });

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe('HELLO');
    });

    it('returns non-zero exit codes with their output', async () => {
        const result = await runner.run(NODE, ['-e', 'process.stdout.write("partial"); process.exit(3)']);

        expect(result.exitCode).toBe(3);
        expect(result.stdout).toBe('partial');
        expect(result.error).toBeUndefined();
    });

    it('reports a missing program as a failed result', async () => {
        const result = await runner.run('workbench-no-such-program', []);

        expect(result.exitCode).toBe(127);
        expect(result.error).toMatch(/^command not found: /);
    });

    it('reports a timeout', async () => {
        const result = await runner.run(NODE, ['-e', 'setTimeout(() => {}, 10_000)'], { timeoutMs: 200 });

        expect(result.exitCode).toBe(1);
        expect(result.error).toBeDefined();
    });

    it('merges default options', async () => {
        const withEnv = new ExecFileRunner({ env: { WORKBENCH_TEST_VALUE: 'from-defaults' } });
        const result = await withEnv.run(NODE, ['-e', 'process.stdout.write(process.env.WORKBENCH_TEST_VALUE ?? "")']);

        expect(result.stdout).toBe('from-defaults');
    });
});
