import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Progress indicator for command stages, on stderr so that stdout stays
 * clean for reports and HTML.
 */
export class Spinner {
    private ora: Ora;

    constructor(stream: NodeJS.WriteStream = process.stderr) {
        this.ora = ora({ color: 'cyan', spinner: 'dots', stream });
    }

    start(message: string): void {
        this.ora.start(chalk.dim(message));
    }

    success(message: string): void {
        this.ora.succeed(chalk.green(message));
    }

    fail(message: string): void {
        this.ora.fail(chalk.red(message));
    }

    stop(): void {
        if (this.ora.isSpinning) this.ora.stop();
    }

    /**
     * Spin while `task` runs; marks success or failure and rethrows errors
     */
    async track<T>(message: string, task: () => Promise<T>, done: (result: T) => string = () => message): Promise<T> {
        this.start(message);
        try {
            const result = await task();
            this.success(done(result));
            return result;
        } catch (err) {
            this.fail(message);
            throw err;
        }
    }
}
