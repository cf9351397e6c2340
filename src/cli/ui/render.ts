import chalk from 'chalk';
import type { InstallStatus } from '../../plugins/installer.js';

/**
 * Render a section heading
 */
export function renderHeading(title: string): void {
    console.log(chalk.bold.cyan(`\n${title}\n`));
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}

/**
 * Render a diagnostic line, coloured by severity
 */
export function renderIssue(severity: 'error' | 'warning', message: string, location?: string): void {
    const icon = severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
    const text = severity === 'error' ? chalk.red(message) : chalk.yellow(message);
    console.log(`    ${icon} ${text}`);
    if (location) {
        console.log(chalk.dim(`      ${location}`));
    }
}

const STATUS_ICONS: Record<InstallStatus, string> = {
    already_installed: chalk.dim('='),
    newly_installed: chalk.green('+'),
    skipped: chalk.yellow('-'),
    error: chalk.red('✗'),
};

/**
 * Render one install result line
 */
export function renderInstallResult(component: string, status: InstallStatus, message: string): void {
    const line = `    ${STATUS_ICONS[status]} ${component}`;
    console.log(status === 'error' ? `${line} ${chalk.red(message)}` : `${line} ${chalk.dim(message)}`);
}

/**
 * Truncate a value for single-line display
 */
export function truncate(value: string, max = 60): string {
    return value.length > max ? value.slice(0, max - 3) + '...' : value;
}
