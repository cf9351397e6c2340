import path from 'node:path';
import { minimatch } from 'minimatch';
import type { LinterTool } from './types.js';

export const PYTHON_PATTERNS = ['*.py'];
export const PRETTIER_PATTERNS = ['*.{ts,tsx,js,jsx,json,md}'];
export const ESLINT_PATTERNS = ['*.{ts,tsx,js,jsx}'];
export const MARKDOWN_PATTERNS = ['*.{md,markdown}'];
export const SHELL_PATTERNS = ['*.{sh,bash,zsh,fish}'];

function formatter(name: string, patterns: string[]): LinterTool {
    return { name, patterns: [...patterns], isFormatter: true, isLinter: false };
}

function linter(name: string, patterns: string[]): LinterTool {
    return { name, patterns: [...patterns], isFormatter: false, isLinter: true };
}

/**
 * Every tool the orchestrator knows how to run
 */
export const KNOWN_TOOLS = {
    'ruff format': () => formatter('ruff format', PYTHON_PATTERNS),
    'ruff check': () => linter('ruff check', PYTHON_PATTERNS),
    mypy: () => linter('mypy', PYTHON_PATTERNS),
    pyright: () => linter('pyright', PYTHON_PATTERNS),
    bandit: () => linter('bandit', PYTHON_PATTERNS),
    prettier: () => formatter('prettier', PRETTIER_PATTERNS),
    eslint: () => linter('eslint', ESLINT_PATTERNS),
    markdownlint: () => linter('markdownlint', MARKDOWN_PATTERNS),
    shellcheck: () => linter('shellcheck', SHELL_PATTERNS),
    shfmt: () => formatter('shfmt', SHELL_PATTERNS),
} satisfies Record<string, () => LinterTool>;

/**
 * Map a pre-commit hook id to the tool it runs
 */
export function mapHookToLinter(hookId: string): LinterTool | null {
    switch (hookId) {
        case 'ruff':
            return KNOWN_TOOLS['ruff check']();
        case 'ruff-format':
            return KNOWN_TOOLS['ruff format']();
        case 'mypy':
        case 'prettier':
        case 'eslint':
        case 'markdownlint':
        case 'shellcheck':
        case 'shfmt':
            return KNOWN_TOOLS[hookId]();
        default:
            return null;
    }
}

/**
 * True when the file's basename matches any pattern (braces expanded)
 */
export function matchesPattern(file: string, patterns: string[]): boolean {
    const name = path.basename(file);
    return patterns.some(pattern => minimatch(name, pattern, { dot: true, matchBase: true }));
}
