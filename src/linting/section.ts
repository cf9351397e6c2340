import { LintConfigError } from '../errors.js';
import { findSection } from '../utils/markdown.js';
import type { LinterTool, LintersConfig, ProjectLinters } from './types.js';

export const LINTERS_HEADING = '## LINTERS';
const FORMATTERS_HEADING = '### Formatters';
const LINTERS_SUBHEADING = '### Static Checking and Linting';

function toolLine(tool: LinterTool): string {
    return `- ${tool.name} [${tool.patterns.join(', ')}]`;
}

function byName(a: LinterTool, b: LinterTool): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Render the LINTERS section for a project instructions file
 */
export function generateLintersSection(linters: ProjectLinters): string {
    const lines = [
        LINTERS_HEADING,
        '',
        `git pre-commit hooks: ${linters.gitHooksEnabled ? 'enabled' : 'disabled'}`,
        `pre-commit tool: ${linters.preCommitTool ?? 'none'}`,
        '',
    ];

    if (linters.formatters.length > 0) {
        lines.push(FORMATTERS_HEADING, '');
        lines.push(...[...linters.formatters].sort(byName).map(toolLine));
        lines.push('');
    }

    if (linters.linters.length > 0) {
        lines.push(LINTERS_SUBHEADING, '');
        lines.push(...[...linters.linters].sort(byName).map(toolLine));
        lines.push('');
    }

    return lines.join('\n');
}

/**
 * Locate `## LINTERS` up to the next level-2 heading or the end
 */
export function findLintersSection(content: string): { start: number; end: number } | null {
    return findSection(content, LINTERS_HEADING);
}

export interface UpsertResult {
    updated: boolean;
    content: string;
    /** Present when an existing section blocked the update */
    existingSection?: string;
}

/**
 * Add the section to `existing` content, replacing an old one only when forced
 */
export function upsertLintersSection(existing: string | null, section: string, force: boolean): UpsertResult {
    if (existing === null) {
        return { updated: true, content: section };
    }

    let content = existing;
    const found = findLintersSection(content);
    if (found) {
        if (!force) {
            return {
                updated: false,
                content: existing,
                existingSection: content.slice(found.start, found.end).trim(),
            };
        }
        content = content.slice(0, found.start) + content.slice(found.end);
        content = content.replace(/\n{3,}/g, '\n\n');
    }

    if (!content.endsWith('\n\n')) {
        content = `${content.trimEnd()}\n\n`;
    }
    return { updated: true, content: content + section };
}

/**
 * Parse `- name [pattern, pattern]`
 */
export function parseToolLine(line: string): { name: string; patterns: string[] } | null {
    const match = /^\s*-\s+([^[]+)\s+\[([^\]]+)\]/.exec(line);
    if (!match) return null;

    const [, rawName = '', rawPatterns = ''] = match;
    return {
        name: rawName.trim(),
        patterns: splitPatterns(rawPatterns),
    };
}

/**
 * Split on commas outside `{…}` groups
 */
function splitPatterns(raw: string): string[] {
    const patterns: string[] = [];
    let depth = 0;
    let current = '';
    for (const ch of raw) {
        if (ch === '{') depth++;
        if (ch === '}') depth = Math.max(0, depth - 1);
        if (ch === ',' && depth === 0) {
            patterns.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    patterns.push(current);
    return patterns.map(p => p.trim()).filter(Boolean);
}

function subsection(section: string, heading: string): string[] {
    const at = section.indexOf(heading);
    if (at === -1) return [];

    const rest = section.slice(at + heading.length);
    const stop = rest.indexOf('###');
    return (stop === -1 ? rest : rest.slice(0, stop)).split('\n');
}

/**
 * Read the tools listed in a LINTERS section
 */
export function parseLintersSection(content: string): LintersConfig {
    const found = findLintersSection(content);
    if (!found) {
        throw new LintConfigError('LINTERS section not found');
    }
    const section = content.slice(found.start, found.end);

    const read = (heading: string, isFormatter: boolean): LinterTool[] =>
        subsection(section, heading).flatMap(line => {
            const parsed = parseToolLine(line);
            return parsed ? [{ ...parsed, isFormatter, isLinter: !isFormatter }] : [];
        });

    return {
        formatters: read(FORMATTERS_HEADING, true),
        linters: read(LINTERS_SUBHEADING, false),
    };
}
