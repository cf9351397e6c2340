/**
 * YAML frontmatter parser for skill, agent and command markdown files.
 *
 * - Extracts YAML between a leading `---` line and the next `---` line
 * - Handles CRLF and LF line endings
 * - Returns an empty object if no frontmatter is found
 */

import { parse, YAMLParseError } from 'yaml';
import { WorkbenchError } from '../errors.js';

export type ParsedFrontmatter<T extends Record<string, unknown> = Record<string, unknown>> = {
    frontmatter: T;
    body: string;
};

function normalizeNewlines(value: string): string {
    return value.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

function extractFrontmatter(content: string): { yamlString: string | null; body: string } {
    const normalized = normalizeNewlines(content);

    if (!normalized.startsWith('---')) {
        return { yamlString: null, body: normalized };
    }

    const endIndex = normalized.indexOf('\n---', 3);
    if (endIndex === -1) {
        return { yamlString: null, body: normalized };
    }

    return {
        yamlString: normalized.slice(4, endIndex),
        body: normalized.slice(endIndex + 4).trim(),
    };
}

export function parseFrontmatter(content: string): ParsedFrontmatter {
    const { yamlString, body } = extractFrontmatter(content);
    if (!yamlString) {
        return { frontmatter: {}, body };
    }

    let parsed: unknown;
    try {
        parsed = parse(yamlString);
    } catch (err) {
        const detail = err instanceof YAMLParseError ? err.message.split('\n')[0] : String(err);
        throw new WorkbenchError(`Invalid YAML frontmatter: ${detail}`, { cause: err });
    }

    if (!isRecord(parsed)) {
        return { frontmatter: {}, body };
    }
    return { frontmatter: parsed, body };
}

export function stripFrontmatter(content: string): string {
    return parseFrontmatter(content).body;
}

/**
 * Normalise a list-valued field: "Read, Grep" and ["Read", "Grep"] both
 * become ["Read", "Grep"].
 */
export function splitList(value: unknown): string[] {
    if (typeof value === 'string') {
        return value.split(',').map(s => s.trim()).filter(Boolean);
    }
    if (Array.isArray(value)) {
        return value.map(item => String(item).trim()).filter(Boolean);
    }
    return [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
