import { readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { GroomingError, ValidationError, errorMessage } from '../errors.js';
import { isDirectory } from '../utils/fs.js';
import { findSection } from '../utils/markdown.js';

export const GITLAB_RAW_DOC_URL = 'https://gitlab.com/gitlab-org/gitlab/-/raw/master/doc';
export const INDEX_HEADING = '## Documentation Index';

const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/g;
const ANGLE_SHORTCODE = /\{\{\s*<\s*(\w+)\s*>\}\}[\s\S]*?\{\{\s*<\s*\/\s*\1\s*>\}\}/g;
const PERCENT_SHORTCODE = /\{\{\s*%\s*(\w+)\s*%\}\}[\s\S]*?\{\{\s*%\s*\/\s*\1\s*%\}\}/g;
const DOC_FRONTMATTER = /^---\s*\n([\s\S]*?)\n---\s*\n/;

function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

function isInside(rel: string): boolean {
    return !rel.startsWith('..') && !path.isAbsolute(rel);
}

/**
 * Rewrite relative links: targets under `docsRoot` become `./<rel>`,
 * targets elsewhere under its parent `doc/` become raw GitLab URLs.
 */
export function transformLinks(content: string, currentFile: string, docsRoot: string): string {
    const root = path.resolve(docsRoot);
    const docDir = path.dirname(root);

    return content.replace(LINK_PATTERN, (whole: string, text: string, target: string) => {
        if (/^(https?:\/\/|#|mailto:)/.test(target)) return whole;

        const resolved = path.resolve(path.dirname(currentFile), target);

        const relToRoot = path.relative(root, resolved);
        if (isInside(relToRoot)) {
            return `[${text}](./${toPosix(relToRoot)})`;
        }

        const relToDoc = path.relative(docDir, resolved);
        if (isInside(relToDoc)) {
            return `[${text}](${GITLAB_RAW_DOC_URL}/${toPosix(relToDoc)}?ref_type=heads)`;
        }
        return whole;
    });
}

/**
 * Drop paired `{{< x >}}…{{< /x >}}` and `{{% x %}}…{{% /x %}}` blocks
 */
export function removeHugoShortcodes(content: string): string {
    return content.replace(ANGLE_SHORTCODE, '').replace(PERCENT_SHORTCODE, '');
}

/**
 * `title` and `description` from a documentation page's frontmatter
 */
export function extractDocMetadata(content: string): { title?: string; description?: string } {
    const match = DOC_FRONTMATTER.exec(content);
    if (!match) return {};

    try {
        const data: unknown = parseYaml(match[1] ?? '');
        if (!data || typeof data !== 'object' || Array.isArray(data)) return {};

        const meta: { title?: string; description?: string } = {};
        if ('title' in data) meta.title = String(data.title);
        if ('description' in data) meta.description = String(data.description);
        return meta;
    } catch {
        // pages with broken frontmatter are listed by filename
        return {};
    }
}

/**
 * Every .md file under `dir`, as paths relative to it (posix separators), sorted by path segments
 */
export async function listMarkdownFiles(dir: string): Promise<string[]> {
    const files: string[] = [];
    const walk = async (rel: string): Promise<void> => {
        for (const entry of await readdir(path.join(dir, rel), { withFileTypes: true })) {
            const child = rel ? `${rel}/${entry.name}` : entry.name;
            if (entry.isDirectory()) await walk(child);
            else if (entry.isFile() && entry.name.endsWith('.md')) files.push(child);
        }
    };
    await walk('');
    return files.sort(comparePaths);
}

function comparePaths(a: string, b: string): number {
    const pa = a.split('/');
    const pb = b.split('/');
    for (let i = 0; i < Math.min(pa.length, pb.length); i++) {
        const x = pa[i] ?? '';
        const y = pb[i] ?? '';
        if (x !== y) return x < y ? -1 : 1;
    }
    return pa.length - pb.length;
}

/**
 * Transform links and remove shortcodes in every page; returns the count
 */
export async function groomMarkdownFiles(docsDir: string): Promise<number> {
    const files = await listMarkdownFiles(docsDir);
    if (files.length === 0) {
        throw new GroomingError(`No markdown files found in ${docsDir}`);
    }

    try {
        for (const rel of files) {
            const file = path.join(docsDir, rel);
            const content = await readFile(file, 'utf-8');
            const groomed = removeHugoShortcodes(transformLinks(content, file, docsDir));
            await writeFile(file, groomed, 'utf-8');
        }
    } catch (err) {
        throw new GroomingError(`Failed to process markdown files: ${errorMessage(err)}`, { cause: err });
    }
    return files.length;
}

/**
 * Fenced tree of pages with titles and descriptions from their frontmatter
 */
export async function generateFileTree(docsDir: string): Promise<string> {
    let files: string[];
    try {
        files = await listMarkdownFiles(docsDir);
    } catch (err) {
        throw new GroomingError(`Failed to generate file tree: ${errorMessage(err)}`, { cause: err });
    }
    if (files.length === 0) return '*No markdown files found*\n';

    const byDir = new Map<string, string[]>();
    for (const rel of files) {
        const dir = path.posix.dirname(rel);
        const list = byDir.get(dir) ?? [];
        list.push(rel);
        byDir.set(dir, list);
    }

    const lines = ['```text', `${path.basename(docsDir)}/`];
    for (const dir of Array.from(byDir.keys()).sort(comparePaths)) {
        const depth = dir === '.' ? 0 : dir.split('/').length;
        if (dir !== '.') {
            lines.push(`${'  '.repeat(depth)}├── ${path.posix.basename(dir)}/`);
        }

        const fileIndent = '  '.repeat(depth + 1);
        for (const rel of byDir.get(dir) ?? []) {
            const meta = extractDocMetadata(await readFile(path.join(docsDir, rel), 'utf-8'));
            lines.push(`${fileIndent}├── [${meta.title ?? path.posix.basename(rel)}](./references/ci/${rel})`);
            if (meta.description) {
                lines.push(`${fileIndent}    ${meta.description}`);
            }
        }
    }
    lines.push('```');
    return `${lines.join('\n')}\n`;
}

/**
 * Replace (or append) the Documentation Index section of a SKILL.md
 */
export async function updateSkillIndex(skillFile: string, fileTree: string): Promise<void> {
    let content: string;
    try {
        content = await readFile(skillFile, 'utf-8');
    } catch (err) {
        throw new GroomingError(`SKILL.md not found at ${skillFile}`, { cause: err });
    }

    const section = `${INDEX_HEADING}\n\n${fileTree}\n`;
    const found = findSection(content, INDEX_HEADING);
    const updated = found
        ? content.slice(0, found.start) + section + content.slice(found.end)
        : `${content.trimEnd()}\n\n${section}`;

    try {
        await writeFile(skillFile, updated, 'utf-8');
    } catch (err) {
        throw new GroomingError(`Failed to update SKILL.md: ${errorMessage(err)}`, { cause: err });
    }
}

/**
 * The archive must unpack to one top directory holding doc/ci with pages.
 * Returns the doc/ci path.
 */
export async function validateExtraction(extractDir: string): Promise<string> {
    const items = await readdir(extractDir, { withFileTypes: true });
    if (items.length === 0) {
        throw new ValidationError(`Extraction produced no files in ${extractDir}`);
    }

    const [top] = items;
    if (items.length !== 1 || !top || !top.isDirectory()) {
        throw new ValidationError(`Unexpected extraction structure in ${extractDir}: ${items.map(i => i.name).join(', ')}`);
    }

    const topDir = path.join(extractDir, top.name);
    const docsPath = path.join(topDir, 'doc', 'ci');
    if (!(await isDirectory(docsPath))) {
        throw new ValidationError(`Expected doc/ci directory not found at ${docsPath} (parent: ${topDir})`);
    }
    if ((await listMarkdownFiles(docsPath)).length === 0) {
        throw new ValidationError(`No markdown files found in ${docsPath}`);
    }
    return docsPath;
}
