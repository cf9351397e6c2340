import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { isDirectory, isFile } from '../utils/fs.js';
import { parseFrontmatter, splitList, type ParsedFrontmatter } from './frontmatter.js';
import { validateFrontmatter } from './schemas.js';
import type { DocumentDiagnostic, DocumentKind, LoadedDocument } from './types.js';

export const SKILL_FILENAME = 'SKILL.md';

/**
 * Document Loader — discovers and parses skill, agent and command files
 *
 * Skills are directories holding a SKILL.md; agents and commands are
 * individual .md files:
 *
 * ```markdown
 * ---
 * name: code-reviewer
 * description: Reviews staged changes before commit
 * tools: Read, Grep, Glob
 * ---
 * You are a meticulous reviewer...
 * ```
 *
 * Documents that fail to parse or validate are skipped and reported
 * through `diagnostics`.
 */
export class DocumentLoader {
    private documents: Map<string, LoadedDocument> = new Map();
    private problems: DocumentDiagnostic[] = [];

    /**
     * Load every skill directory under `dirPath`
     */
    async loadSkills(dirPath: string, source = 'project'): Promise<number> {
        if (await isFile(path.join(dirPath, SKILL_FILENAME))) {
            return (await this.loadSkill(dirPath, source)) ? 1 : 0;
        }

        let count = 0;
        for (const name of await listEntries(dirPath)) {
            const skillDir = path.join(dirPath, name);
            if (!(await isFile(path.join(skillDir, SKILL_FILENAME)))) continue;
            if (await this.loadSkill(skillDir, source)) count++;
        }
        return count;
    }

    /**
     * Load a single skill directory
     */
    async loadSkill(skillDir: string, source = 'project'): Promise<LoadedDocument | null> {
        const filePath = path.join(skillDir, SKILL_FILENAME);
        const dirName = path.basename(skillDir);
        const doc = await this.parseDocumentFile('skill', filePath, dirName, source);

        if (doc && doc.name !== dirName) {
            this.problems.push({
                severity: 'warning',
                path: filePath,
                message: `skill name "${doc.name}" does not match its directory "${dirName}"`,
            });
        }
        return doc;
    }

    async loadAgents(dirPath: string, source = 'project'): Promise<number> {
        return this.loadMarkdownFiles('agent', dirPath, source);
    }

    async loadCommands(dirPath: string, source = 'project'): Promise<number> {
        return this.loadMarkdownFiles('command', dirPath, source);
    }

    /**
     * Load one loose document of a known kind (used by `docs validate`)
     */
    async loadFile(kind: DocumentKind, filePath: string, source = 'project'): Promise<LoadedDocument | null> {
        const fallback = kind === 'skill'
            ? path.basename(path.dirname(filePath))
            : path.basename(filePath, '.md');
        return this.parseDocumentFile(kind, filePath, fallback, source);
    }

    private async loadMarkdownFiles(kind: DocumentKind, dirPath: string, source: string): Promise<number> {
        let count = 0;
        for (const name of await listEntries(dirPath)) {
            if (!name.endsWith('.md')) continue;

            const filePath = path.join(dirPath, name);
            if (!(await isFile(filePath))) continue;

            const doc = await this.parseDocumentFile(kind, filePath, path.basename(name, '.md'), source);
            if (doc) count++;
        }
        return count;
    }

    /**
     * Parse, validate and register a single document
     */
    private async parseDocumentFile(
        kind: DocumentKind,
        filePath: string,
        fallbackName: string,
        source: string
    ): Promise<LoadedDocument | null> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            this.problems.push({ severity: 'error', path: filePath, message: `cannot read file: ${errorMessage(err)}` });
            return null;
        }

        let parsed: ParsedFrontmatter;
        try {
            parsed = parseFrontmatter(content);
        } catch (err) {
            this.problems.push({ severity: 'error', path: filePath, message: errorMessage(err) });
            return null;
        }

        const validation = validateFrontmatter(kind, parsed.frontmatter);
        if (!validation.ok) {
            for (const issue of validation.issues) {
                this.problems.push({ severity: 'error', path: filePath, message: `${kind} frontmatter ${issue}` });
            }
            return null;
        }

        const fm = validation.data;
        const doc: LoadedDocument = {
            kind,
            name: typeof fm['name'] === 'string' ? fm['name'] : fallbackName,
            description: typeof fm['description'] === 'string' ? fm['description'] : '',
            path: filePath,
            source,
            tools: splitList(kind === 'agent' ? fm['tools'] : fm['allowed-tools']),
            skills: kind === 'agent' ? splitList(fm['skills']) : [],
            frontmatter: fm,
            body: parsed.body,
        };

        const key = documentKey(kind, doc.name);
        const previous = this.documents.get(key);
        if (previous) {
            this.problems.push({
                severity: 'error',
                path: filePath,
                message: `duplicate ${kind} name "${doc.name}" (also defined in ${previous.path})`,
            });
        }

        this.documents.set(key, doc);
        return doc;
    }

    get(kind: DocumentKind, name: string): LoadedDocument | undefined {
        return this.documents.get(documentKey(kind, name));
    }

    /**
     * List loaded documents, optionally of one kind
     */
    list(kind?: DocumentKind): LoadedDocument[] {
        const all = Array.from(this.documents.values());
        return kind ? all.filter(doc => doc.kind === kind) : all;
    }

    get diagnostics(): DocumentDiagnostic[] {
        return [...this.problems];
    }

    get size(): number {
        return this.documents.size;
    }
}

function documentKey(kind: DocumentKind, name: string): string {
    return `${kind}:${name}`;
}

/**
 * Sorted entry names of a directory; a missing directory has none
 */
async function listEntries(dirPath: string): Promise<string[]> {
    if (!(await isDirectory(dirPath))) return [];
    const entries = await readdir(dirPath);
    return entries.sort();
}

/**
 * Kind of a loose document from its location: SKILL.md is a skill, files
 * under an `agents/` or `commands/` directory are agents or commands.
 */
export function inferDocumentKind(filePath: string): DocumentKind | null {
    if (path.basename(filePath) === SKILL_FILENAME) return 'skill';

    const parent = path.basename(path.dirname(filePath));
    if (parent === 'agents') return 'agent';
    if (parent === 'commands') return 'command';
    return null;
}
