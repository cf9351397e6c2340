/**
 * Document System — Types
 *
 * Skills, agents and commands are markdown files with YAML frontmatter
 * read by the assistant host. Skills live in their own directory as
 * SKILL.md; agents and commands are single .md files.
 */

export type DocumentKind = 'skill' | 'agent' | 'command';

export const DOCUMENT_KINDS: DocumentKind[] = ['skill', 'agent', 'command'];

export interface LoadedDocument {
    kind: DocumentKind;
    /** Frontmatter name, or the directory/file name when absent */
    name: string;
    description: string;
    /** Absolute path to the markdown file */
    path: string;
    /** 'project' or the owning plugin name */
    source: string;
    /** Tool names from allowed-tools (skills, commands) or tools (agents) */
    tools: string[];
    /** Skills an agent preloads */
    skills: string[];
    frontmatter: Record<string, unknown>;
    body: string;
}

export interface DocumentDiagnostic {
    severity: 'error' | 'warning';
    path: string;
    message: string;
}
