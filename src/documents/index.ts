export { DocumentLoader, SKILL_FILENAME, inferDocumentKind } from './loader.js';
export { parseFrontmatter, stripFrontmatter, splitList } from './frontmatter.js';
export type { ParsedFrontmatter } from './frontmatter.js';
export {
    validateFrontmatter,
    SkillFrontmatterSchema,
    AgentFrontmatterSchema,
    CommandFrontmatterSchema,
    PERMISSION_MODES,
} from './schemas.js';
export type { SkillFrontmatter, AgentFrontmatter, CommandFrontmatter, FrontmatterValidation } from './schemas.js';
export { DOCUMENT_KINDS } from './types.js';
export type { DocumentKind, LoadedDocument, DocumentDiagnostic } from './types.js';
