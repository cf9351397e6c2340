export { resolveGitLabToken, renderMarkdown } from './glfm.js';
export type { FetchLike, RenderOptions } from './glfm.js';
export {
    PublishTokenSetup,
    parseRemote,
    encodeProjectPath,
    decidePublishTokenAction,
    ensureGitignored,
    todayUtc,
    TOKEN_NAME,
    VARIABLE_NAME,
    MAINTAINER_ACCESS,
    TOKEN_SCOPES,
    TOKEN_DURATION,
} from './publish-token.js';
export type {
    GitRemote,
    ProjectToken,
    PublishTokenAction,
    PublishTokenOutcome,
    PublishTokenSetupOptions,
} from './publish-token.js';
export {
    transformLinks,
    removeHugoShortcodes,
    extractDocMetadata,
    listMarkdownFiles,
    groomMarkdownFiles,
    generateFileTree,
    updateSkillIndex,
    validateExtraction,
    GITLAB_RAW_DOC_URL,
    INDEX_HEADING,
} from './grooming.js';
export {
    DocsSync,
    checkCooldown,
    writeLockFile,
    downloadArchive,
    extractArchive,
    LOCK_FILENAME,
    DEFAULT_COOLDOWN_DAYS,
} from './docs-sync.js';
export type { CooldownResult, DocsSyncOptions, DocsSyncResult, LockData, SyncStatus } from './docs-sync.js';
