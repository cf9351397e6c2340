/**
 * Error taxonomy
 *
 * Library code throws these; CLI actions map them to exit codes
 * (ConfigError → 2, everything else → 1).
 */
export class WorkbenchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** workbench.config.json is unreadable or fails validation */
export class ConfigError extends WorkbenchError {}

/** plugin.json is missing, malformed, or describes paths that do not exist */
export class ManifestError extends WorkbenchError {
    constructor(message: string, readonly manifestPath?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Evaluation file or agent loop failure */
export class EvaluationError extends WorkbenchError {}

/** LINTERS section missing or malformed */
export class LintConfigError extends WorkbenchError {}

/** GitLab API or glab CLI failure */
export class GitLabError extends WorkbenchError {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

// ─── Documentation sync ───

export class UpdateError extends WorkbenchError {}
export class DownloadError extends UpdateError {}
export class ExtractionError extends UpdateError {}
export class ValidationError extends UpdateError {}
export class GroomingError extends UpdateError {}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
