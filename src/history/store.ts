import Database from 'better-sqlite3';
import path from 'node:path';
import { mkdirSync } from 'node:fs';
import { z } from 'zod';
import type { TransportKind } from '../evaluation/server-config.js';
import type { ExecutionMode } from '../linting/types.js';

/**
 * History Store — local record of evaluation and lint runs, backed by SQLite
 */

const EvaluationRunRow = z.object({
    id: z.number(),
    file: z.string(),
    model: z.string(),
    transport: z.string(),
    total: z.number(),
    correct: z.number(),
    duration_seconds: z.number(),
    report_path: z.string().nullable(),
    created_at: z.string(),
});

const LintRunRow = z.object({
    id: z.number(),
    mode: z.string(),
    files: z.number(),
    errors: z.number(),
    created_at: z.string(),
});

const AuditEventRow = z.object({
    id: z.number(),
    event_type: z.string(),
    entity_type: z.string().nullable(),
    entity_id: z.number().nullable(),
    details: z.string().nullable(),
    created_at: z.string(),
});

export type EvaluationRun = z.infer<typeof EvaluationRunRow>;
export type LintRun = z.infer<typeof LintRunRow>;
export type AuditEvent = z.infer<typeof AuditEventRow>;

export interface EvaluationRecord {
    file: string;
    model: string;
    transport: TransportKind;
    total: number;
    correct: number;
    durationSeconds: number;
    reportPath?: string;
}

export interface LintRecord {
    mode: ExecutionMode;
    files: number;
    errors: number;
}

export class HistoryStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(path.dirname(dbPath), { recursive: true });
        }

        this.db = new Database(dbPath);
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }

        this.migrate();
    }

    static open(dbPath: string): HistoryStore {
        return new HistoryStore(dbPath);
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS evaluation_runs (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                file TEXT NOT NULL,
                model TEXT NOT NULL,
                transport TEXT NOT NULL
                    CHECK(transport IN ('stdio','sse','http')),
                total INTEGER NOT NULL,
                correct INTEGER NOT NULL,
                duration_seconds REAL NOT NULL,
                report_path TEXT,
                created_at DATETIME DEFAULT (datetime('now'))
            );

            CREATE TABLE IF NOT EXISTS lint_runs (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                mode TEXT NOT NULL
                    CHECK(mode IN ('all','format-only','lint-only')),
                files INTEGER NOT NULL,
                errors INTEGER NOT NULL,
                created_at DATETIME DEFAULT (datetime('now'))
            );

            CREATE TABLE IF NOT EXISTS audit_events (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                event_type TEXT NOT NULL,
                entity_type TEXT,
                entity_id INTEGER,
                details TEXT,
                created_at DATETIME DEFAULT (datetime('now'))
            );

            CREATE INDEX IF NOT EXISTS idx_audit_entity ON audit_events(entity_type, entity_id);
        `);
    }

    // ─── Evaluation Runs ─────────────────────────────────────

    recordEvaluation(record: EvaluationRecord): EvaluationRun {
        const result = this.db.prepare(`
            INSERT INTO evaluation_runs (file, model, transport, total, correct, duration_seconds, report_path)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
            record.file,
            record.model,
            record.transport,
            record.total,
            record.correct,
            record.durationSeconds,
            record.reportPath ?? null
        );
        const id = Number(result.lastInsertRowid);

        this.logAudit('evaluation.record', 'evaluation_run', id, `${record.correct}/${record.total} ${record.file}`);

        return EvaluationRunRow.parse(this.db.prepare('SELECT * FROM evaluation_runs WHERE id = ?').get(id));
    }

    /**
     * Most recent first
     */
    listEvaluations(limit = 20): EvaluationRun[] {
        const rows = this.db.prepare(
            'SELECT * FROM evaluation_runs ORDER BY id DESC LIMIT ?'
        ).all(limit);
        return z.array(EvaluationRunRow).parse(rows);
    }

    // ─── Lint Runs ─────────────────────────────────────

    recordLint(record: LintRecord): LintRun {
        const result = this.db.prepare(`
            INSERT INTO lint_runs (mode, files, errors) VALUES (?, ?, ?)
        `).run(record.mode, record.files, record.errors);
        const id = Number(result.lastInsertRowid);

        this.logAudit('lint.record', 'lint_run', id, `${record.errors} errors in ${record.files} files`);

        return LintRunRow.parse(this.db.prepare('SELECT * FROM lint_runs WHERE id = ?').get(id));
    }

    listLintRuns(limit = 20): LintRun[] {
        const rows = this.db.prepare('SELECT * FROM lint_runs ORDER BY id DESC LIMIT ?').all(limit);
        return z.array(LintRunRow).parse(rows);
    }

    // ─── Audit Operations ─────────────────────────────────────

    private logAudit(eventType: string, entityType: string, entityId: number, details: string): void {
        this.db.prepare(`
            INSERT INTO audit_events (event_type, entity_type, entity_id, details)
            VALUES (?, ?, ?, ?)
        `).run(eventType, entityType, entityId, details);
    }

    getAuditLog(limit = 20): AuditEvent[] {
        const rows = this.db.prepare('SELECT * FROM audit_events ORDER BY id DESC LIMIT ?').all(limit);
        return z.array(AuditEventRow).parse(rows);
    }

    // ─── Cleanup ─────────────────────────────────────────────

    close(): void {
        this.db.close();
    }
}
