import { z } from 'zod';
import type { DocumentKind } from './types.js';

// ─── Frontmatter Schemas ───
//
// These mirror the fields the assistant host reads. Unknown keys pass
// through untouched: hosts add fields faster than tools can follow.

const KEBAB_NAME = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const nameField = z
    .string({ required_error: 'is required' })
    .min(1, 'must not be empty')
    .max(64, 'must be at most 64 characters')
    .regex(KEBAB_NAME, 'must be lowercase kebab-case (a-z, 0-9, -)');

const listField = z.union([z.string(), z.array(z.string())]);

export const SkillFrontmatterSchema = z
    .object({
        name: nameField,
        description: z
            .string({ required_error: 'is required' })
            .min(1, 'must not be empty')
            .max(1024, 'must be at most 1024 characters'),
        'allowed-tools': listField.optional(),
        model: z.string().optional(),
        license: z.string().optional(),
        version: z.union([z.string(), z.number()]).optional(),
        metadata: z.record(z.unknown()).optional(),
    })
    .passthrough();

export const PERMISSION_MODES = ['default', 'acceptEdits', 'bypassPermissions', 'plan', 'ignore'] as const;

export const AgentFrontmatterSchema = z
    .object({
        name: nameField,
        description: z.string({ required_error: 'is required' }).min(1, 'must not be empty'),
        model: z.string().optional(),
        tools: listField.optional(),
        permissionMode: z.enum(PERMISSION_MODES).optional(),
        skills: listField.optional(),
        color: z.string().optional(),
    })
    .passthrough();

export const CommandFrontmatterSchema = z
    .object({
        description: z.string().optional(),
        'allowed-tools': listField.optional(),
        'argument-hint': z.string().optional(),
        model: z.string().optional(),
        'disable-model-invocation': z.boolean().optional(),
    })
    .passthrough();

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;
export type AgentFrontmatter = z.infer<typeof AgentFrontmatterSchema>;
export type CommandFrontmatter = z.infer<typeof CommandFrontmatterSchema>;

const SCHEMAS: Record<DocumentKind, z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>> = {
    skill: SkillFrontmatterSchema,
    agent: AgentFrontmatterSchema,
    command: CommandFrontmatterSchema,
};

export type FrontmatterValidation =
    | { ok: true; data: Record<string, unknown> }
    | { ok: false; issues: string[] };

/**
 * Validate parsed frontmatter against the schema for its document kind.
 * Issues are rendered as `field: message`.
 */
export function validateFrontmatter(kind: DocumentKind, frontmatter: Record<string, unknown>): FrontmatterValidation {
    const result = SCHEMAS[kind].safeParse(frontmatter);
    if (result.success) {
        return { ok: true, data: result.data };
    }
    return {
        ok: false,
        issues: result.error.issues.map(issue => `${issue.path.join('.') || 'frontmatter'}: ${issue.message}`),
    };
}
