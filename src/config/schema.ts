import { z } from 'zod';

/**
 * workbench.config.json schema
 *
 * Every section is optional in the file; ConfigLoader merges the
 * parsed file over DEFAULT_CONFIG before validating.
 */
export const WorkbenchConfigSchema = z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),

    plugins: z.object({
        /** Repository root containing the plugins directory */
        root: z.string(),
        /** Plugins directory, relative to root */
        pluginsDir: z.string(),
        /** Symlink targets used by `plugins install` */
        skillsDir: z.string(),
        commandsDir: z.string(),
        agentsDir: z.string(),
        /** SKILL.md bodies longer than this draw a doctor warning */
        maxSkillLines: z.number().int().positive(),
    }),

    evaluation: z.object({
        model: z.string().min(1),
        maxTokens: z.number().int().positive(),
        maxTurns: z.number().int().positive(),
    }),

    linting: z.object({
        /** File holding the LINTERS section */
        configFile: z.string(),
        timeoutMs: z.number().int().positive(),
        /** Per-tool command overrides, e.g. { "eslint": ["pnpm", "eslint"] } */
        commands: z.record(z.array(z.string()).min(1)),
    }),

    gitlab: z.object({
        url: z.string().url(),
        docsUrl: z.string().url(),
        cooldownDays: z.number().nonnegative(),
    }),

    history: z.object({
        dbPath: z.string(),
    }),
});

export type WorkbenchConfig = z.infer<typeof WorkbenchConfigSchema>;
