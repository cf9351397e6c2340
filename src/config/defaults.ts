import type { WorkbenchConfig } from './schema.js';

export const CONFIG_FILENAME = 'workbench.config.json';

export const DEFAULT_CONFIG: WorkbenchConfig = {
    logLevel: 'warn',
    plugins: {
        root: '.',
        pluginsDir: 'plugins',
        skillsDir: '~/.claude/skills',
        commandsDir: '~/.claude/commands',
        agentsDir: '~/.claude/agents',
        maxSkillLines: 500,
    },
    evaluation: {
        model: 'claude-3-7-sonnet-20250219',
        maxTokens: 4096,
        maxTurns: 25,
    },
    linting: {
        configFile: 'CLAUDE.md',
        timeoutMs: 60_000,
        commands: {},
    },
    gitlab: {
        url: 'https://gitlab.com',
        docsUrl: 'https://gitlab.com/gitlab-org/gitlab/-/archive/master/gitlab-master.tar.gz?path=doc/ci',
        cooldownDays: 3,
    },
    history: {
        dbPath: '.workbench/history.db',
    },
};
