import { Command } from 'commander';
import { createAgentsCommand } from './commands/agents.js';
import { createConfigCommand } from './commands/config.js';
import { createDocsCommand } from './commands/docs.js';
import { createEvalCommand } from './commands/eval.js';
import { createGitLabCommand } from './commands/gitlab.js';
import { createHistoryCommand } from './commands/history.js';
import { createLintCommand } from './commands/lint.js';
import { createPluginsCommand } from './commands/plugins.js';

export const VERSION = '0.4.0';

export function createCLI(): Command {
    const program = new Command('workbench')
        .description('Toolkit for authoring assistant plugins: validate, install, evaluate and lint')
        .version(VERSION);

    program.addCommand(createPluginsCommand());
    program.addCommand(createDocsCommand());
    program.addCommand(createAgentsCommand());
    program.addCommand(createEvalCommand());
    program.addCommand(createLintCommand());
    program.addCommand(createGitLabCommand());
    program.addCommand(createHistoryCommand());
    program.addCommand(createConfigCommand());

    return program;
}
