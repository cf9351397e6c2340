import { Command, Option } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { installAgentFile, resolveAgentsDir, type InstallScope } from '../../plugins/agent-installer.js';
import { ExecFileRunner } from '../../utils/exec.js';
import { runAction } from '../context.js';

export function createAgentsCommand(): Command {
    const cmd = new Command('agents')
        .description('Install standalone agent definitions');

    cmd.command('install')
        .description('Copy an agent file into the user or project agents directory')
        .argument('<file>', 'Agent markdown file')
        .addOption(new Option('-s, --scope <scope>', 'Install scope').choices(['user', 'project']).default('user'))
        .option('-f, --force', 'Overwrite a target whose contents differ')
        .action(runAction(async (file: string, opts: { scope: InstallScope; force?: boolean }) => {
            const targetDir = await resolveAgentsDir(opts.scope, new ExecFileRunner());
            const outcome = await installAgentFile(path.resolve(file), targetDir, { force: opts.force });

            switch (outcome.status) {
                case 'installed':
                    console.log(chalk.green(`✓ Installed ${outcome.target}`));
                    break;
                case 'unchanged':
                    console.log(chalk.dim(`= ${outcome.target} is already up to date`));
                    break;
                case 'updated':
                    console.log(chalk.green(`✓ Updated ${outcome.target}`));
                    break;
                case 'conflict':
                    console.log(chalk.yellow(`⚠ ${outcome.target} differs from ${file}\n`));
                    console.log(chalk.bold('  Installed:'));
                    for (const line of outcome.existingPreview) console.log(chalk.red(`  - ${line}`));
                    console.log(chalk.bold('\n  Incoming:'));
                    for (const line of outcome.incomingPreview) console.log(chalk.green(`  + ${line}`));
                    console.log(chalk.dim('\n  Re-run with --force to overwrite.'));
                    process.exitCode = 1;
                    break;
            }
        }));

    return cmd;
}
