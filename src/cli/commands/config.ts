import { Command } from 'commander';
import chalk from 'chalk';
import { pathExists } from '../../utils/fs.js';
import { loadContext, runAction } from '../context.js';

export function createConfigCommand(): Command {
    const cmd = new Command('config')
        .description('Inspect workbench configuration');

    cmd.command('show')
        .description('Print the effective configuration (file merged over defaults)')
        .action(runAction(async () => {
            const ctx = await loadContext();
            const source = (await pathExists(ctx.configLoader.configPath))
                ? ctx.configLoader.configPath
                : 'defaults (no workbench.config.json)';

            console.error(chalk.dim(`# ${source}`));
            console.log(JSON.stringify(ctx.config, null, 2));
        }));

    return cmd;
}
