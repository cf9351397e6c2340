import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { WorkbenchError } from '../../errors.js';
import { PluginDoctor } from '../../plugins/doctor.js';
import { PluginInstaller, summarize } from '../../plugins/installer.js';
import { PluginLoader } from '../../plugins/loader.js';
import { scaffoldPlugin } from '../../plugins/scaffold.js';
import { loadContext, runAction, type CliContext } from '../context.js';
import { renderHeading, renderInstallResult, renderIssue } from '../ui/render.js';

function pluginsDir(ctx: CliContext): string {
    return path.resolve(ctx.resolve(ctx.config.plugins.root), ctx.config.plugins.pluginsDir);
}

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Inspect, validate and install plugin bundles');

    // ─── List plugins ───
    cmd.command('list')
        .description('List plugins in the plugins directory')
        .action(runAction(async () => {
            const ctx = await loadContext();
            const loader = new PluginLoader();
            const plugins = await loader.loadAll(pluginsDir(ctx));

            if (plugins.length === 0 && loader.failures.length === 0) {
                console.log(chalk.dim(`\nNo plugins found in ${pluginsDir(ctx)}.`));
                console.log(chalk.dim(`Create one:\n  ${chalk.white('workbench plugins new')}\n`));
                return;
            }

            renderHeading(`🔌 Plugins (${plugins.length})`);
            for (const plugin of plugins) {
                console.log(`  ${chalk.cyan.bold(plugin.manifest.name)} ${chalk.dim(`v${plugin.manifest.version}`)}`);
                if (plugin.manifest.description) {
                    console.log(`    ${plugin.manifest.description}`);
                }

                const parts: string[] = [];
                if (plugin.skills.length > 0) parts.push(`${plugin.skills.length} skills`);
                if (plugin.agents.length > 0) parts.push(`${plugin.agents.length} agents`);
                if (plugin.commands.length > 0) parts.push(`${plugin.commands.length} commands`);
                const servers = Object.keys(plugin.mcpServers).length;
                if (servers > 0) parts.push(`${servers} MCP servers`);

                if (parts.length > 0) {
                    console.log(chalk.dim(`    Provides: ${parts.join(', ')}`));
                }
                console.log();
            }

            for (const failure of loader.failures) {
                renderIssue('error', failure.error, failure.path);
            }
        }));

    // ─── Validate plugins ───
    cmd.command('validate')
        .description('Check plugin manifests and components')
        .argument('[name]', 'Only validate this plugin')
        .action(runAction(async (name: string | undefined) => {
            const ctx = await loadContext();
            const loader = new PluginLoader();
            const doctor = new PluginDoctor({ maxSkillLines: ctx.config.plugins.maxSkillLines });

            let plugins = await loader.loadAll(pluginsDir(ctx));
            if (name) {
                plugins = plugins.filter(p => p.manifest.name === name);
                if (plugins.length === 0) throw new WorkbenchError(`Plugin "${name}" not found`);
            }

            let failed = name ? 0 : loader.failures.length;
            if (!name) {
                for (const failure of loader.failures) {
                    console.log(`  ${chalk.red('✗')} ${chalk.bold(path.basename(failure.path))}`);
                    renderIssue('error', failure.error);
                }
            }

            for (const report of await doctor.checkAll(plugins)) {
                const icon = report.healthy ? chalk.green('✓') : chalk.red('✗');
                console.log(`  ${icon} ${chalk.bold(report.plugin)}`);
                for (const issue of report.issues) {
                    renderIssue(issue.severity, issue.message, issue.path);
                }
                if (!report.healthy) failed++;
            }

            console.log();
            if (failed > 0) {
                console.log(chalk.red(`${failed} plugin(s) failed validation`));
                process.exitCode = 1;
            } else {
                console.log(chalk.green('All plugins valid'));
            }
        }));

    // ─── Install plugins ───
    cmd.command('install')
        .description('Symlink plugin skills, commands and agents into the host directories')
        .option('--dry-run', 'Show what would be installed')
        .action(runAction(async (opts: { dryRun?: boolean }) => {
            const ctx = await loadContext();
            const installer = new PluginInstaller({
                pluginsDir: pluginsDir(ctx),
                skillsDir: ctx.resolve(ctx.config.plugins.skillsDir),
                commandsDir: ctx.resolve(ctx.config.plugins.commandsDir),
                agentsDir: ctx.resolve(ctx.config.plugins.agentsDir),
            });

            const dryRun = opts.dryRun ?? false;
            const results = await installer.installAll(dryRun);

            renderHeading(dryRun ? '📦 Install plan' : '📦 Installing plugins');
            for (const [plugin, components] of Object.entries(results)) {
                console.log(`  ${chalk.cyan.bold(plugin)}`);
                for (const [component, result] of Object.entries(components)) {
                    renderInstallResult(component, result.status, result.message);
                }
            }

            const counts = summarize(results);
            console.log(chalk.dim(
                `\n  ${counts.newly_installed} installed, ${counts.already_installed} unchanged, ` +
                `${counts.skipped} skipped, ${counts.error} errors (${counts.total} total)\n`
            ));
            if (counts.error > 0) process.exitCode = 1;
        }));

    // ─── Scaffold a plugin ───
    cmd.command('new')
        .description('Create a new plugin skeleton')
        .option('-n, --name <name>', 'Plugin name (kebab-case)')
        .option('-d, --description <text>', 'One-line description')
        .option('-a, --author <name>', 'Author name')
        .option('--skill', 'Include a starter skill')
        .option('--agent', 'Include a starter agent')
        .option('--command', 'Include a starter command')
        .action(runAction(async (opts: {
            name?: string;
            description?: string;
            author?: string;
            skill?: boolean;
            agent?: boolean;
            command?: boolean;
        }) => {
            const ctx = await loadContext();
            const answers = await askMissing(opts);

            const result = await scaffoldPlugin({
                root: ctx.resolve(ctx.config.plugins.root),
                pluginsDir: ctx.config.plugins.pluginsDir,
                ...answers,
            });

            console.log(chalk.green(`\n✓ Created ${path.relative(process.cwd(), result.pluginDir) || result.pluginDir}`));
            for (const file of result.files) {
                console.log(chalk.dim(`  ${file}`));
            }
            console.log();
        }));

    return cmd;
}

interface ScaffoldAnswers {
    name: string;
    description: string;
    author?: string;
    withSkill: boolean;
    withAgent: boolean;
    withCommand: boolean;
}

const KEBAB = /^[a-z0-9]+(-[a-z0-9]+)*$/;

/**
 * Prompt for whatever the flags left out
 */
async function askMissing(opts: {
    name?: string;
    description?: string;
    author?: string;
    skill?: boolean;
    agent?: boolean;
    command?: boolean;
}): Promise<ScaffoldAnswers> {
    const componentsGiven = opts.skill !== undefined || opts.agent !== undefined || opts.command !== undefined;
    if (opts.name && opts.description && componentsGiven) {
        return {
            name: opts.name,
            description: opts.description,
            author: opts.author,
            withSkill: opts.skill ?? false,
            withAgent: opts.agent ?? false,
            withCommand: opts.command ?? false,
        };
    }

    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ name: string; description: string; author: string; components: string[] }>([
        {
            type: 'input',
            name: 'name',
            message: 'Plugin name (kebab-case):',
            default: opts.name,
            when: !opts.name,
            validate: (input: string) => KEBAB.test(input) || 'Use lowercase letters, digits and hyphens',
        },
        {
            type: 'input',
            name: 'description',
            message: 'Description:',
            when: !opts.description,
            validate: (input: string) => input.trim().length > 0 || 'A description is required',
        },
        {
            type: 'input',
            name: 'author',
            message: 'Author (optional):',
            when: opts.author === undefined,
        },
        {
            type: 'checkbox',
            name: 'components',
            message: 'Starter components:',
            choices: [
                { name: 'Skill', value: 'skill', checked: true },
                { name: 'Agent', value: 'agent' },
                { name: 'Command', value: 'command' },
            ],
            when: !componentsGiven,
        },
    ]);

    const picked = (component: 'skill' | 'agent' | 'command'): boolean =>
        componentsGiven ? opts[component] ?? false : answers.components.includes(component);

    return {
        name: opts.name ?? answers.name,
        description: opts.description ?? answers.description,
        author: opts.author ?? (answers.author?.trim() || undefined),
        withSkill: picked('skill'),
        withAgent: picked('agent'),
        withCommand: picked('command'),
    };
}
