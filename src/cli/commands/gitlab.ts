import { Command } from 'commander';
import chalk from 'chalk';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { GitLabError, WorkbenchError } from '../../errors.js';
import { DocsSync } from '../../gitlab/docs-sync.js';
import { renderMarkdown, resolveGitLabToken } from '../../gitlab/glfm.js';
import { PublishTokenSetup } from '../../gitlab/publish-token.js';
import { ExecFileRunner } from '../../utils/exec.js';
import { loadContext, runAction } from '../context.js';
import { Spinner } from '../ui/spinner.js';

const REPORT_COLOURS: Record<string, (text: string) => string> = {
    'ERROR:': chalk.red,
    'DONE:': chalk.green,
    'OK:': chalk.green,
    'INFO:': chalk.dim,
};

function colourReportLine(line: string): string {
    const prefix = line.split(' ', 1)[0] ?? '';
    const colour = REPORT_COLOURS[prefix];
    return colour ? colour(line) : line;
}

const STAGE_LABELS = {
    download: 'Downloading documentation archive',
    extract: 'Extracting archive',
    validate: 'Validating extraction',
    groom: 'Grooming markdown',
    index: 'Updating SKILL.md index',
    replace: 'Replacing references/ci',
} as const;

function formatRemaining(ms: number): string {
    const hours = Math.floor(ms / 3_600_000);
    const minutes = Math.floor((ms % 3_600_000) / 60_000);
    return hours >= 24
        ? `${Math.floor(hours / 24)}d ${hours % 24}h`
        : `${hours}h ${minutes}m`;
}

export function createGitLabCommand(): Command {
    const cmd = new Command('gitlab')
        .description('GitLab helpers: markdown rendering, CI publish token, CI docs sync');

    // ─── Render GLFM ───
    cmd.command('render')
        .description('Render GitLab Flavored Markdown through the GitLab API')
        .option('-f, --file <file>', 'Markdown file to render')
        .option('-m, --markdown <text>', 'Inline markdown to render')
        .option('-o, --output <file>', 'Save the rendered HTML to a file')
        .option('-p, --project <path>', 'Project path for reference resolution (group/project)')
        .option('--gitlab-url <url>', 'GitLab instance URL (default from config)')
        .action(runAction(async (opts: {
            file?: string;
            markdown?: string;
            output?: string;
            project?: string;
            gitlabUrl?: string;
        }) => {
            if (Boolean(opts.file) === Boolean(opts.markdown)) {
                throw new WorkbenchError('Pass exactly one of --file or --markdown');
            }

            const ctx = await loadContext();
            const token = await resolveGitLabToken();
            if (!token) {
                throw new GitLabError('GITLAB_TOKEN not found in environment or ~/.bashrc');
            }

            const text = opts.file ? await readFile(path.resolve(opts.file), 'utf-8') : opts.markdown ?? '';
            const html = await renderMarkdown({
                text,
                gitlabUrl: opts.gitlabUrl ?? ctx.config.gitlab.url,
                token,
                project: opts.project,
            });

            if (opts.output) {
                await writeFile(opts.output, html, 'utf-8');
                console.error(chalk.green(`✓ Rendered HTML saved to: ${opts.output}`));
            } else {
                console.log(html);
            }
        }));

    // ─── Publish token ───
    cmd.command('publish-token')
        .description('Create or renew the CI publish token and its CI/CD variable (needs glab)')
        .action(runAction(async () => {
            const setup = new PublishTokenSetup({
                cwd: process.cwd(),
                runner: new ExecFileRunner(),
                report: line => console.log(colourReportLine(line)),
            });
            const outcome = await setup.run();
            process.exitCode = outcome.exitCode;
        }));

    // ─── Sync CI docs ───
    cmd.command('sync-docs')
        .description('Download GitLab CI documentation into a skill\'s references/ci directory')
        .option('-w, --working-dir <dir>', 'Skill directory holding SKILL.md (default: current directory)')
        .option('--no-cleanup', 'Keep the downloaded archive and staging directory')
        .option('--force', 'Ignore the cooldown since the last successful sync')
        .action(runAction(async (opts: { workingDir?: string; cleanup: boolean; force?: boolean }) => {
            const ctx = await loadContext();
            const spinner = new Spinner();
            const sync = new DocsSync({
                workingDir: path.resolve(opts.workingDir ?? process.cwd()),
                url: ctx.config.gitlab.docsUrl,
                force: opts.force,
                cleanup: opts.cleanup,
                cooldownDays: ctx.config.gitlab.cooldownDays,
                onStage: stage => spinner.start(STAGE_LABELS[stage]),
            });

            try {
                const result = await sync.run();
                spinner.stop();
                if (result.status === 'cooldown') {
                    console.log(chalk.yellow(
                        `⏳ Last successful sync ${result.lastRun.toISOString()}; ` +
                        `next allowed in ${formatRemaining(result.remainingMs)} (use --force to override)`
                    ));
                    return;
                }
                console.log(chalk.green(`✓ Updated ${result.filesProcessed} pages in ${result.docsDir}`));
            } catch (err) {
                spinner.fail('Update failed');
                throw err;
            }
        }));

    return cmd;
}
