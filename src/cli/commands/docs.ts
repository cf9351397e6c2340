import { Command, Option } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { DocumentLoader, SKILL_FILENAME, inferDocumentKind } from '../../documents/loader.js';
import { DOCUMENT_KINDS, type DocumentKind } from '../../documents/types.js';
import { WorkbenchError } from '../../errors.js';
import { PluginLoader } from '../../plugins/loader.js';
import { isDirectory } from '../../utils/fs.js';
import { loadContext, runAction } from '../context.js';
import { renderHeading, renderIssue, truncate } from '../ui/render.js';

const KIND_ICONS: Record<DocumentKind, string> = {
    skill: '📘',
    agent: '🤖',
    command: '⌘',
};

export function createDocsCommand(): Command {
    const cmd = new Command('docs')
        .description('List and validate skills, agents and commands');

    // ─── List documents ───
    cmd.command('list')
        .description('List documents provided by plugins')
        .addOption(new Option('-k, --kind <kind>', 'Only this kind').choices(DOCUMENT_KINDS))
        .action(runAction(async (opts: { kind?: DocumentKind }) => {
            const ctx = await loadContext();
            const loader = new PluginLoader();
            const plugins = await loader.loadAll(
                path.resolve(ctx.resolve(ctx.config.plugins.root), ctx.config.plugins.pluginsDir)
            );

            const kinds = opts.kind ? [opts.kind] : DOCUMENT_KINDS;
            for (const kind of kinds) {
                const docs = plugins.flatMap(p => {
                    if (kind === 'skill') return p.skills;
                    return kind === 'agent' ? p.agents : p.commands;
                });
                if (docs.length === 0) continue;

                renderHeading(`${KIND_ICONS[kind]} ${kind}s (${docs.length})`);
                for (const doc of docs.sort((a, b) => a.name.localeCompare(b.name))) {
                    console.log(`  ${chalk.cyan(doc.name)} ${chalk.dim(`[${doc.source}]`)}`);
                    if (doc.description) {
                        console.log(chalk.dim(`    ${truncate(doc.description, 76)}`));
                    }
                }
            }
            console.log();
        }));

    // ─── Validate loose documents ───
    cmd.command('validate')
        .description('Validate the frontmatter of document files or skill directories')
        .argument('<paths...>', 'SKILL.md files, skill directories, or agent/command .md files')
        .addOption(new Option('-k, --kind <kind>', 'Kind for files outside agents/ or commands/').choices(DOCUMENT_KINDS))
        .action(runAction(async (paths: string[], opts: { kind?: DocumentKind }) => {
            const loader = new DocumentLoader();

            for (const target of paths) {
                const abs = path.resolve(target);
                if (await isDirectory(abs)) {
                    await loader.loadSkill(abs);
                    continue;
                }

                const kind = opts.kind ?? inferDocumentKind(abs);
                if (!kind) {
                    throw new WorkbenchError(`Cannot tell the kind of ${target}; pass --kind or name it ${SKILL_FILENAME}`);
                }
                await loader.loadFile(kind, abs);
            }

            for (const doc of loader.list()) {
                console.log(`  ${chalk.green('✓')} ${doc.kind} ${chalk.bold(doc.name)}`);
            }

            const diagnostics = loader.diagnostics;
            for (const diagnostic of diagnostics) {
                renderIssue(diagnostic.severity, diagnostic.message, diagnostic.path);
            }
            if (diagnostics.some(d => d.severity === 'error')) {
                process.exitCode = 1;
            }
        }));

    return cmd;
}
