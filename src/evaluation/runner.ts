import { performance } from 'node:perf_hooks';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { runAgentLoop, type AgentLoopOptions, type ToolExecutor } from './agent-loop.js';
import type { ModelClient, QaPair, TaskResult, ToolSpec } from './types.js';

/**
 * Content of the last `<tag>…</tag>` in `text`, trimmed
 */
export function extractTag(text: string, tag: string): string | null {
    const pattern = new RegExp(`<${tag}>(.*?)</${tag}>`, 'gs');
    let last: string | null = null;
    for (const match of text.matchAll(pattern)) {
        last = match[1] ?? '';
    }
    return last === null ? null : last.trim();
}

export interface ToolSource extends ToolExecutor {
    listTools(): Promise<ToolSpec[]>;
}

/**
 * Run one question; failures become a zero score instead of an exception
 */
export async function evaluateTask(
    pair: QaPair,
    model: ModelClient,
    tools: ToolSpec[],
    executor: ToolExecutor,
    options: AgentLoopOptions
): Promise<TaskResult> {
    const started = performance.now();

    try {
        const loop = await runAgentLoop(model, pair.question, tools, executor, options);
        const actual = extractTag(loop.text, 'response');

        return {
            question: pair.question,
            expected: pair.answer,
            actual,
            score: actual !== null && actual === pair.answer.trim() ? 1 : 0,
            durationSeconds: (performance.now() - started) / 1000,
            toolCalls: loop.toolCalls,
            numToolCalls: loop.numToolCalls,
            summary: extractTag(loop.text, 'summary'),
            feedback: extractTag(loop.text, 'feedback'),
        };
    } catch (err) {
        return {
            question: pair.question,
            expected: pair.answer,
            actual: null,
            score: 0,
            durationSeconds: (performance.now() - started) / 1000,
            toolCalls: {},
            numToolCalls: 0,
            summary: null,
            feedback: null,
            error: errorMessage(err),
        };
    }
}

export type ProgressCallback = (event: { index: number; total: number; pair: QaPair; result?: TaskResult }) => void;

export interface EvaluationRunnerOptions extends AgentLoopOptions {
    log?: Logger;
    onProgress?: ProgressCallback;
}

/**
 * Evaluation Runner — asks every question in turn against one MCP server
 */
export class EvaluationRunner {
    private log: Logger;

    constructor(
        private model: ModelClient,
        private source: ToolSource,
        private options: EvaluationRunnerOptions
    ) {
        this.log = (options.log ?? rootLogger).child('eval');
    }

    async run(pairs: QaPair[]): Promise<TaskResult[]> {
        const tools = await this.source.listTools();
        this.log.info(`Evaluating ${pairs.length} tasks with ${tools.length} tools`, { model: this.options.model });

        const results: TaskResult[] = [];
        for (const [i, pair] of pairs.entries()) {
            this.options.onProgress?.({ index: i, total: pairs.length, pair });

            const result = await evaluateTask(pair, this.model, tools, this.source, this.options);
            if (result.error) {
                this.log.warn(`Task ${i + 1} failed`, { error: result.error });
            }

            results.push(result);
            this.options.onProgress?.({ index: i, total: pairs.length, pair, result });
        }
        return results;
    }
}
