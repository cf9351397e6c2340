import type { TaskResult } from './types.js';

export interface EvaluationSummary {
    total: number;
    correct: number;
    accuracy: number;
    averageDuration: number;
    averageToolCalls: number;
    totalToolCalls: number;
}

export function summarizeResults(results: TaskResult[]): EvaluationSummary {
    const total = results.length;
    const correct = results.filter(r => r.score === 1).length;
    const totalToolCalls = results.reduce((sum, r) => sum + r.numToolCalls, 0);
    const totalDuration = results.reduce((sum, r) => sum + r.durationSeconds, 0);

    return {
        total,
        correct,
        accuracy: total > 0 ? (correct / total) * 100 : 0,
        averageDuration: total > 0 ? totalDuration / total : 0,
        averageToolCalls: total > 0 ? totalToolCalls / total : 0,
        totalToolCalls,
    };
}

/**
 * Markdown report of an evaluation run
 */
export function renderReport(results: TaskResult[]): string {
    const s = summarizeResults(results);
    const lines: string[] = [
        '# Evaluation Report',
        '',
        '## Summary',
        '',
        `- **Accuracy**: ${s.correct}/${s.total} (${s.accuracy.toFixed(1)}%)`,
        `- **Average Task Duration**: ${s.averageDuration.toFixed(2)}s`,
        `- **Average Tool Calls per Task**: ${s.averageToolCalls.toFixed(2)}`,
        `- **Total Tool Calls**: ${s.totalToolCalls}`,
        '',
        '---',
    ];

    results.forEach((result, i) => {
        lines.push(
            '',
            `### Task ${i + 1}`,
            '',
            `**Question**: ${result.question}`,
            `**Ground Truth Answer**: \`${result.expected}\``,
            `**Actual Answer**: \`${result.actual ?? 'N/A'}\``,
            `**Correct**: ${result.score === 1 ? '✅' : '❌'}`,
            `**Duration**: ${result.durationSeconds.toFixed(2)}s`,
            `**Tool Calls**: ${result.numToolCalls}`,
        );

        const tools = Object.entries(result.toolCalls);
        if (tools.length > 0) {
            lines.push('', '| Tool | Calls | Avg Duration |', '| --- | --- | --- |');
            for (const [name, metric] of tools) {
                const avg = metric.durations.length > 0
                    ? metric.durations.reduce((a, b) => a + b, 0) / metric.durations.length
                    : 0;
                lines.push(`| ${name} | ${metric.count} | ${avg.toFixed(2)}s |`);
            }
        }

        if (result.error) {
            lines.push('', `**Error**: ${result.error}`);
        }

        lines.push(
            '',
            '**Summary**',
            result.summary ?? 'N/A',
            '',
            '**Feedback**',
            result.feedback ?? 'N/A',
            '',
            '---',
        );
    });

    return `${lines.join('\n')}\n`;
}
