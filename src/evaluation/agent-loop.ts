import { performance } from 'node:perf_hooks';
import { EvaluationError, errorMessage } from '../errors.js';
import type {
    ConversationMessage,
    ModelClient,
    ToolCallMetric,
    ToolResultBlock,
    ToolSpec,
} from './types.js';

export const EVALUATION_PROMPT = `You are an AI assistant with access to tools.

When given a task, you MUST:
1. Use the available tools to complete the task
2. Provide a summary of each step in your approach, wrapped in <summary> tags
3. Provide feedback on the tools provided, wrapped in <feedback> tags
4. Provide your final response, wrapped in <response> tags

Summary Requirements:
- In your <summary> tags, explain the steps you took and which tools you used, in order
- State the inputs you gave each tool and what it returned
- Explain how you arrived at the final response

Feedback Requirements:
- In your <feedback> tags, comment on the tool names: are they clear and descriptive?
- Comment on the input parameters: are they documented, and are required and optional inputs distinguished?
- Comment on the descriptions: do they say what the tool does and when to use it?
- Note any errors you hit and anything that would make the tools easier to use

Response Requirements:
- Your response must be concise and answer exactly what was asked
- Always wrap your final response in <response> tags
- If you cannot solve the task, return <response>NOT_FOUND</response>
- For numeric answers, give the number only
- For IDs, give the ID only
- For names or text, give the exact text requested, nothing else`;

/**
 * Anything that can execute a tool by name
 */
export interface ToolExecutor {
    callTool(name: string, args: Record<string, unknown>): Promise<string>;
}

export interface AgentLoopOptions {
    model: string;
    maxTokens: number;
    maxTurns: number;
    systemPrompt?: string;
}

export interface AgentLoopResult {
    /** Text of the final model response */
    text: string;
    toolCalls: Record<string, ToolCallMetric>;
    numToolCalls: number;
}

/**
 * Ask the model a question, executing its tool calls until it stops
 * asking for tools.
 */
export async function runAgentLoop(
    model: ModelClient,
    question: string,
    tools: ToolSpec[],
    executor: ToolExecutor,
    options: AgentLoopOptions
): Promise<AgentLoopResult> {
    const messages: ConversationMessage[] = [{ role: 'user', content: question }];
    const toolCalls: Record<string, ToolCallMetric> = {};
    let numToolCalls = 0;

    for (let turn = 1; turn <= options.maxTurns; turn++) {
        const response = await model.createMessage({
            model: options.model,
            system: options.systemPrompt ?? EVALUATION_PROMPT,
            maxTokens: options.maxTokens,
            messages,
            tools,
        });

        const requested = response.content.some(block => block.type === 'tool_use');
        if (response.stopReason !== 'tool_use' || !requested) {
            const text = response.content
                .flatMap(block => (block.type === 'text' ? [block.text] : []))
                .join('\n');
            return { text, toolCalls, numToolCalls };
        }

        messages.push({ role: 'assistant', content: response.content });

        const results: ToolResultBlock[] = [];
        for (const block of response.content) {
            if (block.type !== 'tool_use') continue;

            const metric = toolCalls[block.name] ?? { count: 0, durations: [] };
            toolCalls[block.name] = metric;

            const started = performance.now();
            try {
                const output = await executor.callTool(block.name, asArguments(block.input));
                results.push({ type: 'tool_result', tool_use_id: block.id, content: output });
            } catch (err) {
                results.push({
                    type: 'tool_result',
                    tool_use_id: block.id,
                    content: `Error executing tool ${block.name}: ${errorMessage(err)}`,
                    is_error: true,
                });
            }

            metric.count++;
            metric.durations.push((performance.now() - started) / 1000);
            numToolCalls++;
        }

        messages.push({ role: 'user', content: results });
    }

    throw new EvaluationError(`Agent did not finish within ${options.maxTurns} turns`);
}

function asArguments(input: unknown): Record<string, unknown> {
    if (!input || typeof input !== 'object' || Array.isArray(input)) return {};
    return Object.fromEntries(Object.entries(input));
}
