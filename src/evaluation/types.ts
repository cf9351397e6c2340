/**
 * Evaluation harness — Types
 *
 * Message shapes follow the Anthropic Messages API so the real client is
 * a thin adapter and tests can script responses directly.
 */

export interface QaPair {
    question: string;
    answer: string;
}

// ─── Model I/O ───

export interface TextBlock {
    type: 'text';
    text: string;
}

export interface ToolUseBlock {
    type: 'tool_use';
    id: string;
    name: string;
    input: unknown;
}

export type ContentBlock = TextBlock | ToolUseBlock;

export interface ToolResultBlock {
    type: 'tool_result';
    tool_use_id: string;
    content: string;
    is_error?: boolean;
}

export type ConversationMessage =
    | { role: 'user'; content: string | ToolResultBlock[] }
    | { role: 'assistant'; content: ContentBlock[] };

export interface ToolSpec {
    name: string;
    description: string;
    input_schema: Record<string, unknown>;
}

export interface ModelRequest {
    model: string;
    system: string;
    maxTokens: number;
    messages: ConversationMessage[];
    tools: ToolSpec[];
}

export interface ModelResponse {
    content: ContentBlock[];
    /** `tool_use` while the model wants tool results */
    stopReason: string | null;
}

export interface ModelClient {
    createMessage(request: ModelRequest): Promise<ModelResponse>;
}

// ─── Results ───

export interface ToolCallMetric {
    count: number;
    /** Seconds per call */
    durations: number[];
}

export interface TaskResult {
    question: string;
    expected: string;
    actual: string | null;
    score: 0 | 1;
    durationSeconds: number;
    toolCalls: Record<string, ToolCallMetric>;
    numToolCalls: number;
    summary: string | null;
    feedback: string | null;
    error?: string;
}
