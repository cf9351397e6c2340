import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock, ModelClient, ModelRequest, ModelResponse } from './types.js';

/**
 * Anthropic Messages API adapter
 */
export class AnthropicModelClient implements ModelClient {
    private client: Anthropic;

    constructor(options?: { apiKey?: string; baseUrl?: string }) {
        this.client = new Anthropic({
            apiKey: options?.apiKey ?? process.env['ANTHROPIC_API_KEY'],
            baseURL: options?.baseUrl,
        });
    }

    async createMessage(request: ModelRequest): Promise<ModelResponse> {
        const response = await this.client.messages.create({
            model: request.model,
            max_tokens: request.maxTokens,
            system: request.system,
            messages: request.messages,
            tools: request.tools.map(tool => ({
                name: tool.name,
                description: tool.description,
                input_schema: { ...tool.input_schema, type: 'object' as const },
            })),
        });

        const content: ContentBlock[] = [];
        for (const block of response.content) {
            if (block.type === 'text') {
                content.push({ type: 'text', text: block.text });
            } else if (block.type === 'tool_use') {
                content.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input });
            }
            // thinking blocks are not part of the answer
        }

        return { content, stopReason: response.stop_reason };
    }
}
