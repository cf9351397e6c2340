import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { EvaluationError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { McpServerConfig } from './server-config.js';
import type { ToolSpec } from './types.js';

const CLIENT_INFO = { name: 'workbench-eval', version: '1.0.0' };

/**
 * Build the SDK transport for a server config
 */
export function createTransport(config: McpServerConfig): Transport {
    switch (config.type) {
        case 'sse':
            return new SSEClientTransport(new URL(config.url), {
                requestInit: config.headers ? { headers: config.headers } : undefined,
            });
        case 'http':
            return new StreamableHTTPClientTransport(new URL(config.url), {
                requestInit: config.headers ? { headers: config.headers } : undefined,
            });
        default:
            return new StdioClientTransport({
                command: config.command,
                args: config.args ?? [],
                env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
                cwd: config.cwd,
                stderr: 'pipe',
            });
    }
}

/**
 * MCP Connection — a connected client exposing tools in model format
 */
export class McpConnection {
    private log: Logger;

    constructor(private client: Client, log: Logger = rootLogger) {
        this.log = log.child('mcp');
    }

    /**
     * Tools as the model sees them, across every page the server returns
     */
    async listTools(): Promise<ToolSpec[]> {
        const tools: Tool[] = [];
        let cursor: string | undefined;
        do {
            const page = await this.client.listTools(cursor === undefined ? undefined : { cursor });
            tools.push(...page.tools);
            cursor = page.nextCursor;
        } while (cursor !== undefined);

        return tools.map(tool => ({
            name: tool.name,
            description: tool.description ?? '',
            input_schema: { ...tool.inputSchema },
        }));
    }

    /**
     * Call a tool and flatten its content to text.
     * Throws EvaluationError when the server reports a tool error.
     */
    async callTool(name: string, args: Record<string, unknown>): Promise<string> {
        this.log.debug(`Calling tool ${name}`, { args });
        const result = await this.client.callTool({ name, arguments: args });
        const text = flattenContent(result.content);

        if (result.isError === true) {
            throw new EvaluationError(text || `Tool ${name} failed`);
        }
        return text;
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}

/**
 * Connect to an already-built transport
 */
export async function connectTransport(transport: Transport, log?: Logger): Promise<McpConnection> {
    const client = new Client(CLIENT_INFO);
    try {
        await client.connect(transport);
    } catch (err) {
        throw new EvaluationError(`Failed to connect to MCP server: ${errorMessage(err)}`, { cause: err });
    }
    return new McpConnection(client, log);
}

export async function createConnection(config: McpServerConfig, log?: Logger): Promise<McpConnection> {
    return connectTransport(createTransport(config), log);
}

/**
 * Joined text of text blocks; otherwise the JSON of the whole content
 */
export function flattenContent(content: unknown): string {
    if (!Array.isArray(content)) {
        return content === undefined ? '' : JSON.stringify(content);
    }

    const texts: string[] = [];
    for (const block of content) {
        if (block && typeof block === 'object' && 'type' in block && block.type === 'text'
            && 'text' in block && typeof block.text === 'string') {
            texts.push(block.text);
        }
    }
    return texts.length > 0 ? texts.join('\n') : JSON.stringify(content);
}
