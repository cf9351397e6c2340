import { z } from 'zod';
import { EvaluationError } from '../errors.js';

/**
 * MCP server connection settings, as written in .mcp.json files and
 * built from `workbench eval` flags.
 */

const stringRecord = z.record(z.string());

export const StdioServerConfigSchema = z.object({
    type: z.literal('stdio').optional(),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: stringRecord.optional(),
    cwd: z.string().optional(),
});

export const SseServerConfigSchema = z.object({
    type: z.literal('sse'),
    url: z.string().url(),
    headers: stringRecord.optional(),
});

export const HttpServerConfigSchema = z.object({
    type: z.literal('http'),
    url: z.string().url(),
    headers: stringRecord.optional(),
});

export const McpServerConfigSchema = z.union([
    StdioServerConfigSchema,
    SseServerConfigSchema,
    HttpServerConfigSchema,
]);

export type StdioServerConfig = z.infer<typeof StdioServerConfigSchema>;
export type SseServerConfig = z.infer<typeof SseServerConfigSchema>;
export type HttpServerConfig = z.infer<typeof HttpServerConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

export type TransportKind = 'stdio' | 'sse' | 'http';

export function transportOf(config: McpServerConfig): TransportKind {
    return config.type ?? 'stdio';
}

export const TRANSPORT_KINDS: TransportKind[] = ['stdio', 'sse', 'http'];

/**
 * `KEY=VALUE` pairs into an environment record; the value may contain `=`
 */
export function parseEnvPairs(pairs: string[]): Record<string, string> {
    const env: Record<string, string> = {};
    for (const pair of pairs) {
        const at = pair.indexOf('=');
        if (at <= 0) {
            throw new EvaluationError(`Invalid env format: ${pair}. Expected KEY=VALUE`);
        }
        env[pair.slice(0, at).trim()] = pair.slice(at + 1);
    }
    return env;
}

/**
 * `Name: value` strings into a header record
 */
export function parseHeaders(headers: string[]): Record<string, string> {
    const out: Record<string, string> = {};
    for (const header of headers) {
        const at = header.indexOf(':');
        if (at <= 0) {
            throw new EvaluationError(`Invalid header format: ${header}. Expected "Name: value"`);
        }
        out[header.slice(0, at).trim()] = header.slice(at + 1).trim();
    }
    return out;
}

export interface ServerFlags {
    transport: TransportKind;
    command?: string;
    args?: string[];
    env?: string[];
    url?: string;
    headers?: string[];
}

/**
 * Server config from `workbench eval` flags: stdio needs a command,
 * sse and http need a URL.
 */
export function buildServerConfig(flags: ServerFlags): McpServerConfig {
    let candidate: unknown;
    if (flags.transport === 'stdio') {
        if (!flags.command) {
            throw new EvaluationError('--command is required for the stdio transport');
        }
        candidate = {
            type: 'stdio',
            command: flags.command,
            args: flags.args ?? [],
            env: parseEnvPairs(flags.env ?? []),
        };
    } else {
        if (!flags.url) {
            throw new EvaluationError(`--url is required for the ${flags.transport} transport`);
        }
        candidate = { type: flags.transport, url: flags.url, headers: parseHeaders(flags.headers ?? []) };
    }

    const result = McpServerConfigSchema.safeParse(candidate);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new EvaluationError(`Invalid server settings: ${issues}`);
    }
    return result.data;
}
