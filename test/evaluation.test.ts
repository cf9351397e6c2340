import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { EvaluationError } from '../src/errors.js';
import { runAgentLoop } from '../src/evaluation/agent-loop.js';
import { connectTransport, flattenContent, type McpConnection } from '../src/evaluation/connection.js';
import { parseEvaluationFile } from '../src/evaluation/dataset.js';
import { renderReport, summarizeResults } from '../src/evaluation/report.js';
import { EvaluationRunner, evaluateTask, extractTag } from '../src/evaluation/runner.js';
import { buildServerConfig, parseEnvPairs, parseHeaders, transportOf } from '../src/evaluation/server-config.js';
import type {
    ContentBlock,
    ConversationMessage,
    ModelClient,
    ModelRequest,
    ModelResponse,
    TaskResult,
} from '../src/evaluation/types.js';
import { captureLogger } from './helpers.js';

const LOOP_OPTIONS = { model: 'test-model', maxTokens: 1024, maxTurns: 5 };

/** Model double answering from a script; keeps a copy of every request */
class ScriptedModel implements ModelClient {
    readonly requests: ModelRequest[] = [];

    constructor(private reply: (request: ModelRequest, turn: number) => ModelResponse) {}

    async createMessage(request: ModelRequest): Promise<ModelResponse> {
        this.requests.push(structuredClone(request));
        return this.reply(request, this.requests.length);
    }
}

const text = (value: string): ContentBlock => ({ type: 'text', text: value });
const toolUse = (id: string, name: string, input: unknown): ContentBlock => ({ type: 'tool_use', id, name, input });

function lastToolResult(messages: ConversationMessage[]): string | null {
    const last = messages[messages.length - 1];
    if (!last || last.role !== 'user' || typeof last.content === 'string') return null;
    return last.content[0]?.content ?? null;
}

describe('parseEvaluationFile', () => {
    it('collects question and answer pairs at any depth', () => {
        const pairs = parseEvaluationFile(`
            <evaluation>
              <qa_pair>
                <question>  How many open issues are labelled bug?  </question>
                <answer>7</answer>
              </qa_pair>
              <qa_pair><question>Missing answer</question></qa_pair>
              <section>
                <qa_pair><question>Who owns the repo?</question><answer>alice</answer></qa_pair>
              </section>
            </evaluation>`);

        expect(pairs).toEqual([
            { question: 'How many open issues are labelled bug?', answer: '7' },
            { question: 'Who owns the repo?', answer: 'alice' },
        ]);
    });

    it('allows a file with no pairs', () => {
        expect(parseEvaluationFile('<evaluation></evaluation>')).toEqual([]);
    });

    it('rejects malformed XML', () => {
        expect(() => parseEvaluationFile('<evaluation><qa_pair></evaluation>')).toThrow(EvaluationError);
        expect(() => parseEvaluationFile('<evaluation><qa_pair></evaluation>')).toThrow(/^Malformed evaluation XML/);
    });
});

describe('extractTag', () => {
    it('returns the trimmed content of the last match', () => {
        expect(extractTag('<response> 1 </response> then <response>\n2\n</response>', 'response')).toBe('2');
    });

    it('returns null when the tag is absent', () => {
        expect(extractTag('no tags here', 'summary')).toBeNull();
    });

    it('matches across lines', () => {
        expect(extractTag('<summary>step one\nstep two</summary>', 'summary')).toBe('step one\nstep two');
    });
});

describe('server settings', () => {
    it('parses env pairs and headers', () => {
        expect(parseEnvPairs(['API_KEY=test-secret', 'QUERY=a=b'])).toEqual({ API_KEY: 'test-secret', QUERY: 'a=b' });
        expect(parseHeaders(['Authorization: Bearer test-secret', 'X-Trace:1'])).toEqual({
            Authorization: 'Bearer test-secret',
            'X-Trace': '1',
        });
    });

    it('rejects malformed pairs', () => {
        expect(() => parseEnvPairs(['NOVALUE'])).toThrow('Invalid env format: NOVALUE. Expected KEY=VALUE');
        expect(() => parseHeaders(['no-colon'])).toThrow(EvaluationError);
    });

    it('builds configs per transport', () => {
        const stdio = buildServerConfig({ transport: 'stdio', command: 'python', args: ['server.py'], env: ['DEBUG=1'] });
        expect(stdio).toEqual({ type: 'stdio', command: 'python', args: ['server.py'], env: { DEBUG: '1' } });
        expect(transportOf(stdio)).toBe('stdio');

        const http = buildServerConfig({ transport: 'http', url: 'https://mcp.example.test/mcp', headers: ['X-Key: test-secret'] });
        expect(http).toEqual({ type: 'http', url: 'https://mcp.example.test/mcp', headers: { 'X-Key': 'test-secret' } });
    });

    it('requires the transport\'s settings', () => {
        expect(() => buildServerConfig({ transport: 'stdio' })).toThrow('--command is required for the stdio transport');
        expect(() => buildServerConfig({ transport: 'sse' })).toThrow('--url is required for the sse transport');
        expect(() => buildServerConfig({ transport: 'http', url: 'not a url' })).toThrow(/^Invalid server settings/);
    });
});

describe('flattenContent', () => {
    it('joins text blocks', () => {
        expect(flattenContent([{ type: 'text', text: 'a' }, { type: 'image', data: '' }, { type: 'text', text: 'b' }])).toBe('a\nb');
    });

    it('falls back to JSON', () => {
        expect(flattenContent([{ type: 'image', data: 'x' }])).toBe('[{"type":"image","data":"x"}]');
        expect(flattenContent(undefined)).toBe('');
    });
});

describe('runAgentLoop', () => {
    it('executes tool calls and returns the final text', async () => {
        const model = new ScriptedModel((_request, turn) => turn === 1
            ? { stopReason: 'tool_use', content: [text('thinking'), toolUse('t1', 'add', { a: 2, b: 3 }), toolUse('t2', 'fail', {})] }
            : { stopReason: 'end_turn', content: [text('<summary>s</summary>'), text('<response>5</response>')] });

        const executor = {
            async callTool(name: string, args: Record<string, unknown>): Promise<string> {
                if (name === 'fail') throw new Error('nope');
                return String(Number(args['a']) + Number(args['b']));
            },
        };

        const result = await runAgentLoop(model, 'What is 2 + 3?', [], executor, LOOP_OPTIONS);

        expect(result.text).toBe('<summary>s</summary>\n<response>5</response>');
        expect(result.numToolCalls).toBe(2);
        expect(result.toolCalls['add']?.count).toBe(1);
        expect(result.toolCalls['fail']?.durations).toHaveLength(1);

        const second = model.requests[1];
        expect(second?.messages).toHaveLength(3);
        expect(second?.messages[2]).toEqual({
            role: 'user',
            content: [
                { type: 'tool_result', tool_use_id: 't1', content: '5' },
                { type: 'tool_result', tool_use_id: 't2', content: 'Error executing tool fail: nope', is_error: true },
            ],
        });
        expect(model.requests[0]?.system).toContain('<response>NOT_FOUND</response>');
    });

    it('treats a tool_use stop without tool calls as the final answer', async () => {
        const model = new ScriptedModel(() => ({ stopReason: 'tool_use', content: [text('<response>7</response>')] }));
        const executor = { callTool: async () => 'unused' };

        const result = await runAgentLoop(model, 'Q', [], executor, LOOP_OPTIONS);

        expect(result).toEqual({ text: '<response>7</response>', toolCalls: {}, numToolCalls: 0 });
        expect(model.requests).toHaveLength(1);
    });

    it('stops after the turn limit', async () => {
        const model = new ScriptedModel(() => ({ stopReason: 'tool_use', content: [toolUse('t', 'noop', {})] }));
        const executor = { callTool: async () => 'ok' };

        await expect(runAgentLoop(model, 'loop', [], executor, { ...LOOP_OPTIONS, maxTurns: 2 }))
            .rejects.toThrow('Agent did not finish within 2 turns');
        expect(model.requests).toHaveLength(2);
    });
});

describe('evaluateTask', () => {
    const executor = { callTool: async () => '' };

    it('scores an exact match after trimming the expected answer', async () => {
        const model = new ScriptedModel(() => ({
            stopReason: 'end_turn',
            content: [text('<summary>looked</summary><feedback>ok</feedback><response>42</response>')],
        }));

        const result = await evaluateTask({ question: 'Q', answer: ' 42 ' }, model, [], executor, LOOP_OPTIONS);

        expect(result).toMatchObject({
            question: 'Q',
            expected: ' 42 ',
            actual: '42',
            score: 1,
            summary: 'looked',
            feedback: 'ok',
            numToolCalls: 0,
        });
        expect(result.error).toBeUndefined();
    });

    it('scores zero without a response tag', async () => {
        const model = new ScriptedModel(() => ({ stopReason: 'end_turn', content: [text('I give up')] }));
        const result = await evaluateTask({ question: 'Q', answer: 'A' }, model, [], executor, LOOP_OPTIONS);
        expect(result.actual).toBeNull();
        expect(result.score).toBe(0);
    });

    it('turns a failing loop into a zero score', async () => {
        const model: ModelClient = {
            createMessage: async () => {
                throw new Error('rate limited');
            },
        };
        const result = await evaluateTask({ question: 'Q', answer: 'A' }, model, [], executor, LOOP_OPTIONS);

        expect(result.score).toBe(0);
        expect(result.error).toBe('rate limited');
        expect(result.summary).toBeNull();
    });
});

describe('evaluation against an MCP server', () => {
    let server: McpServer;
    let connection: McpConnection;

    beforeEach(async () => {
        server = new McpServer({ name: 'calc', version: '1.0.0' });
        server.tool('add', 'Add two numbers', { a: z.number(), b: z.number() }, async ({ a, b }) => ({
            content: [{ type: 'text', text: String(a + b) }],
        }));
        server.tool('explode', 'Always fails', async () => ({
            content: [{ type: 'text', text: 'boom' }],
            isError: true,
        }));

        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await server.connect(serverTransport);
        connection = await connectTransport(clientTransport, captureLogger().log);
    });

    afterEach(async () => {
        await connection.close();
        await server.close();
    });

    it('lists tools in model format', async () => {
        const tools = await connection.listTools();
        const add = tools.find(t => t.name === 'add');

        expect(tools.map(t => t.name).sort()).toEqual(['add', 'explode']);
        expect(add?.description).toBe('Add two numbers');
        expect(add?.input_schema['type']).toBe('object');
    });

    it('follows list cursors across pages', async () => {
        const paged = new Server({ name: 'paged', version: '1.0.0' }, { capabilities: { tools: {} } });
        const pages: Record<string, { name: string; next?: string }> = {
            start: { name: 'first', next: 'p2' },
            p2: { name: 'second', next: 'p3' },
            p3: { name: 'third' },
        };
        const cursors: (string | undefined)[] = [];
        paged.setRequestHandler(ListToolsRequestSchema, async request => {
            const cursor = request.params?.cursor;
            cursors.push(cursor);
            const page = pages[cursor ?? 'start'] ?? { name: 'unknown' };
            return {
                tools: [{ name: page.name, inputSchema: { type: 'object' as const } }],
                nextCursor: page.next,
            };
        });

        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await paged.connect(serverTransport);
        const pagedConnection = await connectTransport(clientTransport, captureLogger().log);
        try {
            const tools = await pagedConnection.listTools();
            expect(tools.map(t => t.name)).toEqual(['first', 'second', 'third']);
            expect(cursors).toEqual([undefined, 'p2', 'p3']);
        } finally {
            await pagedConnection.close();
            await paged.close();
        }
    });

    it('calls tools and raises tool errors', async () => {
        expect(await connection.callTool('add', { a: 2, b: 40 })).toBe('42');
        await expect(connection.callTool('explode', {})).rejects.toThrow('boom');
    });

    it('runs every question and reports progress', async () => {
        const model = new ScriptedModel(request => {
            const toolOutput = lastToolResult(request.messages);
            if (toolOutput !== null) {
                return { stopReason: 'end_turn', content: [text(`<summary>used add</summary><response>${toolOutput}</response>`)] };
            }
            const question = request.messages[0]?.content;
            const [, a = '0', b = '0'] = /(\d+) \+ (\d+)/.exec(typeof question === 'string' ? question : '') ?? [];
            return { stopReason: 'tool_use', content: [toolUse('call-1', 'add', { a: Number(a), b: Number(b) })] };
        });

        const events: string[] = [];
        const runner = new EvaluationRunner(model, connection, {
            ...LOOP_OPTIONS,
            log: captureLogger().log,
            onProgress: ({ index, result }) => events.push(result ? `done ${index} ${result.score}` : `start ${index}`),
        });

        const results = await runner.run([
            { question: 'What is 20 + 22?', answer: '42' },
            { question: 'What is 1 + 1?', answer: '3' },
        ]);

        expect(results.map(r => [r.actual, r.score])).toEqual([['42', 1], ['2', 0]]);
        expect(results[0]?.toolCalls['add']?.count).toBe(1);
        expect(results[0]?.summary).toBe('used add');
        expect(events).toEqual(['start 0', 'done 0 1', 'start 1', 'done 1 0']);
        expect(model.requests[0]?.tools.map(t => t.name).sort()).toEqual(['add', 'explode']);
    });
});

describe('renderReport', () => {
    const results: TaskResult[] = [
        {
            question: 'Q1',
            expected: '42',
            actual: '42',
            score: 1,
            durationSeconds: 1.5,
            toolCalls: { add: { count: 2, durations: [0.1, 0.3] } },
            numToolCalls: 2,
            summary: 'Used add',
            feedback: null,
        },
        {
            question: 'Q2',
            expected: 'x',
            actual: null,
            score: 0,
            durationSeconds: 0.5,
            toolCalls: {},
            numToolCalls: 0,
            summary: null,
            feedback: null,
            error: 'timeout',
        },
    ];

    it('summarises accuracy, duration and tool calls', () => {
        expect(summarizeResults(results)).toEqual({
            total: 2,
            correct: 1,
            accuracy: 50,
            averageDuration: 1,
            averageToolCalls: 1,
            totalToolCalls: 2,
        });
    });

    it('renders a markdown report', () => {
        expect(renderReport(results)).toBe([
            '# Evaluation Report',
            '',
            '## Summary',
            '',
            '- **Accuracy**: 1/2 (50.0%)',
            '- **Average Task Duration**: 1.00s',
            '- **Average Tool Calls per Task**: 1.00',
            '- **Total Tool Calls**: 2',
            '',
            '---',
            '',
            '### Task 1',
            '',
            '**Question**: Q1',
            '**Ground Truth Answer**: `42`',
            '**Actual Answer**: `42`',
            '**Correct**: ✅',
            '**Duration**: 1.50s',
            '**Tool Calls**: 2',
            '',
            '| Tool | Calls | Avg Duration |',
            '| --- | --- | --- |',
            '| add | 2 | 0.20s |',
            '',
            '**Summary**',
            'Used add',
            '',
            '**Feedback**',
            'N/A',
            '',
            '---',
            '',
            '### Task 2',
            '',
            '**Question**: Q2',
            '**Ground Truth Answer**: `x`',
            '**Actual Answer**: `N/A`',
            '**Correct**: ❌',
            '**Duration**: 0.50s',
            '**Tool Calls**: 0',
            '',
            '**Error**: timeout',
            '',
            '**Summary**',
            'N/A',
            '',
            '**Feedback**',
            'N/A',
            '',
            '---',
            '',
        ].join('\n'));
    });

    it('handles an empty run', () => {
        expect(renderReport([])).toContain('- **Accuracy**: 0/0 (0.0%)\n');
    });
});
