/**
 * Jest Unit Tests for the Claude Analyst
 *
 * Prompt building, reply interpretation and SDK error mapping, against a
 * fake Messages client.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AnalysisRequest, Exchange, QueryErrorCategory, Table } from '../../../common/types.js';
import {
  buildMessages,
  buildSystemPrompt,
  ClaudeAnalyst,
  classifyAnthropicError,
  createAnthropicClient,
  interpretReply,
  renderTable,
  type CompletionMessage,
  type MessageCreator,
} from '../claude-analyst.js';

type CreateFn = MessageCreator['messages']['create'];

const SALES: Table = {
  columns: ['region', 'revenue'],
  rows: [
    { region: 'East', revenue: 10 },
    { region: 'West', revenue: 20 },
    { region: 'East', revenue: 30 },
  ],
};

function textReply(text: string, stopReason: string | null = 'end_turn'): CompletionMessage {
  return { content: [{ type: 'text', text }], stop_reason: stopReason };
}

function fakeClient(): { client: MessageCreator; create: jest.Mock<ReturnType<CreateFn>, Parameters<CreateFn>> } {
  const create = jest.fn<ReturnType<CreateFn>, Parameters<CreateFn>>();
  return { client: { messages: { create } }, create };
}

function exchange(sequence: number, prompt: string, responseText: string): Exchange {
  return {
    id: `ex-${sequence}`,
    sessionId: 'session-1',
    sequence,
    prompt,
    responseText,
    visualization: null,
    status: 'success',
    errorCategory: null,
    errorMessage: null,
    attempts: 1,
    durationMs: 12,
    createdAt: '2025-01-01T00:00:00.000Z',
  };
}

function request(prompt: string, context: Exchange[] = []): AnalysisRequest {
  return { table: SALES, context, prompt, visualizationFormat: 'plotly-json' };
}

describe('Claude Analyst', () => {
  // ==========================================================================
  // PROMPT BUILDING
  // ==========================================================================

  describe('renderTable', () => {
    test('renders every row as CSV when under the limit', () => {
      expect(renderTable(SALES, 500)).toBe('All 3 rows.\nregion,revenue\nEast,10\nWest,20\nEast,30');
    });

    test('truncates to the row limit and says so', () => {
      expect(renderTable(SALES, 2)).toBe('Showing the first 2 of 3 rows.\nregion,revenue\nEast,10\nWest,20');
    });
  });

  describe('buildSystemPrompt', () => {
    test('embeds the table inside a dataset block', () => {
      const system = buildSystemPrompt(SALES, 500);

      expect(system).toContain('<dataset columns="2">\nAll 3 rows.\nregion,revenue\nEast,10\nWest,20\nEast,30\n</dataset>');
      expect(system).toContain('Never return images');
    });
  });

  describe('buildMessages', () => {
    test('with no context, sends only the question', () => {
      expect(buildMessages([], 'sum revenue by region')).toEqual([
        { role: 'user', content: 'sum revenue by region' },
      ]);
    });

    test('replays earlier exchanges as user/assistant pairs', () => {
      const context = [exchange(1, 'sum revenue by region', 'East:40, West:20')];

      expect(buildMessages(context, 'and as a percentage')).toEqual([
        { role: 'user', content: 'sum revenue by region' },
        { role: 'assistant', content: '{"answer":"East:40, West:20","visualization":null}' },
        { role: 'user', content: 'and as a percentage' },
      ]);
    });
  });

  // ==========================================================================
  // REPLY INTERPRETATION
  // ==========================================================================

  describe('interpretReply', () => {
    test('reads the answer from the JSON envelope', () => {
      const result = interpretReply(textReply('{"answer": "East:40, West:20", "visualization": null}'));

      expect(result).toEqual({ success: true, text: 'East:40, West:20', visualization: null });
    });

    test('reads a fenced reply with a chart', () => {
      const reply = textReply(
        'Here you go:\n```json\n{"answer": "East leads", "visualization": {"data": [{"type": "bar", "x": ["East", "West"], "y": [40, 20]}], "layout": {}}}\n```'
      );

      expect(interpretReply(reply)).toEqual({
        success: true,
        text: 'East leads',
        visualization: { data: [{ type: 'bar', x: ['East', 'West'], y: [40, 20] }], layout: {} },
      });
    });

    test('a missing visualization key means no chart', () => {
      expect(interpretReply(textReply('{"answer": "3 rows"}'))).toEqual({
        success: true,
        text: '3 rows',
        visualization: null,
      });
    });

    test('plain prose is accepted as the answer', () => {
      expect(interpretReply(textReply('East has the most revenue.'))).toEqual({
        success: true,
        text: 'East has the most revenue.',
        visualization: null,
      });
    });

    test('a bare number is a plain answer', () => {
      expect(interpretReply(textReply('42'))).toEqual({ success: true, text: '42', visualization: null });
    });

    test('joins multiple text blocks and ignores others', () => {
      const reply: CompletionMessage = {
        content: [
          { type: 'text', text: 'East' },
          { type: 'tool_use' },
          { type: 'text', text: 'leads.' },
        ],
        stop_reason: 'end_turn',
      };

      expect(interpretReply(reply)).toEqual({ success: true, text: 'East\nleads.', visualization: null });
    });

    test.each<[string, CompletionMessage]>([
      ['a truncated reply', textReply('{"answer": "East', 'max_tokens')],
      ['an empty reply', { content: [], stop_reason: 'end_turn' }],
      ['a reply without an answer', textReply('{"visualization": null}')],
      ['a blank answer', textReply('{"answer": "  "}')],
      ['an image instead of a figure', textReply('{"answer": "see chart", "visualization": "chart.png"}')],
    ])('%s is MalformedOutput', (_name, reply) => {
      const result = interpretReply(reply);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.category).toBe('MalformedOutput');
      }
    });
  });

  // ==========================================================================
  // ERROR MAPPING
  // ==========================================================================

  describe('classifyAnthropicError', () => {
    test.each<[string, unknown, QueryErrorCategory | null]>([
      ['429', new Anthropic.APIError(429, undefined, 'rate limited', undefined), 'RateLimited'],
      ['408', new Anthropic.APIError(408, undefined, 'request timeout', undefined), 'Timeout'],
      ['413', new Anthropic.APIError(413, undefined, 'request too large', undefined), 'ContextTooLarge'],
      [
        '400 prompt too long',
        new Anthropic.APIError(400, undefined, 'prompt is too long: 210000 tokens > 200000 maximum', undefined),
        'ContextTooLarge',
      ],
      ['500', new Anthropic.APIError(500, undefined, 'internal error', undefined), 'UpstreamUnavailable'],
      ['529', new Anthropic.APIError(529, undefined, 'overloaded', undefined), 'UpstreamUnavailable'],
      ['connection error', new Anthropic.APIConnectionError({ message: 'socket hang up' }), 'UpstreamUnavailable'],
      ['connection timeout', new Anthropic.APIConnectionTimeoutError(), 'Timeout'],
      ['user abort', new Anthropic.APIUserAbortError(), 'Timeout'],
      ['401', new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined), null],
      ['400 other', new Anthropic.APIError(400, undefined, 'bad request', undefined), null],
      ['plain error', new Error('boom'), null],
    ])('%s', (_name, error, expected) => {
      expect(classifyAnthropicError(error)).toBe(expected);
    });
  });

  // ==========================================================================
  // INVOCATION
  // ==========================================================================

  describe('invoke', () => {
    test('sends the prompt with the abort signal and no SDK retries', async () => {
      const { client, create } = fakeClient();
      create.mockResolvedValue(textReply('{"answer": "East:40, West:20"}'));
      const analyst = new ClaudeAnalyst({ model: 'test-model', maxTokens: 500 });
      const controller = new AbortController();

      const result = await analyst.invoke(client, request('sum revenue by region'), controller.signal);

      expect(result).toEqual({ success: true, text: 'East:40, West:20', visualization: null });
      expect(create).toHaveBeenCalledTimes(1);

      const [body, options] = create.mock.calls[0];
      expect(body.model).toBe('test-model');
      expect(body.max_tokens).toBe(500);
      expect(body.temperature).toBe(0);
      expect(body.messages).toEqual([{ role: 'user', content: 'sum revenue by region' }]);
      expect(body.system).toBe(buildSystemPrompt(SALES, 500));
      expect(options).toEqual({ signal: controller.signal, maxRetries: 0 });
    });

    test('refuses a prompt over the token limit without calling the API', async () => {
      const { client, create } = fakeClient();
      const analyst = new ClaudeAnalyst({ maxPromptTokens: 10 });

      const result = await analyst.invoke(client, request('sum revenue'), new AbortController().signal);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.category).toBe('ContextTooLarge');
      }
      expect(create).not.toHaveBeenCalled();
    });

    test('maps a rate limit error to a RateLimited failure', async () => {
      const { client, create } = fakeClient();
      create.mockRejectedValue(new Anthropic.APIError(429, undefined, 'rate limited', undefined));
      const analyst = new ClaudeAnalyst();

      const result = await analyst.invoke(client, request('sum revenue'), new AbortController().signal);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.category).toBe('RateLimited');
      }
    });

    test('rethrows errors it does not classify', async () => {
      const { client, create } = fakeClient();
      create.mockRejectedValue(new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined));
      const analyst = new ClaudeAnalyst();

      await expect(
        analyst.invoke(client, request('sum revenue'), new AbortController().signal)
      ).rejects.toBeInstanceOf(Anthropic.APIError);
    });
  });

  // ==========================================================================
  // CLIENT FACTORY
  // ==========================================================================

  describe('createAnthropicClient', () => {
    test('requires an API key', () => {
      expect(() => createAnthropicClient({ anthropicApiKey: undefined })).toThrow(
        'ANTHROPIC_API_KEY is not configured'
      );
    });

    test('builds a client when a key is set', () => {
      const client = createAnthropicClient({ anthropicApiKey: 'test-secret' });

      expect(client).toBeInstanceOf(Anthropic);
    });
  });
});
