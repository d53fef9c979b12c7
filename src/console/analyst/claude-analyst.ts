/**
 * Claude Analyst
 *
 * The analysis collaborator backed by the Anthropic Messages API. The
 * dataset is rendered into the system prompt as CSV, prior exchanges are
 * replayed as user/assistant turns, and the model must reply with a JSON
 * object holding the answer and an optional Plotly figure.
 *
 * SDK errors are mapped onto the query error taxonomy here; anything the
 * mapping does not recognize is rethrown for the executor to treat as
 * unexpected.
 */

import Anthropic from '@anthropic-ai/sdk';
import * as XLSX from 'xlsx';
import type {
  AnalysisCollaborator,
  AnalysisRequest,
  AnalysisResult,
  Exchange,
  QueryErrorCategory,
  Table,
} from '../../common/types.js';
import { ANALYST_DEFAULTS } from '../../common/constants.js';
import { AnalystReplySchema } from '../../common/schemas/index.js';
import { estimateTokens } from '../../common/services/token-estimator.js';
import { logDebug } from '../../common/services/logger.js';
import { extractJsonObject } from '../../common/utils/json-extract.js';
import type { AnalystConfig } from './config.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * The slice of a Messages API reply the analyst reads
 */
export interface CompletionMessage {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
}

/**
 * The part of the Anthropic client the analyst calls. The real client
 * satisfies it; tests pass a fake.
 */
export interface MessageCreator {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal; maxRetries?: number; timeout?: number }
    ): Promise<CompletionMessage>;
  };
}

export interface ClaudeAnalystOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Estimated prompt tokens above which the call is refused */
  maxPromptTokens?: number;
  maxRowsInPrompt?: number;
}

// =============================================================================
// PROMPT
// =============================================================================

const INSTRUCTIONS = `You are a data analyst answering questions about one tabular dataset.
Compute answers from the rows provided; never invent values.

Reply with a single JSON object and nothing else:
{"answer": "<plain-language answer>", "visualization": <Plotly figure JSON or null>}

Rules:
- "answer" is required and must not be empty.
- Include "visualization" only when the user asks for a chart or one clearly helps; otherwise null.
- A visualization is a Plotly figure object with "data" and "layout" keys. Never return images, base64 data or file paths.`;

/**
 * Render a table as CSV, truncated to `maxRows` rows
 */
export function renderTable(table: Table, maxRows: number): string {
  const shown = table.rows.slice(0, maxRows);
  const sheet = XLSX.utils.json_to_sheet(shown, { header: [...table.columns] });
  const csv = XLSX.utils.sheet_to_csv(sheet);
  const note =
    shown.length < table.rows.length
      ? `Showing the first ${shown.length} of ${table.rows.length} rows.`
      : `All ${table.rows.length} rows.`;
  return `${note}\n${csv}`;
}

export function buildSystemPrompt(table: Table, maxRows: number): string {
  return `${INSTRUCTIONS}\n\n<dataset columns="${table.columns.length}">\n${renderTable(table, maxRows)}\n</dataset>`;
}

/**
 * Prior exchanges as alternating turns, then the new question
 */
export function buildMessages(context: readonly Exchange[], prompt: string): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [];
  for (const exchange of context) {
    messages.push({ role: 'user', content: exchange.prompt });
    messages.push({
      role: 'assistant',
      content: JSON.stringify({ answer: exchange.responseText, visualization: null }),
    });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

/**
 * Category for an Anthropic SDK error, or null when it is not one we classify
 */
export function classifyAnthropicError(error: unknown): QueryErrorCategory | null {
  if (error instanceof Anthropic.APIUserAbortError) return 'Timeout';
  if (error instanceof Anthropic.APIConnectionTimeoutError) return 'Timeout';
  if (error instanceof Anthropic.APIConnectionError) return 'UpstreamUnavailable';
  if (!(error instanceof Anthropic.APIError)) return null;

  const status = error.status;
  if (status === 429) return 'RateLimited';
  if (status === 408) return 'Timeout';
  if (status === 413) return 'ContextTooLarge';
  if (status === 400 && /prompt is too long/i.test(error.message)) return 'ContextTooLarge';
  if (status !== undefined && status >= 500) return 'UpstreamUnavailable';
  return null;
}

// =============================================================================
// CLAUDE ANALYST
// =============================================================================

export class ClaudeAnalyst implements AnalysisCollaborator<MessageCreator> {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly maxPromptTokens: number;
  private readonly maxRowsInPrompt: number;

  constructor(options: ClaudeAnalystOptions = {}) {
    this.model = options.model ?? ANALYST_DEFAULTS.CLAUDE_MODEL;
    this.maxTokens = options.maxTokens ?? ANALYST_DEFAULTS.MAX_RESPONSE_TOKENS;
    this.temperature = options.temperature ?? ANALYST_DEFAULTS.TEMPERATURE;
    this.maxPromptTokens = options.maxPromptTokens ?? ANALYST_DEFAULTS.MAX_PROMPT_TOKENS;
    this.maxRowsInPrompt = options.maxRowsInPrompt ?? ANALYST_DEFAULTS.MAX_ROWS_IN_PROMPT;
  }

  async invoke(client: MessageCreator, request: AnalysisRequest, signal: AbortSignal): Promise<AnalysisResult> {
    const system = buildSystemPrompt(request.table, this.maxRowsInPrompt);
    const messages = buildMessages(request.context, request.prompt);

    const estimated = estimateTokens(system) + estimateTokens(JSON.stringify(messages));
    logDebug('Analyst prompt built', {
      estimated_tokens: estimated,
      context_entries: request.context.length,
    });
    if (estimated > this.maxPromptTokens) {
      return {
        success: false,
        category: 'ContextTooLarge',
        detail: `Estimated ${estimated} prompt tokens exceeds limit of ${this.maxPromptTokens}`,
      };
    }

    let reply: CompletionMessage;
    try {
      reply = await client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          system,
          messages,
        },
        { signal, maxRetries: 0 }
      );
    } catch (error) {
      const category = classifyAnthropicError(error);
      if (category === null) {
        throw error;
      }
      return {
        success: false,
        category,
        detail: error instanceof Error ? error.message : String(error),
      };
    }

    return interpretReply(reply);
  }
}

/**
 * Turn a model reply into an analysis result
 */
export function interpretReply(reply: CompletionMessage): AnalysisResult {
  if (reply.stop_reason === 'max_tokens') {
    return { success: false, category: 'MalformedOutput', detail: 'Reply truncated at max_tokens' };
  }

  const text = reply.content
    .filter((block) => block.type === 'text')
    .map((block) => block.text ?? '')
    .join('\n')
    .trim();

  if (text === '') {
    return { success: false, category: 'MalformedOutput', detail: 'Reply contained no text' };
  }

  const extracted = extractJsonObject(text);
  if (extracted === undefined) {
    // Plain prose without the JSON envelope is still a usable answer
    return { success: true, text, visualization: null };
  }

  const parsed = AnalystReplySchema.safeParse(extracted);
  if (!parsed.success) {
    return {
      success: false,
      category: 'MalformedOutput',
      detail: `Reply did not match the expected shape: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
    };
  }

  return {
    success: true,
    text: parsed.data.answer,
    visualization: parsed.data.visualization ?? null,
  };
}

/**
 * Client factory for the LLM client registry
 */
export function createAnthropicClient(config: Pick<AnalystConfig, 'anthropicApiKey'>): MessageCreator {
  if (!config.anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY is not configured');
  }
  return new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 0 });
}
