/**
 * Analyst MCP Tools
 *
 * Exposes dataset ingestion, analysis sessions and querying as MCP tools.
 *
 * Usage:
 *   ingest_dataset({ file_path: "./sales.xlsx" })
 *   ingest_dataset({ file_path: "./sales.csv", open_session: true })
 *   create_session({ dataset_id: "..." })
 *   submit_query({ session_id: "...", prompt: "sum revenue by region" })
 *   get_history({ session_id: "...", limit: 5 })
 *   analyst_status({})
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { QUERY_ERROR_CATEGORIES, type Dataset, type Exchange, type Session } from '../../../common/types.js';
import {
  AnalystStatusSchema,
  CreateSessionSchema,
  GetHistorySchema,
  IngestDatasetSchema,
  SubmitQuerySchema,
} from '../../../common/schemas/index.js';
import { errorMessage, logError } from '../../../common/services/logger.js';
import type { AnalystService, AnalystStatus } from '../engine.js';

type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

function errorResponse(action: string, error: unknown): ToolResponse {
  logError(`Tool failed: ${action}`, { error: errorMessage(error) });
  return {
    content: [{ type: 'text', text: `Error ${action}: ${errorMessage(error)}` }],
    isError: true,
  };
}

// =============================================================================
// TOOL REGISTRATION
// =============================================================================

export function registerAnalystTools(server: McpServer, service: AnalystService): void {
  server.tool(
    'ingest_dataset',
    'Upload a CSV or Excel file as a dataset. Returns the dataset id, status and column summary.',
    IngestDatasetSchema.shape,
    async ({ file_path, name, open_session }) => {
      try {
        const bytes = await readFile(file_path);
        const fileName = basename(file_path);
        const upload = { name: name ?? fileName, fileName, bytes };
        if (!open_session) {
          return textResponse(formatDataset(await service.ingestDataset(upload)));
        }
        const { dataset, session } = await service.ingestAndOpenSession(upload);
        return textResponse(
          session === null ? formatDataset(dataset) : `${formatDataset(dataset)}\n\n${formatSession(session)}`
        );
      } catch (error) {
        return errorResponse('ingesting dataset', error);
      }
    }
  );

  server.tool(
    'create_session',
    'Start an analysis session over a dataset. Questions asked in the session share its conversation history.',
    CreateSessionSchema.shape,
    async ({ dataset_id, title }) => {
      try {
        const session = await service.createSession(dataset_id, title);
        return textResponse(formatSession(session));
      } catch (error) {
        return errorResponse('creating session', error);
      }
    }
  );

  server.tool(
    'submit_query',
    'Ask a natural language question about the session dataset. The answer (or a classified error) is recorded in the session history.',
    SubmitQuerySchema.shape,
    async ({ session_id, prompt }) => {
      try {
        const exchange = await service.submitQuery(session_id, prompt);
        return textResponse(formatExchange(exchange));
      } catch (error) {
        return errorResponse('submitting query', error);
      }
    }
  );

  server.tool(
    'get_history',
    'Read the exchanges of an analysis session, oldest first.',
    GetHistorySchema.shape,
    async ({ session_id, limit }) => {
      try {
        const exchanges = await service.getHistory(session_id, limit);
        return textResponse(formatHistory(session_id, exchanges));
      } catch (error) {
        return errorResponse('reading history', error);
      }
    }
  );

  server.tool(
    'analyst_status',
    'Show dataset cache, LLM client and query metrics.',
    AnalystStatusSchema.shape,
    async ({ include_metrics }) => {
      try {
        const status = await service.getStatus(include_metrics);
        return textResponse(formatStatus(status));
      } catch (error) {
        return errorResponse('reading status', error);
      }
    }
  );

  console.error('[Analyst] Registered 5 analyst tools');
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatDataset(dataset: Dataset): string {
  const lines: string[] = [];
  lines.push(`# Dataset: ${dataset.name}`);
  lines.push('');
  lines.push(`| Aspect | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| **Id** | \`${dataset.id}\` |`);
  lines.push(`| **File** | ${dataset.fileName} |`);
  lines.push(`| **Status** | ${dataset.status} |`);

  const { metadata } = dataset;
  if (metadata.rowCount !== undefined && metadata.columnCount !== undefined) {
    lines.push(`| **Size** | ${metadata.rowCount} rows x ${metadata.columnCount} columns |`);
  }
  if (metadata.error) {
    lines.push(`| **Error** | ${metadata.error} |`);
  }

  if (metadata.columns && metadata.columns.length > 0) {
    lines.push('');
    lines.push('## Columns');
    lines.push('');
    for (const column of metadata.columns) {
      const samples = column.sampleValues.length > 0 ? ` e.g. ${column.sampleValues.join(', ')}` : '';
      lines.push(`- **${column.name}** (${column.dtype}, ${column.nullCount} empty)${samples}`);
    }
  }

  if (metadata.parseWarnings.length > 0) {
    lines.push('');
    lines.push('## Warnings');
    lines.push('');
    for (const warning of metadata.parseWarnings) {
      lines.push(`- ${warning}`);
    }
  }

  return lines.join('\n');
}

export function formatSession(session: Session): string {
  return [`# Session: ${session.title}`, '', `- **Id:** \`${session.id}\``, `- **Dataset:** \`${session.datasetId}\``].join('\n');
}

export function formatExchange(exchange: Exchange): string {
  const lines: string[] = [];
  lines.push(`## #${exchange.sequence} ${exchange.status === 'success' ? 'Answer' : 'Error'}`);
  lines.push('');
  lines.push(`**Prompt:** ${exchange.prompt}`);
  lines.push('');

  if (exchange.status === 'success') {
    lines.push(exchange.responseText);
    if (exchange.visualization !== null) {
      lines.push('');
      lines.push('**Visualization (Plotly JSON):**');
      lines.push('```json');
      lines.push(JSON.stringify(exchange.visualization));
      lines.push('```');
    }
  } else {
    lines.push(`**${exchange.errorCategory ?? 'Error'}:** ${exchange.errorMessage ?? ''}`);
  }

  lines.push('');
  lines.push(`_Attempts: ${exchange.attempts} | ${exchange.durationMs}ms | ${exchange.createdAt}_`);
  return lines.join('\n');
}

export function formatHistory(sessionId: string, exchanges: readonly Exchange[]): string {
  if (exchanges.length === 0) {
    return `No exchanges yet in session ${sessionId}.`;
  }
  const header = `# Session ${sessionId}\n\n${exchanges.length} exchange(s)`;
  return [header, ...exchanges.map(formatExchange)].join('\n\n');
}

export function formatStatus(status: AnalystStatus): string {
  const lines: string[] = [];
  lines.push('# Analyst Status');
  lines.push('');
  lines.push(`| Aspect | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| **Datasets** | ${status.datasets} |`);
  lines.push(`| **Sessions** | ${status.sessions} |`);
  lines.push(`| **Cached tables** | ${status.cache.size}/${status.cache.maxSize} (hit rate ${status.cache.hitRate}) |`);
  lines.push(`| **Cache loads** | ${status.cache.loads} (${status.cache.failedLoads} failed, ${status.cache.sharedLoads} shared) |`);
  lines.push(`| **LLM client** | ${status.client.initialized ? 'initialized' : 'not initialized'} (${status.client.constructions} constructions) |`);

  if (status.metrics) {
    const { metrics } = status;
    lines.push('');
    lines.push('## Queries');
    lines.push('');
    lines.push(`| Metric | Value |`);
    lines.push(`|--------|-------|`);
    lines.push(`| **Total** | ${metrics.totalQueries} |`);
    lines.push(`| **Succeeded** | ${metrics.successfulQueries} |`);
    lines.push(`| **Failed** | ${metrics.failedQueries} |`);
    lines.push(`| **Upstream calls** | ${metrics.upstreamCalls} |`);
    lines.push(`| **Avg duration** | ${metrics.avgDurationMs}ms |`);

    const failed = QUERY_ERROR_CATEGORIES.filter((category) => metrics.failuresByCategory[category] > 0);
    if (failed.length > 0) {
      lines.push('');
      lines.push('## Failures by category');
      lines.push('');
      for (const category of failed) {
        lines.push(
          `- ${category}: ${metrics.failuresByCategory[category]} (${metrics.retriesByCategory[category]} retries)`
        );
      }
    }
  }

  return lines.join('\n');
}
