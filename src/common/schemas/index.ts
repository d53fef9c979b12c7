/**
 * Zod validation schemas
 *
 * Used for MCP tool input, upload validation, rows read back from SQLite and
 * replies returned by the LLM.
 */

import { z } from 'zod';
import {
  DATASET_STATUSES,
  EXCHANGE_STATUSES,
  QUERY_ERROR_CATEGORIES,
  type JsonValue,
} from '../types.js';
import { PROMPT_LIMITS, UPLOAD_LIMITS } from '../constants.js';

// =============================================================================
// DOMAIN ENUMS
// =============================================================================

export const DatasetStatusSchema = z.enum(DATASET_STATUSES);

export const ExchangeStatusSchema = z.enum(EXCHANGE_STATUSES);

export const QueryErrorCategorySchema = z.enum(QUERY_ERROR_CATEGORIES);

// =============================================================================
// JSON PAYLOADS
// =============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Visualization payloads are JSON objects (a Plotly figure); the engine does
 * not look inside them.
 */
export const VisualizationSchema = z.record(JsonValueSchema);

export const ColumnMetadataSchema = z.object({
  name: z.string(),
  dtype: z.enum(['number', 'boolean', 'date', 'string', 'empty']),
  nullCount: z.number().int().min(0),
  sampleValues: z.array(z.string()),
});

export const DatasetMetadataSchema = z.object({
  rowCount: z.number().int().min(0).optional(),
  columnCount: z.number().int().min(0).optional(),
  columns: z.array(ColumnMetadataSchema).optional(),
  fileSizeBytes: z.number().int().min(0).optional(),
  sheetNames: z.array(z.string()).optional(),
  parseWarnings: z.array(z.string()).default([]),
  error: z.string().optional(),
});

// =============================================================================
// UPLOADS & PROMPTS
// =============================================================================

export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot).toLowerCase();
}

/**
 * Upload checks run before a dataset record is created
 */
export const DatasetUploadSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Dataset name is required.')
    .max(UPLOAD_LIMITS.MAX_NAME_LENGTH, `Dataset name must be less than ${UPLOAD_LIMITS.MAX_NAME_LENGTH} characters.`),

  fileName: z.string().superRefine((fileName, ctx) => {
    const extension = extensionOf(fileName);
    if ((UPLOAD_LIMITS.BLOCKED_EXTENSIONS as readonly string[]).includes(extension)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Macro-enabled Excel files (.xlsm) are not allowed for security reasons.',
      });
    } else if (!(UPLOAD_LIMITS.ALLOWED_EXTENSIONS as readonly string[]).includes(extension)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Only CSV and Excel files (.csv, .xlsx, .xls) are allowed.',
      });
    }
  }),

  size: z
    .number()
    .int()
    .min(1, 'The uploaded file is empty.')
    .max(UPLOAD_LIMITS.MAX_FILE_BYTES, 'File size must be less than 100MB.'),
});

export type DatasetUploadInput = z.infer<typeof DatasetUploadSchema>;

export const QueryPromptSchema = z
  .string()
  .trim()
  .min(1, 'Please enter a question.')
  .max(PROMPT_LIMITS.MAX_PROMPT_LENGTH, `Questions must be at most ${PROMPT_LIMITS.MAX_PROMPT_LENGTH} characters.`);

// =============================================================================
// LLM REPLIES
// =============================================================================

/**
 * JSON object the analyst model is instructed to return
 */
export const AnalystReplySchema = z.object({
  answer: z.string().trim().min(1),
  visualization: VisualizationSchema.nullable().optional(),
});

export type AnalystReply = z.infer<typeof AnalystReplySchema>;

// =============================================================================
// MCP TOOL INPUTS
// =============================================================================

export const IngestDatasetSchema = z.object({
  file_path: z
    .string()
    .min(1)
    .describe('Path to a .csv, .xlsx or .xls file readable by the server'),
  name: z
    .string()
    .optional()
    .describe('Display name for the dataset (defaults to the file name)'),
  open_session: z
    .boolean()
    .optional()
    .describe('Also open a session "Analysis of <name>" when the dataset is ready'),
});

export const CreateSessionSchema = z.object({
  dataset_id: z.string().min(1).describe('Id of a dataset returned by ingest_dataset'),
  title: z.string().max(255).optional().describe('Session title (defaults to "Analysis of <dataset name>")'),
});

export const SubmitQuerySchema = z.object({
  session_id: z.string().min(1).describe('Analysis session to ask in'),
  prompt: QueryPromptSchema.describe('Natural language question about the session dataset'),
});

export const GetHistorySchema = z.object({
  session_id: z.string().min(1).describe('Analysis session to read'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(200)
    .optional()
    .describe('Only return the most recent N exchanges'),
});

export const AnalystStatusSchema = z.object({
  include_metrics: z
    .boolean()
    .default(true)
    .describe('Include per-category query metrics'),
});
