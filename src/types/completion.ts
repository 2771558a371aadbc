/**
 * Per-request completion overrides
 * A field that is missing, an empty string, or a number <= 0 counts as not set
 * and the configured default applies.
 */
export interface CompletionOverrides {
  /** Prompt text (validated non-empty before resolution) */
  prompt: string;

  // Core model & performance
  model?: string;
  threads?: number;
  gpuLayers?: number;
  ctxSize?: number;
  batchSize?: number;

  // Generation control
  predict?: number;
  temperature?: number;
  topK?: number;
  topP?: number;
  repeatPenalty?: number;

  // Input/output
  promptFile?: string;
  logFile?: string;
}

/**
 * Text returned to the MCP caller
 */
export interface CompletionResponse {
  text: string;
  /** Whether the text describes an error rather than model output */
  isError: boolean;
}
