/**
 * Input schema of the generate_completion tool
 * Numeric fields that are zero or negative mean "use the configured default".
 */

import { z } from 'zod';
import { CompletionOverrides } from '../types/completion';

/**
 * Raw zod shape, as registered with the MCP server
 */
export const completionArgumentsShape = {
  prompt: z.string().describe('The prompt text to generate completion for'),

  // Core model & performance
  model: z.string().optional().describe('Model path (overrides default)'),
  threads: z.number().int().optional().describe('CPU threads for generation'),
  gpu_layers: z.number().int().optional().describe('GPU acceleration layers'),
  ctx_size: z.number().int().optional().describe('Context window size'),
  batch_size: z.number().int().optional().describe('Batch processing size'),

  // Generation control
  predict: z.number().int().optional().describe('Number of tokens to generate'),
  temperature: z.number().optional().describe('Creativity/randomness control'),
  top_k: z.number().int().optional().describe('Top-K sampling'),
  top_p: z.number().optional().describe('Top-P (nucleus) sampling'),
  repeat_penalty: z.number().optional().describe('Repetition penalty'),

  // Input/output
  prompt_file: z.string().optional().describe('Prompt from file'),
  log_file: z.string().optional().describe('Output logging'),
};

export const completionArgumentsSchema = z.object(completionArgumentsShape);

export type CompletionArguments = z.infer<typeof completionArgumentsSchema>;

/**
 * Map wire arguments onto per-request overrides
 */
export function toCompletionOverrides(args: CompletionArguments): CompletionOverrides {
  return {
    prompt: args.prompt,
    model: args.model,
    threads: args.threads,
    gpuLayers: args.gpu_layers,
    ctxSize: args.ctx_size,
    batchSize: args.batch_size,
    predict: args.predict,
    temperature: args.temperature,
    topK: args.top_k,
    topP: args.top_p,
    repeatPenalty: args.repeat_penalty,
    promptFile: args.prompt_file,
    logFile: args.log_file,
  };
}
