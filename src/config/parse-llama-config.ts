/**
 * Build the static llama-cli configuration from environment variables.
 * Each option reads `<Name>Cmd` for its flag token and `<Name>Val` or
 * `<Name>Enabled` for its value.
 */

import { BooleanOption, LlamaCliConfig, ValueOption } from '../types/llama-config';
import { EnvRecord, getEnvBool, getEnvString } from './env-values';

function valueOption(env: EnvRecord, flagKey: string, valueKey: string): ValueOption {
  return { flag: getEnvString(env, flagKey), value: getEnvString(env, valueKey) };
}

function booleanOption(env: EnvRecord, flagKey: string, enabledKey: string): BooleanOption {
  return { flag: getEnvString(env, flagKey), enabled: getEnvBool(env, enabledKey) };
}

/**
 * Parse every llama-cli option from `env`
 */
export function parseLlamaCliConfig(env: EnvRecord): LlamaCliConfig {
  return {
    model: valueOption(env, 'ModelCmd', 'ModelFullPathVal'),
    threads: valueOption(env, 'ThreadsCmd', 'ThreadsVal'),
    gpuLayers: valueOption(env, 'GPULayersCmd', 'GPULayersVal'),
    ctxSize: valueOption(env, 'CtxSizeCmd', 'CtxSizeVal'),
    batchSize: valueOption(env, 'BatchCmd', 'BatchCmdVal'),

    predict: valueOption(env, 'PredictCmd', 'PredictVal'),
    temperature: valueOption(env, 'TemperatureCmd', 'TemperatureVal'),
    topK: valueOption(env, 'TopKCmd', 'TopKVal'),
    topP: valueOption(env, 'TopPCmd', 'TopPVal'),
    repeatPenalty: valueOption(env, 'RepeatPenaltyCmd', 'RepeatPenaltyVal'),

    prompt: valueOption(env, 'PromptCmd', 'PromptText'),
    promptFile: valueOption(env, 'PromptFileCmd', 'PromptFileVal'),

    modelLogFile: valueOption(env, 'ModelLogFileCmd', 'ModelLogFileNameVal'),

    multilineInput: booleanOption(env, 'MultilineInputCmd', 'MultilineInputCmdEnabled'),
    flashAttention: booleanOption(env, 'FlashAttentionCmd', 'FlashAttentionCmdEnabled'),
    promptCache: valueOption(env, 'PromptCacheCmd', 'PromptCacheVal'),
    noDisplayPrompt: booleanOption(env, 'NoDisplayPromptCmd', 'NoDisplayPromptEnabled'),
    escapeNewLines: booleanOption(env, 'EscapeNewLinesCmd', 'EscapeNewLinesCmdEnabled'),
    noConversation: booleanOption(env, 'NoConversationCmd', 'NoConversationCmdEnabled'),
    noContextShift: booleanOption(env, 'NoContextShiftCmd', 'NoContextShiftCmdEnabled'),
  };
}
