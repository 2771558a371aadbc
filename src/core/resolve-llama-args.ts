/**
 * Argument Resolver
 * Merges the static llama-cli configuration with one request's overrides
 * into the ordered argument vector passed to the executable.
 *
 * Resolution order:
 *  1. model, threads, gpu layers, context size, batch size
 *  2. predict, temperature, top-k, top-p, repeat penalty
 *  3. prompt file or prompt (exactly one, never the configured default)
 *  4. log file
 *  5. static switches
 *
 * For steps 1-2 a set override wins and is formatted here (integers in base
 * 10, floats with two decimals). Otherwise the configured default is passed
 * through verbatim, provided it parses to a number > 0. Defaults that do not
 * parse are treated as absent.
 */

import {
  BooleanOption,
  LlamaCliConfig,
  ValueOption,
  isValueOption,
} from '../types/llama-config';
import { CompletionOverrides } from '../types/completion';
import { formatFixed, isPositiveConfigNumber } from './config-number';

type OverridableKey =
  | 'model'
  | 'threads'
  | 'gpuLayers'
  | 'ctxSize'
  | 'batchSize'
  | 'predict'
  | 'temperature'
  | 'topK'
  | 'topP'
  | 'repeatPenalty';

type OptionKind = 'string' | 'int' | 'float';

interface OverridableOption {
  key: OverridableKey;
  kind: OptionKind;
}

/**
 * Options that accept a per-request override, in emission order
 */
const OVERRIDABLE_OPTIONS: readonly OverridableOption[] = [
  { key: 'model', kind: 'string' },
  { key: 'threads', kind: 'int' },
  { key: 'gpuLayers', kind: 'int' },
  { key: 'ctxSize', kind: 'int' },
  { key: 'batchSize', kind: 'int' },
  { key: 'predict', kind: 'int' },
  { key: 'temperature', kind: 'float' },
  { key: 'topK', kind: 'int' },
  { key: 'topP', kind: 'float' },
  { key: 'repeatPenalty', kind: 'float' },
];

/**
 * Switches appended from configuration after the log file
 */
const STATIC_SWITCH_KEYS = [
  'multilineInput',
  'flashAttention',
  'promptCache',
  'noDisplayPrompt',
  'escapeNewLines',
  'noConversation',
  'noContextShift',
] as const satisfies ReadonlyArray<keyof LlamaCliConfig>;

/**
 * Build the llama-cli argument vector for one request
 */
export function resolveLlamaArgs(config: LlamaCliConfig, overrides: CompletionOverrides): string[] {
  const args: string[] = [];

  for (const { key, kind } of OVERRIDABLE_OPTIONS) {
    const option = config[key];
    const override = formatOverride(overrides[key], kind);
    if (override !== undefined) {
      pushValue(args, option.flag, override);
    } else if (hasUsableDefault(option, kind)) {
      pushValue(args, option.flag, option.value);
    }
  }

  // A request prompt always replaces the configured one
  if (isSetString(overrides.promptFile)) {
    pushValue(args, config.promptFile.flag, overrides.promptFile);
  } else if (isSetString(overrides.prompt)) {
    pushValue(args, config.prompt.flag, overrides.prompt);
  }

  if (isSetString(overrides.logFile)) {
    pushValue(args, config.modelLogFile.flag, overrides.logFile);
  } else if (config.modelLogFile.value !== '') {
    pushValue(args, config.modelLogFile.flag, config.modelLogFile.value);
  }

  // Static options must never reintroduce a second prompt flag
  const promptFlags = new Set([config.prompt.flag, config.promptFile.flag].filter((flag) => flag !== ''));

  for (const key of STATIC_SWITCH_KEYS) {
    pushStatic(args, config[key], promptFlags);
  }

  return args;
}

/**
 * Format a request override, or return undefined when it is not set
 */
function formatOverride(value: string | number | undefined, kind: OptionKind): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return kind === 'string' && value !== '' ? value : undefined;
  }
  if (!Number.isFinite(value)) {
    return undefined;
  }
  switch (kind) {
    case 'int': {
      const whole = Math.trunc(value);
      return whole > 0 ? String(whole) : undefined;
    }
    case 'float':
      return value > 0 ? formatFixed(value, 2) : undefined;
    default:
      return undefined;
  }
}

function hasUsableDefault(option: ValueOption, kind: OptionKind): boolean {
  if (kind === 'string') {
    return option.value !== '';
  }
  return isPositiveConfigNumber(option.value, kind);
}

function isSetString(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

function pushValue(args: string[], flag: string, value: string): void {
  if (flag === '') {
    return;
  }
  args.push(flag, value);
}

function pushStatic(args: string[], option: ValueOption | BooleanOption, reservedFlags: Set<string>): void {
  if (option.flag === '' || reservedFlags.has(option.flag)) {
    return;
  }
  if (isValueOption(option)) {
    if (option.value !== '') {
      args.push(option.flag, option.value);
    }
  } else if (option.enabled) {
    args.push(option.flag);
  }
}
