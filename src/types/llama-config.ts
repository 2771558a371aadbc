/**
 * Static llama-cli configuration
 * Every option pairs a flag token with its configured value, so any option
 * can be remapped to a different flag without code changes.
 */

/**
 * Option emitted as `[flag, value]` when the value is non-empty
 */
export interface ValueOption {
  flag: string;
  value: string;
}

/**
 * Option emitted as `[flag]` when enabled
 */
export interface BooleanOption {
  flag: string;
  enabled: boolean;
}

/**
 * All llama-cli options known to the server
 */
export interface LlamaCliConfig {
  // Core model & performance
  model: ValueOption;
  threads: ValueOption;
  gpuLayers: ValueOption;
  ctxSize: ValueOption;
  batchSize: ValueOption;

  // Generation control
  predict: ValueOption;
  temperature: ValueOption;
  topK: ValueOption;
  topP: ValueOption;
  repeatPenalty: ValueOption;

  // Prompt input. The configured prompt text and prompt file are kept for
  // completeness but are never emitted: every request carries its own prompt.
  prompt: ValueOption;
  promptFile: ValueOption;

  // Output
  modelLogFile: ValueOption;

  // Static switches
  multilineInput: BooleanOption;
  flashAttention: BooleanOption;
  promptCache: ValueOption;
  noDisplayPrompt: BooleanOption;
  escapeNewLines: BooleanOption;
  noConversation: BooleanOption;
  noContextShift: BooleanOption;
}

/**
 * Server-level settings
 */
export interface AppConfig {
  /** Path to the llama-cli executable */
  llamaCliPath: string;
  /** Directory holding model files */
  modelPath: string;
  /** Directory for prompt cache files */
  promptCachePath: string;
  /** Directory for the application log file (empty = console only) */
  appLogPath: string;
  /** Application log file name */
  appLogFileName: string;
  /** TCP port the HTTP server listens on */
  httpPort: number;
  /** HTTP path serving MCP requests */
  endpoint: string;
  /** Per-request timeout in seconds */
  timeoutSeconds: number;
}

/**
 * The complete configuration, read-only after startup
 */
export interface EffectiveConfig {
  app: AppConfig;
  llama: LlamaCliConfig;
}

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_HTTP_PORT = 8080;
export const DEFAULT_ENDPOINT = '/mcp-completion';
export const DEFAULT_CONFIG_FILE = 'byte-vision-cfg.env';

/**
 * Whether a value is a usable value option
 */
export function isValueOption(option: ValueOption | BooleanOption): option is ValueOption {
  return 'value' in option;
}

/**
 * Timeout in seconds, falling back to the default when not positive
 */
export function getTimeoutSeconds(app: AppConfig): number {
  return app.timeoutSeconds > 0 ? app.timeoutSeconds : DEFAULT_TIMEOUT_SECONDS;
}
