/**
 * Core module - llama-cli argument resolution
 */

export { parseConfigInteger, parseConfigFloat, isPositiveConfigNumber, formatFixed } from './config-number';
export { resolveLlamaArgs } from './resolve-llama-args';
