/**
 * Environment file loading
 * Values from the env file never overwrite variables already present in the
 * real environment, and process.env is left untouched.
 */

import dotenv from 'dotenv';
import { EnvRecord } from './env-values';

export interface LoadedEnvironment {
  /** Merged variables: real environment over env file */
  env: EnvRecord;
  /** Path the env file was read from */
  filePath: string;
  /** Whether the env file was found and parsed */
  fileLoaded: boolean;
  /** Why the env file could not be read, if it could not */
  warning?: string;
}

/**
 * Load `filePath` and merge it under `processEnv`
 */
export function loadEnvironment(filePath: string, processEnv: EnvRecord = process.env): LoadedEnvironment {
  const result = dotenv.config({ path: filePath, processEnv: {} });

  if (result.error || !result.parsed) {
    return {
      env: { ...processEnv },
      filePath,
      fileLoaded: false,
      warning: `Error loading env file ${filePath}: ${result.error?.message ?? 'no values parsed'}`,
    };
  }

  return {
    env: { ...result.parsed, ...processEnv },
    filePath,
    fileLoaded: true,
  };
}
