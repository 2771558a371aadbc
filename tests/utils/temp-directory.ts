/**
 * Temporary Directory Management for Tests
 *
 * Provides utilities for creating and managing temporary directories
 * that are cleaned up after tests.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Creates a unique temporary directory for test isolation.
 */
export function createTempDir(prefix = 'llama-completion-mcp-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Removes a directory and all its contents recursively.
 */
export function removeTempDir(dirPath: string): void {
  fs.rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Context object for managing a test directory lifecycle.
 */
export interface TempDirContext {
  /** Path to the temporary directory */
  path: string;
  cleanup: () => void;
  /** Create a file in the temp directory, returning its full path */
  writeFile: (relativePath: string, content: string, mode?: number) => string;
  readFile: (relativePath: string) => string;
  exists: (relativePath: string) => boolean;
}

/**
 * Creates a temporary directory context with helper methods.
 */
export function createTempDirContext(prefix?: string): TempDirContext {
  const dirPath = createTempDir(prefix);

  return {
    path: dirPath,
    cleanup: () => removeTempDir(dirPath),
    writeFile: (relativePath: string, content: string, mode?: number): string => {
      const fullPath = path.join(dirPath, relativePath);
      fs.mkdirSync(path.dirname(fullPath), { recursive: true });
      fs.writeFileSync(fullPath, content, { encoding: 'utf-8', mode });
      return fullPath;
    },
    readFile: (relativePath: string): string => fs.readFileSync(path.join(dirPath, relativePath), 'utf-8'),
    exists: (relativePath: string): boolean => fs.existsSync(path.join(dirPath, relativePath)),
  };
}
