import { existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Ensure the directory that will hold a file exists. In-memory database
 * paths are left alone.
 */
export function ensureParentDirSync(filePath: string): void {
  if (filePath === ':memory:') return;
  ensureDirSync(dirname(filePath));
}

/**
 * First of the candidate paths that exists, or null
 */
export function firstExisting(paths: readonly string[]): string | null {
  return paths.find((p) => existsSync(p)) ?? null;
}

/**
 * Read and parse a JSON file. Parse errors propagate to the caller.
 */
export function readJsonSync(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}
