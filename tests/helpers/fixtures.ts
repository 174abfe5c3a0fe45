/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  const fixturePath = getFixturePath(...parts);
  return fs.promises.readFile(fixturePath, 'utf-8');
}

export interface TempDirResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string | Uint8Array) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary directory with files
 */
export function createTempDir(files: Record<string, string> = {}): TempDirResult {
  const rootDir = path.join(os.tmpdir(), `sqltrail-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const addFile = (relativePath: string, content: string | Uint8Array): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Join log lines the way the application writes them.
 */
export function logText(...lines: string[]): string {
  return lines.join('\n');
}
