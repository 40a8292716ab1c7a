// Filesystem and in-memory implementations of ChangeLogReader and ChangeLogWriter.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ChangeLogReader, ChangeLogWriter } from './types.js';

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a ChangeLogWriter that writes to the local filesystem.
 */
export function createFilesystemWriter(): ChangeLogWriter {
  return {
    async writeFile(filePath: string, content: string): Promise<void> {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf-8');
    },

    exists: pathExists,
  };
}

/**
 * Create a ChangeLogReader that reads from the local filesystem.
 */
export function createFilesystemReader(): ChangeLogReader {
  return {
    exists: pathExists,

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },

    async listDirectory(dirPath: string): Promise<string[]> {
      return fs.readdir(dirPath);
    },
  };
}

/**
 * Create an in-memory ChangeLogWriter for testing.
 * Returns the writer and a Map of all written files.
 */
export function createInMemoryWriter(): {
  writer: ChangeLogWriter;
  files: Map<string, string>;
} {
  const files = new Map<string, string>();

  const writer: ChangeLogWriter = {
    async writeFile(filePath: string, content: string): Promise<void> {
      files.set(filePath, content);
    },

    async exists(filePath: string): Promise<boolean> {
      return files.has(filePath);
    },
  };

  return { writer, files };
}

/**
 * Create an in-memory ChangeLogReader from a Map of files.
 */
export function createInMemoryReader(files: Map<string, string>): ChangeLogReader {
  return {
    async exists(filePath: string): Promise<boolean> {
      if (files.has(filePath)) return true;
      const prefix = filePath.endsWith('/') ? filePath : filePath + '/';
      return [...files.keys()].some((key) => key.startsWith(prefix));
    },

    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },

    async listDirectory(dirPath: string): Promise<string[]> {
      const entries = new Set<string>();
      const prefix = dirPath.endsWith('/') ? dirPath : dirPath + '/';

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split('/')[0];
          if (firstPart) {
            entries.add(firstPart);
          }
        }
      }

      return Array.from(entries);
    },
  };
}
