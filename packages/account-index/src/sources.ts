/**
 * Account index backing sources
 *
 * A source only knows how to read the raw document; validation and
 * normalization happen in the index so every source is checked the same way.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

export interface IndexSource {
  /** Human-readable location, used in logs and errors */
  describe(): string;
  read(): Promise<unknown>;
}

/**
 * Reads a JSON or YAML index document from disk
 */
export class FileIndexSource implements IndexSource {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<unknown> {
    const content = await readFile(this.filePath, 'utf-8');
    const ext = path.extname(this.filePath).toLowerCase();
    if (ext === '.yaml' || ext === '.yml') {
      return parseYaml(content);
    }
    return JSON.parse(content);
  }
}

/**
 * Serves an in-memory document. Each read returns a fresh copy.
 */
export class StaticIndexSource implements IndexSource {
  private document: unknown;

  constructor(document: unknown, private readonly label = 'static') {
    this.document = document;
  }

  describe(): string {
    return this.label;
  }

  /** Swap the document served on the next read */
  replace(document: unknown): void {
    this.document = document;
  }

  async read(): Promise<unknown> {
    return structuredClone(this.document);
  }
}
