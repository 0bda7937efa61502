/**
 * Shared Snippet Source
 *
 * Read-only view of snippets.json in the container shared with the host app.
 * The host app owns CRUD and persistence; this side only reads. A missing or
 * corrupt file reads as an empty list.
 */

import { readFileSync, statSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import type { Snippet, SnippetSource } from '../../types/BackendTypes';

export const SNIPPETS_FILE_NAME = 'snippets.json';

const SnippetSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  text: z.string(),
  pinned: z.boolean().default(false),
  lastUsed: z.string().optional(),
});

const SnippetFileSchema = z.array(SnippetSchema);

/**
 * Case-insensitive match on title or text. Keeps stored order; an empty query returns everything.
 */
export function searchSnippets(snippets: readonly Snippet[], query: string): Snippet[] {
  const trimmed = query.trim();
  if (trimmed === '') {
    return [...snippets];
  }
  const lower = trimmed.toLowerCase();
  return snippets.filter(
    (s) => s.title.toLowerCase().includes(lower) || s.text.toLowerCase().includes(lower)
  );
}

export class SharedSnippetSource implements SnippetSource {
  private readonly filePath: string;
  private cache: readonly Snippet[] = [];
  private loadedMtimeMs: number | null = null;

  constructor(containerDir: string, private readonly logger: Logger) {
    this.filePath = join(containerDir, SNIPPETS_FILE_NAME);
  }

  /**
   * Re-reads the file only when its mtime changed since the last read.
   */
  getSnippets(): readonly Snippet[] {
    let mtimeMs: number;
    try {
      mtimeMs = statSync(this.filePath).mtimeMs;
    } catch (error) {
      this.logger.debug('Snippets file not readable', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      this.cache = [];
      this.loadedMtimeMs = null;
      return this.cache;
    }

    if (this.loadedMtimeMs === mtimeMs) {
      return this.cache;
    }
    this.cache = this.load();
    this.loadedMtimeMs = mtimeMs;
    return this.cache;
  }

  private load(): readonly Snippet[] {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.warn('Snippets file is not valid JSON; treating as empty', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const parsed = SnippetFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Snippets file failed validation; treating as empty', {
        filePath: this.filePath,
        error: parsed.error.message,
      });
      return [];
    }
    return parsed.data;
  }
}
