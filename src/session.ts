import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { Message } from './llm/types';
import type { EnvConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * Conversation transcripts keyed by session id.
 */
export interface SessionStore {
  append(sessionId: string, item: Message): Promise<void>;
  /** Items in insertion order; with `limit`, only the most recent ones. */
  list(sessionId: string, limit?: number): Promise<Message[]>;
  clear(sessionId: string): Promise<void>;
}

const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

const TranscriptSchema = z.array(MessageSchema);

function tail(items: Message[], limit?: number): Message[] {
  if (limit === undefined) return [...items];
  return limit > 0 ? items.slice(-limit) : [];
}

export class MemorySessionStore implements SessionStore {
  private store = new Map<string, Message[]>();

  async append(sessionId: string, item: Message): Promise<void> {
    const items = this.store.get(sessionId) ?? [];
    items.push({ ...item });
    this.store.set(sessionId, items);
  }

  async list(sessionId: string, limit?: number): Promise<Message[]> {
    return tail(this.store.get(sessionId) ?? [], limit);
  }

  async clear(sessionId: string): Promise<void> {
    this.store.delete(sessionId);
  }
}

/**
 * One JSON file per session under `dir`.
 */
export class LocalFileSessionStore implements SessionStore {
  constructor(private dir = '.sessions') { }

  private getPath(sessionId: string): string {
    // Session ids come from callers; keep them inside `dir`.
    return join(this.dir, `${encodeURIComponent(sessionId)}.json`);
  }

  async append(sessionId: string, item: Message): Promise<void> {
    const items = await this.read(sessionId);
    items.push(item);
    await this.write(sessionId, items);
  }

  async list(sessionId: string, limit?: number): Promise<Message[]> {
    return tail(await this.read(sessionId), limit);
  }

  async clear(sessionId: string): Promise<void> {
    await fs.rm(this.getPath(sessionId), { force: true });
  }

  private async read(sessionId: string): Promise<Message[]> {
    const path = this.getPath(sessionId);
    let data: string;
    try {
      data = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.warn('Sessions', 'Discarding unreadable session transcript', { path, error: errorMessage(error) });
      return [];
    }

    const parsed = TranscriptSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Sessions', 'Discarding unreadable session transcript', { path, error: parsed.error.message });
      return [];
    }
    return parsed.data;
  }

  private async write(sessionId: string, items: Message[]): Promise<void> {
    const path = this.getPath(sessionId);
    await fs.mkdir(this.dir, { recursive: true });
    const tempPath = `${path}.tmp`;

    // Write to temp file first, then rename for atomicity
    await fs.writeFile(tempPath, JSON.stringify(items, null, 2));
    await fs.rename(tempPath, path);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Store selected by the environment, or `undefined` when sessions are disabled.
 */
export function createSessionStore(
  config: Pick<EnvConfig, 'ENABLE_SESSIONS' | 'SESSION_DIR'>
): SessionStore | undefined {
  if (!config.ENABLE_SESSIONS) return undefined;
  logger.debug('Sessions', 'Using file session store', { dir: config.SESSION_DIR });
  return new LocalFileSessionStore(config.SESSION_DIR);
}
