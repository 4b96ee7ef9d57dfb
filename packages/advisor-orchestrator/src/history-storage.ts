/**
 * @module @field-advisor/advisor-orchestrator/history-storage
 * File-based history storage implementation.
 *
 * Stores query history in .field-advisor/history/{session_id}/
 */

import { mkdir, writeFile, readFile, readdir, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { HISTORY_CONFIG } from '@field-advisor/advisor-contracts';
import {
  AdvisoryHistorySchema,
  SessionMetadataSchema,
  type AdvisoryHistory,
  type IHistoryStorage,
  type SessionMetadata,
} from './history-types.js';

const SESSION_ID_PATTERN = /^[\w.-]+$/;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function assertSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId) || sessionId === '.' || sessionId === '..') {
    throw new Error(`Invalid session id: ${sessionId}`);
  }
}

/**
 * Generate a session id; lexical order follows creation time.
 */
export function createSessionId(now: number = Date.now()): string {
  return `session_${now}_${Math.random().toString(36).substring(2, 8)}`;
}

/**
 * File-based history storage.
 *
 * Storage structure:
 * ```
 * .field-advisor/history/
 * ├── {session_id_1}/
 * │   └── session.json       # Query, classification and response
 * ├── {session_id_2}/
 * │   └── ...
 * └── index.json             # List of all sessions (metadata)
 * ```
 */
export class FileHistoryStorage implements IHistoryStorage {
  private readonly historyDir: string;
  /** Tail of the index read-modify-write queue */
  private indexQueue: Promise<void> = Promise.resolve();

  constructor(cwd: string, historyDir: string = HISTORY_CONFIG.dir) {
    this.historyDir = resolve(cwd, historyDir);
  }

  /**
   * Save query history.
   */
  async save(history: AdvisoryHistory): Promise<void> {
    assertSessionId(history.sessionId);
    const sessionDir = join(this.historyDir, history.sessionId);

    await mkdir(sessionDir, { recursive: true });
    await writeFile(join(sessionDir, 'session.json'), JSON.stringify(history, null, 2), 'utf-8');

    await this.serializeIndex(() => this.updateIndex(history));
  }

  /**
   * Load query history; null when the session does not exist.
   *
   * @throws Error when session.json exists but is malformed
   */
  async load(sessionId: string): Promise<AdvisoryHistory | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return null;
    }

    let content: string;
    try {
      content = await readFile(join(this.historyDir, sessionId, 'session.json'), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const parsed = AdvisoryHistorySchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Malformed history for session ${sessionId}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * List all session IDs (most recent first).
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.historyDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort()
        .reverse();
    } catch (error) {
      // History directory doesn't exist yet
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Delete session history.
   */
  async delete(sessionId: string): Promise<void> {
    assertSessionId(sessionId);
    await rm(join(this.historyDir, sessionId), { recursive: true, force: true });
    await this.serializeIndex(async () =>
      this.writeIndex((await this.getIndex()).filter((entry) => entry.sessionId !== sessionId)),
    );
  }

  /**
   * Get index (list of all sessions with metadata, most recent first).
   */
  async getIndex(): Promise<SessionMetadata[]> {
    let content: string;
    try {
      content = await readFile(this.indexPath(), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const parsed = z.array(SessionMetadataSchema).safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : [];
  }

  /**
   * Run index.json updates one at a time so concurrent saves keep every entry.
   */
  private serializeIndex(task: () => Promise<void>): Promise<void> {
    const run = this.indexQueue.then(task);
    // The caller gets the rejection from `run`; the queue itself moves on
    this.indexQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Update index.json with session metadata.
   */
  private async updateIndex(history: AdvisoryHistory): Promise<void> {
    const index = (await this.getIndex()).filter((entry) => entry.sessionId !== history.sessionId);

    index.push({
      sessionId: history.sessionId,
      text: history.query.text,
      primary: history.classification.primary,
      language: history.classification.language,
      success: history.success,
      confidence: history.response.confidence,
      durationMs: history.durationMs,
      timestamp: history.startTime,
      sources: [...history.response.sources],
    });

    index.sort((a, b) => b.timestamp - a.timestamp);
    await this.writeIndex(index.slice(0, HISTORY_CONFIG.maxIndexEntries));
  }

  private async writeIndex(index: SessionMetadata[]): Promise<void> {
    await mkdir(this.historyDir, { recursive: true });
    await writeFile(this.indexPath(), JSON.stringify(index, null, 2), 'utf-8');
  }

  private indexPath(): string {
    return join(this.historyDir, 'index.json');
  }
}
