// State module - remembers delivered links across runs
import { createHash } from 'crypto';
import { readFile, rename, writeFile } from 'fs/promises';
import { SeenStoreError, errorMessage } from './errors';
import type { Article } from './types';

export const MAX_SEEN_LINKS = 5000;
const MAX_SAVE_ATTEMPTS = 3;

export interface SeenSnapshot {
  /** Oldest first */
  links: string[];
  /** Opaque change token; null when nothing has been stored yet */
  version: string | null;
}

export type SaveOutcome = { ok: true; version: string } | { ok: false; reason: 'conflict' };

export interface SeenStore {
  load(): Promise<SeenSnapshot>;
  /** Writes only if the stored version still equals `expectedVersion` */
  save(links: readonly string[], expectedVersion: string | null): Promise<SaveOutcome>;
}

function contentVersion(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

function parseLinks(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

function serializeLinks(links: readonly string[]): string {
  return links.length > 0 ? `${links.join('\n')}\n` : '';
}

/**
 * Line-delimited link file, versioned by the hash of its contents
 */
export class FileSeenStore implements SeenStore {
  constructor(private readonly path: string) {}

  private async readText(): Promise<string | null> {
    try {
      return await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async load(): Promise<SeenSnapshot> {
    const text = await this.readText();
    if (text === null) return { links: [], version: null };
    return { links: parseLinks(text), version: contentVersion(text) };
  }

  async save(links: readonly string[], expectedVersion: string | null): Promise<SaveOutcome> {
    const current = await this.readText();
    const currentVersion = current === null ? null : contentVersion(current);
    if (currentVersion !== expectedVersion) {
      return { ok: false, reason: 'conflict' };
    }

    const text = serializeLinks(links);
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmpPath, text, 'utf8');
    await rename(tmpPath, this.path);
    return { ok: true, version: contentVersion(text) };
  }
}

/**
 * In-process store with the same versioning contract (tests, dry runs)
 */
export class MemorySeenStore implements SeenStore {
  private text: string | null;

  constructor(initial?: readonly string[]) {
    this.text = initial ? serializeLinks(initial) : null;
  }

  async load(): Promise<SeenSnapshot> {
    if (this.text === null) return { links: [], version: null };
    return { links: parseLinks(this.text), version: contentVersion(this.text) };
  }

  async save(links: readonly string[], expectedVersion: string | null): Promise<SaveOutcome> {
    const currentVersion = this.text === null ? null : contentVersion(this.text);
    if (currentVersion !== expectedVersion) {
      return { ok: false, reason: 'conflict' };
    }
    this.text = serializeLinks(links);
    return { ok: true, version: contentVersion(this.text) };
  }
}


/**
 * Load delivered links; an unreachable store counts as an empty history
 */
export async function loadSeenLinks(store: SeenStore): Promise<Set<string>> {
  try {
    const snapshot = await store.load();
    return new Set(snapshot.links);
  } catch (error) {
    const failure = new SeenStoreError(`Could not load seen links: ${errorMessage(error)}`, {
      cause: error,
    });
    console.warn(`${failure.message}. Continuing without cross-run suppression`);
    return new Set();
  }
}

export function filterUnseen<T extends Article>(
  articles: readonly T[],
  seen: ReadonlySet<string>
): T[] {
  return articles.filter((article) => !seen.has(article.link));
}

/**
 * Append delivered links after the existing ones and keep the newest `limit`.
 * Eviction is oldest-first by insertion order.
 */
export function mergeSeenLinks(
  existing: readonly string[],
  delivered: Iterable<string>,
  limit = MAX_SEEN_LINKS
): string[] {
  const merged = new Set(existing);
  for (const link of delivered) {
    if (!link) continue;
    // Re-delivered links move to the newest end
    merged.delete(link);
    merged.add(link);
  }
  const links = [...merged];
  return links.length > limit ? links.slice(links.length - limit) : links;
}

/**
 * Record delivered links. A concurrent writer causes a reload and re-merge,
 * never an overwrite.
 */
export async function commitDelivered(
  store: SeenStore,
  delivered: readonly string[],
  limit = MAX_SEEN_LINKS
): Promise<string[]> {
  for (let attempt = 1; attempt <= MAX_SAVE_ATTEMPTS; attempt++) {
    let merged: string[];
    let outcome: SaveOutcome;
    try {
      const snapshot = await store.load();
      merged = mergeSeenLinks(snapshot.links, delivered, limit);
      outcome = await store.save(merged, snapshot.version);
    } catch (error) {
      throw new SeenStoreError(`Could not save seen links: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (outcome.ok) return merged;
    console.warn(`  Seen links changed during the run, re-merging (attempt ${attempt})`);
  }

  throw new SeenStoreError(`Seen links kept changing after ${MAX_SAVE_ATTEMPTS} attempts`);
}
