import * as fs from 'fs-extra';
import * as path from 'path';
import { fileTimestamp, sanitizeName } from '../constants';
import { StoreError, errorMessage } from '../errors';
import { RunRecord } from '../types';
import { describeIssues, runRecordSchema } from './schemas';

export interface RunStoreFilter {
  runId?: string;
  toolId?: string;
}

export interface UnreadableRecord {
  file: string;
  reason: string;
}

export interface RunListing {
  records: RunRecord[];
  unreadable: UnreadableRecord[];
}

export interface RunRecordSink {
  save(record: RunRecord): Promise<string>;
}

export function repositorySlug(repositoryId: string): string {
  return sanitizeName(repositoryId.replace(/\//g, '__'));
}

function compareRecords(a: RunRecord, b: RunRecord): number {
  if (a.startedAt !== b.startedAt) return a.startedAt < b.startedAt ? -1 : 1;
  if (a.toolId !== b.toolId) return a.toolId < b.toolId ? -1 : 1;
  if (a.repositoryId !== b.repositoryId) return a.repositoryId < b.repositoryId ? -1 : 1;
  return a.recordId < b.recordId ? -1 : a.recordId > b.recordId ? 1 : 0;
}

/**
 * Run Records on disk, one JSON file each:
 * `<dataDir>/runs/<toolId>/<repository-slug>/<timestamp>-<recordId>.json`.
 * Raw documents are kept verbatim so runs can be re-normalized later.
 */
export class RunStore implements RunRecordSink {
  readonly root: string;

  constructor(dataDir: string, private readonly verbose = false) {
    this.root = path.join(dataDir, 'runs');
  }

  pathFor(record: RunRecord): string {
    return path.join(
      this.root,
      sanitizeName(record.toolId),
      repositorySlug(record.repositoryId),
      `${fileTimestamp(record.startedAt)}-${sanitizeName(record.recordId)}.json`
    );
  }

  async save(record: RunRecord): Promise<string> {
    const file = this.pathFor(record);
    try {
      await fs.outputJson(file, record, { spaces: 2 });
    } catch (e) {
      throw new StoreError(`Failed to persist run record ${record.recordId}: ${errorMessage(e)}`);
    }
    return file;
  }

  private async jsonFiles(): Promise<string[]> {
    if (!(await fs.pathExists(this.root))) return [];
    const files: string[] = [];
    for (const tool of await fs.readdir(this.root)) {
      const toolDir = path.join(this.root, tool);
      if (!(await fs.stat(toolDir)).isDirectory()) continue;
      for (const repo of await fs.readdir(toolDir)) {
        const repoDir = path.join(toolDir, repo);
        if (!(await fs.stat(repoDir)).isDirectory()) continue;
        for (const name of await fs.readdir(repoDir)) {
          if (name.endsWith('.json')) files.push(path.join(repoDir, name));
        }
      }
    }
    return files.sort();
  }

  async list(filter: RunStoreFilter = {}): Promise<RunListing> {
    const records: RunRecord[] = [];
    const unreadable: UnreadableRecord[] = [];
    for (const file of await this.jsonFiles()) {
      let raw: unknown;
      try {
        raw = await fs.readJson(file);
      } catch (e) {
        unreadable.push({ file, reason: errorMessage(e) });
        continue;
      }
      const parsed = runRecordSchema.safeParse(raw);
      if (!parsed.success) {
        unreadable.push({ file, reason: describeIssues(parsed.error) });
        continue;
      }
      const record = parsed.data;
      if (filter.runId && record.runId !== filter.runId) continue;
      if (filter.toolId && record.toolId !== filter.toolId) continue;
      records.push(record);
    }
    if (this.verbose) {
      for (const u of unreadable) console.warn(`⚠️  Skipping unreadable run record ${u.file}: ${u.reason}`);
    }
    return { records: records.sort(compareRecords), unreadable };
  }

  // Most recent record per (tool, repository).
  async latestByPair(filter: RunStoreFilter = {}): Promise<RunListing> {
    const listing = await this.list(filter);
    const latest = new Map<string, RunRecord>();
    for (const record of listing.records) latest.set(`${record.toolId}\u0000${record.repositoryId}`, record);
    return { records: [...latest.values()].sort(compareRecords), unreadable: listing.unreadable };
  }

  async clear(): Promise<void> {
    await fs.remove(this.root);
  }
}
