import { randomUUID } from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { metricKey } from '../comparator';
import { fileTimestamp, sanitizeName } from '../constants';
import { MetricRecordConflictError, StoreError, errorMessage } from '../errors';
import { AnalysisSummary, ComparisonRecord, MetricRecord } from '../types';
import {
  AnalysisManifest,
  analysisManifestSchema,
  comparisonRecordSchema,
  describeIssues,
  metricRecordSchema
} from './schemas';

const COMPARISONS_FILE = 'comparisons.jsonl';
const METRICS_FILE = 'metrics.jsonl';
const MANIFEST_FILE = 'manifest.json';

/**
 * Append-only store of comparison and metric records, one directory per
 * analysis. Lines are only ever appended; a metric key written once can not
 * be written again.
 */
export class MetricsStore {
  readonly root: string;
  private readonly writtenKeys = new Map<string, Promise<Set<string>>>();

  constructor(dataDir: string) {
    this.root = path.join(dataDir, 'analyses');
  }

  private dir(analysisId: string): string {
    const safe = sanitizeName(analysisId);
    if (safe !== analysisId) throw new StoreError(`Invalid analysis id: ${analysisId}`);
    return path.join(this.root, safe);
  }

  async createAnalysis(sampleId: string, computedAt: string): Promise<AnalysisManifest> {
    const manifest: AnalysisManifest = {
      analysisId: `${fileTimestamp(computedAt)}-${randomUUID().slice(0, 8)}`,
      sampleId,
      computedAt
    };
    try {
      await fs.outputJson(path.join(this.dir(manifest.analysisId), MANIFEST_FILE), manifest, { spaces: 2 });
    } catch (e) {
      throw new StoreError(`Failed to create analysis ${manifest.analysisId}: ${errorMessage(e)}`);
    }
    return manifest;
  }

  private async appendLine(analysisId: string, file: string, record: ComparisonRecord | MetricRecord): Promise<void> {
    const dir = this.dir(analysisId);
    if (!(await fs.pathExists(path.join(dir, MANIFEST_FILE)))) throw new StoreError(`Unknown analysis: ${analysisId}`);
    try {
      await fs.appendFile(path.join(dir, file), JSON.stringify(record) + '\n', 'utf8');
    } catch (e) {
      throw new StoreError(`Failed to append to ${file} of ${analysisId}: ${errorMessage(e)}`);
    }
  }

  async appendComparison(analysisId: string, record: ComparisonRecord): Promise<void> {
    await this.appendLine(analysisId, COMPARISONS_FILE, record);
  }

  private keysFor(analysisId: string): Promise<Set<string>> {
    let pending = this.writtenKeys.get(analysisId);
    if (!pending) {
      pending = this.readLines(analysisId, METRICS_FILE, metricRecordSchema).then(records => new Set(records.map(metricKey)));
      this.writtenKeys.set(analysisId, pending);
    }
    return pending;
  }

  async appendMetric(analysisId: string, record: MetricRecord): Promise<void> {
    const keys = await this.keysFor(analysisId);
    const key = metricKey(record);
    if (keys.has(key)) throw new MetricRecordConflictError(key);
    // claimed before the write so a concurrent writer of the same key fails
    keys.add(key);
    try {
      await this.appendLine(analysisId, METRICS_FILE, record);
    } catch (e) {
      keys.delete(key);
      throw e;
    }
  }

  private async readLines<S extends z.ZodTypeAny>(analysisId: string, file: string, schema: S): Promise<z.infer<S>[]> {
    const target = path.join(this.dir(analysisId), file);
    if (!(await fs.pathExists(target))) return [];
    const text = await fs.readFile(target, 'utf8');
    const records: z.infer<S>[] = [];
    text.split('\n').forEach((line, i) => {
      if (!line.trim()) return;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (e) {
        throw new StoreError(`${file}:${i + 1} of ${analysisId} is not JSON: ${errorMessage(e)}`);
      }
      const parsed = schema.safeParse(raw);
      if (!parsed.success) throw new StoreError(`${file}:${i + 1} of ${analysisId}: ${describeIssues(parsed.error)}`);
      records.push(parsed.data);
    });
    return records;
  }

  private async readManifest(analysisId: string): Promise<AnalysisManifest> {
    const file = path.join(this.dir(analysisId), MANIFEST_FILE);
    if (!(await fs.pathExists(file))) throw new StoreError(`Unknown analysis: ${analysisId}`);
    const parsed = analysisManifestSchema.safeParse(await fs.readJson(file));
    if (!parsed.success) throw new StoreError(`Invalid manifest for ${analysisId}: ${describeIssues(parsed.error)}`);
    return parsed.data;
  }

  // Newest first.
  async listAnalyses(): Promise<AnalysisManifest[]> {
    if (!(await fs.pathExists(this.root))) return [];
    const manifests: AnalysisManifest[] = [];
    for (const name of await fs.readdir(this.root)) {
      if (!(await fs.pathExists(path.join(this.root, name, MANIFEST_FILE)))) continue;
      manifests.push(await this.readManifest(name));
    }
    return manifests.sort((a, b) =>
      a.computedAt !== b.computedAt ? (a.computedAt < b.computedAt ? 1 : -1) : a.analysisId < b.analysisId ? 1 : -1
    );
  }

  // Historical reload; no adapter runs.
  async loadAnalysis(analysisId: string): Promise<AnalysisSummary> {
    const manifest = await this.readManifest(analysisId);
    return {
      ...manifest,
      comparisons: await this.readLines(analysisId, COMPARISONS_FILE, comparisonRecordSchema),
      metrics: await this.readLines(analysisId, METRICS_FILE, metricRecordSchema)
    };
  }

  async clear(): Promise<void> {
    this.writtenKeys.clear();
    await fs.remove(this.root);
  }
}
