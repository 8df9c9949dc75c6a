// Cross-tool comparison. With no independently verified reference CBOM the
// union of every tool's findings is the yardstick, so all numbers here are
// agreement metrics, never precision or recall.

import { canonicalKey } from './normalizer/aliases';
import {
  AssetSetResult,
  ComparisonRecord,
  DurationStats,
  MetricRecord,
  PairMetricRecord,
  PairOverlap,
  RunCounts,
  RunRecord,
  SizeDurationStats,
  ToolComparison,
  ToolMetricRecord,
  UnionEntry
} from './types';
import { RunContext } from './run-context';

export type CompareContext = Pick<RunContext, 'runId' | 'clock'>;
export type AggregateContext = Pick<RunContext, 'sampleId' | 'clock'>;

const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function ratio(numerator: number, denominator: number): number {
  return denominator ? numerator / denominator : 0;
}

// Jaccard similarity; two empty sets agree completely.
export function overlap(a: ReadonlySet<string>, b: ReadonlySet<string>): { intersection: number; union: number; overlap: number } {
  let intersection = 0;
  for (const key of a) if (b.has(key)) intersection++;
  const union = a.size + b.size - intersection;
  if (a.size === 0 && b.size === 0) return { intersection, union, overlap: 1 };
  if (a.size === 0 || b.size === 0) return { intersection, union, overlap: 0 };
  return { intersection, union, overlap: intersection / union };
}

export function compare(repositoryId: string, assetSetsByTool: AssetSetResult[], ctx: CompareContext): ComparisonRecord {
  const latest = new Map<string, AssetSetResult>();
  for (const set of assetSetsByTool) latest.set(set.toolId, set);
  const toolIds = [...latest.keys()].sort(byText);

  const keysByTool = new Map<string, Set<string>>();
  const union = new Map<string, UnionEntry>();
  const excluded: ComparisonRecord['excluded'] = [];
  for (const toolId of toolIds) {
    const set = latest.get(toolId);
    if (!set) continue;
    if (set.status === 'unavailable') {
      excluded.push({ toolId, reason: set.reason, message: set.message });
      continue;
    }
    const keys = new Set<string>();
    for (const asset of set.assets) {
      const key = canonicalKey(asset);
      keys.add(key);
      const entry = union.get(key);
      if (entry) {
        if (!entry.foundBy.includes(toolId)) entry.foundBy.push(toolId);
      } else {
        const created: UnionEntry = { key, algorithmFamily: asset.algorithmFamily, primitiveKind: asset.primitiveKind, foundBy: [toolId] };
        if (asset.keySize !== undefined) created.keySize = asset.keySize;
        union.set(key, created);
      }
    }
    keysByTool.set(toolId, keys);
  }

  const tools: ToolComparison[] = [];
  for (const toolId of keysByTool.keys()) {
    const set = latest.get(toolId);
    const keys = keysByTool.get(toolId);
    if (!set || set.status !== 'assets' || !keys) continue;
    let uniqueFinds = 0;
    for (const key of keys) {
      const entry = union.get(key);
      if (entry && entry.foundBy.length === 1) uniqueFinds++;
    }
    tools.push({
      toolId,
      assetCount: keys.size,
      coverage: ratio(keys.size, union.size),
      uniqueFinds,
      unrecognized: set.assets.filter(a => !a.recognized).length,
      normalizationLoss: set.loss.dropped
    });
  }

  const pairs: PairOverlap[] = [];
  const contributing = [...keysByTool.keys()];
  for (let i = 0; i < contributing.length; i++) {
    for (let j = i + 1; j < contributing.length; j++) {
      const a = keysByTool.get(contributing[i]) ?? new Set<string>();
      const b = keysByTool.get(contributing[j]) ?? new Set<string>();
      pairs.push({ toolA: contributing[i], toolB: contributing[j], ...overlap(a, b) });
    }
  }

  return {
    runId: ctx.runId,
    repositoryId,
    comparedAt: ctx.clock().toISOString(),
    basis: 'cross-tool-agreement',
    tools,
    excluded,
    pairs,
    union: [...union.values()].sort((x, y) => byText(x.key, y.key)),
    emptyUnion: union.size === 0
  };
}

export function durationStats(samples: number[]): DurationStats {
  if (!samples.length) return { samples: 0, mean: null, median: null, stdDev: null };
  const sorted = [...samples].sort((a, b) => a - b);
  const mean = sorted.reduce((s, v) => s + v, 0) / sorted.length;
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  // sample standard deviation; undefined for a single sample
  const stdDev = sorted.length > 1
    ? Math.sqrt(sorted.reduce((s, v) => s + (v - mean) ** 2, 0) / (sorted.length - 1))
    : null;
  return { samples: sorted.length, mean, median, stdDev };
}

function mean(values: number[]): number | null {
  return values.length ? values.reduce((s, v) => s + v, 0) / values.length : null;
}

// Pearson correlation; null below two points or when either side is constant.
export function correlation(xs: number[], ys: number[]): number | null {
  const mx = mean(xs);
  const my = mean(ys);
  if (xs.length < 2 || xs.length !== ys.length || mx === null || my === null) return null;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < xs.length; i++) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) ** 2;
    syy += (ys[i] - my) ** 2;
  }
  return sxx && syy ? sxy / Math.sqrt(sxx * syy) : null;
}

export function sizeDurationStats(records: RunRecord[]): SizeDurationStats {
  const sized = records.filter(r => r.outcome.status === 'success' && r.repositorySizeKb !== undefined && r.repositorySizeKb > 0);
  const sizesMb = sized.map(r => (r.repositorySizeKb ?? 0) / 1024);
  const seconds = sized.map(r => r.durationSeconds);
  return {
    samples: sized.length,
    meanSecondsPerMb: mean(seconds.map((s, i) => s / sizesMb[i])),
    correlation: correlation(sizesMb, seconds)
  };
}

function countRuns(records: RunRecord[]): RunCounts {
  const counts: RunCounts = { total: records.length, success: 0, timeout: 0, toolError: 0, malformedOutput: 0 };
  for (const r of records) {
    switch (r.outcome.status) {
      case 'success': counts.success++; break;
      case 'timeout': counts.timeout++; break;
      case 'tool-error': counts.toolError++; break;
      case 'malformed-output': counts.malformedOutput++; break;
    }
  }
  return counts;
}

function toolMetric(toolId: string, comparisons: ComparisonRecord[], runs: RunRecord[], ctx: AggregateContext, computedAt: string): ToolMetricRecord {
  const counts = countRuns(runs);
  // timeouts and tool errors count against reliability only; they never
  // enter coverage or overlap denominators
  const failures = counts.timeout + counts.toolError;
  const coverages: number[] = [];
  const uniqueRatios: number[] = [];
  const nonEmptyCounts: number[] = [];
  const primitiveKinds: Record<string, number> = {};
  let empty = 0;
  let unrecognizedTotal = 0;
  let normalizationLossTotal = 0;
  for (const c of comparisons) {
    const t = c.tools.find(x => x.toolId === toolId);
    if (!t) continue;
    coverages.push(t.coverage);
    uniqueRatios.push(ratio(t.uniqueFinds, c.union.length));
    if (t.assetCount === 0) empty++;
    else nonEmptyCounts.push(t.assetCount);
    unrecognizedTotal += t.unrecognized;
    normalizationLossTotal += t.normalizationLoss;
    for (const entry of c.union) {
      if (entry.foundBy.includes(toolId)) primitiveKinds[entry.primitiveKind] = (primitiveKinds[entry.primitiveKind] || 0) + 1;
    }
  }
  const compared = coverages.length;
  return {
    kind: 'tool',
    toolId,
    sampleId: ctx.sampleId,
    computedAt,
    basis: 'cross-tool-agreement',
    runs: counts,
    successRate: ratio(counts.success, counts.total),
    timeoutRate: ratio(counts.timeout, counts.total),
    failureRate: ratio(failures, counts.total),
    reliability: counts.total ? 1 - failures / counts.total : 0,
    duration: durationStats(runs.filter(r => r.outcome.status === 'success').map(r => r.durationSeconds)),
    sizeDuration: sizeDurationStats(runs),
    repositoriesCompared: compared,
    meanCoverage: mean(coverages),
    meanUniqueFindRatio: mean(uniqueRatios),
    emptyRate: compared ? empty / compared : null,
    meanAssetsNonEmpty: mean(nonEmptyCounts),
    unrecognizedTotal,
    normalizationLossTotal,
    primitiveKinds
  };
}

function pairMetric(toolPair: [string, string], comparisons: ComparisonRecord[], ctx: AggregateContext, computedAt: string): PairMetricRecord {
  const overlaps = comparisons
    .map(c => c.pairs.find(p => p.toolA === toolPair[0] && p.toolB === toolPair[1]))
    .filter((p): p is PairOverlap => p !== undefined)
    .map(p => p.overlap);
  return {
    kind: 'tool-pair',
    toolPair,
    sampleId: ctx.sampleId,
    computedAt,
    basis: 'cross-tool-agreement',
    repositoriesCompared: overlaps.length,
    meanOverlap: mean(overlaps)
  };
}

/**
 * Combine per-repository comparisons into one record per tool and one per
 * tool pair. Durations and failure counts come from the Run Records so a tool
 * that never produced assets still shows up in reliability figures.
 */
export function aggregate(comparisons: ComparisonRecord[], runRecords: RunRecord[], ctx: AggregateContext): MetricRecord[] {
  const computedAt = ctx.clock().toISOString();
  const toolIds = new Set<string>(runRecords.map(r => r.toolId));
  const pairKeys = new Map<string, [string, string]>();
  for (const c of comparisons) {
    for (const t of c.tools) toolIds.add(t.toolId);
    for (const e of c.excluded) toolIds.add(e.toolId);
    for (const p of c.pairs) pairKeys.set(`${p.toolA}\u0000${p.toolB}`, [p.toolA, p.toolB]);
  }
  const metrics: MetricRecord[] = [...toolIds].sort(byText).map(toolId =>
    toolMetric(toolId, comparisons, runRecords.filter(r => r.toolId === toolId), ctx, computedAt)
  );
  const pairs = [...pairKeys.values()].sort((a, b) => byText(a[0], b[0]) || byText(a[1], b[1]));
  for (const pair of pairs) metrics.push(pairMetric(pair, comparisons, ctx, computedAt));
  return metrics;
}

export function metricKey(record: MetricRecord): string {
  return record.kind === 'tool' ? `tool:${record.toolId}:${record.sampleId}` : `pair:${record.toolPair.join('+')}:${record.sampleId}`;
}
