import * as yaml from 'js-yaml';
import { AdapterDependencies, AdapterSelection, createAdapters } from './adapters';
import { aggregate, compare } from './comparator';
import { BenchConfig } from './config';
import { AGREEMENT_NOTE } from './constants';
import { ConfigError } from './errors';
import { fixed, joinParts, percent, renderTable } from './format';
import { AliasIndex } from './normalizer/aliases';
import { normalize } from './normalizer/normalizer';
import { BranchResolver, RunOrchestrator } from './orchestrator';
import { GithubRepositorySource, RepositorySearch } from './repository-source';
import { createRunContext } from './run-context';
import { AnalysisManifest } from './store/schemas';
import { MetricsStore } from './store/metrics-store';
import { RunStore } from './store/run-store';
import {
  AnalysisSummary,
  ComparisonRecord,
  DiscoveredRepository,
  PairMetricRecord,
  RepositoryTarget,
  RunRecord,
  ToolMetricRecord
} from './types';

export * from './types';
export * from './errors';
export { loadConfig } from './config';
export type { BenchConfig } from './config';
export { createAdapters, createAdapter } from './adapters';
export { compare, aggregate, overlap } from './comparator';
export { normalize } from './normalizer/normalizer';
export { loadAliasTable, resolveAlgorithm, canonicalKey } from './normalizer/aliases';
export { RunOrchestrator } from './orchestrator';
export { GithubRepositorySource, repositoryIdFromUrl } from './repository-source';
export { createRunContext } from './run-context';
export type { RunContext } from './run-context';
export { RunStore } from './store/run-store';
export { MetricsStore } from './store/metrics-store';

export type ReportFormat = 'table' | 'json' | 'yaml';

export interface BenchmarkDependencies extends AdapterDependencies {
  selectAdapters?: (toolIds: string[]) => AdapterSelection;
  branchResolver?: BranchResolver;
  repositorySource?: GithubRepositorySource;
  aliases?: AliasIndex;
  clock?: () => Date;
}

export interface BenchmarkOptions {
  onRecord?: (record: RunRecord) => void;
}

export interface BenchmarkReport {
  runId: string;
  records: RunRecord[];
  unknownTools: string[];
}

export interface AnalyzeOptions {
  runId?: string;
}

export class CbomBenchmark {
  readonly runs: RunStore;
  readonly metrics: MetricsStore;
  private readonly source: GithubRepositorySource;

  constructor(private readonly config: BenchConfig, private readonly deps: BenchmarkDependencies = {}) {
    this.runs = new RunStore(config.dataDir, config.verbose);
    this.metrics = new MetricsStore(config.dataDir);
    this.source = deps.repositorySource ?? new GithubRepositorySource({
      token: config.githubToken,
      fetchImpl: deps.fetchImpl,
      clock: deps.clock,
      verbose: config.verbose
    });
  }

  findRepositories(search: RepositorySearch): Promise<DiscoveredRepository[]> {
    return this.source.findRepositories(search);
  }

  private selectAdapters(toolIds: string[]): AdapterSelection {
    return this.deps.selectAdapters ? this.deps.selectAdapters(toolIds) : createAdapters(toolIds, this.config, this.deps);
  }

  async benchmark(toolIds: string[], repositories: RepositoryTarget[], options: BenchmarkOptions = {}): Promise<BenchmarkReport> {
    const { adapters, unknown } = this.selectAdapters(toolIds);
    if (this.config.verbose) for (const name of unknown) console.warn(`⚠️  Unknown tool '${name}' skipped`);
    if (!adapters.length) throw new ConfigError('No known tools selected', unknown.map(u => `unknown tool: ${u}`));

    const ctx = createRunContext({ verbose: this.config.verbose, aliases: this.deps.aliases, clock: this.deps.clock });
    const orchestrator = new RunOrchestrator(
      this.runs,
      this.deps.branchResolver ?? (url => this.source.resolveDefaultBranch(url)),
      { maxParallel: this.config.maxParallel, timeoutMs: this.config.toolTimeoutMs, onRecord: options.onRecord }
    );
    const records = await orchestrator.runAll(adapters, repositories, ctx);
    return { runId: ctx.runId, records, unknownTools: unknown };
  }

  /**
   * Reload stored runs (latest per tool and repository, optionally limited to
   * one benchmark run), normalize, compare per repository, aggregate and
   * append everything to a new analysis in the metrics store.
   */
  async analyze(options: AnalyzeOptions = {}): Promise<AnalysisSummary> {
    const { records } = await this.runs.latestByPair({ runId: options.runId });
    const sampleId = options.runId ?? 'latest';
    const ctx = createRunContext({
      runId: sampleId,
      sampleId,
      verbose: this.config.verbose,
      aliases: this.deps.aliases,
      clock: this.deps.clock
    });
    if (!records.length && ctx.verbose) console.warn('⚠️  No run records to analyze');

    const byRepository = new Map<string, RunRecord[]>();
    for (const record of records) {
      const group = byRepository.get(record.repositoryId) ?? [];
      group.push(record);
      byRepository.set(record.repositoryId, group);
    }
    const comparisons: ComparisonRecord[] = [...byRepository.keys()].sort().map(repositoryId => {
      const group = byRepository.get(repositoryId) ?? [];
      const comparison = compare(repositoryId, group.map(r => normalize(r, ctx)), ctx);
      const sizeKb = group.find(r => r.repositorySizeKb !== undefined)?.repositorySizeKb;
      if (sizeKb !== undefined) comparison.repositorySizeKb = sizeKb;
      return comparison;
    });
    const metrics = aggregate(comparisons, records, ctx);

    const manifest = await this.metrics.createAnalysis(sampleId, ctx.clock().toISOString());
    for (const comparison of comparisons) await this.metrics.appendComparison(manifest.analysisId, comparison);
    // appended in order so a reload returns the records as computed here
    for (const metric of metrics) await this.metrics.appendMetric(manifest.analysisId, metric);
    return { ...manifest, comparisons, metrics };
  }

  listAnalyses(): Promise<AnalysisManifest[]> {
    return this.metrics.listAnalyses();
  }

  loadAnalysis(analysisId: string): Promise<AnalysisSummary> {
    return this.metrics.loadAnalysis(analysisId);
  }

  async deleteData(): Promise<void> {
    await this.runs.clear();
    await this.metrics.clear();
  }

  displayAnalysis(summary: AnalysisSummary, format: ReportFormat = 'table'): void {
    if (format === 'json') {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }
    if (format === 'yaml') {
      console.log(yaml.dump(summary, { noRefs: true }));
      return;
    }

    console.log('\n' + '='.repeat(60));
    console.log('📊 CBOM TOOL AGREEMENT REPORT');
    console.log('='.repeat(60));
    console.log(`Analysis: ${summary.analysisId}`);
    console.log(`Sample: ${summary.sampleId}`);
    console.log(`Computed: ${summary.computedAt}`);
    console.log(`Repositories compared: ${summary.comparisons.length}`);
    console.log(`Note: ${AGREEMENT_NOTE}`);
    console.log('-'.repeat(60));

    const tools = summary.metrics.filter((m): m is ToolMetricRecord => m.kind === 'tool');
    const pairs = summary.metrics.filter((m): m is PairMetricRecord => m.kind === 'tool-pair');

    console.log('TOOL AGREEMENT:');
    renderTable(
      ['Tool', 'Runs', 'Success', 'Timeouts', 'Errors', 'Malformed', 'Reliability', 'Agreement coverage', 'Unique-find ratio', 'Empty', 'Avg assets', 'Time mean (s)', 'Time std (s)', 'Time per MB (s)', 'Size-time r'],
      tools.map(t => [
        t.toolId,
        String(t.runs.total),
        String(t.runs.success),
        String(t.runs.timeout),
        String(t.runs.toolError),
        String(t.runs.malformedOutput),
        percent(t.reliability),
        percent(t.meanCoverage),
        percent(t.meanUniqueFindRatio),
        percent(t.emptyRate),
        fixed(t.meanAssetsNonEmpty, 1),
        fixed(t.duration.mean),
        fixed(t.duration.stdDev),
        fixed(t.sizeDuration.meanSecondsPerMb),
        fixed(t.sizeDuration.correlation)
      ])
    ).forEach(l => console.log(l));
    console.log();

    if (pairs.length) {
      console.log('PAIRWISE AGREEMENT (Jaccard overlap):');
      renderTable(
        ['Tool pair', 'Repositories', 'Mean agreement overlap'],
        pairs.map(p => [`${p.toolPair[0]} ↔ ${p.toolPair[1]}`, String(p.repositoriesCompared), percent(p.meanOverlap)])
      ).forEach(l => console.log(l));
      console.log();
    }

    if (summary.comparisons.length) {
      console.log('REPOSITORY AGREEMENT:');
      renderTable(
        ['Repository', 'Union', 'Size (KB)', 'Agreement coverage', 'Excluded'],
        summary.comparisons.map(c => [
          c.repositoryId,
          c.emptyUnion ? 'empty' : String(c.union.length),
          c.repositorySizeKb === undefined ? '-' : String(c.repositorySizeKb),
          c.tools.map(t => `${t.toolId} ${percent(t.coverage)}`).join(', ') || '-',
          joinParts(c.excluded.map(e => `${e.toolId} (${e.reason})`)) || '-'
        ])
      ).forEach(l => console.log(l));
      console.log();
    }

    const kinds = tools.filter(t => Object.keys(t.primitiveKinds).length);
    if (kinds.length) {
      console.log('PRIMITIVE KINDS IN AGREEMENT UNION:');
      kinds.forEach(t => {
        const parts = Object.entries(t.primitiveKinds)
          .sort(([a], [b]) => (a < b ? -1 : 1))
          .map(([kind, count]) => `${kind}=${count}`);
        console.log(`${t.toolId}: ${parts.join(', ')}`);
      });
    }
    console.log('='.repeat(60));
  }
}
