// Shared data model for runs, canonical assets, comparisons and metric records.

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// Closed set of supported tool families; one normalizer strategy per family.
export type ToolFamily = 'container-scanner' | 'cli-generator' | 'llm-generator';

export interface RepositoryTarget {
  url: string;
  branch?: string; // resolved by the orchestrator when absent
  sizeKb?: number;
}

export interface DiscoveredRepository {
  fullName: string;
  url: string;
  defaultBranch: string;
  sizeKb: number;
}

export interface AdapterOutput {
  document: string; // raw text; parsed at the orchestrator boundary
  durationSeconds: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface Adapter {
  readonly toolId: string;
  readonly family: ToolFamily;
  generate(repositoryUrl: string, branch: string, options?: GenerateOptions): Promise<AdapterOutput>;
}

export type FailureKind = 'timeout' | 'tool-error' | 'malformed-output';

export type RunOutcome =
  | { status: 'success'; document: JsonValue }
  | { status: 'timeout'; timeoutMs: number; message: string }
  | { status: 'tool-error'; message: string }
  | { status: 'malformed-output'; message: string; rawText?: string };

export interface RunRecord {
  runId: string; // benchmark run this attempt belongs to
  recordId: string;
  toolId: string;
  toolFamily: ToolFamily;
  repositoryId: string;
  repositoryUrl: string;
  branch: string;
  startedAt: string; // ISO-8601
  durationSeconds: number; // adapter-reported on success, wall clock otherwise
  outcome: RunOutcome;
  repositorySizeKb?: number;
}

export interface Asset {
  algorithmFamily: string;
  primitiveKind: string;
  keySize?: number;
  locationHint?: string;
  confidence?: number;
  recognized: boolean; // false when the name was not in the alias table
  reportedName: string;
  occurrences: number; // duplicates merged into this asset
  sourceTool: string;
  sourceRepository: string;
}

export interface NormalizationLoss {
  entriesSeen: number;
  dropped: number;
  skippedNonCrypto: number;
  duplicatesMerged: number;
  reasons: Record<string, number>;
}

export type AssetSetResult =
  | {
      status: 'assets';
      toolId: string;
      repositoryId: string;
      assets: Asset[];
      loss: NormalizationLoss;
      shapeWarnings: string[];
    }
  | {
      status: 'unavailable';
      toolId: string;
      repositoryId: string;
      reason: FailureKind;
      message: string;
    };

export interface ToolComparison {
  toolId: string;
  assetCount: number;
  coverage: number;
  uniqueFinds: number;
  unrecognized: number;
  normalizationLoss: number;
}

export interface PairOverlap {
  toolA: string;
  toolB: string;
  intersection: number;
  union: number;
  overlap: number;
}

export interface UnionEntry {
  key: string;
  algorithmFamily: string;
  primitiveKind: string;
  keySize?: number;
  foundBy: string[];
}

// Cross-tool agreement only: there is no independent reference CBOM.
export type MetricBasis = 'cross-tool-agreement';

export interface ComparisonRecord {
  runId: string;
  repositoryId: string;
  comparedAt: string;
  basis: MetricBasis;
  tools: ToolComparison[];
  excluded: { toolId: string; reason: FailureKind; message: string }[];
  pairs: PairOverlap[];
  union: UnionEntry[];
  emptyUnion: boolean;
  repositorySizeKb?: number;
}

export interface DurationStats {
  samples: number;
  mean: number | null;
  median: number | null;
  stdDev: number | null;
}

// Execution time against repository size, over successful runs of known size.
export interface SizeDurationStats {
  samples: number;
  meanSecondsPerMb: number | null;
  correlation: number | null; // Pearson r of size and duration
}

export interface RunCounts {
  total: number;
  success: number;
  timeout: number;
  toolError: number;
  malformedOutput: number;
}

export interface ToolMetricRecord {
  kind: 'tool';
  toolId: string;
  sampleId: string;
  computedAt: string;
  basis: MetricBasis;
  runs: RunCounts;
  successRate: number;
  timeoutRate: number;
  failureRate: number;
  reliability: number;
  duration: DurationStats;
  sizeDuration: SizeDurationStats;
  repositoriesCompared: number;
  meanCoverage: number | null;
  meanUniqueFindRatio: number | null;
  emptyRate: number | null;
  meanAssetsNonEmpty: number | null;
  unrecognizedTotal: number;
  normalizationLossTotal: number;
  primitiveKinds: Record<string, number>;
}

export interface PairMetricRecord {
  kind: 'tool-pair';
  toolPair: [string, string];
  sampleId: string;
  computedAt: string;
  basis: MetricBasis;
  repositoriesCompared: number;
  meanOverlap: number | null;
}

export type MetricRecord = ToolMetricRecord | PairMetricRecord;

export interface AnalysisSummary {
  analysisId: string;
  sampleId: string;
  computedAt: string;
  comparisons: ComparisonRecord[];
  metrics: MetricRecord[];
}
