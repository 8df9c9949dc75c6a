// Shapes of persisted records, checked when they are read back from disk.

import { z } from 'zod';
import { JsonValue } from '../types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const failureKind = z.enum(['timeout', 'tool-error', 'malformed-output']);

export const runRecordSchema = z.object({
  runId: z.string().min(1),
  recordId: z.string().min(1),
  toolId: z.string().min(1),
  toolFamily: z.enum(['container-scanner', 'cli-generator', 'llm-generator']),
  repositoryId: z.string().min(1),
  repositoryUrl: z.string().min(1),
  branch: z.string().min(1),
  startedAt: z.string().datetime(),
  durationSeconds: z.number().nonnegative(),
  outcome: z.discriminatedUnion('status', [
    z.object({ status: z.literal('success'), document: jsonValueSchema }),
    z.object({ status: z.literal('timeout'), timeoutMs: z.number(), message: z.string() }),
    z.object({ status: z.literal('tool-error'), message: z.string() }),
    z.object({ status: z.literal('malformed-output'), message: z.string(), rawText: z.string().optional() })
  ]),
  repositorySizeKb: z.number().nonnegative().optional()
});

const basis = z.literal('cross-tool-agreement');

export const comparisonRecordSchema = z.object({
  runId: z.string(),
  repositoryId: z.string(),
  comparedAt: z.string(),
  basis,
  tools: z.array(
    z.object({
      toolId: z.string(),
      assetCount: z.number(),
      coverage: z.number().min(0).max(1),
      uniqueFinds: z.number(),
      unrecognized: z.number(),
      normalizationLoss: z.number()
    })
  ),
  excluded: z.array(z.object({ toolId: z.string(), reason: failureKind, message: z.string() })),
  pairs: z.array(
    z.object({ toolA: z.string(), toolB: z.string(), intersection: z.number(), union: z.number(), overlap: z.number() })
  ),
  union: z.array(
    z.object({
      key: z.string(),
      algorithmFamily: z.string(),
      primitiveKind: z.string(),
      keySize: z.number().optional(),
      foundBy: z.array(z.string())
    })
  ),
  emptyUnion: z.boolean(),
  repositorySizeKb: z.number().nonnegative().optional()
});

const nullableNumber = z.number().nullable();

export const metricRecordSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('tool'),
    toolId: z.string(),
    sampleId: z.string(),
    computedAt: z.string(),
    basis,
    runs: z.object({
      total: z.number(),
      success: z.number(),
      timeout: z.number(),
      toolError: z.number(),
      malformedOutput: z.number()
    }),
    successRate: z.number(),
    timeoutRate: z.number(),
    failureRate: z.number(),
    reliability: z.number(),
    duration: z.object({ samples: z.number(), mean: nullableNumber, median: nullableNumber, stdDev: nullableNumber }),
    sizeDuration: z.object({ samples: z.number(), meanSecondsPerMb: nullableNumber, correlation: nullableNumber }),
    repositoriesCompared: z.number(),
    meanCoverage: nullableNumber,
    meanUniqueFindRatio: nullableNumber,
    emptyRate: nullableNumber,
    meanAssetsNonEmpty: nullableNumber,
    unrecognizedTotal: z.number(),
    normalizationLossTotal: z.number(),
    primitiveKinds: z.record(z.number())
  }),
  z.object({
    kind: z.literal('tool-pair'),
    toolPair: z.tuple([z.string(), z.string()]),
    sampleId: z.string(),
    computedAt: z.string(),
    basis,
    repositoriesCompared: z.number(),
    meanOverlap: nullableNumber
  })
]);

export const analysisManifestSchema = z.object({
  analysisId: z.string(),
  sampleId: z.string(),
  computedAt: z.string()
});

export type AnalysisManifest = z.infer<typeof analysisManifestSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
