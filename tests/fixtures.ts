import { AdapterSelection } from '../src/adapters';
import { AdapterError } from '../src/errors';
import { SafeExecResult } from '../src/safe-exec';
import { Adapter, Asset, AssetSetResult, JsonObject, JsonValue, RunOutcome, RunRecord, ToolFamily } from '../src/types';

export const FIXED_NOW = '2025-01-02T03:04:05.000Z';
export const fixedClock = () => new Date(FIXED_NOW);

export function cryptoComponent(name: string, extra: JsonObject = {}): JsonObject {
  return {
    type: 'cryptographic-asset',
    name,
    cryptoProperties: { assetType: 'algorithm' },
    ...extra
  };
}

export function cycloneDx(components: JsonValue[]): JsonObject {
  return { bomFormat: 'CycloneDX', specVersion: '1.6', components };
}

export function runRecord(
  toolId: string,
  repositoryId: string,
  outcome: RunOutcome,
  overrides: Partial<RunRecord> = {}
): RunRecord {
  const family: ToolFamily = overrides.toolFamily ?? 'cli-generator';
  return {
    runId: 'run-1',
    recordId: `${toolId}-${repositoryId.replace('/', '-')}`,
    toolId,
    toolFamily: family,
    repositoryId,
    repositoryUrl: `https://github.com/${repositoryId}`,
    branch: 'main',
    startedAt: FIXED_NOW,
    durationSeconds: 1,
    outcome,
    ...overrides
  };
}

export function success(document: JsonValue): RunOutcome {
  return { status: 'success', document };
}

export function asset(toolId: string, family: string, primitiveKind: string, keySize?: number): Asset {
  const a: Asset = {
    algorithmFamily: family,
    primitiveKind,
    recognized: true,
    reportedName: family,
    occurrences: 1,
    sourceTool: toolId,
    sourceRepository: 'acme/vault'
  };
  if (keySize !== undefined) a.keySize = keySize;
  return a;
}

export function assetSet(toolId: string, assets: Asset[], repositoryId = 'acme/vault'): AssetSetResult {
  return {
    status: 'assets',
    toolId,
    repositoryId,
    assets,
    loss: { entriesSeen: assets.length, dropped: 0, skippedNonCrypto: 0, duplicatesMerged: 0, reasons: {} },
    shapeWarnings: []
  };
}

export function execResult(overrides: Partial<SafeExecResult> = {}): SafeExecResult {
  return {
    stdout: '',
    stderr: '',
    code: 0,
    signal: null,
    timedOut: false,
    aborted: false,
    failed: false,
    durationMs: 1,
    start: 0,
    ...overrides
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// Two tools that agree on RSA-2048 and one that always fails.
export function stubSelection(toolIds: string[]): AdapterSelection {
  const available: Record<string, Adapter> = {
    scanner: {
      toolId: 'scanner',
      family: 'container-scanner',
      generate: async () => ({
        document: JSON.stringify([{ bom: cycloneDx([cryptoComponent('RSA-2048'), cryptoComponent('AES128')]) }]),
        durationSeconds: 2
      })
    },
    generator: {
      toolId: 'generator',
      family: 'cli-generator',
      generate: async () => ({
        document: JSON.stringify(cycloneDx([cryptoComponent('rsa2048'), { type: 'library', name: 'bcprov' }])),
        durationSeconds: 4
      })
    },
    broken: {
      toolId: 'broken',
      family: 'cli-generator',
      generate: async () => {
        throw new AdapterError('broken', 'exit code 1');
      }
    }
  };
  const adapters: Adapter[] = [];
  const unknown: string[] = [];
  for (const id of toolIds) {
    const adapter = available[id];
    if (adapter) adapters.push(adapter);
    else unknown.push(id);
  }
  return { adapters, unknown };
}
