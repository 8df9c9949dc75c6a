import { isJsonObject } from '../json-document';
import { Asset, AssetSetResult, JsonValue, NormalizationLoss, RunRecord } from '../types';
import { AliasIndex, canonicalKey, parseKeySize, resolveAlgorithm, resolvePrimitive } from './aliases';
import { ExtractionStrategy, STRATEGIES } from './strategies';

export interface NormalizeContext {
  aliases: AliasIndex;
}

type EntryResult =
  | { kind: 'asset'; asset: Asset }
  | { kind: 'skip' }
  | { kind: 'drop'; reason: string };

// Asset types that are not algorithms carry their own primitive kind.
const NON_ALGORITHM_ASSET_TYPES = new Set(['certificate', 'protocol', 'related-crypto-material']);

function recordLoss(loss: NormalizationLoss, reason: string): void {
  loss.reasons[reason] = (loss.reasons[reason] || 0) + 1;
}

function toAsset(entry: JsonValue, strategy: ExtractionStrategy, record: RunRecord, ctx: NormalizeContext): EntryResult {
  if (!isJsonObject(entry)) return { kind: 'drop', reason: 'entry-not-object' };
  const fields = strategy.read(entry);
  if (!fields.isCrypto) return { kind: 'skip' };
  if (!fields.name) return { kind: 'drop', reason: 'missing-name' };

  const resolved = resolveAlgorithm(ctx.aliases, fields.name);
  let primitiveKind: string;
  if (fields.assetType && NON_ALGORITHM_ASSET_TYPES.has(fields.assetType)) {
    primitiveKind = resolvePrimitive(ctx.aliases, fields.assetType) ?? 'unknown';
  } else if (resolved.recognized && resolved.defaultPrimitive) {
    primitiveKind = resolved.defaultPrimitive;
  } else {
    primitiveKind = resolvePrimitive(ctx.aliases, fields.primitive) ?? 'unknown';
  }

  // an explicit key-size field beats one embedded in the name; hashes and
  // other unkeyed families never carry one
  const keySize = resolved.recognized && !resolved.keyed
    ? undefined
    : parseKeySize(fields.keySize) ?? resolved.keySize;

  const asset: Asset = {
    algorithmFamily: resolved.family,
    primitiveKind,
    recognized: resolved.recognized,
    reportedName: fields.name,
    occurrences: 1,
    sourceTool: record.toolId,
    sourceRepository: record.repositoryId
  };
  if (keySize !== undefined) asset.keySize = keySize;
  if (fields.locationHint) asset.locationHint = fields.locationHint;
  if (fields.confidence !== undefined) asset.confidence = fields.confidence;
  return { kind: 'asset', asset };
}

function mergeDuplicate(existing: Asset, incoming: Asset): Asset {
  const occurrences = existing.occurrences + incoming.occurrences;
  // keep the higher-confidence entry; the first one wins ties
  if ((incoming.confidence ?? -1) > (existing.confidence ?? -1)) return { ...incoming, occurrences };
  return { ...existing, occurrences };
}

/**
 * Map one Run Record onto an asset set. Only successful runs yield assets;
 * every other outcome becomes an explicit `unavailable` marker so it is never
 * mistaken for a tool that genuinely found nothing.
 *
 * Pure and deterministic: the same record always yields the same result.
 */
export function normalize(record: RunRecord, ctx: NormalizeContext): AssetSetResult {
  const { toolId, repositoryId, outcome } = record;
  if (outcome.status !== 'success') {
    return { status: 'unavailable', toolId, repositoryId, reason: outcome.status, message: outcome.message };
  }
  const strategy = STRATEGIES[record.toolFamily];
  const located = strategy.locate(outcome.document);
  if (!located.ok) {
    return { status: 'unavailable', toolId, repositoryId, reason: 'malformed-output', message: located.reason };
  }

  const loss: NormalizationLoss = {
    entriesSeen: 0,
    dropped: 0,
    skippedNonCrypto: 0,
    duplicatesMerged: 0,
    reasons: { ...located.located.reasons }
  };
  const byKey = new Map<string, Asset>();
  for (const entry of located.located.entries) {
    loss.entriesSeen++;
    let result: EntryResult;
    try {
      result = toAsset(entry, strategy, record, ctx);
    } catch {
      result = { kind: 'drop', reason: 'extraction-error' };
    }
    if (result.kind === 'skip') {
      loss.skippedNonCrypto++;
      continue;
    }
    if (result.kind === 'drop') {
      loss.dropped++;
      recordLoss(loss, result.reason);
      continue;
    }
    const key = canonicalKey(result.asset);
    const existing = byKey.get(key);
    if (existing) {
      loss.duplicatesMerged++;
      byKey.set(key, mergeDuplicate(existing, result.asset));
    } else {
      byKey.set(key, result.asset);
    }
  }

  const assets = [...byKey.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, asset]) => asset);
  return { status: 'assets', toolId, repositoryId, assets, loss, shapeWarnings: located.located.shapeWarnings };
}
