// One extraction strategy per tool family. A strategy locates the
// cryptographic-asset entries in its tool's document shape and reads the raw
// fields the normalizer maps onto canonical assets.

import { getArray, getObject, getString, isJsonObject } from '../json-document';
import { JsonObject, JsonValue, ToolFamily } from '../types';
import { inspectCycloneDxShape } from './document-shape';

export interface LocatedEntries {
  entries: JsonValue[];
  shapeWarnings: string[];
  reasons: Record<string, number>;
}

export type LocateResult = { ok: true; located: LocatedEntries } | { ok: false; reason: string };

export interface EntryFields {
  isCrypto: boolean;
  name?: string;
  assetType?: string;
  primitive?: string;
  keySize?: JsonValue;
  confidence?: number;
  locationHint?: string;
}

export interface ExtractionStrategy {
  readonly family: ToolFamily;
  locate(document: JsonValue): LocateResult;
  read(entry: JsonObject): EntryFields;
}

const MAX_NESTING = 8;

function bump(reasons: Record<string, number>, reason: string): void {
  reasons[reason] = (reasons[reason] || 0) + 1;
}

// CycloneDX allows components to nest sub-components.
function flattenComponents(components: JsonValue[], out: JsonValue[], depth = 0): void {
  for (const c of components) {
    out.push(c);
    const nested = getArray(c, 'components');
    if (nested && depth < MAX_NESTING) flattenComponents(nested, out, depth + 1);
  }
}

function describeRoot(document: JsonValue): string {
  return document === null ? 'null' : typeof document;
}

function collectFromBoms(boms: JsonObject[], located: LocatedEntries, inspect: boolean): void {
  boms.forEach((bom, i) => {
    const label = boms.length > 1 ? `bom[${i}]` : 'bom';
    if (inspect) located.shapeWarnings.push(...inspectCycloneDxShape(bom, label).errors);
    const components = getArray(bom, 'components');
    if (components) flattenComponents(components, located.entries);
    else bump(located.reasons, 'components-missing');
  });
}

function firstDefined(...values: (JsonValue | undefined)[]): JsonValue | undefined {
  return values.find(v => v !== undefined && v !== null && v !== '');
}

function toUnitInterval(value: JsonValue | undefined): number | undefined {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
  if (!Number.isFinite(n) || n < 0) return undefined;
  if (n <= 1) return n;
  if (n <= 100) return n / 100; // percentages
  return undefined;
}

export function readConfidence(component: JsonObject): number | undefined {
  const evidence = getObject(component, 'evidence');
  const identity = evidence ? evidence.identity : undefined;
  const firstIdentity = Array.isArray(identity) ? identity[0] : identity;
  return toUnitInterval(
    firstDefined(component.confidence, isJsonObject(firstIdentity) ? firstIdentity.confidence : undefined)
  );
}

export function readLocation(component: JsonObject): string | undefined {
  const occurrences = getArray(getObject(component, 'evidence'), 'occurrences');
  const first = occurrences ? occurrences[0] : undefined;
  const location = getString(first, 'location');
  if (!location) return undefined;
  const line = getString(first, 'line');
  return line ? `${location}:${line}` : location;
}

function readCycloneDxComponent(component: JsonObject): EntryFields {
  const crypto = getObject(component, 'cryptoProperties');
  const algorithm = getObject(crypto, 'algorithmProperties');
  const material = getObject(crypto, 'relatedCryptoMaterialProperties');
  return {
    isCrypto: getString(component, 'type') === 'cryptographic-asset' || crypto !== undefined,
    name: getString(component, 'name'),
    assetType: getString(crypto, 'assetType'),
    primitive: getString(algorithm, 'primitive'),
    keySize: firstDefined(material?.size, algorithm?.parameterSetIdentifier),
    confidence: readConfidence(component),
    locationHint: readLocation(component)
  };
}

// Scanner service output: a list of scan results `[{ bom: {...} }]`, or a bare BOM.
export const containerScannerStrategy: ExtractionStrategy = {
  family: 'container-scanner',
  locate(document) {
    const located: LocatedEntries = { entries: [], shapeWarnings: [], reasons: {} };
    let boms: JsonObject[];
    if (Array.isArray(document)) {
      boms = [];
      document.forEach((wrapper, i) => {
        const bom = getObject(wrapper, 'bom');
        if (bom) boms.push(bom);
        else if (isJsonObject(wrapper) && getArray(wrapper, 'components')) boms.push(wrapper);
        else {
          located.shapeWarnings.push(`result[${i}] has no bom`);
          bump(located.reasons, 'result-without-bom');
        }
      });
    } else if (isJsonObject(document)) {
      boms = [getObject(document, 'bom') ?? document];
    } else {
      return { ok: false, reason: `document root is ${describeRoot(document)}, expected object or array` };
    }
    collectFromBoms(boms, located, true);
    return { ok: true, located };
  },
  read: readCycloneDxComponent
};

// CLI generator output: one CycloneDX object whose components mix libraries and crypto assets.
export const cliGeneratorStrategy: ExtractionStrategy = {
  family: 'cli-generator',
  locate(document) {
    if (!isJsonObject(document)) {
      return { ok: false, reason: `document root is ${Array.isArray(document) ? 'array' : describeRoot(document)}, expected object` };
    }
    const located: LocatedEntries = { entries: [], shapeWarnings: [], reasons: {} };
    collectFromBoms([document], located, true);
    return { ok: true, located };
  },
  read: readCycloneDxComponent
};

const LLM_LIST_KEYS = ['components', 'cryptographicAssets', 'assets', 'algorithms'];

// Language-model output is loosely structured: accept bare lists, wrapped
// BOMs and ad-hoc field names.
export const llmGeneratorStrategy: ExtractionStrategy = {
  family: 'llm-generator',
  locate(document) {
    const located: LocatedEntries = { entries: [], shapeWarnings: [], reasons: {} };
    if (Array.isArray(document)) {
      flattenComponents(document, located.entries);
      located.shapeWarnings.push('bom: bare component list');
      return { ok: true, located };
    }
    if (!isJsonObject(document)) {
      return { ok: false, reason: `document root is ${describeRoot(document)}, expected object or array` };
    }
    const bom = getObject(document, 'bom') ?? getObject(document, 'cbom') ?? document;
    if (getArray(bom, 'components')) {
      collectFromBoms([bom], located, true);
      return { ok: true, located };
    }
    const key = LLM_LIST_KEYS.find(k => getArray(bom, k));
    const list = key ? getArray(bom, key) : undefined;
    if (list) {
      flattenComponents(list, located.entries);
      located.shapeWarnings.push(`bom: components found under "${key}"`);
    } else {
      bump(located.reasons, 'components-missing');
    }
    return { ok: true, located };
  },
  read(entry) {
    const fields = readCycloneDxComponent(entry);
    const type = getString(entry, 'type');
    return {
      isCrypto: fields.isCrypto || type === undefined || /crypt|algorithm/i.test(type) || entry.algorithm !== undefined,
      name: fields.name ?? getString(entry, 'algorithm') ?? getString(entry, 'algorithmName'),
      assetType: fields.assetType ?? getString(entry, 'assetType'),
      primitive: fields.primitive ?? getString(entry, 'primitive'),
      keySize: firstDefined(fields.keySize, entry.keySize, entry.keyLength, entry.key_size),
      confidence: fields.confidence,
      locationHint: fields.locationHint ?? getString(entry, 'location') ?? getString(entry, 'file')
    };
  }
};

export const STRATEGIES: Record<ToolFamily, ExtractionStrategy> = {
  'container-scanner': containerScannerStrategy,
  'cli-generator': cliGeneratorStrategy,
  'llm-generator': llmGeneratorStrategy
};
