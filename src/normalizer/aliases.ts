// Alias resolution for algorithm names, key sizes and primitive kinds.
// The table lives in data/algorithm-aliases.json so mapping rules can change
// without touching code; stored raw documents can then be re-normalized.

import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { JsonValue } from '../types';

export const DEFAULT_ALIAS_FILE = path.resolve(__dirname, '..', '..', 'data', 'algorithm-aliases.json');

const familySchema = z.object({
  primitive: z.string().min(1),
  keyed: z.boolean(),
  aliases: z.array(z.string().min(1)).min(1)
});

const aliasTableSchema = z.object({
  families: z.record(familySchema),
  primitives: z.record(z.string().min(1))
});

export type AliasTable = z.infer<typeof aliasTableSchema>;
export type FamilyEntry = z.infer<typeof familySchema>;

export interface AliasIndex {
  families: Record<string, FamilyEntry>;
  byAlias: Map<string, string>; // compact alias -> canonical family
  primitives: Map<string, string>; // compact primitive -> canonical primitive
}

export interface ResolvedAlgorithm {
  family: string;
  keySize?: number; // embedded in the name, keyed families only
  defaultPrimitive?: string;
  keyed: boolean;
  recognized: boolean;
}

// lower-case, unify separators: "AES_128/GCM" -> "aes-128-gcm". The result
// never contains "|", the canonical key separator.
export function normalizeName(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s_/.|]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function compact(value: string): string {
  return normalizeName(value).replace(/-/g, '');
}

export function buildAliasIndex(table: AliasTable): AliasIndex {
  const byAlias = new Map<string, string>();
  for (const [family, entry] of Object.entries(table.families)) {
    byAlias.set(compact(family), family);
    for (const alias of entry.aliases) {
      const key = compact(alias);
      const existing = byAlias.get(key);
      if (existing && existing !== family) {
        throw new ConfigError('Ambiguous algorithm alias', [`${alias} maps to both ${existing} and ${family}`]);
      }
      byAlias.set(key, family);
    }
  }
  const primitives = new Map<string, string>();
  for (const [alias, primitive] of Object.entries(table.primitives)) primitives.set(compact(alias), primitive);
  return { families: table.families, byAlias, primitives };
}

export function loadAliasTable(file: string = DEFAULT_ALIAS_FILE): AliasIndex {
  let raw: unknown;
  try {
    raw = fs.readJsonSync(file);
  } catch (e) {
    throw new ConfigError(`Cannot read alias table ${file}`, [e instanceof Error ? e.message : String(e)]);
  }
  const parsed = aliasTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid alias table ${file}`, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return buildAliasIndex(parsed.data);
}

let defaultIndex: AliasIndex | null = null;
export function defaultAliasIndex(): AliasIndex {
  if (!defaultIndex) defaultIndex = loadAliasTable();
  return defaultIndex;
}

function known(index: AliasIndex, family: string, keySize?: number): ResolvedAlgorithm {
  const entry = index.families[family];
  return {
    family,
    keySize: entry.keyed ? keySize : undefined,
    defaultPrimitive: entry.primitive,
    keyed: entry.keyed,
    recognized: true
  };
}

const NAME_WITH_SIZE = /^(.+?)-?(\d{2,5})(?:-(.*))?$/;

export function resolveAlgorithm(index: AliasIndex, rawName: string): ResolvedAlgorithm {
  const norm = normalizeName(rawName);
  const flat = norm.replace(/-/g, '');

  const direct = index.byAlias.get(flat);
  if (direct) return known(index, direct);

  // "aes-128-gcm", "rsa2048", "kyber768"
  const sized = norm.match(NAME_WITH_SIZE);
  if (sized) {
    const family = index.byAlias.get(sized[1].replace(/-/g, ''));
    if (family) return known(index, family, parseInt(sized[2], 10));
  }

  // "aes-gcm-nopadding", "rsa-oaep"
  const head = index.byAlias.get(norm.split('-')[0]);
  if (head) return known(index, head);

  return { family: norm || 'unknown', keyed: false, recognized: false };
}

export function resolvePrimitive(index: AliasIndex, raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const flat = compact(raw);
  if (!flat.length) return undefined;
  return index.primitives.get(flat) ?? normalizeName(raw);
}

// Accepts 2048, "2048", "2048 bits", "2048-bit"; anything else is absent.
export function parseKeySize(value: JsonValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value === 'string') {
    const m = value.trim().match(/^(\d{1,6})(?:\s*-?\s*bits?)?$/i);
    if (!m) return undefined;
    const n = parseInt(m[1], 10);
    return n > 0 ? n : undefined;
  }
  return undefined;
}

export function canonicalKey(asset: { algorithmFamily: string; primitiveKind: string; keySize?: number }): string {
  return `${asset.algorithmFamily}|${asset.primitiveKind}|${asset.keySize ?? '-'}`;
}
