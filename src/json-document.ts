import { JsonObject, JsonValue } from './types';

export type ParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; reason: string };

export function parseJsonDocument(text: string): ParseResult {
  const trimmed = text.trim();
  if (!trimmed.length) return { ok: false, reason: 'empty document' };
  try {
    const value: JsonValue = JSON.parse(trimmed);
    return { ok: true, value };
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
}

// Language-model answers often wrap the payload in a markdown code fence.
export function extractJsonPayload(content: string): string {
  const tagged = content.match(/```json\s*([\s\S]*?)```/i);
  if (tagged) return tagged[1].trim();
  const fenced = content.match(/```[a-z]*\s*([\s\S]*?)```/i);
  if (fenced) return fenced[1].trim();
  return content.trim();
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getObject(value: JsonValue | undefined, key: string): JsonObject | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  return isJsonObject(child) ? child : undefined;
}

export function getArray(value: JsonValue | undefined, key: string): JsonValue[] | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  return Array.isArray(child) ? child : undefined;
}

export function getString(value: JsonValue | undefined, key: string): string | undefined {
  if (!isJsonObject(value)) return undefined;
  const child = value[key];
  if (typeof child === 'string') return child.trim().length ? child : undefined;
  if (typeof child === 'number') return String(child);
  return undefined;
}
