// Centralized defaults for the benchmark core and its tool integrations.

import { ToolFamily } from './types';

export const DEFAULT_DATA_DIR = 'CBOMdata';
export const DEFAULT_TOOL_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_MAX_PARALLEL = 2;
export const DEFAULT_BRANCH = 'main';

export const DEFAULT_CBOMKIT_WS_URL = 'ws://localhost:8081/v1/scan/cbombench';
export const DEFAULT_CBOMKIT_API_URL = 'http://localhost:8081/api/v1/cbom/last/1';
export const DEFAULT_CDXGEN_COMMAND = 'cbom';
export const DEFAULT_CDXGEN_LANGUAGE = 'java';
export const DEFAULT_LLM_BASE_URL = 'https://api.deepseek.com';
export const DEFAULT_LLM_MODEL = 'deepseek-chat';
export const GITHUB_API_URL = 'https://api.github.com';
export const GITHUB_PAGE_SIZE = 50;

// Tool names accepted on the command line, mapped to their adapter family.
export const KNOWN_TOOLS: Record<string, ToolFamily> = {
  cbomkit: 'container-scanner',
  cdxgen: 'cli-generator',
  deepseek: 'llm-generator'
};

export const AGREEMENT_NOTE = 'Coverage and overlap are cross-tool agreement metrics over the union of findings, not accuracy against a verified reference.';

// Path segment sanitization for repository ids and tool ids used in store paths.
// Allow only alphanumerics, dot, underscore, hyphen; collapse the rest to '-'.
export const PATH_SEGMENT_MAX_LENGTH = 128;
export function sanitizeName(name: string): string {
  if (!name) return 'unnamed';
  let cleaned = name.normalize('NFC').replace(/[^A-Za-z0-9._-]+/g, '-');
  cleaned = cleaned.replace(/-+/g, '-');
  cleaned = cleaned.replace(/^[-.]+/, '').replace(/[-.]+$/, '');
  if (!cleaned.length) cleaned = 'unnamed';
  if (cleaned.length > PATH_SEGMENT_MAX_LENGTH) {
    cleaned = cleaned.slice(0, PATH_SEGMENT_MAX_LENGTH);
  }
  return cleaned;
}

// Filesystem-safe timestamp, e.g. 2025-06-10T13-40-05-123Z
export function fileTimestamp(iso: string): string {
  return iso.replace(/[:.]/g, '-');
}
