import { BenchConfig } from '../config';
import { KNOWN_TOOLS } from '../constants';
import { FetchLike } from '../repository-source';
import { SafeExec } from '../safe-exec';
import { Adapter } from '../types';
import { createCbomkitAdapter } from './cbomkit-adapter';
import { createCdxgenAdapter } from './cdxgen-adapter';
import { createLlmAdapter } from './llm-adapter';

export { createCbomkitAdapter, createCdxgenAdapter, createLlmAdapter };

export interface AdapterDependencies {
  fetchImpl?: FetchLike;
  exec?: SafeExec;
  onProgress?: (toolId: string, label: string) => void;
}

export interface AdapterSelection {
  adapters: Adapter[];
  unknown: string[];
}

export function createAdapter(toolId: string, config: BenchConfig, deps: AdapterDependencies = {}): Adapter | undefined {
  switch (toolId.trim().toLowerCase()) {
    case 'cbomkit':
      return createCbomkitAdapter({
        wsUrl: config.cbomkit.wsUrl,
        apiUrl: config.cbomkit.apiUrl,
        fetchImpl: deps.fetchImpl,
        onProgress: deps.onProgress ? label => deps.onProgress?.('cbomkit', label) : undefined
      });
    case 'cdxgen':
      return createCdxgenAdapter({
        command: config.cdxgen.command,
        language: config.cdxgen.language,
        timeoutMs: config.toolTimeoutMs,
        exec: deps.exec
      });
    case 'deepseek':
      return createLlmAdapter({
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        fetchImpl: deps.fetchImpl
      });
    default:
      return undefined;
  }
}

// Unknown names are reported back rather than failing the whole selection.
export function createAdapters(toolIds: string[], config: BenchConfig, deps: AdapterDependencies = {}): AdapterSelection {
  const adapters: Adapter[] = [];
  const unknown: string[] = [];
  const seen = new Set<string>();
  for (const raw of toolIds) {
    const name = raw.trim().toLowerCase();
    if (seen.has(name)) continue;
    seen.add(name);
    const adapter = createAdapter(name, config, deps);
    if (adapter) adapters.push(adapter);
    else unknown.push(raw);
  }
  return { adapters, unknown };
}

export function knownToolIds(): string[] {
  return Object.keys(KNOWN_TOOLS);
}
