import { randomUUID } from 'crypto';
import { AliasIndex, defaultAliasIndex } from './normalizer/aliases';

// Scoped to one benchmark or analysis invocation and threaded explicitly
// through orchestrator, normalizer and comparator calls.
export interface RunContext {
  runId: string;
  sampleId: string;
  verbose: boolean;
  aliases: AliasIndex;
  clock: () => Date;
}

export interface RunContextOptions {
  runId?: string;
  sampleId?: string;
  verbose?: boolean;
  aliases?: AliasIndex;
  clock?: () => Date;
}

export function createRunContext(options: RunContextOptions = {}): RunContext {
  const runId = options.runId ?? randomUUID();
  return {
    runId,
    sampleId: options.sampleId ?? runId,
    verbose: options.verbose ?? false,
    aliases: options.aliases ?? defaultAliasIndex(),
    clock: options.clock ?? (() => new Date())
  };
}
