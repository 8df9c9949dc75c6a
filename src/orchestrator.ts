import { randomUUID } from 'crypto';
import { performance } from 'perf_hooks';
import { DEFAULT_BRANCH, DEFAULT_MAX_PARALLEL, DEFAULT_TOOL_TIMEOUT_MS } from './constants';
import { AdapterTimeoutError, MalformedOutputError, errorMessage } from './errors';
import { outcomeLine } from './format';
import { parseJsonDocument } from './json-document';
import { repositoryIdFromUrl } from './repository-source';
import { RunContext } from './run-context';
import { RunRecordSink } from './store/run-store';
import { Adapter, RepositoryTarget, RunOutcome, RunRecord } from './types';

export type BranchResolver = (repositoryUrl: string) => Promise<string | undefined>;

export interface OrchestratorOptions {
  maxParallel?: number;
  timeoutMs?: number;
  onRecord?: (record: RunRecord) => void;
}

interface PlannedRepository {
  url: string;
  branch: string;
  repositoryId: string;
  sizeKb?: number;
}

interface Invocation {
  adapter: Adapter;
  repository: PlannedRepository;
}

export function outcomeFromError(e: unknown, timeoutMs: number): RunOutcome {
  if (e instanceof AdapterTimeoutError) return { status: 'timeout', timeoutMs: e.timeoutMs, message: e.message };
  if (e instanceof MalformedOutputError) {
    return e.rawText === undefined
      ? { status: 'malformed-output', message: e.message }
      : { status: 'malformed-output', message: e.message, rawText: e.rawText };
  }
  return { status: 'tool-error', message: errorMessage(e) || `tool failed (timeout budget ${timeoutMs} ms)` };
}

/**
 * Runs every adapter against every repository with bounded parallelism.
 * Each (tool, repository) pair yields exactly one persisted Run Record; a
 * failing or slow tool only ever affects its own record.
 */
export class RunOrchestrator {
  private readonly maxParallel: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly sink: RunRecordSink,
    private readonly resolveBranch: BranchResolver,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.maxParallel = options.maxParallel && options.maxParallel > 0 ? options.maxParallel : DEFAULT_MAX_PARALLEL;
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TOOL_TIMEOUT_MS;
  }

  private async plan(repositories: RepositoryTarget[], ctx: RunContext): Promise<PlannedRepository[]> {
    // unusable identifiers are structural failures: reject before any tool runs
    const ids = repositories.map(r => repositoryIdFromUrl(r.url));
    const branches = new Map<string, string>();
    const planned: PlannedRepository[] = [];
    for (let i = 0; i < repositories.length; i++) {
      const { url, branch, sizeKb } = repositories[i];
      let resolved = branch || branches.get(url);
      if (!resolved) {
        let found: string | undefined;
        try {
          found = await this.resolveBranch(url);
        } catch (e) {
          if (ctx.verbose) console.warn(`⚠️  Branch lookup for ${url} failed: ${errorMessage(e)}`);
        }
        if (!found && ctx.verbose) console.warn(`⚠️  Could not resolve default branch of ${url}; using '${DEFAULT_BRANCH}'`);
        resolved = found || DEFAULT_BRANCH;
        branches.set(url, resolved);
      }
      planned.push({ url, branch: resolved, repositoryId: ids[i], sizeKb });
    }
    return planned;
  }

  private async invoke(adapter: Adapter, repository: PlannedRepository, ctx: RunContext): Promise<RunRecord> {
    const startedAt = ctx.clock().toISOString();
    const start = performance.now();
    const elapsed = () => (performance.now() - start) / 1000;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const pending = Promise.resolve().then(() =>
      adapter.generate(repository.url, repository.branch, { signal: controller.signal })
    );
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AdapterTimeoutError(adapter.toolId, this.timeoutMs));
      }, this.timeoutMs);
    });
    // a tool that settles after its deadline has already been recorded
    void pending.catch(e => {
      if (controller.signal.aborted && ctx.verbose) console.warn(`⚠️  ${adapter.toolId} failed after timeout: ${errorMessage(e)}`);
    });

    let outcome: RunOutcome;
    let durationSeconds: number;
    try {
      const output = await Promise.race([pending, deadline]);
      const parsed = parseJsonDocument(output.document);
      outcome = parsed.ok
        ? { status: 'success', document: parsed.value }
        : { status: 'malformed-output', message: `Unparsable JSON: ${parsed.reason}`, rawText: output.document };
      durationSeconds = parsed.ok && Number.isFinite(output.durationSeconds) && output.durationSeconds >= 0
        ? output.durationSeconds
        : elapsed();
    } catch (e) {
      outcome = outcomeFromError(e, this.timeoutMs);
      durationSeconds = elapsed();
    } finally {
      if (timer) clearTimeout(timer);
    }

    const record: RunRecord = {
      runId: ctx.runId,
      recordId: randomUUID(),
      toolId: adapter.toolId,
      toolFamily: adapter.family,
      repositoryId: repository.repositoryId,
      repositoryUrl: repository.url,
      branch: repository.branch,
      startedAt,
      durationSeconds,
      outcome
    };
    if (repository.sizeKb !== undefined) record.repositorySizeKb = repository.sizeKb;
    return record;
  }

  /**
   * Returns the Run Records in (repository, tool) input order. Only a
   * structural failure (unusable repository id, record persistence) rejects.
   */
  async runAll(adapters: Adapter[], repositories: RepositoryTarget[], ctx: RunContext): Promise<RunRecord[]> {
    const planned = await this.plan(repositories, ctx);
    const queue: Invocation[] = [];
    for (const repository of planned) {
      for (const adapter of adapters) queue.push({ adapter, repository });
    }
    // one promise per pair, in input order; the sink is the only collector
    const completed: Promise<RunRecord>[] = [];
    const running: Promise<void>[] = [];
    const fatal: unknown[] = [];

    const runOne = async (task: Invocation): Promise<RunRecord> => {
      if (ctx.verbose) console.log(`🔄 ${task.adapter.toolId} on ${task.repository.repositoryId} (${task.repository.branch})`);
      const record = await this.invoke(task.adapter, task.repository, ctx);
      await this.sink.save(record);
      if (ctx.verbose) console.log(outcomeLine(record));
      this.options.onRecord?.(record);
      return record;
    };

    while (queue.length || running.length) {
      while (!fatal.length && queue.length && running.length < this.maxParallel) {
        const task = queue.shift();
        if (!task) break;
        const result = runOne(task);
        completed.push(result);
        const p: Promise<void> = result
          .then(
            () => undefined,
            error => {
              fatal.push(error);
            }
          )
          .finally(() => {
            const idx = running.indexOf(p);
            if (idx >= 0) running.splice(idx, 1);
          });
        running.push(p);
      }
      if (fatal.length) queue.length = 0;
      if (running.length) await Promise.race(running);
    }
    if (fatal.length) throw fatal[0];
    return Promise.all(completed);
  }
}
