import { AdapterError, InvalidRepositoryError, MalformedOutputError, StoreError } from '../src/errors';
import { RunOrchestrator } from '../src/orchestrator';
import { createRunContext } from '../src/run-context';
import { RunRecordSink } from '../src/store/run-store';
import { Adapter, AdapterOutput, GenerateOptions, RunRecord, ToolFamily } from '../src/types';
import { fixedClock } from './fixtures';

class MemorySink implements RunRecordSink {
  readonly records: RunRecord[] = [];

  async save(record: RunRecord): Promise<string> {
    this.records.push(record);
    return record.recordId;
  }
}

type Generate = (url: string, branch: string, options?: GenerateOptions) => Promise<AdapterOutput>;

function stubAdapter(toolId: string, generate: Generate, family: ToolFamily = 'cli-generator'): Adapter & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    toolId,
    family,
    calls,
    generate: (url, branch, options) => {
      calls.push([url, branch]);
      return generate(url, branch, options);
    }
  };
}

const ok = (document = '{"components":[]}', durationSeconds = 1.5): Generate => async () => ({ document, durationSeconds });

// Never settles on its own; rejects once the orchestrator aborts it.
const hangs: Generate = (_url, _branch, options) => new Promise((_, reject) => {
  options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
});

const ctx = createRunContext({ runId: 'run-1', clock: fixedClock });
const repoOne = { url: 'https://github.com/acme/one', branch: 'main' };
const repoTwo = { url: 'https://github.com/acme/two.git', branch: 'dev' };

describe('RunOrchestrator', () => {
  it('records one outcome per pair and isolates a timed-out tool', async () => {
    const sink = new MemorySink();
    const slow = stubAdapter('slow', hangs);
    const orchestrator = new RunOrchestrator(sink, async () => 'main', { maxParallel: 2, timeoutMs: 50 });
    const records = await orchestrator.runAll([stubAdapter('fast', ok()), slow], [repoOne, repoTwo], ctx);

    expect(records.map(r => [r.toolId, r.repositoryId, r.outcome.status])).toEqual([
      ['fast', 'acme/one', 'success'],
      ['slow', 'acme/one', 'timeout'],
      ['fast', 'acme/two', 'success'],
      ['slow', 'acme/two', 'timeout']
    ]);
    expect(records[0].outcome).toEqual({ status: 'success', document: { components: [] } });
    expect(records[0].durationSeconds).toBe(1.5);
    expect(records[1].outcome).toEqual({ status: 'timeout', timeoutMs: 50, message: 'slow did not finish within 50 ms' });
    expect(records[3].branch).toBe('dev');
    expect(records.every(r => r.runId === 'run-1' && r.startedAt === '2025-01-02T03:04:05.000Z')).toBe(true);
    expect(sink.records).toHaveLength(4);
  });

  it('turns adapter failures into tool-error and malformed-output records', async () => {
    const sink = new MemorySink();
    const adapters = [
      stubAdapter('broken', async () => { throw new AdapterError('broken', 'exit code 2'); }),
      stubAdapter('garbled', ok('not json')),
      stubAdapter('envelope', async () => { throw new MalformedOutputError('Unexpected chat-completion response', '{"x":1}'); }),
      stubAdapter('empty', ok('   '))
    ];
    const records = await new RunOrchestrator(sink, async () => 'main').runAll(adapters, [repoOne], ctx);

    expect(records[0].outcome).toEqual({ status: 'tool-error', message: 'exit code 2' });
    expect(records[1].outcome).toMatchObject({ status: 'malformed-output', rawText: 'not json' });
    expect(records[1].outcome.status === 'malformed-output' && records[1].outcome.message.startsWith('Unparsable JSON: ')).toBe(true);
    expect(records[2].outcome).toEqual({ status: 'malformed-output', message: 'Unexpected chat-completion response', rawText: '{"x":1}' });
    expect(records[3].outcome).toEqual({ status: 'malformed-output', message: 'Unparsable JSON: empty document', rawText: '   ' });
  });

  it('resolves a missing branch once per repository', async () => {
    const resolver = jest.fn(async () => 'develop');
    const adapter = stubAdapter('fast', ok());
    const url = 'https://github.com/acme/one';
    await new RunOrchestrator(new MemorySink(), resolver).runAll([adapter], [{ url }, { url }], ctx);
    expect(resolver).toHaveBeenCalledTimes(1);
    expect(adapter.calls).toEqual([[url, 'develop'], [url, 'develop']]);
  });

  it("falls back to 'main' when the branch cannot be resolved", async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const adapter = stubAdapter('fast', ok());
    const failing = async (url: string): Promise<string | undefined> => {
      if (url.endsWith('two')) throw new Error('HTTP 404');
      return undefined;
    };
    await new RunOrchestrator(new MemorySink(), failing).runAll(
      [adapter],
      [{ url: 'https://github.com/acme/one' }, { url: 'https://github.com/acme/two' }],
      ctx
    );
    expect(adapter.calls.map(c => c[1])).toEqual(['main', 'main']);
    expect(warn).not.toHaveBeenCalled();

    await new RunOrchestrator(new MemorySink(), failing).runAll(
      [adapter],
      [{ url: 'https://github.com/acme/one' }],
      createRunContext({ runId: 'run-2', clock: fixedClock, verbose: true })
    );
    expect(warn).toHaveBeenCalledWith("⚠️  Could not resolve default branch of https://github.com/acme/one; using 'main'");
    warn.mockRestore();
  });

  it('rejects an unusable repository before any tool runs', async () => {
    const adapter = stubAdapter('fast', ok());
    const run = new RunOrchestrator(new MemorySink(), async () => 'main').runAll([adapter], [repoOne, { url: 'not a url' }], ctx);
    await expect(run).rejects.toBeInstanceOf(InvalidRepositoryError);
    expect(adapter.calls).toEqual([]);
  });

  it('stops scheduling when a record cannot be persisted', async () => {
    const sink: RunRecordSink = { save: async () => { throw new StoreError('disk full'); } };
    const adapter = stubAdapter('fast', ok());
    const run = new RunOrchestrator(sink, async () => 'main', { maxParallel: 1 }).runAll([adapter], [repoOne, repoTwo], ctx);
    await expect(run).rejects.toThrow('disk full');
    expect(adapter.calls).toHaveLength(1);
  });

  it('never exceeds the parallelism bound', async () => {
    let active = 0;
    let peak = 0;
    const tracked: Generate = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 10));
      active--;
      return { document: '{}', durationSeconds: 0.01 };
    };
    const adapters = ['a', 'b', 'c'].map(id => stubAdapter(id, tracked));
    const records = await new RunOrchestrator(new MemorySink(), async () => 'main', { maxParallel: 2 })
      .runAll(adapters, [repoOne, repoTwo], ctx);
    expect(records).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it('returns records in input order whatever order they finish in', async () => {
    const sink = new MemorySink();
    const slow: Generate = async () => {
      await new Promise(resolve => setTimeout(resolve, 30));
      return { document: '{}', durationSeconds: 0.03 };
    };
    const records = await new RunOrchestrator(sink, async () => 'main', { maxParallel: 2 })
      .runAll([stubAdapter('slow', slow), stubAdapter('fast', ok())], [repoOne], ctx);
    expect(records.map(r => r.toolId)).toEqual(['slow', 'fast']);
    expect(sink.records.map(r => r.toolId)).toEqual(['fast', 'slow']);
  });

  it('reports records as they are persisted', async () => {
    const seen: string[] = [];
    await new RunOrchestrator(new MemorySink(), async () => 'main', { onRecord: r => seen.push(r.toolId) })
      .runAll([stubAdapter('fast', ok())], [repoOne], ctx);
    expect(seen).toEqual(['fast']);
  });
});
