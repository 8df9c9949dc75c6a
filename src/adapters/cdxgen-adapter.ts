import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { DEFAULT_CDXGEN_COMMAND, DEFAULT_CDXGEN_LANGUAGE } from '../constants';
import { AdapterError, AdapterTimeoutError } from '../errors';
import { SafeExec, SafeExecResult, getConfiguredTimeout, safeExec } from '../safe-exec';
import { Adapter, AdapterOutput, GenerateOptions } from '../types';

export const CDXGEN_TOOL_ID = 'cdxgen';

export interface CdxgenAdapterOptions {
  command?: string;
  language?: string;
  timeoutMs?: number; // per child process
  exec?: SafeExec;
  tmpDir?: string;
}

function ensureSucceeded(result: SafeExecResult, step: string, timeoutMs: number): void {
  if (!result.failed) return;
  if (result.timedOut) throw new AdapterTimeoutError(CDXGEN_TOOL_ID, timeoutMs);
  if (result.aborted) throw new AdapterError(CDXGEN_TOOL_ID, `${step} aborted`);
  throw new AdapterError(CDXGEN_TOOL_ID, `${step} failed: ${(result.errorMessage || 'unknown error').trim()}`);
}

/**
 * CLI generator: shallow-clones the branch, runs the CBOM generator on the
 * checkout and returns the output file. Only the generator run is timed.
 */
export function createCdxgenAdapter(options: CdxgenAdapterOptions = {}): Adapter {
  const command = options.command ?? DEFAULT_CDXGEN_COMMAND;
  const language = options.language ?? DEFAULT_CDXGEN_LANGUAGE;
  const exec = options.exec ?? safeExec;
  const timeoutMs = options.timeoutMs ?? getConfiguredTimeout();

  return {
    toolId: CDXGEN_TOOL_ID,
    family: 'cli-generator',
    async generate(repositoryUrl: string, branch: string, generateOptions: GenerateOptions = {}): Promise<AdapterOutput> {
      const { signal } = generateOptions;
      const workDir = await fs.mkdtemp(path.join(options.tmpDir ?? os.tmpdir(), 'cbombench-cdxgen-'));
      const repoDir = path.join(workDir, 'repo');
      const outFile = path.join(workDir, 'cbom.json');
      try {
        const clone = await exec('git', ['clone', '--depth', '1', '--branch', branch, repositoryUrl, repoDir], { timeoutMs, signal });
        ensureSucceeded(clone, 'git clone', timeoutMs);

        const start = performance.now();
        const generated = await exec(command, ['-t', language, '-o', outFile, repoDir], { timeoutMs, signal, cwd: workDir });
        ensureSucceeded(generated, command, timeoutMs);
        const durationSeconds = (performance.now() - start) / 1000;

        if (!(await fs.pathExists(outFile))) throw new AdapterError(CDXGEN_TOOL_ID, `${command} produced no output file`);
        return { document: await fs.readFile(outFile, 'utf8'), durationSeconds };
      } finally {
        await fs.remove(workDir);
      }
    }
  };
}
