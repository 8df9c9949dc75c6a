import execa from 'execa';

export interface SafeExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: string | null;
  timedOut: boolean;
  aborted: boolean;
  failed: boolean;
  durationMs: number;
  start: number;
  errorMessage?: string;
}

export interface SafeExecOptions {
  timeoutMs?: number;
  cwd?: string;
  signal?: AbortSignal;
}

export type SafeExec = (cmd: string, args?: string[], options?: SafeExecOptions) => Promise<SafeExecResult>;

const DEFAULT_TIMEOUT_MS = parseInt(process.env.CBOMBENCH_EXEC_TIMEOUT_MS || '600000', 10);

export function isToolSkipped(tool: string): boolean {
  const skip = (process.env.CBOMBENCH_SKIP_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return skip.includes(tool);
}

// execa attaches these fields to its error objects; read them without trusting the shape.
function field(e: unknown, key: string): unknown {
  return typeof e === 'object' && e !== null ? Reflect.get(e, key) : undefined;
}

const str = (v: unknown): string => (typeof v === 'string' ? v : '');

export const safeExec: SafeExec = async (cmd, args = [], options = {}) => {
  const start = Date.now();
  if (isToolSkipped(cmd)) {
    return {
      stdout: '',
      stderr: '',
      code: null,
      signal: null,
      timedOut: false,
      aborted: false,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: 'skipped-by-config'
    };
  }
  if (options.signal?.aborted) {
    return { stdout: '', stderr: '', code: null, signal: null, timedOut: false, aborted: true, failed: true, durationMs: 0, start, errorMessage: 'aborted' };
  }
  const child = execa(cmd, args, {
    cwd: options.cwd,
    reject: false // handle failures uniformly
  });
  // enforced here rather than by execa so the timer is always cleared
  let deadlineHit = false;
  const timer = setTimeout(() => {
    deadlineHit = true;
    child.kill();
  }, options.timeoutMs || DEFAULT_TIMEOUT_MS);
  const onAbort = () => { child.cancel(); };
  options.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const res = await child;
    const timedOut = deadlineHit;
    const aborted = res.isCanceled === true;
    const failed = timedOut || aborted || res.exitCode !== 0;
    return {
      stdout: res.stdout || '',
      stderr: res.stderr || '',
      code: typeof res.exitCode === 'number' ? res.exitCode : null,
      signal: res.signal || null,
      timedOut,
      aborted,
      failed,
      durationMs: Date.now() - start,
      start,
      errorMessage: failed ? (timedOut ? 'timeout' : aborted ? 'aborted' : res.stderr || str(field(res, 'shortMessage')) || 'non-zero-exit') : undefined
    };
  } catch (e: unknown) {
    // spawn failures (missing binary) can still reject with reject:false
    const timedOut = deadlineHit;
    const exitCode = field(e, 'exitCode');
    const signal = field(e, 'signal');
    return {
      stdout: str(field(e, 'stdout')),
      stderr: str(field(e, 'stderr')),
      code: typeof exitCode === 'number' ? exitCode : null,
      signal: typeof signal === 'string' ? signal : null,
      timedOut,
      aborted: field(e, 'isCanceled') === true,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: timedOut ? 'timeout' : (str(field(e, 'shortMessage')) || (e instanceof Error ? e.message : String(e)) || 'exec-error')
    };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
};

export function getConfiguredTimeout(): number {
  return DEFAULT_TIMEOUT_MS;
}
