import { performance } from 'perf_hooks';
import WebSocket from 'ws';
import { DEFAULT_CBOMKIT_API_URL, DEFAULT_CBOMKIT_WS_URL } from '../constants';
import { AdapterError, errorMessage } from '../errors';
import { getString, parseJsonDocument } from '../json-document';
import { FetchLike } from '../repository-source';
import { Adapter, AdapterOutput, GenerateOptions } from '../types';

export const CBOMKIT_TOOL_ID = 'cbomkit';

// Progress text the scanner sends once the checkout is complete; timing starts here.
export const CHECKOUT_DONE_MESSAGE = 'Cloning git repository: Checking out files done';
export const FINISHED_MESSAGE = 'Finished';

export interface CbomkitAdapterOptions {
  wsUrl?: string;
  apiUrl?: string;
  fetchImpl?: FetchLike;
  onProgress?: (label: string) => void;
}

interface ScanResult {
  timingStart?: number;
}

function awaitScan(wsUrl: string, repositoryUrl: string, branch: string, options: CbomkitAdapterOptions, signal?: AbortSignal): Promise<ScanResult> {
  return new Promise<ScanResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AdapterError(CBOMKIT_TOOL_ID, 'scan aborted'));
      return;
    }
    const ws = new WebSocket(wsUrl);
    let settled = false;
    let lastLabel = '';
    let timingStart: number | undefined;

    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (ws.readyState === WebSocket.OPEN) ws.close();
      else if (ws.readyState === WebSocket.CONNECTING) ws.terminate();
      if (err) reject(err);
      else resolve({ timingStart });
    };
    const onAbort = () => finish(new AdapterError(CBOMKIT_TOOL_ID, 'scan aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });

    ws.on('open', () => {
      ws.send(JSON.stringify({ scanUrl: repositoryUrl, branch }));
    });
    ws.on('message', (data: WebSocket.RawData) => {
      const parsed = parseJsonDocument(data.toString());
      if (!parsed.ok) {
        finish(new AdapterError(CBOMKIT_TOOL_ID, `Unparsable progress message: ${parsed.reason}`));
        return;
      }
      const type = getString(parsed.value, 'type');
      const text = getString(parsed.value, 'message') ?? '';
      if (type === 'ERROR') {
        finish(new AdapterError(CBOMKIT_TOOL_ID, text || 'scan failed'));
        return;
      }
      if (type === 'LABEL' && text !== lastLabel) {
        lastLabel = text;
        options.onProgress?.(text);
      }
      if (text === CHECKOUT_DONE_MESSAGE) timingStart = performance.now();
      else if (text === FINISHED_MESSAGE) finish();
    });
    ws.on('error', err => finish(new AdapterError(CBOMKIT_TOOL_ID, `WebSocket error: ${err.message}`)));
    ws.on('close', () => finish(new AdapterError(CBOMKIT_TOOL_ID, 'connection closed before the scan finished')));
  });
}

/**
 * Containerized scanner: a scan is requested over a websocket, progress
 * labels stream back, and the finished CBOM is fetched from the HTTP API.
 */
export function createCbomkitAdapter(options: CbomkitAdapterOptions = {}): Adapter {
  const wsUrl = options.wsUrl ?? DEFAULT_CBOMKIT_WS_URL;
  const apiUrl = options.apiUrl ?? DEFAULT_CBOMKIT_API_URL;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  return {
    toolId: CBOMKIT_TOOL_ID,
    family: 'container-scanner',
    async generate(repositoryUrl: string, branch: string, generateOptions: GenerateOptions = {}): Promise<AdapterOutput> {
      const start = performance.now();
      const scan = await awaitScan(wsUrl, repositoryUrl, branch, options, generateOptions.signal);
      let res: Response;
      try {
        res = await fetchImpl(apiUrl, { signal: generateOptions.signal });
      } catch (e) {
        throw new AdapterError(CBOMKIT_TOOL_ID, `Retrieving CBOM failed: ${errorMessage(e)}`);
      }
      if (!res.ok) throw new AdapterError(CBOMKIT_TOOL_ID, `Retrieving CBOM failed: HTTP ${res.status}`);
      const document = await res.text();
      const end = performance.now();
      return { document, durationSeconds: (end - (scan.timingStart ?? start)) / 1000 };
    }
  };
}
