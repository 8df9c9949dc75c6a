import { performance } from 'perf_hooks';
import { z } from 'zod';
import { DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL } from '../constants';
import { AdapterError, ConfigError, MalformedOutputError, errorMessage } from '../errors';
import { extractJsonPayload } from '../json-document';
import { FetchLike } from '../repository-source';
import { Adapter, AdapterOutput, GenerateOptions } from '../types';

export const LLM_TOOL_ID = 'deepseek';

export const SYSTEM_PROMPT = `You are a cryptographic component analyzer. Your task is to analyze a GitHub project and generate a Cryptographic Bill of Materials (CBOM) following the official CycloneDX standard.

Identify all cryptographic components including:
- Cryptographic algorithms (AES, RSA, SHA256, etc.)
- Key management functions
- Hashing functions
- Digital signatures
- Certificates and TLS/SSL usage
- Random number generation

Generate the CBOM in valid CycloneDX JSON format with:
- bomFormat: "CycloneDX"
- specVersion: "1.6"
- components of type "cryptographic-asset"
- cryptoProperties for each cryptographic component, including key sizes where known

Only return the JSON without any additional text or markdown. If there is nothing to report return an empty CBOM.`;

export function userPrompt(repositoryUrl: string, branch: string): string {
  return [
    'Please generate a CBOM json for this project, following the official CycloneDX standard on CBOMs.',
    `Project: ${repositoryUrl}`,
    `Branch: ${branch}`,
    'Please only return the formatted JSON.'
  ].join('\n');
}

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1)
});

export interface LlmAdapterOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  toolId?: string;
  fetchImpl?: FetchLike;
}

/**
 * Language-model generator over an OpenAI-compatible chat-completions API.
 * The answer is returned as written, minus any markdown fence around it.
 */
export function createLlmAdapter(options: LlmAdapterOptions): Adapter {
  if (!options.apiKey) throw new ConfigError('DEEPSEEK_API_KEY environment variable required');
  const apiKey = options.apiKey;
  const toolId = options.toolId ?? LLM_TOOL_ID;
  const endpoint = `${(options.baseUrl ?? DEFAULT_LLM_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
  const model = options.model ?? DEFAULT_LLM_MODEL;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  return {
    toolId,
    family: 'llm-generator',
    async generate(repositoryUrl: string, branch: string, generateOptions: GenerateOptions = {}): Promise<AdapterOutput> {
      const start = performance.now();
      let res: Response;
      try {
        res = await fetchImpl(endpoint, {
          method: 'POST',
          headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model,
            messages: [
              { role: 'system', content: SYSTEM_PROMPT },
              { role: 'user', content: userPrompt(repositoryUrl, branch) }
            ],
            stream: false
          }),
          signal: generateOptions.signal
        });
      } catch (e) {
        throw new AdapterError(toolId, `LLM request failed: ${errorMessage(e)}`);
      }
      const bodyText = await res.text();
      if (!res.ok) throw new AdapterError(toolId, `LLM API error: ${res.status} - ${bodyText.slice(0, 200)}`);

      let body: unknown;
      try {
        body = JSON.parse(bodyText);
      } catch {
        throw new MalformedOutputError('LLM response body is not JSON', bodyText);
      }
      const parsed = chatCompletionSchema.safeParse(body);
      if (!parsed.success) throw new MalformedOutputError('Unexpected chat-completion response', bodyText);
      const content = parsed.data.choices[0].message.content ?? '';
      return { document: extractJsonPayload(content), durationSeconds: (performance.now() - start) / 1000 };
    }
  };
}
