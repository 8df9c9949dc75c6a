import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
  DEFAULT_CBOMKIT_API_URL,
  DEFAULT_CBOMKIT_WS_URL,
  DEFAULT_CDXGEN_COMMAND,
  DEFAULT_CDXGEN_LANGUAGE,
  DEFAULT_DATA_DIR,
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_MAX_PARALLEL,
  DEFAULT_TOOL_TIMEOUT_MS
} from './constants';
import { ConfigError } from './errors';

export const DEFAULT_CONFIG_FILE = 'cbombench.yaml';

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform(v => v === true || v === 'true' || v === '1');

const configSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  toolTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TOOL_TIMEOUT_MS),
  maxParallel: z.coerce.number().int().min(1).max(64).default(DEFAULT_MAX_PARALLEL),
  verbose: booleanish.default(false),
  cbomkit: z
    .object({
      wsUrl: z.string().url().default(DEFAULT_CBOMKIT_WS_URL),
      apiUrl: z.string().url().default(DEFAULT_CBOMKIT_API_URL)
    })
    .default({}),
  cdxgen: z
    .object({
      command: z.string().min(1).default(DEFAULT_CDXGEN_COMMAND),
      language: z.string().min(1).default(DEFAULT_CDXGEN_LANGUAGE)
    })
    .default({}),
  llm: z
    .object({
      baseUrl: z.string().url().default(DEFAULT_LLM_BASE_URL),
      model: z.string().min(1).default(DEFAULT_LLM_MODEL),
      apiKey: z.string().min(1).optional()
    })
    .default({}),
  githubToken: z.string().min(1).optional()
});

export type BenchConfig = z.infer<typeof configSchema>;
type RawConfig = z.input<typeof configSchema>;

// Environment variable -> config path. Env values override the YAML file.
const ENV_BINDINGS: { env: string; path: string[] }[] = [
  { env: 'CBOMBENCH_DATA_DIR', path: ['dataDir'] },
  { env: 'CBOMBENCH_TOOL_TIMEOUT_MS', path: ['toolTimeoutMs'] },
  { env: 'CBOMBENCH_MAX_PARALLEL', path: ['maxParallel'] },
  { env: 'CBOMBENCH_VERBOSE', path: ['verbose'] },
  { env: 'CBOMBENCH_CBOMKIT_WS_URL', path: ['cbomkit', 'wsUrl'] },
  { env: 'CBOMBENCH_CBOMKIT_API_URL', path: ['cbomkit', 'apiUrl'] },
  { env: 'CBOMBENCH_CDXGEN_COMMAND', path: ['cdxgen', 'command'] },
  { env: 'CBOMBENCH_CDXGEN_LANGUAGE', path: ['cdxgen', 'language'] },
  { env: 'CBOMBENCH_LLM_BASE_URL', path: ['llm', 'baseUrl'] },
  { env: 'CBOMBENCH_LLM_MODEL', path: ['llm', 'model'] },
  { env: 'DEEPSEEK_API_KEY', path: ['llm', 'apiKey'] },
  { env: 'GITHUB_TOKEN', path: ['githubToken'] }
];

type Layer = { [key: string]: unknown };

function isLayer(value: unknown): value is Layer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Layer, keys: string[], value: string): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isLayer(next)) {
      node = next;
    } else {
      const created: Layer = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

export function readConfigFile(filePath: string): Layer {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isLayer(parsed)) throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  return parsed;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configFile?: string; // explicit path; otherwise CBOMBENCH_CONFIG or ./cbombench.yaml when present
  cwd?: string;
  overrides?: Partial<RawConfig>;
}

export function loadConfig(options: LoadConfigOptions = {}): BenchConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configFile ?? env.CBOMBENCH_CONFIG;
  const candidate = explicit ? path.resolve(cwd, explicit) : path.join(cwd, DEFAULT_CONFIG_FILE);

  let layer: Layer = {};
  if (explicit || fs.existsSync(candidate)) layer = readConfigFile(candidate);

  for (const binding of ENV_BINDINGS) {
    const value = env[binding.env];
    if (value !== undefined && value !== '') setPath(layer, binding.path, value);
  }
  // unset overrides (an omitted CLI flag) leave the lower layers alone
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) layer[key] = value;
  }

  const parsed = configSchema.safeParse(layer);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return parsed.data;
}

export function requireGithubToken(config: BenchConfig): string {
  if (!config.githubToken) throw new ConfigError('GITHUB_TOKEN environment variable required');
  return config.githubToken;
}
