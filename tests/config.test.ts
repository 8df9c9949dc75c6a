import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, requireGithubToken } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'cbombench-config-'));
  });

  afterEach(async () => {
    await fs.remove(cwd);
  });

  it('falls back to defaults', () => {
    const config = loadConfig({ env: {}, cwd });
    expect(config.dataDir).toBe('CBOMdata');
    expect(config.toolTimeoutMs).toBe(1800000);
    expect(config.maxParallel).toBe(2);
    expect(config.verbose).toBe(false);
    expect(config.cdxgen).toEqual({ command: 'cbom', language: 'java' });
    expect(config.cbomkit.wsUrl).toBe('ws://localhost:8081/v1/scan/cbombench');
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.githubToken).toBeUndefined();
  });

  it('reads credentials and settings from the environment', () => {
    const config = loadConfig({
      env: { CBOMBENCH_MAX_PARALLEL: '4', CBOMBENCH_VERBOSE: 'true', DEEPSEEK_API_KEY: 'test-secret', GITHUB_TOKEN: 'test-token' },
      cwd
    });
    expect(config.maxParallel).toBe(4);
    expect(config.verbose).toBe(true);
    expect(config.llm.apiKey).toBe('test-secret');
    expect(requireGithubToken(config)).toBe('test-token');
  });

  it('layers the YAML file under environment variables', async () => {
    await fs.writeFile(path.join(cwd, 'cbombench.yaml'), 'dataDir: from-file\nmaxParallel: 3\ncdxgen:\n  language: kotlin\n');
    const config = loadConfig({ env: { CBOMBENCH_MAX_PARALLEL: '5' }, cwd });
    expect(config.dataDir).toBe('from-file');
    expect(config.maxParallel).toBe(5);
    expect(config.cdxgen).toEqual({ command: 'cbom', language: 'kotlin' });
  });

  it('applies explicit overrides but ignores unset ones', () => {
    const env = { CBOMBENCH_MAX_PARALLEL: '4' };
    expect(loadConfig({ env, cwd, overrides: { maxParallel: undefined } }).maxParallel).toBe(4);
    expect(loadConfig({ env, cwd, overrides: { maxParallel: 8 } }).maxParallel).toBe(8);
  });

  it('reports invalid values with their path', () => {
    expect.assertions(2);
    try {
      loadConfig({ env: { CBOMBENCH_MAX_PARALLEL: 'zero' }, cwd });
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e instanceof ConfigError && e.issues.some(i => i.startsWith('maxParallel: '))).toBe(true);
    }
  });

  it('rejects a missing or malformed config file', async () => {
    expect(() => loadConfig({ env: {}, cwd, configFile: 'absent.yaml' })).toThrow(ConfigError);
    await fs.writeFile(path.join(cwd, 'list.yaml'), '- a\n- b\n');
    expect(() => loadConfig({ env: { CBOMBENCH_CONFIG: 'list.yaml' }, cwd })).toThrow('must contain a mapping');
  });

  it('requires a GitHub token for repository discovery', () => {
    expect(() => requireGithubToken(loadConfig({ env: {}, cwd }))).toThrow('GITHUB_TOKEN environment variable required');
  });
});
