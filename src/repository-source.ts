// GitHub as the repository source: discovery of benchmark candidates and
// default-branch lookup for the orchestrator.

import { z } from 'zod';
import { GITHUB_API_URL, GITHUB_PAGE_SIZE } from './constants';
import { ConfigError, InvalidRepositoryError, RepositorySourceError, errorMessage } from './errors';
import { DiscoveredRepository } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RepositorySearch {
  language: string;
  minSizeKb: number;
  maxSizeKb?: number;
  sampleSize: number;
}

export interface GithubSourceOptions {
  token?: string;
  apiUrl?: string;
  fetchImpl?: FetchLike;
  random?: () => number;
  clock?: () => Date;
  verbose?: boolean;
}

const searchResponseSchema = z.object({
  items: z.array(
    z.object({
      full_name: z.string(),
      clone_url: z.string(),
      default_branch: z.string(),
      size: z.number()
    })
  )
});

const repositoryResponseSchema = z.object({ default_branch: z.string().min(1) });

const SEGMENT = /^[A-Za-z0-9._-]+$/;

function stripGitSuffix(segment: string): string {
  return segment.endsWith('.git') ? segment.slice(0, -4) : segment;
}

/**
 * Stable repository id used in run records and store paths: `owner/repo` for
 * GitHub (HTTPS or SSH form), `host/path` elsewhere.
 */
export function repositoryIdFromUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) throw new InvalidRepositoryError(url, 'empty URL');

  let host: string;
  let pathPart: string;
  const ssh = trimmed.match(/^(?:ssh:\/\/)?git@([^:/]+)[:/](.+)$/);
  if (ssh) {
    host = ssh[1].toLowerCase();
    pathPart = ssh[2];
  } else {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      throw new InvalidRepositoryError(url, 'not a URL');
    }
    if (!['http:', 'https:', 'git:', 'ssh:'].includes(parsed.protocol)) {
      throw new InvalidRepositoryError(url, `unsupported protocol ${parsed.protocol}`);
    }
    host = parsed.hostname.toLowerCase();
    pathPart = parsed.pathname;
  }

  const segments = pathPart.split('/').filter(Boolean);
  if (segments.length) segments[segments.length - 1] = stripGitSuffix(segments[segments.length - 1]);
  if (!host || segments.some(s => !SEGMENT.test(s) || s === '.' || s === '..')) {
    throw new InvalidRepositoryError(url, 'unexpected characters in path');
  }
  if (host === 'github.com' || host === 'www.github.com') {
    if (segments.length < 2) throw new InvalidRepositoryError(url, 'expected github.com/<owner>/<repo>');
    return `${segments[0]}/${segments[1]}`;
  }
  if (!segments.length) throw new InvalidRepositoryError(url, 'missing repository path');
  return `${host}/${segments.join('/')}`;
}

// Uniform sample without replacement, order of selection preserved.
export function sampleWithoutReplacement<T>(items: T[], size: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const count = Math.min(size, pool.length);
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

export class GithubRepositorySource {
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly random: () => number;
  private readonly clock: () => Date;

  constructor(private readonly options: GithubSourceOptions = {}) {
    this.apiUrl = (options.apiUrl ?? GITHUB_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
  }

  private headers(): Record<string, string> {
    if (!this.options.token) throw new ConfigError('GITHUB_TOKEN environment variable required');
    return {
      Authorization: `Bearer ${this.options.token}`,
      Accept: 'application/vnd.github.v3+json'
    };
  }

  searchQuery(search: RepositorySearch): string {
    const since = new Date(this.clock().getTime() - 365 * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
    const size = search.maxSizeKb === undefined ? `>${search.minSizeKb}` : `${search.minSizeKb}..${search.maxSizeKb}`;
    return `language:${search.language} pushed:>${since} size:${size}`;
  }

  async findRepositories(search: RepositorySearch): Promise<DiscoveredRepository[]> {
    const headers = this.headers();
    const params = new URLSearchParams({
      q: this.searchQuery(search),
      sort: 'stars',
      order: 'desc',
      per_page: String(GITHUB_PAGE_SIZE)
    });
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.apiUrl}/search/repositories?${params.toString()}`, { headers });
    } catch (e) {
      throw new RepositorySourceError(`GitHub search failed: ${errorMessage(e)}`);
    }
    if (!res.ok) {
      throw new RepositorySourceError(`GitHub API error: ${res.status} - ${await res.text()}`, res.status);
    }
    const parsed = searchResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new RepositorySourceError('Unexpected GitHub search response');

    const items = parsed.data.items;
    if (items.length < search.sampleSize && this.options.verbose) {
      console.warn(`⚠️  Not enough repositories match the filters; found ${items.length}`);
    }
    return sampleWithoutReplacement(items, search.sampleSize, this.random).map(item => ({
      fullName: item.full_name,
      url: item.clone_url,
      defaultBranch: item.default_branch,
      sizeKb: item.size
    }));
  }

  // Undefined when the lookup fails; the caller decides on a fallback.
  async resolveDefaultBranch(url: string): Promise<string | undefined> {
    const headers = this.headers();
    const id = repositoryIdFromUrl(url);
    if (id.split('/').length !== 2) return undefined; // not hosted on GitHub
    try {
      const res = await this.fetchImpl(`${this.apiUrl}/repos/${id}`, { headers });
      if (!res.ok) {
        if (this.options.verbose) console.warn(`⚠️  Repository lookup for ${id} returned ${res.status}`);
        return undefined;
      }
      const parsed = repositoryResponseSchema.safeParse(await res.json());
      return parsed.success ? parsed.data.default_branch : undefined;
    } catch (e) {
      if (this.options.verbose) console.warn(`⚠️  Repository lookup for ${id} failed: ${errorMessage(e)}`);
      return undefined;
    }
  }
}
