#!/usr/bin/env node
/**
 * cbombench - benchmark CBOM generation tools against each other.
 *
 * @example
 * ```bash
 * cbombench get-repos -l java -n 5
 * cbombench benchmark cbomkit cdxgen deepseek -n 3
 * cbombench test cdxgen --url https://github.com/example/project
 * cbombench analyze --format yaml
 * cbombench load-analysis
 * ```
 */

import { Command, InvalidArgumentError } from 'commander';
import { knownToolIds } from './adapters';
import { BenchConfig, LoadConfigOptions, loadConfig } from './config';
import { CbomBenchError, errorMessage } from './errors';
import { outcomeLine } from './format';
import { BenchmarkReport, CbomBenchmark, ReportFormat } from './index';
import { RepositoryTarget } from './types';

const VERSION = '0.1.0';

export interface CliDependencies {
  configOptions?: LoadConfigOptions;
  createBenchmark?: (config: BenchConfig) => CbomBenchmark;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Not a non-negative integer.');
  return n;
}

function parseFormat(value: string): ReportFormat {
  if (value === 'table' || value === 'json' || value === 'yaml') return value;
  throw new InvalidArgumentError('Expected table, json or yaml.');
}

interface SearchOptions {
  language: string;
  minSize: number;
  maxSize: number;
  sampleSize: number;
}

function printReport(report: BenchmarkReport): void {
  const failures = report.records.filter(r => r.outcome.status !== 'success');
  console.log('-'.repeat(60));
  console.log(`Benchmark run ${report.runId}: ${report.records.length} run record(s), ${failures.length} failure(s)`);
  if (report.unknownTools.length) console.log(`  ⚠️  Unknown tool(s) skipped: ${report.unknownTools.join(', ')}`);
  failures.forEach(r => console.log(`  ${outcomeLine(r)}`));
}

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  const withBenchmark = (overrides: LoadConfigOptions['overrides'] = {}) => {
    const config = loadConfig({ ...deps.configOptions, overrides: { ...deps.configOptions?.overrides, ...overrides } });
    return deps.createBenchmark ? deps.createBenchmark(config) : new CbomBenchmark(config);
  };

  // Configuration and structural errors end the command with a non-zero exit
  // code; per-pair tool failures are part of a completed run.
  const guarded = <A extends unknown[]>(action: (...args: A) => Promise<void>) => async (...args: A) => {
    try {
      await action(...args);
    } catch (e) {
      console.error(`❌ ${e instanceof CbomBenchError ? e.message : `Unexpected error: ${errorMessage(e)}`}`);
      process.exitCode = 1;
    }
  };

  program
    .name('cbombench')
    .description('Benchmark CBOM-generation tools on GitHub repositories (agreement metrics, no ground truth)')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText('after', `\nKnown tools: ${knownToolIds().join(', ')}`);

  program
    .command('get-repos')
    .description('Find random GitHub repositories matching the criteria')
    .option('-l, --language <language>', 'programming language to filter by', 'java')
    .option('-s, --min-size <kb>', 'minimum repository size in KB', parseInteger, 1000)
    .option('-m, --max-size <kb>', 'maximum repository size in KB', parseInteger, 500000)
    .option('-n, --sample-size <n>', 'number of repositories to return', parseInteger, 5)
    .action(guarded(async (opts: SearchOptions) => {
      console.log(`Searching for ${opts.sampleSize} ${opts.language} repositories with minimum size of ${opts.minSize}KB...`);
      const repos = await withBenchmark().findRepositories({
        language: opts.language,
        minSizeKb: opts.minSize,
        maxSizeKb: opts.maxSize,
        sampleSize: opts.sampleSize
      });
      if (!repos.length) {
        console.log('No repositories found matching your criteria.');
        return;
      }
      console.log('\nFound repositories:');
      repos.forEach(r => console.log(`- ${r.fullName} | ${r.url} | branch: ${r.defaultBranch} | size: ${r.sizeKb}KB`));
    }));

  program
    .command('benchmark')
    .description('Run the given tools on a random sample of repositories')
    .argument('<kits...>', 'tools to benchmark')
    .option('-l, --language <language>', 'programming language to filter by', 'java')
    .option('-s, --min-size <kb>', 'minimum repository size in KB', parseInteger, 1000)
    .option('-m, --max-size <kb>', 'maximum repository size in KB', parseInteger, 1000000)
    .option('-n, --sample-size <n>', 'number of repositories to benchmark on', parseInteger, 1)
    .option('--parallel <n>', 'maximum concurrent tool invocations', parseInteger)
    .option('--timeout <ms>', 'per-invocation timeout in milliseconds', parseInteger)
    .action(guarded(async (kits: string[], opts: SearchOptions & { parallel?: number; timeout?: number }) => {
      const bench = withBenchmark({ maxParallel: opts.parallel, toolTimeoutMs: opts.timeout });
      console.log(`Fetching ${opts.sampleSize} GitHub repositories in ${opts.language} with size > ${opts.minSize}KB...`);
      const repos = await bench.findRepositories({
        language: opts.language,
        minSizeKb: opts.minSize,
        maxSizeKb: opts.maxSize,
        sampleSize: opts.sampleSize
      });
      if (!repos.length) {
        console.log('No repositories found. Nothing to benchmark.');
        return;
      }
      const targets: RepositoryTarget[] = repos.map(r => ({ url: r.url, branch: r.defaultBranch, sizeKb: r.sizeKb }));
      const report = await bench.benchmark(kits, targets, { onRecord: r => console.log(outcomeLine(r)) });
      printReport(report);
    }));

  program
    .command('test')
    .description('Run the given tools on a single repository')
    .argument('<kits...>', 'tools to run')
    .requiredOption('--url <url>', 'repository URL')
    .option('--branch <branch>', 'branch to scan (default branch when omitted)')
    .action(guarded(async (kits: string[], opts: { url: string; branch?: string }) => {
      const report = await withBenchmark().benchmark(kits, [{ url: opts.url, branch: opts.branch }], {
        onRecord: r => console.log(outcomeLine(r))
      });
      printReport(report);
    }));

  program
    .command('analyze')
    .description('Normalize stored runs, compare tools per repository and record agreement metrics')
    .option('--run <runId>', 'only analyze records of this benchmark run')
    .option('--format <format>', 'table, json or yaml', parseFormat, 'table')
    .action(guarded(async (opts: { run?: string; format: ReportFormat }) => {
      const bench = withBenchmark();
      const summary = await bench.analyze({ runId: opts.run });
      bench.displayAnalysis(summary, opts.format);
    }));

  program
    .command('load-analysis')
    .description('Show a previously computed analysis, or list them when no id is given')
    .argument('[analysisId]', 'analysis to show')
    .option('--format <format>', 'table, json or yaml', parseFormat, 'table')
    .action(guarded(async (analysisId: string | undefined, opts: { format: ReportFormat }) => {
      const bench = withBenchmark();
      if (!analysisId) {
        const analyses = await bench.listAnalyses();
        if (!analyses.length) {
          console.log('No analyses stored.');
          return;
        }
        console.log('Stored analyses (newest first):');
        analyses.forEach(a => console.log(`- ${a.analysisId} | sample: ${a.sampleId} | computed: ${a.computedAt}`));
        return;
      }
      bench.displayAnalysis(await bench.loadAnalysis(analysisId), opts.format);
    }));

  program
    .command('delete-data')
    .description('Delete all stored run records and analyses')
    .action(guarded(async () => {
      await withBenchmark().deleteData();
      console.log('🗑️  Stored run records and analyses deleted.');
    }));

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(e => {
    console.error(`❌ ${errorMessage(e)}`);
    process.exit(1);
  });
}
