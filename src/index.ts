#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { FileResponseCache } from './cache/fileCache.js';
import { assertScope } from './cache/cache.js';
import { loadConfig, parsePositiveInteger, requireToken, type AppConfig } from './config.js';
import { Fetcher } from './fetch/fetcher.js';
import { collectPages } from './fetch/paginate.js';
import { jot } from './jot.js';
import { createLogger, type Logger } from './logger.js';
import { createFetchContext } from './types/index.js';

dotenv.config();

const program = new Command();
program
  .name('stargazer-fetch')
  .description('Fetch GitHub API resources through a rate-limit aware, per-repository response cache.');

program
  .command('fetch')
  .description('Fetch a URL, following next-page links, and write the decoded JSON to a file.')
  .argument('<url>', 'GitHub API URL to fetch.')
  .requiredOption('-r, --repo <owner/repo>', 'Repository whose cache scope holds the responses.')
  .option('-t, --token <token>', 'GitHub access token (defaults to GITHUB_TOKEN).')
  .option('-c, --cache <dir>', 'Cache directory (defaults to STARGAZER_CACHE_DIR or ./stargazer_cache).')
  .option('--accept <media-type>', 'Accept header override, e.g. application/vnd.github.v3.star+json.')
  .option('--revalidate', 'Re-fetch the cached last page of the collection.', false)
  .option('--single', 'Fetch one resource instead of walking a paginated list.', false)
  .option('--max-items <number>', 'Stop following pages after this many items.')
  .option('-o, --output <path>', 'Where to write the JSON result.')
  .action(async (url: string, rawOptions: FetchCommandOptions) => {
    await handleFetch(url, rawOptions);
  });

program
  .command('clear')
  .description('Clear all cached GitHub API responses for a repository.')
  .requiredOption('-r, --repo <owner/repo>', 'Repository whose cache scope is cleared.')
  .option('-c, --cache <dir>', 'Cache directory (defaults to STARGAZER_CACHE_DIR or ./stargazer_cache).')
  .action(async (rawOptions: ClearCommandOptions) => {
    await handleClear(rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`stargazer-fetch failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});

interface ClearCommandOptions {
  repo: string;
  cache?: string;
}

interface FetchCommandOptions extends ClearCommandOptions {
  token?: string;
  accept?: string;
  revalidate: boolean;
  single: boolean;
  maxItems?: string;
  output?: string;
}

async function handleFetch(url: string, options: FetchCommandOptions) {
  const config = loadConfig();
  const scope = options.repo.trim();
  assertScope(scope);
  const token = options.token?.trim() || requireToken(config);
  const log = createLogger('fetch', scope);

  const fetcher = createFetcher(config, options.cache, log);
  const context = createFetchContext({ scope, token, accept: options.accept?.trim() || undefined });

  let result: unknown;
  if (options.single) {
    const page = await fetcher.fetchPage(context, url, jot.unknown(), { revalidateLastPage: options.revalidate });
    if (page.kind === 'skipped') {
      log(`no data for ${url}`);
      return;
    }
    result = page.data;
  } else {
    const maxItems = options.maxItems === undefined ? undefined : parsePositiveInteger(options.maxItems, 0, '--max-items');
    const collected = await collectPages(fetcher, context, url, jot.array(jot.unknown()), {
      revalidateLastPage: options.revalidate,
      ...(maxItems === undefined ? {} : { maxItems }),
      onPage: (_items, total) => log(`${total} items so far`),
      logger: log,
    });
    log(`collected ${collected.items.length} items from ${collected.pages} pages`);
    result = collected.items;
  }

  const outputPath = path.resolve(options.output ?? defaultOutputPath(scope));
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(result, null, 2), 'utf8');
  log(`wrote ${outputPath}`);
}

async function handleClear(options: ClearCommandOptions) {
  const config = loadConfig();
  const scope = options.repo.trim();
  const log = createLogger('clear', scope);
  const cache = new FileResponseCache({ baseDir: options.cache ?? config.cacheDir });
  log(`clearing GitHub API response cache for repository ${scope}`);
  await cache.clearScope(scope);
}

function createFetcher(config: AppConfig, cacheDir: string | undefined, logger: Logger) {
  return new Fetcher({
    cache: new FileResponseCache({ baseDir: cacheDir ?? config.cacheDir }),
    userAgent: config.userAgent,
    backoff: { maxAttempts: config.maxAttempts },
    logger,
  });
}

function defaultOutputPath(scope: string): string {
  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  return path.join('output', `${isoStamp}_${scope.replace('/', '_')}.json`);
}
