#!/usr/bin/env node
/**
 * Documentation crawler CLI
 *
 * Crawls a documentation site from a start URL, honoring robots.txt, and
 * writes the extracted content under the output directory.
 *
 * @example
 * ```
 * npm run crawl -- https://docs.example.org/polars/ --max-pages 50 --output-dir output
 * ```
 *
 * Exit codes: 0 pages were recorded, 1 invalid arguments, 2 fatal error
 * (e.g. the output directory cannot be created), 3 nothing was recorded.
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { URL } from 'url';
import config from '../config';
import logger from '../utils/logger';
import { CrawlResult, OutputMode, RobotsPolicy } from '../services/crawler/interfaces/types';
import { CrawlerServices, CrawlerSettings, ServiceFactory } from '../services/crawler/factories/ServiceFactory';
import { CrawlSetupError } from '../services/crawler/errors';
import { LoggingUtils } from '../services/crawler/utils/LoggingUtils';

export enum ExitCode {
  SUCCESS = 0,
  INVALID_ARGUMENTS = 1,
  FATAL = 2,
  NO_CONTENT = 3
}

export interface CliArgs {
  url: string;
  maxPages?: number;
  outputDir: string;
  userAgent: string;
  mode: OutputMode;
  outputFile: string;
  restrictToBasePath: boolean;
  verbose: boolean;
}

/**
 * Raised for arguments yargs rejects
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse command line arguments
 * @param args Arguments after the script name
 * @throws CliUsageError when the arguments are invalid
 */
export function parseArgs(args: string[]): CliArgs {
  // npm adds '--' when running as 'npm run crawl -- <args>'
  const filteredArgs = args.filter(arg => arg !== '--');

  const argv = yargs(filteredArgs)
    .scriptName('crawl-docs')
    .usage('Usage: $0 <url> [options]')
    .option('max-pages', {
      type: 'number',
      describe: 'Maximum number of pages to crawl (unbounded when omitted)'
    })
    .option('output-dir', {
      type: 'string',
      default: config.crawler.outputDir,
      describe: 'Directory for the crawl output, created if missing'
    })
    .option('user-agent', {
      type: 'string',
      default: config.crawler.userAgent,
      describe: 'User-Agent sent to the server and matched against robots.txt'
    })
    .option('mode', {
      choices: [OutputMode.AGGREGATE, OutputMode.PER_PAGE],
      default: OutputMode.AGGREGATE,
      describe: 'Write one Markdown file for all pages, or one text file per page'
    })
    .option('output-file', {
      type: 'string',
      default: config.crawler.outputFileName,
      describe: 'File name of the aggregate artifact'
    })
    .option('restrict-to-base-path', {
      type: 'boolean',
      default: false,
      describe: 'Only follow links below the start URL\'s directory'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable debug logging'
    })
    .demandCommand(1, 'A start URL is required')
    .check((parsed) => {
      const url = String(parsed._[0]);
      let protocol: string;
      try {
        protocol = new URL(url).protocol;
      } catch (error) {
        throw new Error(`Invalid URL "${url}". Please provide a URL with protocol (e.g., https://docs.example.org/).`);
      }
      if (protocol !== 'http:' && protocol !== 'https:') {
        throw new Error(`Unsupported protocol "${protocol}", use http or https`);
      }

      const maxPages = parsed['max-pages'];
      if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages < 0)) {
        throw new Error('--max-pages must be a non-negative integer');
      }
      return true;
    })
    .strict()
    .fail((message, error) => {
      throw new CliUsageError(message || (error ? error.message : 'Invalid arguments'));
    })
    .version(config.projectVersion)
    .help()
    .alias('help', 'h')
    .parseSync();

  return {
    url: String(argv._[0]),
    maxPages: argv['max-pages'],
    outputDir: argv['output-dir'],
    userAgent: argv['user-agent'],
    mode: argv.mode,
    outputFile: argv['output-file'],
    restrictToBasePath: argv['restrict-to-base-path'],
    verbose: argv.verbose
  };
}

export function toSettings(args: CliArgs): CrawlerSettings {
  return {
    startUrl: args.url,
    userAgent: args.userAgent,
    maxPages: args.maxPages,
    outputDir: args.outputDir,
    outputFileName: args.outputFile,
    mode: args.mode,
    restrictToBasePath: args.restrictToBasePath,
    requestTimeoutMs: config.crawler.requestTimeoutMs,
    maxRedirects: config.crawler.maxRedirects,
    defaultCrawlDelayMs: config.crawler.defaultCrawlDelayMs,
    robotsFetchRetries: config.crawler.robotsFetchRetries
  };
}

function describeRobots(policy: RobotsPolicy): string {
  if (policy.disallowAll) {
    return 'access denied, nothing crawled';
  }
  return policy.loaded ? 'loaded' : 'not available, all URLs allowed';
}

export function formatSummary(result: CrawlResult): string[] {
  const seconds = (result.finishedAt.getTime() - result.startedAt.getTime()) / 1000;

  return [
    'Crawl summary',
    `  Start URL: ${result.startUrl}`,
    `  Library: ${result.libraryName || '(site root)'}`,
    `  Pages visited: ${result.pagesVisited}`,
    `  Pages recorded: ${result.pagesRecorded}`,
    `  Pages failed: ${result.pagesFailed}`,
    `  Page budget reached: ${result.budgetExhausted ? 'yes' : 'no'}`,
    `  robots.txt: ${describeRobots(result.robotsPolicy)}`,
    `  Politeness delay: ${(result.crawlDelayMs / 1000).toFixed(1)}s`,
    `  Output: ${result.outputPath}`,
    `  Duration: ${seconds.toFixed(1)}s`
  ];
}

/**
 * Run one crawl and map its outcome to an exit code
 * @param args Parsed arguments
 * @param overrides Services to use instead of the defaults
 */
export async function run(args: CliArgs, overrides: Partial<CrawlerServices> = {}): Promise<ExitCode> {
  if (args.verbose) {
    logger.level = 'debug';
    logger.debug('Verbose logging enabled');
  }

  logger.debug(`${config.projectName} ${config.projectVersion}`);

  try {
    const crawler = new ServiceFactory(toSettings(args)).createCrawler(overrides);
    const result = await crawler.crawl(args.url);

    for (const line of formatSummary(result)) {
      console.log(line);
    }

    return result.pagesRecorded > 0 ? ExitCode.SUCCESS : ExitCode.NO_CONTENT;
  } catch (error) {
    if (error instanceof CrawlSetupError) {
      logger.error(`Crawl could not start: ${error.message}`);
    } else {
      logger.error(`Crawl aborted: ${LoggingUtils.describeError(error)}`);
    }
    return ExitCode.FATAL;
  }
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(hideBin(process.argv));
  } catch (error) {
    console.error(LoggingUtils.describeError(error));
    console.error('Run with --help for usage.');
    process.exitCode = ExitCode.INVALID_ARGUMENTS;
    return;
  }

  process.exitCode = await run(args);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(`Unexpected failure: ${LoggingUtils.describeError(error)}`);
    process.exitCode = ExitCode.FATAL;
  });
}
