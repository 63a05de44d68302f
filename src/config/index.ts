import * as dotenv from 'dotenv';
import logger from '../utils/logger';

const result = dotenv.config();
if (result.error) {
  // A missing .env file is the normal case for the CLI
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

/**
 * Read a numeric environment variable, falling back when unset or not a number
 */
function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    logger.warn(`Ignoring non-numeric ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

const config = {
  projectName: process.env.PROJECT_NAME || 'DocCrawler',
  projectVersion: process.env.PROJECT_VERSION || '1.0.0',
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  crawler: {
    userAgent: process.env.CRAWLER_USER_AGENT || 'DocCrawler/1.0',
    outputDir: process.env.CRAWLER_OUTPUT_DIR || 'output',
    outputFileName: process.env.CRAWLER_OUTPUT_FILE || 'crawled_content.md',
    requestTimeoutMs: numberFromEnv('CRAWLER_REQUEST_TIMEOUT_MS', 30000),
    maxRedirects: numberFromEnv('CRAWLER_MAX_REDIRECTS', 5),
    defaultCrawlDelayMs: numberFromEnv('CRAWLER_DEFAULT_DELAY_MS', 1000),
    robotsFetchRetries: numberFromEnv('CRAWLER_ROBOTS_RETRIES', 2),
  },
};

// The logger is built before .env is read
logger.level = config.logging.level;

export type AppConfig = typeof config;

export default config;
