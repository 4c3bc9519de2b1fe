import * as path from 'path';
import { promises as fs } from 'fs';
import pc from 'picocolors';
import { AnalystService } from '../../analyst.js';
import { DiskCache } from '../../cache/disk-cache.js';
import { loadConfig } from '../../config.js';
import type { AppConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { MetricsCollector } from '../../orchestrator/metrics.js';
import { FeedbackOrchestrator } from '../../orchestrator/orchestrator.js';
import { createProviderClients } from '../../providers/registry.js';
import { SandboxExecutor } from '../../sandbox/executor.js';
import type { UploadedFile } from '../../types.js';
import { createLogger } from '../utils/logger.js';

export interface AnalyzeOptions {
  files: string[];          // already checked to exist by the CLI
  providers?: string;       // comma-separated override of PROVIDER_ORDER
  maxIterations?: number;   // validated 1-50
  budgetSeconds?: number;   // validated 10-3600
}

async function readUploads(files: readonly string[]): Promise<UploadedFile[]> {
  return Promise.all(
    files.map(async file => ({
      filename: path.basename(file),
      content: await fs.readFile(file),
    }))
  );
}

/**
 * Run one analysis from local files and print the result body on stdout.
 *
 * @returns Exit code (0=success, 1=no answer, 2=invalid input, 130=SIGINT, 143=SIGTERM)
 */
export async function runAnalysis(options: AnalyzeOptions): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(
      options.providers ? { ...process.env, PROVIDER_ORDER: options.providers } : process.env
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(pc.red(`Error: ${error.message}`));
      return 2;
    }
    throw error;
  }

  const logger = createLogger(config.logLevel);
  const runLogger = logger.child({ files: options.files.map(file => path.basename(file)) });

  const metrics = new MetricsCollector();
  const sandbox = new SandboxExecutor(config.sandbox, logger);
  const orchestrator = new FeedbackOrchestrator({
    providers: createProviderClients(config.providers, {
      breaker: config.breaker,
      cache: new DiskCache(config.cache.dir, { logger }),
      cacheTtlMs: config.cache.ttlMs,
      logger,
    }),
    sandbox,
    maxIterations: options.maxIterations ?? config.orchestrator.maxIterations,
    globalBudgetMs:
      options.budgetSeconds !== undefined ? options.budgetSeconds * 1000 : config.orchestrator.globalBudgetMs,
    keepSessionOpen: config.orchestrator.keepSessionOpen,
    logger,
    metrics,
  });
  const service = new AnalystService(orchestrator, {
    maxFileSizeBytes: config.maxFileSizeBytes,
    logger,
  });

  // process.exit() alone skips async cleanup: tear down every container first
  const shutdown = (signal: string, exitCode: number) => async () => {
    runLogger.info(`Received ${signal}, cleaning up...`);
    await orchestrator.stop();
    await sandbox.closeAll();
    process.exit(exitCode);
  };
  process.once('SIGINT', shutdown('SIGINT', 130));
  process.once('SIGTERM', shutdown('SIGTERM', 143));

  try {
    const uploads = await readUploads(options.files);
    const response = await service.handleRequest(uploads);

    process.stdout.write(`${JSON.stringify(response.body, null, 2)}\n`);
    runLogger.info(
      { statusCode: response.statusCode, success: response.body.success, metrics: metrics.getMetrics() },
      'Analysis completed'
    );

    if (response.statusCode === 400) {
      console.error(pc.red(`Error: ${response.body.error}`));
      return 2;
    }
    return response.statusCode === 200 && response.body.success ? 0 : 1;
  } catch (error) {
    runLogger.error({ err: error }, 'Analysis failed');
    return 1;
  } finally {
    await sandbox.closeAll();
  }
}
