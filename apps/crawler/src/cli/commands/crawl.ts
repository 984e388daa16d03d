import { join, resolve } from 'node:path'
import type { ILogger } from '@papercode/logger'
import { ArxivClient } from '../../arxiv/client.js'
import type { CrawlerConfig } from '../../config/index.js'
import { loggers } from '../../config/logger.js'
import { errorLogContext, exitCodeFor } from '../../errors.js'
import { FileCheckpointStore } from '../../pipeline/checkpoint/store.js'
import { HttpFetcher } from '../../pipeline/fetch/http-fetcher.js'
import { runPipeline } from '../../pipeline/orchestrator.js'
import { CsvTableWriter } from '../../pipeline/output/table.js'
import type { Fetcher, Sleep } from '../../pipeline/types.js'
import { sleep as defaultSleep } from '../../pipeline/types.js'
import { createSourceRegistry, type SourceRegistry } from '../../sources/registry.js'

export const EXIT_INTERRUPTED = 130

interface CrawlCommandArgs {
  sourceId: string
  outputDir?: string
  limit?: number
}

export interface CrawlCommandDeps {
  config: CrawlerConfig
  registry?: SourceRegistry
  fetcher?: Fetcher
  sleep?: Sleep
  signal?: AbortSignal
  logger?: ILogger
}

const SOURCE_ID_PATTERN = /^[a-z0-9_-]+$/

export function outputPaths(outputDir: string, sourceId: string): { checkpointPath: string; tablePath: string } {
  const dir = resolve(outputDir)
  return {
    checkpointPath: join(dir, `${sourceId}_progress.json`),
    tablePath: join(dir, `${sourceId}_papers.csv`),
  }
}

export async function runCrawlCommand(args: CrawlCommandArgs, deps: CrawlCommandDeps): Promise<number> {
  const log = deps.logger ?? loggers.cli

  if (!args.sourceId) {
    log.error('Missing --source <id>')
    return 2
  }
  if (!SOURCE_ID_PATTERN.test(args.sourceId)) {
    log.error(`source id must match ${SOURCE_ID_PATTERN}`)
    return 2
  }
  if (args.limit !== undefined && args.limit <= 0) {
    log.error('--limit must be a positive integer')
    return 2
  }

  const { config } = deps
  const sleep = deps.sleep ?? defaultSleep

  try {
    const registry = deps.registry ?? createSourceRegistry()
    const source = registry.get(args.sourceId)
    const { checkpointPath, tablePath } = outputPaths(args.outputDir ?? config.outputDir, source.manifest.id)

    const fetcher =
      deps.fetcher ??
      new HttpFetcher({
        retryPolicy: {
          maxAttempts: config.fetch.maxAttempts,
          initialDelayMs: config.fetch.retryDelayMs,
          maxDelayMs: config.fetch.retryDelayMs,
          backoffMultiplier: 1,
        },
        fetchOptions: { timeoutMs: config.fetch.timeoutMs },
        userAgent: config.fetch.userAgent,
        logger: loggers.fetch,
        sleep,
      })

    const result = await runPipeline({
      source,
      context: {
        fetcher,
        arxiv: new ArxivClient({ fetcher, logger: loggers.arxiv, sleep }),
        logger: loggers.sources.child({ sourceId: source.manifest.id }),
        sleep,
      },
      store: new FileCheckpointStore(checkpointPath, { logger: loggers.checkpoint }),
      table: new CsvTableWriter(tablePath, { logger: loggers.pipeline }),
      recordDelayMs: config.recordDelayMs,
      checkpointEvery: config.checkpointEvery,
      limit: args.limit,
      signal: deps.signal,
      logger: loggers.pipeline,
    })

    log.info(`Output: ${tablePath}`)
    return result.interrupted ? EXIT_INTERRUPTED : 0
  } catch (error) {
    log.error('Crawl failed', { sourceId: args.sourceId, ...errorLogContext(error) }, error)
    return exitCodeFor(error)
  }
}
