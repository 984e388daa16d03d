import type { ILogger } from '@papercode/logger'
import type { CrawlerConfig } from '../../config/index.js'
import { loggers } from '../../config/logger.js'
import { errorLogContext, exitCodeFor } from '../../errors.js'
import { GithubClient } from '../../report/github.js'
import { runReport } from '../../report/index.js'
import type { Sleep } from '../../pipeline/types.js'

interface ReportCommandArgs {
  csvPath: string
}

export interface ReportCommandDeps {
  config: CrawlerConfig
  client?: GithubClient
  sleep?: Sleep
  logger?: ILogger
}

export async function runReportCommand(args: ReportCommandArgs, deps: ReportCommandDeps): Promise<number> {
  const log = deps.logger ?? loggers.cli

  if (!args.csvPath) {
    log.error('Missing --csv <path>')
    return 2
  }

  const client =
    deps.client ??
    new GithubClient({
      token: deps.config.githubToken,
      userAgent: deps.config.fetch.userAgent,
      timeoutMs: deps.config.fetch.timeoutMs,
      logger: loggers.report,
    })

  try {
    const result = await runReport({
      csvPath: args.csvPath,
      client,
      sleep: deps.sleep,
      logger: loggers.report,
    })
    if (result.rateLimited) {
      log.warn('GitHub rate limit reached; rerun later to fill in the remaining repositories')
    }
    return 0
  } catch (error) {
    log.error('Report failed', { csvPath: args.csvPath, ...errorLogContext(error) }, error)
    return exitCodeFor(error)
  }
}
