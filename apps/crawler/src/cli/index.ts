import '../env.js'
import { loadConfig } from '../config/index.js'
import { applyLoggingConfig, loggers } from '../config/logger.js'
import { errorLogContext, exitCodeFor } from '../errors.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runReportCommand } from './commands/report.js'
import { runSourcesCommand } from './commands/sources.js'
import { asNumber, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Paper code crawler')
  console.log('')
  console.log('Commands:')
  console.log('  crawl --source <id> [--output-dir <dir>] [--limit <n>]')
  console.log('  sources')
  console.log('  report --csv <path>')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  const config = loadConfig()
  applyLoggingConfig(config)

  let exitCode = 2

  switch (command) {
    case 'crawl': {
      const controller = new AbortController()
      process.once('SIGINT', () => {
        loggers.cli.warn('Interrupted; stopping after the current paper')
        controller.abort()
      })

      const limit = flags.limit === undefined ? undefined : (asNumber(flags.limit) ?? 0)
      exitCode = await runCrawlCommand(
        {
          sourceId: asString(flags.source),
          outputDir: asString(flags['output-dir']) || undefined,
          limit,
        },
        { config, signal: controller.signal }
      )
      break
    }
    case 'sources':
      exitCode = await runSourcesCommand()
      break
    case 'report':
      exitCode = await runReportCommand({ csvPath: asString(flags.csv) }, { config })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch(error => {
  loggers.cli.fatal('Command failed', errorLogContext(error), error)
  process.exit(exitCodeFor(error))
})
