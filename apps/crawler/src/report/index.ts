/**
 * Report: papers with code, with GitHub statistics, as a Markdown table.
 *
 * Flow:
 * 1. Read the output table, keep rows with a code URL
 * 2. Look up GitHub repos not in the cache, until the rate limit is hit
 * 3. Save the cache (every 10 API calls and at the end)
 * 4. Write readme.md beside the table
 */

import { readFile, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { parse as parseCSV } from 'csv-parse/sync'
import { z } from 'zod'
import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { CrawlerError, ERROR_CODES, errorMessage } from '../errors.js'
import type { Sleep } from '../pipeline/types.js'
import { sleep as defaultSleep } from '../pipeline/types.js'
import { CACHE_FILE_NAME, loadGithubCache, saveGithubCache } from './cache.js'
import { GithubClient, parseGithubUrl, repoKey, type GithubRepoInfo } from './github.js'
import { README_FILE_NAME, renderReadme, type ReportRow } from './markdown.js'

export const DEFAULT_API_DELAY_MS = 2000
export const DEFAULT_CACHE_SAVE_EVERY = 10

const tableRowSchema = z.object({
  title: z.string().default(''),
  pdf_url: z.string().default(''),
  code_url: z.string().default(''),
})

export interface ReportOptions {
  csvPath: string
  client: GithubClient
  logger?: ILogger
  sleep?: Sleep
  apiDelayMs?: number
  cacheSaveEvery?: number
}

export interface ReportResult {
  outputPath: string
  cachePath: string
  rows: number
  cacheHits: number
  apiCalls: number
  rateLimited: boolean
}

/**
 * Rows of an output table that carry a code URL.
 */
export function readTableRows(contents: string): ReportRow[] {
  let records: unknown
  try {
    records = parseCSV(contents, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  } catch (error) {
    throw new CrawlerError(ERROR_CODES.INVALID_INPUT, `Unreadable paper table: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const parsed = z.array(tableRowSchema).safeParse(records)
  if (!parsed.success) {
    throw new CrawlerError(ERROR_CODES.INVALID_INPUT, 'Paper table has unexpected columns')
  }

  return parsed.data
    .map(row => ({ title: row.title, pdfUrl: row.pdf_url.trim(), codeUrl: row.code_url.trim() }))
    .filter(row => row.codeUrl)
}

export async function runReport(options: ReportOptions): Promise<ReportResult> {
  const logger = options.logger ?? silentLogger
  const sleep = options.sleep ?? defaultSleep
  const apiDelayMs = options.apiDelayMs ?? DEFAULT_API_DELAY_MS
  const cacheSaveEvery = Math.max(1, options.cacheSaveEvery ?? DEFAULT_CACHE_SAVE_EVERY)
  const { client } = options

  const dir = dirname(options.csvPath)
  const cachePath = join(dir, CACHE_FILE_NAME)
  const outputPath = join(dir, README_FILE_NAME)

  let contents: string
  try {
    contents = await readFile(options.csvPath, 'utf8')
  } catch (error) {
    throw new CrawlerError(ERROR_CODES.INVALID_INPUT, `Cannot read ${options.csvPath}: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const rows = readTableRows(contents)
  logger.info(`Found ${rows.length} papers with code URLs`)
  logger.info(
    client.authenticated
      ? 'Using GitHub token (rate limit: 5000/hour)'
      : 'No GitHub token (rate limit: 60/hour). Set GITHUB_TOKEN to increase.'
  )

  const cache = await loadGithubCache(cachePath, logger)
  const infoByUrl = new Map<string, GithubRepoInfo>()
  let cacheHits = 0
  let apiCalls = 0
  let rateLimited = false

  for (const [index, row] of rows.entries()) {
    const ref = parseGithubUrl(row.codeUrl)
    if (!ref) continue

    const key = repoKey(ref)
    const cached = cache.get(key)
    if (cached) {
      infoByUrl.set(row.codeUrl, cached)
      cacheHits++
      continue
    }
    if (rateLimited) continue

    logger.info(`[${index + 1}/${rows.length}] Fetching ${key}...`)
    const result = await client.fetchRepo(ref)

    if (result.status === 'rate_limited') {
      rateLimited = true
      logger.warn('Stopping API calls due to rate limit. Will use cached data.')
      continue
    }
    if (result.status !== 'ok') continue

    cache.set(key, result.info)
    infoByUrl.set(row.codeUrl, result.info)
    apiCalls++
    if (apiCalls % cacheSaveEvery === 0) {
      await saveGithubCache(cachePath, cache)
    }
    await sleep(apiDelayMs)
  }

  await saveGithubCache(cachePath, cache)
  logger.info(`Cache hits: ${cacheHits}, API calls: ${apiCalls}`)

  await writeFile(outputPath, renderReadme(rows, infoByUrl), 'utf8')
  logger.info(`Generated ${outputPath} with ${rows.length} papers`)

  return { outputPath, cachePath, rows: rows.length, cacheHits, apiCalls, rateLimited }
}
