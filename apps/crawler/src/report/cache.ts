/**
 * On-disk cache of GitHub statistics, keyed by `owner/repo`.
 * Written beside the table as `github_cache.json`.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { isFileNotFound, writeFileAtomic } from '../utils/fs.js'
import type { GithubRepoInfo } from './github.js'

export const CACHE_FILE_NAME = 'github_cache.json'

const cachedInfoSchema = z.object({
  about: z.string().default(''),
  language: z.string().default(''),
  stars: z.number().default(0),
  forks: z.number().default(0),
  watches: z.number().default(0),
  fetched_at: z.string().default(''),
})

const cacheFileSchema = z.record(cachedInfoSchema)

export type GithubCache = Map<string, GithubRepoInfo>

/**
 * A missing or unreadable cache starts empty; it only saves API calls.
 */
export async function loadGithubCache(path: string, logger: ILogger = silentLogger): Promise<GithubCache> {
  let contents: string
  try {
    contents = await readFile(path, 'utf8')
  } catch (error) {
    if (isFileNotFound(error)) return new Map()
    throw error
  }

  let raw: unknown
  try {
    raw = JSON.parse(contents)
  } catch (error) {
    logger.warn('Ignoring unreadable GitHub cache', { path }, error)
    return new Map()
  }

  const parsed = cacheFileSchema.safeParse(raw)
  if (!parsed.success) {
    logger.warn('Ignoring GitHub cache with unexpected structure', { path })
    return new Map()
  }

  return new Map(
    Object.entries(parsed.data).map(([key, entry]) => [
      key,
      {
        about: entry.about,
        language: entry.language,
        stars: entry.stars,
        forks: entry.forks,
        watches: entry.watches,
        fetchedAt: entry.fetched_at,
      },
    ])
  )
}

export async function saveGithubCache(path: string, cache: GithubCache): Promise<void> {
  const file: Record<string, z.infer<typeof cachedInfoSchema>> = {}
  for (const [key, info] of cache) {
    file[key] = {
      about: info.about,
      language: info.language,
      stars: info.stars,
      forks: info.forks,
      watches: info.watches,
      fetched_at: info.fetchedAt,
    }
  }
  await writeFileAtomic(path, `${JSON.stringify(file, null, 2)}\n`)
}
