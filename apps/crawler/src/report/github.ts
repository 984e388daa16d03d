/**
 * GitHub repository statistics.
 *
 * Calls are made once per repository and never retried: a 403 means the
 * rate limit is spent and the caller should stop asking.
 */

import { z } from 'zod'
import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { errorMessage } from '../errors.js'
import { DEFAULT_FETCH_OPTIONS, DEFAULT_USER_AGENT } from '../pipeline/types.js'

export const GITHUB_API_URL = 'https://api.github.com'

export interface GithubRepoRef {
  owner: string
  repo: string
}

export interface GithubRepoInfo {
  about: string
  language: string
  stars: number
  forks: number
  watches: number
  fetchedAt: string
}

export type GithubLookupResult =
  | { status: 'ok'; info: GithubRepoInfo }
  | { status: 'rate_limited'; resetAt?: Date }
  | { status: 'not_found' }
  | { status: 'error'; error: string }

const repoResponseSchema = z.object({
  description: z.string().nullish(),
  language: z.string().nullish(),
  stargazers_count: z.number().default(0),
  forks_count: z.number().default(0),
  subscribers_count: z.number().default(0),
})

/**
 * `https://github.com/owner/repo[.git][/...]` → `{ owner, repo }`
 */
export function parseGithubUrl(url: string): GithubRepoRef | null {
  const match = /^https?:\/\/github\.com\/([^/]+)\/([^/]+?)(?:\.git)?(?:\/.*)?$/.exec(url.trim())
  if (!match) return null
  return { owner: match[1], repo: match[2] }
}

export function repoKey(ref: GithubRepoRef): string {
  return `${ref.owner}/${ref.repo}`
}

export interface GithubClientOptions {
  token?: string
  userAgent?: string
  timeoutMs?: number
  logger?: ILogger
  now?: () => Date
}

export class GithubClient {
  private readonly token?: string
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly logger: ILogger
  private readonly now: () => Date

  constructor(options: GithubClientOptions = {}) {
    this.token = options.token
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? (() => new Date())
  }

  get authenticated(): boolean {
    return Boolean(this.token)
  }

  async fetchRepo(ref: GithubRepoRef): Promise<GithubLookupResult> {
    const url = `${GITHUB_API_URL}/repos/${repoKey(ref)}`
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/vnd.github.v3+json',
    }
    if (this.token) {
      headers.Authorization = `token ${this.token}`
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(url, { headers, signal: controller.signal })

      if (response.status === 403) {
        await response.body?.cancel()
        const reset = Number.parseInt(response.headers.get('x-ratelimit-reset') ?? '', 10)
        const resetAt = Number.isFinite(reset) ? new Date(reset * 1000) : undefined
        this.logger.warn('GitHub rate limit exceeded', { repo: repoKey(ref), resetAt: resetAt?.toISOString() })
        return { status: 'rate_limited', resetAt }
      }

      if (response.status === 404) {
        await response.body?.cancel()
        this.logger.info(`Repo not found: ${repoKey(ref)}`)
        return { status: 'not_found' }
      }

      if (!response.ok) {
        await response.body?.cancel()
        this.logger.warn(`HTTP error ${response.status} for ${repoKey(ref)}`)
        return { status: 'error', error: `HTTP ${response.status}: ${response.statusText}` }
      }

      const parsed = repoResponseSchema.safeParse(await response.json())
      if (!parsed.success) {
        return { status: 'error', error: `Unexpected response for ${repoKey(ref)}` }
      }

      const data = parsed.data
      return {
        status: 'ok',
        info: {
          about: data.description ?? '',
          language: data.language ?? '',
          stars: data.stargazers_count,
          forks: data.forks_count,
          watches: data.subscribers_count,
          fetchedAt: this.now().toISOString(),
        },
      }
    } catch (error) {
      this.logger.warn(`Error fetching ${repoKey(ref)}`, {}, error)
      return { status: 'error', error: errorMessage(error) }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
