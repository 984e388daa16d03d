/**
 * arXiv lookup
 *
 * Two ways in: a known abstract URL (scan the abstract page for a repository
 * link), or a bare title (search the export API, then trust the hit only when
 * the titles agree on their first 30 characters).
 */

import { XMLParser } from 'fast-xml-parser'
import { z } from 'zod'
import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { extractRepoUrl } from '../pipeline/classify/repository-url.js'
import type { ArxivLookup, ArxivSearchResult, Fetcher, Sleep } from '../pipeline/types.js'
import { fetchedText, sleep as defaultSleep } from '../pipeline/types.js'
import { collapseWhitespace, loadHtml } from '../sources/kit/html.js'

export const ARXIV_ABS_BASE = 'https://arxiv.org/abs/'
export const ARXIV_QUERY_URL = 'https://export.arxiv.org/api/query'

/** Characters of each title compared when accepting a search hit */
export const TITLE_MATCH_PREFIX = 30

/** Pause before each export API query */
export const DEFAULT_SEARCH_DELAY_MS = 1000

const entrySchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string().optional(),
})

const feedSchema = z.object({
  feed: z.object({
    entry: z.array(entrySchema).optional(),
  }),
})

export interface ArxivClientOptions {
  fetcher: Fetcher
  logger?: ILogger
  sleep?: Sleep
  searchDelayMs?: number
}

/**
 * `https://arxiv.org/abs/2401.00001v3` → `2401.00001`
 */
export function arxivIdFromUrl(arxivUrl: string): string {
  const lastSegment = arxivUrl.replace(/[/?#]+$/, '').split(/[?#]/)[0].split('/').pop() ?? ''
  return lastSegment.replace(/v\d+$/, '')
}

export function titlesAgree(queryTitle: string, foundTitle: string): boolean {
  const query = queryTitle.trim().toLowerCase()
  const found = foundTitle.trim().toLowerCase()
  return found.includes(query.slice(0, TITLE_MATCH_PREFIX)) || query.includes(found.slice(0, TITLE_MATCH_PREFIX))
}

export function buildSearchUrl(title: string): string {
  return `${ARXIV_QUERY_URL}?search_query=${encodeURIComponent(`ti:"${title}"`)}&max_results=1`
}

/**
 * Abstract text from an arXiv abstract page, without the "Abstract:" label.
 */
export function extractAbstract(html: string): string | null {
  const $ = loadHtml(html)
  const block = $('blockquote.abstract').first()
  if (block.length === 0) return null

  block.find('span.descriptor').remove()
  const text = collapseWhitespace(block.text()).replace(/^Abstract:\s*/i, '')
  return text || null
}

/**
 * First entry of an export API Atom feed, or null for an empty or
 * unrecognised feed.
 */
export function parseSearchFeed(xml: string): { id: string; title: string; summary: string | null } | null {
  const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    isArray: name => name === 'entry',
  })

  const parsed = feedSchema.safeParse(parser.parse(xml))
  if (!parsed.success) return null

  const entry = parsed.data.feed.entry?.[0]
  if (!entry || !/^https?:\/\/arxiv\.org\/abs\//.test(entry.id.trim())) return null

  return {
    id: entry.id.trim(),
    title: collapseWhitespace(entry.title),
    summary: entry.summary ? collapseWhitespace(entry.summary) || null : null,
  }
}

export class ArxivClient implements ArxivLookup {
  private readonly fetcher: Fetcher
  private readonly logger: ILogger
  private readonly sleep: Sleep
  private readonly searchDelayMs: number

  constructor(options: ArxivClientOptions) {
    this.fetcher = options.fetcher
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? defaultSleep
    this.searchDelayMs = options.searchDelayMs ?? DEFAULT_SEARCH_DELAY_MS
  }

  async findCodeOnAbstractPage(arxivUrl: string): Promise<string | null> {
    const id = arxivIdFromUrl(arxivUrl)
    if (!id) return null

    const html = fetchedText(await this.fetcher.fetch(`${ARXIV_ABS_BASE}${id}`))
    if (html === null) {
      this.logger.debug('arXiv abstract page unavailable', { arxivUrl })
      return null
    }
    return extractRepoUrl(html)
  }

  async fetchAbstractPage(
    arxivUrl: string
  ): Promise<{ abstract: string | null; codeUrl: string | null } | null> {
    const html = fetchedText(await this.fetcher.fetch(arxivUrl))
    if (html === null) {
      this.logger.debug('arXiv abstract page unavailable', { arxivUrl })
      return null
    }
    return { abstract: extractAbstract(html), codeUrl: extractRepoUrl(html) }
  }

  async searchByTitle(title: string): Promise<ArxivSearchResult> {
    await this.sleep(this.searchDelayMs)

    const url = buildSearchUrl(title)
    const xml = fetchedText(await this.fetcher.fetch(url))
    if (xml === null) {
      this.logger.warn('arXiv search failed', { title })
      return { status: 'fetch_failed', url }
    }

    const entry = parseSearchFeed(xml)
    if (!entry) return { status: 'not_found' }

    if (!titlesAgree(title, entry.title)) {
      this.logger.debug('arXiv search hit rejected', { title, found: entry.title })
      return { status: 'not_found' }
    }

    return { status: 'found', arxivUrl: entry.id, abstract: entry.summary }
  }
}
