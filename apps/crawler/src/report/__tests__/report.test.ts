import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CrawlerError } from '../../errors.js'
import { formatTable } from '../../pipeline/output/table.js'
import type { PaperRecord } from '../../pipeline/types.js'
import { loadGithubCache, saveGithubCache } from '../cache.js'
import { GithubClient, type GithubRepoInfo } from '../github.js'
import { readTableRows, runReport } from '../index.js'
import { README_DIVIDER, README_HEADER } from '../markdown.js'

function record(title: string, codeUrl: string | null, pdfUrl: string | null = null): PaperRecord {
  return { title, pdfUrl, arxivUrl: null, codeUrl, codeMentioned: false, status: 'ok' }
}

const WIDGET_INFO: GithubRepoInfo = {
  about: 'Widgets\nat | scale',
  language: 'TypeScript',
  stars: 42,
  forks: 7,
  watches: 3,
  fetchedAt: '2026-01-15T12:00:00.000Z',
}

describe('readTableRows', () => {
  it('keeps rows with a code URL and unescapes quoted titles', () => {
    const csv = formatTable([
      record('Widgets, "Fast"', 'https://github.com/acme/widget', 'https://x.org/w.pdf'),
      record('No Code', null),
    ])

    expect(readTableRows(csv)).toEqual([
      { title: 'Widgets; "Fast"', pdfUrl: 'https://x.org/w.pdf', codeUrl: 'https://github.com/acme/widget' },
    ])
  })
})

describe('runReport', () => {
  const originalFetch = globalThis.fetch
  let dir: string
  let csvPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'papercode-report-'))
    csvPath = join(dir, 'testconf_papers.csv')
  })

  afterEach(async () => {
    globalThis.fetch = originalFetch
    await rm(dir, { recursive: true, force: true })
  })

  it('writes readme.md with cached and fetched statistics', async () => {
    await writeFile(
      csvPath,
      formatTable([
        record('Cached | Paper', 'https://github.com/acme/widget', 'https://x.org/w.pdf'),
        record('Fetched Paper', 'https://github.com/acme/gadget.git'),
        record('Model Paper', 'https://huggingface.co/acme/model'),
        record('No Code', null),
      ]),
      'utf8'
    )
    const cache = new Map([['acme/widget', WIDGET_INFO]])
    await saveGithubCache(join(dir, 'github_cache.json'), cache)

    const fetchSpy = vi.fn(async () =>
      Response.json({ description: 'Gadgets', language: 'Rust', stargazers_count: 5, forks_count: 1, subscribers_count: 2 })
    )
    globalThis.fetch = fetchSpy
    const sleep = vi.fn(async (_ms: number) => undefined)

    const result = await runReport({
      csvPath,
      client: new GithubClient({ now: () => new Date('2026-02-01T00:00:00.000Z') }),
      sleep,
    })

    expect(result).toMatchObject({ rows: 3, cacheHits: 1, apiCalls: 1, rateLimited: false })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(2000)

    const readme = await readFile(join(dir, 'readme.md'), 'utf8')
    expect(readme.split('\n')).toEqual([
      README_HEADER,
      README_DIVIDER,
      '| Cached \\| Paper | [code](https://github.com/acme/widget) | Widgets at \\| scale | TypeScript | 42 | 7 | 3 | [pdf](https://x.org/w.pdf) | |',
      '| Fetched Paper | [code](https://github.com/acme/gadget.git) | Gadgets | Rust | 5 | 1 | 2 |  | |',
      '| Model Paper | [code](https://huggingface.co/acme/model) |  |  |  |  |  |  | |',
      '',
    ])

    const saved = await loadGithubCache(join(dir, 'github_cache.json'))
    expect(saved.get('acme/gadget')).toEqual({
      about: 'Gadgets',
      language: 'Rust',
      stars: 5,
      forks: 1,
      watches: 2,
      fetchedAt: '2026-02-01T00:00:00.000Z',
    })
    expect(saved.get('acme/widget')).toEqual(WIDGET_INFO)
  })

  it('stops calling the API after a 403', async () => {
    await writeFile(
      csvPath,
      formatTable([
        record('One', 'https://github.com/acme/one'),
        record('Two', 'https://github.com/acme/two'),
      ]),
      'utf8'
    )
    const fetchSpy = vi.fn(async () => new Response('limit', { status: 403 }))
    globalThis.fetch = fetchSpy

    const result = await runReport({ csvPath, client: new GithubClient(), sleep: async () => undefined })

    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(result.rateLimited).toBe(true)
    expect(result.apiCalls).toBe(0)
  })

  it('rejects a missing table', async () => {
    await expect(
      runReport({ csvPath: join(dir, 'missing.csv'), client: new GithubClient() })
    ).rejects.toBeInstanceOf(CrawlerError)
  })

  it('starts from an empty cache when the cache file is corrupt', async () => {
    await writeFile(join(dir, 'github_cache.json'), '{ not json', 'utf8')
    expect((await loadGithubCache(join(dir, 'github_cache.json'))).size).toBe(0)
  })
})
