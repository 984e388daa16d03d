import { describe, expect, it, vi } from 'vitest'
import { MapFetcher } from '../../pipeline/__tests__/helpers.js'
import {
  ArxivClient,
  arxivIdFromUrl,
  buildSearchUrl,
  extractAbstract,
  parseSearchFeed,
  titlesAgree,
} from '../client.js'

const ABSTRACT_PAGE = `
<html><body>
  <h1 class="title mathjax"><span class="descriptor">Title:</span>Widgets at Scale</h1>
  <blockquote class="abstract mathjax">
    <span class="descriptor">Abstract:</span>
    We scale widgets.
    Code is at <a href="https://github.com/acme/widget">https://github.com/acme/widget</a>.
  </blockquote>
  <a href="https://github.com/features/copilot">ad</a>
</body></html>
`

function feed(entry: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <id>http://arxiv.org/api/query-id</id>
  <title type="html">ArXiv Query</title>
  ${entry}
</feed>`
}

const WIDGET_ENTRY = `
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <title>Widgets at Scale: Learning
      Widgets Everywhere</title>
    <summary>  We scale widgets.
      Our code will be released.  </summary>
    <author><name>A. Author</name></author>
  </entry>`

describe('arxivIdFromUrl', () => {
  it('drops the version suffix', () => {
    expect(arxivIdFromUrl('https://arxiv.org/abs/2401.00001v3')).toBe('2401.00001')
    expect(arxivIdFromUrl('http://arxiv.org/abs/2401.00001')).toBe('2401.00001')
    expect(arxivIdFromUrl('https://arxiv.org/abs/2401.00001/')).toBe('2401.00001')
  })
})

describe('titlesAgree', () => {
  it('compares 30-character prefixes in either direction', () => {
    expect(titlesAgree('Widgets at Scale', 'Widgets at Scale: Learning Widgets Everywhere')).toBe(true)
    expect(titlesAgree('WIDGETS AT SCALE: LEARNING WIDGETS EVERYWHERE AND MORE', 'widgets at scale: learning widgets')).toBe(true)
    expect(titlesAgree('Gadgets in Practice', 'Widgets at Scale')).toBe(false)
  })
})

describe('buildSearchUrl', () => {
  it('encodes the quoted title query', () => {
    expect(buildSearchUrl('Widgets & Gadgets')).toBe(
      'https://export.arxiv.org/api/query?search_query=ti%3A%22Widgets%20%26%20Gadgets%22&max_results=1'
    )
  })
})

describe('extractAbstract', () => {
  it('returns the abstract without its label', () => {
    expect(extractAbstract(ABSTRACT_PAGE)).toBe(
      'We scale widgets. Code is at https://github.com/acme/widget.'
    )
  })

  it('returns null without an abstract block', () => {
    expect(extractAbstract('<p>nothing</p>')).toBeNull()
  })
})

describe('parseSearchFeed', () => {
  it('reads the first entry', () => {
    expect(parseSearchFeed(feed(WIDGET_ENTRY))).toEqual({
      id: 'http://arxiv.org/abs/2401.00001v1',
      title: 'Widgets at Scale: Learning Widgets Everywhere',
      summary: 'We scale widgets. Our code will be released.',
    })
  })

  it('returns null for a feed without entries', () => {
    expect(parseSearchFeed(feed(''))).toBeNull()
  })

  it('returns null for an error entry', () => {
    const errorEntry = '<entry><id>http://arxiv.org/api/errors#bad_query</id><title>Error</title></entry>'
    expect(parseSearchFeed(feed(errorEntry))).toBeNull()
  })
})

describe('ArxivClient', () => {
  it('scans the versionless abstract page for a repository', async () => {
    const fetcher = new MapFetcher({ 'https://arxiv.org/abs/2401.00001': ABSTRACT_PAGE })
    const client = new ArxivClient({ fetcher })

    await expect(client.findCodeOnAbstractPage('https://arxiv.org/abs/2401.00001v2')).resolves.toBe(
      'https://github.com/acme/widget'
    )
    expect(fetcher.requested).toEqual(['https://arxiv.org/abs/2401.00001'])
  })

  it('returns null when the abstract page cannot be fetched', async () => {
    const client = new ArxivClient({ fetcher: new MapFetcher({}) })
    await expect(client.findCodeOnAbstractPage('https://arxiv.org/abs/2401.00009')).resolves.toBeNull()
    await expect(client.fetchAbstractPage('https://arxiv.org/abs/2401.00009')).resolves.toBeNull()
  })

  it('fetches the abstract and code link from an abstract page', async () => {
    const client = new ArxivClient({
      fetcher: new MapFetcher({ 'http://arxiv.org/abs/2401.00001v1': ABSTRACT_PAGE }),
    })

    await expect(client.fetchAbstractPage('http://arxiv.org/abs/2401.00001v1')).resolves.toEqual({
      abstract: 'We scale widgets. Code is at https://github.com/acme/widget.',
      codeUrl: 'https://github.com/acme/widget',
    })
  })

  it('accepts a search hit whose title agrees', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined)
    const client = new ArxivClient({
      fetcher: new MapFetcher({ [buildSearchUrl('Widgets at Scale')]: feed(WIDGET_ENTRY) }),
      sleep,
    })

    await expect(client.searchByTitle('Widgets at Scale')).resolves.toEqual({
      status: 'found',
      arxivUrl: 'http://arxiv.org/abs/2401.00001v1',
      abstract: 'We scale widgets. Our code will be released.',
    })
    expect(sleep).toHaveBeenCalledWith(1000)
  })

  it('rejects a search hit for a different paper', async () => {
    const client = new ArxivClient({
      fetcher: new MapFetcher({ [buildSearchUrl('Gadgets in Practice')]: feed(WIDGET_ENTRY) }),
      sleep: async () => undefined,
    })

    await expect(client.searchByTitle('Gadgets in Practice')).resolves.toEqual({ status: 'not_found' })
  })

  it('reports a search that cannot be fetched', async () => {
    const client = new ArxivClient({ fetcher: new MapFetcher({}), sleep: async () => undefined })

    await expect(client.searchByTitle('Widgets at Scale')).resolves.toEqual({
      status: 'fetch_failed',
      url: buildSearchUrl('Widgets at Scale'),
    })
  })
})
