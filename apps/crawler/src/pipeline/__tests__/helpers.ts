import { vi } from 'vitest'
import { silentLogger } from '@papercode/logger'
import { extractRepoUrl } from '../classify/repository-url.js'
import { mentionsCode } from '../classify/code-mention.js'
import { revalidateCheckpoint } from '../checkpoint/store.js'
import { formatTable } from '../output/table.js'
import type {
  ArxivLookup,
  CheckpointState,
  CheckpointStore,
  DetailResult,
  Fetcher,
  FetchResult,
  OutputTableWriter,
  PaperRecord,
  PaperSource,
  PaperStub,
  SourceContext,
} from '../types.js'
import { fetchedText } from '../types.js'

export class MemoryCheckpointStore implements CheckpointStore {
  saves: CheckpointState[] = []

  constructor(private stored: CheckpointState | null = null) {}

  async load(): Promise<CheckpointState> {
    return this.stored
      ? { processed: this.stored.processed.map(r => ({ ...r })), cursor: this.stored.cursor }
      : { processed: [], cursor: 0 }
  }

  async save(state: CheckpointState): Promise<void> {
    const copy = { processed: state.processed.map(r => ({ ...r })), cursor: state.cursor }
    this.stored = copy
    this.saves.push(copy)
  }

  revalidate(state: CheckpointState): CheckpointState {
    return revalidateCheckpoint(state)
  }

  current(): CheckpointState | null {
    return this.stored
  }
}

export class MemoryTableWriter implements OutputTableWriter {
  contents = ''
  writes = 0

  async write(records: readonly PaperRecord[]): Promise<void> {
    this.contents = formatTable(records)
    this.writes++
  }
}

/**
 * Serves page bodies from a map; unknown URLs fail like an exhausted fetch.
 */
export class MapFetcher implements Fetcher {
  readonly requested: string[] = []

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<FetchResult> {
    this.requested.push(url)
    const html = this.pages[url]
    if (html === undefined) {
      return { status: 'error', error: 'HTTP 404: Not Found', statusCode: 404, attempts: 3, durationMs: 0 }
    }
    return { status: 'ok', statusCode: 200, html, attempts: 1, durationMs: 0 }
  }
}

export const nullArxiv: ArxivLookup = {
  findCodeOnAbstractPage: async () => null,
  fetchAbstractPage: async () => null,
  searchByTitle: async () => ({ status: 'not_found' }),
}

export function createContext(fetcher: Fetcher, overrides: Partial<SourceContext> = {}): SourceContext {
  return {
    fetcher,
    arxiv: nullArxiv,
    logger: silentLogger,
    sleep: vi.fn(async (_ms: number) => undefined),
    ...overrides,
  }
}

/**
 * Source whose detail pages are plain text; classification runs over the
 * whole page.
 */
export class PageTextSource implements PaperSource {
  readonly manifest = {
    id: 'testconf',
    name: 'Test Conference',
    baseUrls: ['https://papers.example.org'],
    requestDelayMs: 0,
  }

  extractCalls = 0

  constructor(private readonly stubs: PaperStub[] | (() => Promise<PaperStub[]>)) {}

  async listPapers(): Promise<PaperStub[]> {
    return typeof this.stubs === 'function' ? this.stubs() : this.stubs
  }

  async extractDetail(stub: PaperStub, ctx: SourceContext): Promise<DetailResult> {
    this.extractCalls++
    const text = fetchedText(await ctx.fetcher.fetch(stub.sourceRef))
    if (text === null) {
      return { ok: false, reason: 'fetch_failed', details: stub.sourceRef }
    }
    return {
      ok: true,
      detail: {
        pdfUrl: `${stub.sourceRef}.pdf`,
        arxivUrl: null,
        codeUrl: extractRepoUrl(text),
        codeMentioned: mentionsCode(text),
      },
    }
  }
}

export function stubsFor(count: number): PaperStub[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Paper ${i + 1}`,
    sourceRef: `https://papers.example.org/p${i + 1}`,
  }))
}

/**
 * Pages for `stubsFor`: every third paper links a repository, every
 * fourth only mentions code.
 */
export function pagesFor(count: number): Record<string, string> {
  const pages: Record<string, string> = {}
  for (let i = 1; i <= count; i++) {
    let body = `Abstract of paper ${i}.`
    if (i % 3 === 0) {
      body += ` Code: https://github.com/lab${i}/project${i}.`
    } else if (i % 4 === 0) {
      body += ' Our code will be released.'
    }
    pages[`https://papers.example.org/p${i}`] = body
  }
  return pages
}
