/**
 * Pipeline Core Types
 *
 * Paper stubs and records, the fetch contract, the checkpoint state and the
 * PaperSource interface every venue implements.
 */

import type { ILogger } from '@papercode/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Paper Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Values a listing page already exposes for a paper.
 * The detail extractor decides whether to trust them.
 */
export interface PaperStubHints {
  pdfUrl?: string
  arxivUrl?: string
  codeUrl?: string
}

/**
 * Minimal identifying reference to a paper, as discovered from a listing.
 */
export interface PaperStub {
  /** Non-empty; doubles as the dedup key */
  readonly title: string

  /** Opaque reference for the detail extractor (URL, DOI or identifier) */
  readonly sourceRef: string

  readonly hints?: Readonly<PaperStubHints>
}

export type PaperStatus = 'ok' | 'fetch_failed'

/**
 * The durable unit of work and output.
 *
 * `codeUrl` is either null or a URL that passed `isValidRepository` when it
 * was set. `codeMentioned` is independent of `codeUrl`.
 */
export interface PaperRecord {
  title: string
  pdfUrl: string | null
  arxivUrl: string | null
  codeUrl: string | null
  codeMentioned: boolean
  status: PaperStatus
}

// ═══════════════════════════════════════════════════════════════════════════════
// Checkpoint Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resumable progress. `cursor === processed.length` at every save point.
 */
export interface CheckpointState {
  processed: PaperRecord[]
  cursor: number
}

export interface CheckpointStore {
  /** Fresh empty state when nothing is stored yet */
  load(): Promise<CheckpointState>

  /** Atomic with respect to process interruption */
  save(state: CheckpointState): Promise<void>

  /** Clears stored code URLs the current validity rule rejects */
  revalidate(state: CheckpointState): CheckpointState
}

export interface OutputTableWriter {
  write(records: readonly PaperRecord[]): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

export interface Fetcher {
  /**
   * GET a URL with bounded retries. Never throws; exhaustion is a failure result.
   */
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

export interface RetryPolicy {
  /** Total attempts, first one included */
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

/**
 * Fixed two-second pause between three attempts.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 2000,
  backoffMultiplier: 1,
}

export const DEFAULT_USER_AGENT = 'papercode/0.1 (research paper crawler)'

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export type FetchFailureStatus = 'error' | 'timeout'

export type FetchResult =
  | {
      status: 'ok'
      statusCode: number
      html: string
      attempts: number
      durationMs: number
    }
  | {
      status: FetchFailureStatus
      statusCode?: number
      error: string
      attempts: number
      durationMs: number
    }

/**
 * Body text of a successful fetch, or null.
 */
export function fetchedText(result: FetchResult): string | null {
  return result.status === 'ok' ? result.html : null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Source Interface
// ═══════════════════════════════════════════════════════════════════════════════

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Outcome of a title search. A transport failure is kept apart from a
 * miss so the caller can report the record as `fetch_failed`.
 */
export type ArxivSearchResult =
  | { status: 'found'; arxivUrl: string; abstract: string | null }
  | { status: 'not_found' }
  | { status: 'fetch_failed'; url: string }

/**
 * What the arXiv collaborator offers to detail extractors.
 */
export interface ArxivLookup {
  /** Scan the abstract page of a known arXiv paper for a repository URL */
  findCodeOnAbstractPage(arxivUrl: string): Promise<string | null>

  /** Fetch the abstract page and pull the abstract text and any repository URL */
  fetchAbstractPage(arxivUrl: string): Promise<{ abstract: string | null; codeUrl: string | null } | null>

  /** Look a paper up by exact title through the export API */
  searchByTitle(title: string): Promise<ArxivSearchResult>
}

/**
 * Context handed to source methods.
 */
export interface SourceContext {
  fetcher: Fetcher
  arxiv: ArxivLookup
  logger: ILogger
  sleep: Sleep
}

export interface SourceManifest {
  /** Unique source identifier (e.g., 'cvpr2025'); names the output files */
  readonly id: string

  /** Display name */
  readonly name: string

  readonly baseUrls: readonly string[]

  /** Pause between listing requests when a listing spans several pages */
  readonly requestDelayMs: number
}

export interface PaperDetail {
  pdfUrl: string | null
  arxivUrl: string | null
  codeUrl: string | null
  codeMentioned: boolean
}

export type DetailFailureReason = 'fetch_failed'

export type DetailResult =
  | { ok: true; detail: PaperDetail }
  | { ok: false; reason: DetailFailureReason; details?: string }

/**
 * One upstream listing of conference papers.
 *
 * `listPapers` must be deterministic for the same upstream state and must
 * throw a ListingError rather than return a partial listing.
 * `extractDetail` must not retry; retries belong to the Fetcher.
 */
export interface PaperSource {
  readonly manifest: SourceManifest

  listPapers(ctx: SourceContext): Promise<PaperStub[]>

  extractDetail(stub: PaperStub, ctx: SourceContext): Promise<DetailResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Types
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineState = 'START' | 'LISTING' | 'PROCESSING' | 'CHECKPOINTED' | 'DONE'

export interface RunSummary {
  sourceId: string
  total: number
  resumedFrom: number
  processedThisRun: number
  withCodeUrl: number
  codeMentionedOnly: number
  fetchFailed: number
}
