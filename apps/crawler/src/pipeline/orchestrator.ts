/**
 * Pipeline Orchestrator
 *
 * Run flow:
 * 1. LISTING: full ordered stub list from the source (failure aborts the run)
 * 2. Load and revalidate the checkpoint
 * 3. PROCESSING: each stub at index >= cursor, strictly in order
 * 4. CHECKPOINTED: every `checkpointEvery` records, flush checkpoint and table
 * 5. DONE: final flush and summary
 *
 * A single record can never abort the run: extractor failures and thrown
 * errors both become `fetch_failed` records.
 */

import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { ListingError, errorMessage } from '../errors.js'
import { isValidRepository } from './classify/repository-url.js'
import type {
  CheckpointState,
  CheckpointStore,
  OutputTableWriter,
  PaperRecord,
  PaperSource,
  PaperStub,
  PipelineState,
  RunSummary,
  SourceContext,
} from './types.js'

export const DEFAULT_RECORD_DELAY_MS = 800
export const DEFAULT_CHECKPOINT_EVERY = 10

export interface StateChange {
  state: PipelineState
  cursor: number
  total: number
}

export interface PipelineOptions {
  source: PaperSource
  context: SourceContext
  store: CheckpointStore
  table: OutputTableWriter

  /** Pause after every record, network call or not */
  recordDelayMs?: number

  checkpointEvery?: number

  /** Process at most this many papers of the listing (smoke runs) */
  limit?: number

  /** Stops the run at the next record boundary; progress is flushed */
  signal?: AbortSignal

  logger?: ILogger

  onStateChange?: (change: StateChange) => void
}

export interface RunResult extends RunSummary {
  interrupted: boolean
  records: PaperRecord[]
}

/**
 * Drop stubs with a blank title and every repeat of a title already seen.
 */
export function dedupeStubs(stubs: readonly PaperStub[]): { unique: PaperStub[]; dropped: number } {
  const seen = new Set<string>()
  const unique: PaperStub[] = []

  for (const stub of stubs) {
    const title = stub.title.trim()
    if (!title || seen.has(title)) continue
    seen.add(title)
    unique.push(title === stub.title ? stub : { ...stub, title })
  }

  return { unique, dropped: stubs.length - unique.length }
}

export function failedRecord(title: string): PaperRecord {
  return {
    title,
    pdfUrl: null,
    arxivUrl: null,
    codeUrl: null,
    codeMentioned: false,
    status: 'fetch_failed',
  }
}

export function summarize(
  sourceId: string,
  records: readonly PaperRecord[],
  resumedFrom: number
): RunSummary {
  return {
    sourceId,
    total: records.length,
    resumedFrom,
    processedThisRun: records.length - resumedFrom,
    withCodeUrl: records.filter(r => r.codeUrl).length,
    codeMentionedOnly: records.filter(r => !r.codeUrl && r.codeMentioned).length,
    fetchFailed: records.filter(r => r.status === 'fetch_failed').length,
  }
}

function preview(title: string): string {
  return title.length > 55 ? `${title.slice(0, 55)}...` : title
}

export class PipelineOrchestrator {
  private readonly source: PaperSource
  private readonly ctx: SourceContext
  private readonly store: CheckpointStore
  private readonly table: OutputTableWriter
  private readonly recordDelayMs: number
  private readonly checkpointEvery: number
  private readonly limit?: number
  private readonly signal?: AbortSignal
  private readonly log: ILogger
  private readonly onStateChange?: (change: StateChange) => void

  constructor(options: PipelineOptions) {
    this.source = options.source
    this.ctx = options.context
    this.store = options.store
    this.table = options.table
    this.recordDelayMs = options.recordDelayMs ?? DEFAULT_RECORD_DELAY_MS
    this.checkpointEvery = Math.max(1, options.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY)
    this.limit = options.limit
    this.signal = options.signal
    this.log = (options.logger ?? silentLogger).child({ sourceId: options.source.manifest.id })
    this.onStateChange = options.onStateChange
  }

  async run(): Promise<RunResult> {
    const sourceId = this.source.manifest.id
    this.emit('START', 0, 0)
    this.log.info(`${this.source.manifest.name} paper run`)

    const stubs = await this.listStubs()

    const loaded = this.store.revalidate(await this.store.load())
    const processed = [...loaded.processed]
    const resumedFrom = loaded.cursor
    let state: CheckpointState = { processed, cursor: loaded.cursor }

    this.checkListingStability(stubs, state)

    if (state.cursor > stubs.length) {
      this.log.warn('Checkpoint is ahead of the listing; nothing left to process', {
        cursor: state.cursor,
        listed: stubs.length,
      })
    } else if (state.cursor > 0) {
      this.log.info(`Resuming from paper ${state.cursor}`, { cursor: state.cursor, total: stubs.length })
    }

    for (let i = state.cursor; i < stubs.length; i++) {
      if (this.signal?.aborted) break

      const stub = stubs[i]
      this.emit('PROCESSING', i, stubs.length)
      this.log.info(`[${i + 1}/${stubs.length}] ${preview(stub.title)}`)

      const record = await this.processStub(stub)
      processed.push(record)
      state = { processed, cursor: i + 1 }

      if (record.codeUrl) {
        this.log.info(`  => Code: ${record.codeUrl}`)
      } else if (record.codeMentioned) {
        this.log.info('  => (code mentioned but no URL)')
      }

      if (state.cursor % this.checkpointEvery === 0) {
        await this.flush(state)
        this.emit('CHECKPOINTED', state.cursor, stubs.length)
        this.log.info(`  [Saved progress: ${state.cursor} papers]`)
      }

      await this.ctx.sleep(this.recordDelayMs)
    }

    const interrupted = Boolean(this.signal?.aborted) && state.cursor < stubs.length

    await this.flush(state)
    this.emit('DONE', state.cursor, stubs.length)

    const summary = summarize(sourceId, processed, resumedFrom)
    if (interrupted) {
      this.log.warn('Run interrupted; progress saved', { cursor: state.cursor, total: stubs.length })
    }
    this.log.info(`Done! ${summary.total} papers saved`, {
      withCodeUrl: summary.withCodeUrl,
      codeMentionedOnly: summary.codeMentionedOnly,
      fetchFailed: summary.fetchFailed,
    })
    this.log.info(`With code URL: ${summary.withCodeUrl}`)
    this.log.info(`Code mentioned (no URL): ${summary.codeMentionedOnly}`)

    return { ...summary, interrupted, records: processed }
  }

  private async listStubs(): Promise<PaperStub[]> {
    const sourceId = this.source.manifest.id
    this.emit('LISTING', 0, 0)

    let listed: PaperStub[]
    try {
      listed = await this.source.listPapers(this.ctx)
    } catch (error) {
      const listingError =
        error instanceof ListingError ? error : new ListingError(sourceId, errorMessage(error), error)
      this.log.fatal('Listing failed; aborting run', {}, listingError)
      throw listingError
    }

    const { unique, dropped } = dedupeStubs(listed)
    if (dropped > 0) {
      this.log.warn('Dropped blank or duplicate titles from listing', { dropped })
    }

    const stubs = this.limit !== undefined ? unique.slice(0, Math.max(0, this.limit)) : unique
    this.log.info(`Found ${stubs.length} papers`, { listed: listed.length })
    return stubs
  }

  /**
   * Results before the cursor are reused, so a listing whose order changed
   * since the checkpoint was written would misalign them.
   */
  private checkListingStability(stubs: readonly PaperStub[], state: CheckpointState): void {
    const overlap = Math.min(state.cursor, stubs.length)
    for (let i = 0; i < overlap; i++) {
      if (state.processed[i].title !== stubs[i].title) {
        this.log.warn('Listing order differs from checkpoint', {
          index: i,
          checkpointTitle: state.processed[i].title,
          listingTitle: stubs[i].title,
        })
        return
      }
    }
  }

  private async processStub(stub: PaperStub): Promise<PaperRecord> {
    try {
      const result = await this.source.extractDetail(stub, this.ctx)
      if (!result.ok) {
        this.log.warn('Detail extraction failed', {
          title: stub.title,
          reason: result.reason,
          details: result.details,
        })
        return failedRecord(stub.title)
      }

      const { detail } = result
      const codeUrl = detail.codeUrl && isValidRepository(detail.codeUrl) ? detail.codeUrl : null
      return {
        title: stub.title,
        pdfUrl: detail.pdfUrl || null,
        arxivUrl: detail.arxivUrl || null,
        codeUrl,
        codeMentioned: detail.codeMentioned,
        status: 'ok',
      }
    } catch (error) {
      this.log.error('Detail extractor threw', { title: stub.title }, error)
      return failedRecord(stub.title)
    }
  }

  private async flush(state: CheckpointState): Promise<void> {
    await this.store.save(state)
    await this.table.write(state.processed)
  }

  private emit(state: PipelineState, cursor: number, total: number): void {
    this.onStateChange?.({ state, cursor, total })
  }
}

export function runPipeline(options: PipelineOptions): Promise<RunResult> {
  return new PipelineOrchestrator(options).run()
}
