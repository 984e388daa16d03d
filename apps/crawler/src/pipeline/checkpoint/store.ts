/**
 * File-backed checkpoint store.
 *
 * On disk: `{ "processed": [ ...records ], "last_index": n }` with snake_case
 * record fields. Progress files from earlier tools that carry an `error`
 * field instead of `status` still load.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { CheckpointCorruptError } from '../../errors.js'
import { isFileNotFound, writeFileAtomic } from '../../utils/fs.js'
import { isValidRepository } from '../classify/repository-url.js'
import type { CheckpointState, CheckpointStore, PaperRecord } from '../types.js'

const storedRecordSchema = z.object({
  title: z.string(),
  pdf_url: z.string().nullish(),
  arxiv_url: z.string().nullish(),
  code_url: z.string().nullish(),
  code_mentioned: z.boolean().nullish(),
  status: z.enum(['ok', 'fetch_failed']).optional(),
  error: z.string().optional(),
})

const checkpointFileSchema = z.object({
  processed: z.array(storedRecordSchema),
  last_index: z.number().int().min(0),
})

type StoredRecord = z.infer<typeof storedRecordSchema>

export interface CheckpointFile {
  processed: Array<{
    title: string
    pdf_url: string | null
    arxiv_url: string | null
    code_url: string | null
    code_mentioned: boolean
    status: PaperRecord['status']
  }>
  last_index: number
}

export function emptyCheckpoint(): CheckpointState {
  return { processed: [], cursor: 0 }
}

function fromStored(stored: StoredRecord): PaperRecord {
  return {
    title: stored.title,
    pdfUrl: stored.pdf_url || null,
    arxivUrl: stored.arxiv_url || null,
    codeUrl: stored.code_url || null,
    codeMentioned: stored.code_mentioned ?? false,
    status: stored.status ?? (stored.error ? 'fetch_failed' : 'ok'),
  }
}

export function serializeCheckpoint(state: CheckpointState): CheckpointFile {
  return {
    processed: state.processed.map(record => ({
      title: record.title,
      pdf_url: record.pdfUrl,
      arxiv_url: record.arxivUrl,
      code_url: record.codeUrl,
      code_mentioned: record.codeMentioned,
      status: record.status,
    })),
    last_index: state.cursor,
  }
}

/**
 * Parse checkpoint file contents. Throws CheckpointCorruptError on anything
 * that cannot be trusted, including a cursor that disagrees with the records.
 */
export function parseCheckpoint(contents: string, path: string): CheckpointState {
  let raw: unknown
  try {
    raw = JSON.parse(contents)
  } catch (error) {
    throw new CheckpointCorruptError(path, 'invalid JSON', error)
  }

  const parsed = checkpointFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new CheckpointCorruptError(
      path,
      `unexpected structure at '${issue.path.join('.')}': ${issue.message}`
    )
  }

  const { processed, last_index: cursor } = parsed.data
  if (cursor !== processed.length) {
    throw new CheckpointCorruptError(
      path,
      `last_index ${cursor} does not match ${processed.length} processed records`
    )
  }

  return { processed: processed.map(fromStored), cursor }
}

/**
 * Clear stored code URLs that the current validity rule rejects.
 * Titles, PDF and arXiv links are untouched.
 */
export function revalidateCheckpoint(state: CheckpointState): CheckpointState {
  return {
    cursor: state.cursor,
    processed: state.processed.map(record =>
      record.codeUrl && !isValidRepository(record.codeUrl) ? { ...record, codeUrl: null } : record
    ),
  }
}

export interface FileCheckpointStoreOptions {
  logger?: ILogger
}

export class FileCheckpointStore implements CheckpointStore {
  readonly path: string
  private readonly logger: ILogger

  constructor(path: string, options: FileCheckpointStoreOptions = {}) {
    this.path = path
    this.logger = options.logger ?? silentLogger
  }

  async load(): Promise<CheckpointState> {
    let contents: string
    try {
      contents = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isFileNotFound(error)) {
        this.logger.info('No checkpoint found, starting fresh', { path: this.path })
        return emptyCheckpoint()
      }
      throw error
    }

    const state = parseCheckpoint(contents, this.path)
    this.logger.info('Loaded checkpoint', { path: this.path, cursor: state.cursor })
    return state
  }

  async save(state: CheckpointState): Promise<void> {
    await writeFileAtomic(this.path, `${JSON.stringify(serializeCheckpoint(state), null, 2)}\n`)
    this.logger.debug('Saved checkpoint', { path: this.path, cursor: state.cursor })
  }

  revalidate(state: CheckpointState): CheckpointState {
    const next = revalidateCheckpoint(state)
    const cleared = state.processed.filter((record, i) => record.codeUrl !== next.processed[i].codeUrl)
    if (cleared.length > 0) {
      this.logger.info('Cleared code URLs rejected by current rules', {
        count: cleared.length,
        titles: cleared.map(record => record.title),
      })
    }
    return next
  }
}
