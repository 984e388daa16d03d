/**
 * Output table: one CSV row per processed paper.
 *
 * Only the title is quoted. Commas inside it become semicolons and quotes
 * are doubled. Link columns are unquoted, so a comma in a URL is written
 * as `%2C`.
 */

import type { ILogger } from '@papercode/logger'
import { silentLogger } from '@papercode/logger'
import { writeFileAtomic } from '../../utils/fs.js'
import type { OutputTableWriter, PaperRecord } from '../types.js'

export const TABLE_HEADER = 'title,pdf_url,arxiv_url,code_available,code_url'

export type CodeAvailability = 'yes' | 'maybe' | 'no'

export function codeAvailability(record: Pick<PaperRecord, 'codeUrl' | 'codeMentioned'>): CodeAvailability {
  if (record.codeUrl) return 'yes'
  return record.codeMentioned ? 'maybe' : 'no'
}

export function escapeTitle(title: string): string {
  return title.replace(/"/g, '""').replace(/,/g, ';')
}

export function escapeLink(url: string | null): string {
  return url ? url.replace(/,/g, '%2C') : ''
}

export function formatRow(record: PaperRecord): string {
  return [
    `"${escapeTitle(record.title)}"`,
    escapeLink(record.pdfUrl),
    escapeLink(record.arxivUrl),
    codeAvailability(record),
    escapeLink(record.codeUrl),
  ].join(',')
}

export function formatTable(records: readonly PaperRecord[]): string {
  return [TABLE_HEADER, ...records.map(formatRow)].map(line => `${line}\n`).join('')
}

export class CsvTableWriter implements OutputTableWriter {
  readonly path: string
  private readonly logger: ILogger

  constructor(path: string, options: { logger?: ILogger } = {}) {
    this.path = path
    this.logger = options.logger ?? silentLogger
  }

  async write(records: readonly PaperRecord[]): Promise<void> {
    await writeFileAtomic(this.path, formatTable(records))
    this.logger.debug('Wrote output table', { path: this.path, rows: records.length })
  }
}
