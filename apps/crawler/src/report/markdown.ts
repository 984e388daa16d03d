import type { GithubRepoInfo } from './github.js'

export const README_FILE_NAME = 'readme.md'

export const README_HEADER = '| title | code | about | language | stars | forks | watches | paper | pass^4 |'
export const README_DIVIDER = '|-------|------|-------|----------|-------|-------|---------|-------|--------|'

export interface ReportRow {
  title: string
  pdfUrl: string
  codeUrl: string
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|')
}

export function formatReadmeRow(row: ReportRow, info: GithubRepoInfo | undefined): string {
  const cells = [
    escapeCell(row.title),
    row.codeUrl ? `[code](${row.codeUrl})` : '',
    info ? escapeCell(info.about).replace(/\r?\n/g, ' ') : '',
    info?.language ?? '',
    info ? String(info.stars) : '',
    info ? String(info.forks) : '',
    info ? String(info.watches) : '',
    row.pdfUrl ? `[pdf](${row.pdfUrl})` : '',
  ]
  return `| ${cells.join(' | ')} | |`
}

/**
 * Markdown table of papers with code. `pass^4` is left blank for manual
 * review.
 */
export function renderReadme(
  rows: readonly ReportRow[],
  infoByUrl: ReadonlyMap<string, GithubRepoInfo>
): string {
  const lines = [README_HEADER, README_DIVIDER, ...rows.map(row => formatReadmeRow(row, infoByUrl.get(row.codeUrl)))]
  return lines.map(line => `${line}\n`).join('')
}
