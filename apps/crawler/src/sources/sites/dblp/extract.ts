import { collapseWhitespace, loadHtml } from '../../kit/html.js'
import type { PaperStub } from '../../../pipeline/types.js'

const SELECTORS = {
  entry: 'li.entry.inproceedings',
  title: 'span.title[itemprop="name"]',
  doi: 'a[href^="https://doi.org/10.1109/ICRA"]',
} as const

/**
 * Papers of a DBLP table of contents. The proceedings volume itself is an
 * editor entry and is not matched. `sourceRef` is the DOI link, or empty.
 */
export function parseListing(html: string): PaperStub[] {
  const $ = loadHtml(html)
  const stubs: PaperStub[] = []

  $(SELECTORS.entry).each((_, element) => {
    const entry = $(element)
    const title = collapseWhitespace(entry.find(SELECTORS.title).first().text()).replace(/\.$/, '')
    if (!title) return

    const doi = entry.find(SELECTORS.doi).first().attr('href')?.trim() ?? ''
    stubs.push({ title, sourceRef: doi })
  })

  return stubs
}
