import { loadHtml, absoluteUrl, collapseWhitespace, findArxivLink, firstAttr, firstText } from '../../kit/html.js'
import type { PaperStub } from '../../../pipeline/types.js'

const SELECTORS = {
  listingTitle: 'dt.ptitle > a',
  pdf: 'meta[name="citation_pdf_url"]',
  abstract: '#abstract',
} as const

/**
 * Every `<dt class="ptitle">` link of an all-days listing page, in page order.
 */
export function parseListing(html: string, pageUrl: string): PaperStub[] {
  const $ = loadHtml(html)
  const stubs: PaperStub[] = []

  $(SELECTORS.listingTitle).each((_, element) => {
    const link = $(element)
    const title = collapseWhitespace(link.text())
    const sourceRef = absoluteUrl(link.attr('href'), pageUrl)
    if (title && sourceRef) {
      stubs.push({ title, sourceRef })
    }
  })

  return stubs
}

export interface CvfPaperPage {
  pdfUrl: string | null
  abstract: string | null
  arxivUrl: string | null
}

export function parsePaperPage(html: string): CvfPaperPage {
  const $ = loadHtml(html)
  const abstract = collapseWhitespace(firstText($, SELECTORS.abstract))

  return {
    pdfUrl: firstAttr($, SELECTORS.pdf, 'content') ?? null,
    abstract: abstract || null,
    arxivUrl: findArxivLink($) ?? null,
  }
}
