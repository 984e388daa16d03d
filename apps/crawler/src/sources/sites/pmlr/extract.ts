import type { CheerioAPI } from 'cheerio'
import { absoluteUrl, collapseWhitespace, findArxivLink, loadHtml } from '../../kit/html.js'
import type { PaperStub, PaperStubHints } from '../../../pipeline/types.js'

const SELECTORS = {
  paper: 'div.paper',
  title: 'p.title',
  links: 'p.links a',
  abstract: ['div.abstract', '#abstract'],
} as const

const LINK_LABELS = {
  abs: 'abs',
  software: 'software',
  pdf: 'download pdf',
} as const

/**
 * Papers of a volume page. The listing already carries the PDF and
 * "Software" links, which ride along as hints.
 */
export function parseListing(html: string, pageUrl: string): PaperStub[] {
  const $ = loadHtml(html)
  const stubs: PaperStub[] = []

  $(SELECTORS.paper).each((_, element) => {
    const paper = $(element)
    const title = collapseWhitespace(paper.find(SELECTORS.title).first().text())
    if (!title) return

    const links = new Map<string, string>()
    paper.find(SELECTORS.links).each((_, anchor) => {
      const label = collapseWhitespace($(anchor).text()).toLowerCase()
      const href = absoluteUrl($(anchor).attr('href'), pageUrl)
      if (href && !links.has(label)) links.set(label, href)
    })

    const hints: PaperStubHints = {}
    const pdfUrl = links.get(LINK_LABELS.pdf)
    const codeUrl = links.get(LINK_LABELS.software)
    if (pdfUrl) hints.pdfUrl = pdfUrl
    if (codeUrl) hints.codeUrl = codeUrl

    stubs.push({ title, sourceRef: links.get(LINK_LABELS.abs) ?? '', hints })
  })

  return stubs
}

function findAbstract($: CheerioAPI): string | null {
  for (const selector of SELECTORS.abstract) {
    const text = collapseWhitespace($(selector).first().text())
    if (text) return text
  }

  const heading = $('h2, h3')
    .filter((_, element) => collapseWhitespace($(element).text()).toLowerCase() === 'abstract')
    .first()
  const text = collapseWhitespace(heading.nextAll('p').first().text())
  return text || null
}

export interface PmlrAbstractPage {
  abstract: string | null
  arxivUrl: string | null
}

export function parseAbstractPage(html: string): PmlrAbstractPage {
  const $ = loadHtml(html)
  return {
    abstract: findAbstract($),
    arxivUrl: findArxivLink($) ?? null,
  }
}
