import type { CheerioAPI } from 'cheerio'
import { absoluteUrl, collapseWhitespace, findArxivLink, firstAttr, loadHtml } from '../../kit/html.js'
import type { PaperStub } from '../../../pipeline/types.js'

const SELECTORS = {
  issueSummary: '.obj_issue_summary',
  issueLink: 'a[href*="/issue/view/"]',
  articleTitle: 'h3.title a',
  pdf: ['a.obj_galley_link.pdf', 'a.pdf', 'a[href$=".pdf"]'],
  abstractSection: 'section.abstract',
  abstractDiv: 'div.abstract',
  description: 'meta[name="DC.Description"]',
} as const

/** Issue-page links that are never article titles */
const MIN_TITLE_LENGTH = 10
const NAVIGATION_WORDS = ['PDF', 'Abstract'] as const

/**
 * Issue pages of one volume from the archive, in archive order, without
 * repeats.
 */
export function parseArchive(html: string, pageUrl: string, volume: number): string[] {
  const $ = loadHtml(html)
  const volumePattern = new RegExp(`Vol\\.\\s*${volume}\\b`, 'i')
  const urls: string[] = []

  $(SELECTORS.issueSummary).each((_, element) => {
    const summary = $(element)
    if (!volumePattern.test(collapseWhitespace(summary.text()))) return

    const url = absoluteUrl(summary.find(SELECTORS.issueLink).first().attr('href'), pageUrl)
    if (url && !urls.includes(url)) urls.push(url)
  })

  return urls
}

export function parseIssue(html: string, pageUrl: string): PaperStub[] {
  const $ = loadHtml(html)
  const stubs: PaperStub[] = []

  $(SELECTORS.articleTitle).each((_, element) => {
    const link = $(element)
    const title = collapseWhitespace(link.text())
    const sourceRef = absoluteUrl(link.attr('href'), pageUrl)

    if (!sourceRef || title.length < MIN_TITLE_LENGTH) return
    if (NAVIGATION_WORDS.some(word => title.includes(word))) return

    stubs.push({ title, sourceRef })
  })

  return stubs
}

function findAbstract($: CheerioAPI): string | null {
  const section = $(SELECTORS.abstractSection).first().clone()
  section.find('h2').remove()
  const fromSection = collapseWhitespace(section.text())
  if (fromSection) return fromSection

  const fromDiv = collapseWhitespace($(SELECTORS.abstractDiv).first().text())
  if (fromDiv) return fromDiv

  const fromMeta = collapseWhitespace(firstAttr($, SELECTORS.description, 'content') ?? '')
  return fromMeta || null
}

export interface OjsArticlePage {
  pdfUrl: string | null
  abstract: string | null
  arxivUrl: string | null
}

export function parseArticlePage(html: string, pageUrl: string): OjsArticlePage {
  const $ = loadHtml(html)

  let pdfUrl: string | null = null
  for (const selector of SELECTORS.pdf) {
    const href = absoluteUrl(firstAttr($, selector, 'href'), pageUrl)
    if (href) {
      pdfUrl = href
      break
    }
  }

  return {
    pdfUrl,
    abstract: findAbstract($),
    arxivUrl: findArxivLink($) ?? null,
  }
}
