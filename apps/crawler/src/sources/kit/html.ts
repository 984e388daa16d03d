import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return $(selector).first().text().trim()
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/** Collapse runs of whitespace, as rendered text would */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Resolve an href against the page it was found on. Undefined for
 * missing or unparseable values.
 */
export function absoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined
  try {
    return new URL(href, base).toString()
  } catch {
    return undefined
  }
}

const ARXIV_ABS_LINK = /^https?:\/\/arxiv\.org\/abs\/[^\s"]+$/

/** First `arxiv.org/abs/...` link on the page */
export function findArxivLink($: cheerio.CheerioAPI): string | undefined {
  for (const element of $('a[href*="arxiv.org/abs/"]').toArray()) {
    const href = $(element).attr('href')?.trim()
    if (href && ARXIV_ABS_LINK.test(href)) return href
  }
  return undefined
}
