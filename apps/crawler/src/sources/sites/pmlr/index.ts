/**
 * PMLR volume pages (ICML).
 *
 * The listing gives the PDF and often a "Software" link. The abstract page
 * adds the abstract and the arXiv link; when it cannot be fetched the
 * listing values still make a record.
 */

import { ListingError } from '../../../errors.js'
import { mentionsCode } from '../../../pipeline/classify/code-mention.js'
import { isValidRepository } from '../../../pipeline/classify/repository-url.js'
import type { PaperSource } from '../../../pipeline/types.js'
import { fetchedText } from '../../../pipeline/types.js'
import { resolveCodeUrl } from '../../kit/code.js'
import { parseAbstractPage, parseListing } from './extract.js'
import { ICML2025_VOLUME, manifest, PMLR_BASE_URL } from './manifest.js'

const listingUrl = `${PMLR_BASE_URL}/${ICML2025_VOLUME}/`

export const pmlrSource: PaperSource = {
  manifest,

  async listPapers(ctx) {
    const html = fetchedText(await ctx.fetcher.fetch(listingUrl))
    if (html === null) {
      throw new ListingError(manifest.id, `Failed to fetch listing ${listingUrl}`)
    }
    return parseListing(html, listingUrl)
  },

  async extractDetail(stub, ctx) {
    const software = stub.hints?.codeUrl
    const listedCode = software && isValidRepository(software) ? software : null

    let html: string | null = null
    if (stub.sourceRef) {
      html = fetchedText(await ctx.fetcher.fetch(stub.sourceRef))
      if (html === null) {
        ctx.logger.warn('Abstract page unavailable; using listing links only', { title: stub.title })
      }
    }

    const page = html === null ? { abstract: null, arxivUrl: null } : parseAbstractPage(html)
    const codeUrl =
      listedCode ?? (await resolveCodeUrl([html, page.abstract], page.arxivUrl, ctx, manifest.requestDelayMs))

    return {
      ok: true,
      detail: {
        pdfUrl: stub.hints?.pdfUrl ?? null,
        arxivUrl: page.arxivUrl,
        codeUrl,
        codeMentioned: mentionsCode(page.abstract),
      },
    }
  },
}
