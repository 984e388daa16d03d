/**
 * OJS proceedings (AAAI).
 *
 * The archive page names the issues of each volume; the listing is the
 * concatenation of every issue of the volume, in archive order. A missing
 * issue page fails the whole listing.
 */

import { ListingError } from '../../../errors.js'
import { mentionsCode } from '../../../pipeline/classify/code-mention.js'
import type { PaperSource, PaperStub } from '../../../pipeline/types.js'
import { fetchedText } from '../../../pipeline/types.js'
import { resolveCodeUrl } from '../../kit/code.js'
import { parseArchive, parseArticlePage, parseIssue } from './extract.js'
import { AAAI2025_VOLUME, AAAI_JOURNAL_PATH, manifest, OJS_BASE_URL } from './manifest.js'

const archiveUrl = `${OJS_BASE_URL}${AAAI_JOURNAL_PATH}/issue/archive`

export const ojsSource: PaperSource = {
  manifest,

  async listPapers(ctx) {
    const archive = fetchedText(await ctx.fetcher.fetch(archiveUrl))
    if (archive === null) {
      throw new ListingError(manifest.id, `Failed to fetch archive page ${archiveUrl}`)
    }

    const issueUrls = parseArchive(archive, archiveUrl, AAAI2025_VOLUME)
    if (issueUrls.length === 0) {
      throw new ListingError(manifest.id, `No issues of Vol. ${AAAI2025_VOLUME} on ${archiveUrl}`)
    }
    ctx.logger.info(`Found ${issueUrls.length} issues of Vol. ${AAAI2025_VOLUME}`)

    const stubs: PaperStub[] = []
    for (const [index, issueUrl] of issueUrls.entries()) {
      if (index > 0) await ctx.sleep(manifest.requestDelayMs)

      const html = fetchedText(await ctx.fetcher.fetch(issueUrl))
      if (html === null) {
        throw new ListingError(manifest.id, `Failed to fetch issue page ${issueUrl}`)
      }

      const issueStubs = parseIssue(html, issueUrl)
      ctx.logger.debug('Parsed issue', { issueUrl, papers: issueStubs.length })
      stubs.push(...issueStubs)
    }

    return stubs
  },

  async extractDetail(stub, ctx) {
    const html = fetchedText(await ctx.fetcher.fetch(stub.sourceRef))
    if (html === null) {
      return { ok: false, reason: 'fetch_failed', details: stub.sourceRef }
    }

    const page = parseArticlePage(html, stub.sourceRef)
    const codeUrl = await resolveCodeUrl([html, page.abstract], page.arxivUrl, ctx, manifest.requestDelayMs)

    return {
      ok: true,
      detail: {
        pdfUrl: page.pdfUrl,
        arxivUrl: page.arxivUrl,
        codeUrl,
        codeMentioned: mentionsCode(page.abstract),
      },
    }
  },
}
