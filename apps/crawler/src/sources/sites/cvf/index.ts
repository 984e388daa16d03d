/**
 * CVF Open Access (CVPR, ICCV).
 *
 * One listing page holds every paper. Code comes from the abstract, then
 * from the arXiv abstract page.
 */

import { ListingError } from '../../../errors.js'
import { mentionsCode } from '../../../pipeline/classify/code-mention.js'
import type { PaperSource } from '../../../pipeline/types.js'
import { fetchedText } from '../../../pipeline/types.js'
import { resolveCodeUrl } from '../../kit/code.js'
import { parseListing, parsePaperPage } from './extract.js'
import { CVF_BASE_URL, cvpr2025, iccv2025, type CvfConference } from './manifest.js'

export function createCvfSource({ manifest, conference }: CvfConference): PaperSource {
  const listingUrl = `${CVF_BASE_URL}/${conference}?day=all`

  return {
    manifest,

    async listPapers(ctx) {
      const html = fetchedText(await ctx.fetcher.fetch(listingUrl))
      if (html === null) {
        throw new ListingError(manifest.id, `Failed to fetch listing ${listingUrl}`)
      }
      return parseListing(html, listingUrl)
    },

    async extractDetail(stub, ctx) {
      const html = fetchedText(await ctx.fetcher.fetch(stub.sourceRef))
      if (html === null) {
        return { ok: false, reason: 'fetch_failed', details: stub.sourceRef }
      }

      const page = parsePaperPage(html)
      const codeUrl = await resolveCodeUrl([page.abstract], page.arxivUrl, ctx, manifest.requestDelayMs)

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
}

export const cvprSource = createCvfSource(cvpr2025)
export const iccvSource = createCvfSource(iccv2025)
