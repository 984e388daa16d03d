/**
 * DBLP table of contents (ICRA).
 *
 * DBLP has no abstracts or arXiv links, so every paper is looked up on arXiv
 * by title. The DOI link stands in for the PDF. A search that cannot be
 * fetched fails the record; a search without a match does not.
 */

import { ListingError } from '../../../errors.js'
import { mentionsCode } from '../../../pipeline/classify/code-mention.js'
import { extractRepoUrl } from '../../../pipeline/classify/repository-url.js'
import type { PaperSource } from '../../../pipeline/types.js'
import { fetchedText } from '../../../pipeline/types.js'
import { parseListing } from './extract.js'
import { DBLP_BASE_URL, ICRA2025_LISTING_PATH, manifest } from './manifest.js'

const listingUrl = `${DBLP_BASE_URL}${ICRA2025_LISTING_PATH}`

export const dblpSource: PaperSource = {
  manifest,

  async listPapers(ctx) {
    const html = fetchedText(await ctx.fetcher.fetch(listingUrl))
    if (html === null) {
      throw new ListingError(manifest.id, `Failed to fetch DBLP listing ${listingUrl}`)
    }
    return parseListing(html)
  },

  async extractDetail(stub, ctx) {
    const hit = await ctx.arxiv.searchByTitle(stub.title)
    if (hit.status === 'fetch_failed') {
      return { ok: false, reason: 'fetch_failed', details: hit.url }
    }

    const arxivUrl = hit.status === 'found' ? hit.arxivUrl : null
    let abstract = hit.status === 'found' ? hit.abstract : null
    let codeUrl: string | null = null

    if (arxivUrl && !abstract) {
      await ctx.sleep(manifest.requestDelayMs)
      const page = await ctx.arxiv.fetchAbstractPage(arxivUrl)
      abstract = page?.abstract ?? null
      codeUrl = page?.codeUrl ?? null
    }

    return {
      ok: true,
      detail: {
        pdfUrl: stub.sourceRef || null,
        arxivUrl,
        codeUrl: codeUrl ?? extractRepoUrl(abstract),
        codeMentioned: mentionsCode(abstract),
      },
    }
  },
}
