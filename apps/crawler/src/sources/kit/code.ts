import { findCodeUrl } from '../../pipeline/classify/repository-url.js'
import type { SourceContext } from '../../pipeline/types.js'

/**
 * Repository URL from the given texts, in order; failing that, from the
 * arXiv abstract page when the paper has one. The pause runs only before
 * the arXiv request.
 */
export async function resolveCodeUrl(
  texts: ReadonlyArray<string | null | undefined>,
  arxivUrl: string | null,
  ctx: SourceContext,
  delayMs: number
): Promise<string | null> {
  const fromTexts = findCodeUrl(texts)
  if (fromTexts || !arxivUrl) return fromTexts

  await ctx.sleep(delayMs)
  return ctx.arxiv.findCodeOnAbstractPage(arxivUrl)
}
