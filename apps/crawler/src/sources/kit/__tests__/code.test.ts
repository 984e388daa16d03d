import { describe, expect, it, vi } from 'vitest'
import { createContext, MapFetcher } from '../../../pipeline/__tests__/helpers.js'
import type { ArxivLookup } from '../../../pipeline/types.js'
import { resolveCodeUrl } from '../code.js'

function arxivReturning(codeUrl: string | null): ArxivLookup & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    findCodeOnAbstractPage: async url => {
      calls.push(url)
      return codeUrl
    },
    fetchAbstractPage: async () => null,
    searchByTitle: async () => ({ status: 'not_found' }),
  }
}

describe('resolveCodeUrl', () => {
  it('prefers a repository in the texts', async () => {
    const arxiv = arxivReturning('https://github.com/other/repo')
    const ctx = createContext(new MapFetcher({}), { arxiv })

    const url = await resolveCodeUrl(
      [null, 'Code: https://github.com/acme/widget'],
      'https://arxiv.org/abs/2401.00001',
      ctx,
      800
    )

    expect(url).toBe('https://github.com/acme/widget')
    expect(arxiv.calls).toEqual([])
  })

  it('falls back to the arXiv page after a pause', async () => {
    const arxiv = arxivReturning('https://github.com/acme/widget')
    const sleep = vi.fn(async (_ms: number) => undefined)
    const ctx = createContext(new MapFetcher({}), { arxiv, sleep })

    const url = await resolveCodeUrl(['no links here'], 'https://arxiv.org/abs/2401.00001', ctx, 800)

    expect(url).toBe('https://github.com/acme/widget')
    expect(arxiv.calls).toEqual(['https://arxiv.org/abs/2401.00001'])
    expect(sleep).toHaveBeenCalledWith(800)
  })

  it('returns null without texts or an arXiv link', async () => {
    const ctx = createContext(new MapFetcher({}))
    await expect(resolveCodeUrl([], null, ctx, 800)).resolves.toBeNull()
  })
})
