import { describe, expect, it } from 'vitest'
import {
  DENY_LIST,
  extractRepoUrl,
  findCodeUrl,
  findRepositoryCandidates,
  isValidRepository,
} from '../classify/repository-url.js'
import { mentionsCode } from '../classify/code-mention.js'

describe('isValidRepository', () => {
  it('accepts owner/repo URLs on supported hosts', () => {
    expect(isValidRepository('https://github.com/acme/widget')).toBe(true)
    expect(isValidRepository('http://github.com/acme/widget.js/tree/main')).toBe(true)
    expect(isValidRepository('https://gitlab.com/acme/widget/-/tree/main')).toBe(true)
    expect(isValidRepository('https://huggingface.co/acme/model-7b')).toBe(true)
    expect(isValidRepository('https://huggingface.co/spaces/acme/demo')).toBe(true)
  })

  it('rejects URLs without an owner and a repository segment', () => {
    expect(isValidRepository('https://github.com/acme')).toBe(false)
    expect(isValidRepository('https://huggingface.co/spaces')).toBe(false)
    expect(isValidRepository('https://bitbucket.org/acme/widget')).toBe(false)
    expect(isValidRepository('')).toBe(false)
    expect(isValidRepository(null)).toBe(false)
  })

  it('rejects generic owner names', () => {
    expect(isValidRepository('https://github.com/docs/getting-started')).toBe(false)
    expect(isValidRepository('https://gitlab.com/blog/post')).toBe(false)
    expect(isValidRepository('https://huggingface.co/api/models')).toBe(false)
    expect(isValidRepository('https://github.com/Hub/thing')).toBe(false)
  })

  it('rejects every deny-listed path regardless of shape', () => {
    const urls = [
      'https://huggingface.co/huggingface/transformers',
      'https://huggingface.co/docs/hub',
      'https://huggingface.co/blog/some-post',
      'https://huggingface.co/join/now',
      'https://huggingface.co/pricing/plans',
      'https://github.com/github/copilot-docs',
      'https://github.com/features/actions',
      'https://github.com/explore/topics',
      'https://github.com/acme/arxiv.2401.00001',
    ]

    for (const url of urls) {
      expect(isValidRepository(url), url).toBe(false)
    }
    for (const entry of DENY_LIST) {
      expect(urls.some(url => url.toLowerCase().includes(entry)), entry).toBe(true)
    }
  })

  it('applies the deny-list case-insensitively', () => {
    expect(isValidRepository('https://github.com/acme/ArXiv.Mirror')).toBe(false)
  })
})

describe('extractRepoUrl', () => {
  it('strips trailing sentence punctuation', () => {
    expect(extractRepoUrl('Our code is available at https://github.com/acme/widget.')).toBe(
      'https://github.com/acme/widget'
    )
    expect(extractRepoUrl('See https://github.com/acme/widget;, thanks')).toBe(
      'https://github.com/acme/widget'
    )
  })

  it('stops at closing brackets and quotes', () => {
    expect(extractRepoUrl('(code: https://github.com/acme/widget)')).toBe('https://github.com/acme/widget')
    expect(extractRepoUrl('<a href="https://gitlab.com/acme/tool">repo</a>')).toBe(
      'https://gitlab.com/acme/tool'
    )
  })

  it('returns null for a generic owner', () => {
    expect(extractRepoUrl('see https://github.com/docs/getting-started')).toBeNull()
  })

  it('prefers hosts in priority order over text order', () => {
    const text =
      'Demo at https://huggingface.co/spaces/acme/demo and code at https://github.com/acme/widget'
    expect(extractRepoUrl(text)).toBe('https://github.com/acme/widget')
  })

  it('skips invalid candidates and takes the first valid one', () => {
    const text = 'Powered by https://github.com/features/copilot, code: https://github.com/acme/widget'
    expect(extractRepoUrl(text)).toBe('https://github.com/acme/widget')
  })

  it('returns null for empty text', () => {
    expect(extractRepoUrl('')).toBeNull()
    expect(extractRepoUrl(undefined)).toBeNull()
  })

  it('never returns a URL that fails validation', () => {
    const texts = [
      'https://github.com/acme',
      'https://github.com/explore https://github.com/github/docs',
      'https://huggingface.co/docs/transformers/index.html.',
      'Models: https://huggingface.co/acme/model, https://huggingface.co/blog/x',
      'https://gitlab.com/acme/widget/-/blob/main/README.md:',
      'mirror https://github.com/acme/arxiv.2401.1 and https://gitlab.com/api/v4',
      'link https://GITHUB.com/Acme/Widget',
      'nothing to see here',
    ]

    for (const text of texts) {
      const url = extractRepoUrl(text)
      if (url !== null) {
        expect(isValidRepository(url), text).toBe(true)
      }
    }
  })
})

describe('findRepositoryCandidates', () => {
  it('lists candidates by host priority, then text order', () => {
    const text = 'https://gitlab.com/b/two https://github.com/a/one. https://github.com/c/three'
    expect(findRepositoryCandidates(text)).toEqual([
      'https://github.com/a/one',
      'https://github.com/c/three',
      'https://gitlab.com/b/two',
    ])
  })
})

describe('findCodeUrl', () => {
  it('returns the first URL found across texts in order', () => {
    expect(findCodeUrl([null, 'no links here', 'x https://gitlab.com/acme/widget'])).toBe(
      'https://gitlab.com/acme/widget'
    )
    expect(findCodeUrl([])).toBeNull()
  })
})

describe('mentionsCode', () => {
  it('fires on code availability phrases', () => {
    expect(mentionsCode('Our code is available at https://github.com/acme/widget.')).toBe(true)
    expect(mentionsCode('Code and models will be released.')).toBe(true)
    expect(mentionsCode('We make the implementation open-source.')).toBe(true)
    expect(mentionsCode('The source code accompanies this paper.')).toBe(true)
    expect(mentionsCode('Released alongside the CODE.')).toBe(true)
  })

  it('stays quiet without a code phrase', () => {
    expect(mentionsCode('see https://github.com/docs/getting-started')).toBe(false)
    expect(mentionsCode('We study the convergence of gradient descent.')).toBe(false)
    expect(mentionsCode('')).toBe(false)
    expect(mentionsCode(null)).toBe(false)
  })
})
