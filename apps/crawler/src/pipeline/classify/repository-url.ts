/**
 * Repository URL classification.
 *
 * Free-text mentions of code hosts are mostly documentation, blog and
 * marketing links. Validity is a two-stage filter: the deny-list runs first,
 * then the URL must have an owner/repo shape with a non-generic owner.
 */

/**
 * Substrings that mark a known false positive, checked against the
 * lower-cased URL.
 */
export const DENY_LIST = [
  'huggingface.co/huggingface',
  'huggingface.co/docs',
  'huggingface.co/blog',
  'huggingface.co/join',
  'huggingface.co/pricing',
  'github.com/github',
  'github.com/features',
  'github.com/explore',
  '/arxiv.',
] as const

/** Owner names that are site sections rather than accounts */
export const RESERVED_OWNERS = ['docs', 'blog', 'api', 'hub', 'join', 'huggingface'] as const

/**
 * Owner/repo shapes per host. Order matters: `huggingface.co/spaces/...`
 * must be tried before the generic huggingface shape.
 */
const REPOSITORY_SHAPES: readonly RegExp[] = [
  /^https?:\/\/github\.com\/([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_.-]+)(?:\/|$)/,
  /^https?:\/\/gitlab\.com\/([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_.-]+)(?:\/|$)/,
  /^https?:\/\/huggingface\.co\/spaces\/([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_.-]+)(?:\/|$)/,
  /^https?:\/\/huggingface\.co\/([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_.-]+)(?:\/|$)/,
]

/** Candidate URLs per host, in host-priority order */
const CANDIDATE_PATTERNS: readonly RegExp[] = [
  /https?:\/\/github\.com\/[^\s<>"')\]]+/gi,
  /https?:\/\/gitlab\.com\/[^\s<>"')\]]+/gi,
  /https?:\/\/huggingface\.co\/[^\s<>"')\]]+/gi,
]

const TRAILING_PUNCTUATION = /[.,;:]+$/

const reservedOwners: ReadonlySet<string> = new Set(RESERVED_OWNERS)

export function isDenyListed(url: string): boolean {
  const lower = url.toLowerCase()
  return DENY_LIST.some(entry => lower.includes(entry))
}

export function isValidRepository(url: string | null | undefined): boolean {
  if (!url) {
    return false
  }

  if (isDenyListed(url)) {
    return false
  }

  for (const shape of REPOSITORY_SHAPES) {
    const match = shape.exec(url)
    if (match) {
      const owner = match[1].toLowerCase()
      return !reservedOwners.has(owner)
    }
  }

  return false
}

export function stripTrailingPunctuation(url: string): string {
  return url.replace(TRAILING_PUNCTUATION, '')
}

/**
 * Every code-host URL in the text, in host-priority order, then text order.
 * Candidates are not validated.
 */
export function findRepositoryCandidates(text: string): string[] {
  const candidates: string[] = []
  for (const pattern of CANDIDATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      candidates.push(stripTrailingPunctuation(match[0]))
    }
  }
  return candidates
}

/**
 * First candidate that passes `isValidRepository`, or null.
 */
export function extractRepoUrl(text: string | null | undefined): string | null {
  if (!text) {
    return null
  }

  for (const candidate of findRepositoryCandidates(text)) {
    if (isValidRepository(candidate)) {
      return candidate
    }
  }
  return null
}

/**
 * First repository URL found across several texts, tried in order
 * (e.g. the full page, then the abstract).
 */
export function findCodeUrl(texts: ReadonlyArray<string | null | undefined>): string | null {
  for (const text of texts) {
    const url = extractRepoUrl(text)
    if (url) {
      return url
    }
  }
  return null
}
