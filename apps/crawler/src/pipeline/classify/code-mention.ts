/**
 * Phrases that suggest code is available even when no URL could be extracted.
 */
export const CODE_MENTION_PATTERNS: readonly RegExp[] = [
  /code.{0,20}(available|released?|at|github)/i,
  /(available|released?).{0,20}code/i,
  /open.?sourc/i,
  /our code/i,
  /source code/i,
]

export function mentionsCode(text: string | null | undefined): boolean {
  if (!text) {
    return false
  }
  return CODE_MENTION_PATTERNS.some(pattern => pattern.test(text))
}
