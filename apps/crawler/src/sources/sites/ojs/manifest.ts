import type { SourceManifest } from '../../../pipeline/types.js'

export const OJS_BASE_URL = 'https://ojs.aaai.org'
export const AAAI_JOURNAL_PATH = '/index.php/AAAI'

/** AAAI-25 proceedings volume */
export const AAAI2025_VOLUME = 39

export const manifest: SourceManifest = {
  id: 'aaai2025',
  name: 'AAAI 2025',
  baseUrls: [OJS_BASE_URL],
  requestDelayMs: 500,
}
