import type { SourceManifest } from '../../../pipeline/types.js'

export const PMLR_BASE_URL = 'https://proceedings.mlr.press'

/** ICML 2025 proceedings volume */
export const ICML2025_VOLUME = 'v267'

export const manifest: SourceManifest = {
  id: 'icml2025',
  name: 'ICML 2025',
  baseUrls: [PMLR_BASE_URL],
  requestDelayMs: 800,
}
