import type { SourceManifest } from '../../../pipeline/types.js'

export const DBLP_BASE_URL = 'https://dblp.org'

export const ICRA2025_LISTING_PATH = '/db/conf/icra/icra2025.html'

export const manifest: SourceManifest = {
  id: 'icra2025',
  name: 'ICRA 2025',
  baseUrls: [DBLP_BASE_URL],
  requestDelayMs: 800,
}
