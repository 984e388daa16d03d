import type { SourceManifest } from '../../../pipeline/types.js'

export const CVF_BASE_URL = 'https://openaccess.thecvf.com'

export interface CvfConference {
  manifest: SourceManifest
  /** Listing path segment, e.g. `CVPR2025` */
  conference: string
}

export const cvpr2025: CvfConference = {
  conference: 'CVPR2025',
  manifest: {
    id: 'cvpr2025',
    name: 'CVPR 2025',
    baseUrls: [CVF_BASE_URL],
    requestDelayMs: 800,
  },
}

export const iccv2025: CvfConference = {
  conference: 'ICCV2025',
  manifest: {
    id: 'iccv2025',
    name: 'ICCV 2025',
    baseUrls: [CVF_BASE_URL],
    requestDelayMs: 800,
  },
}
