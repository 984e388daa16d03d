import type { PaperSource } from '../../pipeline/types.js'
import { cvprSource, iccvSource } from './cvf/index.js'
import { dblpSource } from './dblp/index.js'
import { ojsSource } from './ojs/index.js'
import { pmlrSource } from './pmlr/index.js'

export const PAPER_SOURCES: PaperSource[] = [cvprSource, iccvSource, pmlrSource, ojsSource, dblpSource]
