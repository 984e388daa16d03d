/**
 * Environment loader - import first, before anything reads process.env.
 *
 * Loads apps/crawler/.env.local in development. Production environments
 * inject their variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
