import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Write to a sibling temp file, then rename over the target.
 * A crash mid-write leaves the previous file intact.
 */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })

  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`)
  try {
    await writeFile(tempPath, contents, 'utf8')
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

export function isFileNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
