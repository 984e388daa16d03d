import { UnknownSourceError } from '../errors.js'
import type { PaperSource, SourceManifest } from '../pipeline/types.js'
import { PAPER_SOURCES } from './sites/index.js'

function validateManifest(manifest: SourceManifest): void {
  if (!manifest.id.trim()) {
    throw new Error('Source manifest.id is required')
  }
  if (!/^[a-z0-9][a-z0-9_-]*$/.test(manifest.id)) {
    throw new Error(`Source id '${manifest.id}' must be lowercase letters, digits, '-' or '_'`)
  }
}

/**
 * Sources by id. The id names the output files, so it must be unique.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, PaperSource>()

  register(source: PaperSource): void {
    validateManifest(source.manifest)
    if (this.sources.has(source.manifest.id)) {
      throw new Error(`Source '${source.manifest.id}' is already registered`)
    }
    this.sources.set(source.manifest.id, source)
  }

  has(id: string): boolean {
    return this.sources.has(id)
  }

  get(id: string): PaperSource {
    const source = this.sources.get(id)
    if (!source) {
      throw new UnknownSourceError(id, this.ids())
    }
    return source
  }

  ids(): string[] {
    return [...this.sources.keys()].sort((a, b) => a.localeCompare(b))
  }

  manifests(): SourceManifest[] {
    return this.ids().map(id => this.get(id).manifest)
  }
}

export function createSourceRegistry(sources: readonly PaperSource[] = PAPER_SOURCES): SourceRegistry {
  const registry = new SourceRegistry()
  for (const source of sources) {
    registry.register(source)
  }
  return registry
}
