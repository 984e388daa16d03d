import { createSourceRegistry, type SourceRegistry } from '../../sources/registry.js'

export interface SourcesCommandDeps {
  registry?: SourceRegistry
  print?: (line: string) => void
}

export async function runSourcesCommand(deps: SourcesCommandDeps = {}): Promise<number> {
  const registry = deps.registry ?? createSourceRegistry()
  const print = deps.print ?? ((line: string) => console.log(line))

  for (const manifest of registry.manifests()) {
    print(`${manifest.id.padEnd(12)} ${manifest.name.padEnd(12)} ${manifest.baseUrls.join(', ')}`)
  }
  return 0
}
