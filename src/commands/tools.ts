import type { AppServices } from '../bootstrap'

export function formatCatalog(services: AppServices): string {
  return services.toolExecutor
    .getDefinitions()
    .map((tool) => `${tool.name}\n  ${tool.description}`)
    .join('\n')
}

export async function listToolsCommand(services: AppServices): Promise<number> {
  console.log(formatCatalog(services))
  return 0
}
