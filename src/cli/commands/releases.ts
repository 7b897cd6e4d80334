// `commit-digest releases <repo>`: releases matching the configured keyword

import type { AppContext } from '../../config/types.ts'
import { resolveRepository } from '../../config/config.ts'
import { filterReleasesByKeyword } from '../../github/client.ts'
import type { Release, RepositoryClient } from '../../github/types.ts'
import { ConfigurationError } from '../../core/errors.ts'

export function formatRelease(release: Release): string {
  const date = release.publishedAt ? release.publishedAt.split('T')[0] : 'unpublished'
  const title = release.name && release.name !== release.tagName ? ` ${release.name}` : ''
  return `${release.tagName}  ${date}${title}`
}

export async function handleReleasesCommand(
  context: AppContext,
  client: RepositoryClient,
  args: string[],
): Promise<void> {
  const name = args[0]
  if (!name) {
    throw new ConfigurationError('Usage: commit-digest releases <repository>')
  }

  const repository = resolveRepository(context.config, name)
  const keyword = context.config.releaseKeyword
  const releases = filterReleasesByKeyword(await client.listReleases(repository), keyword)

  if (releases.length === 0) {
    console.log(`No releases matching "${keyword}" in ${repository.owner}/${repository.name}`)
    return
  }

  console.log(`Releases matching "${keyword}" in ${repository.owner}/${repository.name}:`)
  for (const release of releases) {
    console.log(`  ${formatRelease(release)}`)
  }
}
