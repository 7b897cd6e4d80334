// `commit-digest repos`: configured repositories, then everything the token can see

import type { AppContext } from '../../config/types.ts'
import { listRepositoryNames, resolveRepository } from '../../config/config.ts'
import type { RepositoryClient } from '../../github/types.ts'

export async function handleReposCommand(context: AppContext, client: RepositoryClient): Promise<void> {
  const { config } = context

  console.log(`Configured (${context.configPath}):`)
  const names = listRepositoryNames(config)
  if (names.length === 0) {
    console.log('  (none)')
  }
  for (const name of names) {
    const repo = resolveRepository(config, name)
    console.log(`  ${name}  ${repo.owner}/${repo.name}@${repo.defaultBranch}`)
  }
  for (const [name, reason] of Object.entries(config.invalidRepositories)) {
    console.log(`  ${name}  [invalid] ${reason}`)
  }

  const remote = await client.listRepositories()
  console.log(`\nAccessible on GitHub (${remote.length}):`)
  for (const repo of remote) {
    const visibility = repo.private ? ' (private)' : ''
    console.log(`  ${repo.fullName}${visibility}${repo.description ? ` - ${repo.description}` : ''}`)
  }
}
