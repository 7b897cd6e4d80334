#!/usr/bin/env tsx
import { render } from 'ink'
import React from 'react'
import { userInfo } from 'os'
import { App } from '../ui/App.tsx'
import { debugLog } from '../debug/logger.ts'
import { bootstrapContext } from '../config/context.ts'
import { resolveTranscriptsDir } from '../config/paths.ts'
import type { AppContext } from '../config/types.ts'
import { createGitHubClient } from '../github/client.ts'
import { createSummarizer } from '../ai/summarizer.ts'
import { createSessionController } from '../core/session/index.ts'
import { FileTranscriptSink } from '../core/transcript/index.ts'
import { errorMessage, isDigestError } from '../core/errors.ts'
import { parseCliArgs, type CliOptions } from './args.ts'
import { handleReposCommand } from './commands/repos.ts'
import { handleReleasesCommand } from './commands/releases.ts'
import { handleServeCommand } from './commands/serve.ts'

const VERSION = '0.1.0'

function showHelp() {
  console.log(`
commit-digest - summarize GitHub commits with an LLM

Usage:
  commit-digest start              Interactive review session (TUI)
  commit-digest serve              Start the HTTP API
  commit-digest repos              List configured and accessible repositories
  commit-digest releases <repo>    List releases matching the release keyword
  commit-digest help               Show this help message
  commit-digest version            Show version

Options:
  --config <path>    Config file (default: ./commit-digest.yaml)
  --port <n>         HTTP port for serve (default: server.port from config)
  --debug, -d        Show the debug log panel (TUI only)

Environment:
  GITHUB_TOKEN                      GitHub access token
  OPENAI_API_KEY / ANTHROPIC_API_KEY  Model credential (see apiKeyEnvVar)
`)
}

function showVersion() {
  console.log(`commit-digest v${VERSION}`)
}

function loadContext(options: CliOptions): AppContext {
  const { context, notice } = bootstrapContext({ path: options.configPath })
  if (notice) {
    console.log(notice)
  }
  return context
}

async function startSession(options: CliOptions): Promise<void> {
  const { context, notice } = bootstrapContext({ path: options.configPath })
  const controller = createSessionController({
    config: context.config,
    repositoryClient: createGitHubClient(context.credentials.githubToken),
    summarizer: createSummarizer(context),
    sink: new FileTranscriptSink(resolveTranscriptsDir(context.config.transcriptsDir, context.configPath)),
    user: userInfo().username,
  })

  const instance = render(
    <App controller={controller} config={context.config} notice={notice} debug={options.debug} />,
  )
  await instance.waitUntilExit()
}

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2))
  if (!parsed.success) {
    console.error(`Error: ${parsed.error}`)
    process.exit(1)
  }
  const options = parsed.options

  debugLog.enableFileLogging()
  debugLog.info('commit-digest CLI started', {
    command: options.command,
    nodeVersion: process.version,
    platform: process.platform,
  })

  switch (options.command) {
    case 'start':
      await startSession(options)
      break

    case 'serve': {
      const context = loadContext(options)
      await handleServeCommand(
        context,
        createGitHubClient(context.credentials.githubToken),
        createSummarizer(context),
        options.port,
      )
      break
    }

    case 'repos': {
      const context = loadContext(options)
      await handleReposCommand(context, createGitHubClient(context.credentials.githubToken))
      break
    }

    case 'releases': {
      const context = loadContext(options)
      await handleReleasesCommand(
        context,
        createGitHubClient(context.credentials.githubToken),
        options.positionals,
      )
      break
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp()
      break

    case 'version':
    case '--version':
    case '-v':
      showVersion()
      break

    default:
      console.log(`Unknown command: ${options.command}`)
      console.log('Run "commit-digest help" for usage information.')
      process.exit(1)
  }
}

main().catch((err: unknown) => {
  const prefix = isDigestError(err) ? `${err.kind} error` : 'Error'
  debugLog.error('CLI failed', { error: errorMessage(err) })
  console.error(`${prefix}: ${errorMessage(err)}`)
  process.exit(1)
})
