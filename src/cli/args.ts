// Command line parsing for the commit-digest CLI

export type CliOptions = {
  command: string | undefined
  positionals: string[]
  configPath?: string
  port?: number
  debug: boolean
}

export type ParseCliResult =
  | { success: true; options: CliOptions }
  | { success: false; error: string }

const VALUE_FLAGS = new Set(['--config', '--port'])

export function parseCliArgs(args: string[]): ParseCliResult {
  const positionals: string[] = []
  let configPath: string | undefined
  let port: number | undefined
  let debug = false

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''

    if (arg === '--debug' || arg === '-d') {
      debug = true
      continue
    }

    // --flag=value
    const eq = arg.indexOf('=')
    const name = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg
    if (!VALUE_FLAGS.has(name)) {
      positionals.push(arg)
      continue
    }

    const value = eq !== -1 && name !== arg ? arg.slice(eq + 1) : args[++i]
    if (value === undefined || value === '') {
      return { success: false, error: `${name} requires a value` }
    }

    if (name === '--config') {
      configPath = value
    } else {
      const parsed = Number(value)
      if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
        return { success: false, error: `Invalid port: ${value}` }
      }
      port = parsed
    }
  }

  return {
    success: true,
    options: { command: positionals[0], positionals: positionals.slice(1), configPath, port, debug },
  }
}
