import { describe, it, expect } from 'vitest'
import { parseCliArgs } from './args.ts'

describe('parseCliArgs', () => {
  it('reads the command and positionals', () => {
    expect(parseCliArgs(['releases', 'widgets'])).toEqual({
      success: true,
      options: { command: 'releases', positionals: ['widgets'], debug: false },
    })
  })

  it('reads flags in either form and anywhere', () => {
    const result = parseCliArgs(['--config', 'team.yaml', 'serve', '--port=8080', '-d'])
    expect(result).toEqual({
      success: true,
      options: { command: 'serve', positionals: [], configPath: 'team.yaml', port: 8080, debug: true },
    })
  })

  it('treats no arguments as no command', () => {
    const result = parseCliArgs([])
    expect(result.success && result.options.command).toBeUndefined()
  })

  it('requires a value for --config', () => {
    expect(parseCliArgs(['start', '--config'])).toEqual({ success: false, error: '--config requires a value' })
  })

  it('rejects a bad port', () => {
    expect(parseCliArgs(['serve', '--port', 'http'])).toEqual({ success: false, error: 'Invalid port: http' })
  })
})
