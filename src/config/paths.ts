// Path utilities for commit-digest
import { homedir } from 'os'
import { isAbsolute, join, resolve } from 'path'

export const CONFIG_FILE_NAME = 'commit-digest.yaml'

export function getConfigDir(): string {
  return join(homedir(), '.commit-digest')
}

export function getLogsDir(): string {
  return join(getConfigDir(), 'logs')
}

/**
 * Config lookup order: explicit path, then ./commit-digest.yaml
 */
export function getConfigPath(explicitPath?: string, cwd = process.cwd()): string {
  if (explicitPath) {
    return isAbsolute(explicitPath) ? explicitPath : resolve(cwd, explicitPath)
  }
  return join(cwd, CONFIG_FILE_NAME)
}

/**
 * Resolve the transcripts directory relative to the config file's folder.
 */
export function resolveTranscriptsDir(transcriptsDir: string, configPath: string): string {
  if (isAbsolute(transcriptsDir)) {
    return transcriptsDir
  }
  return resolve(configPath, '..', transcriptsDir)
}

/**
 * Convert a tag or reference into a safe filename fragment
 */
export function sanitizeFilename(value: string): string {
  return value.replace(/[/\\]/g, '_').replace(/[^A-Za-z0-9._-]/g, '-')
}
