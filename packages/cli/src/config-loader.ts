import {
  ConfigValidationError,
  type EngineConfig,
  engineConfigOverridesSchema,
  loadEngineConfig,
} from '@metaeval/core'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'

/**
 * Error thrown when a configuration file can't be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Expands `${VAR_NAME}` references in a string. Unset variables expand to ''.
 */
export function expandEnvironmentVariables(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] ?? '')
}

/**
 * Recursively expands environment variables in every string of a parsed JSON value
 */
function expandObjectEnvironmentVariables(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return expandEnvironmentVariables(obj, env)
  }

  if (Array.isArray(obj)) {
    return obj.map(item => expandObjectEnvironmentVariables(item, env))
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value, env)
    }
    return expanded
  }

  return obj
}

/**
 * Loads the engine configuration: defaults, then environment, then an optional JSON file
 * @param configPath Path to a JSON file of overrides (absolute or relative)
 * @throws ConfigLoadError if the file can't be read or isn't JSON
 * @throws ConfigValidationError if the merged configuration is invalid
 */
export async function loadCliConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  if (!configPath) {
    return loadEngineConfig({}, env)
  }

  const resolvedPath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath)

  if (!existsSync(resolvedPath)) {
    throw new ConfigLoadError(
      `Configuration file not found: ${resolvedPath}`,
      resolvedPath
    )
  }

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  let parsedConfig: unknown
  try {
    parsedConfig = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  const result = engineConfigOverridesSchema.safeParse(expandObjectEnvironmentVariables(parsedConfig, env))
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    )
  }

  return loadEngineConfig(result.data, env)
}
