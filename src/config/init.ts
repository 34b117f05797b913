// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { dirname } from 'path'
import { getConfigPath } from './loader.js'
import { DEFAULT_SETTINGS } from './types.js'

export function generateConfig(): string {
  const d = DEFAULT_SETTINGS
  return `# projmetrics configuration
# Command-line flags override these values.

defaults:
  profile: ${d.profile}  # java | python | js | all
  top: ${d.top}  # entries in the largest/longest lists, 0 to hide them
  format: ${d.format}  # text | markdown | json
  concurrency: ${d.concurrency}  # files measured in parallel
  include_hidden: ${d.include_hidden}
  default_excludes: ${d.default_excludes}  # skip node_modules, .git, build, dist, ...
  only_profile_exts: ${d.only_profile_exts}
  test_ratio: ${d.test_ratio}
  exclude_dirs: []  # extra directory names to skip
`
}

export function initConfig(baseDir?: string): string {
  const configPath = getConfigPath(baseDir)

  if (existsSync(configPath)) {
    throw new Error(`Config already exists: ${configPath}`)
  }

  mkdirSync(dirname(configPath), { recursive: true })
  writeFileSync(configPath, generateConfig(), 'utf-8')

  return configPath
}
