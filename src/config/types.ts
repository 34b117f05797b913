// src/config/types.ts
import type { Profile } from '../profiles/types.js'
import type { ReportFormat } from '../reporter/types.js'

export interface DefaultsConfig {
  profile: Profile
  top: number
  format: ReportFormat
  concurrency: number
  include_hidden: boolean
  default_excludes: boolean
  only_profile_exts: boolean
  test_ratio: boolean
  exclude_dirs: string[]
}

export interface ProjmetricsConfig {
  defaults: DefaultsConfig
}

export const DEFAULT_SETTINGS: DefaultsConfig = {
  profile: 'all',
  top: 10,
  format: 'text',
  concurrency: 8,
  include_hidden: false,
  default_excludes: true,
  only_profile_exts: false,
  test_ratio: false,
  exclude_dirs: []
}
