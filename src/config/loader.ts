// src/config/loader.ts
import { readFileSync, existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import { parse } from 'yaml'
import { isProfile } from '../profiles/types.js'
import { isReportFormat } from '../reporter/types.js'
import { DEFAULT_SETTINGS } from './types.js'
import type { DefaultsConfig, ProjmetricsConfig } from './types.js'

export function getConfigPath(baseDir?: string): string {
  return join(baseDir || homedir(), '.projmetrics', 'config.yaml')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(key: string, expected: string): Error {
  return new Error(`Invalid config value for defaults.${key}: expected ${expected}`)
}

function readCount(raw: Record<string, unknown>, key: string, min: number, fallback: number): number {
  const value = raw[key]
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalid(key, `an integer >= ${min}`)
  }
  return value
}

function readFlag(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key]
  if (value === undefined) return fallback
  if (typeof value !== 'boolean') throw invalid(key, 'true or false')
  return value
}

function parseDefaults(raw: unknown): DefaultsConfig {
  if (raw === undefined || raw === null) return { ...DEFAULT_SETTINGS, exclude_dirs: [] }
  if (!isRecord(raw)) throw new Error('Invalid config: "defaults" must be a mapping')

  const profile = raw.profile ?? DEFAULT_SETTINGS.profile
  if (typeof profile !== 'string' || !isProfile(profile)) {
    throw invalid('profile', 'one of java, python, js, all')
  }

  const format = raw.format ?? DEFAULT_SETTINGS.format
  if (typeof format !== 'string' || !isReportFormat(format)) {
    throw invalid('format', 'one of text, markdown, json')
  }

  const excludeDirs = raw.exclude_dirs ?? []
  if (!Array.isArray(excludeDirs) || !excludeDirs.every((d): d is string => typeof d === 'string')) {
    throw invalid('exclude_dirs', 'a list of directory names')
  }

  return {
    profile,
    format,
    top: readCount(raw, 'top', 0, DEFAULT_SETTINGS.top),
    concurrency: readCount(raw, 'concurrency', 1, DEFAULT_SETTINGS.concurrency),
    include_hidden: readFlag(raw, 'include_hidden', DEFAULT_SETTINGS.include_hidden),
    default_excludes: readFlag(raw, 'default_excludes', DEFAULT_SETTINGS.default_excludes),
    only_profile_exts: readFlag(raw, 'only_profile_exts', DEFAULT_SETTINGS.only_profile_exts),
    test_ratio: readFlag(raw, 'test_ratio', DEFAULT_SETTINGS.test_ratio),
    exclude_dirs: excludeDirs
  }
}

/**
 * Load the YAML config. An explicit path must exist; without one the
 * per-user file is used when present, built-in defaults otherwise.
 */
export function loadConfig(configPath?: string, baseDir?: string): ProjmetricsConfig {
  const path = configPath || getConfigPath(baseDir)

  if (!existsSync(path)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`)
    }
    return { defaults: { ...DEFAULT_SETTINGS, exclude_dirs: [] } }
  }

  let parsed: unknown
  try {
    parsed = parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to parse config ${path}: ${reason}`)
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return { defaults: { ...DEFAULT_SETTINGS, exclude_dirs: [] } }
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config ${path}: expected a mapping at the top level`)
  }

  return { defaults: parseDefaults(parsed.defaults) }
}
