import { Command, Option } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { writeFileSync } from 'fs'
import { realpath } from 'fs/promises'
import { resolve } from 'path'
import { loadConfig } from '../config/loader.js'
import type { ProjmetricsConfig } from '../config/types.js'
import { collectMetrics } from '../metrics/collector.js'
import type { CollectSettings } from '../metrics/types.js'
import type { Profile } from '../profiles/types.js'
import { createReporter } from '../reporter/factory.js'
import { isReportFormat } from '../reporter/types.js'
import type { ReportFormat } from '../reporter/types.js'

export const EXCLUDE_SELF_ENV = 'PROJMETRICS_EXCLUDE_SELF'

export interface ScanCommandOptions {
  java?: boolean
  python?: boolean
  js?: boolean
  all?: boolean
  root: string
  includeHidden?: boolean
  defaultExcludes?: boolean
  excludeDir: string[]
  excludeFile: string[]
  top?: string
  onlyProfileExts?: boolean
  testRatio?: boolean
  format?: string
  output?: string
  config?: string
  concurrency?: string
  verbose?: boolean
}

export interface ScanSettings extends Omit<CollectSettings, 'selfFiles'> {
  format: ReportFormat
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value])
}

function parseCount(value: string, flag: string, min: number): number {
  const n = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < min) {
    throw new Error(`Invalid value for ${flag}: "${value}" (expected an integer >= ${min})`)
  }
  return n
}

export function pickProfile(options: ScanCommandOptions, fallback: Profile): Profile {
  if (options.java) return 'java'
  if (options.python) return 'python'
  if (options.js) return 'js'
  if (options.all) return 'all'
  return fallback
}

/**
 * Merge command-line flags over the config file defaults.
 */
export function resolveScanSettings(options: ScanCommandOptions, config: ProjmetricsConfig): ScanSettings {
  const d = config.defaults

  const format = options.format ?? d.format
  if (!isReportFormat(format)) {
    throw new Error(`Unknown format: ${format} (expected text, markdown or json)`)
  }

  return {
    root: resolve(options.root),
    profile: pickProfile(options, d.profile),
    includeHidden: options.includeHidden || d.include_hidden,
    defaultExcludes: options.defaultExcludes === false ? false : d.default_excludes,
    excludeDirs: [...new Set([...d.exclude_dirs, ...options.excludeDir])],
    onlyProfileExts: options.onlyProfileExts || d.only_profile_exts,
    testRatio: options.testRatio || d.test_ratio,
    top: options.top !== undefined ? parseCount(options.top, '--top', 0) : d.top,
    concurrency: options.concurrency !== undefined
      ? parseCount(options.concurrency, '--concurrency', 1)
      : d.concurrency,
    format
  }
}

/**
 * Resolve the tool's own files to absolute real paths so the walker can
 * leave them out. Entries that are empty or missing still resolve lexically.
 */
export async function resolveSelfFiles(candidates: Array<string | undefined>): Promise<Set<string>> {
  const files = new Set<string>()
  for (const candidate of candidates) {
    const trimmed = candidate?.trim()
    if (!trimmed) continue
    const absolute = resolve(trimmed)
    try {
      files.add(await realpath(absolute))
    } catch {
      files.add(absolute)
    }
  }
  return files
}

export const scanCommand = new Command('scan')
  .description('Count files, bytes and lines (code, comment, blank) under a directory')
  .addOption(new Option('--java', 'Java profile').conflicts(['python', 'js', 'all']))
  .addOption(new Option('--python', 'Python profile').conflicts(['java', 'js', 'all']))
  .addOption(new Option('--js', 'JavaScript/TypeScript profile').conflicts(['java', 'python', 'all']))
  .addOption(new Option('--all', 'All extensions (default)').conflicts(['java', 'python', 'js']))
  .option('--root <dir>', 'Directory to scan', '.')
  .option('--include-hidden', 'Include hidden files and directories')
  .option('--no-default-excludes', 'Do not skip node_modules, .git, build output and similar')
  .option('--exclude-dir <name>', 'Skip directories with this name (repeatable)', collect, [])
  .option('--exclude-file <path>', 'Never count this file (repeatable)', collect, [])
  .option('--top <n>', 'Entries in the largest/longest lists')
  .option('--only-profile-exts', "Count only the profile's extensions")
  .option('--test-ratio', 'Split totals into test and non-test files')
  .option('-f, --format <format>', 'Output format (text|markdown|json)')
  .option('-o, --output <file>', 'Write the report to a file instead of stdout')
  .option('-c, --config <path>', 'Path to config file')
  .option('-j, --concurrency <n>', 'Files measured in parallel')
  .option('--verbose', 'Print files skipped during the scan')
  .action(async (options: ScanCommandOptions) => {
    const spinner = ora('Loading configuration...').start()

    try {
      const config = loadConfig(options.config)
      const settings = resolveScanSettings(options, config)
      const selfFiles = await resolveSelfFiles([
        process.argv[1],
        process.env[EXCLUDE_SELF_ENV],
        ...options.excludeFile
      ])

      spinner.text = `Scanning ${settings.root}...`

      const warn = (message: string) => {
        if (!options.verbose) return
        spinner.clear()
        console.warn(chalk.dim(message))
        spinner.render()
      }

      const report = await collectMetrics({ ...settings, selfFiles }, {
        onSkip: (path, error) => warn(`⚠️  Skipped ${path} (${error.message})`),
        onUnreadable: (path, reason) => warn(`⚠️  No line counts for ${path} (${reason})`),
        onProgress: (done, total) => {
          spinner.text = `Measuring files... ${done}/${total}`
        }
      })

      spinner.succeed(`Scanned ${report.totals.files} files`)

      if (options.output) {
        const reporter = createReporter(settings.format, { color: false })
        writeFileSync(options.output, reporter.generate(report))
        console.log(chalk.green(`\n  ✓ Report saved to: ${options.output}`))
      } else {
        const reporter = createReporter(settings.format, { color: true })
        process.stdout.write(reporter.generate(report))
      }
    } catch (error) {
      spinner.fail('Error')
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exit(1)
    }
  })
