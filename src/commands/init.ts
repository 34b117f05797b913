import { Command } from 'commander'
import chalk from 'chalk'
import { initConfig } from '../config/init.js'

export const initCommand = new Command('init')
  .description('Write a default projmetrics configuration file')
  .option('-d, --dir <path>', 'Base directory for .projmetrics/config.yaml (default: home directory)')
  .action((options: { dir?: string }) => {
    try {
      const path = initConfig(options.dir)
      console.log(chalk.green(`\n✓ Config created at: ${path}`))
      console.log(chalk.dim('Edit this file to change the default profile, output format and exclusions.'))
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exit(1)
    }
  })
