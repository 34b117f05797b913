#!/usr/bin/env node
import { Command } from 'commander'
import { scanCommand } from './commands/scan.js'
import { initCommand } from './commands/init.js'

const program = new Command()

program
  .name('projmetrics')
  .description('Project metrics: files, bytes and lines of code with comment heuristics')
  .version('0.1.0')

program.addCommand(scanCommand, { isDefault: true })
program.addCommand(initCommand)

await program.parseAsync()
