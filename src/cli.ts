#!/usr/bin/env node
/**
 * profile-readme CLI
 *
 * Usage:
 *   profile-readme update      - Refresh the managed README sections
 *   profile-readme init        - Write a starter dashboard_config.yaml
 *   profile-readme validate    - Check the configuration
 */

import { Command } from 'commander'
import { DEFAULT_CONFIG_PATH } from './config.js'
import { updateCommand } from './commands/update.js'
import { initCommand } from './commands/init.js'
import { validateCommand } from './commands/validate.js'

const program = new Command()

program
  .name('profile-readme')
  .description('Keep a personal dashboard README current with profile and GitHub data')
  .version('0.1.0')

program
  .command('update', { isDefault: true })
  .description('Fetch profile data and rewrite the managed README sections')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
  .option('-o, --output <path>', 'Output file (default: readme_path from the config)')
  .option('--dry-run', 'Render and compare without writing')
  .option('-q, --quiet', 'Only print errors')
  .option('-v, --verbose', 'Print retry and state details')
  .action(async (options) => {
    process.exitCode = await updateCommand(options)
  })

program
  .command('init')
  .description('Write a starter configuration file')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options) => {
    process.exitCode = await initCommand(options)
  })

program
  .command('validate')
  .description('Check the configuration and list what an update would fetch')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH)
  .action(async (options) => {
    process.exitCode = await validateCommand(options)
  })

program.on('--help', () => {
  console.log('')
  console.log('Examples:')
  console.log('  $ profile-readme                         # Update README.md from dashboard_config.yaml')
  console.log('  $ profile-readme update --dry-run        # Show whether the README would change')
  console.log('  $ profile-readme init                    # Create dashboard_config.yaml')
  console.log('  $ profile-readme validate -c other.yaml  # Check another configuration')
  console.log('')
})

await program.parseAsync()
