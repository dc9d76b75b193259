/**
 * Validate Command
 *
 * Load the configuration and summarize what an update would do
 */

import chalk from 'chalk'
import { enabledSections, loadConfig } from '../config.js'
import { exitCodeFor, getErrorMessage, isDashboardError, EXIT_CODES } from '../errors.js'
import { planFetches } from '../orchestrator.js'

export interface ValidateCommandOptions {
  config: string
}

export async function validateCommand(options: ValidateCommandOptions): Promise<number> {
  try {
    const config = await loadConfig(options.config)
    const sections = enabledSections(config)
    const sources = planFetches(config).map(task => task.source)

    console.log(chalk.green(`${options.config} is valid`))
    console.log(chalk.gray(`  Name: ${config.manualData.name}`))
    console.log(chalk.gray(`  README: ${config.readmePath}`))
    console.log(chalk.gray(`  Sections: ${sections.length > 0 ? sections.join(', ') : 'none'}`))
    console.log(chalk.gray(`  Sources: ${sources.length > 0 ? sources.join(', ') : 'none'}`))
    return EXIT_CODES.ok
  } catch (error) {
    console.error(chalk.red(isDashboardError(error) ? error.getFullMessage() : getErrorMessage(error)))
    return exitCodeFor(error)
  }
}
