/**
 * Update Command
 *
 * Fetch profile data and rewrite the managed README sections
 */

import chalk from 'chalk'
import { exitCodeFor, getErrorMessage, isDashboardError, EXIT_CODES } from '../errors.js'
import { createLogger } from '../logger.js'
import { UpdateOrchestrator } from '../orchestrator.js'
import type { UpdateOptions } from '../orchestrator.js'

export interface UpdateCommandOptions {
  config: string
  output?: string
  dryRun?: boolean
  quiet?: boolean
  verbose?: boolean
}

/**
 * Run one update. Returns the process exit code.
 */
export async function updateCommand(
  options: UpdateCommandOptions,
  overrides: Pick<UpdateOptions, 'fetch' | 'extractors'> = {}
): Promise<number> {
  const logger = createLogger({ quiet: options.quiet, verbose: options.verbose })
  const orchestrator = new UpdateOrchestrator({
    configPath: options.config,
    outputPath: options.output,
    dryRun: options.dryRun,
    githubToken: process.env.GITHUB_TOKEN || undefined,
    logger,
    ...overrides,
  })

  try {
    const result = await orchestrator.run()
    const unavailable = Object.values(result.results).filter(r => r?.status === 'unavailable').length

    if (!options.quiet) {
      console.log('')
      console.log(
        result.changed
          ? chalk.green(options.dryRun ? 'README would change' : 'README updated')
          : chalk.gray('No changes')
      )
      if (unavailable > 0) {
        console.log(chalk.yellow(`${unavailable} source(s) unavailable; placeholders rendered`))
      }
    }
    return EXIT_CODES.ok
  } catch (error) {
    logger.error(isDashboardError(error) ? error.getFullMessage() : getErrorMessage(error))
    return exitCodeFor(error)
  }
}
