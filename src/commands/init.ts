/**
 * Init Command
 *
 * Write a starter dashboard_config.yaml
 */

import { existsSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import chalk from 'chalk'
import { DEFAULT_CONFIG_TEMPLATE } from '../config.js'
import { EXIT_CODES, getErrorMessage } from '../errors.js'

export interface InitCommandOptions {
  config: string
  force?: boolean
}

export async function initCommand(options: InitCommandOptions): Promise<number> {
  if (existsSync(options.config) && !options.force) {
    console.log(chalk.yellow(`${options.config} already exists (use --force to overwrite)`))
    return EXIT_CODES.ok
  }

  try {
    await writeFile(options.config, DEFAULT_CONFIG_TEMPLATE, 'utf-8')
  } catch (error) {
    console.error(chalk.red(`Failed to write ${options.config}: ${getErrorMessage(error)}`))
    return EXIT_CODES.fileSystem
  }

  console.log(chalk.green(`Created ${options.config}`))
  console.log(chalk.gray('Edit manual_data and profiles, then run: profile-readme update'))
  return EXIT_CODES.ok
}
