#!/usr/bin/env node
import chalk from 'chalk'

import { runCli } from './cli/main.js'
import { loadConfig } from './config/load.js'
import { createModelClient, createSessionFactory } from './core/client-factory.js'
import { errorMessage, logger, setLogLevel } from './core/logger.js'

async function main(): Promise<number> {
  const config = loadConfig()
  setLogLevel(config.logLevel)

  return runCli(process.argv.slice(2), {
    model: createModelClient(config, logger),
    openSession: createSessionFactory(config, logger),
    logger,
    io: { input: process.stdin, output: process.stdout },
    errorOutput: process.stderr,
    onShutdown: (cleanup) => {
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          logger.info('process.signal', { signal })
          void cleanup()
            .catch((error: unknown) => logger.error('process.cleanup_failed', { error: errorMessage(error) }))
            .finally(() => process.exit(0))
        })
      }
    }
  })
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), errorMessage(error))
    process.exit(1)
  })
