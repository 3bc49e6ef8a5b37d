import chalk from 'chalk'

import { ToolBridgeClient } from '../core/client.js'
import type { SessionFactory } from '../core/client-factory.js'
import { UnsupportedScriptKindError } from '../core/errors.js'
import { errorMessage } from '../core/logger.js'
import type { ModelClient } from '../core/model-client.js'
import type { Logger } from '../core/types.js'
import { runShell, type ShellIO } from './shell.js'

export const USAGE = 'Usage: toolbridge <path_to_server_script.py|js>'

export interface CliDeps {
  model: ModelClient
  openSession: SessionFactory
  logger: Logger
  io: ShellIO
  errorOutput: NodeJS.WritableStream
  /** Receives a cleanup hook to run on process signals. */
  onShutdown?: (cleanup: () => Promise<void>) => void
}

/**
 * Connects to the provider named in argv, runs the shell and always cleans up.
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const scriptPath = argv[0]
  if (!scriptPath) {
    deps.errorOutput.write(`${USAGE}\n`)
    return 1
  }

  const client = new ToolBridgeClient(deps.model, deps.openSession, deps.logger)
  deps.onShutdown?.(() => client.cleanup())

  try {
    const tools = await client.connect(scriptPath)
    deps.io.output.write(`Connected to server with tools: ${tools.map((tool) => tool.name).join(', ')}\n`)
  } catch (error) {
    deps.logger.error('cli.connect_failed', { scriptPath, error: errorMessage(error) })
    deps.errorOutput.write(chalk.red(`Error: ${errorMessage(error)}`) + '\n')
    if (error instanceof UnsupportedScriptKindError) deps.errorOutput.write(`${USAGE}\n`)
    await client.cleanup()
    return 1
  }

  try {
    await runShell(client, deps.io, deps.logger)
    return 0
  } finally {
    await client.cleanup()
  }
}
