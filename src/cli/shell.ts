import { createInterface } from 'node:readline'

import chalk from 'chalk'

import type { ToolBridgeClient } from '../core/client.js'
import { errorMessage } from '../core/logger.js'
import type { Logger } from '../core/types.js'

export type ShellClient = Pick<ToolBridgeClient, 'processQuery' | 'listTools'>

export interface ShellIO {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

export const QUIT_COMMAND = 'quit'
export const TOOLS_COMMAND = 'tools'

/**
 * Interactive read-eval loop. Returns on `quit`, end of input or Ctrl+C;
 * cleanup is left to the caller.
 */
export async function runShell(client: ShellClient, io: ShellIO, logger: Logger): Promise<void> {
  const write = (text: string): void => {
    io.output.write(`${text}\n`)
  }

  const rl = createInterface({ input: io.input, output: io.output })
  rl.on('SIGINT', () => rl.close())

  write(chalk.bold('MCP client started.'))
  write(`Type your queries, '${TOOLS_COMMAND}' to list tools, or '${QUIT_COMMAND}' to exit.`)
  rl.setPrompt('> ')
  rl.prompt()

  for await (const line of rl) {
    const query = line.trim()
    if (query.toLowerCase() === QUIT_COMMAND) break

    if (query) {
      try {
        if (query.toLowerCase() === TOOLS_COMMAND) {
          const tools = await client.listTools()
          for (const tool of tools) {
            write(`${chalk.cyan(tool.name)}: ${tool.description ?? ''}`)
          }
        } else {
          write(`\n${await client.processQuery(query)}`)
        }
      } catch (error) {
        logger.error('shell.query_failed', { error: errorMessage(error) })
        write(chalk.red(`Error: ${errorMessage(error)}`))
      }
    }

    rl.prompt()
  }

  logger.info('shell.exit')
  write('Goodbye!')
}
