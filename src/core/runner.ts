import { extname } from 'node:path'

import { UnsupportedScriptKindError } from './errors.js'

export interface RunnerCommands {
  python: string
  node: string
}

export interface RunnerSpec {
  command: string
  args: string[]
}

/**
 * Maps a tool-provider script to the command that runs it, keyed on file suffix.
 */
export function resolveRunner(scriptPath: string, commands: RunnerCommands): RunnerSpec {
  const suffix = extname(scriptPath).toLowerCase()
  if (suffix === '.py') return { command: commands.python, args: [scriptPath] }
  if (suffix === '.js') return { command: commands.node, args: [scriptPath] }
  throw new UnsupportedScriptKindError(scriptPath)
}
