import { config as loadEnv } from 'dotenv'

import { configSchema, type ToolBridgeConfig } from './schema.js'

/** Reads a numeric env value, leaving unparsable input for the schema to reject. */
function parseNumber(input: string | undefined, fallback: number): number {
  if (input === undefined || input.trim() === '') return fallback
  return Number(input)
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolBridgeConfig {
  loadEnv({ quiet: true })

  return configSchema.parse({
    model: env.TOOLBRIDGE_MODEL ?? 'gpt-oss:20b',
    ollamaHost: env.OLLAMA_HOST ?? 'http://127.0.0.1:11434',
    runners: {
      python: env.TOOLBRIDGE_PYTHON_COMMAND ?? 'python',
      node: env.TOOLBRIDGE_NODE_COMMAND ?? 'node'
    },
    toolTimeoutMs: parseNumber(env.TOOLBRIDGE_TOOL_TIMEOUT_MS, 60_000),
    modelTimeoutMs: parseNumber(env.TOOLBRIDGE_MODEL_TIMEOUT_MS, 120_000),
    logLevel: env.TOOLBRIDGE_LOG_LEVEL ?? 'info'
  })
}
