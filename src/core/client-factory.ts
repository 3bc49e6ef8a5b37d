import type { ToolBridgeConfig } from '../config/schema.js'
import type { ModelClient } from './model-client.js'
import { OllamaModelClient } from './ollama-client.js'
import { McpToolSession } from './tool-session.js'
import type { Logger, ToolSession } from './types.js'

export type SessionFactory = (scriptPath: string) => Promise<ToolSession>

export function createModelClient(config: ToolBridgeConfig, logger: Logger): ModelClient {
  return new OllamaModelClient(
    { model: config.model, host: config.ollamaHost, timeoutMs: config.modelTimeoutMs },
    logger
  )
}

export function createSessionFactory(config: ToolBridgeConfig, logger: Logger): SessionFactory {
  return (scriptPath) =>
    McpToolSession.connect(scriptPath, {
      runners: config.runners,
      requestTimeoutMs: config.toolTimeoutMs,
      logger
    })
}
