export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

export interface ToolInputSchema {
  properties?: Record<string, unknown>
  required?: string[]
}

/** Metadata for one tool advertised by the provider. */
export interface ToolDescriptor {
  name: string
  description?: string
  inputSchema: ToolInputSchema
}

export interface ToolInvocationRequest {
  name: string
  arguments: Record<string, unknown>
}

export type ToolOutcome = { ok: true; payload: unknown } | { ok: false; error: string }

export interface UserMessage {
  role: 'user'
  content: string
}

export interface AssistantMessage {
  role: 'assistant'
  content: string
  toolCalls?: ToolInvocationRequest[]
}

export interface ToolMessage {
  role: 'tool'
  toolName: string
  content: string
}

export type Message = UserMessage | AssistantMessage | ToolMessage

/** Function-style tool schema entry handed to the model backend. */
export interface ModelTool {
  type: 'function'
  function: {
    name: string
    description: string
    parameters: {
      type: 'object'
      properties: Record<string, unknown>
      required: string[]
    }
  }
}

/**
 * Live channel to a tool provider. Implemented over MCP by `McpToolSession`.
 */
export interface ToolSession {
  listTools(): Promise<ToolDescriptor[]>
  callTool(name: string, args: Record<string, unknown>): Promise<ToolOutcome>
  close(): Promise<void>
}
