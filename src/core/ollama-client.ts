import {
  Ollama,
  type ChatRequest as OllamaChatRequest,
  type ChatResponse,
  type Message as OllamaMessage,
  type Tool as OllamaTool
} from 'ollama'

import { withDeadline } from './deadline.js'
import type { ChatReply, ChatRequest, ModelClient } from './model-client.js'
import type { Logger, Message, ModelTool, ToolInvocationRequest } from './types.js'

/** The slice of the Ollama client this adapter calls; lets tests pass a fake. */
export interface OllamaChat {
  chat(request: OllamaChatRequest & { stream?: false }): Promise<Pick<ChatResponse, 'message'>>
}

type OllamaProperty = NonNullable<NonNullable<OllamaTool['function']['parameters']>['properties']>[string]

export interface OllamaModelClientOptions {
  model: string
  host: string
  timeoutMs: number
  client?: OllamaChat
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string')
}

function toOllamaProperty(schema: unknown): OllamaProperty {
  const property: OllamaProperty = {}
  if (!isRecord(schema)) return property
  if (typeof schema.type === 'string' || isStringArray(schema.type)) property.type = schema.type
  if (schema.items !== undefined) property.items = schema.items
  if (typeof schema.description === 'string') property.description = schema.description
  if (Array.isArray(schema.enum)) property.enum = schema.enum
  return property
}

export function toOllamaTool(tool: ModelTool): OllamaTool {
  const properties: Record<string, OllamaProperty> = {}
  for (const [key, schema] of Object.entries(tool.function.parameters.properties)) {
    properties[key] = toOllamaProperty(schema)
  }

  return {
    type: 'function',
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: {
        type: 'object',
        required: tool.function.parameters.required,
        properties
      }
    }
  }
}

// Ollama correlates tool results with calls by position, so tool messages carry no id.
export function toOllamaMessage(message: Message): OllamaMessage {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content }
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls?.map((call) => ({
          function: { name: call.name, arguments: call.arguments }
        }))
      }
    case 'tool':
      return { role: 'tool', content: message.content }
  }
}

/**
 * Chat backend over a local Ollama server.
 */
export class OllamaModelClient implements ModelClient {
  readonly model: string
  private readonly client: OllamaChat
  private readonly timeoutMs: number

  constructor(
    options: OllamaModelClientOptions,
    private readonly logger: Logger
  ) {
    this.model = options.model
    this.timeoutMs = options.timeoutMs
    this.client = options.client ?? new Ollama({ host: options.host })
  }

  async chat(request: ChatRequest): Promise<ChatReply> {
    const chatRequest: OllamaChatRequest & { stream: false; messages: OllamaMessage[] } = {
      model: this.model,
      messages: request.messages.map(toOllamaMessage),
      stream: false
    }
    if (request.tools) chatRequest.tools = request.tools.map(toOllamaTool)

    this.logger.debug('ollama.chat', { model: this.model, messages: chatRequest.messages.length, tools: request.tools?.length ?? 0 })
    const response = await withDeadline(this.client.chat(chatRequest), this.timeoutMs, `Model '${this.model}'`)

    const toolCalls: ToolInvocationRequest[] = (response.message.tool_calls ?? []).map((call) => ({
      name: call.function.name,
      arguments: call.function.arguments ?? {}
    }))

    return {
      content: response.message.content || undefined,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined
    }
  }
}
