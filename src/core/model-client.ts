import type { Message, ModelTool, ToolInvocationRequest } from './types.js'

export interface ChatRequest {
  messages: Message[]
  /** Present on the decision call, absent on the summary call. */
  tools?: ModelTool[]
}

export interface ChatReply {
  content?: string
  toolCalls?: ToolInvocationRequest[]
}

/**
 * Shared LLM runtime contract used by the orchestration loop.
 */
export interface ModelClient {
  readonly model: string
  chat(request: ChatRequest): Promise<ChatReply>
}
