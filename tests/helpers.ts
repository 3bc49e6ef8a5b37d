import { vi } from 'vitest'

import type { ChatReply, ChatRequest, ModelClient } from '../src/core/model-client.js'
import type { Message, ToolDescriptor, ToolOutcome, ToolSession } from '../src/core/types.js'

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

export function descriptor(name: string, description = `${name} tool`): ToolDescriptor {
  return {
    name,
    description,
    inputSchema: { properties: { a: { type: 'number' } }, required: ['a'] }
  }
}

type ToolHandler = (args: Record<string, unknown>) => ToolOutcome | Promise<ToolOutcome>

/** In-memory tool provider keyed by tool name. */
export class FakeToolSession implements ToolSession {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = []
  listCount = 0
  closed = false
  listError: Error | null = null

  constructor(private readonly tools: Record<string, { descriptor: ToolDescriptor; handler: ToolHandler }> = {}) {}

  static with(handlers: Record<string, ToolHandler>): FakeToolSession {
    const tools: Record<string, { descriptor: ToolDescriptor; handler: ToolHandler }> = {}
    for (const [name, handler] of Object.entries(handlers)) {
      tools[name] = { descriptor: descriptor(name), handler }
    }
    return new FakeToolSession(tools)
  }

  async listTools(): Promise<ToolDescriptor[]> {
    this.listCount += 1
    if (this.listError) throw this.listError
    return Object.values(this.tools).map((tool) => tool.descriptor)
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    this.calls.push({ name, args })
    const tool = this.tools[name]
    if (!tool) return { ok: false, error: `Unknown tool: ${name}` }
    return tool.handler(args)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/** Model stand-in that replays scripted replies and records every request. */
export class ScriptedModel implements ModelClient {
  readonly model = 'test-model'
  readonly requests: ChatRequest[] = []

  constructor(private readonly replies: Array<ChatReply | Error>) {}

  async chat(request: ChatRequest): Promise<ChatReply> {
    this.requests.push({ ...request, messages: [...request.messages] })
    const reply = this.replies.shift()
    if (reply === undefined) throw new Error('No scripted reply left')
    if (reply instanceof Error) throw reply
    return reply
  }
}

export function toolContents(messages: Message[]): string[] {
  return messages.flatMap((message) => (message.role === 'tool' ? [message.content] : []))
}
