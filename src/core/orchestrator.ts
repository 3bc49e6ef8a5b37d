import { Conversation } from './conversation.js'
import { ModelCallError, ToolListingError } from './errors.js'
import { errorMessage } from './logger.js'
import type { ChatReply, ChatRequest, ModelClient } from './model-client.js'
import { adaptTools } from './tool-catalog.js'
import type { Logger, ModelTool, ToolInvocationRequest, ToolOutcome, ToolSession } from './types.js'

export const EMPTY_REPLY_PLACEHOLDER = 'Sorry, I received no content.'

/** Objects and arrays become JSON; everything else goes through `String`. */
export function renderPayload(payload: unknown): string {
  if (payload !== null && typeof payload === 'object') return JSON.stringify(payload)
  return String(payload)
}

interface ToolRecord {
  /** Content of the `tool` message shown to the model. */
  content: string
  /** Line for the user-facing report. */
  report: string
}

function recordOutcome(name: string, outcome: ToolOutcome): ToolRecord {
  if (outcome.ok) {
    const content = renderPayload(outcome.payload)
    return { content, report: `[Tool '${name}' returned: ${content}]` }
  }
  const content = `Error calling tool '${name}': ${outcome.error}`
  return { content, report: `[${content}]` }
}

/**
 * Drives one query through decision call, sequential tool dispatch and summary
 * call. Makes one model call when the model answers directly, two otherwise.
 */
export class QueryOrchestrator {
  constructor(
    private readonly session: ToolSession,
    private readonly model: ModelClient,
    private readonly logger: Logger
  ) {}

  async run(query: string): Promise<string> {
    const conversation = new Conversation([{ role: 'user', content: query }])
    const tools = await this.loadTools()

    this.logger.info('query.decision', { model: this.model.model, tools: tools.length })
    const decision = await this.chat('decision', { messages: conversation.snapshot(), tools })
    const toolCalls = decision.toolCalls ?? []
    conversation.append({ role: 'assistant', content: decision.content ?? '', toolCalls: decision.toolCalls })

    if (toolCalls.length === 0) {
      this.logger.info('query.direct_reply')
      return decision.content || EMPTY_REPLY_PLACEHOLDER
    }

    const report: string[] = []
    for (const call of toolCalls) {
      const record = recordOutcome(call.name, await this.invoke(call))
      conversation.append({ role: 'tool', toolName: call.name, content: record.content })
      report.push(record.report)
    }

    this.logger.info('query.summary', { toolCalls: toolCalls.length })
    const summary = await this.chat('summary', { messages: conversation.snapshot() })

    return `${report.join('\n')}\n\n${summary.content ?? ''}`
  }

  private async loadTools(): Promise<ModelTool[]> {
    try {
      return adaptTools(await this.session.listTools())
    } catch (error) {
      throw new ToolListingError(`Failed to list tools: ${errorMessage(error)}`, error)
    }
  }

  private async chat(stage: 'decision' | 'summary', request: ChatRequest): Promise<ChatReply> {
    try {
      return await this.model.chat(request)
    } catch (error) {
      throw new ModelCallError(stage, `Model ${stage} call failed: ${errorMessage(error)}`, error)
    }
  }

  private async invoke(call: ToolInvocationRequest): Promise<ToolOutcome> {
    this.logger.info('query.tool_call', { tool: call.name, args: call.arguments })
    let outcome: ToolOutcome
    try {
      outcome = await this.session.callTool(call.name, call.arguments)
    } catch (error) {
      outcome = { ok: false, error: errorMessage(error) }
    }
    if (!outcome.ok) {
      this.logger.error('query.tool_failed', { tool: call.name, error: outcome.error })
    }
    return outcome
  }
}
