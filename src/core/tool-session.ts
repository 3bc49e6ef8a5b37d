import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { CallToolResultSchema, type CallToolResult, type Tool } from '@modelcontextprotocol/sdk/types.js'

import { HandshakeError, ProcessLaunchError, SessionClosedError } from './errors.js'
import { errorMessage } from './logger.js'
import { resolveRunner, type RunnerCommands } from './runner.js'
import type { Logger, ToolDescriptor, ToolOutcome, ToolSession } from './types.js'

export const CLIENT_INFO = { name: 'toolbridge', version: '0.1.0' }

export interface ToolSessionOptions {
  /** Upper bound for each MCP request (listing, call). */
  requestTimeoutMs: number
}

export interface ConnectOptions extends ToolSessionOptions {
  runners: RunnerCommands
  logger: Logger
}

function toDescriptor(tool: Tool): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      properties: tool.inputSchema.properties,
      required: tool.inputSchema.required
    }
  }
}

/** Node reports a runner that could not be started as a system error from a spawn syscall. */
export function isSpawnFailure(error: unknown): boolean {
  if (!(error instanceof Error) || !('syscall' in error)) return false
  return typeof error.syscall === 'string' && error.syscall.startsWith('spawn')
}

function textBlocks(result: CallToolResult): string[] {
  return result.content.flatMap((block) => (block.type === 'text' ? [block.text] : []))
}

/** All-text content collapses to its text; otherwise structured content, then raw blocks. */
function payloadOf(result: CallToolResult): unknown {
  const texts = textBlocks(result)
  if (result.content.length > 0 && texts.length === result.content.length) return texts.join('\n')
  if (result.structuredContent !== undefined) return result.structuredContent
  return result.content
}

function failureText(result: CallToolResult): string {
  const texts = textBlocks(result)
  return texts.length > 0 ? texts.join('\n') : JSON.stringify(result.content)
}

/**
 * MCP session over a connected client. Listing refreshes the name lookup that
 * `callTool` validates against; calls never throw.
 */
export class McpToolSession implements ToolSession {
  private catalog: Map<string, ToolDescriptor> | null = null
  private closed = false

  constructor(
    private readonly client: Client,
    private readonly logger: Logger,
    private readonly options: ToolSessionOptions
  ) {}

  /**
   * Launches the provider script as a subprocess and completes the MCP handshake.
   */
  static async connect(scriptPath: string, options: ConnectOptions): Promise<McpToolSession> {
    const { command, args } = resolveRunner(scriptPath, options.runners)
    const transport = new StdioClientTransport({ command, args, stderr: 'pipe' })
    transport.stderr?.on('data', (chunk: Buffer) => {
      const line = chunk.toString().trim()
      if (line) options.logger.debug('session.stderr', { line })
    })

    const client = new Client(CLIENT_INFO)
    options.logger.info('session.starting', { command, args })

    try {
      await client.connect(transport, { timeout: options.requestTimeoutMs })
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        options.logger.warn('session.close_failed', { error: errorMessage(closeError) })
      })
      if (isSpawnFailure(error)) {
        throw new ProcessLaunchError(`Failed to start '${command} ${scriptPath}': ${errorMessage(error)}`, error)
      }
      throw new HandshakeError(`Handshake with '${scriptPath}' failed: ${errorMessage(error)}`, error)
    }

    options.logger.info('session.connected', { server: client.getServerVersion()?.name ?? null })
    return new McpToolSession(client, options.logger, options)
  }

  get isClosed(): boolean {
    return this.closed
  }

  async listTools(): Promise<ToolDescriptor[]> {
    if (this.closed) throw new SessionClosedError()

    const descriptors: ToolDescriptor[] = []
    let cursor: string | undefined
    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined, {
        timeout: this.options.requestTimeoutMs
      })
      descriptors.push(...page.tools.map(toDescriptor))
      cursor = page.nextCursor
    } while (cursor)

    this.catalog = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]))
    return descriptors
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    try {
      if (this.closed) throw new SessionClosedError()
      const catalog = this.catalog ?? new Map((await this.listTools()).map((tool) => [tool.name, tool]))
      if (!catalog.has(name)) {
        return { ok: false, error: `Unknown tool: ${name}` }
      }

      const raw = await this.client.callTool({ name, arguments: args }, undefined, {
        timeout: this.options.requestTimeoutMs
      })
      const parsed = CallToolResultSchema.safeParse(raw)
      if (!parsed.success) {
        return { ok: false, error: `Malformed result from tool: ${name}` }
      }
      if (parsed.data.isError) {
        return { ok: false, error: failureText(parsed.data) }
      }
      return { ok: true, payload: payloadOf(parsed.data) }
    } catch (error) {
      this.logger.warn('session.call_failed', { tool: name, error: errorMessage(error) })
      return { ok: false, error: errorMessage(error) }
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.catalog = null
    await this.client.close()
    this.logger.info('session.closed')
  }
}
