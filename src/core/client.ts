import type { SessionFactory } from './client-factory.js'
import { ToolBridgeError, ToolListingError } from './errors.js'
import { errorMessage } from './logger.js'
import type { ModelClient } from './model-client.js'
import { QueryOrchestrator } from './orchestrator.js'
import type { Logger, ToolDescriptor, ToolSession } from './types.js'

export const NOT_CONNECTED_REPLY = 'Error: Not connected to a server.'

/**
 * Owns at most one tool session and answers queries against it.
 */
export class ToolBridgeClient {
  private session: ToolSession | null = null

  constructor(
    private readonly model: ModelClient,
    private readonly openSession: SessionFactory,
    private readonly logger: Logger
  ) {
    this.logger.info('client.created', { model: model.model })
  }

  get connected(): boolean {
    return this.session !== null
  }

  /** Starts the provider and returns its initial catalog. */
  async connect(scriptPath: string): Promise<ToolDescriptor[]> {
    if (this.session) throw new ToolBridgeError('Client is already connected to a server')
    this.session = await this.openSession(scriptPath)

    const tools = await this.listTools()
    this.logger.info('client.connected', { tools: tools.map((tool) => tool.name) })
    return tools
  }

  async listTools(): Promise<ToolDescriptor[]> {
    if (!this.session) throw new ToolBridgeError(NOT_CONNECTED_REPLY)
    try {
      return await this.session.listTools()
    } catch (error) {
      throw new ToolListingError(`Failed to list tools: ${errorMessage(error)}`, error)
    }
  }

  async processQuery(query: string): Promise<string> {
    if (!this.session) return NOT_CONNECTED_REPLY
    return new QueryOrchestrator(this.session, this.model, this.logger).run(query)
  }

  async cleanup(): Promise<void> {
    const session = this.session
    if (!session) return
    this.session = null
    this.logger.info('client.cleanup')
    await session.close()
  }
}
