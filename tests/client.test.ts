import { describe, expect, it, vi } from 'vitest'

import { NOT_CONNECTED_REPLY, ToolBridgeClient } from '../src/core/client.js'
import { ToolBridgeError, ToolListingError } from '../src/core/errors.js'
import { FakeToolSession, ScriptedModel, makeLogger } from './helpers.js'

describe('ToolBridgeClient', () => {
  it('answers with a fixed error before connecting', async () => {
    const client = new ToolBridgeClient(new ScriptedModel([]), vi.fn(), makeLogger())
    expect(await client.processQuery('hello')).toBe(NOT_CONNECTED_REPLY)
    expect(client.connected).toBe(false)
  })

  it('connects once, reports the catalog and logs tool names', async () => {
    const session = FakeToolSession.with({ add: () => ({ ok: true, payload: 0 }) })
    const openSession = vi.fn(async () => session)
    const logger = makeLogger()
    const client = new ToolBridgeClient(new ScriptedModel([]), openSession, logger)

    const tools = await client.connect('calc.py')

    expect(openSession).toHaveBeenCalledWith('calc.py')
    expect(tools.map((tool) => tool.name)).toEqual(['add'])
    expect(logger.info).toHaveBeenCalledWith('client.connected', { tools: ['add'] })
    await expect(client.connect('calc.py')).rejects.toBeInstanceOf(ToolBridgeError)
  })

  it('routes queries through the session', async () => {
    const session = FakeToolSession.with({ add: () => ({ ok: true, payload: 4 }) })
    const model = new ScriptedModel([
      { toolCalls: [{ name: 'add', arguments: { a: 2, b: 2 } }] },
      { content: 'The answer is 4.' }
    ])
    const client = new ToolBridgeClient(model, async () => session, makeLogger())
    await client.connect('calc.py')

    expect(await client.processQuery('what is 2+2')).toBe("[Tool 'add' returned: 4]\n\nThe answer is 4.")
  })

  it('wraps listing failures', async () => {
    const session = new FakeToolSession()
    const client = new ToolBridgeClient(new ScriptedModel([]), async () => session, makeLogger())
    await client.connect('calc.py')
    session.listError = new Error('broken pipe')

    await expect(client.listTools()).rejects.toThrow(ToolListingError)
    await expect(client.listTools()).rejects.toThrow('Failed to list tools: broken pipe')
  })

  it('closes the session once on repeated cleanup', async () => {
    const session = new FakeToolSession()
    const close = vi.spyOn(session, 'close')
    const client = new ToolBridgeClient(new ScriptedModel([]), async () => session, makeLogger())
    await client.connect('calc.py')

    await client.cleanup()
    await client.cleanup()

    expect(close).toHaveBeenCalledTimes(1)
    expect(client.connected).toBe(false)
    expect(await client.processQuery('hello')).toBe(NOT_CONNECTED_REPLY)
  })
})
