import type { ModelTool, ToolDescriptor } from './types.js'

/**
 * Converts provider tool descriptors into function-style model tool entries.
 * Catalog order is kept.
 */
export function adaptTools(descriptors: readonly ToolDescriptor[]): ModelTool[] {
  return descriptors.map((descriptor): ModelTool => ({
    type: 'function',
    function: {
      name: descriptor.name,
      description: descriptor.description ?? '',
      parameters: {
        type: 'object',
        properties: descriptor.inputSchema.properties ?? {},
        required: descriptor.inputSchema.required ?? []
      }
    }
  }))
}
