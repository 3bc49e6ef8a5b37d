import { z } from 'zod'

export const configSchema = z.object({
  model: z.string().min(1),
  ollamaHost: z.string().url(),
  runners: z.object({
    python: z.string().min(1),
    node: z.string().min(1)
  }),
  toolTimeoutMs: z.number().int().positive(),
  modelTimeoutMs: z.number().int().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error'])
})

export type ToolBridgeConfig = z.infer<typeof configSchema>
