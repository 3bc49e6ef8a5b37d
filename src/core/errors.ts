export class ToolBridgeError extends Error {
  override name: string
  override readonly cause?: unknown

  constructor(message: string, cause?: unknown) {
    super(message)
    this.name = this.constructor.name
    this.cause = cause
  }
}

export class UnsupportedScriptKindError extends ToolBridgeError {
  readonly scriptPath: string

  constructor(scriptPath: string) {
    super(`Server script must be a .py or .js file: ${scriptPath}`)
    this.scriptPath = scriptPath
  }
}

export class ProcessLaunchError extends ToolBridgeError {}

export class HandshakeError extends ToolBridgeError {}

export class SessionClosedError extends ToolBridgeError {
  constructor() {
    super('Tool session is closed')
  }
}

export class ToolListingError extends ToolBridgeError {}

export type ModelCallStage = 'decision' | 'summary'

export class ModelCallError extends ToolBridgeError {
  readonly stage: ModelCallStage

  constructor(stage: ModelCallStage, message: string, cause?: unknown) {
    super(message, cause)
    this.stage = stage
  }
}

export class DeadlineExceededError extends ToolBridgeError {
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.timeoutMs = timeoutMs
  }
}
