export class UnknownConfigurationError extends Error {
  readonly configuration: string
  readonly known: readonly string[]

  constructor(configuration: string, known: readonly string[]) {
    super(`Unknown book configuration "${configuration}" (expected one of: ${known.join(', ')})`)
    this.name = 'UnknownConfigurationError'
    this.configuration = configuration
    this.known = known
  }
}

export class EngineProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EngineProtocolError'
  }
}

export class EngineTimeoutError extends Error {
  readonly command: string
  readonly timeoutMs: number

  constructor(command: string, timeoutMs: number) {
    super(`Engine did not answer "${command}" within ${timeoutMs}ms`)
    this.name = 'EngineTimeoutError'
    this.command = command
    this.timeoutMs = timeoutMs
  }
}

export type MoveSource = 'engine' | 'repertoire' | 'explorer'

export class IllegalMoveError extends Error {
  readonly source: MoveSource
  readonly move: string
  readonly fen: string

  constructor(source: MoveSource, move: string, fen: string) {
    super(`Illegal ${source} move "${move}" in position ${fen}`)
    this.name = 'IllegalMoveError'
    this.source = source
    this.move = move
    this.fen = fen
  }
}

export class ExplorerApiError extends Error {
  status: number
  payload?: string

  constructor(message: string, status: number, payload?: string) {
    super(message)
    this.name = 'ExplorerApiError'
    this.status = status
    this.payload = payload
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
