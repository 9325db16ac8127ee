import { spawn, type ChildProcessWithoutNullStreams } from 'child_process'
import readline from 'readline'
import fs from 'fs'
import path from 'path'
import { EngineProtocolError, EngineTimeoutError } from '@/lib/errors'
import type {
  EngineClient,
  EnginePosition,
  EngineScore,
  SearchConstraints,
  SearchResult,
} from '@/types/OpeningBook'

const HANDSHAKE_TIMEOUT_MS = 10000
const DEFAULT_RESPONSE_TIMEOUT_MS = 120000
const STOP_GRACE_MS = 2000
const UCI_MOVE = /^[a-h][1-8][a-h][1-8][qrbn]?$/

type Waiter = {
  command: string
  predicate: (line: string) => boolean
  resolve: (lines: string[]) => void
  reject: (err: Error) => void
  lines: string[]
  timeoutId: NodeJS.Timeout
}

export interface UciEngineOptions {
  threads?: number
  hashMb?: number
  responseTimeoutMs?: number
  handshakeTimeoutMs?: number
}

export function resolveEnginePath(enginePath: string): string {
  const candidates = [
    enginePath,
    'stockfish',
    process.platform === 'win32' ? 'stockfish.exe' : '',
  ].filter(Boolean)

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate
    }
    const resolved = resolveFromPath(candidate)
    if (resolved) return resolved
  }

  throw new Error(`Engine binary not found (tried ${candidates.join(', ')}). Set ENGINE_PATH.`)
}

function resolveFromPath(command: string): string | null {
  if (command.includes(path.sep)) return null
  const pathEntries = (process.env.PATH || '').split(path.delimiter).filter(Boolean)
  for (const entry of pathEntries) {
    const full = path.join(entry, command)
    if (fs.existsSync(full)) return full
    if (process.platform === 'win32' && fs.existsSync(`${full}.exe`)) {
      return `${full}.exe`
    }
  }
  return null
}

/**
 * Line-oriented UCI client over a child process.
 * At most one request is outstanding at a time.
 */
export class UciEngine implements EngineClient {
  private proc: ChildProcessWithoutNullStreams | null = null
  private rl: readline.Interface | null = null
  private waiter: Waiter | null = null
  private exited = false
  private engineName: string | null = null
  private readonly responseTimeoutMs: number
  private readonly handshakeTimeoutMs: number

  constructor(
    private readonly enginePath: string,
    private readonly options: UciEngineOptions = {}
  ) {
    this.responseTimeoutMs = options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS
  }

  get name(): string | null {
    return this.engineName
  }

  async start(): Promise<void> {
    if (this.proc) {
      throw new EngineProtocolError('Engine already started')
    }
    this.exited = false
    const proc = spawn(this.enginePath, [], { stdio: 'pipe' })
    this.proc = proc
    this.rl = readline.createInterface({ input: proc.stdout })
    this.rl.on('line', line => this.handleLine(line))
    proc.on('error', err => {
      this.exited = true
      this.rejectWaiter(new EngineProtocolError(`Engine process error: ${err.message}`))
    })
    proc.on('exit', (code, signal) => {
      this.exited = true
      this.rejectWaiter(
        new EngineProtocolError(`Engine exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`)
      )
    })
    proc.stdin.on('error', err => {
      this.rejectWaiter(new EngineProtocolError(`Engine input closed: ${err.message}`))
    })

    const lines = await this.sendAndWait('uci', line => line === 'uciok', this.handshakeTimeoutMs)
    const idLine = lines.find(line => line.startsWith('id name '))
    this.engineName = idLine ? idLine.slice('id name '.length).trim() : null

    if (this.options.threads !== undefined) {
      this.send(`setoption name Threads value ${this.options.threads}`)
    }
    if (this.options.hashMb !== undefined) {
      this.send(`setoption name Hash value ${this.options.hashMb}`)
    }
    await this.isReady()
  }

  async stop(): Promise<void> {
    const proc = this.proc
    this.proc = null
    this.rejectWaiter(new EngineProtocolError('Engine stopped'))

    if (proc && !this.exited) {
      const exited = new Promise<void>(resolve => {
        const timer = setTimeout(resolve, STOP_GRACE_MS)
        proc.once('exit', () => {
          clearTimeout(timer)
          resolve()
        })
      })
      if (!proc.stdin.destroyed) {
        proc.stdin.write('quit\n')
      }
      proc.kill()
      await exited
    }

    this.rl?.close()
    this.rl = null
  }

  async newGame(): Promise<void> {
    this.send('ucinewgame')
    await this.isReady()
  }

  setPosition(position: EnginePosition): void {
    this.send(positionCommand(position))
  }

  async bestMove(constraints: SearchConstraints): Promise<SearchResult> {
    const lines = await this.sendAndWait(
      goCommand(constraints),
      line => line.startsWith('bestmove'),
      this.responseTimeoutMs
    )
    return parseSearchOutput(lines)
  }

  private async isReady(): Promise<void> {
    await this.sendAndWait('isready', line => line === 'readyok', this.handshakeTimeoutMs)
  }

  private send(command: string): void {
    const proc = this.proc
    if (!proc || this.exited || proc.stdin.destroyed) {
      throw new EngineProtocolError(`Engine process is not available (while sending "${command}")`)
    }
    try {
      proc.stdin.write(`${command}\n`)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new EngineProtocolError(`Failed to write "${command}" to engine: ${message}`)
    }
  }

  private waitFor(
    command: string,
    predicate: (line: string) => boolean,
    timeoutMs: number
  ): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.rejectWaiter(new EngineTimeoutError(command, timeoutMs))
      }, timeoutMs)
      this.waiter = { command, predicate, resolve, reject, lines: [], timeoutId }
    })
  }

  private async sendAndWait(
    command: string,
    predicate: (line: string) => boolean,
    timeoutMs: number
  ): Promise<string[]> {
    if (this.waiter) {
      throw new EngineProtocolError(`Engine request "${this.waiter.command}" already in progress`)
    }
    const wait = this.waitFor(command, predicate, timeoutMs)
    try {
      this.send(command)
    } catch (error) {
      this.rejectWaiter(error instanceof Error ? error : new EngineProtocolError(String(error)))
    }
    return wait
  }

  private handleLine(line: string): void {
    if (!this.waiter) return
    this.waiter.lines.push(line)
    if (this.waiter.predicate(line)) {
      clearTimeout(this.waiter.timeoutId)
      const lines = this.waiter.lines
      const resolve = this.waiter.resolve
      this.waiter = null
      resolve(lines)
    }
  }

  private rejectWaiter(err: Error): void {
    if (!this.waiter) return
    clearTimeout(this.waiter.timeoutId)
    const reject = this.waiter.reject
    this.waiter = null
    reject(err)
  }
}

/**
 * Runs `fn` with a started engine and always tears the process down afterwards.
 */
export async function withEngine<T>(
  engine: EngineClient,
  fn: (engine: EngineClient) => Promise<T>
): Promise<T> {
  try {
    await engine.start()
    return await fn(engine)
  } finally {
    await engine.stop()
  }
}

export function positionCommand(position: EnginePosition): string {
  const base = 'fen' in position ? `position fen ${position.fen}` : 'position startpos'
  const moves = position.moves ?? []
  return moves.length > 0 ? `${base} moves ${moves.join(' ')}` : base
}

export function goCommand(constraints: SearchConstraints): string {
  const parts = ['go']
  if (constraints.depth !== undefined) parts.push(`depth ${constraints.depth}`)
  if (constraints.movetimeMs !== undefined) parts.push(`movetime ${constraints.movetimeMs}`)
  return parts.join(' ')
}

export function parseSearchOutput(lines: string[]): SearchResult {
  const bestMoveLine = lines.find(line => line.startsWith('bestmove'))
  if (!bestMoveLine) {
    throw new EngineProtocolError('Search finished without a bestmove line')
  }
  const token = bestMoveLine.trim().split(/\s+/)[1]
  if (!token) {
    throw new EngineProtocolError(`Malformed bestmove line: "${bestMoveLine}"`)
  }
  if (token !== '(none)' && !UCI_MOVE.test(token)) {
    throw new EngineProtocolError(`Engine returned an unparseable move: "${token}"`)
  }

  let score: EngineScore | null = null
  let depth: number | null = null
  let principalVariation: string[] = []
  for (const line of lines) {
    // fail-high and fail-low lines only bound the score
    if (!line.startsWith('info') || /\b(lowerbound|upperbound)\b/.test(line)) continue
    const cpMatch = line.match(/score\s+cp\s+(-?\d+)/)
    const mateMatch = line.match(/score\s+mate\s+(-?\d+)/)
    if (cpMatch) {
      score = { type: 'cp', value: parseInt(cpMatch[1], 10) }
    } else if (mateMatch) {
      score = { type: 'mate', value: parseInt(mateMatch[1], 10) }
    } else {
      continue
    }
    const depthMatch = line.match(/\bdepth\s+(\d+)/)
    depth = depthMatch ? parseInt(depthMatch[1], 10) : depth
    const pvMatch = line.match(/\spv\s+(.+)$/)
    principalVariation = pvMatch ? pvMatch[1].trim().split(/\s+/) : []
  }

  return {
    move: token === '(none)' ? null : token,
    score,
    depth,
    principalVariation,
  }
}
