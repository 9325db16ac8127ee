import { loadBookEnv, type BookEnv } from '@/lib/env'
import { UnknownConfigurationError, UsageError } from '@/lib/errors'
import { createOpeningExplorer, type OpeningExplorer } from '@/lib/explorer/openingExplorer'
import { generate } from '@/lib/lineGenerator'
import { configurationNames, linesFor, REPERTOIRE, type RepertoireRegistry } from '@/lib/repertoire'
import { resolveEnginePath, UciEngine, withEngine } from '@/lib/uciEngine'
import type {
  BookConfiguration,
  EngineClient,
  ExplorerDatabase,
  GameRecord,
  SearchConstraints,
} from '@/types/OpeningBook'

export interface CliIo {
  stdout: (text: string) => void
  stderr: (line: string) => void
}

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown
  removeListener(signal: NodeJS.Signals, listener: () => void): unknown
}

export interface CliDeps {
  env?: Record<string, string | undefined>
  io?: CliIo
  registry?: RepertoireRegistry
  createEngine?: (env: BookEnv) => EngineClient
  createExplorers?: (env: BookEnv, io: CliIo) => Partial<Record<ExplorerDatabase, OpeningExplorer>>
  exit?: (code: number) => void
  signals?: SignalSource
}

const defaultIo: CliIo = {
  stdout: text => {
    process.stdout.write(text)
  },
  stderr: line => console.error(line),
}

export function createUciEngine(env: BookEnv): EngineClient {
  return new UciEngine(resolveEnginePath(env.ENGINE_PATH), {
    threads: env.ENGINE_THREADS,
    hashMb: env.ENGINE_HASH_MB,
    responseTimeoutMs: env.ENGINE_TIMEOUT_MS,
  })
}

export function createExplorers(env: BookEnv, io: CliIo): Record<ExplorerDatabase, OpeningExplorer> {
  const options = {
    baseUrl: env.EXPLORER_BASE_URL,
    token: env.EXPLORER_TOKEN,
    rateLimitPauseMs: env.EXPLORER_RATE_LIMIT_PAUSE_MS,
    timeoutMs: env.EXPLORER_TIMEOUT_MS,
    onRateLimit: (pauseMs: number) => io.stderr(`⏳ Explorer rate limit hit, pausing ${pauseMs}ms...`),
  }
  return {
    lichess: createOpeningExplorer('lichess', options),
    masters: createOpeningExplorer('masters', options),
  }
}

/**
 * Parses the optional tuning argument: "20", "depth=20", "movetime=500" or
 * "depth=12,movetime=300".
 */
export function parseSearchArg(arg: string): SearchConstraints {
  const trimmed = arg.trim()
  if (/^\d+$/.test(trimmed) && Number(trimmed) > 0) {
    return { depth: Number(trimmed) }
  }

  let depth: number | undefined
  let movetimeMs: number | undefined
  for (const part of trimmed.split(',')) {
    const match = /^(depth|movetime)=(\d+)$/.exec(part.trim())
    if (!match || Number(match[2]) <= 0) {
      throw new UsageError(`Invalid search argument "${arg}" (try "20", "depth=20" or "movetime=500")`)
    }
    if (match[1] === 'depth') depth = Number(match[2])
    else movetimeMs = Number(match[2])
  }

  if (depth !== undefined) return { depth, movetimeMs }
  if (movetimeMs !== undefined) return { movetimeMs }
  throw new UsageError(`Invalid search argument "${arg}"`)
}

export function resolveConstraints(
  searchArg: string | undefined,
  env: Pick<BookEnv, 'ENGINE_DEPTH' | 'ENGINE_MOVETIME_MS'>,
  configuration: BookConfiguration
): SearchConstraints {
  if (searchArg !== undefined) return parseSearchArg(searchArg)
  const depth = env.ENGINE_DEPTH ?? configuration.search.depth
  const movetimeMs = env.ENGINE_MOVETIME_MS ?? configuration.search.movetimeMs
  if (depth !== undefined) return { depth, movetimeMs }
  if (movetimeMs !== undefined) return { movetimeMs }
  return configuration.search
}

export function describeConstraints(constraints: SearchConstraints): string {
  const parts: string[] = []
  if (constraints.depth !== undefined) parts.push(`depth ${constraints.depth}`)
  if (constraints.movetimeMs !== undefined) parts.push(`movetime ${constraints.movetimeMs}ms`)
  return parts.join(', ')
}

async function withSignalCleanup<T>(
  engine: EngineClient,
  io: CliIo,
  exit: (code: number) => void,
  signals: SignalSource,
  fn: () => Promise<T>
): Promise<T> {
  const handler = (signal: NodeJS.Signals, code: number) => () => {
    io.stderr(`\n⏹️  ${signal} received, stopping engine`)
    void engine.stop().then(
      () => exit(code),
      () => exit(code)
    )
  }
  const onInt = handler('SIGINT', 130)
  const onTerm = handler('SIGTERM', 143)
  signals.once('SIGINT', onInt)
  signals.once('SIGTERM', onTerm)
  try {
    return await fn()
  } finally {
    signals.removeListener('SIGINT', onInt)
    signals.removeListener('SIGTERM', onTerm)
  }
}

/**
 * Runs one book configuration and returns the process exit code.
 * Games are printed only after every line succeeded.
 */
export async function runBook(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo
  const registry = deps.registry ?? REPERTOIRE
  const [name, searchArg, ...extra] = args

  try {
    if (!name || extra.length > 0) {
      throw new UsageError(
        `Usage: generate-book <configuration> [<search>]\nConfigurations: ${configurationNames(registry).join(', ')}`
      )
    }
    const configuration = linesFor(name, registry)
    const env = loadBookEnv(deps.env ?? process.env)
    const constraints = resolveConstraints(searchArg, env, configuration)
    const engine = (deps.createEngine ?? createUciEngine)(env)
    const explorers = (deps.createExplorers ?? createExplorers)(env, io)

    io.stderr(
      `📚 ${name}: ${configuration.description} (${configuration.lines.length} lines, ${describeConstraints(constraints)})`
    )
    const startTime = Date.now()

    const exit = deps.exit ?? ((code: number) => process.exit(code))
    const records = await withSignalCleanup(engine, io, exit, deps.signals ?? process, () =>
      withEngine(engine, async () => {
        const collected: GameRecord[] = []
        for await (const record of generate(name, { engine, constraints, explorers, registry })) {
          collected.push(record)
          io.stderr(`   ✅ ${record.lineName}: ${record.san.length} plies, ${record.result}`)
        }
        return collected
      })
    )

    io.stdout(records.map(record => `${record.pgn}\n\n`).join(''))
    io.stderr(`🏁 ${records.length} games in ${((Date.now() - startTime) / 1000).toFixed(1)}s`)
    return 0
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
    io.stderr(`❌ ${message}`)
    return error instanceof UsageError || error instanceof UnknownConfigurationError ? 2 : 1
  }
}
