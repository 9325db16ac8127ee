import { Chess } from 'chess.js'
import { applySanMove, applyUciMove, moveToUci } from '@/lib/chessNotation'
import type { OpeningExplorer } from '@/lib/explorer/openingExplorer'
import { selectMove, type LineState } from '@/lib/policies'
import { resultFor, toPgn } from '@/lib/pgn'
import { linesFor, REPERTOIRE, type RepertoireRegistry } from '@/lib/repertoire'
import type {
  BookConfiguration,
  EngineClient,
  ExplorerDatabase,
  GameRecord,
  OpeningLine,
  SearchConstraints,
} from '@/types/OpeningBook'

export interface GenerateOptions {
  engine: EngineClient
  constraints?: SearchConstraints // overrides the configuration's own search
  explorers?: Partial<Record<ExplorerDatabase, OpeningExplorer>>
  registry?: RepertoireRegistry
}

/**
 * Looks the configuration up immediately (unknown names throw here, before any
 * engine work) and returns a lazy sequence with one game per registered line.
 * The sequence drives the engine as it is consumed and cannot be restarted.
 */
export function generate(name: string, options: GenerateOptions): AsyncGenerator<GameRecord> {
  const configuration = linesFor(name, options.registry ?? REPERTOIRE)
  return generateRecords(configuration, options)
}

async function* generateRecords(
  configuration: BookConfiguration,
  options: GenerateOptions
): AsyncGenerator<GameRecord> {
  for (const line of configuration.lines) {
    yield await generateLine(configuration, line, options)
  }
}

export async function generateLine(
  configuration: BookConfiguration,
  line: OpeningLine,
  options: GenerateOptions
): Promise<GameRecord> {
  const { policy, plyCap, tieBreak } = configuration
  const constraints = options.constraints ?? configuration.search
  const board = new Chess()
  const history: string[] = []
  const san: string[] = []
  const state: LineState = { mistakesMade: 0 }

  if (policy.kind !== 'fixed-branch') {
    await options.engine.newGame()
  }

  while (history.length < plyCap && !board.isGameOver()) {
    const ply = history.length
    if (ply < line.moves.length) {
      const move = applySanMove(board, line.moves[ply])
      history.push(moveToUci(move))
      san.push(move.san)
      continue
    }

    const choice = await selectMove(
      policy,
      {
        board,
        history,
        engine: options.engine,
        constraints,
        tieBreak,
        explorers: options.explorers,
      },
      state
    )
    if (choice === null) break

    const move = applyUciMove(board, choice, policy.kind === 'explorer-winrate' ? 'explorer' : 'engine')
    history.push(moveToUci(move))
    san.push(move.san)
  }

  return {
    configuration: configuration.name,
    lineId: line.id,
    lineName: line.name,
    moves: history,
    san,
    result: resultFor(board),
    pgn: toPgn(board, line.name),
  }
}
