import type { Chess } from 'chess.js'
import { applyUciMove, legalMovesUci, uciAliases } from '@/lib/chessNotation'
import { EngineProtocolError, IllegalMoveError } from '@/lib/errors'
import { compareScores, expectedWdl, negateScore, winningChance } from '@/lib/evaluation'
import {
  gamesIn,
  mostPopularMove,
  popularMoves,
  type OpeningExplorer,
} from '@/lib/explorer/openingExplorer'
import type {
  EngineClient,
  EngineScore,
  ExplorerDatabase,
  SearchConstraints,
  SelectionPolicy,
  Side,
  TieBreak,
} from '@/types/OpeningBook'

// Below this many games the explorer statistics are ignored entirely
const THIN_POSITION_GAMES = 100
// Below this many games a single move's win rate is replaced by the engine's opinion
const MIN_MOVE_GAMES = 20

export interface MoveContext {
  board: Chess // restored to its original state before any policy returns
  history: readonly string[] // UCI from the standard start position
  engine: EngineClient
  constraints: SearchConstraints
  tieBreak: TieBreak
  explorers?: Partial<Record<ExplorerDatabase, OpeningExplorer>>
}

export interface LineState {
  mistakesMade: number
}

export interface RankedMove {
  move: string
  score: EngineScore // from the mover's point of view
}

export function isTurnOf(board: Chess, side: Side): boolean {
  return board.turn() === (side === 'white' ? 'w' : 'b')
}

export async function engineBestMove(ctx: MoveContext): Promise<string> {
  ctx.engine.setPosition({ moves: ctx.history })
  const result = await ctx.engine.bestMove(ctx.constraints)
  if (!result.move) {
    throw new EngineProtocolError(`Engine reported no move in a live position (${ctx.board.fen()})`)
  }
  return result.move
}

/**
 * Score of playing `move`, seen by the side making it. Game-ending children are
 * scored locally; everything else is searched and the engine's score flipped.
 */
export async function scoreMove(ctx: MoveContext, move: string): Promise<EngineScore> {
  const { board } = ctx
  applyUciMove(board, move)
  const mates = board.isCheckmate()
  const ends = board.isGameOver()
  board.undo()

  if (mates) return { type: 'mate', value: 1 }
  if (ends) return { type: 'cp', value: 0 }

  ctx.engine.setPosition({ moves: [...ctx.history, move] })
  const result = await ctx.engine.bestMove(ctx.constraints)
  if (!result.score) {
    throw new EngineProtocolError(`Engine reported no score after ${move} (${board.fen()})`)
  }
  return negateScore(result.score)
}

/** Every legal move with its score, in UCI order. Searches run one at a time. */
export async function rankLegalMoves(ctx: MoveContext): Promise<RankedMove[]> {
  const ranked: RankedMove[] = []
  for (const move of legalMovesUci(ctx.board)) {
    ranked.push({ move, score: await scoreMove(ctx, move) })
  }
  return ranked
}

export function pickExtreme<T>(
  items: readonly T[],
  compare: (a: T, b: T) => number,
  direction: 'lowest' | 'highest',
  tieBreak: TieBreak
): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty candidate list')
  }
  let chosen = items[0]
  for (const item of items.slice(1)) {
    const diff = direction === 'lowest' ? compare(chosen, item) : compare(item, chosen)
    if (diff > 0 || (diff === 0 && tieBreak === 'last')) {
      chosen = item
    }
  }
  return chosen
}

export async function engineWorstLegalMove(ctx: MoveContext): Promise<string> {
  const ranked = await rankLegalMoves(ctx)
  return pickExtreme(ranked, (a, b) => compareScores(a.score, b.score), 'lowest', ctx.tieBreak).move
}

/**
 * Hero move by the expected result of each legal move: expected wins, or wins
 * plus draws when `includeDraws` is set, per thousand games.
 */
export async function engineWinningChanceMove(ctx: MoveContext, includeDraws = false): Promise<string> {
  const ply = ctx.history.length
  const ranked = await rankLegalMoves(ctx)
  const scored = ranked.map(({ move, score }) => {
    const { wins, draws } = expectedWdl(score, ply)
    return { move, value: includeDraws ? wins + draws : wins }
  })
  return pickExtreme(scored, (a, b) => a.value - b.value, 'highest', ctx.tieBreak).move
}

/**
 * Hero move by observed win rate. Popular moves with enough games score their
 * win rate for the mover; popular moves with few games, and every move in a
 * thinly played position, score the engine's winning chance; the rest score 0.
 */
export async function explorerWinrateMove(ctx: MoveContext, explorer: OpeningExplorer): Promise<string> {
  const { board } = ctx
  const aliases = uciAliases(board)
  const position = await explorer.position(board.fen())
  const thin = gamesIn(position) < THIN_POSITION_GAMES
  const popular = new Map<string, { wins: number; games: number }>()
  for (const move of popularMoves(position)) {
    const uci = aliases.get(move.uci)
    if (!uci) continue
    popular.set(uci, { wins: board.turn() === 'w' ? move.white : move.black, games: gamesIn(move) })
  }

  const scored: { move: string; value: number }[] = []
  for (const move of legalMovesUci(board)) {
    const stats = popular.get(move)
    let value: number
    if (thin || (stats && stats.games <= MIN_MOVE_GAMES)) {
      value = winningChance(await scoreMove(ctx, move))
    } else if (stats) {
      value = stats.wins / stats.games
    } else {
      value = 0
    }
    scored.push({ move, value })
  }
  return pickExtreme(scored, (a, b) => a.value - b.value, 'highest', ctx.tieBreak).move
}

/** Opponent move in explorer books: the most played reply, else the engine's choice. */
export async function explorerPopularMove(ctx: MoveContext, explorer: OpeningExplorer): Promise<string> {
  const fen = ctx.board.fen()
  const popular = mostPopularMove(await explorer.position(fen))
  if (!popular) return engineBestMove(ctx)
  const uci = uciAliases(ctx.board).get(popular.uci)
  if (!uci) {
    throw new IllegalMoveError('explorer', popular.uci, fen)
  }
  return uci
}

/**
 * Next move once the literal line is exhausted. Returns null when the policy
 * plays nothing beyond the line.
 */
export async function selectMove(
  policy: SelectionPolicy,
  ctx: MoveContext,
  state: LineState
): Promise<string | null> {
  switch (policy.kind) {
    case 'fixed-branch':
      return null
    case 'engine-best':
      return engineBestMove(ctx)
    case 'engine-worst-legal': {
      const budgetLeft = policy.maxMistakes === undefined || state.mistakesMade < policy.maxMistakes
      if (isTurnOf(ctx.board, policy.side) && budgetLeft) {
        state.mistakesMade++
        return engineWorstLegalMove(ctx)
      }
      return engineBestMove(ctx)
    }
    case 'engine-winning-chance':
      return isTurnOf(ctx.board, policy.side)
        ? engineWinningChanceMove(ctx, policy.includeDraws)
        : engineBestMove(ctx)
    case 'explorer-winrate': {
      const explorer = ctx.explorers?.[policy.database]
      if (!explorer) {
        throw new Error(`No ${policy.database} opening explorer configured`)
      }
      return isTurnOf(ctx.board, policy.side)
        ? explorerWinrateMove(ctx, explorer)
        : explorerPopularMove(ctx, explorer)
    }
    default: {
      const unreachable: never = policy
      throw new Error(`Unhandled selection policy: ${JSON.stringify(unreachable)}`)
    }
  }
}
