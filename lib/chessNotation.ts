import { Chess, type Move } from 'chess.js'
import { IllegalMoveError, type MoveSource } from '@/lib/errors'

const UCI_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/

export interface UciParts {
  from: string
  to: string
  promotion?: string
}

/**
 * Splits a UCI move ("e2e4", "e7e8q") into squares and promotion piece.
 * Returns null for anything that is not UCI long algebraic notation.
 */
export function parseUci(uciMove: string): UciParts | null {
  const match = UCI_MOVE.exec(uciMove.trim())
  if (!match) return null
  return match[3] ? { from: match[1], to: match[2], promotion: match[3] } : { from: match[1], to: match[2] }
}

export function moveToUci(move: Pick<Move, 'from' | 'to' | 'promotion'>): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`
}

/** Legal moves of the side to move, in UCI, sorted so iteration order is stable. */
export function legalMovesUci(board: Chess): string[] {
  return board
    .moves({ verbose: true })
    .map(move => moveToUci(move))
    .sort()
}

/**
 * Plays a UCI move on the board. The board is the only legality authority:
 * anything it refuses becomes an IllegalMoveError.
 */
export function applyUciMove(board: Chess, uciMove: string, source: MoveSource = 'engine'): Move {
  const fen = board.fen()
  const parts = parseUci(uciMove)
  if (!parts) {
    throw new IllegalMoveError(source, uciMove, fen)
  }
  return playOrThrow(() => board.move(parts), source, uciMove, fen)
}

export function applySanMove(board: Chess, san: string, source: MoveSource = 'repertoire'): Move {
  const fen = board.fen()
  return playOrThrow(() => board.move(san), source, san, fen)
}

function playOrThrow(play: () => Move | null, source: MoveSource, notation: string, fen: string): Move {
  let move: Move | null
  try {
    move = play()
  } catch {
    throw new IllegalMoveError(source, notation, fen)
  }
  if (!move) {
    throw new IllegalMoveError(source, notation, fen)
  }
  return move
}

/**
 * Maps every legal move's UCI to itself, plus king-takes-rook spellings of
 * castling ("e1h1") to the standard king move ("e1g1").
 */
export function uciAliases(board: Chess): Map<string, string> {
  const aliases = new Map<string, string>()
  for (const move of board.moves({ verbose: true })) {
    const uci = moveToUci(move)
    aliases.set(uci, uci)
    const rank = move.from[1]
    if (move.flags.includes('k')) aliases.set(`${move.from}h${rank}`, uci)
    if (move.flags.includes('q')) aliases.set(`${move.from}a${rank}`, uci)
  }
  return aliases
}
