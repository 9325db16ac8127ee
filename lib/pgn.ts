import type { Chess } from 'chess.js'
import type { GameResult } from '@/types/OpeningBook'

export function resultFor(board: Chess): GameResult {
  if (board.isCheckmate()) {
    // the side to move is the one mated
    return board.turn() === 'w' ? '0-1' : '1-0'
  }
  if (board.isGameOver()) return '1/2-1/2'
  return '*'
}

/**
 * Writes the seven-tag roster (placeholders apart from Result) plus the
 * opening name, then lets chess.js serialize the moves.
 * No date is recorded, so reruns produce identical files.
 */
export function toPgn(board: Chess, openingName: string): string {
  const result = resultFor(board)
  board.header(
    'Event', '?',
    'Site', '?',
    'Date', '????.??.??',
    'Round', '?',
    'White', '?',
    'Black', '?',
    'Result', result,
    'Opening', openingName
  )
  return board.pgn()
}
