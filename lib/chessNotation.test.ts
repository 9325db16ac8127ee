import { Chess } from 'chess.js'
import {
  applySanMove,
  applyUciMove,
  legalMovesUci,
  moveToUci,
  parseUci,
  uciAliases,
} from '@/lib/chessNotation'
import { IllegalMoveError } from '@/lib/errors'

const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1'

describe('lib/chessNotation', () => {
  it('parses UCI moves', () => {
    expect(parseUci('e2e4')).toEqual({ from: 'e2', to: 'e4' })
    expect(parseUci('e7e8q')).toEqual({ from: 'e7', to: 'e8', promotion: 'q' })
    expect(parseUci('e2e9')).toBeNull()
    expect(parseUci('Nf3')).toBeNull()
  })

  it('formats moves as UCI', () => {
    expect(moveToUci({ from: 'g1', to: 'f3' })).toBe('g1f3')
    expect(moveToUci({ from: 'b7', to: 'b8', promotion: 'n' })).toBe('b7b8n')
  })

  it('lists legal moves in sorted UCI order', () => {
    const moves = legalMovesUci(new Chess())
    expect(moves).toHaveLength(20)
    expect(moves.slice(0, 3)).toEqual(['a2a3', 'a2a4', 'b1a3'])
    expect(moves).toContain('g1f3')
  })

  it('applies legal UCI moves', () => {
    const board = new Chess()
    const move = applyUciMove(board, 'e2e4')
    expect(move.san).toBe('e4')
    expect(board.turn()).toBe('b')
  })

  it('rejects illegal or malformed engine moves', () => {
    const board = new Chess()
    expect(() => applyUciMove(board, 'e2e5')).toThrow(IllegalMoveError)
    try {
      applyUciMove(board, 'xyz')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalMoveError)
      if (error instanceof IllegalMoveError) {
        expect(error.source).toBe('engine')
        expect(error.move).toBe('xyz')
        expect(error.fen).toBe(START_FEN)
      }
    }
    expect(board.fen()).toBe(START_FEN)
  })

  it('applies SAN repertoire moves and rejects illegal ones', () => {
    const board = new Chess()
    expect(applySanMove(board, 'Nf3').san).toBe('Nf3')
    try {
      applySanMove(board, 'Ke2')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalMoveError)
      if (error instanceof IllegalMoveError) {
        expect(error.source).toBe('repertoire')
      }
    }
  })

  it('maps king-takes-rook castling to the standard king move', () => {
    const board = new Chess()
    for (const san of ['e4', 'e5', 'Nf3', 'Nc6', 'Bc4', 'Bc5']) {
      board.move(san)
    }
    const aliases = uciAliases(board)
    expect(aliases.get('e1h1')).toBe('e1g1')
    expect(aliases.get('e1g1')).toBe('e1g1')
    expect(aliases.get('d2d4')).toBe('d2d4')
    expect(aliases.has('e1a1')).toBe(false)
  })
})
