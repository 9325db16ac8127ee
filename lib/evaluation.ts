import type { EngineScore } from '@/types/OpeningBook'

export const MATE_SCORE = 100000

// Lichess win-probability model
const WINNING_CHANCE_SLOPE = 0.00368208

/**
 * Collapses a score onto one numeric scale where any mate outranks any
 * centipawn value and shorter mates outrank longer ones.
 */
export function scoreToCentipawns(score: EngineScore): number {
  if (score.type === 'cp') return score.value
  if (score.value > 0) return MATE_SCORE - score.value
  if (score.value < 0) return -MATE_SCORE - score.value
  // "mate 0": the side to move is already mated
  return -MATE_SCORE
}

/** Same score seen from the other side of the board. */
export function negateScore(score: EngineScore): EngineScore {
  return { type: score.type, value: -score.value }
}

export function compareScores(a: EngineScore, b: EngineScore): number {
  return scoreToCentipawns(a) - scoreToCentipawns(b)
}

export function winningChance(score: EngineScore): number {
  let cp: number
  if (score.type === 'cp') {
    cp = score.value
  } else if (score.value === 0) {
    return 0
  } else {
    const magnitude = (21 - Math.min(10, Math.abs(score.value))) * 100
    cp = score.value > 0 ? magnitude : -magnitude
  }
  return 1 / (1 + Math.exp(-WINNING_CHANCE_SLOPE * cp))
}

export interface Wdl {
  wins: number
  draws: number
  losses: number
}

// Stockfish 12 win-rate model, per mille, fitted on fishtest games
const WIN_RATE_AS = [-8.24404295, 64.23892342, -95.73056462, 153.86478679]
const WIN_RATE_BS = [-3.37154371, 28.44489198, -56.67657403, 72.05858751]

function polynomial(coefficients: readonly number[], m: number): number {
  return coefficients.reduce((acc, c) => acc * m + c, 0)
}

function winRate(cp: number, ply: number): number {
  const m = Math.min(240, Math.max(ply, 0)) / 64
  const a = polynomial(WIN_RATE_AS, m)
  const b = polynomial(WIN_RATE_BS, m)
  const x = Math.min(1000, Math.max(cp, -1000))
  return Math.floor(0.5 + 1000 / (1 + Math.exp((a - x) / b)))
}

/**
 * Expected wins, draws and losses per thousand games for the side the score
 * belongs to, `ply` half-moves into the game. Mates are certain results.
 */
export function expectedWdl(score: EngineScore, ply: number): Wdl {
  if (score.type === 'mate') {
    return score.value > 0 ? { wins: 1000, draws: 0, losses: 0 } : { wins: 0, draws: 0, losses: 1000 }
  }
  const wins = winRate(score.value, ply)
  const losses = winRate(-score.value, ply)
  return { wins, draws: 1000 - wins - losses, losses }
}
