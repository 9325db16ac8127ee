import { z } from 'zod'
import { explorerFetch, type ExplorerFetchOptions, type QueryValue } from '@/lib/explorer/apiClient'
import type { ExplorerDatabase } from '@/types/OpeningBook'

const explorerMoveSchema = z.object({
  uci: z.string(),
  san: z.string().optional(),
  white: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
  black: z.number().int().nonnegative(),
})

const explorerPositionSchema = z.object({
  white: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
  black: z.number().int().nonnegative(),
  moves: z.array(explorerMoveSchema),
})

export type ExplorerMove = z.infer<typeof explorerMoveSchema>
export type ExplorerPosition = z.infer<typeof explorerPositionSchema>

export interface OpeningExplorer {
  readonly database: ExplorerDatabase
  position(fen: string): Promise<ExplorerPosition>
}

// Popularity thresholds for which replies count as "played"
export const MIN_SHARE = 0.05
export const MIN_CANDIDATES = 2
export const HUGE_SAMPLE = 1_000_000
export const RELIABLE_POSITION_GAMES = 200

const DATABASE_PARAMS: Record<ExplorerDatabase, { path: string; params: Record<string, QueryValue> }> = {
  lichess: {
    path: 'lichess',
    params: {
      variant: 'standard',
      speeds: ['blitz', 'rapid', 'classical'],
      ratings: [1600, 1800, 2000, 2200],
    },
  },
  masters: { path: 'masters', params: {} },
}

export function gamesIn(entry: { white: number; draws: number; black: number }): number {
  return entry.white + entry.draws + entry.black
}

/**
 * Explorer client for one database. Responses are cached per FEN for the
 * lifetime of the instance, since a book run revisits the same positions.
 */
export function createOpeningExplorer(
  database: ExplorerDatabase,
  options: ExplorerFetchOptions
): OpeningExplorer {
  const cache = new Map<string, Promise<ExplorerPosition>>()
  const { path, params } = DATABASE_PARAMS[database]

  const load = async (fen: string): Promise<ExplorerPosition> => {
    const response = await explorerFetch(
      path,
      { ...params, fen, moves: 15, topGames: 0, recentGames: 0 },
      options
    )
    const parsed = explorerPositionSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new Error(`Unexpected ${database} explorer response for ${fen}: ${parsed.error.message}`)
    }
    return parsed.data
  }

  return {
    database,
    position(fen: string): Promise<ExplorerPosition> {
      const cached = cache.get(fen)
      if (cached) return cached
      const pending = load(fen)
      cache.set(fen, pending)
      // failed lookups are not cached
      void pending.catch(() => cache.delete(fen))
      return pending
    },
  }
}

/**
 * Replies that are actually played in the position: more than MIN_SHARE of the
 * games (or a huge absolute sample), topped up to MIN_CANDIDATES by popularity.
 */
export function popularMoves(position: ExplorerPosition): ExplorerMove[] {
  const total = gamesIn(position)
  if (total === 0) return []

  const byPopularity = [...position.moves].sort((a, b) => gamesIn(b) - gamesIn(a))
  const passing = byPopularity.filter(
    move => gamesIn(move) / total > MIN_SHARE || gamesIn(move) > HUGE_SAMPLE
  )
  if (passing.length >= MIN_CANDIDATES) return passing
  return byPopularity.slice(0, MIN_CANDIDATES)
}

/** The most played reply, or null when the position is too rare to trust. */
export function mostPopularMove(position: ExplorerPosition): ExplorerMove | null {
  if (gamesIn(position) < RELIABLE_POSITION_GAMES) return null
  return popularMoves(position)[0] ?? null
}
