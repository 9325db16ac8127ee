/**
 * Shared types for opening book generation.
 * Scores are always reported from the side to move's point of view.
 */

export type Side = 'white' | 'black'

export type EngineScore =
  | { type: 'cp'; value: number }
  | { type: 'mate'; value: number }

export type SearchConstraints =
  | { depth: number; movetimeMs?: number }
  | { depth?: number; movetimeMs: number }

export type EnginePosition =
  | { moves: readonly string[] }
  | { fen: string; moves?: readonly string[] }

export interface SearchResult {
  move: string | null // UCI, null for "bestmove (none)"
  score: EngineScore | null
  depth: number | null
  principalVariation: string[]
}

export interface EngineClient {
  start(): Promise<void>
  stop(): Promise<void>
  newGame(): Promise<void>
  setPosition(position: EnginePosition): void
  bestMove(constraints: SearchConstraints): Promise<SearchResult>
}

export type ExplorerDatabase = 'lichess' | 'masters'

export type SelectionPolicy =
  | { kind: 'engine-best' }
  | { kind: 'engine-worst-legal'; side: Side; maxMistakes?: number }
  | { kind: 'engine-winning-chance'; side: Side; includeDraws?: boolean }
  | { kind: 'fixed-branch' }
  | { kind: 'explorer-winrate'; database: ExplorerDatabase; side: Side }

export type TieBreak = 'first' | 'last'

export interface OpeningLine {
  id: string
  name: string
  moves: readonly string[] // SAN
}

export interface BookConfiguration {
  name: string
  description: string
  policy: SelectionPolicy
  plyCap: number
  tieBreak: TieBreak
  search: SearchConstraints
  lines: readonly OpeningLine[]
}

export type GameResult = '1-0' | '0-1' | '1/2-1/2' | '*'

export interface GameRecord {
  configuration: string
  lineId: string
  lineName: string
  moves: string[] // UCI
  san: string[]
  result: GameResult
  pgn: string
}
