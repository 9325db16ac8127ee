import {
  createOpeningExplorer,
  mostPopularMove,
  popularMoves,
  type ExplorerMove,
  type ExplorerPosition,
} from '@/lib/explorer/openingExplorer'

const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1'

function move(uci: string, games: number): ExplorerMove {
  return { uci, white: games, draws: 0, black: 0 }
}

function position(total: number, moves: ExplorerMove[]): ExplorerPosition {
  return { white: total, draws: 0, black: 0, moves }
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

describe('lib/explorer/openingExplorer createOpeningExplorer', () => {
  it('queries the masters database and caches by FEN', async () => {
    const body = position(500, [move('e2e4', 300), move('d2d4', 200)])
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(body))
    const explorer = createOpeningExplorer('masters', { baseUrl: 'http://localhost:9000', fetchImpl })

    expect(await explorer.position(START_FEN)).toEqual(body)
    expect(await explorer.position(START_FEN)).toEqual(body)
    expect(fetchImpl).toHaveBeenCalledTimes(1)

    const url = new URL(String(fetchImpl.mock.calls[0][0]))
    expect(url.pathname).toBe('/masters')
    expect(url.searchParams.get('fen')).toBe(START_FEN)
    expect(url.searchParams.get('moves')).toBe('15')
    expect(url.searchParams.get('topGames')).toBe('0')
    expect(url.searchParams.has('speeds')).toBe(false)
  })

  it('filters the lichess database by speed and rating', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(position(0, [])))
    const explorer = createOpeningExplorer('lichess', { baseUrl: 'http://localhost:9000', fetchImpl })
    await explorer.position(START_FEN)

    const url = new URL(String(fetchImpl.mock.calls[0][0]))
    expect(url.pathname).toBe('/lichess')
    expect(url.searchParams.get('variant')).toBe('standard')
    expect(url.searchParams.get('speeds')).toBe('blitz,rapid,classical')
    expect(url.searchParams.get('ratings')).toBe('1600,1800,2000,2200')
  })

  it('does not cache failed lookups', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => new Response('down', { status: 503 }))
      .mockImplementationOnce(async () => jsonResponse(position(10, [])))
    const explorer = createOpeningExplorer('masters', { baseUrl: 'http://localhost:9000', fetchImpl })

    await expect(explorer.position(START_FEN)).rejects.toThrow('Opening explorer error: 503')
    expect(await explorer.position(START_FEN)).toEqual(position(10, []))
    expect(fetchImpl).toHaveBeenCalledTimes(2)
  })

  it('rejects responses of the wrong shape', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ white: 'many' }))
    const explorer = createOpeningExplorer('masters', { baseUrl: 'http://localhost:9000', fetchImpl })

    await expect(explorer.position(START_FEN)).rejects.toThrow(/Unexpected masters explorer response/)
  })
})

describe('lib/explorer/openingExplorer popularity', () => {
  it('keeps moves above the share threshold, most played first', () => {
    const moves = popularMoves(
      position(1000, [move('b', 300), move('c', 40), move('a', 600), move('d', 60)])
    )
    expect(moves.map(m => m.uci)).toEqual(['a', 'b', 'd'])
  })

  it('tops the list up to two candidates', () => {
    const moves = popularMoves(position(1000, [move('a', 970), move('b', 20), move('c', 10)]))
    expect(moves.map(m => m.uci)).toEqual(['a', 'b'])
  })

  it('accepts any move with a huge sample', () => {
    const moves = popularMoves(
      position(100_000_000, [move('a', 90_000_000), move('b', 8_000_000), move('c', 2_000_000)])
    )
    expect(moves.map(m => m.uci)).toEqual(['a', 'b', 'c'])
  })

  it('returns nothing for an unplayed position', () => {
    expect(popularMoves(position(0, []))).toEqual([])
  })

  it('only trusts the most popular move in well-played positions', () => {
    expect(mostPopularMove(position(150, [move('a', 100), move('b', 50)]))).toBeNull()
    expect(mostPopularMove(position(300, [move('b', 100), move('a', 200)]))?.uci).toBe('a')
  })
})
