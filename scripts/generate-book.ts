#!/usr/bin/env -S npx --no-install tsx

/**
 * OPENING BOOK GENERATOR
 *
 * Walks every opening line registered for one book configuration, lets the
 * engine (or the opening explorer) pick the moves, and prints one PGN game per
 * line on stdout. Progress and errors go to stderr.
 *
 * Usage:
 *   npm run book -- licw2
 *   npx tsx scripts/generate-book.ts stkb depth=18 > out/stkb.pgn
 *
 * Environment variables (also read from .env.local):
 *   ENGINE_PATH       - UCI engine binary (default: /usr/bin/stockfish)
 *   ENGINE_DEPTH      - search depth override
 *   ENGINE_TIMEOUT_MS - upper bound for a single search (default: 120000)
 *   EXPLORER_TOKEN    - bearer token for the opening explorer
 *   EXPLORER_TIMEOUT_MS - upper bound for one explorer request (default: 30000)
 */

import * as dotenv from 'dotenv'
import * as path from 'path'
import { runBook } from '../lib/bookCli'

dotenv.config({ path: path.join(__dirname, '..', '.env.local') })

if (require.main === module) {
  runBook(process.argv.slice(2))
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error('❌ Unexpected error:', error)
      process.exit(1)
    })
}
