import { z } from 'zod'

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  ENGINE_PATH: z.string().trim().min(1, 'ENGINE_PATH must not be empty').default('/usr/bin/stockfish'),
  ENGINE_THREADS: positiveInt.default(1),
  ENGINE_HASH_MB: positiveInt.default(64),
  ENGINE_TIMEOUT_MS: positiveInt.default(120000),
  ENGINE_DEPTH: positiveInt.optional(),
  ENGINE_MOVETIME_MS: positiveInt.optional(),
  EXPLORER_BASE_URL: z.string().url('EXPLORER_BASE_URL must be a valid URL').default('https://explorer.lichess.ovh'),
  EXPLORER_TOKEN: z.string().trim().min(1).optional(),
  EXPLORER_TIMEOUT_MS: positiveInt.default(30000),
  EXPLORER_RATE_LIMIT_PAUSE_MS: z.coerce.number().int().nonnegative().default(60000),
})

export type BookEnv = z.infer<typeof envSchema>

type EnvSource = Record<string, string | undefined>

// Blank values count as unset so an empty line in .env.local falls back to the default.
function pickDefined(source: EnvSource): EnvSource {
  const picked: EnvSource = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key]?.trim()
    if (value) picked[key] = value
  }
  return picked
}

export function loadBookEnv(source: EnvSource = process.env): BookEnv {
  const result = envSchema.safeParse(pickDefined(source))
  if (!result.success) {
    throw new Error(
      'Missing or invalid environment variables: ' + JSON.stringify(result.error.flatten().fieldErrors)
    )
  }
  return result.data
}
