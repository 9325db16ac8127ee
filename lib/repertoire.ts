import { z } from 'zod'
import repertoireData from '@/data/repertoire.json'
import { UnknownConfigurationError } from '@/lib/errors'
import type { BookConfiguration, OpeningLine, SearchConstraints } from '@/types/OpeningBook'

export type RepertoireRegistry = ReadonlyMap<string, BookConfiguration>

const sideSchema = z.enum(['white', 'black'])

const policySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('engine-best') }),
  z.object({
    kind: z.literal('engine-worst-legal'),
    side: sideSchema,
    maxMistakes: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('engine-winning-chance'),
    side: sideSchema,
    includeDraws: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('fixed-branch') }),
  z.object({
    kind: z.literal('explorer-winrate'),
    database: z.enum(['lichess', 'masters']),
    side: sideSchema,
  }),
])

const searchSchema = z
  .object({
    depth: z.number().int().positive().optional(),
    movetimeMs: z.number().int().positive().optional(),
  })
  .transform((search, ctx): SearchConstraints => {
    if (search.depth !== undefined) return { depth: search.depth, movetimeMs: search.movetimeMs }
    if (search.movetimeMs !== undefined) return { movetimeMs: search.movetimeMs }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'search needs a depth or a movetimeMs' })
    return z.NEVER
  })

const lineSchema = z.object({
  name: z.string().min(1),
  moves: z.array(z.string().min(1)),
})

const configurationSchema = z.object({
  description: z.string().min(1),
  policy: policySchema,
  plyCap: z.number().int().positive(),
  tieBreak: z.enum(['first', 'last']),
  search: searchSchema,
  lines: z.array(z.string().min(1)).min(1),
})

const repertoireSchema = z
  .object({
    lines: z.record(z.string(), lineSchema),
    configurations: z.record(z.string(), configurationSchema),
  })
  .superRefine((file, ctx) => {
    for (const [name, configuration] of Object.entries(file.configurations)) {
      for (const lineId of configuration.lines) {
        if (!(lineId in file.lines)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['configurations', name, 'lines'],
            message: `Unknown line "${lineId}"`,
          })
        }
      }
    }
  })

/**
 * Validates raw repertoire data and freezes it into a lookup table.
 * Configurations keep their declaration order, and so do their lines.
 */
export function buildRegistry(data: unknown): RepertoireRegistry {
  const parsed = repertoireSchema.safeParse(data)
  if (!parsed.success) {
    throw new Error('Invalid repertoire data: ' + JSON.stringify(parsed.error.flatten()))
  }

  const lineCache = new Map<string, OpeningLine>()
  const lineById = (id: string): OpeningLine => {
    const cached = lineCache.get(id)
    if (cached) return cached
    const raw = parsed.data.lines[id]
    const line: OpeningLine = Object.freeze({ id, name: raw.name, moves: Object.freeze([...raw.moves]) })
    lineCache.set(id, line)
    return line
  }

  const registry = new Map<string, BookConfiguration>()
  for (const [name, raw] of Object.entries(parsed.data.configurations)) {
    registry.set(
      name,
      Object.freeze({
        name,
        description: raw.description,
        policy: Object.freeze(raw.policy),
        plyCap: raw.plyCap,
        tieBreak: raw.tieBreak,
        search: Object.freeze(raw.search),
        lines: Object.freeze(raw.lines.map(lineById)),
      })
    )
  }
  return registry
}

export const REPERTOIRE: RepertoireRegistry = buildRegistry(repertoireData)

export function configurationNames(registry: RepertoireRegistry = REPERTOIRE): string[] {
  return [...registry.keys()]
}

export function linesFor(name: string, registry: RepertoireRegistry = REPERTOIRE): BookConfiguration {
  const configuration = registry.get(name)
  if (!configuration) {
    throw new UnknownConfigurationError(name, configurationNames(registry))
  }
  return configuration
}
