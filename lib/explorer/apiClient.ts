import { ExplorerApiError } from '@/lib/errors'

export type QueryValue = string | number | readonly (string | number)[]

export interface ExplorerFetchOptions {
  baseUrl: string
  token?: string
  rateLimitPauseMs?: number
  timeoutMs?: number
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  onRateLimit?: (pauseMs: number) => void
}

const DEFAULT_TIMEOUT_MS = 30000

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export function buildExplorerUrl(baseUrl: string, path: string, params: Record<string, QueryValue>): string {
  const url = new URL(path, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`)
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, Array.isArray(value) ? value.join(',') : String(value))
  }
  return url.toString()
}

// Aborts the request and fails with status 0 when no response arrives in time.
async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  headers: Headers,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExplorerApiError(`Opening explorer request timed out after ${timeoutMs}ms`, 0))
      controller.abort()
    }, timeoutMs)
  })
  try {
    return await Promise.race([fetchImpl(url, { headers, signal: controller.signal }), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * GET against the opening explorer. A 429 is answered once by pausing and
 * retrying; any other non-2xx status, or no response within the timeout, is an
 * ExplorerApiError.
 */
export async function explorerFetch(
  path: string,
  params: Record<string, QueryValue>,
  options: ExplorerFetchOptions
): Promise<Response> {
  const fetchImpl = options.fetchImpl ?? fetch
  const sleep = options.sleep ?? defaultSleep
  const url = buildExplorerUrl(options.baseUrl, path, params)
  const headers = new Headers({ Accept: 'application/json' })
  if (options.token) {
    headers.set('Authorization', `Bearer ${options.token}`)
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS

  let response = await fetchWithTimeout(fetchImpl, url, headers, timeoutMs)
  if (response.status === 429) {
    const pauseMs = options.rateLimitPauseMs ?? 60000
    options.onRateLimit?.(pauseMs)
    await sleep(pauseMs)
    response = await fetchWithTimeout(fetchImpl, url, headers, timeoutMs)
  }

  if (!response.ok) {
    const payload = await response.text().catch(() => '')
    throw new ExplorerApiError(`Opening explorer error: ${response.status}`, response.status, payload)
  }
  return response
}
