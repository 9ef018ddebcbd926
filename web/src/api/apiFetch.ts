export class ApiError extends Error {
  status: number
  bodyText?: string

  constructor(message: string, status: number, bodyText?: string) {
    super(message)
    this.name = 'ApiError'
    this.status = status
    this.bodyText = bodyText
  }
}

function mergeHeaders(a?: HeadersInit, b?: HeadersInit): Headers {
  const h = new Headers(a)
  if (b) {
    for (const [k, v] of new Headers(b).entries()) h.set(k, v)
  }
  return h
}

export async function apiFetch(input: string, init: RequestInit = {}): Promise<Response> {
  const headers = init.body !== undefined ? { 'Content-Type': 'application/json' } : undefined
  return fetch(input, {
    ...init,
    headers: mergeHeaders(headers, init.headers),
  })
}

export async function readErrorBody(res: Response): Promise<string> {
  // Prefer JSON error payloads, fallback to text.
  const text = await res.text().catch(() => '')
  const ct = res.headers.get('content-type') ?? ''
  if (ct.includes('application/json')) {
    try {
      const data: unknown = JSON.parse(text)
      if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
        return data.error
      }
    } catch {
      // not JSON after all; use the raw text
    }
  }
  return text
}

/** Throws an ApiError for a non-2xx response, otherwise returns the parsed JSON body. */
export async function readJson<T>(res: Response, what: string): Promise<T> {
  if (!res.ok) {
    const msg = await readErrorBody(res)
    throw new ApiError(`${what} failed: ${res.status}${msg ? ` ${msg}` : ''}`, res.status, msg)
  }
  return (await res.json()) as T
}
