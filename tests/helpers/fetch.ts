import { vi } from 'vitest'

export type RouteHandler = () => Response | Promise<Response>

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

/**
 * fetch stub that answers from a URL → handler table.
 * Unknown URLs fail like a refused connection.
 */
export function stubFetch(routes: Record<string, RouteHandler>) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = requestUrl(input)
    const handler = routes[url]
    if (!handler) {
      throw new TypeError(`fetch failed: connect ECONNREFUSED ${url}`)
    }
    return handler()
  })
}

export function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } })
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

export function status(code: number): Response {
  return new Response('', { status: code })
}
