/**
 * URL helpers for building catalog API endpoints
 */

/**
 * Normalizes a base URL: assumes `http://` without a scheme and drops
 * trailing slashes from the path.
 *
 * @example
 * ```typescript
 * normalizeEndpointWithPath('http://server/api/') // 'http://server/api'
 * normalizeEndpointWithPath('server:8989/path/') // 'http://server:8989/path'
 * ```
 */
export function normalizeEndpointWithPath(url?: string | null): string {
  if (!url) return ''
  try {
    const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(url)
    const u = hasScheme ? new URL(url) : new URL(`http://${url}`)
    u.pathname = u.pathname.replace(/\/+$/, '')
    return `${u.protocol}//${u.host}${u.pathname}`
  } catch {
    return String(url).trim().replace(/\/+$/, '')
  }
}

/**
 * Joins a catalog base URL, its versioned API path and resource segments
 * with exactly one slash between each part.
 *
 * @example
 * ```typescript
 * buildArrUrl('http://radarr:7878/', '/api/v3/', 'movie', 12)
 * // 'http://radarr:7878/api/v3/movie/12'
 * ```
 */
export function buildArrUrl(
  baseUrl: string,
  apiPath: string,
  ...parts: Array<string | number>
): string {
  const base = normalizeEndpointWithPath(baseUrl)
  const segments = [apiPath, ...parts.map(String)]
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
  return [base, ...segments].join('/')
}

/**
 * Appends query parameters, skipping `undefined` values.
 */
export function withQuery(
  url: string,
  params: Record<string, string | number | boolean | undefined>,
): string {
  const u = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      u.searchParams.set(key, String(value))
    }
  }
  return u.toString()
}
