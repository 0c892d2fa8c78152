import { createHash, timingSafeEqual } from 'node:crypto'

/**
 * Compares two secrets in constant time. Both sides are hashed first so
 * inputs of different length take the same path.
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest()
  const b = createHash('sha256').update(expected).digest()
  return timingSafeEqual(a, b)
}

/**
 * Returns the token of an `Authorization: Bearer <token>` header, or null
 * when the header is missing or uses another scheme.
 */
export function extractBearerToken(
  header: string | string[] | undefined,
): string | null {
  const value = Array.isArray(header) ? header[0] : header
  if (!value || !value.toLowerCase().startsWith('bearer ')) {
    return null
  }
  const token = value.slice('bearer '.length).trim()
  return token.length > 0 ? token : null
}

export type AuthDecision =
  | { allowed: true }
  | { allowed: false; statusCode: 401 | 403 | 503; message: string }

export interface AuthInput {
  ip: string
  authorization: string | string[] | undefined
}

export interface AuthSettings {
  apiToken: string
  isAddressAllowed: (ip: string) => boolean
}

/**
 * Decides whether a request may reach the API.
 *
 * The address allow-list is checked first (403), then whether a token is
 * configured at all (503), then the bearer token itself (401).
 */
export function authorizeRequest(
  input: AuthInput,
  settings: AuthSettings,
): AuthDecision {
  if (!settings.isAddressAllowed(input.ip)) {
    return { allowed: false, statusCode: 403, message: 'Forbidden' }
  }

  if (!settings.apiToken) {
    return {
      allowed: false,
      statusCode: 503,
      message: 'Service token not configured',
    }
  }

  const token = extractBearerToken(input.authorization)
  if (token === null) {
    return { allowed: false, statusCode: 401, message: 'Missing bearer token' }
  }

  if (!tokensMatch(token, settings.apiToken)) {
    return { allowed: false, statusCode: 401, message: 'Invalid token' }
  }

  return { allowed: true }
}
