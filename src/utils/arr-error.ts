/**
 * Validation error item from *arr APIs (Radarr/Sonarr)
 * Uses camelCase - serialized by System.Text.Json
 */
interface ArrValidationError {
  propertyName?: string
  errorMessage?: string
}

function isValidationItem(value: unknown): value is ArrValidationError {
  return typeof value === 'object' && value !== null
}

/**
 * Extracts a readable message from a Radarr/Sonarr error body.
 * Handles both formats:
 * - Array: [{ propertyName, errorMessage, ... }] (validation errors)
 * - Object: { message: string } (general errors)
 *
 * Returns an empty string when the body carries nothing usable.
 */
export function parseArrErrorResponse(errorData: unknown): string {
  if (Array.isArray(errorData)) {
    const messages = errorData
      .filter(isValidationItem)
      .map((e) =>
        e.propertyName && e.errorMessage
          ? `${e.propertyName}: ${e.errorMessage}`
          : e.errorMessage,
      )
      .filter(Boolean)
      .join('; ')
    return messages || 'Validation error'
  }

  if (errorData && typeof errorData === 'object' && 'message' in errorData) {
    return String(errorData.message)
  }

  if (typeof errorData === 'string') {
    return errorData.trim()
  }

  return ''
}
