import type { ErrorResponse } from '@schemas/common/error.schema.js'
import { expect } from 'vitest'

/**
 * Asserts an error response of the global error handler
 *
 * @param payload - The response payload as a JSON string
 * @param expectedMessage - Substring the error message must contain
 */
export function expectErrorResponse(
  statusCode: number,
  payload: string,
  expectedStatus: number,
  expectedMessage: string,
) {
  expect(statusCode).toBe(expectedStatus)
  const body: ErrorResponse = JSON.parse(payload)
  expect(body.statusCode).toBe(expectedStatus)
  expect(body.message).toContain(expectedMessage)
}
