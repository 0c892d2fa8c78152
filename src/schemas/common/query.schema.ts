import { z } from 'zod'

/** `'true'`/`'1'` or `'false'`/`'0'`; left as text so the OpenAPI input stays a plain enum */
export const QueryFlagSchema = z.enum(['true', 'false', '1', '0']).optional()

export type QueryFlag = z.infer<typeof QueryFlagSchema>

export function isFlagSet(flag: QueryFlag): boolean {
  return flag === 'true' || flag === '1'
}
