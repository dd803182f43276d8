/**
 * Common API response types
 */

import { z } from 'zod'

/**
 * Every endpoint answers with `{ "err": [ints], "data": ... }`.
 * Entries are left untyped here; envelope validation classifies them.
 */
export const envelopeSchema = z
  .object({
    err: z.array(z.unknown()).nullish(),
    data: z.unknown(),
  })
  .passthrough()

export type Envelope = z.infer<typeof envelopeSchema>
