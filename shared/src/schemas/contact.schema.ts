import { z } from 'zod'

export const CONTACT_CONSTRAINTS = {
  MAX_NAME_LENGTH: 100,
  MAX_EMAIL_LENGTH: 120,
  MAX_SUBJECT_LENGTH: 200,
  MAX_MESSAGE_LENGTH: 5000,
} as const

/**
 * Public contact form body. Decoy (honeypot) inputs are not part of the
 * schema; they are read from the raw body with `formFieldsSchema`.
 */
export const submitContactSchema = z.object({
  name: z.string().trim().min(1).max(CONTACT_CONSTRAINTS.MAX_NAME_LENGTH),
  email: z.string().trim().email().max(CONTACT_CONSTRAINTS.MAX_EMAIL_LENGTH),
  subject: z
    .string()
    .trim()
    .max(CONTACT_CONSTRAINTS.MAX_SUBJECT_LENGTH)
    .optional()
    .transform((value) => (value ? value : undefined)),
  message: z.string().min(1).max(CONTACT_CONSTRAINTS.MAX_MESSAGE_LENGTH),
})

export type SubmitContactInput = z.infer<typeof submitContactSchema>

function fieldText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (Array.isArray(value)) {
    return value
      .map(fieldText)
      .filter((item): item is string => item !== undefined)
      .join(' ')
  }
  return JSON.stringify(value)
}

/**
 * Every field of a form body as text, keyed by field name. Repeated keys and
 * JSON arrays are joined; numbers and booleans are stringified; objects are
 * serialized. Null values are dropped.
 */
export const formFieldsSchema = z
  .record(z.unknown())
  .catch({})
  .transform((body) => {
    const fields: Record<string, string> = {}
    for (const [key, value] of Object.entries(body)) {
      const text = fieldText(value)
      if (text !== undefined) fields[key] = text
    }
    return fields
  })

export const verifyChallengeSchema = z.object({
  token: z.string().trim().min(1, 'token is required'),
})

export const purgeSubmissionAttemptsSchema = z.object({
  days: z.coerce.number().int().min(1).max(3650).optional(),
})

export const listContactMessagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  spam: z.enum(['true', 'false']).optional(),
  unread: z.enum(['true', 'false']).optional(),
})
