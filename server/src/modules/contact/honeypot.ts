/**
 * Decoy inputs rendered in the contact form but hidden from people. Only the
 * submitted values are inspected here; hiding them is the page's job.
 */
export const HONEYPOT_FIELDS: readonly string[] = ['website', 'url', 'phone_number', 'fax', 'company']

export function findFilledHoneypotField(
  formFields: Readonly<Record<string, string | undefined>>,
  decoys: readonly string[] = HONEYPOT_FIELDS
): string | null {
  for (const field of decoys) {
    const value = formFields[field]
    if (value !== undefined && value.trim().length > 0) {
      return field
    }
  }
  return null
}

