/**
 * Snapshot reference utilities
 *
 * Expanded file names carry a date token as their third dot-separated part,
 * e.g. "K3241.K03200Y0.D30610.EMPRECSV" -> "D30610".
 */

export const UNKNOWN_REFERENCE = 'Unknown'

/**
 * Tokens only carry the last digit of the year.
 * FIXME: snapshots published from 2030 on decode into the 2020s.
 */
export const REFERENCE_DECADE = 2020

const TOKEN_PATTERN = /^D(\d)(\d{2})(\d{2})$/

/**
 * Pull the date token out of a file name
 */
export function referenceTokenFromFilename(filename: string): string | null {
  const parts = filename.split('.')
  return parts.length > 2 ? parts[2] : null
}

/**
 * Decode a date token into DD/MM/YYYY
 * Example: "D30610" -> "10/06/2023"
 */
export function decodeReferenceToken(token: string): string {
  const match = token.match(TOKEN_PATTERN)
  if (!match) {
    return UNKNOWN_REFERENCE
  }

  const [, yearDigit, month, day] = match
  return `${day}/${month}/${REFERENCE_DECADE + parseInt(yearDigit, 10)}`
}
