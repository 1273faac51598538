/**
 * Plate extraction from raw OCR text.
 *
 * Supported formats:
 *   IN : state code, district digits, optional series letters, 3-4 digits
 *         (MH12AB1234, DL3C1234, KA019999)
 *   any: 4-10 alphanumeric characters, used when no country rule matches
 *
 * OCR output is noisy ("IND MH 12 AB 1234", "mh12ab1234."), so the Indian rule
 * searches inside the stripped text instead of matching it whole.
 */

const IN_PLATE = /[A-Z]{2}[0-9]{1,2}[A-Z]{0,2}[0-9]{3,4}/
const GENERIC_PLATE = /^[A-Z0-9]{4,10}$/

/**
 * Strip a raw plate string to alphanumeric characters only.
 */
function stripPlate(raw: string): string {
  return raw.replace(/[^0-9A-Za-z]/g, '').toUpperCase()
}

function extractIN(stripped: string): string | null {
  const match = stripped.match(IN_PLATE)
  return match ? match[0] : null
}

function extractGeneric(stripped: string): string | null {
  return GENERIC_PLATE.test(stripped) ? stripped : null
}

// --- Public API ---

/**
 * Pull a plate out of raw OCR text for a given country code (ISO 3166-1 alpha-2).
 * Returns the canonical plate or null if nothing plate-like is found.
 *
 * When no countryCode is provided, tries IN first, then generic alphanumeric.
 */
export function extractPlate(raw: string, countryCode?: string): string | null {
  const stripped = stripPlate(raw)
  if (!stripped) return null

  switch (countryCode?.toUpperCase()) {
    case 'IN':
      return extractIN(stripped)
    default:
      return extractIN(stripped) ?? extractGeneric(stripped)
  }
}

/**
 * Check if a raw string contains a valid plate for a given country.
 */
export function isValidPlate(raw: string, countryCode?: string): boolean {
  return extractPlate(raw, countryCode) !== null
}
