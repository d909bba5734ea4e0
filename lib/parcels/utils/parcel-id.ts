/**
 * Parcel ID Normalization Utilities
 */

/**
 * Normalize a parcel ID (APN) to a canonical form.
 *
 * - Strip everything except letters, digits and hyphens
 *   (some counties publish hyphenated APNs)
 * - Convert to uppercase
 * - Preserve leading zeros
 */
export function normalizeParcelId(raw: string): string {
  if (!raw) return "";

  return raw
    .trim()
    .replace(/[^a-zA-Z0-9-]/g, "")
    .toUpperCase();
}

/**
 * Normalize a numeric-only parcel ID.
 * Strips all non-digits.
 */
export function normalizeNumericParcelId(raw: string): string {
  if (!raw) return "";
  return raw.replace(/\D/g, "");
}

/**
 * Format a 10-digit San Diego APN as the assessor prints it: 346-121-34-00.
 * Anything that is not exactly 10 digits is returned unchanged.
 */
export function formatSanDiegoApn(raw: string): string {
  const digits = normalizeNumericParcelId(raw);
  if (digits.length !== 10) return raw;
  return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6, 8)}-${digits.slice(8)}`;
}
