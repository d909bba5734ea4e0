/**
 * Google Geocoding Constants
 */

export const GOOGLE_GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";

/** Statuses that mean the key or request is wrong; retrying will not help. */
export const GOOGLE_NON_RETRYABLE_STATUSES = new Set([
  "REQUEST_DENIED",
  "INVALID_REQUEST",
  "OVER_DAILY_LIMIT",
]);
