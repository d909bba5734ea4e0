/**
 * Google Geocoding Source
 */

export * from "./constants";
export * from "./normalize";
export { GoogleGeocoder, createGoogleGeocoder, type GoogleGeocoderOptions } from "./adapter";
