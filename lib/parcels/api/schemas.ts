/**
 * Request Schemas for Location Resolution
 */

import { z } from "zod";

// ============================================================================
// Coordinate
// ============================================================================

export const coordinateSchema = z.object({
  lat: z.number().min(-90, "Latitude must be >= -90").max(90, "Latitude must be <= 90"),
  lon: z.number().min(-180, "Longitude must be >= -180").max(180, "Longitude must be <= 180"),
});

// ============================================================================
// Location Query
// ============================================================================

export const countyGeoidSchema = z.string().regex(/^\d{5}$/, "County GEOID must be 5 digits");

export const locationQuerySchema = z
  .object({
    rawAddress: z
      .string()
      .trim()
      .optional()
      .transform((value) => (value ? value : undefined)),
    coordinate: coordinateSchema.optional(),
    jurisdictionHint: countyGeoidSchema.optional(),
  })
  .refine((query) => query.rawAddress !== undefined || query.coordinate !== undefined, {
    message: "Either rawAddress or coordinate must be provided",
  });

export type ValidLocationQuery = z.infer<typeof locationQuerySchema>;

/**
 * First issue as "path: message", for InvalidInputError messages.
 */
export function describeSchemaError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid input";
  return issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
