import { z } from "zod";
import { InvalidCoordinateError } from "../errors.js";

export const LocationSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  elevation_m: z.number().finite().min(-500).max(9000).default(0),
});

export type LocationInput = z.input<typeof LocationSchema>;
export type Location = Readonly<z.output<typeof LocationSchema>>;

/**
 * Validate observer coordinates. Out-of-range latitude/longitude is an
 * InvalidCoordinate failure, never clamped.
 */
export function createLocation(input: LocationInput): Location {
  const parsed = LocationSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "location"}: ${issue.message}`)
      .join("; ");
    throw new InvalidCoordinateError(`Invalid location (${detail})`, {
      location: {
        latitude: input.latitude,
        longitude: input.longitude,
        elevation_m: input.elevation_m,
      },
    });
  }
  return Object.freeze(parsed.data);
}

export function locationKey(location: Location): string {
  return `${location.latitude.toFixed(6)},${location.longitude.toFixed(6)},${location.elevation_m.toFixed(1)}`;
}
