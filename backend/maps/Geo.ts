import type { LatLng } from "../domain/Clinic";
import { ValidationError } from "../domain/WorkflowErrors";

const EARTH_RADIUS_METERS = 6_371_000;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

// Great-circle distance. Accurate to well under a metre at city scale.
export function haversineMeters(a: LatLng, b: LatLng): number {
  const phi1 = toRadians(a.lat);
  const phi2 = toRadians(b.lat);
  const dPhi = phi2 - phi1;
  const dLambda = toRadians(b.lng - a.lng);

  const h = Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function isValidCoordinate(lat: unknown, lng: unknown): boolean {
  return (
    typeof lat === "number" &&
    typeof lng === "number" &&
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}

export function toCoordinate(lat: number, lng: number, label: string): LatLng {
  if (!isValidCoordinate(lat, lng)) {
    throw new ValidationError(`${label} must be a latitude in [-90, 90] and a longitude in [-180, 180].`, label);
  }
  return { lat, lng };
}
