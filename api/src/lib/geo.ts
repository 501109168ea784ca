const EARTH_RADIUS_M = 6_371_008.8;

function toRadians(deg: number) {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in metres between two [longitude, latitude] points. */
export function haversineDistance(
  [lng1, lat1]: readonly [number, number],
  [lng2, lat2]: readonly [number, number]
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(a)));
}
