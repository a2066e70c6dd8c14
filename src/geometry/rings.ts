import type { Bounds, CoastCollection, LonLat, PolygonFeature, Ring } from "../types/geometry";
import { ZERO_BOUNDS, isPolygonFeature } from "../types/geometry";

/** Minimum positions in a closed ring: three distinct corners plus the closing duplicate. */
export const MIN_CLOSED_RING_POINTS = 4;

/** Bitwise equality: 0 and -0 differ, NaN equals NaN. */
export function samePoint(a: LonLat, b: LonLat): boolean {
  return Object.is(a[0], b[0]) && Object.is(a[1], b[1]);
}

/** Ensure ring is closed (first == last coordinate). Returns the input when already closed. */
export function closeRing(ring: Ring): Ring {
  if (ring.length === 0) return ring;
  const first = ring[0];
  if (samePoint(first, ring[ring.length - 1])) return ring;
  return [...ring, first];
}

export function isClosed(ring: Ring): boolean {
  return ring.length > 1 && samePoint(ring[0], ring[ring.length - 1]);
}

export function distinctPointCount(ring: Ring): number {
  return new Set(ring.map(([lon, lat]) => `${lon},${lat}`)).size;
}

/** Fewer than 3 distinct points, or fewer than 4 positions once closed. */
export function ringIsDegenerate(ring: Ring): boolean {
  return closeRing(ring).length < MIN_CLOSED_RING_POINTS || distinctPointCount(ring) < 3;
}

/**
 * Shoelace area over a closed ring, ignoring the closing duplicate.
 * Absolute value, in squared degrees.
 */
export function ringArea(ring: Ring): number {
  const n = ring.length - 1;
  if (n < 3) return 0;
  let sum = 0;
  for (let i = 0; i < n; i += 1) {
    const j = (i + 1) % n;
    sum += ring[i][0] * ring[j][1];
    sum -= ring[j][0] * ring[i][1];
  }
  return Math.abs(sum) / 2;
}

export function ringBounds(ring: Ring): Bounds | null {
  if (ring.length === 0) return null;
  return ring.reduce<Bounds>(
    (box, [lon, lat]) => ({
      minLon: Math.min(box.minLon, lon),
      minLat: Math.min(box.minLat, lat),
      maxLon: Math.max(box.maxLon, lon),
      maxLat: Math.max(box.maxLat, lat),
    }),
    { minLon: Infinity, minLat: Infinity, maxLon: -Infinity, maxLat: -Infinity },
  );
}

function unionBounds(a: Bounds, b: Bounds): Bounds {
  return {
    minLon: Math.min(a.minLon, b.minLon),
    minLat: Math.min(a.minLat, b.minLat),
    maxLon: Math.max(a.maxLon, b.maxLon),
    maxLat: Math.max(a.maxLat, b.maxLat),
  };
}

/**
 * Bounds over every polygon exterior ring. Holes and line features are ignored.
 * A collection without polygons has zero bounds.
 */
export function collectionBounds(collection: CoastCollection): Bounds {
  const polygons = collection.filter(isPolygonFeature);
  if (polygons.length === 0) return ZERO_BOUNDS;

  const bounds = polygons
    .map((feature) => ringBounds(feature.geometry.exterior))
    .reduce<Bounds | null>((acc, box) => (box ? (acc ? unionBounds(acc, box) : box) : acc), null);

  if (
    !bounds ||
    !Number.isFinite(bounds.minLon) ||
    !Number.isFinite(bounds.minLat) ||
    !Number.isFinite(bounds.maxLon) ||
    !Number.isFinite(bounds.maxLat)
  ) {
    throw new Error(`Cannot compute bounds of ${polygons.length} polygon(s): exterior rings are empty or non-finite`);
  }
  return bounds;
}

export function countPoints(collection: CoastCollection): number {
  let total = 0;
  for (const feature of collection) {
    const geometry = feature.geometry;
    if (geometry.kind === "line") {
      total += geometry.points.length;
      continue;
    }
    total += geometry.exterior.length;
    for (const hole of geometry.interiors) total += hole.length;
  }
  return total;
}

/**
 * Close every ring of a polygon feature. Degenerate holes are dropped; a degenerate
 * exterior drops the whole feature (returns null).
 */
export function closePolygonRings(feature: PolygonFeature): PolygonFeature | null {
  if (ringIsDegenerate(feature.geometry.exterior)) return null;
  const exterior = closeRing(feature.geometry.exterior);
  const interiors = feature.geometry.interiors
    .filter((hole) => !ringIsDegenerate(hole))
    .map(closeRing);
  return {
    geometry: { kind: "polygon", exterior, interiors },
    properties: feature.properties,
  };
}
