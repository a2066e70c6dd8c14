import type { CoastCollection, CoastFeature, LonLat, PolygonGeometry, Ring } from "../types/geometry";
import { MIN_CLOSED_RING_POINTS, isClosed, samePoint } from "../geometry/rings";

export function assertTolerance(tolerance: number): void {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new RangeError(`Invalid simplify tolerance: ${tolerance}. Use a non-negative number of degrees.`);
  }
}

/**
 * Distance from `point` to the segment `start`-`end`. The projection is clamped to the
 * segment, and a zero-length segment measures to `start`.
 */
export function segmentDistance(point: LonLat, start: LonLat, end: LonLat): number {
  const [px, py] = point;
  const [sx, sy] = start;
  const [ex, ey] = end;
  const dx = ex - sx;
  const dy = ey - sy;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) return Math.hypot(px - sx, py - sy);
  const t = Math.max(0, Math.min(1, ((px - sx) * dx + (py - sy) * dy) / lengthSq));
  return Math.hypot(px - (sx + t * dx), py - (sy + t * dy));
}

/**
 * Douglas-Peucker over an open polyline with fixed endpoints.
 *
 * Spans are processed from an explicit work stack so rings with tens of thousands of
 * points cannot exhaust the call stack. The kept indices are exactly those the recursive
 * formulation keeps: on ties the first farthest point wins.
 */
function douglasPeuckerOpen(points: readonly LonLat[], tolerance: number): LonLat[] {
  const n = points.length;
  if (n <= 2) return [...points];

  const keep = new Uint8Array(n);
  keep[0] = 1;
  keep[n - 1] = 1;

  const stack: Array<[first: number, last: number]> = [[0, n - 1]];
  while (stack.length > 0) {
    const span = stack.pop();
    if (!span) break;
    const [first, last] = span;
    if (last - first < 2) continue;

    let maxDistance = -1;
    let index = first;
    for (let i = first + 1; i < last; i += 1) {
      const distance = segmentDistance(points[i], points[first], points[last]);
      if (distance > maxDistance) {
        maxDistance = distance;
        index = i;
      }
    }

    if (maxDistance > tolerance) {
      keep[index] = 1;
      stack.push([index, last], [first, index]);
    }
  }

  const out: LonLat[] = [];
  for (let i = 0; i < n; i += 1) {
    if (keep[i]) out.push(points[i]);
  }
  return out;
}

/**
 * Simplify a ring or polyline. Closed input (first == last) is simplified without its
 * closing duplicate and re-closed afterwards. Tolerance 0 returns the input unchanged.
 */
export function douglasPeucker(points: readonly LonLat[], tolerance: number): LonLat[] {
  assertTolerance(tolerance);
  if (points.length <= 2 || tolerance === 0) return [...points];

  const closed = isClosed(points);
  const working = closed ? points.slice(0, -1) : points;

  const simplified = douglasPeuckerOpen(working, tolerance);
  if (closed && !samePoint(simplified[0], simplified[simplified.length - 1])) {
    simplified.push(simplified[0]);
  }
  return simplified;
}

/** Simplified ring, or the original when simplification would leave it degenerate. */
export function simplifyRing(ring: Ring, tolerance: number): Ring {
  const simplified = douglasPeucker(ring, tolerance);
  if (simplified.length < MIN_CLOSED_RING_POINTS) return ring;
  if (!samePoint(simplified[0], simplified[simplified.length - 1])) {
    simplified.push(simplified[0]);
  }
  return simplified;
}

function simplifyPolygon(geometry: PolygonGeometry, tolerance: number): PolygonGeometry {
  return {
    kind: "polygon",
    exterior: simplifyRing(geometry.exterior, tolerance),
    interiors: geometry.interiors.map((hole) => simplifyRing(hole, tolerance)),
  };
}

/**
 * One LOD level: every polygon ring simplified at `tolerance` degrees. Line features pass
 * through unchanged. The input collection is not modified.
 */
export function simplifyCollection(collection: CoastCollection, tolerance: number): CoastFeature[] {
  assertTolerance(tolerance);
  if (tolerance === 0) return [...collection];

  return collection.map((feature) => {
    if (feature.geometry.kind !== "polygon") return feature;
    return {
      geometry: simplifyPolygon(feature.geometry, tolerance),
      properties: feature.properties,
    };
  });
}
