import type { CoastCollection, CoastFeature } from "../types/geometry";
import { closeRing, ringArea, ringBounds } from "../geometry/rings";

/**
 * Thresholds for spotting chart-cell / tile-boundary rectangles.
 * These are tuned heuristics: a genuinely rectangular basin or pier can trip them.
 */
export interface ArtifactThresholds {
  /** Closed-ring size range considered for classification. */
  minPoints: number;
  maxPoints: number;
  /** Boxes thinner than this (degrees) are real features, never tile edges. */
  minExtentDeg: number;
  /** Polygon area / bbox area above which the ring counts as a rectangle. */
  fillRatio: number;
  /** Per-edge axis-alignment tolerance (degrees) for the quadrilateral check. */
  axisToleranceDeg: number;
}

export const DEFAULT_ARTIFACT_THRESHOLDS: ArtifactThresholds = {
  minPoints: 4,
  maxPoints: 10,
  minExtentDeg: 0.0001,
  fillRatio: 0.95,
  axisToleranceDeg: 0.001,
};

export function isTileBoundaryArtifact(
  feature: CoastFeature,
  thresholds: ArtifactThresholds = DEFAULT_ARTIFACT_THRESHOLDS,
): boolean {
  if (feature.geometry.kind !== "polygon") return false;

  const exterior = closeRing(feature.geometry.exterior);
  if (exterior.length < thresholds.minPoints || exterior.length > thresholds.maxPoints) {
    return false;
  }

  const box = ringBounds(exterior);
  if (!box) return false;
  const width = box.maxLon - box.minLon;
  const height = box.maxLat - box.minLat;
  if (width < thresholds.minExtentDeg || height < thresholds.minExtentDeg) return false;

  const boxArea = width * height;
  const ratio = boxArea > 0 ? ringArea(exterior) / boxArea : 0;
  if (ratio > thresholds.fillRatio) return true;

  // Closed quadrilateral whose four edges all run along a meridian or parallel
  if (exterior.length === 5) {
    let aligned = 0;
    for (let i = 0; i < 4; i += 1) {
      const dx = Math.abs(exterior[i][0] - exterior[i + 1][0]);
      const dy = Math.abs(exterior[i][1] - exterior[i + 1][1]);
      if (dx < thresholds.axisToleranceDeg || dy < thresholds.axisToleranceDeg) aligned += 1;
    }
    if (aligned === 4) return true;
  }

  return false;
}

export interface ArtifactFilterResult {
  collection: CoastFeature[];
  removed: number;
}

/** Drop tile-boundary rectangles; everything else passes through in order. */
export function filterArtifacts(
  collection: CoastCollection,
  thresholds: ArtifactThresholds = DEFAULT_ARTIFACT_THRESHOLDS,
): ArtifactFilterResult {
  const kept = collection.filter((feature) => !isTileBoundaryArtifact(feature, thresholds));
  return { collection: kept, removed: collection.length - kept.length };
}
