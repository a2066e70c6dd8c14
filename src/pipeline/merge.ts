import union from "@turf/union";
import unkinkPolygon from "@turf/unkink-polygon";
import booleanValid from "@turf/boolean-valid";
import cleanCoords from "@turf/clean-coords";
import difference from "@turf/difference";
import kinks from "@turf/kinks";
import { featureCollection, polygon as turfPolygon } from "@turf/helpers";
import type { Feature, MultiPolygon, Polygon, Position } from "geojson";
import type { CoastCollection, CoastFeature, LonLat, PolygonFeature, Ring } from "../types/geometry";
import { isPolygonFeature } from "../types/geometry";
import { MIN_CLOSED_RING_POINTS, closePolygonRings } from "../geometry/rings";
import type { StageLogger } from "../utils/logger";

export interface MergeStats {
  inputPolygons: number;
  malformedDropped: number;
  selfIntersectionsFixed: number;
  invalidDropped: number;
  holesDropped: number;
  mergedInput: number;
  outputPolygons: number;
  unionFailed: boolean;
}

export interface MergeResult {
  collection: CoastFeature[];
  stats: MergeStats;
}

export interface MergeOptions {
  logger?: StageLogger;
}

function emptyStats(): MergeStats {
  return {
    inputPolygons: 0,
    malformedDropped: 0,
    selfIntersectionsFixed: 0,
    invalidDropped: 0,
    holesDropped: 0,
    mergedInput: 0,
    outputPolygons: 0,
    unionFailed: false,
  };
}

// ─── Conversions ─────────────────────────────────────────────────────────────

function toPositions(ring: Ring): Position[] {
  return ring.map(([lon, lat]) => [lon, lat]);
}

function toRing(positions: Position[]): Ring {
  return positions.map((position): LonLat => [position[0], position[1]]);
}

function mergedFeature(rings: Position[][]): PolygonFeature | null {
  return closePolygonRings({
    geometry: {
      kind: "polygon",
      exterior: toRing(rings[0] ?? []),
      interiors: rings.slice(1).map(toRing),
    },
    properties: { merged: true },
  });
}

function fromUnion(result: Feature<Polygon | MultiPolygon> | null): PolygonFeature[] {
  if (!result) return [];
  const polygons =
    result.geometry.type === "Polygon" ? [result.geometry.coordinates] : result.geometry.coordinates;
  return polygons
    .map(mergedFeature)
    .filter((feature): feature is PolygonFeature => feature !== null);
}

// ─── Validity ────────────────────────────────────────────────────────────────

/** Drop repeated and collinear vertices. null when the ring collapses. */
function cleanRing(ring: Ring): Position[] | null {
  try {
    const cleaned: Feature<Polygon> = cleanCoords(turfPolygon([toPositions(ring)]), { mutate: false });
    const kept = cleaned.geometry.coordinates[0];
    return kept && kept.length >= MIN_CLOSED_RING_POINTS ? kept : null;
  } catch {
    return null;
  }
}

/** Pieces of a self-intersecting exterior, or null when it needs no split. */
function splitShell(
  shell: Feature<Polygon>,
  stats: MergeStats,
  logger: StageLogger,
): Array<Feature<Polygon>> | null {
  if (kinks(shell).features.length === 0) return null;
  try {
    const unkinked = unkinkPolygon(shell);
    if (unkinked.features.length === 0) return null;
    stats.selfIntersectionsFixed += 1;
    return unkinked.features;
  } catch (error) {
    logger.warn(`    Warning: could not unkink polygon: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function cutHoles(piece: Feature<Polygon>, holes: Position[][]): Array<Feature<Polygon>> {
  const carved = difference(featureCollection<Polygon>([piece, ...holes.map((hole) => turfPolygon([hole]))]));
  if (!carved) return [];
  if (carved.geometry.type === "Polygon") return [turfPolygon(carved.geometry.coordinates)];
  return carved.geometry.coordinates.map((rings) => turfPolygon(rings));
}

/**
 * Clean coordinates, then split a self-intersecting exterior and drop pieces that are
 * still invalid. Only the exterior is validated; a hole may touch its shell at a vertex.
 */
function coerceValid(feature: PolygonFeature, stats: MergeStats, logger: StageLogger): Array<Feature<Polygon>> {
  const shell = cleanRing(feature.geometry.exterior);
  if (!shell) {
    stats.malformedDropped += 1;
    return [];
  }
  const holes: Position[][] = [];
  for (const interior of feature.geometry.interiors) {
    const hole = cleanRing(interior);
    if (hole) holes.push(hole);
    else stats.holesDropped += 1;
  }

  const shellFeature = turfPolygon([shell]);
  const pieces = splitShell(shellFeature, stats, logger);
  if (!pieces) {
    if (booleanValid(shellFeature)) return [turfPolygon([shell, ...holes])];
    stats.invalidDropped += 1;
    return [];
  }

  const valid = pieces.filter((piece) => {
    if (booleanValid(piece)) return true;
    stats.invalidDropped += 1;
    return false;
  });
  return holes.length === 0 ? valid : valid.flatMap((piece) => cutHoles(piece, holes));
}

// ─── Merge ───────────────────────────────────────────────────────────────────

/**
 * Union all land polygons so tile seams disappear. Non-polygon features are appended
 * after the merged polygons. A failing union returns the input untouched.
 */
export function mergeLandPolygons(collection: CoastCollection, options: MergeOptions = {}): MergeResult {
  const logger = options.logger ?? console;
  const stats = emptyStats();

  const others: CoastFeature[] = [];
  const valid: Array<Feature<Polygon>> = [];

  for (const feature of collection) {
    if (!isPolygonFeature(feature)) {
      others.push(feature);
      continue;
    }
    stats.inputPolygons += 1;

    const closed = closePolygonRings(feature);
    if (!closed) {
      stats.malformedDropped += 1;
      continue;
    }
    valid.push(...coerceValid(closed, stats, logger));
  }

  if (stats.malformedDropped > 0) {
    logger.warn(`    Dropped ${stats.malformedDropped} polygon(s) with fewer than 3 distinct points`);
  }
  if (stats.holesDropped > 0) {
    logger.warn(`    Dropped ${stats.holesDropped} hole(s) that collapsed after cleaning`);
  }
  if (stats.invalidDropped > 0) {
    logger.warn(`    Dropped ${stats.invalidDropped} polygon(s) still invalid after repair`);
  }

  if (valid.length === 0) {
    logger.log("    No polygons to merge");
    return { collection: others, stats };
  }

  stats.mergedInput = valid.length;
  logger.log(`    Merging ${valid.length} polygons...`);

  let merged: PolygonFeature[];
  try {
    merged =
      valid.length === 1
        ? fromUnion(valid[0])
        : fromUnion(union(featureCollection<Polygon>(valid)));
  } catch (error) {
    stats.unionFailed = true;
    logger.warn(`    Warning: Merge failed: ${error instanceof Error ? error.message : String(error)}`);
    logger.warn("    Returning original features");
    return { collection: [...collection], stats };
  }

  stats.outputPolygons = merged.length;
  logger.log(`    Merged into ${merged.length} polygon(s)`);

  return { collection: [...merged, ...others], stats };
}
