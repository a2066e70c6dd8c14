import type {
  Feature,
  FeatureCollection,
  GeoJsonProperties,
  Geometry,
  LineString,
  Polygon,
  Position,
} from "geojson";
import type {
  CoastCollection,
  CoastFeature,
  LineFeature,
  LonLat,
  PolygonFeature,
  Ring,
} from "../types/geometry";
import { isLineFeature } from "../types/geometry";
import type { StageLogger } from "../utils/logger";
import { MIN_CLOSED_RING_POINTS, closeRing } from "./rings";

export interface NormalizeStats {
  inputFeatures: number;
  polygons: number;
  lines: number;
  skippedGeometries: number;
  droppedPositions: number;
}

export interface NormalizeResult {
  collection: CoastFeature[];
  stats: NormalizeStats;
}

/** Keep lon/lat only; positions with missing or non-finite values are dropped. */
function toPoints(positions: Position[], stats: NormalizeStats): LonLat[] {
  const out: LonLat[] = [];
  for (const position of positions) {
    const lon = position[0];
    const lat = position[1];
    if (position.length < 2 || !Number.isFinite(lon) || !Number.isFinite(lat)) {
      stats.droppedPositions += 1;
      continue;
    }
    out.push([lon, lat]);
  }
  return out;
}

function polygonFromRings(
  rings: Position[][],
  properties: GeoJsonProperties,
  stats: NormalizeStats,
): PolygonFeature | null {
  if (rings.length === 0) return null;
  return {
    geometry: {
      kind: "polygon",
      exterior: toPoints(rings[0], stats),
      interiors: rings.slice(1).map((ring) => toPoints(ring, stats)),
    },
    properties,
  };
}

function lineFromPositions(
  positions: Position[],
  properties: GeoJsonProperties,
  stats: NormalizeStats,
): LineFeature {
  return {
    geometry: { kind: "line", points: toPoints(positions, stats) },
    properties,
  };
}

function normalizeGeometry(
  geometry: Geometry | null,
  properties: GeoJsonProperties,
  stats: NormalizeStats,
): CoastFeature[] {
  if (!geometry) return [];

  switch (geometry.type) {
    case "Polygon": {
      const polygon = polygonFromRings(geometry.coordinates, properties, stats);
      return polygon ? [polygon] : [];
    }
    case "MultiPolygon":
      return geometry.coordinates
        .map((rings) => polygonFromRings(rings, { ...(properties ?? {}) }, stats))
        .filter((polygon): polygon is PolygonFeature => polygon !== null);
    case "LineString":
      return [lineFromPositions(geometry.coordinates, properties, stats)];
    case "MultiLineString":
      return geometry.coordinates.map((line) =>
        lineFromPositions(line, { ...(properties ?? {}) }, stats),
      );
    case "GeometryCollection":
      return geometry.geometries.flatMap((member) =>
        normalizeGeometry(member, { ...(properties ?? {}) }, stats),
      );
    default:
      return [];
  }
}

/**
 * Resolve a GeoJSON FeatureCollection into the tagged coastline model.
 * Multi-geometries are flattened to one feature per member. Rings are left as found.
 */
export function fromGeoJson(fc: FeatureCollection<Geometry | null>): NormalizeResult {
  const stats: NormalizeStats = {
    inputFeatures: fc.features.length,
    polygons: 0,
    lines: 0,
    skippedGeometries: 0,
    droppedPositions: 0,
  };

  const collection: CoastFeature[] = [];
  for (const feature of fc.features) {
    const normalized = normalizeGeometry(
      feature.geometry,
      { ...(feature.properties ?? {}) },
      stats,
    );
    if (normalized.length === 0) {
      stats.skippedGeometries += 1;
      continue;
    }
    for (const item of normalized) {
      if (item.geometry.kind === "polygon") stats.polygons += 1;
      else stats.lines += 1;
      collection.push(item);
    }
  }

  return { collection, stats };
}

function toPositions(ring: Ring): Position[] {
  return ring.map(([lon, lat]) => [lon, lat]);
}

export function toGeoJson(collection: CoastCollection): FeatureCollection<Polygon | LineString> {
  const features = collection.map((feature): Feature<Polygon | LineString> => {
    const geometry = feature.geometry;
    if (geometry.kind === "line") {
      return {
        type: "Feature",
        properties: feature.properties,
        geometry: { type: "LineString", coordinates: toPositions(geometry.points) },
      };
    }
    return {
      type: "Feature",
      properties: feature.properties,
      geometry: {
        type: "Polygon",
        coordinates: [geometry.exterior, ...geometry.interiors].map(toPositions),
      },
    };
  });
  return { type: "FeatureCollection", features };
}

/**
 * Promote shoreline polylines to area data by closing each one into a hole-free polygon.
 * Lines that cannot form a ring are dropped with a diagnostic.
 */
export function linesToAreas(
  collection: CoastCollection,
  logger: StageLogger = console,
): CoastFeature[] {
  const out: CoastFeature[] = [];
  let dropped = 0;

  for (const feature of collection) {
    if (!isLineFeature(feature)) {
      out.push(feature);
      continue;
    }
    const ring = closeRing(feature.geometry.points);
    if (feature.geometry.points.length < 2 || ring.length < MIN_CLOSED_RING_POINTS) {
      dropped += 1;
      continue;
    }
    out.push({
      geometry: { kind: "polygon", exterior: ring, interiors: [] },
      properties: { ...(feature.properties ?? {}), from_line: true },
    });
  }

  if (dropped > 0) {
    logger.warn(`  Dropped ${dropped} line(s) too short to close into a ring`);
  }
  return out;
}
