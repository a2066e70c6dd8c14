import type { GeoJsonProperties } from "geojson";

/** Longitude/latitude pair in WGS84 degrees. */
export type LonLat = readonly [lon: number, lat: number];

/** Ordered boundary points. Closed (first === last) once the pipeline has touched it. */
export type Ring = readonly LonLat[];

export interface PolygonGeometry {
  kind: "polygon";
  exterior: Ring;
  interiors: readonly Ring[];
}

/** Open shoreline polyline, kept apart from area data until promoted. */
export interface LineGeometry {
  kind: "line";
  points: readonly LonLat[];
}

export type CoastGeometry = PolygonGeometry | LineGeometry;

export interface CoastFeature<G extends CoastGeometry = CoastGeometry> {
  geometry: G;
  /** Provenance only; never read by the geometry stages. */
  properties: GeoJsonProperties;
}

export type PolygonFeature = CoastFeature<PolygonGeometry>;
export type LineFeature = CoastFeature<LineGeometry>;

export type CoastCollection = readonly CoastFeature[];

export interface Bounds {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
}

export const ZERO_BOUNDS: Bounds = Object.freeze({
  minLon: 0,
  minLat: 0,
  maxLon: 0,
  maxLat: 0,
});

export function isPolygonFeature(feature: CoastFeature): feature is PolygonFeature {
  return feature.geometry.kind === "polygon";
}

export function isLineFeature(feature: CoastFeature): feature is LineFeature {
  return feature.geometry.kind === "line";
}

export function polygonFeature(
  exterior: Ring,
  interiors: readonly Ring[] = [],
  properties: GeoJsonProperties = {},
): PolygonFeature {
  return {
    geometry: { kind: "polygon", exterior, interiors },
    properties,
  };
}
