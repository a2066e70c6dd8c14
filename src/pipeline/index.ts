import type { CoastCollection, CoastFeature } from "../types/geometry";
import { isPolygonFeature } from "../types/geometry";
import { closePolygonRings, countPoints } from "../geometry/rings";
import { linesToAreas } from "../geometry/geojson";
import { encodeNvtl } from "../codec/nvtl";
import type { StageLogger } from "../utils/logger";
import { DEFAULT_ARTIFACT_THRESHOLDS, filterArtifacts } from "./artifacts";
import type { ArtifactThresholds } from "./artifacts";
import { mergeLandPolygons } from "./merge";
import type { MergeStats } from "./merge";
import { DEFAULT_LOD_LEVELS, buildLods } from "./lod";
import type { LodLevel } from "./lod";

export interface PipelineOptions {
  levels?: readonly LodLevel[];
  filterArtifacts?: boolean;
  merge?: boolean;
  /** Close shoreline polylines into polygons so the encoder keeps them. */
  linesAsAreas?: boolean;
  artifactThresholds?: ArtifactThresholds;
  logger?: StageLogger;
}

export interface PipelineLevel {
  name: string;
  tolerance: number;
  collection: CoastFeature[];
  pointCount: number;
  bytes: Uint8Array;
}

export interface PipelineStats {
  inputFeatures: number;
  inputPoints: number;
  degenerateDropped: number;
  artifactsRemoved: number;
  merge: MergeStats | null;
  baseFeatures: number;
  basePoints: number;
}

export interface PipelineResult {
  /** Filtered and merged geometry every level was derived from. */
  base: CoastFeature[];
  levels: PipelineLevel[];
  stats: PipelineStats;
}

function closeAllRings(collection: CoastCollection): { collection: CoastFeature[]; dropped: number } {
  const out: CoastFeature[] = [];
  let dropped = 0;
  for (const feature of collection) {
    if (!isPolygonFeature(feature)) {
      out.push(feature);
      continue;
    }
    const closed = closePolygonRings(feature);
    if (closed) out.push(closed);
    else dropped += 1;
  }
  return { collection: out, dropped };
}

/**
 * Normalized input -> artifact filter -> merger -> one simplified, encoded collection
 * per LOD level.
 */
export function runPipeline(input: CoastCollection, options: PipelineOptions = {}): PipelineResult {
  const logger = options.logger ?? console;
  const levels = options.levels ?? DEFAULT_LOD_LEVELS;

  const stats: PipelineStats = {
    inputFeatures: input.length,
    inputPoints: countPoints(input),
    degenerateDropped: 0,
    artifactsRemoved: 0,
    merge: null,
    baseFeatures: 0,
    basePoints: 0,
  };

  const promoted = options.linesAsAreas ? linesToAreas(input, logger) : input;

  const closed = closeAllRings(promoted);
  stats.degenerateDropped = closed.dropped;
  if (closed.dropped > 0) {
    logger.warn(`  Dropped ${closed.dropped} degenerate polygon(s)`);
  }
  let base = closed.collection;

  if (options.filterArtifacts ?? true) {
    const filtered = filterArtifacts(base, options.artifactThresholds ?? DEFAULT_ARTIFACT_THRESHOLDS);
    stats.artifactsRemoved = filtered.removed;
    logger.log(`  Removed ${filtered.removed} tile-boundary artifact(s)`);
    base = filtered.collection;
  }

  if (options.merge ?? true) {
    logger.log("  Merging land polygons to eliminate cell boundaries...");
    const merged = mergeLandPolygons(base, { logger });
    stats.merge = merged.stats;
    base = merged.collection;
  }

  stats.baseFeatures = base.length;
  stats.basePoints = countPoints(base);

  const lods = buildLods(base, levels).map(({ level, collection, pointCount }) => ({
    name: level.name,
    tolerance: level.tolerance,
    collection,
    pointCount,
    bytes: encodeNvtl(collection),
  }));

  return { base, levels: lods, stats };
}
