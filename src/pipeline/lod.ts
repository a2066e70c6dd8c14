import type { CoastCollection, CoastFeature } from "../types/geometry";
import { countPoints } from "../geometry/rings";
import { assertTolerance, simplifyCollection } from "./simplify";

export interface LodLevel {
  name: string;
  /** Douglas-Peucker tolerance in degrees. 0 keeps full source detail. */
  tolerance: number;
}

// Lower = more detailed. Harbor-scale survey data is dense, so the fine end is tight.
export const DEFAULT_LOD_LEVELS: readonly LodLevel[] = [
  { name: "lod0", tolerance: 0 },
  { name: "lod1", tolerance: 0.00005 },
  { name: "lod2", tolerance: 0.0001 },
  { name: "lod3", tolerance: 0.0003 },
  { name: "lod4", tolerance: 0.0008 },
  { name: "lod5", tolerance: 0.002 },
];

export function lodLevelsFromTolerances(tolerances: readonly number[]): LodLevel[] {
  return tolerances.map((tolerance, index) => {
    assertTolerance(tolerance);
    return { name: `lod${index}`, tolerance };
  });
}

export interface LodOutput {
  level: LodLevel;
  collection: CoastFeature[];
  pointCount: number;
}

/**
 * Simplify the same base collection once per level. Levels never feed each other,
 * so error does not compound down the ladder.
 */
export function buildLods(
  base: CoastCollection,
  levels: readonly LodLevel[] = DEFAULT_LOD_LEVELS,
): LodOutput[] {
  return levels.map((level) => {
    const collection = simplifyCollection(base, level.tolerance);
    return { level, collection, pointCount: countPoints(collection) };
  });
}
