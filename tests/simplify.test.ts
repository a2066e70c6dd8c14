import { describe, expect, it } from "vitest";
import {
  douglasPeucker,
  segmentDistance,
  simplifyCollection,
  simplifyRing,
} from "../src/pipeline/simplify";
import { DEFAULT_LOD_LEVELS, buildLods, lodLevelsFromTolerances } from "../src/pipeline/lod";
import { polygonFeature } from "../src/types/geometry";
import type { CoastFeature, LonLat, Ring } from "../src/types/geometry";

/** Deterministic wobbly island: radius varies with a few harmonics. */
function island(points: number, radius = 1): LonLat[] {
  const ring: LonLat[] = [];
  for (let i = 0; i < points; i += 1) {
    const a = (i / points) * Math.PI * 2;
    const r = radius * (1 + 0.1 * Math.sin(5 * a) + 0.03 * Math.cos(17 * a) + 0.005 * Math.sin(131 * a));
    ring.push([r * Math.cos(a), r * Math.sin(a)]);
  }
  ring.push(ring[0]);
  return ring;
}

function minDistanceToPath(point: LonLat, path: readonly LonLat[]): number {
  let best = Infinity;
  for (let i = 0; i + 1 < path.length; i += 1) {
    best = Math.min(best, segmentDistance(point, path[i], path[i + 1]));
  }
  return best;
}

describe("segmentDistance", () => {
  it("measures perpendicular distance inside the segment span", () => {
    expect(segmentDistance([1, 1], [0, 0], [2, 0])).toBe(1);
  });

  it("clamps to the nearest endpoint beyond the span", () => {
    expect(segmentDistance([3, 0], [0, 0], [2, 0])).toBe(1);
  });

  it("falls back to endpoint distance for a zero-length segment", () => {
    expect(segmentDistance([3, 4], [0, 0], [0, 0])).toBe(5);
  });
});

describe("douglasPeucker", () => {
  it("is the identity at tolerance 0", () => {
    const ring = island(200);
    expect(douglasPeucker(ring, 0)).toEqual(ring);
  });

  it("rejects negative and non-finite tolerances", () => {
    expect(() => douglasPeucker([[0, 0], [1, 1], [2, 0]], -0.1)).toThrow(RangeError);
    expect(() => douglasPeucker([[0, 0], [1, 1], [2, 0]], Number.NaN)).toThrow(RangeError);
  });

  it("returns inputs of two points or fewer as a copy", () => {
    const pair: LonLat[] = [[0, 0], [0, 0]];
    const out = douglasPeucker(pair, 1);
    expect(out).toEqual([[0, 0], [0, 0]]);
    expect(out).not.toBe(pair);
    expect(douglasPeucker([], 1)).toEqual([]);
  });

  it("collapses an open polyline within tolerance to its endpoints", () => {
    const line: LonLat[] = [[0, 0], [1, 0.05], [2, 0]];
    expect(douglasPeucker(line, 0.1)).toEqual([[0, 0], [2, 0]]);
    expect(douglasPeucker(line, 0.01)).toEqual(line);
  });

  it("simplifies a closed ring without its closing point and re-closes it", () => {
    const ring: LonLat[] = [[0, 0], [1, 0.001], [2, 0], [2, 2], [0, 2], [0, 0]];
    expect(douglasPeucker(ring, 0.01)).toEqual([[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]]);
  });

  it("re-closes a ring that collapses to its start", () => {
    const square: LonLat[] = [[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]];
    expect(douglasPeucker(square, 10)).toEqual([[0, 0], [0, 1], [0, 0]]);
  });

  it("only keeps original points, each original point within tolerance", () => {
    const ring = island(2000);
    const tolerance = 0.01;
    const simplified = douglasPeucker(ring, tolerance);
    const originals = new Set(ring.map(([lon, lat]) => `${lon},${lat}`));

    expect(simplified.length).toBeLessThan(ring.length);
    for (const [lon, lat] of simplified) {
      expect(originals.has(`${lon},${lat}`)).toBe(true);
    }
    for (const point of ring) {
      expect(minDistanceToPath(point, simplified)).toBeLessThanOrEqual(tolerance);
    }
  });

  it("never gains points as the tolerance grows", () => {
    const ring = island(3000);
    const counts = [0, 0.0001, 0.001, 0.005, 0.02, 0.1, 0.5].map(
      (tolerance) => douglasPeucker(ring, tolerance).length,
    );
    for (let i = 1; i < counts.length; i += 1) {
      expect(counts[i]).toBeLessThanOrEqual(counts[i - 1]);
    }
  });

  it("handles rings with tens of thousands of points", () => {
    const ring = island(60000);
    const simplified = douglasPeucker(ring, 0.0005);
    expect(simplified[0]).toEqual(simplified[simplified.length - 1]);
    expect(simplified.length).toBeGreaterThan(4);
    expect(simplified.length).toBeLessThan(ring.length);
  });
});

describe("simplifyRing", () => {
  it("keeps the original ring when simplification would leave it degenerate", () => {
    const square: Ring = [[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]];
    expect(simplifyRing(square, 10)).toBe(square);
  });

  it("closes a simplified open ring", () => {
    const open: Ring = [[0, 0], [1, 0.001], [2, 0], [2, 2], [0, 2]];
    expect(simplifyRing(open, 0.01)).toEqual([[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]]);
  });
});

describe("simplifyCollection", () => {
  it("simplifies exterior and hole rings and passes lines through", () => {
    const line: CoastFeature = {
      geometry: { kind: "line", points: [[0, 0], [1, 0.001], [2, 0]] },
      properties: { kind: "shoreline" },
    };
    const polygon = polygonFeature(
      [[0, 0], [5, 0.001], [10, 0], [10, 10], [0, 10], [0, 0]],
      [[[2, 2], [3, 2.001], [4, 2], [4, 4], [2, 4], [2, 2]]],
      { name: "island" },
    );

    const out = simplifyCollection([polygon, line], 0.01);

    expect(out[1]).toBe(line);
    expect(out[0]).toEqual(
      polygonFeature(
        [[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]],
        [[[2, 2], [4, 2], [4, 4], [2, 4], [2, 2]]],
        { name: "island" },
      ),
    );
    expect(polygon.geometry.exterior).toHaveLength(6);
  });

  it("returns the features unchanged at tolerance 0", () => {
    const polygon = polygonFeature(island(50));
    expect(simplifyCollection([polygon], 0)[0]).toBe(polygon);
  });
});

describe("buildLods", () => {
  it("derives every level from the same base collection", () => {
    const base = [polygonFeature(island(5000))];
    const lods = buildLods(base);

    expect(lods.map((lod) => lod.level.name)).toEqual(["lod0", "lod1", "lod2", "lod3", "lod4", "lod5"]);
    expect(lods[0].pointCount).toBe(5001);
    for (const lod of lods) {
      expect(lod.collection).toEqual(simplifyCollection(base, lod.level.tolerance));
    }
    for (let i = 1; i < lods.length; i += 1) {
      expect(lods[i].pointCount).toBeLessThanOrEqual(lods[i - 1].pointCount);
    }
  });

  it("ships six default levels from 0 to 0.002 degrees", () => {
    expect(DEFAULT_LOD_LEVELS.map((level) => level.tolerance)).toEqual([
      0, 0.00005, 0.0001, 0.0003, 0.0008, 0.002,
    ]);
  });

  it("names custom ladders by position", () => {
    expect(lodLevelsFromTolerances([0, 0.01])).toEqual([
      { name: "lod0", tolerance: 0 },
      { name: "lod1", tolerance: 0.01 },
    ]);
    expect(() => lodLevelsFromTolerances([0, -1])).toThrow(RangeError);
  });
});
