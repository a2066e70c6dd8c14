import { describe, expect, it } from "vitest";
import {
  closePolygonRings,
  closeRing,
  collectionBounds,
  countPoints,
  ringArea,
  ringIsDegenerate,
} from "../src/geometry/rings";
import { ZERO_BOUNDS, polygonFeature } from "../src/types/geometry";
import type { CoastFeature, Ring } from "../src/types/geometry";

const UNIT_SQUARE: Ring = [
  [0, 0],
  [1, 0],
  [1, 1],
  [0, 1],
  [0, 0],
];

describe("closeRing", () => {
  it("appends the first point to an open ring", () => {
    expect(closeRing([[0, 0], [1, 0], [1, 1]])).toEqual([[0, 0], [1, 0], [1, 1], [0, 0]]);
  });

  it("returns an already closed ring untouched", () => {
    expect(closeRing(UNIT_SQUARE)).toBe(UNIT_SQUARE);
  });

  it("treats 0 and -0 as different coordinates", () => {
    expect(closeRing([[0, 0], [1, 0], [1, 1], [-0, 0]])).toHaveLength(5);
  });
});

describe("ringIsDegenerate", () => {
  it("flags rings with fewer than four points after closure", () => {
    expect(ringIsDegenerate([[0, 0], [1, 0]])).toBe(true);
    expect(ringIsDegenerate([[0, 0], [1, 0], [0, 0]])).toBe(true);
  });

  it("flags rings with fewer than three distinct points", () => {
    expect(ringIsDegenerate([[0, 0], [0, 0], [1, 1]])).toBe(true);
    expect(ringIsDegenerate([[0, 0], [1, 1], [0, 0], [1, 1], [0, 0]])).toBe(true);
  });

  it("accepts a triangle, open or closed", () => {
    expect(ringIsDegenerate([[0, 0], [1, 0], [1, 1]])).toBe(false);
    expect(ringIsDegenerate([[0, 0], [1, 0], [1, 1], [0, 0]])).toBe(false);
  });
});

describe("ringArea", () => {
  it("ignores the closing duplicate", () => {
    expect(ringArea(UNIT_SQUARE)).toBe(1);
    expect(ringArea([[0, 0], [4, 1], [5, 4], [1, 3], [0, 0]])).toBe(11);
  });
});

describe("collectionBounds", () => {
  it("is zero for an empty collection", () => {
    expect(collectionBounds([])).toEqual(ZERO_BOUNDS);
  });

  it("scans exterior rings only", () => {
    const line: CoastFeature = {
      geometry: { kind: "line", points: [[-50, -50], [50, 50]] },
      properties: {},
    };
    const withHole = polygonFeature(
      [[0, 0], [4, 0], [4, 3], [0, 3], [0, 0]],
      [[[1, 1], [2, 1], [2, 2], [1, 1]]],
    );
    const other = polygonFeature([[-1, 2], [1, 2], [1, 5], [-1, 2]]);

    expect(collectionBounds([line, withHole, other])).toEqual({
      minLon: -1,
      minLat: 0,
      maxLon: 4,
      maxLat: 5,
    });
  });

  it("rejects polygons without exterior points", () => {
    expect(() => collectionBounds([polygonFeature([])])).toThrow(/Cannot compute bounds/);
  });
});

describe("countPoints", () => {
  it("counts every ring and line position", () => {
    const line: CoastFeature = { geometry: { kind: "line", points: [[0, 0], [1, 1]] }, properties: {} };
    const polygon = polygonFeature(UNIT_SQUARE, [[[0.2, 0.2], [0.4, 0.2], [0.4, 0.4], [0.2, 0.2]]]);
    expect(countPoints([line, polygon])).toBe(2 + 5 + 4);
  });
});

describe("closePolygonRings", () => {
  it("closes rings and drops degenerate holes", () => {
    const closed = closePolygonRings(
      polygonFeature(
        [[0, 0], [3, 0], [3, 3], [0, 3]],
        [
          [[1, 1], [2, 1], [2, 2]],
          [[1, 1], [2, 2]],
        ],
        { id: 7 },
      ),
    );
    expect(closed).toEqual({
      geometry: {
        kind: "polygon",
        exterior: [[0, 0], [3, 0], [3, 3], [0, 3], [0, 0]],
        interiors: [[[1, 1], [2, 1], [2, 2], [1, 1]]],
      },
      properties: { id: 7 },
    });
  });

  it("returns null for a degenerate exterior", () => {
    expect(closePolygonRings(polygonFeature([[0, 0], [1, 1]]))).toBeNull();
    expect(closePolygonRings(polygonFeature([[0, 0], [0, 0], [1, 1]]))).toBeNull();
  });

  it("drops holes with a repeated corner that leaves two distinct points", () => {
    const closed = closePolygonRings(
      polygonFeature([[0, 0], [3, 0], [3, 3], [0, 3]], [[[1, 1], [1, 1], [2, 2]]]),
    );
    expect(closed?.geometry.interiors).toEqual([]);
  });
});
