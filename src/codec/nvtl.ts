/**
 * NVTL binary coastline container.
 *
 * Little-endian, no padding:
 *   magic "NVTL" (4) | version u16 | polygon count u32 | bounds 4 x f64
 *   per polygon: exterior count u32 | hole count u32 | exterior (lon f64, lat f64)...
 *                per hole: count u32 | (lon f64, lat f64)...
 */

import type { Bounds, CoastCollection, LonLat, PolygonFeature, Ring } from "../types/geometry";
import { isPolygonFeature } from "../types/geometry";
import { collectionBounds } from "../geometry/rings";

export const NVTL_MAGIC = "NVTL";
export const NVTL_VERSION = 1;
export const NVTL_HEADER_BYTES = 4 + 2 + 4 + 4 * 8;

const POINT_BYTES = 16;
const UINT32_MAX = 0xffffffff;

// ─── Errors ──────────────────────────────────────────────────────────────────

export type NvtlErrorCode = "not-nvtl" | "corrupt";

export abstract class NvtlDecodeError extends Error {
  abstract readonly code: NvtlErrorCode;
}

/** The buffer is not NVTL at all: wrong magic or an unsupported version. */
export class NvtlFormatError extends NvtlDecodeError {
  readonly code = "not-nvtl";

  constructor(message: string) {
    super(message);
    this.name = "NvtlFormatError";
  }
}

/** NVTL header found, but the payload is cut short or has bytes past its end. */
export class NvtlCorruptError extends NvtlDecodeError {
  readonly code = "corrupt";

  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(message);
    this.name = "NvtlCorruptError";
  }
}

// ─── Encode ──────────────────────────────────────────────────────────────────

function checkedCount(count: number, what: string): number {
  if (count > UINT32_MAX) {
    throw new RangeError(`${what} count ${count} does not fit in uint32`);
  }
  return count;
}

function encodedSize(polygons: readonly PolygonFeature[]): number {
  let size = NVTL_HEADER_BYTES;
  for (const { geometry } of polygons) {
    size += 8 + geometry.exterior.length * POINT_BYTES;
    for (const hole of geometry.interiors) size += 4 + hole.length * POINT_BYTES;
  }
  return size;
}

/**
 * Serialize the polygon features of a collection. Line features are skipped; they
 * must be promoted to areas beforehand to be stored. Bounds are recomputed from the
 * exterior rings, and an empty collection gets zero bounds.
 */
export function encodeNvtl(collection: CoastCollection): Uint8Array {
  const polygons = collection.filter(isPolygonFeature);
  const bounds = collectionBounds(polygons);

  const bytes = new Uint8Array(encodedSize(polygons));
  const view = new DataView(bytes.buffer);
  let offset = 0;

  for (let i = 0; i < NVTL_MAGIC.length; i += 1) {
    view.setUint8(offset, NVTL_MAGIC.charCodeAt(i));
    offset += 1;
  }
  view.setUint16(offset, NVTL_VERSION, true);
  offset += 2;
  view.setUint32(offset, checkedCount(polygons.length, "Polygon"), true);
  offset += 4;

  for (const value of [bounds.minLon, bounds.minLat, bounds.maxLon, bounds.maxLat]) {
    view.setFloat64(offset, value, true);
    offset += 8;
  }

  const writeRing = (ring: Ring) => {
    for (const [lon, lat] of ring) {
      view.setFloat64(offset, lon, true);
      view.setFloat64(offset + 8, lat, true);
      offset += POINT_BYTES;
    }
  };

  for (const { geometry } of polygons) {
    view.setUint32(offset, checkedCount(geometry.exterior.length, "Exterior point"), true);
    view.setUint32(offset + 4, checkedCount(geometry.interiors.length, "Interior ring"), true);
    offset += 8;
    writeRing(geometry.exterior);
    for (const hole of geometry.interiors) {
      view.setUint32(offset, checkedCount(hole.length, "Interior point"), true);
      offset += 4;
      writeRing(hole);
    }
  }

  return bytes;
}

// ─── Decode ──────────────────────────────────────────────────────────────────

export interface DecodedNvtl {
  version: number;
  /** Bounds as stored in the header, not recomputed. */
  bounds: Bounds;
  collection: PolygonFeature[];
}

export function decodeNvtl(bytes: Uint8Array): DecodedNvtl {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;

  const need = (count: number, what: string) => {
    if (offset + count > view.byteLength) {
      throw new NvtlCorruptError(
        `Truncated NVTL buffer: need ${count} byte(s) for ${what} at offset ${offset}, have ${view.byteLength - offset}`,
        offset,
      );
    }
  };

  need(NVTL_MAGIC.length, "magic");
  let magic = "";
  for (let i = 0; i < NVTL_MAGIC.length; i += 1) magic += String.fromCharCode(view.getUint8(i));
  if (magic !== NVTL_MAGIC) {
    throw new NvtlFormatError(`Not an NVTL buffer: bad magic ${JSON.stringify(magic)}`);
  }
  offset += NVTL_MAGIC.length;

  need(2, "version");
  const version = view.getUint16(offset, true);
  if (version !== NVTL_VERSION) {
    throw new NvtlFormatError(`Unsupported NVTL version: ${version}`);
  }
  offset += 2;

  need(NVTL_HEADER_BYTES - offset, "header");
  const polygonCount = view.getUint32(offset, true);
  offset += 4;
  const bounds: Bounds = {
    minLon: view.getFloat64(offset, true),
    minLat: view.getFloat64(offset + 8, true),
    maxLon: view.getFloat64(offset + 16, true),
    maxLat: view.getFloat64(offset + 24, true),
  };
  offset += 32;

  const readRing = (count: number, what: string): Ring => {
    need(count * POINT_BYTES, what);
    const ring: LonLat[] = [];
    for (let i = 0; i < count; i += 1) {
      ring.push([view.getFloat64(offset, true), view.getFloat64(offset + 8, true)]);
      offset += POINT_BYTES;
    }
    return ring;
  };

  const collection: PolygonFeature[] = [];
  for (let p = 0; p < polygonCount; p += 1) {
    need(8, `polygon ${p} ring counts`);
    const exteriorCount = view.getUint32(offset, true);
    const holeCount = view.getUint32(offset + 4, true);
    offset += 8;

    const exterior = readRing(exteriorCount, `polygon ${p} exterior`);
    const interiors: Ring[] = [];
    for (let h = 0; h < holeCount; h += 1) {
      need(4, `polygon ${p} hole ${h} count`);
      const count = view.getUint32(offset, true);
      offset += 4;
      interiors.push(readRing(count, `polygon ${p} hole ${h}`));
    }

    collection.push({ geometry: { kind: "polygon", exterior, interiors }, properties: {} });
  }

  if (offset !== view.byteLength) {
    throw new NvtlCorruptError(
      `Corrupt NVTL buffer: ${view.byteLength - offset} unexpected trailing byte(s) after ${polygonCount} polygon(s)`,
      offset,
    );
  }

  return { version, bounds, collection };
}
