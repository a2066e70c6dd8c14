import type { Bounds } from "./types/geometry";

export type ChartSource = "enc" | "gshhg" | "osm" | "noaa";

export interface ManifestRegion {
  name: string;
  bounds: [number, number, number, number];
  source: ChartSource;
  lods: number[];
  files: string[];
  lastUpdated: string;
}

/** Index of prebuilt coastline files, so the renderer never has to scan directories. */
export interface ChartManifest {
  version: 1;
  lastUpdated: string;
  regions: Record<string, ManifestRegion>;
}

export interface RegionEntry {
  id: string;
  name: string;
  bounds: Bounds;
  source: ChartSource;
  files: string[];
}

const SOURCES: readonly ChartSource[] = ["enc", "gshhg", "osm", "noaa"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBoundsTuple(value: unknown): value is [number, number, number, number] {
  return Array.isArray(value) && value.length === 4 && value.every((n) => typeof n === "number");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function isSource(value: unknown): value is ChartSource {
  return typeof value === "string" && SOURCES.some((source) => source === value);
}

function parseRegion(id: string, value: unknown): ManifestRegion {
  if (!isRecord(value)) throw new Error(`Invalid manifest region "${id}": expected an object`);
  const { name, bounds, source, lods, files, lastUpdated } = value;
  if (typeof name !== "string") throw new Error(`Invalid manifest region "${id}": missing name`);
  if (!isBoundsTuple(bounds)) {
    throw new Error(`Invalid manifest region "${id}": bounds must be [minLon, minLat, maxLon, maxLat]`);
  }
  return {
    name,
    bounds,
    source: isSource(source) ? source : "gshhg",
    lods: isNumberArray(lods) ? lods : [0],
    files: isStringArray(files) ? files : [],
    lastUpdated: typeof lastUpdated === "string" ? lastUpdated : "",
  };
}

export function emptyManifest(now: Date = new Date()): ChartManifest {
  return { version: 1, lastUpdated: now.toISOString(), regions: {} };
}

export function parseManifest(text: string): ChartManifest {
  const json: unknown = JSON.parse(text);
  if (!isRecord(json)) throw new Error("Invalid manifest: expected a JSON object");
  if (json.version !== 1) throw new Error(`Unsupported manifest version: ${String(json.version)}`);

  const regions: Record<string, ManifestRegion> = {};
  const rawRegions = isRecord(json.regions) ? json.regions : {};
  for (const [id, region] of Object.entries(rawRegions)) {
    regions[id] = parseRegion(id, region);
  }

  return {
    version: 1,
    lastUpdated: typeof json.lastUpdated === "string" ? json.lastUpdated : "",
    regions,
  };
}

/** LOD numbers named in the files (`..._lod3.bin` -> 3), sorted and unique. */
export function lodsFromFiles(files: readonly string[]): number[] {
  const lods = new Set<number>();
  for (const file of files) {
    const match = /lod(\d+)/.exec(file);
    if (match) lods.add(Number(match[1]));
  }
  return [...lods].sort((a, b) => a - b);
}

export function upsertRegion(
  manifest: ChartManifest,
  entry: RegionEntry,
  now: Date = new Date(),
): ChartManifest {
  const stamp = now.toISOString();
  const { minLon, minLat, maxLon, maxLat } = entry.bounds;
  return {
    version: 1,
    lastUpdated: stamp,
    regions: {
      ...manifest.regions,
      [entry.id]: {
        name: entry.name,
        bounds: [minLon, minLat, maxLon, maxLat],
        source: entry.source,
        lods: lodsFromFiles(entry.files),
        files: [...entry.files],
        lastUpdated: stamp,
      },
    },
  };
}
