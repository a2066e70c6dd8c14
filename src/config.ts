import path from "node:path";
import type { ChartSource } from "./manifest";
import { DEFAULT_LOD_LEVELS, lodLevelsFromTolerances } from "./pipeline/lod";
import type { LodLevel } from "./pipeline/lod";

export const DEFAULT_OUT_DIR = "assets/charts";
export const DEFAULT_REGION = "coastline";

export interface BuildArgs {
  input: string;
  region: string;
  name: string;
  source: ChartSource;
  outDir: string;
  /** null when the manifest should be left alone. */
  manifestPath: string | null;
  merge: boolean;
  filterArtifacts: boolean;
  linesAsAreas: boolean;
  writeGeoJson: boolean;
  levels: readonly LodLevel[];
}

const FLAGS = new Set(["--no-merge", "--no-filter", "--lines-as-areas", "--write-geojson"]);
const SOURCES: readonly ChartSource[] = ["enc", "gshhg", "osm", "noaa"];

function parseTolerances(text: string): LodLevel[] {
  const values = text.split(",").map((n) => Number(n.trim()));
  if (values.length === 0 || values.some((n) => !Number.isFinite(n) || n < 0)) {
    throw new Error("Invalid --tolerances. Use comma-separated non-negative degrees, e.g. 0,0.0001,0.001");
  }
  return lodLevelsFromTolerances(values);
}

function parseSource(text: string | undefined): ChartSource {
  if (text == null) return "enc";
  const match = SOURCES.find((source) => source === text.trim().toLowerCase());
  if (!match) throw new Error(`Invalid --source: ${text}. Use one of ${SOURCES.join(", ")}`);
  return match;
}

export function parseBuildArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): BuildArgs {
  const args = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    if (FLAGS.has(key)) {
      flags.add(key);
      continue;
    }
    const value = argv[i + 1];
    if (!key.startsWith("--") || !value) continue;
    args.set(key, value);
    i += 1;
  }

  const input = args.get("--input");
  if (!input) {
    throw new Error("Missing --input. Provide a GeoJSON FeatureCollection, e.g. --input data/seattle-land.geojson");
  }

  const region = args.get("--region") ?? DEFAULT_REGION;
  const outDir = args.get("--out-dir") ?? env.COASTLINE_OUT_DIR ?? DEFAULT_OUT_DIR;

  const manifestText = args.get("--manifest");
  const manifestPath =
    manifestText?.trim().toLowerCase() === "none"
      ? null
      : (manifestText ?? path.join(outDir, "manifest.json"));

  const tolerancesText = args.get("--tolerances");

  return {
    input,
    region,
    name: args.get("--name") ?? region,
    source: parseSource(args.get("--source")),
    outDir,
    manifestPath,
    merge: !flags.has("--no-merge"),
    filterArtifacts: !flags.has("--no-filter"),
    linesAsAreas: flags.has("--lines-as-areas"),
    writeGeoJson: flags.has("--write-geojson"),
    levels: tolerancesText ? parseTolerances(tolerancesText) : DEFAULT_LOD_LEVELS,
  };
}
