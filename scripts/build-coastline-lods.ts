/**
 * build-coastline-lods.ts
 *
 * Turns a normalized land/shoreline GeoJSON into per-LOD NVTL binaries for the chart renderer.
 *
 * Pipeline:
 *   1. Drop rectangular chart-cell / tile-boundary polygons
 *   2. Union land polygons so tile seams disappear
 *   3. Douglas-Peucker at each LOD tolerance, from the same merged input
 *   4. Encode each level as NVTL and update manifest.json
 *
 * Usage:
 *   npm run data:coastline-lods -- --input data/seattle-land.geojson --region seattle
 *   npm run data:coastline-lods -- --input land.geojson --tolerances 0,0.0001,0.001 --manifest none
 *   npm run data:coastline-lods -- --input shoreline.geojson --lines-as-areas --write-geojson
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { FeatureCollection } from "geojson";
import { parseBuildArgs } from "../src/config";
import { fromGeoJson, toGeoJson } from "../src/geometry/geojson";
import { collectionBounds } from "../src/geometry/rings";
import { emptyManifest, parseManifest, upsertRegion } from "../src/manifest";
import type { ChartManifest } from "../src/manifest";
import { runPipeline } from "../src/pipeline";

async function loadManifest(manifestPath: string): Promise<ChartManifest> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, "utf8");
  } catch {
    return emptyManifest();
  }
  return parseManifest(raw);
}

async function main() {
  const args = parseBuildArgs(process.argv.slice(2));
  const cwd = process.cwd();
  const inputPath = path.resolve(cwd, args.input);
  const outDir = path.resolve(cwd, args.outDir);

  const fc = JSON.parse(await readFile(inputPath, "utf8")) as FeatureCollection;
  if (fc.type !== "FeatureCollection" || !Array.isArray(fc.features)) {
    throw new Error(`${args.input} is not a GeoJSON FeatureCollection`);
  }

  const { collection, stats: normalized } = fromGeoJson(fc);
  console.log("Coastline LOD builder");
  console.log(`  Region: ${args.region} (${args.name})`);
  console.log(
    `  Input: ${normalized.inputFeatures} features -> ${normalized.polygons} polygons, ${normalized.lines} lines`,
  );
  if (normalized.skippedGeometries > 0) {
    console.warn(`  Skipped ${normalized.skippedGeometries} feature(s) without area or line geometry`);
  }

  const result = runPipeline(collection, {
    levels: args.levels,
    merge: args.merge,
    filterArtifacts: args.filterArtifacts,
    linesAsAreas: args.linesAsAreas,
  });

  await mkdir(outDir, { recursive: true });

  const files: string[] = [];
  for (const level of result.levels) {
    const fileName = `${args.region}_coastline_${level.name}.bin`;
    await writeFile(path.join(outDir, fileName), level.bytes);
    files.push(fileName);

    if (args.writeGeoJson) {
      const geojsonName = `${args.region}_coastline_${level.name}.geojson`;
      await writeFile(path.join(outDir, geojsonName), `${JSON.stringify(toGeoJson(level.collection))}\n`, "utf8");
    }

    console.log(
      `  Saved ${level.name} (tol=${level.tolerance}): ${level.pointCount.toLocaleString()} points, ${(level.bytes.byteLength / 1024).toFixed(1)} KB`,
    );
  }

  if (args.manifestPath) {
    const manifestPath = path.resolve(cwd, args.manifestPath);
    const manifest = upsertRegion(await loadManifest(manifestPath), {
      id: args.region,
      name: args.name,
      bounds: collectionBounds(result.base),
      source: args.source,
      files,
    });
    await mkdir(path.dirname(manifestPath), { recursive: true });
    await writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
    console.log(`  Manifest updated: ${manifestPath}`);
  }

  const { stats } = result;
  console.log(
    [
      "\n── Statistics ──",
      `  Input features:          ${stats.inputFeatures}`,
      `  Input points:            ${stats.inputPoints.toLocaleString()}`,
      `  Degenerate dropped:      ${stats.degenerateDropped}`,
      `  Artifacts removed:       ${stats.artifactsRemoved}`,
      `  Merged polygons:         ${stats.merge ? `${stats.merge.mergedInput} -> ${stats.merge.outputPolygons}` : "skipped"}`,
      `  Output features:         ${stats.baseFeatures}`,
      `  Output points (lod0):    ${stats.basePoints.toLocaleString()}`,
    ].join("\n"),
  );
  console.log("\nDone.");
}

void main().catch((err: unknown) => {
  console.error(`build-coastline-lods failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
