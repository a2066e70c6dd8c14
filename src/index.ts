export * from "./types/geometry";
export {
  MIN_CLOSED_RING_POINTS,
  closePolygonRings,
  closeRing,
  collectionBounds,
  countPoints,
  distinctPointCount,
  isClosed,
  ringArea,
  ringBounds,
  ringIsDegenerate,
  samePoint,
} from "./geometry/rings";
export { fromGeoJson, linesToAreas, toGeoJson } from "./geometry/geojson";
export type { NormalizeResult, NormalizeStats } from "./geometry/geojson";
export { DEFAULT_ARTIFACT_THRESHOLDS, filterArtifacts, isTileBoundaryArtifact } from "./pipeline/artifacts";
export type { ArtifactFilterResult, ArtifactThresholds } from "./pipeline/artifacts";
export { mergeLandPolygons } from "./pipeline/merge";
export type { MergeOptions, MergeResult, MergeStats } from "./pipeline/merge";
export { douglasPeucker, segmentDistance, simplifyCollection, simplifyRing } from "./pipeline/simplify";
export { DEFAULT_LOD_LEVELS, buildLods, lodLevelsFromTolerances } from "./pipeline/lod";
export type { LodLevel, LodOutput } from "./pipeline/lod";
export { runPipeline } from "./pipeline";
export type { PipelineLevel, PipelineOptions, PipelineResult, PipelineStats } from "./pipeline";
export {
  NVTL_HEADER_BYTES,
  NVTL_MAGIC,
  NVTL_VERSION,
  NvtlCorruptError,
  NvtlDecodeError,
  NvtlFormatError,
  decodeNvtl,
  encodeNvtl,
} from "./codec/nvtl";
export type { DecodedNvtl, NvtlErrorCode } from "./codec/nvtl";
export { emptyManifest, lodsFromFiles, parseManifest, upsertRegion } from "./manifest";
export type { ChartManifest, ChartSource, ManifestRegion, RegionEntry } from "./manifest";
export { silentLogger } from "./utils/logger";
export type { StageLogger } from "./utils/logger";
