export * from './core/diff/types';
export { MyersDiff, type MyersEdit } from './core/diff/myers-diff';
export { TextDiff } from './core/diff/text-diff';
export { createHunk, hunkOrigin, splitLines } from './core/diff/hunk-builder';
export { parseUnifiedDiff } from './core/diff/unified-diff-parser';
export { formatUnifiedDiff, formatFileDiff, formatHunkHeader } from './core/diff/unified-diff-writer';
export { validateGitDiff } from './core/diff/diff-validator';
export { computeStatistics } from './core/diff/diff-statistics';

export * from './core/exceptions';

export {
  Revision,
  InMemoryContentProvider,
  DirectoryContentProvider,
  type FileContentProvider,
} from './core/content/file-content-provider';

export * from './core/effective-diff/types';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type EffectiveDiffOptions,
} from './core/effective-diff/options';
export { extractTaggedLines, type ExtractedLines } from './core/effective-diff/line-extractor';
export { buildAddedIndex, LineMatchIndex } from './core/effective-diff/line-matcher';
export { ConsumedLines } from './core/effective-diff/consumed-lines';
export { computeLineUniqueness, scoreBlock } from './core/effective-diff/move-scoring';
export { findMoveCandidates, type Block } from './core/effective-diff/block-aggregator';
export { MyersRediffer, createRediffer, type Rediffer } from './core/effective-diff/rediffer';
export {
  rediffFilePair,
  buildResidualRegions,
  type ResidualRegion,
} from './core/effective-diff/region-rediffer';
export {
  filterMovedLines,
  reconstructFileDiff,
  reconstructEffectiveDiff,
  verifyLineAccounting,
} from './core/effective-diff/diff-reconstructor';
export {
  buildMoveReport,
  countEffectiveLinesNearMove,
  summarizeMoves,
} from './core/effective-diff/move-report';
export {
  classifyLines,
  LineClassification,
  type ClassifiedFile,
  type ClassifiedHunk,
  type ClassifiedLine,
} from './core/effective-diff/line-classifier';
export {
  runEffectiveDiffPipeline,
  runEffectiveDiffPipelineWithProvider,
  type PipelineOptions,
} from './core/effective-diff/pipeline';
export {
  ARTIFACT_FILES,
  serializeEffectiveDiff,
  serializeMoveReport,
  toMoveReportDocument,
  writeArtifacts,
  type MoveReportDocument,
} from './core/effective-diff/serialization';
