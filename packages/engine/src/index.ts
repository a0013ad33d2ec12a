export { BoundedChannel, ChannelClosedError } from './channel';
export type { ChunkSink } from './channel';
export { WorkerPool } from './workerPool';
export { ScanErrors } from './scanErrors';
export { ScanProgress } from './progress';
export type { ProgressSnapshot } from './progress';
export { buildChunk, emitChunk } from './emitter';
export type { SourceContext } from './emitter';
export { CircleCiSource, sourceSettingsSchema } from './circleciSource';
export type {
  CircleCiSourceOptions,
  ClientFactory,
  ProjectWalkResult,
  RunOptions,
  ScanReport,
  ScanState,
  SourceSettings,
  SourceSettingsInput,
} from './circleciSource';
