export { runCli, formatSummary, EXIT_SUCCESS, EXIT_FAILURE, EXIT_UNSUPPORTED } from './cli';
export type { CliDependencies, CliIO } from './cli';
export { loadConfig, getSystemLocale } from './config';
export { ModelService, normalizeLocale, localeDisplayName } from './services/modelService';
export type { LocaleStatus } from './services/modelService';
export { SidecarEngine, FINALIZE_COMMAND } from './services/sidecarEngine';
export type { SidecarEngineConfig } from './services/sidecarEngine';
export { TranscriptionService } from './services/transcriptionService';
export type { TranscriptionRequest, TranscribeCallbacks, ProgressCallback, ChunkCallback } from './services/transcriptionService';
export { createBatchQueueStore, isQueueIdle, whenIdle } from './stores/batchQueueStore';
export type { BatchQueueOptions, BatchQueueState, BatchQueueStore, ProcessItem } from './stores/batchQueueStore';
export type { BatchQueueCounts, BatchQueueItem, BatchQueueItemState, BatchQueueItemStatus } from './types/batchQueue';
export type { InstallProgressCallback, LocaleAvailability, RecognitionEngine } from './types/engine';
export * from './types/transcript';
export { TranscriptionError, isFatalError, toErrorMessage } from './utils/errorHandling';
export type { TranscriptionErrorCode } from './utils/errorHandling';
export { exportChunks, formatLineTimestamp, formatSrtTime, getFileExtension, parseFormat, toSRT, toTXT } from './utils/exportFormats';
export { resolveOutputPath, saveTranscript, writeTextFileAtomic } from './utils/fileExport';
export { ProgressTracker, renderProgressBar } from './utils/progress';
export { canTransition, describeStatus, isTerminal } from './utils/queueStatus';
export { SegmentAggregator, aggregate, aggregateStream, characterCount, endsWithSentence, mergeFragments } from './utils/segmentUtils';
