// src/index.ts - Library entry point
export {
  TranscriptFormatter,
  stripFormatting,
  applyFormatting,
  batchStripFormatting
} from './services/TranscriptFormatter';
export { TranscriptStripper } from './services/TranscriptStripper';
export { TranscriptPaginator } from './services/TranscriptPaginator';
export {
  BatchStripService,
  BatchFileSystem,
  nodeFileSystem,
  summarizeBatch,
  NO_FILES_NOTE
} from './services/BatchStripService';
export { loadSampleTranscript } from './services/SampleTranscript';
export { FormattedLineParser } from './parsers/FormattedLineParser';
export * from './config/layout';
export { loadConfig } from './config/app-config';
export * from './types/transcript.types';
export * from './types/config.types';
export {
  TranscriptFormatterError,
  DirectoryNotFoundError,
  ConfigurationError
} from './utils/errors';
export { Logger } from './utils/logger';
