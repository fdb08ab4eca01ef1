// src/services/SampleTranscript.ts
import * as path from 'path';
import { FileHelpers } from '../utils/file-helpers';

export const SAMPLE_TRANSCRIPT_PATH = path.join(__dirname, '..', '..', 'data', 'sample-transcript.txt');

/**
 * One page of deposition testimony in plain form, for trying the formatter out
 */
export function loadSampleTranscript(): string {
  return FileHelpers.readTextFile(SAMPLE_TRANSCRIPT_PATH).replace(/\n$/, '');
}
