// src/services/TranscriptFormatter.ts
import { TranscriptStripper } from './TranscriptStripper';
import { TranscriptPaginator } from './TranscriptPaginator';
import { BatchFileSystem, BatchStripService, nodeFileSystem } from './BatchStripService';
import { BatchStripResult, PaginationResult } from '../types/transcript.types';

/**
 * Toggles a transcript between its plain form and court format.
 */
export class TranscriptFormatter {
  private stripper: TranscriptStripper;
  private paginator: TranscriptPaginator;
  private batchService: BatchStripService;

  constructor(fileSystem: BatchFileSystem = nodeFileSystem) {
    this.stripper = new TranscriptStripper();
    this.paginator = new TranscriptPaginator();
    this.batchService = new BatchStripService(this.stripper, fileSystem);
  }

  stripFormatting(text: string): string {
    return this.stripper.strip(text);
  }

  applyFormatting(text: string): PaginationResult {
    return this.paginator.paginate(text);
  }

  batchStripFormatting(inputFolder: string, outputFolder: string): BatchStripResult {
    return this.batchService.stripFolder(inputFolder, outputFolder);
  }
}

const defaultFormatter = new TranscriptFormatter();

export function stripFormatting(text: string): string {
  return defaultFormatter.stripFormatting(text);
}

export function applyFormatting(text: string): PaginationResult {
  return defaultFormatter.applyFormatting(text);
}

export function batchStripFormatting(inputFolder: string, outputFolder: string): BatchStripResult {
  return defaultFormatter.batchStripFormatting(inputFolder, outputFolder);
}
