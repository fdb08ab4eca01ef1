// src/services/BatchStripService.ts
import * as path from 'path';
import { TranscriptStripper } from './TranscriptStripper';
import { BatchStripResult, BatchSummary } from '../types/transcript.types';
import { FileHelpers } from '../utils/file-helpers';
import { DirectoryNotFoundError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export const TRANSCRIPT_FILE_PATTERN = /\.txt$/;
export const NO_FILES_NOTE = 'No .txt files found in input folder';

/**
 * File access used by the batch strip. Swap it out to run against
 * something other than the local disk.
 */
export interface BatchFileSystem {
  isDirectory(dirPath: string): boolean;
  ensureDirectory(dirPath: string): void;
  listFiles(dirPath: string): string[];
  readTextFile(filePath: string): string;
  writeTextFile(filePath: string, content: string): void;
}

export const nodeFileSystem: BatchFileSystem = {
  isDirectory: dirPath => FileHelpers.isDirectory(dirPath),
  ensureDirectory: dirPath => FileHelpers.ensureDirectory(dirPath),
  listFiles: dirPath => FileHelpers.getFiles(dirPath, TRANSCRIPT_FILE_PATTERN),
  readTextFile: filePath => FileHelpers.readTextFile(filePath),
  writeTextFile: (filePath, content) => FileHelpers.writeTextFile(filePath, content)
};

export class BatchStripService {
  private logger = new Logger('BatchStripService');

  constructor(
    private stripper: TranscriptStripper = new TranscriptStripper(),
    private fileSystem: BatchFileSystem = nodeFileSystem
  ) {}

  /**
   * Strip every .txt file directly inside inputFolder into a same-named
   * file in outputFolder. Per-file errors are collected, not thrown.
   */
  stripFolder(inputFolder: string, outputFolder: string): BatchStripResult {
    if (!this.fileSystem.isDirectory(inputFolder)) {
      throw new DirectoryNotFoundError(inputFolder);
    }

    this.fileSystem.ensureDirectory(outputFolder);

    const results: BatchStripResult = {
      processed: [],
      failed: [],
      skipped: []
    };

    const textFiles = this.fileSystem
      .listFiles(inputFolder)
      .filter(name => TRANSCRIPT_FILE_PATTERN.test(name));

    if (textFiles.length === 0) {
      this.logger.warn(`${NO_FILES_NOTE}: ${inputFolder}`);
      results.skipped.push(NO_FILES_NOTE);
      return results;
    }

    this.logger.info(`Found ${textFiles.length} .txt files in ${inputFolder}`);

    for (const fileName of textFiles) {
      const inputPath = path.join(inputFolder, fileName);
      const outputPath = path.join(outputFolder, fileName);

      try {
        const content = this.fileSystem.readTextFile(inputPath);
        this.fileSystem.writeTextFile(outputPath, this.stripper.strip(content));

        results.processed.push({ inputPath, outputPath, status: 'success' });
        this.logger.info(`Stripped ${inputPath} -> ${outputPath}`);
      } catch (error) {
        const message = errorMessage(error);
        results.failed.push({ file: inputPath, error: message });
        this.logger.warn(`Failed to strip ${inputPath}: ${message}`);
      }
    }

    return results;
  }
}

export function summarizeBatch(result: BatchStripResult): BatchSummary {
  return {
    processed: result.processed.length,
    failed: result.failed.length,
    skipped: result.skipped.length > 0
  };
}
