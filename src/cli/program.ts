// src/cli/program.ts
import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { TranscriptFormatter } from '../services/TranscriptFormatter';
import { summarizeBatch } from '../services/BatchStripService';
import { loadSampleTranscript } from '../services/SampleTranscript';
import { BatchStripResult } from '../types/transcript.types';
import { FileHelpers } from '../utils/file-helpers';
import { DirectoryNotFoundError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { bootstrap } from './bootstrap';

interface OutputOptions {
  output?: string;
  inPlace?: boolean;
}

interface BatchOptions {
  input?: string;
  output?: string;
  json?: boolean;
}

function writeResult(text: string, sourceFile: string, options: OutputOptions): void {
  const target = options.inPlace ? sourceFile : options.output;
  if (target) {
    FileHelpers.writeTextFile(target, text);
    logger.info(`Written to ${path.resolve(target)}`);
  } else {
    process.stdout.write(text + '\n');
  }
}

function printBatchSummary(result: BatchStripResult): void {
  const summary = summarizeBatch(result);

  if (summary.skipped) {
    console.log(chalk.yellow(result.skipped.join('\n')));
    return;
  }

  console.log(chalk.cyan('\n=== Batch Strip Summary ==='));
  console.log(chalk.green(`Processed: ${summary.processed}`));
  for (const file of result.processed) {
    console.log(chalk.gray(`  ✓ ${file.inputPath} -> ${file.outputPath}`));
  }
  console.log(chalk.red(`Failed: ${summary.failed}`));
  for (const file of result.failed) {
    console.log(chalk.red(`  ✗ ${file.file}: ${file.error}`));
  }
}

/**
 * Build the transcript-format command tree
 */
export function createProgram(formatter: TranscriptFormatter = new TranscriptFormatter()): Command {
  const program = new Command();

  program
    .name('transcript-format')
    .description('Strip or apply court formatting on deposition transcripts')
    .version('1.0.0');

  program
    .command('strip')
    .description('Remove line numbers, page headers and page numbers (keeps text indentation)')
    .argument('<file>', 'Formatted transcript file')
    .option('-o, --output <path>', 'Write the result to this file instead of stdout')
    .addOption(new Option('--in-place', 'Overwrite the input file').conflicts('output'))
    .action((file: string, options: OutputOptions) => {
      try {
        bootstrap();
        const text = FileHelpers.readTextFile(file);
        writeResult(formatter.stripFormatting(text), file, options);
        logger.info('Formatting stripped.');
      } catch (error) {
        logger.error(`Strip failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  program
    .command('apply')
    .description('Apply 1-25 numbering with court spacing, headers and page numbers')
    .argument('<file>', 'Plain transcript file')
    .option('-o, --output <path>', 'Write the result to this file instead of stdout')
    .addOption(new Option('--in-place', 'Overwrite the input file').conflicts('output'))
    .action((file: string, options: OutputOptions) => {
      try {
        bootstrap();
        const text = FileHelpers.readTextFile(file);
        const { text: formatted, pageCount } = formatter.applyFormatting(text);
        writeResult(formatted, file, options);
        logger.info(`Standards applied: ${pageCount} page(s) generated.`);
      } catch (error) {
        logger.error(`Apply failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  program
    .command('batch-strip')
    .description('Strip formatting from every .txt file in a folder (original -> stripped)')
    .option('-i, --input <dir>', 'Folder with formatted .txt files (default: BATCH_INPUT_DIR or ./original)')
    .option('-o, --output <dir>', 'Folder for stripped files (default: BATCH_OUTPUT_DIR or ./stripped)')
    .option('--json', 'Print the result as JSON')
    .action((options: BatchOptions) => {
      try {
        const config = bootstrap();
        const inputDir = path.resolve(options.input ?? config.batchInputDir);
        const outputDir = path.resolve(options.output ?? config.batchOutputDir);

        logger.info(`Input directory: ${inputDir}`);
        logger.info(`Output directory: ${outputDir}`);

        const result = formatter.batchStripFormatting(inputDir, outputDir);

        if (options.json) {
          process.stdout.write(JSON.stringify(result, null, 2) + '\n');
        } else {
          printBatchSummary(result);
        }
      } catch (error) {
        if (error instanceof DirectoryNotFoundError) {
          logger.error(`${error.message}. Create it and place your .txt files inside.`);
        } else {
          logger.error(`Batch strip failed: ${errorMessage(error)}`);
        }
        process.exit(1);
      }
    });

  program
    .command('sample')
    .description('Print a sample deposition page')
    .option('--raw', 'Print the sample without court formatting')
    .action((options: { raw?: boolean }) => {
      try {
        bootstrap();
        const sample = loadSampleTranscript();
        const text = options.raw ? sample : formatter.applyFormatting(sample).text;
        process.stdout.write(text + '\n');
      } catch (error) {
        logger.error(`Could not load sample transcript: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  return program;
}
