// src/services/TranscriptStripper.ts
import { FormattedLineParser } from '../parsers/FormattedLineParser';
import { LINE_SPLIT_PATTERN } from '../config/layout';
import { Logger } from '../utils/logger';

/**
 * Removes line numbers, page headers, double spacing and page footers,
 * leaving one content line per output line. Indentation after the
 * number separator (Q/A markers, speaker tags) is kept as-is.
 */
export class TranscriptStripper {
  private parser = new FormattedLineParser();
  private logger = new Logger('TranscriptStripper');

  strip(text: string): string {
    const cleanedLines: string[] = [];
    let numbered = 0;
    let discarded = 0;

    for (const line of text.split(LINE_SPLIT_PATTERN)) {
      const parsed = this.parser.parse(line);

      if (parsed.content === undefined) {
        discarded++;
        continue;
      }
      if (parsed.kind === 'numbered') {
        numbered++;
      }
      cleanedLines.push(parsed.content);
    }

    this.logger.debug(
      `Stripped ${numbered} numbered lines, kept ${cleanedLines.length - numbered} plain lines, discarded ${discarded}`
    );

    return cleanedLines.join('\n');
  }
}
