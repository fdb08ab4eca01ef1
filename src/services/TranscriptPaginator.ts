// src/services/TranscriptPaginator.ts
import {
  HEADER_BLANK_LINES,
  LINES_PER_PAGE,
  LINE_NUMBER_WIDTH,
  LINE_SPLIT_PATTERN,
  PAGE_BREAK,
  PAGE_NUMBER_WIDTH,
  SEPARATOR
} from '../config/layout';
import { PaginationResult } from '../types/transcript.types';
import { Logger } from '../utils/logger';

/**
 * Lays plain transcript lines out in court format:
 * 1. 5 blank lines at the start of every page
 * 2. Line numbers 1-25, right-aligned in 11 columns, then 4 spaces
 * 3. A blank line after every numbered line
 * 4. A page number footer right-aligned in 72 columns
 *
 * The last page is padded with number-only lines up to 25.
 */
export class TranscriptPaginator {
  private logger = new Logger('TranscriptPaginator');

  paginate(text: string): PaginationResult {
    const contentLines = text.split(LINE_SPLIT_PATTERN).filter(line => line.trim() !== '');

    let output = this.pageHeader();
    let lineCounter = 1;
    let pageCounter = 1;

    for (const line of contentLines) {
      // Previous page is full and there is more to lay out
      if (lineCounter > LINES_PER_PAGE) {
        output += `\n${PAGE_BREAK}` + this.pageHeader();
        lineCounter = 1;
        pageCounter++;
      }

      output += `${this.lineNumber(lineCounter)}${SEPARATOR}${line}\n\n`;

      if (lineCounter === LINES_PER_PAGE) {
        output += this.pageFooter(pageCounter);
      }
      lineCounter++;
    }

    if (lineCounter > 1 && lineCounter <= LINES_PER_PAGE) {
      while (lineCounter <= LINES_PER_PAGE) {
        output += `${this.lineNumber(lineCounter)}\n\n`;
        lineCounter++;
      }
      output += this.pageFooter(pageCounter);
    }

    this.logger.debug(`Laid out ${contentLines.length} content lines on ${pageCounter} page(s)`);

    return { text: output, pageCount: pageCounter };
  }

  private pageHeader(): string {
    return '\n'.repeat(HEADER_BLANK_LINES);
  }

  private lineNumber(n: number): string {
    return String(n).padStart(LINE_NUMBER_WIDTH);
  }

  private pageFooter(page: number): string {
    return `\n${String(page).padStart(PAGE_NUMBER_WIDTH)}`;
  }
}
