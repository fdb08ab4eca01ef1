// src/parsers/FormattedLineParser.ts
import { ClassifiedLine } from '../types/transcript.types';
import { NUMBERED_LINE_PATTERN, PAGE_FOOTER_PATTERN } from '../config/layout';

/**
 * Classifies one line of court-formatted text. Each line is read on its own,
 * with no state carried between calls.
 */
export class FormattedLineParser {
  parse(line: string): ClassifiedLine {
    // Page headers, double spacing and the form feed line all land here
    if (line.trim() === '') {
      return { kind: 'blank' };
    }

    // Must run before the footer check: "          7    " and
    // "          7    1999" are numbered lines, not footers
    const match = NUMBERED_LINE_PATTERN.exec(line);
    if (match) {
      return { kind: 'numbered', content: match[1] };
    }

    if (this.isPageFooter(line)) {
      return { kind: 'footer' };
    }

    return { kind: 'text', content: line };
  }

  isPageFooter(line: string): boolean {
    return PAGE_FOOTER_PATTERN.test(line);
  }
}
