// src/config/layout.ts
// Fixed court layout. The stripper's recognition patterns depend on these values.

export const LINES_PER_PAGE = 25;
export const LINE_NUMBER_WIDTH = 11;
export const SEPARATOR = '    ';
export const PAGE_NUMBER_WIDTH = 72;
export const HEADER_BLANK_LINES = 5;
export const PAGE_BREAK = '\f';

// Start + whitespace + digits + exactly 4 spaces + content.
// "          1    Text" and "         10         Q    Text" both match.
export const NUMBERED_LINE_PATTERN = new RegExp(`^\\s*\\d+${SEPARATOR}([\\s\\S]*)$`);

// Solitary digits: page footers and padding slots
export const PAGE_FOOTER_PATTERN = /^\s*\d+\s*$/;

export const LINE_SPLIT_PATTERN = /\r?\n/;
