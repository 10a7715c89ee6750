/**
 * Source sanitizer - Normalizes FDO source text before parsing
 *
 * Handles:
 * - Byte order marks
 * - CRLF and CR line endings
 * - Record banners (`<< GID 32-105 >>` style header lines), blanked in place
 * - Tab indentation, when a tab width is given
 * - Trailing whitespace
 */

export interface SanitizeOptions {
  /** Spaces per leading tab; 0 leaves tabs for the parser to reject */
  tabWidth?: number;
  /** Keep banner lines at the top of the source */
  keepBanner?: boolean;
}

export interface SanitizeResult {
  text: string;
  /** Number of banner lines removed */
  bannerLines: number;
  /** Number of lines whose indentation was expanded */
  expandedLines: number;
}

const PATTERNS = {
  bom: /^\uFEFF/,
  lineEnding: /\r\n?/g,
  // Banner lines name the record they were extracted from
  banner: /^\s*(?:<<|>>).*\bGID\b.*$|^\s*.*\bGID\b.*(?:<<|>>)\s*$/,
  leadingWhitespace: /^[ \t]*/,
  trailingWhitespace: /[ \t]+$/,
};

/**
 * Expand tabs in a line's indentation to the next multiple of tabWidth
 */
export function expandIndentation(line: string, tabWidth: number): string {
  const leading = PATTERNS.leadingWhitespace.exec(line)?.[0] ?? '';
  if (!leading.includes('\t')) {
    return line;
  }

  let column = 0;
  for (const char of leading) {
    column = char === '\t' ? column + tabWidth - (column % tabWidth) : column + 1;
  }
  return ' '.repeat(column) + line.slice(leading.length);
}

/**
 * Normalize source text for the parser
 */
export function sanitizeSource(text: string, options: SanitizeOptions = {}): SanitizeResult {
  const tabWidth = options.tabWidth ?? 0;
  const lines = text.replace(PATTERNS.bom, '').replace(PATTERNS.lineEnding, '\n').split('\n');

  let bannerLines = 0;
  if (!options.keepBanner) {
    while (bannerLines < lines.length && PATTERNS.banner.test(lines[bannerLines])) {
      bannerLines++;
    }
  }

  let expandedLines = 0;
  // Banner lines are blanked rather than dropped so line numbers stay put
  const cleaned = lines.map((line, index) => {
    if (index < bannerLines) {
      return '';
    }
    let result = line.replace(PATTERNS.trailingWhitespace, '');
    if (tabWidth > 0) {
      const expanded = expandIndentation(result, tabWidth);
      if (expanded !== result) {
        expandedLines++;
        result = expanded;
      }
    }
    return result;
  });

  return { text: cleaned.join('\n'), bannerLines, expandedLines };
}
