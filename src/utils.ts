import { execa } from 'execa';

export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JsonExtractionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function runGitCommand(args: string[], cwd: string): Promise<string> {
  try {
    const res = await execa('git', args, { cwd });
    return res.stdout;
  } catch (err) {
    throw new Error(`git ${args.join(' ')} failed: ${errorMessage(err)}`);
  }
}

// `-z` listings keep paths unquoted, whatever characters they contain.
export function splitNullSeparated(output: string): string[] {
  return output.split('\0').filter(Boolean);
}

/**
 * Parses the first balanced `{...}` block in free-form text, e.g. a chat reply
 * that wraps the object in prose or a markdown fence.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  if (start === -1) {
    throw new JsonExtractionError('No JSON object found in response');
  }

  let depth = 0;
  let inString = false;
  let escaping = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (char === '\\') {
        escaping = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        const candidate = text.slice(start, i + 1);
        try {
          return JSON.parse(candidate);
        } catch (err) {
          throw new JsonExtractionError(`Malformed JSON object in response: ${errorMessage(err)}`);
        }
      }
    }
  }

  throw new JsonExtractionError('Unbalanced JSON object in response');
}

export function truncateString(input: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (input.length <= maxLength) return input;
  if (maxLength <= 1) return input.slice(0, maxLength);
  return input.slice(0, maxLength - 1) + '…';
}

export function toSingleLine(input: string): string {
  return input.replace(/\r?\n|\r/g, ' ').replace(/\s+/g, ' ').trim();
}

// The last column takes whatever width is left.
export function renderSimpleTable(
  headers: string[],
  rows: string[][],
  options: {
    maxWidth?: number;
    gutter?: string;
    columnMaxWidths?: number[];
    headerStyle?: (line: string) => string;
  } = {}
): string {
  const gutter = options.gutter ?? '  ';
  const terminalWidth = options.maxWidth ?? (process.stdout.columns || 100);
  const columnCaps = options.columnMaxWidths ?? [];
  const content = [headers, ...rows];

  const widths = headers.map((_, c) => {
    const natural = content.reduce((max, row) => Math.max(max, toSingleLine(row[c] ?? '').length), 0);
    const cap = columnCaps[c];
    return cap !== undefined && cap > 0 ? Math.min(natural, cap) : natural;
  });

  const lastIndex = widths.length - 1;
  const usedWidth = widths.slice(0, lastIndex).reduce((sum, w) => sum + w, 0) + gutter.length * lastIndex;
  widths[lastIndex] = Math.max(10, Math.min(widths[lastIndex], terminalWidth - usedWidth));

  const lines = content.map((row) =>
    widths
      .map((width, c) => truncateString(toSingleLine(row[c] ?? ''), width).padEnd(width))
      .join(gutter)
      .trimEnd()
  );

  // Styling is applied after measuring so escape codes never count as width.
  const separator = '-'.repeat(Math.min(Math.max(...lines.map((l) => l.length)), terminalWidth));
  const headerLine = options.headerStyle ? options.headerStyle(lines[0]) : lines[0];
  return [headerLine, separator, ...lines.slice(1)].join('\n');
}

export function renderBox(text: string, options: { padding?: number } = {}): string {
  const padding = Math.max(0, options.padding ?? 1);
  const pad = ' '.repeat(padding);
  const contentLines = text.split('\n').map((line) => pad + line + pad);
  const width = contentLines.reduce((max, line) => Math.max(max, line.length), 0);
  const border = '+' + '-'.repeat(width) + '+';
  const body = contentLines.map((line) => '|' + line.padEnd(width) + '|');
  return [border, ...body, border].join('\n');
}
