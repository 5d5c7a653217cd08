import { ParseError } from '../errors';

export interface SplitTable {
  /** Everything above the delimiter line. */
  header: string;
  /** The dash line itself, kept for column offsets. */
  delimiter: string;
  /** Non-blank data lines, trailing summary removed. */
  rows: string[];
}

export interface ColumnSpan {
  start: number;
  end: number;
}

// A run of dashes, optionally several groups separated by spaces, and nothing else
const DELIMITER_LINE = /^-{2,}[- ]*$/;
const SUMMARY_LINE = /^\s*Total\b/;

function splitLines(text: string): string[] {
  return text.replace(/\r/g, '').split('\n');
}

/**
 * Splits tabular device output at its first delimiter line.
 *
 *   Vlan     Mac Address           Type        Port
 *   -------- --------------------- ----------- ---------------------
 *   1        0025.90C2.88ED        Dynamic     Gi1/0/48
 *
 *   Total MAC Addresses in use: 1
 */
export function splitTable(text: string, table = 'table'): SplitTable {
  const lines = splitLines(text);
  const index = lines.findIndex(line => DELIMITER_LINE.test(line.trimEnd()));
  if (index === -1) {
    throw new ParseError(table, 'no delimiter line found');
  }

  const rows: string[] = [];
  for (const line of lines.slice(index + 1)) {
    if (SUMMARY_LINE.test(line)) break;
    if (line.trim() === '') continue;
    rows.push(line);
  }

  return {
    header: lines.slice(0, index).join('\n'),
    delimiter: lines[index].trimEnd(),
    rows,
  };
}

/**
 * Every table in output that prints several, each ending at the first blank
 * line after its delimiter (as `show interfaces status` lays out ports,
 * out-of-band and port channels).
 */
export function splitTables(text: string): SplitTable[] {
  const lines = splitLines(text);
  const tables: SplitTable[] = [];
  let headerStart = 0;

  for (let i = 0; i < lines.length; i++) {
    if (!DELIMITER_LINE.test(lines[i].trimEnd())) continue;

    const rows: string[] = [];
    let j = i + 1;
    for (; j < lines.length && lines[j].trim() !== '' && !SUMMARY_LINE.test(lines[j]); j++) {
      rows.push(lines[j]);
    }
    tables.push({
      header: lines.slice(headerStart, i).join('\n'),
      delimiter: lines[i].trimEnd(),
      rows,
    });
    headerStart = j;
    i = j;
  }
  return tables;
}

/** Column boundaries as the dash groups of a delimiter line lay them out. */
export function columnSpans(delimiter: string): ColumnSpan[] {
  const spans: ColumnSpan[] = [];
  const groups = /-+/g;
  let match: RegExpExecArray | null;
  while ((match = groups.exec(delimiter)) !== null) {
    spans.push({ start: match.index, end: match.index + match[0].length });
  }
  return spans;
}

/**
 * Cuts a line at fixed offsets. Each field runs from its column start to the
 * next column's start, the last one to end of line, so values wider than
 * their dashes (or containing spaces) stay intact.
 */
export function sliceColumns(line: string, spans: ColumnSpan[]): string[] {
  return spans.map((span, i) => {
    const next = spans[i + 1];
    return line.slice(span.start, next ? next.start : undefined).trim();
  });
}

/** Whitespace split with the field count checked against the table schema. */
export function splitFields(line: string, expected: number | readonly number[], table: string): string[] {
  const fields = line.trim().split(/\s+/);
  const allowed = typeof expected === 'number' ? [expected] : expected;
  if (!allowed.includes(fields.length)) {
    throw new ParseError(table, `expected ${allowed.join(' or ')} fields, got ${fields.length} in '${line.trim()}'`);
  }
  return fields;
}

/** `Label....... value` pairs as DNOS prints them in detail views. */
export function dottedValue(text: string, label: string): string | undefined {
  const escaped = label.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const match = text.match(new RegExp(`^[ \\t]*${escaped}[ \\t]*:?[ \\t]*\\.*[ \\t]*:?[ \\t]*(.*?)[ \\t\\r]*$`, 'm'));
  return match ? match[1] : undefined;
}
