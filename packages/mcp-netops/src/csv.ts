const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

export type CsvRow = Record<string, string>;

// Pick the delimiter that splits the header into the most columns
export function sniffDelimiter(headerLine: string): string {
  let best: string = ',';
  let bestCount = 0;
  for (const delimiter of CANDIDATE_DELIMITERS) {
    const count = splitLine(headerLine, delimiter).length;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

// Split one line, honouring double-quoted fields and "" escapes
export function splitLine(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

// Parse CSV text with a header row into header-keyed rows
export function parseCsv(text: string): CsvRow[] {
  const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
  if (lines.length === 0) {
    return [];
  }

  const delimiter = sniffDelimiter(lines[0]);
  const header = splitLine(lines[0], delimiter).map(h => h.trim());

  return lines.slice(1).map(line => {
    const fields = splitLine(line, delimiter);
    const row: CsvRow = {};
    header.forEach((name, index) => {
      const value = fields[index];
      if (value !== undefined) {
        row[name] = value.trim();
      }
    });
    return row;
  });
}
