export interface OutputOptions {
  json: boolean;
  color: boolean;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export class Output {
  private readonly out: (text: string) => void;
  private readonly err: (text: string) => void;

  constructor(private options: OutputOptions) {
    this.out = options.stdout ?? (text => process.stdout.write(text + '\n'));
    this.err = options.stderr ?? (text => process.stderr.write(text + '\n'));
  }

  get isJson(): boolean {
    return this.options.json;
  }

  log(message: string): void {
    if (!this.options.json) {
      this.out(message);
    }
  }

  json(data: unknown): void {
    this.out(JSON.stringify(data, null, 2));
  }

  error(message: string): void {
    if (this.options.json) {
      this.json({ error: message });
    } else {
      this.err(this.paint('31', 'Error:') + ` ${message}`);
    }
  }

  success(message: string): void {
    if (!this.options.json) {
      this.out(`${this.paint('32', '✓')} ${message}`);
    }
  }

  warn(message: string): void {
    if (!this.options.json) {
      this.err(`${this.paint('33', '⚠')} ${message}`);
    }
  }

  // Green at or above the threshold, red below it
  score(label: string, value: number | undefined, threshold: number): string {
    if (value === undefined) return `${label}: n/a`;
    const text = `${value.toFixed(2)}%`;
    return `${label}: ${this.paint(value >= threshold ? '32' : '31', text)}`;
  }

  table(headers: string[], rows: string[][]): string {
    if (rows.length === 0) {
      return '';
    }

    // Calculate column widths
    const colWidths = headers.map((header, i) => {
      const maxRowWidth = Math.max(...rows.map(row => (row[i] ?? '').length));
      return Math.max(header.length, maxRowWidth);
    });

    const pad = (cell: string, i: number): string => {
      const width = colWidths[i];
      return width !== undefined ? cell.padEnd(width) : cell;
    };

    const headerRow = headers.map(pad).join('  ').trimEnd();
    const separator = colWidths.map(width => '-'.repeat(width)).join('  ');
    const dataRows = rows.map(row => row.map((cell, i) => pad(cell, i)).join('  ').trimEnd());

    return [headerRow, separator, ...dataRows].join('\n');
  }

  private paint(code: string, text: string): string {
    return this.options.color ? `\x1b[${code}m${text}\x1b[0m` : text;
  }
}

export function createOutput(options: Partial<OutputOptions> = {}): Output {
  const defaults: OutputOptions = {
    json: false,
    color: process.stdout.isTTY === true && !process.env['NO_COLOR'],
  };

  return new Output({ ...defaults, ...options });
}
