import chalk from 'chalk';

export type OutputFormat = 'table' | 'json';

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

interface TableColumn {
  key: string;
  header: string;
}

function cellText(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '[object]';
}

function formatValue(value: unknown): string {
  if (value === null) return chalk.gray('null');
  if (value === undefined) return chalk.gray('undefined');
  if (typeof value === 'boolean') return chalk.blue(String(value));
  if (typeof value === 'number') return chalk.magenta(String(value));
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export const OutputFormatter = {
  format(data: unknown, format: OutputFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(data, null, 2);
      case 'table':
        if (Array.isArray(data)) {
          return OutputFormatter.formatTable(
            data.filter((item): item is object => typeof item === 'object' && item !== null)
          );
        }
        if (typeof data === 'object' && data !== null) {
          return OutputFormatter.formatObject(data);
        }
        return String(data);
    }
  },
  formatTable(data: object[], columns?: TableColumn[]): string {
    const firstRow = data[0];
    if (!firstRow) {
      return chalk.gray('No data to display');
    }
    const autoColumns: TableColumn[] =
      columns ??
      Object.keys(firstRow).map((key) => ({
        key,
        header: key.charAt(0).toUpperCase() + key.slice(1),
      }));
    const widths = autoColumns.map((col) =>
      Math.max(
        col.header.length,
        ...data.map((row) => cellText(Reflect.get(row, col.key)).length)
      )
    );
    const header = autoColumns.map((col, i) => col.header.padEnd(widths[i] ?? 0)).join(' | ');
    const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
    const rows = data.map((row) =>
      autoColumns
        .map((col, i) => cellText(Reflect.get(row, col.key)).padEnd(widths[i] ?? 0))
        .join(' | ')
    );
    return [chalk.bold(header), chalk.gray(separator), ...rows].join('\n');
  },
  formatObject(data: object): string {
    const entries = Object.entries(data);
    const maxKeyLength = Math.max(...entries.map(([key]) => key.length));
    return entries
      .map(([key, value]) => `${chalk.bold(key.padEnd(maxKeyLength))}: ${formatValue(value)}`)
      .join('\n');
  },
} as const;
