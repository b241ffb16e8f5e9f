import chalk from 'chalk';
import { SilentProgress } from '@packwright/core';
import type { ProgressReporter } from '@packwright/core';
import type { OutputFormat } from './command-schemas.js';

class ConsoleProgress implements ProgressReporter {
  section(title: string): void {
    displaySection(title);
  }
  start(message: string): void {
    console.log(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  }
}

/** Prints warnings only, to stderr, so json or yaml on stdout stays parseable. */
class QuietProgress extends SilentProgress {
  readonly warn = (message: string): void => {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  };
}

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

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
}

const MAX_COLUMN_WIDTH = 50;

function cellText(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? '' : value.join(', ');
  }
  return '[object]';
}

function toYaml(data: unknown, indent = 0): string {
  const spaces = '  '.repeat(indent);
  if (Array.isArray(data)) {
    if (data.length === 0) return '[]';
    return data.map((item) => `${spaces}- ${toYaml(item, indent + 1).trim()}`).join('\n');
  }
  if (typeof data === 'object' && data !== null) {
    const entries = Object.entries(data);
    if (entries.length === 0) return '{}';
    return entries
      .map(([key, value]) => {
        const yamlValue = toYaml(value, indent + 1);
        if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
          return `${spaces}${key}:\n${yamlValue}`;
        }
        return `${spaces}${key}: ${yamlValue.trim()}`;
      })
      .join('\n');
  }
  if (typeof data === 'string') {
    if (data.includes('\n') || data.includes(':') || data.includes('-')) {
      return JSON.stringify(data);
    }
    return data;
  }
  return String(data);
}

export const OutputFormatter = {
  format(data: unknown, format: OutputFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(data, null, 2);
      case 'yaml':
        return toYaml(data);
      case 'table':
        if (Array.isArray(data)) {
          return OutputFormatter.formatTable(
            data.filter((item): item is object => typeof item === 'object' && item !== null)
          );
        }
        return toYaml(data);
    }
  },
  formatTable(data: object[], columns?: TableColumn[]): string {
    const firstRow = data[0];
    if (!firstRow) {
      return chalk.gray('Nothing to show');
    }
    const tableColumns: TableColumn[] =
      columns ??
      Object.keys(firstRow).map((key) => ({
        key,
        header: key.charAt(0).toUpperCase() + key.slice(1).replace(/_/g, ' '),
      }));
    const cell = (row: object, key: string): string =>
      Object.prototype.hasOwnProperty.call(row, key) ? cellText(Reflect.get(row, key)) : '';
    const widths = tableColumns.map((col) => {
      const dataWidth = Math.max(...data.map((row) => cell(row, col.key).length));
      return Math.min(Math.max(col.header.length, dataWidth, col.width ?? 0), MAX_COLUMN_WIDTH);
    });
    const header = tableColumns.map((col, i) => col.header.padEnd(widths[i] ?? 0)).join(' | ');
    const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
    const rows = data.map((row) =>
      tableColumns
        .map((col, i) => {
          let value = cell(row, col.key);
          if (value.length > MAX_COLUMN_WIDTH) {
            value = value.substring(0, MAX_COLUMN_WIDTH - 3) + '...';
          }
          return value.padEnd(widths[i] ?? 0);
        })
        .join(' | ')
    );
    return [chalk.bold(header), chalk.gray(separator), ...rows].join('\n');
  },
} as const;

/** Console reporter for interactive runs; with `quiet`, only warnings are printed. */
export function createProgress(quiet = false): ProgressReporter {
  return quiet ? new QuietProgress() : new ConsoleProgress();
}

export function displaySection(title: string): void {
  console.log('\n' + chalk.bold.cyan(`── ${title} ──`));
}
