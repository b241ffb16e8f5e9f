import type React from 'react';
import { Box, Text } from 'ink';

type Cell = string | number | string[];

interface Props<Row extends Record<string, Cell>> {
  rows: Row[];
  /** Rows drawn in red, such as failed components. */
  flagged?: (row: Row) => boolean;
}

const MAX_WIDTH = 50;

function cellText(value: Cell | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function fit(text: string, width: number, alignRight: boolean): string {
  if (text.length > width) return text.substring(0, width - 1) + '…';
  return alignRight ? text.padStart(width) : text.padEnd(width);
}

function headerFor(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

export function DataTable<Row extends Record<string, Cell>>({
  rows,
  flagged,
}: Props<Row>): React.ReactElement {
  const [first] = rows;
  if (!first) {
    return <Text dimColor>Nothing to show</Text>;
  }

  const keys = Object.keys(first);
  const numeric = keys.map((key) => typeof first[key] === 'number');
  const widths = keys.map((key) =>
    Math.min(
      Math.max(headerFor(key).length, ...rows.map((row) => cellText(row[key]).length)),
      MAX_WIDTH
    )
  );
  const line = (cells: string[], rightAligned: boolean[]): string =>
    cells.map((cell, i) => fit(cell, widths[i] ?? 0, rightAligned[i] ?? false)).join('  ');

  return (
    <Box flexDirection="column">
      <Text bold>{line(keys.map(headerFor), numeric)}</Text>
      {rows.map((row, ri) => (
        <Text key={ri} color={flagged?.(row) ? 'red' : undefined}>
          {line(
            keys.map((key) => cellText(row[key])),
            numeric
          )}
        </Text>
      ))}
    </Box>
  );
}
