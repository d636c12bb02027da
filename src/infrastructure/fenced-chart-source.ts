import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ChartSource } from '../application/ports';
import type { ChartDirective, ChartType } from '../domain';

const CHART_FENCE = '```chart';
const CLOSING_FENCE = '```';
const CHART_TYPES: ChartType[] = ['bar', 'line', 'pie'];

interface ChartBlock {
  start: number;
  end: number;
  directive: ChartDirective | null;
}

// Unclosed or empty blocks, and blocks of an unknown type, stay in the markdown.
export class FencedChartSource implements ChartSource {
  constructor(private readonly chartsDirectory: string | null) {}

  findDirectives(markdown: string): ChartDirective[] {
    return findChartBlocks(markdown.split('\n')).flatMap((block) =>
      block.directive ? [block.directive] : []
    );
  }

  replaceDirectives(markdown: string, tokens: string[]): string {
    const lines = markdown.split('\n');
    const output: string[] = [];
    let cursor = 0;
    let chartIndex = 0;

    for (const block of findChartBlocks(lines)) {
      if (!block.directive) {
        continue;
      }
      output.push(...lines.slice(cursor, block.start));
      const token = tokens[chartIndex];
      if (token === undefined) {
        output.push(...lines.slice(block.start, block.end + 1));
      } else {
        output.push(token);
      }
      cursor = block.end + 1;
      chartIndex += 1;
    }

    output.push(...lines.slice(cursor));
    return output.join('\n');
  }

  renderFallback(directive: ChartDirective): string {
    return renderTextTable(directive);
  }

  async loadImage(directive: ChartDirective, index: number): Promise<Uint8Array | null> {
    if (!this.chartsDirectory) {
      return null;
    }
    try {
      return await readFile(join(this.chartsDirectory, `${chartFileStem(directive.title, index)}.png`));
    } catch {
      return null;
    }
  }
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'unknown';
}

// Untitled charts share the default title, so they are stored by position.
export function chartFileStem(title: string, index: number): string {
  const slug = slugify(title);
  return slug === 'chart' ? `chart-${index}` : slug;
}

export function renderTextTable(directive: ChartDirective): string {
  if (directive.labels.length === 0 || directive.values.length === 0) {
    return '';
  }

  const count = Math.min(directive.labels.length, directive.values.length);
  const labels = directive.labels.slice(0, count);
  const values = directive.values.slice(0, count).map(formatChartValue);
  const labelWidth = Math.max(1, ...labels.map((label) => label.length));
  const valueWidth = Math.max(1, ...values.map((value) => value.length));
  const rule = (left: string, middle: string, right: string) =>
    `  ${left}${'─'.repeat(labelWidth + 2)}${middle}${'─'.repeat(valueWidth + 2)}${right}`;

  const lines: string[] = [];
  if (directive.title) {
    lines.push(`  ${directive.title}`);
  }
  lines.push(rule('┌', '┬', '┐'));
  labels.forEach((label, index) => {
    lines.push(`  │ ${label.padEnd(labelWidth)} │ ${values[index].padStart(valueWidth)} │`);
  });
  lines.push(rule('└', '┴', '┘'));
  return lines.join('\n');
}

export function formatChartValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function findChartBlocks(lines: string[]): ChartBlock[] {
  const blocks: ChartBlock[] = [];
  for (let index = 0; index < lines.length; index += 1) {
    if (lines[index].trim() !== CHART_FENCE) {
      continue;
    }
    const start = index;
    let end = -1;
    for (let inner = start + 1; inner < lines.length; inner += 1) {
      if (lines[inner].trim() === CLOSING_FENCE) {
        end = inner;
        break;
      }
    }
    if (end === -1) {
      break;
    }
    blocks.push({ start, end, directive: parseChartBlock(lines.slice(start + 1, end)) });
    index = end;
  }
  return blocks;
}

function parseChartBlock(lines: string[]): ChartDirective | null {
  let type = '';
  let title = '';
  let labels: string[] = [];
  let values: number[] = [];

  for (const line of lines) {
    const separator = line.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    switch (key) {
      case 'type':
        type = trimQuotes(value);
        break;
      case 'title':
        title = trimQuotes(value);
        break;
      case 'x':
      case 'labels':
        labels = parseJsonArray(value, (item): item is string => typeof item === 'string');
        break;
      case 'y':
      case 'values':
        values = parseJsonArray(
          value,
          (item): item is number => typeof item === 'number' && Number.isFinite(item)
        );
        break;
      default:
        break;
    }
  }

  const chartType = CHART_TYPES.find((candidate) => candidate === type);
  if (!chartType || values.length === 0) {
    return null;
  }
  return { type: chartType, title: title || 'Chart', labels, values };
}

function trimQuotes(value: string): string {
  return value.replace(/^["']+|["']+$/g, '');
}

// The whole array is rejected when any element has the wrong type.
function parseJsonArray<T>(value: string, isItem: (item: unknown) => item is T): T[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed) || !parsed.every(isItem)) {
    return [];
  }
  return parsed;
}
