import { describe, expect, it, vi } from 'vitest';

import type { ChartDirective, ImageTier, StyleVariant } from '../domain';
import { chartToken, renderWithCharts } from './chart-markers';
import type { ChartSource, ImageTransport, MarkdownRenderer } from './ports';

const revenue: ChartDirective = { type: 'bar', title: 'Revenue', labels: ['Q1'], values: [4] };
const costs: ChartDirective = { type: 'pie', title: 'Costs', labels: ['Ops'], values: [1] };

function createRenderer() {
  return {
    render: vi.fn(async (markdown: string, _width: number, _style: StyleVariant) =>
      markdown
        .split('\n')
        .map((line) => `\u001b[0m  ${line}`)
        .join('\n')
    ),
  } satisfies MarkdownRenderer;
}

function createCharts(directives: ChartDirective[], png: Uint8Array | null): ChartSource {
  return {
    findDirectives: () => directives,
    replaceDirectives: (_markdown, tokens) => ['# Report', ...tokens, 'end'].join('\n'),
    renderFallback: (directive) => `[table ${directive.title}]\n[rows]`,
    loadImage: async () => png,
  };
}

const images: ImageTransport = {
  detectTier: () => 'kitty',
  encodeInline: (png, tier) => `<${tier}:${png.length}>`,
};

async function render(
  directives: ChartDirective[],
  tier: ImageTier,
  png: Uint8Array | null = null,
  renderer = createRenderer()
) {
  return renderWithCharts({
    markdown: 'raw markdown',
    width: 80,
    styleVariant: 'dark',
    tier,
    renderer,
    charts: createCharts(directives, png),
    images,
  });
}

describe('chart-markers', () => {
  it('builds tokens the renderer leaves intact', () => {
    expect(chartToken(3)).toBe('REPORTCHART-3-TOKEN');
  });

  it('renders plainly when the report has no charts', async () => {
    expect(await render([], 'kitty')).toEqual({
      rendered: '\u001b[0m  raw markdown',
      chartCount: 0,
    });
  });

  it('replaces token lines with text tables without an image tier', async () => {
    const result = await render([revenue, costs], 'none');
    expect(result.chartCount).toBe(2);
    expect(result.rendered.split('\n')).toEqual([
      '\u001b[0m  # Report',
      '[table Revenue]',
      '[rows]',
      '[table Costs]',
      '[rows]',
      '\u001b[0m  end',
    ]);
  });

  it('uses inline images when a tier and an image exist', async () => {
    const result = await render([revenue], 'iterm', new Uint8Array([1, 2, 3]));
    expect(result.rendered.split('\n')[1]).toBe('<iterm:3>');
  });

  it('falls back to the table when no image is found', async () => {
    const result = await render([revenue], 'kitty', null);
    expect(result.rendered.split('\n')[1]).toBe('[table Revenue]');
  });

  it('falls back to the plain render when the tokenized render fails', async () => {
    const renderer = createRenderer();
    renderer.render.mockRejectedValueOnce(new Error('boom'));
    const result = await render([revenue], 'none', null, renderer);
    expect(result.rendered).toBe('\u001b[0m  raw markdown');
    expect(renderer.render).toHaveBeenCalledTimes(2);
  });
});
