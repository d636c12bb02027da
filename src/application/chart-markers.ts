import type { ChartDirective, ImageTier, StyleVariant } from '../domain';
import { stripAnsi } from './ansi-text';
import type { ChartSource, ImageTransport, MarkdownRenderer } from './ports';

// Letters, digits and hyphens only, so the renderer cannot read it as emphasis.
export function chartToken(index: number): string {
  return `REPORTCHART-${index}-TOKEN`;
}

export interface ChartRenderInput {
  markdown: string;
  width: number;
  styleVariant: StyleVariant;
  tier: ImageTier;
  renderer: MarkdownRenderer;
  charts: ChartSource;
  images: ImageTransport;
}

export interface ChartRenderResult {
  rendered: string;
  chartCount: number;
}

// A token the renderer dropped leaves its chart out.
export async function renderWithCharts(input: ChartRenderInput): Promise<ChartRenderResult> {
  const directives = input.charts.findDirectives(input.markdown);
  if (directives.length === 0) {
    return {
      rendered: await input.renderer.render(input.markdown, input.width, input.styleVariant),
      chartCount: 0,
    };
  }

  const tokens = directives.map((_, index) => chartToken(index));
  let tokenized: string;
  try {
    tokenized = await input.renderer.render(
      input.charts.replaceDirectives(input.markdown, tokens),
      input.width,
      input.styleVariant
    );
  } catch {
    return {
      rendered: await input.renderer.render(input.markdown, input.width, input.styleVariant),
      chartCount: directives.length,
    };
  }

  const replacements = await Promise.all(
    directives.map((directive, index) => chartReplacement(directive, index, input))
  );
  const lines = tokenized.split('\n').map((line) => {
    const plain = stripAnsi(line);
    const index = tokens.findIndex((token) => plain.includes(token));
    return index === -1 ? line : replacements[index];
  });

  return { rendered: lines.join('\n'), chartCount: directives.length };
}

async function chartReplacement(
  directive: ChartDirective,
  index: number,
  input: ChartRenderInput
): Promise<string> {
  if (input.tier !== 'none') {
    const png = await input.charts.loadImage(directive, index);
    const inline = png ? input.images.encodeInline(png, input.tier) : null;
    if (inline) {
      return inline;
    }
  }
  return input.charts.renderFallback(directive);
}
