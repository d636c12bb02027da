import { Mutex } from 'async-mutex';
import chalk, { type ChalkInstance } from 'chalk';
import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

import type { MarkdownRenderer } from '../application/ports';
import type { StyleVariant } from '../domain';

export interface MarkdownParser {
  parse(markdown: string): string | Promise<string>;
}

export type MarkdownParserFactory = (width: number, styleVariant: StyleVariant) => MarkdownParser;

interface TerminalMarkdownRendererDeps {
  createParser?: MarkdownParserFactory;
  style?: ChalkInstance;
}

// One parser per (width, style variant). The lock covers the cache lookup and the render.
export class TerminalMarkdownRenderer implements MarkdownRenderer {
  private readonly mutex = new Mutex();
  private readonly parsers = new Map<string, MarkdownParser>();
  private readonly createParser: MarkdownParserFactory;

  constructor(deps: TerminalMarkdownRendererDeps = {}) {
    const style = deps.style ?? chalk;
    this.createParser =
      deps.createParser ?? ((width, styleVariant) => createTerminalParser(width, styleVariant, style));
  }

  render(markdown: string, width: number, styleVariant: StyleVariant): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const key = `${width}:${styleVariant}`;
      let parser = this.parsers.get(key);
      if (!parser) {
        parser = this.createParser(width, styleVariant);
        this.parsers.set(key, parser);
      }
      const output = await parser.parse(markdown);
      return output.replace(/\n+$/, '');
    });
  }

  cachedParserCount(): number {
    return this.parsers.size;
  }
}

export function createTerminalParser(
  width: number,
  styleVariant: StyleVariant,
  style: ChalkInstance = chalk
): MarkdownParser {
  const accent = styleVariant === 'dark' ? style.magenta : style.blue;
  const linkStyle = styleVariant === 'dark' ? style.cyan : style.blue;
  const hrefStyle = linkStyle.underline;
  const code = styleVariant === 'dark' ? style.yellow : style.red;

  return new Marked(
    markedTerminal({
      width,
      reflowText: true,
      showSectionPrefix: true,
      heading: accent.bold,
      firstHeading: accent.bold.underline,
      strong: style.bold,
      em: style.italic,
      codespan: code,
      code,
      blockquote: style.gray.italic,
      hr: style.gray,
      link: linkStyle,
      href: hrefStyle,
    }),
    {
      // Links always print their URL so the viewer can find it and make it clickable.
      renderer: {
        link(href, _title, text) {
          if (!text || text === href) {
            return linkStyle(hrefStyle(href));
          }
          return linkStyle(`${text} (${hrefStyle(href)})`);
        },
      },
    }
  );
}
