import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export interface ElementView {
  attr(name: string): string | undefined;
  text(): string;
}

/**
 * Read-only view over a parsed HTML page. Malformed markup is parsed
 * best-effort, so broken pages just expose fewer elements.
 */
export class HtmlDocument {
  private readonly $: CheerioAPI;

  private constructor($: CheerioAPI) {
    this.$ = $;
  }

  static parse(html: string): HtmlDocument {
    // Scripting off so <noscript> children are elements, not raw text
    return new HtmlDocument(cheerio.load(html, { scriptingEnabled: false }));
  }

  /** Elements with the given tag name, in document order. */
  elements(tagName: string): ElementView[] {
    const $ = this.$;
    return $(tagName)
      .toArray()
      .map((element) => {
        const $el = $(element);
        return {
          attr: (name: string) => $el.attr(name),
          text: () => $el.text(),
        };
      });
  }
}
