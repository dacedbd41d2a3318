import type { HtmlDocument } from '../parsing/document.js';
import { cleanUrl, getNetloc, pathExtension, splitUrl } from '../utils/url.js';

// 'aspx' without the dot never equals a computed extension; kept for parity
// with the long-standing list.
export const WEB_PAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.htm',
  '.html',
  '.js',
  '.aspx',
  'aspx',
  '.pl',
  '.php',
  '.php3',
  '.cfm',
  '.cfml',
  '.py',
  '.cgi',
]);

export class LinkExtractor {
  /**
   * Same-origin links worth crawling from the page's `<a href>` elements.
   * Duplicates collapse; first occurrence order is kept.
   */
  extract(document: HtmlDocument, pageUrl: string): string[] {
    const pageNetloc = getNetloc(pageUrl);
    const links = new Set<string>();

    for (const anchor of document.elements('a')) {
      const link = this.resolveHref(anchor.attr('href'), pageUrl, pageNetloc);
      if (link) links.add(link);
    }

    return Array.from(links);
  }

  resolveHref(href: string | undefined, pageUrl: string, pageNetloc = getNetloc(pageUrl)): string | null {
    if (!href) return null;

    // Self links
    if (href === pageUrl || href === '/') return null;

    if (href.startsWith('#')) return null;

    const parts = splitUrl(href);
    if (!this.isCrawlableExtension(parts.path)) return null;

    if (parts.scheme === 'https' && parts.netloc === pageNetloc) {
      return href;
    }

    if (!parts.scheme && !parts.netloc && parts.path.length > 0) {
      return this.resolveRelative(cleanUrl(href), pageUrl);
    }

    // Other origins, plain http, mailto:, javascript: and the like
    return null;
  }

  /**
   * Resolves a relative href against the page. Null when it does not parse,
   * or when it lands on another host: URL parsing reads a backslash as `/`,
   * so `/\other.test/` becomes protocol-relative.
   */
  resolveRelative(href: string, pageUrl: string): string | null {
    try {
      const resolved = new URL(href, pageUrl);
      return resolved.host === new URL(pageUrl).host ? resolved.href : null;
    } catch {
      return null;
    }
  }

  isCrawlableExtension(path: string): boolean {
    const ext = pathExtension(path);
    return ext.length === 0 || WEB_PAGE_EXTENSIONS.has(ext.toLowerCase());
  }
}
