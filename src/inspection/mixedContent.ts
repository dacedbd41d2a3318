import type { HtmlDocument } from '../parsing/document.js';

/**
 * Tag/attribute pairs checked for insecure references, in report order.
 * An empty attribute means only the element's inline text is checked.
 */
export const MIXED_CONTENT_TAGS: ReadonlyArray<readonly [tag: string, attribute: string]> = [
  ['img', 'src'],
  ['iframe', 'src'],
  ['script', 'src'],
  ['object', 'data'],
  ['form', 'action'],
  ['embed', 'src'],
  ['video', 'src'],
  ['audio', 'src'],
  ['source', 'src'],
  ['link', 'href'],
  ['style', ''],
];

const INLINE_TEXT_TAGS = new Set(['script', 'style']);

// Plain substring match: also hits query strings and comments.
const INSECURE_MARKER = 'http:';

export class MixedContentInspector {
  inspect(document: HtmlDocument): string[] {
    const findings: string[] = [];

    for (const [tag, attribute] of MIXED_CONTENT_TAGS) {
      for (const element of document.elements(tag)) {
        if (attribute) {
          const value = element.attr(attribute);
          if (value && value.includes(INSECURE_MARKER)) {
            findings.push(value);
          }
        }

        if (INLINE_TEXT_TAGS.has(tag)) {
          const text = element.text();
          if (text.includes(INSECURE_MARKER)) {
            findings.push(text);
          }
        }
      }
    }

    return findings;
  }
}
