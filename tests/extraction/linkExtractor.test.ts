import { describe, it, expect } from 'vitest';
import { HtmlDocument } from '../../src/parsing/document.js';
import { LinkExtractor } from '../../src/extraction/linkExtractor.js';

const extractor = new LinkExtractor();
const PAGE = 'https://site.test/docs/index.html';

function anchors(...hrefs: string[]): HtmlDocument {
  return HtmlDocument.parse(hrefs.map((href) => `<a href="${href}">link</a>`).join('\n'));
}

describe('LinkExtractor', () => {
  it('resolves relative links against the page URL', () => {
    expect(extractor.extract(anchors('/about', 'guide.html', '../up/'), PAGE)).toEqual([
      'https://site.test/about',
      'https://site.test/docs/guide.html',
      'https://site.test/up/',
    ]);
  });

  it('keeps absolute https links on the same netloc as written', () => {
    expect(extractor.extract(anchors('https://site.test/x.php?id=1'), PAGE)).toEqual([
      'https://site.test/x.php?id=1',
    ]);
  });

  it('discards other origins, plain http and non-web schemes', () => {
    const doc = anchors(
      'https://other.test/',
      'http://site.test/plain',
      '//site.test/protocol-relative',
      'mailto:someone@site.test',
      'javascript:void(0)',
      'https://site.test:8443/port'
    );
    expect(extractor.extract(doc, PAGE)).toEqual([]);
  });

  it('never resolves a relative href onto another host', () => {
    const doc = HtmlDocument.parse(
      '<a href="/\\evil.test/x">a</a><a href="/\t/evil.test/y">b</a><a href="\\\\evil.test/z">c</a><a href="/stay">d</a>'
    );
    expect(extractor.extract(doc, 'https://site.test/')).toEqual(['https://site.test/stay']);
  });

  it('drops only the anchor whose href does not parse', () => {
    const doc = anchors('/good', '\\\\h:99999/x', '/\\[', '/other');
    expect(extractor.extract(doc, 'https://site.test/')).toEqual([
      'https://site.test/good',
      'https://site.test/other',
    ]);
  });

  it('skips self links and fragments', () => {
    const doc = anchors(PAGE, '/', '#top', '#');
    expect(extractor.extract(doc, PAGE)).toEqual([]);
  });

  it('filters by extension', () => {
    const doc = anchors('/doc.pdf', '/page.php', '/path/', '/photo.JPG', '/Legacy.ASPX', '/img.png?v=page.html');
    expect(extractor.extract(doc, PAGE)).toEqual([
      'https://site.test/page.php',
      'https://site.test/path/',
      'https://site.test/Legacy.ASPX',
    ]);
  });

  it('ignores anchors without href and query-only references', () => {
    const doc = HtmlDocument.parse('<a name="top">x</a><a href="">empty</a><a href="?page=2">next</a>');
    expect(extractor.extract(doc, PAGE)).toEqual([]);
  });

  it('collapses duplicates within a page', () => {
    const doc = anchors('/about', 'https://site.test/about', '/about');
    expect(extractor.extract(doc, PAGE)).toEqual(['https://site.test/about']);
  });

  it('gives the same result when run twice', () => {
    const doc = anchors('/a', 'b.html', 'https://site.test/c', '/doc.pdf', 'https://other.test/');
    expect(extractor.extract(doc, PAGE)).toEqual(extractor.extract(doc, PAGE));
  });

  it('only reads anchors', () => {
    const doc = HtmlDocument.parse('<link href="/style"><area href="/map"><a href="/real">x</a>');
    expect(extractor.extract(doc, PAGE)).toEqual(['https://site.test/real']);
  });

  describe('isCrawlableExtension', () => {
    it.each([
      ['/doc.pdf', false],
      ['/page.php', true],
      ['/path/', true],
      ['/index.HTM', true],
      ['/script.cgi', true],
      ['/data.json', false],
    ])('%s -> %s', (path, expected) => {
      expect(extractor.isCrawlableExtension(path)).toBe(expected);
    });
  });
});
