import { describe, it, expect } from 'vitest';
import {
  createConsoleReporter,
  createJsonLinesReporter,
  formatMixedContentReport,
} from '../../src/reporting/index.js';
import { MemoryStream } from '../helpers/fakeSite.js';

describe('formatMixedContentReport', () => {
  it('prints a header, one finding per line and a blank line', () => {
    expect(formatMixedContentReport('https://site.test/', ['http://a.test/x.png', 'http://b.test/y.js'])).toBe(
      '>> Mixed content for https://site.test/:\nhttp://a.test/x.png\nhttp://b.test/y.js\n\n'
    );
  });
});

describe('createConsoleReporter', () => {
  it('writes reports to the given stream', async () => {
    const out = new MemoryStream();
    const reporter = createConsoleReporter(out);

    await reporter('https://site.test/a', ['http://cdn.test/1.png']);
    await reporter('https://site.test/b', ['http://cdn.test/2.png']);

    expect(out.text).toBe(
      '>> Mixed content for https://site.test/a:\nhttp://cdn.test/1.png\n\n' +
        '>> Mixed content for https://site.test/b:\nhttp://cdn.test/2.png\n\n'
    );
  });
});

describe('createJsonLinesReporter', () => {
  it('writes one JSON object per page', async () => {
    const out = new MemoryStream();
    const reporter = createJsonLinesReporter(out);

    await reporter('https://site.test/', ['http://cdn.test/x.png', "var u='http://a.test';"]);

    expect(out.text).toBe(
      '{"page":"https://site.test/","findings":["http://cdn.test/x.png","var u=\'http://a.test\';"]}\n'
    );
    expect(JSON.parse(out.text.trim())).toEqual({
      page: 'https://site.test/',
      findings: ['http://cdn.test/x.png', "var u='http://a.test';"],
    });
  });
});
