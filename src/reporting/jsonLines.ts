import type { Writable } from 'stream';
import type { Reporter } from '../types/index.js';

/** One `{"page": ..., "findings": [...]}` object per line. */
export function createJsonLinesReporter(out: Writable = process.stdout): Reporter {
  return (pageUrl, findings) => {
    out.write(JSON.stringify({ page: pageUrl, findings }) + '\n');
  };
}
