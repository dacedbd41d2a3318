import type { Writable } from 'stream';
import type { Reporter } from '../types/index.js';

export function formatMixedContentReport(pageUrl: string, findings: readonly string[]): string {
  const lines = [`>> Mixed content for ${pageUrl}:`, ...findings, ''];
  return lines.join('\n') + '\n';
}

export function createConsoleReporter(out: Writable = process.stdout): Reporter {
  return (pageUrl, findings) => {
    out.write(formatMixedContentReport(pageUrl, findings));
  };
}
