import { Writable } from 'stream';
import type { FetchResult, PageFetcher } from '../../src/types/index.js';

export interface FakePage {
  body: string;
  contentType?: string;
  finalUrl?: string;
}

/**
 * In-memory site. Unknown URLs answer with a 404 failure. Tracks how many
 * fetches overlap so tests can check the pool width.
 */
export class FakeSite implements PageFetcher {
  readonly calls: string[] = [];
  maxInFlight = 0;
  private inFlight = 0;
  private readonly pages: Map<string, FakePage>;

  constructor(pages: Record<string, FakePage>) {
    this.pages = new Map(Object.entries(pages));
  }

  async fetch(url: string): Promise<FetchResult> {
    this.calls.push(url);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 2));
    this.inFlight--;

    const page = this.pages.get(url);
    if (!page) {
      return { ok: false, url, error: 'HTTP 404', status: 404 };
    }
    return {
      ok: true,
      url,
      finalUrl: page.finalUrl ?? url,
      status: 200,
      contentType: page.contentType ?? 'text/html; charset=utf-8',
      body: page.body,
    };
  }
}

export function html(body: string): FakePage {
  return { body: `<!DOCTYPE html><html><head><title>t</title></head><body>${body}</body></html>` };
}

export class MemoryStream extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}
