import { vi } from 'vitest';
import type { DownloadDescriptor } from '../src/domain/index.js';
import type { ExportDiscovery, PartitionSource } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Descriptor factory for testing. */
export function makeDescriptor(id: string, overrides: Partial<DownloadDescriptor> = {}): DownloadDescriptor {
  return {
    export_id: overrides.export_id ?? 'demo',
    download_id: id,
    url: overrides.url ?? `http://svc.test/api/export/demo/${id}/data`,
    start_time: overrides.start_time ?? '2025-08-26T00:00:00.000Z',
    end_time: overrides.end_time ?? '2025-08-26T01:00:00.000Z',
    expected_rows: overrides.expected_rows,
  };
}

/** CSV text with the standard header and one line per row. */
export function csv(rows: ReadonlyArray<readonly string[]>): string {
  return ['patient_id,event_time,event_type,value', ...rows.map((r) => r.join(','))].join('\n') + '\n';
}

/** Encodes `text` and yields it in slices of `size` bytes. */
export async function* chunked(text: string, size: number): AsyncGenerator<Uint8Array> {
  const bytes = new TextEncoder().encode(text);
  for (let i = 0; i < bytes.length; i += size) {
    yield bytes.subarray(i, i + size);
  }
}

/** Never yields; rejects with the signal's reason once it aborts. */
export async function* hanging(signal: AbortSignal): AsyncGenerator<Uint8Array> {
  await new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export type PartitionBehaviour =
  | { kind: 'csv'; text: string; delayMs?: number }
  | { kind: 'error'; error: Error }
  | { kind: 'flaky'; failures: number; text: string }
  | { kind: 'broken'; text: string; error: Error }
  | { kind: 'hang' };

/**
 * In-process partition source keyed by download id.
 * Tracks attempts per download and the peak number of open streams.
 */
export class FakePartitionSource implements PartitionSource {
  readonly attempts = new Map<string, number>();
  peakOpen = 0;
  private openNow = 0;

  constructor(
    private readonly behaviours: Record<string, PartitionBehaviour>,
    private readonly chunkSize: number = 16,
  ) {}

  async open(descriptor: DownloadDescriptor, signal: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    const attempt = (this.attempts.get(descriptor.download_id) ?? 0) + 1;
    this.attempts.set(descriptor.download_id, attempt);

    const behaviour = this.behaviours[descriptor.download_id];
    if (!behaviour) throw new Error(`no behaviour for ${descriptor.download_id}`);

    switch (behaviour.kind) {
      case 'error':
        throw behaviour.error;
      case 'flaky':
        if (attempt <= behaviour.failures) throw new Error('connection reset');
        return this.track(chunked(behaviour.text, this.chunkSize));
      case 'broken':
        return this.track(this.breakAfter(behaviour.text, behaviour.error));
      case 'hang':
        return this.track(hanging(signal));
      case 'csv':
        if (behaviour.delayMs) await sleep(behaviour.delayMs);
        return this.track(chunked(behaviour.text, this.chunkSize));
    }
  }

  private async *breakAfter(text: string, error: Error): AsyncGenerator<Uint8Array> {
    yield new TextEncoder().encode(text);
    throw error;
  }

  private async *track(inner: AsyncGenerator<Uint8Array>): AsyncGenerator<Uint8Array> {
    this.openNow++;
    this.peakOpen = Math.max(this.peakOpen, this.openNow);
    try {
      yield* inner;
    } finally {
      this.openNow--;
    }
  }
}

/** Discovery returning a fixed list for one export id. */
export function fakeDiscovery(exportId: string, descriptors: DownloadDescriptor[]): ExportDiscovery {
  return {
    async listDownloads(requested: string): Promise<DownloadDescriptor[]> {
      if (requested !== exportId) throw new Error(`unknown export ${requested}`);
      return descriptors;
    },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
