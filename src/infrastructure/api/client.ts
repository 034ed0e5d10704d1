import type { Logger } from 'pino';
import type { z } from 'zod';
import { ExportNotFoundError, PartitionFetchError } from '../../domain/index.js';
import type { DownloadDescriptor } from '../../domain/index.js';
import type { ExportDiscovery, PartitionSource } from '../../application/index.js';
import { exportListSchema, exportDetailSchema, downloadDetailSchema } from './schemas.js';

class HttpStatusError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`API ${status}: ${statusText}`);
  }
}

/**
 * HTTP client for the export service.
 *
 * Implements both collaborators the orchestrator needs: discovery
 * (listing an export's downloads with their time ranges) and the
 * partition source (streaming a download's CSV body).
 */
export class ExportApiClient implements ExportDiscovery, PartitionSource {
  private readonly base: string;

  constructor(
    baseUrl: string,
    private readonly log: Logger,
  ) {
    this.base = `${baseUrl.replace(/\/+$/, '')}/api`;
  }

  async listExports(signal?: AbortSignal): Promise<string[]> {
    const body = await this.getJson('/export', exportListSchema, signal);
    return body.data.export_ids;
  }

  async listDownloads(exportId: string, signal?: AbortSignal): Promise<DownloadDescriptor[]> {
    try {
      const exportIds = await this.listExports(signal);
      if (!exportIds.includes(exportId)) {
        throw new ExportNotFoundError(exportId, `not one of [${exportIds.join(', ')}]`);
      }

      const detail = await this.getJson(`/export/${encodeURIComponent(exportId)}`, exportDetailSchema, signal);
      this.log.debug({ exportId, downloads: detail.data.download_ids.length }, 'Export detail fetched');

      return await Promise.all(
        detail.data.download_ids.map(async (downloadId): Promise<DownloadDescriptor> => {
          const path = `/export/${encodeURIComponent(exportId)}/${downloadId}`;
          const meta = await this.getJson(path, downloadDetailSchema, signal);
          return {
            export_id: exportId,
            download_id: downloadId,
            url: `${this.base}${path}/data`,
            start_time: meta.data.start_time,
            end_time: meta.data.end_time,
            expected_rows: meta.data.rows,
          };
        }),
      );
    } catch (err: unknown) {
      if (err instanceof ExportNotFoundError) throw err;
      if (err instanceof HttpStatusError && err.status === 404) {
        throw new ExportNotFoundError(exportId, 'the service answered 404', { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ExportNotFoundError(exportId, message, { cause: err });
    }
  }

  async open(descriptor: DownloadDescriptor, signal: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    const res = await fetch(descriptor.url, { signal });
    if (!res.ok) {
      throw new PartitionFetchError(descriptor, 'http', `API ${res.status}: ${res.statusText}`);
    }
    if (!res.body) {
      throw new PartitionFetchError(descriptor, 'transport', 'response has no body');
    }
    return iterateBody(res.body);
  }

  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.infer<S>> {
    const res = await fetch(`${this.base}${path}`, { signal });
    if (!res.ok) {
      throw new HttpStatusError(res.status, res.statusText);
    }
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }
}

/**
 * Adapts a fetch body to an async iterable of chunks, cancelling the
 * body if the consumer stops early.
 */
async function* iterateBody(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let done = false;
  try {
    while (!done) {
      const next = await reader.read();
      if (next.done) {
        done = true;
      } else {
        yield next.value;
      }
    }
  } finally {
    if (!done) {
      await reader.cancel().catch(() => {});
    }
    reader.releaseLock();
  }
}
