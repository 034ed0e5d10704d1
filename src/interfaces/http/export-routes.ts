import { Readable } from 'node:stream';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ExportMeta } from '../../infrastructure/mock/synthetic-export.js';
import { generateCsv } from '../../infrastructure/mock/synthetic-export.js';

export interface ExportRoutesOptions {
  registry: ReadonlyMap<string, ExportMeta>;
  /** Characters per streamed CSV chunk. */
  chunkLimit?: number;
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type ExportParams = { Params: { exportId: string } };
type DownloadParams = { Params: { exportId: string; downloadId: string } };

/**
 * Export service API, backed by a synthetic registry.
 *
 *   GET /api/export                             list export ids
 *   GET /api/export/:exportId                   download ids of one export
 *   GET /api/export/:exportId/:downloadId       metadata of one download
 *   GET /api/export/:exportId/:downloadId/data  streamed CSV
 */
async function exportRoutes(fastify: FastifyInstance, opts: ExportRoutesOptions): Promise<void> {
  const { registry } = opts;

  /** Resolves a download or sends the matching error reply. */
  function findDownload(request: FastifyRequest<DownloadParams>, reply: FastifyReply) {
    const { exportId, downloadId } = request.params;
    const exp = registry.get(exportId);
    if (!exp) {
      void reply.status(404).send({ error: 'Export not found' });
      return undefined;
    }
    if (!UUID.test(downloadId)) {
      void reply.status(400).send({ error: 'downloadId must be a UUID' });
      return undefined;
    }
    const download = exp.downloads.get(downloadId.toLowerCase());
    if (!download) {
      void reply.status(404).send({ error: 'Download not found' });
      return undefined;
    }
    return download;
  }

  fastify.get('/api/export', async (_request, reply) => {
    return reply.send({ data: { export_ids: [...registry.keys()] } });
  });

  fastify.get('/api/export/:exportId', async (request: FastifyRequest<ExportParams>, reply: FastifyReply) => {
    const exp = registry.get(request.params.exportId);
    if (!exp) {
      return reply.status(404).send({ error: 'Export not found' });
    }
    return reply.send({ data: { id: exp.id, download_ids: [...exp.downloads.keys()] } });
  });

  fastify.get(
    '/api/export/:exportId/:downloadId',
    async (request: FastifyRequest<DownloadParams>, reply: FastifyReply) => {
      const download = findDownload(request, reply);
      if (!download) return reply;

      return reply.send({
        data: {
          id: download.id,
          rows: download.rows,
          event_types: download.eventTypes,
          patients: download.patients,
          start_time: new Date(download.startMs).toISOString(),
          end_time: new Date(download.endMs).toISOString(),
        },
      });
    },
  );

  fastify.get(
    '/api/export/:exportId/:downloadId/data',
    async (request: FastifyRequest<DownloadParams>, reply: FastifyReply) => {
      const download = findDownload(request, reply);
      if (!download) return reply;

      fastify.log.debug({ download_id: download.id, rows: download.rows }, 'Streaming download');
      return reply
        .type('text/csv')
        .send(Readable.from(generateCsv(download, opts.chunkLimit)));
    },
  );
}

export default fp(exportRoutes, {
  name: 'export-routes',
  fastify: '5.x',
});
