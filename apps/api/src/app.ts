import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { DashboardResponse, ErrorResponse, InspectResponse } from '@budget-lens/shared';
import type { AppConfig } from './config.js';
import { buildDashboard, buildExport } from './dashboard.js';
import { DecodeError, PipelineError } from './errors.js';
import { EXPORT_FILENAME } from './exporter.js';
import { suggestMapping } from './fieldMapper.js';
import { assertNotEmpty, decode, previewRows, type DecodedTable } from './fileDecoder.js';
import { readUpload, settingsFromFields, type UploadForm } from './upload.js';

export type ServerOptions = {
  logger?: boolean;
  now?: () => Date;
};

function loadTable(upload: UploadForm): DecodedTable {
  const table = decode(upload.file);
  assertNotEmpty(table);
  return table;
}

export async function buildServer(
  config: AppConfig,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });
  const now = options.now ?? (() => new Date());

  await server.register(cors, { origin: config.origins.length ? config.origins : true });
  await server.register(multipart, { limits: { fileSize: config.maxUploadBytes } });

  server.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof PipelineError) {
      req.log.info({ code: err.code }, err.message);
      const body: ErrorResponse & { attempts?: DecodeError['attempts'] } = {
        error: err.message,
        code: err.code,
      };
      if (err instanceof DecodeError) body.attempts = err.attempts;
      return reply.code(err.statusCode).send(body);
    }

    const status = err.statusCode ?? 500;
    if (status >= 500) {
      req.log.error(err);
      return reply.code(500).send({ error: 'Internal Server Error' } satisfies ErrorResponse);
    }
    return reply.code(status).send({ error: err.message, code: err.code } satisfies ErrorResponse);
  });

  server.get('/health', async () => ({ ok: true }));

  server.get('/', async () => ({
    name: 'Budget Lens API',
    routes: [
      '/health',
      '/inspect (POST multipart form: file)',
      '/dashboard (POST multipart form: file + selections)',
      '/export (POST multipart form: file + selections)',
    ],
  }));

  server.post('/inspect', async (req): Promise<InspectResponse> => {
    const upload = await readUpload(req);
    const table = loadTable(upload);
    req.log.info(
      { filename: upload.filename, encoding: table.encoding, rows: table.records.length },
      'inspected upload'
    );
    return {
      filename: upload.filename,
      encoding: table.encoding,
      columns: table.columns,
      rowCount: table.records.length,
      preview: previewRows(table, config.previewRows),
      suggestedMapping: suggestMapping(table.columns),
    };
  });

  server.post('/dashboard', async (req): Promise<DashboardResponse> => {
    const upload = await readUpload(req);
    const table = loadTable(upload);
    const result = buildDashboard(table, settingsFromFields(upload.fields), {
      previewRows: config.previewRows,
      currencySymbol: config.currencySymbol,
      today: now(),
    });
    req.log.info(
      {
        filename: upload.filename,
        encoding: table.encoding,
        rows: table.records.length,
        status: result.status,
        matched: result.status === 'ok' ? result.kpis.count : 0,
      },
      'dashboard computed'
    );
    return result;
  });

  server.post('/export', async (req, reply) => {
    const upload = await readUpload(req);
    const table = loadTable(upload);
    const csv = buildExport(table, settingsFromFields(upload.fields), now());
    req.log.info({ filename: upload.filename, bytes: csv.length }, 'filtered export');
    return reply
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${EXPORT_FILENAME}"`)
      .send(csv);
  });

  return server;
}
