/**
 * Contract API
 *
 * POST /api/contracts/upload          - Extracts contract data from an uploaded PDF
 * POST /api/contracts/generate        - Renders a contract (DOCX or PDF) from form data
 * POST /api/contracts/delivery-report - Renders a delivery report (DOCX or PDF) from form data
 * POST /api/contracts/export          - Exports form data to a spreadsheet
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  getContext,
  getCorrelationId,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  documentsRenderedCounter,
  parseExtractionMode,
  validateContractForm,
  EntityTaggerUnavailableError,
  UnknownExtractionModeError,
  type ContractExtractor,
  type ContractForm,
  type ErrorEnvelope,
  type ExtractionResponse,
} from '@contract-extraction/shared';
import { fromContractForm, safeFileName, fileTimestamp, type ContractDocumentData } from './lib/remap';
import { renderContractDocx, renderContractPdf } from './lib/render/contract';
import { renderDeliveryReport, renderDeliveryReportDocx } from './lib/render/delivery-report';
import { renderSpreadsheet, MIME_XLSX } from './lib/render/spreadsheet';
import { MIME_PDF } from './lib/render/pdf';
import { MIME_DOCX } from './lib/render/docx';

export interface AppDependencies {
  extractor: ContractExtractor;
  /** Clock for file names and issue dates */
  now?: () => Date;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
  res.status(status).json(error);
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Validate the form body, or answer 400 and return null.
 */
function parseForm(req: Request, res: Response): ContractForm | null {
  const validation = validateContractForm(req.body);
  if (!validation.valid) {
    sendError(res, 400, 'invalid_request', `Dados do formulário inválidos: ${validation.errors.join('; ')}`);
    return null;
  }
  return validation.value;
}

interface DocumentRenderer {
  format: 'docx' | 'pdf' | 'xlsx';
  mimeType: string;
  render: (data: ContractDocumentData) => Promise<Buffer>;
}

interface RenderedDocument {
  kind: string;
  fileBaseName: string;
  /** The first renderer is the default format */
  renderers: [DocumentRenderer, ...DocumentRenderer[]];
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const now = deps.now ?? (() => new Date());

  // Middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(
    '/api/contracts/upload',
    express.raw({ type: ['application/pdf', 'application/octet-stream'], limit: config.maxUploadBytes })
  );

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'contract-api',
      extraction_modes: deps.extractor.availableModes(),
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  // User header check
  app.use('/api/contracts', (req: Request, res: Response, next: NextFunction) => {
    const userId = req.headers[config.userIdHeader];
    if (typeof userId !== 'string' || userId.trim() === '') {
      sendError(res, 401, 'unauthorized', 'Usuário não autenticado.');
      return;
    }

    const context = getContext();
    if (context) context.userId = userId;
    next();
  });

  /**
   * POST /api/contracts/upload?mode=pattern|statistical
   * Body: the contract PDF (application/pdf)
   */
  app.post('/api/contracts/upload', async (req: Request, res: Response) => {
    const requestedMode = queryString(req.query.mode) ?? queryString(req.query.tipo_analise);
    const mode = parseExtractionMode(requestedMode, config.defaultExtractionMode);

    if (!mode) {
      sendError(res, 400, 'invalid_request', `Tipo de análise desconhecido: ${requestedMode}`);
      return;
    }

    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      sendError(res, 400, 'invalid_request', 'Nenhum arquivo PDF enviado.');
      return;
    }

    const context = getContext();
    if (context) context.extractionMode = mode;

    try {
      const record = await deps.extractor.extract(body, mode);

      if (!record) {
        sendError(res, 500, 'extraction_failed', 'Não foi possível extrair dados do contrato.');
        return;
      }

      const response: ExtractionResponse = {
        message: 'Dados extraídos com sucesso! Revise para salvar.',
        extractedData: record,
      };
      res.status(200).json(response);
    } catch (error) {
      logger.error('Contract extraction failed', error, { extraction_mode: mode });

      if (error instanceof UnknownExtractionModeError) {
        sendError(res, 400, 'invalid_request', `Tipo de análise desconhecido: ${error.mode}`);
        return;
      }

      const code = error instanceof EntityTaggerUnavailableError ? 'extraction_unavailable' : 'internal_error';
      const message = error instanceof Error ? error.message : 'Unknown error';
      sendError(res, 500, code, `Erro ao processar o contrato: ${message}`);
    }
  });

  const documents: Record<string, RenderedDocument> = {
    '/api/contracts/generate': {
      kind: 'contract',
      fileBaseName: 'contrato',
      renderers: [
        { format: 'docx', mimeType: MIME_DOCX, render: renderContractDocx },
        { format: 'pdf', mimeType: MIME_PDF, render: renderContractPdf },
      ],
    },
    '/api/contracts/delivery-report': {
      kind: 'delivery_report',
      fileBaseName: 'relatorio_entrega',
      renderers: [
        { format: 'docx', mimeType: MIME_DOCX, render: (data) => renderDeliveryReportDocx(data, now()) },
        { format: 'pdf', mimeType: MIME_PDF, render: (data) => renderDeliveryReport(data, now()) },
      ],
    },
    '/api/contracts/export': {
      kind: 'spreadsheet',
      fileBaseName: 'dados_contrato',
      renderers: [{ format: 'xlsx', mimeType: MIME_XLSX, render: renderSpreadsheet }],
    },
  };

  for (const [route, document] of Object.entries(documents)) {
    app.post(route, async (req: Request, res: Response) => {
      const form = parseForm(req, res);
      if (!form) return;

      // A format the document does not come in falls back to its default
      const renderer =
        document.renderers.find((candidate) => candidate.format === form.formato_desejado) ?? document.renderers[0];
      const data = fromContractForm(form);

      try {
        const buffer = await renderer.render(data);
        const fileName = `${document.fileBaseName}_${safeFileName(data.customer.name)}_${fileTimestamp(now())}.${renderer.format}`;

        documentsRenderedCounter.inc({ kind: document.kind, format: renderer.format, status: 'success' });
        logger.info('Document rendered', { kind: document.kind, file_name: fileName, bytes: buffer.length });

        res.attachment(fileName);
        res.type(renderer.mimeType);
        res.send(buffer);
      } catch (error) {
        documentsRenderedCounter.inc({ kind: document.kind, format: renderer.format, status: 'failed' });
        logger.error('Document rendering failed', error, { kind: document.kind, format: renderer.format });

        const message = error instanceof Error ? error.message : 'Unknown error';
        sendError(res, 500, 'render_failed', `Erro ao gerar o documento: ${message}`);
      }
    });
  }

  // Body parser and other unhandled errors
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;

    logger.error('Unhandled request error', err, { status });
    sendError(
      res,
      status,
      status >= 500 ? 'internal_error' : 'invalid_request',
      err instanceof Error ? err.message : 'Unknown error'
    );
  });

  return app;
}
