/**
 * Schematic Agent - API Routes
 *
 * Start pipeline runs from an uploaded circuit file, query their state and
 * download the written schematic and validation report.
 */

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { z } from 'zod';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

import { config } from '../config.js';
import { parseCircuit } from '../circuit/ingest.js';
import { runPipeline, PipelineOptions } from '../pipeline/orchestrator.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import { PipelineWebSocketManager, toStateMessage } from './pipeline-ws.js';

const routesLogger: Logger = log.child({ service: 'api-routes' });

export interface ApiRouteOptions {
  /** Root directory for per-run output */
  runsDir?: string;
  uploadDir?: string;
  /** Upload size limit in bytes */
  maxUploadSize?: number;
  /** Extra pipeline options (symbol index, LLM client, ERC runner) */
  pipeline?: Partial<PipelineOptions>;
}

const formBoolean = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'on', 'off'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'on');

const RunFieldsSchema = z.object({
  iterations: z.coerce.number().int().min(1).max(10).optional(),
  useLlm: formBoolean.optional(),
  validatorUseLlm: formBoolean.optional(),
  mode: z.enum(['template', 'llm-text']).optional(),
});

const OperationIdSchema = z.string().uuid();

// Parses a request part against a schema, mapping zod failures to a 400
function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, operation: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError('Invalid request', {
      operation,
      errors: parsed.error.errors,
    });
  }
  return parsed.data;
}

export function createApiRoutes(manager: PipelineWebSocketManager, options: ApiRouteOptions = {}): Router {
  const router = Router();
  const runsDir = options.runsDir ?? config.storage.runsDir;

  const upload = multer({
    storage: multer.diskStorage({
      destination: options.uploadDir ?? config.storage.uploadDir,
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}-${path.basename(file.originalname)}`);
      },
    }),
    limits: {
      fileSize: options.maxUploadSize ?? config.storage.maxUploadSize,
    },
  });

  // multer reports limits and unexpected fields as MulterError; those are client errors
  const receiveCircuit = (req: Request, res: Response, next: NextFunction): void => {
    upload.single('circuit')(req, res, (err?: unknown) => {
      if (err instanceof multer.MulterError) {
        next(
          new ValidationError(`Upload rejected: ${err.message}`, {
            operation: 'createRun',
            multerCode: err.code,
            field: err.field,
          })
        );
        return;
      }
      next(err);
    });
  };

  const lookup = (req: Request): { operationId: string } => {
    const operationId = parseInput(OperationIdSchema, req.params.operationId, 'lookupRun');
    return { operationId };
  };

  router.post('/runs', receiveCircuit, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = req.file;
      if (!file) {
        throw new ValidationError("Multipart field 'circuit' with a JSON file is required", {
          operation: 'createRun',
        });
      }

      let text: string;
      try {
        text = await fs.readFile(file.path, 'utf-8');
      } finally {
        await fs.rm(file.path, { force: true });
      }

      const fields = parseInput(RunFieldsSchema, req.body, 'createRun');
      const circuit = parseCircuit(text, file.originalname);

      const operationId = manager.createOperation(circuit.title);
      const outDir = path.join(runsDir, operationId);

      routesLogger.info('Starting pipeline run', {
        operationId,
        title: circuit.title,
        parts: circuit.parts.length,
        ...fields,
      });

      runPipeline({
        ...options.pipeline,
        circuit,
        outDir,
        operationId,
        maxIterations: fields.iterations,
        useLlm: fields.useLlm,
        validatorUseLlm: fields.validatorUseLlm,
        mode: fields.mode,
        onProgress: (event) => manager.emitProgress(event),
      }).catch((error: unknown) => {
        routesLogger.error('Pipeline run failed', error instanceof Error ? error : undefined, { operationId });
        manager.failOperation(operationId, error instanceof Error ? error : String(error));
      });

      res.status(202).json({
        success: true,
        data: { operationId },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/runs/:operationId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { operationId } = lookup(req);
      const operation = manager.getOperation(operationId);
      if (!operation) {
        throw new NotFoundError('Run', operationId, { operation: 'getRun' });
      }
      res.json({ success: true, data: toStateMessage(operation) });
    } catch (error) {
      next(error);
    }
  });

  const download = (kind: 'schematic' | 'report') =>
    (req: Request, res: Response, next: NextFunction): void => {
      try {
        const { operationId } = lookup(req);
        const operation = manager.getOperation(operationId);
        const filePath = kind === 'schematic' ? operation?.schematicPath : operation?.reportPath;
        if (!operation || !filePath) {
          throw new NotFoundError(kind === 'schematic' ? 'Schematic' : 'Report', operationId, {
            operation: 'downloadRunOutput',
          });
        }
        res.download(filePath, path.basename(filePath), (error?: Error) => {
          if (error && !res.headersSent) next(error);
        });
      } catch (error) {
        next(error);
      }
    };

  router.get('/runs/:operationId/schematic', download('schematic'));
  router.get('/runs/:operationId/report', download('report'));

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({ success: true, data: manager.getStats() });
  });

  return router;
}
