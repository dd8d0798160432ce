/**
 * Express application for the risk engine HTTP API
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { API_CONFIG, MODEL_VERSION } from '../config/defaults.js';
import { RiskEngineError, type RiskEngineErrorCode } from '../domain/errors.js';
import { getStore, type CoefficientStore } from '../pipeline/coefficients.js';
import { calculateRisk, createCalculationContext, parseRiskInput, recordHash } from '../pipeline/run.js';
import { compareScenarios } from '../pipeline/impact.js';
import { formatZodIssues } from '../pipeline/validation.js';
import type { PluginRegistry } from '../pipeline/plugins.js';
import type { RiskCalculation } from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('api');

const CompareBodySchema = z.object({
  base: z.unknown(),
  alternative: z.unknown(),
});

const STATUS_BY_CODE: Record<RiskEngineErrorCode, number> = {
  UNKNOWN_COMPOUND: 400,
  UNKNOWN_PRESET: 404,
  INVALID_COEFFICIENT: 500,
  INVALID_INPUT: 400,
  DOMAIN_MISMATCH: 400,
  PLUGIN_REGISTRATION: 500,
};

export interface ErrorBody {
  error: string;
  code?: RiskEngineErrorCode;
}

/**
 * Status of a client error raised by middleware (malformed JSON, oversized body), which
 * marks its message as safe to expose
 */
function exposedClientStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('expose' in error) || error.expose !== true) {
    return undefined;
  }
  const status =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500) {
    return undefined;
  }
  return status;
}

export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof RiskEngineError) {
    return { status: STATUS_BY_CODE[error.code], body: { error: error.message, code: error.code } };
  }
  const client_status = exposedClientStatus(error);
  if (client_status !== undefined && error instanceof Error) {
    return { status: client_status, body: { error: error.message } };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}

export interface AppOptions {
  plugins: PluginRegistry;
  store?: CoefficientStore;
}

export function createApp({ plugins, store = getStore() }: AppOptions): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: API_CONFIG.JSON_LIMIT }));

  const run = (raw: unknown): RiskCalculation => {
    const input = parseRiskInput(raw);
    return calculateRisk(input, createCalculationContext(input.preset, { store, plugins }));
  };

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: MODEL_VERSION, timestamp: new Date().toISOString() });
  });

  app.get('/api/presets', (_req, res) => {
    const presets = store.loadAll().map((preset) => ({
      name: preset.name,
      version: preset.version,
      description: preset.description,
      domains: Object.keys(preset.baseline),
    }));
    res.json({ presets });
  });

  app.get('/api/plugins', (_req, res) => {
    res.json({ plugins: plugins.list(), inputs: plugins.declaredInputs() });
  });

  app.post('/api/calculate', (req, res) => {
    const calculation = run(req.body);
    logger.info(
      { preset: calculation.record.preset, category: calculation.record.category },
      'Calculation served'
    );
    res.json({ hash: recordHash(calculation.record), ...calculation });
  });

  app.post('/api/compare', (req, res) => {
    const parsed = CompareBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatZodIssues(parsed.error).join('; ') });
      return;
    }

    const base = run(parsed.data.base);
    const alternative = run(parsed.data.alternative);
    const age = parseRiskInput(parsed.data.base).demographics.age;
    res.json(compareScenarios(base, alternative, age));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(error);
    if (status >= 500) {
      logger.error(
        { path: req.path, error: error instanceof Error ? error.message : String(error) },
        'Request failed'
      );
    } else {
      logger.warn({ path: req.path, code: body.code }, 'Request rejected');
    }
    res.status(status).json(body);
  });

  return app;
}
