/**
 * Advisor API Routes
 *
 * Prefix: /api/advisor
 *   GET  /report        live cycle, structured report
 *   GET  /report/text   live cycle, plain-text rendering
 *   POST /evaluate      engine run on a JSON body, no I/O
 *   GET  /config        active engine configuration
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../common/errors.js';
import type { EngineConfig } from '../../config/engine.config.js';
import { PortfolioFileSchema } from '../portfolio/portfolio.source.js';
import { evaluateAdvisory, runAdvisoryCycle, type AdvisoryCycleDeps } from './advisory-cycle.service.js';
import { renderReportText } from './advisory.renderer.js';

export interface AdvisorRouteOptions {
  deps: AdvisoryCycleDeps;
  engineConfig: EngineConfig;
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════

const PricePointSchema = z.object({
  ts: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const SentimentSchema = z.object({
  fearGreed: z.number().int().min(0).max(100).nullable().default(null),
  btcDominance: z.number().min(0).max(100).nullable().default(null),
  ethBtcRatio: z.number().positive().nullable().default(null),
  ts: z.number().nullable().default(null),
});

export const EvaluateBodySchema = z.object({
  asOf: z.string().datetime().optional(),
  series: z.record(z.array(PricePointSchema)),
  sentiment: SentimentSchema,
  previousSentiment: SentimentSchema.optional(),
  previousRiskScore: z.number().min(0).max(100).nullable().optional(),
  holdings: PortfolioFileSchema.shape.holdings,
  targets: PortfolioFileSchema.shape.targets,
  spotPrices: z.record(z.number()).optional(),
  format: z.enum(['json', 'text']).default('json'),
});

type EvaluateBody = z.infer<typeof EvaluateBodySchema>;

function parseBody(body: unknown): EvaluateBody {
  const result = EvaluateBodySchema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AppError('VALIDATION_ERROR', issues.join('; '), 400);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function advisorRoutes(fastify: FastifyInstance, opts: AdvisorRouteOptions): Promise<void> {
  const { deps, engineConfig } = opts;
  const now = opts.now ?? (() => new Date());

  /**
   * GET /api/advisor/report
   */
  fastify.get('/report', async (_request: FastifyRequest, reply: FastifyReply) => {
    const result = await runAdvisoryCycle(deps, engineConfig, now());
    return reply.send({ ok: true, data: result });
  });

  /**
   * GET /api/advisor/report/text
   */
  fastify.get('/report/text', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { report } = await runAdvisoryCycle(deps, engineConfig, now());
    return reply.type('text/plain; charset=utf-8').send(renderReportText(report));
  });

  /**
   * POST /api/advisor/evaluate
   * Pure engine run: caller supplies series, sentiment and portfolio.
   */
  fastify.post('/evaluate', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(request.body);
    const asOf = body.asOf ? new Date(body.asOf) : now();

    const { report, diagnostics } = evaluateAdvisory(
      {
        series: body.series,
        sentiment: body.sentiment,
        previousSentiment: body.previousSentiment,
        previousRiskScore: body.previousRiskScore,
        positions: body.holdings,
        targets: body.targets,
        spotPrices: body.spotPrices,
      },
      engineConfig,
      asOf
    );

    if (body.format === 'text') {
      return reply.type('text/plain; charset=utf-8').send(renderReportText(report));
    }
    return reply.send({ ok: true, data: { report, diagnostics } });
  });

  /**
   * GET /api/advisor/config
   */
  fastify.get('/config', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, data: engineConfig });
  });
}
