import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../config/engine.config.js';
import type { MarketSentiment } from '../../../contracts/market.types.js';
import { StaticPortfolioSource } from '../../portfolio/portfolio.source.js';
import { InMemorySnapshotRepository } from '../../snapshots/snapshot.repository.js';
import { FakeMarketData } from '../../../__tests__/helpers/market-data.fake.js';
import { linearCloses, seriesFromCloses } from '../../../__tests__/helpers/series.fixture.js';

const NOW = new Date(Date.UTC(2025, 2, 1));
const SENTIMENT: MarketSentiment = { fearGreed: 50, btcDominance: 50, ethBtcRatio: 0.05, ts: NOW.getTime() };
const PORTFOLIO = {
  holdings: [{ assetId: 'solana', symbol: 'SOL', quantity: 10, avgBuyPrice: 20 }],
  targets: { targetBtc: 1, targetEth: 10 },
};
const SERIES = {
  bitcoin: seriesFromCloses(linearCloses(400, 100, 1)),
  ethereum: seriesFromCloses(linearCloses(400, 50, 0.5)),
  solana: seriesFromCloses(linearCloses(60, 10, 1)),
};

function createApp(series: typeof SERIES | Record<string, never> = SERIES): FastifyInstance {
  return buildApp({
    deps: {
      marketData: new FakeMarketData(series, SENTIMENT, { bitcoin: 500, ethereum: 250, solana: 60 }),
      portfolio: new StaticPortfolioSource(PORTFOLIO),
      snapshots: new InMemorySnapshotRepository(),
    },
    engineConfig: DEFAULT_ENGINE_CONFIG,
    logLevel: 'silent',
    now: () => NOW,
  });
}

describe('advisor routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    app = createApp();
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should answer the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
    expect(res.json().storage).toBe('memory');
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  it('should run a live cycle on GET /report', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/advisor/report' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.ok).toBe(true);
    expect(body.data.persisted).toBe(true);
    expect(body.data.report.asOf).toBe('2025-03-01T00:00:00.000Z');
    expect(body.data.report.sections).toHaveLength(6);
  });

  it('should render the live report as plain text', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/advisor/report/text' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.body.split('\n')[0]).toBe('Cycle Advisor 2025-03-01T00:00:00.000Z');
  });

  it('should map a failed cycle to CYCLE_FAILED', async () => {
    const failing = createApp({});
    await failing.ready();

    const res = await failing.inject({ method: 'GET', url: '/api/advisor/report' });
    await failing.close();

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      ok: false,
      error: 'CYCLE_FAILED',
      message: 'No price data for any of 3 assets',
    });
  });

  it('should evaluate a posted body without touching market data', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: {
        asOf: '2024-06-01T00:00:00.000Z',
        series: { bitcoin: SERIES.bitcoin },
        sentiment: { fearGreed: 50, btcDominance: 50 },
        holdings: [],
        targets: { targetBtc: 1, targetEth: 10 },
      },
    });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.data.report.asOf).toBe('2024-06-01T00:00:00.000Z');
    expect(body.data.diagnostics).toEqual([{ assetId: 'bitcoin', status: 'OK', points: 400 }]);
    expect(body.data.report.sections.map((s: { id: string }) => s.id)).toEqual([
      'PORTFOLIO',
      'MARKET_PHASE',
      'CYCLE_TOP_RISK',
      'ALTSEASON',
      'BTC_ETH_RATIO',
    ]);
  });

  it('should render the evaluation as text on request', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: {
        asOf: '2024-06-01T00:00:00.000Z',
        series: { bitcoin: SERIES.bitcoin },
        sentiment: {},
        targets: { targetBtc: 1, targetEth: 10 },
        format: 'text',
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body.split('\n')[0]).toBe('Cycle Advisor 2024-06-01T00:00:00.000Z');
  });

  it('should fail the evaluation with CYCLE_FAILED when no series is submitted', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: { series: {}, sentiment: {}, targets: { targetBtc: 1, targetEth: 10 } },
    });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ ok: false, error: 'CYCLE_FAILED', message: 'No price series submitted' });
  });

  it('should fail the evaluation with CYCLE_FAILED when every series is malformed', async () => {
    const broken = seriesFromCloses(linearCloses(30, 10, 1)).reverse();
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: { series: { bitcoin: broken }, sentiment: {}, targets: { targetBtc: 1, targetEth: 10 } },
    });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      ok: false,
      error: 'CYCLE_FAILED',
      message: 'No price data for any of 1 assets',
    });
  });

  it('should reject out-of-range sentiment with VALIDATION_ERROR', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: {
        series: { bitcoin: SERIES.bitcoin },
        sentiment: { fearGreed: 150, btcDominance: -5, ethBtcRatio: 0 },
        targets: { targetBtc: 1, targetEth: 10 },
      },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'VALIDATION_ERROR',
      message:
        'sentiment.fearGreed: Number must be less than or equal to 100; ' +
        'sentiment.btcDominance: Number must be greater than or equal to 0; ' +
        'sentiment.ethBtcRatio: Number must be greater than 0',
    });
  });

  it('should reject a portfolio holding the same asset twice', async () => {
    const position = { assetId: 'solana', symbol: 'SOL', quantity: 1, avgBuyPrice: 20 };
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: {
        series: { bitcoin: SERIES.bitcoin },
        sentiment: {},
        holdings: [position, position],
        targets: { targetBtc: 1, targetEth: 10 },
      },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'VALIDATION_ERROR',
      message: 'holdings.1.assetId: Duplicate holding for solana',
    });
  });

  it('should reject a malformed body with VALIDATION_ERROR', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/advisor/evaluate',
      payload: { sentiment: {} },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'VALIDATION_ERROR',
      message: 'series: Required; targets: Required',
    });
  });

  it('should expose the active engine configuration', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/advisor/config' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual(DEFAULT_ENGINE_CONFIG);
  });
});
