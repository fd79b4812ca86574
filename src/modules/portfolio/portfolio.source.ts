/**
 * Portfolio source: holdings and BTC/ETH targets from a JSON file.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigValidationError, errorMessage } from '../../common/errors.js';
import type { PortfolioDefinition } from '../../contracts/market.types.js';

export interface PortfolioSource {
  loadPortfolio(): Promise<PortfolioDefinition>;
}

const PositionSchema = z.object({
  assetId: z.string().min(1),
  symbol: z.string().min(1),
  quantity: z.number().nonnegative(),
  avgBuyPrice: z.number().positive(),
});

export const PortfolioFileSchema = z.object({
  targets: z.object({
    targetBtc: z.number().nonnegative(),
    targetEth: z.number().nonnegative(),
  }),
  holdings: z
    .array(PositionSchema)
    .superRefine((holdings, ctx) => {
      const seen = new Set<string>();
      holdings.forEach((h, i) => {
        if (seen.has(h.assetId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'assetId'],
            message: `Duplicate holding for ${h.assetId}`,
          });
        }
        seen.add(h.assetId);
      });
    })
    .default([]),
});

export function parsePortfolio(raw: unknown, source = 'portfolio'): PortfolioDefinition {
  const result = PortfolioFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      source,
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return result.data;
}

export class FilePortfolioSource implements PortfolioSource {
  constructor(private readonly path: string) {}

  async loadPortfolio(): Promise<PortfolioDefinition> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.path, 'utf-8'));
    } catch (err) {
      throw new ConfigValidationError(this.path, [`cannot read JSON: ${errorMessage(err)}`]);
    }
    return parsePortfolio(raw, this.path);
  }
}

/** Fixed portfolio, for the evaluate endpoint and tests. */
export class StaticPortfolioSource implements PortfolioSource {
  constructor(private readonly portfolio: PortfolioDefinition) {}

  async loadPortfolio(): Promise<PortfolioDefinition> {
    return this.portfolio;
  }
}
