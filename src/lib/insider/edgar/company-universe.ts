/**
 * Company universe feed over the published ticker list.
 *
 * The list is ordered roughly by market value, so list position doubles as
 * rank. Loaded once per instance; a failed load is retried on the next call.
 */

import { z } from 'zod';
import type { Entity, EntityUniverseFeed, RequestContext } from '../types';
import type { EdgarClient } from './client';
import { padCik } from './full-text-search';

export const COMPANY_TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const companyTickersSchema = z.record(
  z.string(),
  z.object({
    cik_str: z.union([z.number(), z.string()]),
    ticker: z.string(),
    title: z.string(),
  })
);

export type CompanyTickers = z.infer<typeof companyTickersSchema>;

/**
 * Ranked, CIK-unique entities from the ticker list. A company listed under
 * several tickers keeps the first.
 */
export function toRankedEntities(tickers: CompanyTickers): Entity[] {
  const rows = Object.entries(tickers)
    .map(([position, row]) => ({ position: Number.parseInt(position, 10), row }))
    .sort((a, b) => a.position - b.position);

  const seen = new Set<string>();
  const entities: Entity[] = [];
  for (const { row } of rows) {
    const id = padCik(row.cik_str);
    if (seen.has(id)) continue;
    seen.add(id);
    entities.push({ id, name: row.title, ticker: row.ticker, rank: entities.length + 1 });
  }
  return entities;
}

export class EdgarCompanyUniverse implements EntityUniverseFeed {
  private loading: Promise<Entity[]> | null = null;

  constructor(
    private readonly client: EdgarClient,
    private readonly url: string = COMPANY_TICKERS_URL
  ) {}

  async listEntities(limit: number | null, context: RequestContext): Promise<Entity[]> {
    const entities = await this.load(context);
    return limit === null ? entities.slice() : entities.slice(0, limit);
  }

  private load(context: RequestContext): Promise<Entity[]> {
    if (!this.loading) {
      this.loading = this.client
        .getJson(this.url, companyTickersSchema, context)
        .then(toRankedEntities)
        .catch((error: unknown) => {
          this.loading = null;
          throw error;
        });
    }
    return this.loading;
  }
}
