/**
 * EDGAR full-text search surface
 *
 * Queries the efts search index for Form 4 filings mentioning a name. Each
 * hit lists its parties as display names such as
 * "WEC ENERGY GROUP, INC.  (WEC)  (CIK 0000783325)" and
 * "KLAPPA GALE E  (CIK 0001183567)". Parties carrying a ticker are issuers;
 * the rest are reporting owners, and their CIK is kept with the reference.
 * When no party has a ticker the last one is taken as the issuer.
 */

import { z } from 'zod';
import { SearchUnavailableError, errorMessage } from '../errors';
import type {
  Entity,
  FilingReference,
  IndexedSearchRequest,
  IndexedSearchSurface,
} from '../types';
import type { EdgarClient } from './client';

export const EFTS_SEARCH_URL = 'https://efts.sec.gov/LATEST/search-index';

const eftsResponseSchema = z.object({
  hits: z.object({
    hits: z.array(
      z.object({
        _id: z.string().optional(),
        _source: z.object({
          adsh: z.string().optional(),
          file_date: z.string().optional(),
          display_names: z.array(z.string()).default([]),
        }),
      })
    ),
  }),
});

export interface FilingParty {
  name: string;
  tickers: string[];
  cik: string;
}

const DISPLAY_NAME_PATTERN = /^(.*?)\s*(?:\(([^()]*)\))?\s*\(CIK\s+(\d+)\)\s*$/;

export function padCik(cik: string | number): string {
  return String(cik).replace(/^0+/, '').padStart(10, '0');
}

/**
 * Parse a search hit display name. Returns null when it carries no CIK.
 */
export function parseDisplayName(displayName: string): FilingParty | null {
  const match = displayName.trim().match(DISPLAY_NAME_PATTERN);
  if (!match) return null;

  const [, name, tickerGroup, cik] = match;
  const tickers = tickerGroup
    ? tickerGroup
        .split(',')
        .map((ticker) => ticker.trim())
        .filter(Boolean)
    : [];

  return { name: name.trim(), tickers, cik: padCik(cik) };
}

function toEntity(party: FilingParty): Entity {
  return party.tickers.length > 0
    ? { id: party.cik, name: party.name, ticker: party.tickers[0] }
    : { id: party.cik, name: party.name };
}

/**
 * Split the parties of one filing into issuers and reporting owners
 */
export function splitParties(parties: FilingParty[]): { issuers: FilingParty[]; owners: FilingParty[] } {
  const issuers = parties.filter((party) => party.tickers.length > 0);
  if (issuers.length > 0) {
    return { issuers, owners: parties.filter((party) => party.tickers.length === 0) };
  }
  if (parties.length < 2) {
    return { issuers: parties, owners: [] };
  }
  return { issuers: parties.slice(-1), owners: parties.slice(0, -1) };
}

export class EdgarFullTextSearch implements IndexedSearchSurface {
  readonly name = 'edgar-fulltext';

  constructor(
    private readonly client: EdgarClient,
    private readonly baseUrl: string = EFTS_SEARCH_URL
  ) {}

  buildUrl(term: string, request: IndexedSearchRequest): string {
    const params = new URLSearchParams({
      q: `"${term}"`,
      forms: '4',
      dateRange: 'custom',
      startdt: request.startDate,
      enddt: request.endDate,
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  async search(term: string, request: IndexedSearchRequest): Promise<FilingReference[]> {
    const url = this.buildUrl(term, request);

    let response: z.infer<typeof eftsResponseSchema>;
    try {
      response = await this.client.getJson(url, eftsResponseSchema, request);
    } catch (error) {
      throw new SearchUnavailableError(`Full-text search failed for "${term}": ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const references: FilingReference[] = [];
    for (const hit of response.hits.hits) {
      const source = hit._source;
      const parties = source.display_names
        .map(parseDisplayName)
        .filter((party): party is FilingParty => party !== null);
      const { issuers, owners } = splitParties(parties);
      const accessionNumber = source.adsh ?? hit._id?.split(':')[0];

      for (const issuer of issuers) {
        for (const owner of owners) {
          references.push({
            entity: toEntity(issuer),
            filerName: owner.name,
            ownerCik: owner.cik,
            ...(source.file_date ? { filingDate: source.file_date } : {}),
            ...(accessionNumber ? { accessionNumber } : {}),
          });
        }
      }
    }
    return references;
  }
}
