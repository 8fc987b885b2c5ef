/**
 * Per-entity filing fetcher
 *
 * Reads an entity's submissions index and pulls the reporting owners (name,
 * CIK and relationship) out of its most recent Form 4 XML documents.
 */

import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import { RateLimitedError, errorMessage } from '../errors';
import type { Entity, EntityFilingFetcher, FilerRecord, RequestContext } from '../types';
import type { EdgarClient } from './client';
import { padCik } from './full-text-search';

const log = createLogger('EdgarEntityFilings');

export const SUBMISSIONS_BASE_URL = 'https://data.sec.gov/submissions';
export const ARCHIVES_BASE_URL = 'https://www.sec.gov/Archives/edgar/data';

const OWNERSHIP_FORMS = new Set(['4', '4/A']);

const submissionsSchema = z.object({
  filings: z.object({
    recent: z.object({
      accessionNumber: z.array(z.string()),
      filingDate: z.array(z.string()),
      form: z.array(z.string()),
      primaryDocument: z.array(z.string()),
    }),
  }),
});

export interface OwnershipFiling {
  accessionNumber: string;
  filingDate: string;
  documentUrl: string;
}

/**
 * URL of the raw XML behind a primary document. The index points at the
 * rendered view under an `xslF345X0n/` folder.
 */
export function ownershipDocumentUrl(entityId: string, accessionNumber: string, primaryDocument: string): string {
  const cik = String(Number.parseInt(entityId, 10));
  const folder = accessionNumber.replace(/-/g, '');
  const document = primaryDocument.replace(/^xslF345X\d+\//, '');
  return `${ARCHIVES_BASE_URL}/${cik}/${folder}/${document}`;
}

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&#39;': "'",
};

function decodeXmlText(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos|#39);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

export interface ReportingOwner {
  name: string;
  /** 10 digits */
  cik?: string;
  roles: string[];
}

const OWNER_BLOCK_PATTERN = /<reportingOwner>([\s\S]*?)<\/reportingOwner>/gi;

function tagText(xml: string, tag: string): string | null {
  const match = xml.match(new RegExp(`<${tag}>\\s*([^<]+?)\\s*</${tag}>`, 'i'));
  return match ? decodeXmlText(match[1]).replace(/\s+/g, ' ') : null;
}

function isFlagSet(xml: string, tag: string): boolean {
  const value = tagText(xml, tag)?.toLowerCase();
  return value === '1' || value === 'true';
}

/**
 * Relationship titles of one reporting owner, in the order the form lists them
 */
function ownerRoles(block: string): string[] {
  const roles: string[] = [];
  if (isFlagSet(block, 'isDirector')) roles.push('Director');
  if (isFlagSet(block, 'isOfficer')) roles.push(tagText(block, 'officerTitle') ?? 'Officer');
  if (isFlagSet(block, 'isTenPercentOwner')) roles.push('10% Owner');
  if (isFlagSet(block, 'isOther')) roles.push(tagText(block, 'otherText') ?? 'Other');
  return roles;
}

/**
 * Reporting owners of a Form 4 document, one per distinct name
 */
export function extractReportingOwners(xml: string): ReportingOwner[] {
  const owners: ReportingOwner[] = [];
  const addOwner = (owner: ReportingOwner) => {
    if (owner.name && !owners.some((existing) => existing.name === owner.name)) owners.push(owner);
  };

  for (const [, block] of xml.matchAll(OWNER_BLOCK_PATTERN)) {
    const name = tagText(block, 'rptOwnerName');
    if (!name) continue;
    const cik = tagText(block, 'rptOwnerCik');
    addOwner({
      name,
      ...(cik && /^\d+$/.test(cik) ? { cik: padCik(cik) } : {}),
      roles: ownerRoles(block),
    });
  }

  // Documents without reportingOwner wrappers only give us names
  if (owners.length === 0) {
    for (const match of xml.matchAll(/<rptOwnerName>\s*([^<]+?)\s*<\/rptOwnerName>/gi)) {
      addOwner({ name: decodeXmlText(match[1]).replace(/\s+/g, ' '), roles: [] });
    }
  }
  return owners;
}

export class EdgarEntityFilings implements EntityFilingFetcher {
  constructor(
    private readonly client: EdgarClient,
    private readonly filingsPerEntity: number
  ) {}

  async listOwnershipFilings(entity: Entity, context: RequestContext): Promise<OwnershipFiling[]> {
    const url = `${SUBMISSIONS_BASE_URL}/CIK${entity.id}.json`;
    const submissions = await this.client.getJson(url, submissionsSchema, context);
    const recent = submissions.filings.recent;

    const filings: OwnershipFiling[] = [];
    for (let i = 0; i < recent.form.length && filings.length < this.filingsPerEntity; i++) {
      if (!OWNERSHIP_FORMS.has(recent.form[i])) continue;
      const accessionNumber = recent.accessionNumber[i];
      const primaryDocument = recent.primaryDocument[i];
      if (!accessionNumber || !primaryDocument) continue;

      filings.push({
        accessionNumber,
        filingDate: recent.filingDate[i] ?? '',
        documentUrl: ownershipDocumentUrl(entity.id, accessionNumber, primaryDocument),
      });
    }
    return filings;
  }

  /**
   * Individual documents may fail as long as one succeeds. Rate limiting
   * and cancellation always propagate.
   */
  async fetchRecentFilers(entity: Entity, context: RequestContext): Promise<FilerRecord[]> {
    const filings = await this.listOwnershipFilings(entity, context);
    if (filings.length === 0) return [];

    const records: FilerRecord[] = [];
    let firstError: unknown = null;
    let succeeded = 0;

    for (const filing of filings) {
      if (context.signal?.aborted) {
        throw new Error(`Cancelled while reading filings of ${entity.id}`);
      }
      try {
        const xml = await this.client.getText(filing.documentUrl, context);
        succeeded++;
        for (const owner of extractReportingOwners(xml)) {
          records.push({
            filerName: owner.name,
            ...(filing.filingDate ? { filingDate: filing.filingDate } : {}),
            accessionNumber: filing.accessionNumber,
            ...(owner.cik ? { ownerCik: owner.cik } : {}),
            ...(owner.roles.length > 0 ? { roles: owner.roles } : {}),
          });
        }
      } catch (error) {
        if (error instanceof RateLimitedError || context.signal?.aborted) throw error;
        log.debug(
          { entityId: entity.id, url: filing.documentUrl, error: errorMessage(error) },
          'Ownership document fetch failed'
        );
        firstError ??= error;
      }
    }

    if (succeeded === 0 && firstError !== null) {
      throw firstError;
    }
    return records;
  }
}
