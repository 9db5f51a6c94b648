import { z } from 'zod';
import { DecodeError } from './errors.js';

/**
 * Envelope of a paginated leaderboard response.
 * Only the fields the aggregation needs are validated; the rest passes through.
 */
const PaginationEnvelopeSchema = z.object({
  pagination: z.object({
    total: z.number().int().nonnegative().optional()
  }).passthrough().optional()
}).passthrough();

const EntriesEnvelopeSchema = z.object({
  entries: z.array(z.unknown())
}).passthrough();

const RecordSchema = z.record(z.unknown());

/** A finite number, or a string holding one (thousands separators allowed) */
export const NumericSchema = z.union([
  z.number(),
  z.string().trim().min(1).transform(value => Number(value.replace(/,/g, '')))
]).pipe(z.number().finite());

export interface PageDecoder {
  /** Total page count announced by the page-1 envelope */
  totalPages(body: string): number;
  /** Sum of the tracked field over the page's records */
  pageSum(body: string): number;
}

/**
 * Parse a page body as JSON, rejecting anything that is not an object
 */
export function parseEnvelope(body: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.trim());
  } catch (error) {
    throw new DecodeError(`Payload is not valid JSON: ${body.slice(0, 80)}`, { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new DecodeError('Payload is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Read `pagination.total`, defaulting to a single page when it is absent
 */
export function readTotalPages(body: string): number {
  const result = PaginationEnvelopeSchema.safeParse(parseEnvelope(body));
  if (!result.success) {
    throw new DecodeError(`Invalid pagination envelope: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data.pagination?.total ?? 1;
}

const countable = (value: number): number => (Number.isFinite(value) && value >= 0 ? value : 0);

/**
 * Coerce a record field to a number; anything non-finite or negative counts as 0
 */
export function toFieldNumber(value: unknown): number {
  if (typeof value === 'number') {
    return countable(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return countable(Number(value.replace(/,/g, '')));
  }
  return 0;
}

/**
 * Field value of one record; a record that is not an object counts as 0
 */
export function recordValue(entry: unknown, field: string): number {
  const record = RecordSchema.safeParse(entry);
  return record.success ? toFieldNumber(record.data[field]) : 0;
}

/**
 * Sum `field` across the `entries` collection of one page.
 * A missing collection fails the page; a bad record or field does not.
 */
export function sumEntries(body: string, field: string): number {
  const result = EntriesEnvelopeSchema.safeParse(parseEnvelope(body));
  if (!result.success) {
    throw new DecodeError('No entries in response');
  }

  return result.data.entries.reduce((sum: number, entry) => sum + recordValue(entry, field), 0);
}

export function createLeaderboardDecoder(field: string): PageDecoder {
  return {
    totalPages: readTotalPages,
    pageSum: body => sumEntries(body, field)
  };
}
