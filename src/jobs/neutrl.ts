import { z } from 'zod';
import { NumericSchema } from '../core/page-decoder.js';
import { DecodeError } from '../core/errors.js';
import { checkConnectivity } from '../drivers/connectivity.js';
import { withRetries } from '../utils/retry.js';
import { logger, formatNumber } from '../utils/logger.js';
import type { SheetJob } from '../types/job.js';

const log = logger.createContext('neutrl');

export const NEUTRL_REWARDS_URL = 'https://app.neutrl.fi/rewards';
export const NEUTRL_PROGRAM_ID = 'ethereum-1';

const SeasonProgramsPayloadSchema = z.object({
  data: z.object({
    seasonPrograms: z.array(z.unknown()),
    user: z.null().optional()
  })
});

const SeasonProgramSchema = z.object({
  id: z.string(),
  state: z.object({
    totalPoints: NumericSchema,
    participantCount: NumericSchema
  }).passthrough()
}).passthrough();

export interface NeutrlStats {
  totalPoints: number;
  participantCount: number;
}

/**
 * The anonymous rewards payload: season programs present and no user attached
 */
export function isSeasonProgramsPayload(body: unknown): boolean {
  return SeasonProgramsPayloadSchema.safeParse(body).success;
}

export function extractNeutrlStats(body: unknown, programId: string = NEUTRL_PROGRAM_ID): NeutrlStats {
  const payload = SeasonProgramsPayloadSchema.safeParse(body);
  if (!payload.success) {
    throw new DecodeError('Response has no season programs');
  }

  for (const entry of payload.data.data.seasonPrograms) {
    const program = SeasonProgramSchema.safeParse(entry);
    if (program.success && program.data.id.includes(programId)) {
      return {
        totalPoints: program.data.state.totalPoints,
        participantCount: Math.trunc(program.data.state.participantCount)
      };
    }
  }

  const ids = payload.data.data.seasonPrograms
    .map(entry => z.object({ id: z.string() }).safeParse(entry))
    .flatMap(result => (result.success ? [result.data.id] : []));
  log.verbose(`Available programs: ${ids.join(', ') || 'none'}`);
  throw new DecodeError(`No ${programId} program with totalPoints and participantCount`);
}

export const neutrlJob: SheetJob = {
  kind: 'sheet',
  name: 'neutrl',
  description: 'Neutrl season points and participant count',
  requires: ['proxy'],
  worksheet: 'Neutrl',
  dateFormat: 'DD/MM/YYYY',
  collect: ctx => ctx.withBrowser(async browser => {
    await withRetries(() => checkConnectivity(browser), { ...ctx.retry, label: 'connectivity check' });

    const body = await browser.captureJson(NEUTRL_REWARDS_URL, {
      match: url => url.includes('sentio'),
      accept: isSeasonProgramsPayload
    });
    const stats = extractNeutrlStats(body);
    log.normal(`Total points: ${formatNumber(stats.totalPoints)}, participants: ${formatNumber(stats.participantCount)}`);
    return [stats.totalPoints, stats.participantCount];
  })
};
