// ──────────────────────────────────────────
// Ingestion: Synthetic sample dataset
// ──────────────────────────────────────────

import { Faker, en } from '@faker-js/faker';
import { SampleContract } from '../../shared/contracts';
import { AdRecord, CalendarDate, Dataset } from '../../shared/types';

export const SAMPLE_SOURCES = [
  'Google_AdEx', 'Google_OpenBidding',
  // Prebid SSPs
  'Prebid_Nexx360', 'Prebid_Richaudience', 'Prebid_AppNexus',
  'Prebid_Ogury', 'Prebid_Criteo', 'Prebid_Optidigital',
  // TAM partners
  'TAM_Amazon', 'TAM_IndexExchange', 'TAM_Outbrain',
  'TAM_Pubmatic', 'TAM_Onetag', 'TAM_MediaNet', 'TAM_Equativ',
] as const;

interface Profile {
  revenue: { mean: number; sd: number };
  impressions: { mean: number; sd: number };
}

function profileFor(source: string): Profile {
  if (source.includes('Google')) {
    return { revenue: { mean: 8000, sd: 1500 }, impressions: { mean: 2_000_000, sd: 300_000 } };
  }
  if (source.includes('Prebid')) {
    return { revenue: { mean: 3000, sd: 800 }, impressions: { mean: 800_000, sd: 150_000 } };
  }
  return { revenue: { mean: 2500, sd: 600 }, impressions: { mean: 600_000, sd: 100_000 } };
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Longest sample a caller may ask for, a leap year of days. */
export const MAX_SAMPLE_DAYS = 366;

/** Number of calendar days from start to end, both included. */
export function daySpan(start: CalendarDate, end: CalendarDate): number {
  return Math.round((Date.parse(`${end}T00:00:00Z`) - Date.parse(`${start}T00:00:00Z`)) / DAY_MS) + 1;
}

export function eachDate(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const dates: CalendarDate[] = [];
  const current = new Date(`${start}T00:00:00Z`);
  const last = new Date(`${end}T00:00:00Z`);
  while (current <= last) {
    dates.push(current.toISOString().slice(0, 10));
    current.setUTCDate(current.getUTCDate() + 1);
  }
  return dates;
}

export class SampleGenerator implements SampleContract {
  generate(params: { start: CalendarDate; end: CalendarDate; seed?: number }): Dataset {
    const days = daySpan(params.start, params.end);
    if (days > MAX_SAMPLE_DAYS) {
      throw new RangeError(`Sample range ${params.start}..${params.end} spans ${days} days (max ${MAX_SAMPLE_DAYS})`);
    }

    const faker = new Faker({ locale: [en] });
    if (params.seed !== undefined) faker.seed(params.seed);

    // Box–Muller
    const normal = (mean: number, sd: number): number => {
      const u1 = faker.number.float({ min: Number.EPSILON, max: 1 });
      const u2 = faker.number.float({ min: 0, max: 1 });
      return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    };

    const records: AdRecord[] = [];
    for (const date of eachDate(params.start, params.end)) {
      for (const source of SAMPLE_SOURCES) {
        const profile = profileFor(source);
        const revenue = Math.max(0, normal(profile.revenue.mean, profile.revenue.sd));
        const impressions = Math.max(1000, Math.trunc(normal(profile.impressions.mean, profile.impressions.sd)));
        const perMille = (revenue / impressions) * 1000;

        records.push({
          date,
          source,
          revenue: round2(revenue),
          impressions,
          page_rpm: round2(perMille),
          fill_rate: round2(faker.number.float({ min: 75, max: 95 })),
          ecpm: round2(perMille),
          ctr: round2(faker.number.float({ min: 0.1, max: 2.5 })),
        });
      }
    }
    return records;
  }
}
