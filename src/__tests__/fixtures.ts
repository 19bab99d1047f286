import { AdRecord, AggregatedMetrics } from '../shared/types';

export const HEADER = 'date,source,revenue,impressions,page_rpm,fill_rate,ecpm,ctr';

/** 2 sources × 2 days: SourceA underfills and underprices, SourceB underprices. */
export const SCENARIO_CSV = [
  HEADER,
  '2024-01-01,SourceA,100,1000,0.5,70,0.5,1',
  '2024-01-02,SourceA,200,1000,0.5,70,0.5,1',
  '2024-01-01,SourceB,50,2000,0.25,90,0.25,0.5',
  '2024-01-02,SourceB,50,2000,0.25,90,0.25,0.5',
].join('\n');

export function record(overrides: Partial<AdRecord> = {}): AdRecord {
  return {
    date: '2024-01-01',
    source: 'SourceA',
    revenue: 100,
    impressions: 1000,
    page_rpm: 100,
    fill_rate: 90,
    ecpm: 100,
    ctr: 1,
    ...overrides,
  };
}

export function metrics(overrides: Partial<AggregatedMetrics> = {}): AggregatedMetrics {
  return {
    revenue_sum: 100,
    revenue_mean: 100,
    impressions_sum: 1000,
    page_rpm_mean: 5,
    fill_rate_mean: 90,
    ecpm_mean: 5,
    ctr_mean: 1,
    ...overrides,
  };
}
