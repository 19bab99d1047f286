import { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app';
import { parseConfig } from '../config';
import { HEADER, SCENARIO_CSV } from './fixtures';

vi.spyOn(console, 'log').mockImplementation(() => undefined);
vi.spyOn(console, 'warn').mockImplementation(() => undefined);

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({ config: parseConfig({}) });
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

async function newSession(): Promise<string> {
  const res = await fetch(`${baseUrl}/api/v1/sessions`, { method: 'POST' });
  expect(res.status).toBe(201);
  return z.object({ id: z.string() }).parse(await res.json()).id;
}

function upload(sessionId: string, csv: string, query = ''): Promise<Response> {
  return fetch(`${baseUrl}/api/v1/datasets${query}`, {
    method: 'POST',
    headers: { 'content-type': 'text/csv', 'x-session-id': sessionId },
    body: csv,
  });
}

function get(sessionId: string, path: string): Promise<Response> {
  return fetch(`${baseUrl}/api/v1${path}`, { headers: { 'x-session-id': sessionId } });
}

function putSelection(sessionId: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/v1/selection`, {
    method: 'PUT',
    headers: { 'content-type': 'application/json', 'x-session-id': sessionId },
    body: JSON.stringify(body),
  });
}

describe('session scope', () => {
  it('requires a session header', async () => {
    const res = await fetch(`${baseUrl}/api/v1/metrics/summary`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing x-session-id header' });
  });

  it('rejects unknown sessions', async () => {
    const res = await get('nope', '/metrics/summary');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown session: nope' });
  });

  it('deletes the current session', async () => {
    const id = await newSession();
    const res = await fetch(`${baseUrl}/api/v1/session`, { method: 'DELETE', headers: { 'x-session-id': id } });
    expect(res.status).toBe(204);
    expect((await get(id, '/datasets')).status).toBe(404);
  });
});

describe('dataset upload', () => {
  it('loads a valid CSV', async () => {
    const id = await newSession();
    const res = await upload(id, SCENARIO_CSV);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      message: 'Valid data',
      rows: 4,
      sources: ['SourceA', 'SourceB'],
      date_range: { start: '2024-01-01', end: '2024-01-02' },
    });
  });

  it('rejects rows with more fields than the header', async () => {
    const id = await newSession();
    const res = await upload(id, [HEADER, '2024-01-15,A,100,1000,0.1,90,0.1,1,999,junk'].join('\n'));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'FormatError', message: 'Expected 8 fields in row 1, saw 10' });
  });

  it('maps validation failures to 422', async () => {
    const id = await newSession();
    const res = await upload(id, 'date,source,revenue,impressions,page_rpm,fill_rate\n2024-01-01,A,1,1,1,1\n');
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'SchemaError', message: 'Missing required columns: ecpm, ctr' });
  });

  it('enforces derived consistency when asked', async () => {
    const id = await newSession();
    const res = await upload(id, SCENARIO_CSV, '?check_consistency=true');
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: 'ConsistencyError',
      message: 'Row 1: ecpm 0.5 does not match revenue/impressions*1000 (100.00)',
    });
  });

  it('rejects an empty body', async () => {
    const id = await newSession();
    expect((await upload(id, '')).status).toBe(400);
  });

  it('loads sample data with a seed', async () => {
    const id = await newSession();
    const res = await fetch(`${baseUrl}/api/v1/datasets/sample`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-session-id': id },
      body: JSON.stringify({ start: '2024-01-01', end: '2024-01-03', seed: 3 }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, rows: 45, date_range: { start: '2024-01-01', end: '2024-01-03' } });
  });
});

describe('sample range limits', () => {
  function postSample(sessionId: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/v1/datasets/sample`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-session-id': sessionId },
      body: JSON.stringify(body),
    });
  }

  it('accepts a full leap year', async () => {
    const id = await newSession();
    const res = await postSample(id, { start: '2024-01-01', end: '2024-12-31', seed: 1 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ rows: 366 * 15 });
  });

  it('rejects a span longer than a year', async () => {
    const id = await newSession();
    const res = await postSample(id, { start: '2024-01-01', end: '2025-01-01' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Sample range is limited to 366 days' });
  });

  it('measures the span against the default end when only a start is given', async () => {
    const id = await newSession();
    const res = await postSample(id, { start: '2000-01-01' });
    expect(res.status).toBe(400);
    expect((await get(id, '/datasets')).status).toBe(200);
  });

  it('rejects a reversed range', async () => {
    const id = await newSession();
    const res = await postSample(id, { start: '2024-02-01', end: '2024-01-01' });
    expect(await res.json()).toEqual({ error: 'start must not be after end' });
  });
});

describe('metrics and alerts', () => {
  it('drops stored alerts when the selection changes', async () => {
    const id = await newSession();
    await upload(id, SCENARIO_CSV);
    await get(id, '/alerts');
    await putSelection(id, { sources: ['SourceB'] });

    expect(await (await get(id, '/alerts/last')).json()).toEqual({ data: { status: 'not_evaluated', alerts: [] } });
  });

  it('reports not evaluated, then the scenario alerts', async () => {
    const id = await newSession();
    await upload(id, SCENARIO_CSV);

    expect(await (await get(id, '/alerts/last')).json()).toEqual({ data: { status: 'not_evaluated', alerts: [] } });

    const res = await get(id, '/alerts');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        status: 'alerts',
        alerts: [
          { severity: 'danger', source: 'SourceA' },
          { severity: 'warning', source: 'SourceA' },
          { severity: 'warning', source: 'SourceB' },
        ],
      },
    });
  });

  it('narrows metrics to the selection and returns 409 when nothing matches', async () => {
    const id = await newSession();
    await upload(id, SCENARIO_CSV);

    const narrowed = await putSelection(id, { date_range: ['2024-01-02', '2024-01-02'] });
    expect(await narrowed.json()).toEqual({ dateRange: ['2024-01-02', '2024-01-02'], sources: ['SourceA', 'SourceB'] });
    expect(await (await get(id, '/metrics/summary')).json()).toMatchObject({ data: { total_revenue: 250 } });

    await putSelection(id, { sources: [] });
    const empty = await get(id, '/metrics/summary');
    expect(empty.status).toBe(409);
    expect(await empty.json()).toEqual({ error: 'EmptyResultError', message: 'No data for the selected filters' });
  });

  it('rejects malformed selection dates', async () => {
    const id = await newSession();
    const res = await putSelection(id, { date_range: ['2024-02-30', '2024-03-01'] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid date: 2024-02-30' });
  });

  it('ranks sources and validates query parameters', async () => {
    const id = await newSession();
    await upload(id, SCENARIO_CSV);

    expect(await (await get(id, '/metrics/top?n=1')).json()).toEqual({ data: [{ source: 'SourceA', revenue: 300 }] });
    expect((await get(id, '/metrics/top?n=0')).status).toBe(400);
    expect((await get(id, '/metrics/technologies/Other')).status).toBe(400);
    expect(await (await get(id, '/metrics/timeseries?by=total')).json()).toEqual({
      data: [
        { date: '2024-01-01', revenue_sum: 150 },
        { date: '2024-01-02', revenue_sum: 250 },
      ],
    });
  });

  it('exports the filtered rows as a CSV attachment', async () => {
    const id = await newSession();
    await upload(id, SCENARIO_CSV);
    await putSelection(id, { sources: ['SourceB'] });

    const res = await get(id, '/export');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/csv/);
    expect(res.headers.get('content-disposition')).toMatch(/^attachment; filename="dashboard_data_\d{8}_\d{4}\.csv"$/);
    expect(await res.text()).toBe(
      [HEADER, '2024-01-01,SourceB,50,2000,0.25,90,0.25,0.5', '2024-01-02,SourceB,50,2000,0.25,90,0.25,0.5', ''].join('\n')
    );
  });
});

describe('health', () => {
  it('answers without a session', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });
});
