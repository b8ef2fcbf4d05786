import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildSchema, introspectionFromSchema } from 'graphql';
import { OpenDataTap } from '../../src/OpenDataTap.js';
import { InMemoryMessageWriter } from '../../src/infrastructure/output/InMemoryMessageWriter.js';
import { JsonLinesWriter } from '../../src/infrastructure/output/JsonLinesWriter.js';
import { RowCastError, UnsupportedContentTypeError } from '../../src/domain/errors/CatalogErrors.js';
import type { RowSkippedEvent } from '../../src/domain/events/DomainEvents.js';
import { createMockResponse, csvResponse, jsonResponse } from '../helpers/fixtures.js';

// --- Catalog stand-in ---

const ENDPOINT = 'https://graphql.example.test/graphql';
const BUDGET = 'https://data.example.test/datasets/budget-2024';
const GRANTS = 'https://data.example.test/datasets/grants';

const introspection = introspectionFromSchema(
  buildSchema(`
    type Query { dataset(iri: String!): Dataset }
    type Dataset {
      iri: String
      accrualPeriodicity: String
      documentation: String
      isPartOf: String
      distribution: [Distribution!]!
      title: LocalizedText
      description: LocalizedText
    }
    type Distribution { accessURL: String conformsTo: String }
    type LocalizedText { cs: String en: String }
  `),
);

const catalog: Record<string, { title: string; csv: string; contentType?: string }> = {
  [BUDGET]: {
    title: 'Rozpočet obce 2024',
    csv: 'id;amount;date;note\nA1;12.5;2024-01-15;první\nA2;-3;2024-02-29;\nA3;;2024-03-01;x\n',
  },
  [GRANTS]: {
    title: 'Dotace',
    csv: 'id,amount,date\nG1,1000,2024-05-01\nG2,lots,2024-05-02\nG3,250,2024-05-03\n',
  },
};

const tableSchema = {
  tableSchema: {
    primaryKey: 'id',
    columns: [
      { name: 'id', titles: 'Identifikátor', required: true, datatype: 'string' },
      { name: 'amount', titles: 'Částka', 'dc:description': 'Částka v Kč', datatype: 'number' },
      { name: 'date', titles: 'Datum', datatype: 'date' },
    ],
  },
};

function route(url: string, init?: RequestInit): Promise<Response> {
  if (url === ENDPOINT) {
    const body: { query: string; variables?: { iri?: string } } = JSON.parse(String(init?.body));
    if (body.query.includes('__schema')) {
      return Promise.resolve(jsonResponse({ data: introspection }));
    }
    const iri = body.variables?.iri ?? '';
    const entry = catalog[iri];
    return Promise.resolve(
      jsonResponse({
        data: {
          dataset: entry
            ? {
                iri,
                accrualPeriodicity: null,
                documentation: null,
                isPartOf: null,
                distribution: [{ accessURL: `${iri}/data.csv`, conformsTo: `${iri}/schema.json` }],
                title: { cs: entry.title },
                description: { cs: 'Testovací datová sada' },
              }
            : null,
        },
      }),
    );
  }

  for (const [iri, entry] of Object.entries(catalog)) {
    if (url === `${iri}/schema.json`) return Promise.resolve(jsonResponse(tableSchema));
    if (url === `${iri}/data.csv`) return Promise.resolve(csvResponse(entry.csv, entry.contentType));
  }

  return Promise.resolve(createMockResponse('', { status: 404, statusText: 'Not Found' }));
}

// Mock the global fetch
const mockFetch = vi.fn(route);

beforeEach(() => {
  mockFetch.mockClear();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function createTap(identifiers: string[], rowErrorPolicy?: 'fail' | 'skip'): OpenDataTap {
  return new OpenDataTap({
    identifiers,
    endpoint: ENDPOINT,
    rowErrorPolicy,
    now: () => new Date('2024-06-01T00:00:00.000Z'),
  });
}

// ============================================================
// Discovery
// ============================================================
describe('Discovery', () => {
  it('should build a catalog from the metadata service and the schema documents', async () => {
    const catalogResult = await createTap([BUDGET]).discover();

    expect(catalogResult).toEqual({
      streams: [
        {
          tap_stream_id: 'rozpocet_obce_2024',
          stream: 'rozpocet_obce_2024',
          identifier: BUDGET,
          schema: {
            type: 'object',
            properties: {
              id: { type: 'string' },
              amount: { type: ['number', 'null'], description: 'Částka v Kč' },
              date: { type: ['string', 'null'], format: 'date' },
            },
            required: ['id'],
          },
          key_properties: ['id'],
        },
      ],
    });
    // introspection, dataset query, schema document; no payload
    expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([ENDPOINT, ENDPOINT, `${BUDGET}/schema.json`]);
  });
});

// ============================================================
// Sync
// ============================================================
describe('Sync', () => {
  it('should stream a semicolon-separated payload as Singer messages', async () => {
    const lines: string[] = [];
    const tap = createTap([BUDGET]);

    await tap.sync(new JsonLinesWriter({ write: (chunk: string) => lines.push(chunk) }));

    expect(lines.map((l) => JSON.parse(l).type)).toEqual(['SCHEMA', 'RECORD', 'RECORD', 'RECORD', 'STATE']);
    expect(lines[1]).toBe(
      '{"type":"RECORD","stream":"rozpocet_obce_2024","record":{"id":"A1","amount":12.5,"date":"2024-01-15"},"time_extracted":"2024-06-01T00:00:00.000Z"}\n',
    );
    expect(JSON.parse(lines[2] ?? '').record).toEqual({ id: 'A2', amount: -3, date: '2024-02-29' });
    expect(JSON.parse(lines[3] ?? '').record).toEqual({ id: 'A3', amount: null, date: '2024-03-01' });
    expect(lines[4]).toBe(
      '{"type":"STATE","value":{"bookmarks":{"rozpocet_obce_2024":{"completed_at":"2024-06-01T00:00:00.000Z"}}}}\n',
    );
  });

  it('should fail the run on a row that cannot be cast', async () => {
    const writer = new InMemoryMessageWriter();

    await expect(createTap([BUDGET, GRANTS]).sync(writer)).rejects.toThrow(RowCastError);

    expect(writer.records('rozpocet_obce_2024')).toHaveLength(3);
    expect(writer.records('dotace').map((r) => r.record['id'])).toEqual(['G1']);
    expect(writer.states()).toHaveLength(1);
  });

  it('should skip rows that cannot be cast when asked to', async () => {
    const writer = new InMemoryMessageWriter();
    const tap = createTap([GRANTS], 'skip');
    const skipped: RowSkippedEvent[] = [];
    tap.on('row:skipped', (e) => skipped.push(e));

    const summary = await tap.sync(writer);

    expect(writer.records('dotace').map((r) => r.record)).toEqual([
      { id: 'G1', amount: 1000, date: '2024-05-01' },
      { id: 'G3', amount: 250, date: '2024-05-03' },
    ]);
    expect(skipped.map((e) => [e.row, e.column])).toEqual([[2, 'amount']]);
    expect(summary.streams).toEqual([{ identifier: GRANTS, stream: 'dotace', recordCount: 2 }]);
  });

  it('should refuse a payload that is not served as CSV', async () => {
    const previous = catalog[GRANTS];
    catalog[GRANTS] = { title: 'Dotace', csv: 'id,amount,date\n', contentType: 'text/html; charset=utf-8' };

    try {
      await expect(createTap([GRANTS]).sync(new InMemoryMessageWriter())).rejects.toThrow(
        UnsupportedContentTypeError,
      );
    } finally {
      if (previous) catalog[GRANTS] = previous;
    }
  });

  it('should report a dataset the catalog does not know', async () => {
    const unknown = 'https://data.example.test/datasets/unknown';

    await expect(createTap([unknown]).sync(new InMemoryMessageWriter())).rejects.toThrow(
      `No dataset found for IRI '${unknown}'`,
    );
  });
});
