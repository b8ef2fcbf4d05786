import { vi } from 'vitest';
import type { ColumnDefinition } from '../../src/domain/model/ColumnDefinition.js';
import type { DatasetDescriptor } from '../../src/domain/model/DatasetDescriptor.js';
import { resolveDatatype } from '../../src/domain/model/ColumnDefinition.js';
import { createDatasetDescriptor } from '../../src/domain/model/DatasetDescriptor.js';

export const DATASET_IRI = 'https://data.example.test/datasets/budget-2024';
export const ACCESS_URL = 'https://files.example.test/budget-2024.csv';
export const SCHEMA_URL = 'https://files.example.test/budget-2024.schema.json';

export function column(
  name: string,
  declaredDatatype = 'string',
  overrides?: Partial<Omit<ColumnDefinition, 'name' | 'declaredDatatype'>>,
): ColumnDefinition {
  const { datatype, recognized } = resolveDatatype(declaredDatatype);
  return {
    name,
    title: name,
    description: '',
    required: false,
    datatype,
    declaredDatatype,
    recognized,
    ...overrides,
  };
}

export function descriptor(overrides?: { title?: string; accessUrl?: string; conformsTo?: string }): DatasetDescriptor {
  return createDatasetDescriptor({
    identifier: DATASET_IRI,
    title: overrides?.title ?? 'Rozpočet 2024',
    description: 'Test budget dataset',
    distributions: [
      { accessUrl: overrides?.accessUrl ?? ACCESS_URL, conformsTo: overrides?.conformsTo ?? SCHEMA_URL },
    ],
  });
}

export interface MockResponseOptions {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
}

export function createMockResponse(body: string | Uint8Array, options?: MockResponseOptions): Response {
  const status = options?.status ?? 200;
  const statusText = options?.statusText ?? 'OK';
  const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;

  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: new Headers(options?.headers ?? {}),
    text: vi.fn(() => Promise.resolve(new TextDecoder().decode(bytes))),
    arrayBuffer: vi.fn(() => Promise.resolve(bytes.slice().buffer)),
  } as unknown as Response;
}

export function jsonResponse(body: unknown, options?: MockResponseOptions): Response {
  return createMockResponse(JSON.stringify(body), {
    ...options,
    headers: { 'content-type': 'application/json', ...options?.headers },
  });
}

export function csvResponse(body: string, contentType = 'text/csv; charset=utf-8'): Response {
  return createMockResponse(body, { headers: { 'content-type': contentType } });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
