import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadTapConfig, parseTapConfig } from '../../../src/config/TapConfig.js';
import { ConfigurationError } from '../../../src/domain/errors/CatalogErrors.js';

const IRI = 'https://data.example.test/datasets/1';

describe('parseTapConfig', () => {
  it('should accept identifiers and optional settings', () => {
    expect(
      parseTapConfig({
        identifiers: [IRI],
        endpoint: 'https://graphql.example.test/graphql',
        locale: 'en',
        timeoutMs: 5000,
        rowErrorPolicy: 'skip',
        validateQuery: false,
      }),
    ).toEqual({
      identifiers: [IRI],
      endpoint: 'https://graphql.example.test/graphql',
      locale: 'en',
      timeoutMs: 5000,
      rowErrorPolicy: 'skip',
      validateQuery: false,
    });
  });

  it('should accept iris as an alias of identifiers', () => {
    expect(parseTapConfig({ iris: [IRI] })).toEqual({ identifiers: [IRI] });
  });

  it('should reject both identifiers and iris', () => {
    expect(() => parseTapConfig({ identifiers: [IRI], iris: [IRI] })).toThrow(
      "Invalid configuration: set either 'identifiers' or 'iris', not both",
    );
  });

  it('should require identifiers', () => {
    expect(() => parseTapConfig({})).toThrow(ConfigurationError);
    expect(() => parseTapConfig({})).toThrow("Invalid configuration: 'identifiers' is required");
  });

  it('should reject an empty identifier list', () => {
    expect(() => parseTapConfig({ identifiers: [] })).toThrow(
      'Invalid configuration: identifiers: Array must contain at least 1 element(s)',
    );
  });

  it('should reject unknown keys and invalid values', () => {
    expect(() => parseTapConfig({ identifiers: [IRI], batchSize: 10 })).toThrow(
      "Invalid configuration: (root): Unrecognized key(s) in object: 'batchSize'",
    );
    expect(() => parseTapConfig({ identifiers: [IRI], rowErrorPolicy: 'ignore' })).toThrow(ConfigurationError);
    expect(() => parseTapConfig({ identifiers: [IRI], timeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => parseTapConfig({ identifiers: [IRI], endpoint: 'not a url' })).toThrow(ConfigurationError);
  });

  it('should reject input that is not an object', () => {
    expect(() => parseTapConfig(['x'])).toThrow(ConfigurationError);
  });
});

describe('loadTapConfig', () => {
  let directory: string | undefined;

  async function configFile(content: string): Promise<string> {
    directory = await mkdtemp(join(tmpdir(), 'opendata-tap-config-'));
    const path = join(directory, 'config.json');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  afterEach(async () => {
    if (directory) await rm(directory, { recursive: true, force: true });
    directory = undefined;
  });

  it('should read and validate a JSON file', async () => {
    const path = await configFile(JSON.stringify({ iris: [IRI], locale: 'cs' }));

    await expect(loadTapConfig(path)).resolves.toEqual({ identifiers: [IRI], locale: 'cs' });
  });

  it('should reject a file that is not JSON', async () => {
    const path = await configFile('{ identifiers: ');

    await expect(loadTapConfig(path)).rejects.toThrow(`Configuration file '${path}' is not valid JSON`);
  });

  it('should reject a missing file', async () => {
    const path = join(tmpdir(), 'opendata-tap-missing', 'config.json');

    await expect(loadTapConfig(path)).rejects.toThrow(`Cannot read configuration file '${path}'`);
  });
});
