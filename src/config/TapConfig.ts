import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/CatalogErrors.js';

export const TapConfigSchema = z
  .object({
    identifiers: z.array(z.string().min(1)).min(1).optional(),
    /** Alias of `identifiers`. */
    iris: z.array(z.string().min(1)).min(1).optional(),
    endpoint: z.string().url().optional(),
    locale: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    rowErrorPolicy: z.enum(['fail', 'skip']).optional(),
    validateQuery: z.boolean().optional(),
  })
  .strict();

export interface TapConfig {
  /** Dataset IRIs, processed in this order. */
  readonly identifiers: readonly string[];
  readonly endpoint?: string;
  readonly locale?: string;
  readonly timeoutMs?: number;
  readonly rowErrorPolicy?: 'fail' | 'skip';
  readonly validateQuery?: boolean;
}

export function parseTapConfig(input: unknown): TapConfig {
  const result = TapConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const { identifiers, iris, ...rest } = result.data;
  if (identifiers && iris) {
    throw new ConfigurationError("Invalid configuration: set either 'identifiers' or 'iris', not both");
  }
  const resolved = identifiers ?? iris;
  if (!resolved) {
    throw new ConfigurationError("Invalid configuration: 'identifiers' is required");
  }

  return { ...rest, identifiers: resolved };
}

/** Read and validate a JSON configuration file. */
export async function loadTapConfig(path: string): Promise<TapConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file '${path}'`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Configuration file '${path}' is not valid JSON`, { cause: error });
  }

  return parseTapConfig(parsed);
}
