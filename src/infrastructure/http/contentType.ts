const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export interface MediaType {
  /** Lower-cased `type/subtype`. */
  readonly essence: string;
  /** Parameters with lower-cased names, e.g. `charset`. */
  readonly parameters: Readonly<Record<string, string>>;
}

/**
 * Parse a `Content-Type` header value.
 *
 * Returns `null` for a missing header or one whose `type/subtype` is not two valid tokens.
 * Malformed parameters are ignored.
 */
export function parseContentType(header: string | null): MediaType | null {
  if (header === null) return null;

  const [mediaType = '', ...rawParameters] = header.split(';');
  const parts = mediaType.trim().split('/');
  if (parts.length !== 2) return null;

  const [type = '', subtype = ''] = parts;
  if (!TOKEN.test(type) || !TOKEN.test(subtype)) return null;

  const parameters: Record<string, string> = {};
  for (const raw of rawParameters) {
    const separator = raw.indexOf('=');
    if (separator <= 0) continue;
    const name = raw.slice(0, separator).trim().toLowerCase();
    let value = raw.slice(separator + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (TOKEN.test(name) && !(name in parameters)) {
      parameters[name] = value;
    }
  }

  return { essence: `${type}/${subtype}`.toLowerCase(), parameters };
}
