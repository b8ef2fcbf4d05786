import { TextDecoder } from 'node:util';
import type { HttpOptions } from '../http/fetchWithTimeout.js';
import { DEFAULT_TIMEOUT_MS, describeError, describeStatus, fetchWithTimeout } from '../http/fetchWithTimeout.js';
import { parseContentType } from '../http/contentType.js';
import { PayloadUnavailableError, UnsupportedContentTypeError } from '../../domain/errors/CatalogErrors.js';

export const CSV_MEDIA_TYPE = 'text/csv';

export type UrlSourceOptions = HttpOptions;

export interface CsvPayload {
  readonly text: string;
  /** Raw `Content-Type` header. */
  readonly contentType: string;
  readonly charset: string;
}

/**
 * Fetches a CSV payload from a URL using the Fetch API.
 *
 * The whole body is read eagerly. The body is never read unless the response
 * declares `text/csv`.
 */
export class UrlSource {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;

  constructor(url: string, options?: UrlSourceOptions) {
    this.url = url;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * @throws PayloadUnavailableError on transport failure or a non-2xx status.
   * @throws UnsupportedContentTypeError when the response is not declared as `text/csv`
   *   or declares a charset that cannot be decoded.
   */
  async read(): Promise<CsvPayload> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.url, { method: 'GET', headers: { ...this.headers } }, this.timeout);
    } catch (error) {
      throw new PayloadUnavailableError(this.url, describeError(error), { cause: error });
    }

    if (!response.ok) {
      throw new PayloadUnavailableError(this.url, describeStatus(response));
    }

    const contentType = response.headers.get('content-type');
    const mediaType = parseContentType(contentType);
    if (contentType === null || mediaType === null || mediaType.essence !== CSV_MEDIA_TYPE) {
      throw new UnsupportedContentTypeError(contentType);
    }

    const charset = mediaType.parameters['charset'] ?? 'utf-8';
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(charset);
    } catch {
      throw new UnsupportedContentTypeError(contentType, `Unsupported charset '${charset}' in content type '${contentType}'`);
    }

    let bytes: ArrayBuffer;
    try {
      bytes = await response.arrayBuffer();
    } catch (error) {
      throw new PayloadUnavailableError(this.url, describeError(error), { cause: error });
    }

    return { text: decoder.decode(bytes), contentType, charset };
  }
}
