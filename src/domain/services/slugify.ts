const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Turn a dataset title into a stream name: ASCII lower case words joined by `_`.
 *
 * `slugify(slugify(x)) === slugify(x)` for every input.
 */
export function slugify(title: string): string {
  return title
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
