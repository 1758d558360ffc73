import { instrumentIdSchema } from './types';

export const FALLBACK_SLUG = 'scope';

/** ASCII, lowercase, hyphen-separated; never empty. */
export function slugify(input: string): string {
  const slug = input
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || FALLBACK_SLUG;
}

export function isValidInstrumentId(value: string): boolean {
  return instrumentIdSchema.safeParse(value).success;
}
