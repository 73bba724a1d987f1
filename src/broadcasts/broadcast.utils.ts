import { FormatKind } from '../domain/types';

export function slugify(text: string): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '');
  return slug || 'broadcast';
}

/** `<slug>/<format>` unless the caller picked a prefix. */
export function outputPrefixFor(topic: string, format: FormatKind, override?: string): string {
  const custom = override?.trim().replace(/^\/+|\/+$/g, '');
  return custom || `${slugify(topic)}/${format}`;
}
