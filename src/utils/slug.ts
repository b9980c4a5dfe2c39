/**
 * Filesystem-safe identifier for a card name. Shared by artwork lookup and
 * output naming so a rendered card traces back to its art file.
 *
 * "Test Bear" -> "test-bear"
 */
export function slugify(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug || 'card';
}
