export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/['\u2019]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Viewer URL for an event: `/event/<slug>?tid=<eventId>`.
 * Falls back to a slug derived from the title when the API gives none.
 */
export function makeEventUrl(ev: { id: string; slug?: string | null; title: string }, siteBaseUrl = 'https://polymarket.com'): string {
  const base = siteBaseUrl.replace(/\/+$/, '');
  const slug = ev.slug?.trim() || slugify(ev.title);
  return `${base}/event/${encodeURIComponent(slug)}?tid=${encodeURIComponent(ev.id)}`;
}
