const SCRUBBED_SEGMENTS: ReadonlyMap<string, string> = new Map([
  ['organizations', 'organization'],
  ['issues', 'issue_id'],
  ['events', 'event_id'],
]);

/**
 * Strips identifiers from an app URL so links can be aggregated:
 * `/organizations/acme/issues/42/?project=7` → `organizations/{organization}/issues/{issue_id}/project=%7Bproject%7D`.
 */
export function parseLink(url: string): string {
  const parsed = new URL(url, 'http://placeholder.invalid');

  const query = new URLSearchParams(parsed.search);
  if (query.has('project')) query.set('project', '{project}');

  const segments = parsed.pathname.replace(/^\/+|\/+$/g, '').split('/');
  for (let index = 0; index < segments.length - 1; index += 1) {
    const placeholder = SCRUBBED_SEGMENTS.get(segments[index] ?? '');
    if (placeholder) segments[index + 1] = `{${placeholder}}`;
  }

  return `${segments.join('/')}/${query.toString()}`;
}
