// German umlauts fold to two letters; every other accent is dropped by NFKD
const FOLDS: Record<string, string> = {
  'ä': 'ae',
  'ö': 'oe',
  'ü': 'ue',
  'ß': 'ss',
};

/**
 * Local part of a placeholder email built from a display name:
 * "Jörg Müller" -> "joerg.mueller", "Zoë  Saldaña" -> "zoe.saldana".
 */
export function sanitizeForEmail(name: string): string {
  const folded = name
    .trim()
    .toLowerCase()
    .replace(/[äöüß]/g, ch => FOLDS[ch] ?? ch)
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '');

  return folded
    .split(/\s+/)
    .filter(part => part.length > 0)
    .join('.')
    .replace(/[^a-z0-9._+-]/g, '');
}

export function placeholderEmail(displayName: string, domain: string): string {
  const local = sanitizeForEmail(displayName);
  return `${local.length > 0 ? local : 'user'}@${domain}`;
}

/** Whitespace-collapsed, case-folded display name */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Stable user id: the profile id when the page exposes one, otherwise a key
 * derived from the display name.
 */
export function userSourceId(displayName: string, profileId?: string | null): string {
  if (profileId && profileId.trim().length > 0) {
    return profileId.trim();
  }
  return `name:${normalizeName(displayName)}`;
}

function pathSegments(url: string): string[] {
  let pathname: string;
  try {
    pathname = new URL(url, 'https://placeholder.invalid').pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  return pathname.split('/').filter(segment => segment.length > 0);
}

/** Album id: the segment after `/album/` or `/share/` */
export function albumSourceIdFromUrl(url: string): string | null {
  const segments = pathSegments(url);
  const index = segments.findIndex(segment => segment === 'album' || segment === 'share');
  if (index === -1) return null;
  return segments[index + 1] ?? null;
}

/** Asset id: the last path segment of a `/photo/<id>` URL */
export function assetSourceIdFromUrl(url: string): string | null {
  const segments = pathSegments(url);
  if (!segments.includes('photo')) return null;
  return segments[segments.length - 1] ?? null;
}
