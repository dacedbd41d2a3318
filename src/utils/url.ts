// Generic URI grammar: scheme, //authority, path, ?query, #fragment.
const URL_PARTS_REGEX = /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

export interface UrlParts {
  /** Lowercased scheme, or '' for a relative reference. */
  scheme: string;
  /** host[:port], userinfo included; '' when the reference has no authority. */
  netloc: string;
  path: string;
  query: string;
  fragment: string;
}

// Leading C0 controls and spaces, and tab/CR/LF anywhere, are not part of a URL.
const LEADING_C0_OR_SPACE = /^[\u0000-\u0020]+/;
const TAB_OR_NEWLINE = /[\t\r\n]/g;

export function cleanUrl(url: string): string {
  return url.replace(LEADING_C0_OR_SPACE, '').replace(TAB_OR_NEWLINE, '');
}

export function splitUrl(rawUrl: string): UrlParts {
  const url = cleanUrl(rawUrl);
  const match = URL_PARTS_REGEX.exec(url);
  if (!match) {
    return { scheme: '', netloc: '', path: url, query: '', fragment: '' };
  }

  return {
    scheme: (match[1] ?? '').toLowerCase(),
    netloc: match[2] ?? '',
    path: match[3] ?? '',
    query: match[4] ?? '',
    fragment: match[5] ?? '',
  };
}

export function getNetloc(url: string): string {
  return splitUrl(url).netloc;
}

export function isSameNetloc(a: string, b: string): boolean {
  return getNetloc(a) === getNetloc(b);
}

/**
 * Extension of the last path segment, dot included ('.php'), or '' when
 * there is none. Leading dots of the segment do not start an extension,
 * so '/.htaccess' has none.
 */
export function pathExtension(path: string): string {
  const segment = path.substring(path.lastIndexOf('/') + 1);
  const stem = segment.replace(/^\.+/, '');
  const dot = stem.lastIndexOf('.');
  return dot === -1 ? '' : stem.substring(dot);
}

export function isValidSeedUrl(url: string): boolean {
  try {
    const urlObj = new URL(url);
    return urlObj.protocol === 'http:' || urlObj.protocol === 'https:';
  } catch {
    return false;
  }
}
