import { InvalidLinkError } from './errors.js';

export const SITE_DOMAIN = 'vimeo.com';
export const SITE_URL = `https://${SITE_DOMAIN}`;

// vimeo.com/<name>
const SYSTEM_PAGES = new Set([
  'about', 'blog', 'categories', 'channels', 'cookie_policy', 'couchmode', 'creativecommons',
  'creatorservices', 'dmca', 'enhancer', 'everywhere', 'explore', 'groups', 'help', 'jobs',
  'join', 'log_in', 'love', 'musicstore', 'ondemand', 'plus', 'privacy', 'pro', 'robots.txt',
  'search', 'site_map', 'staffpicks', 'terms', 'upload', 'videoschool'
]);

// vimeo.com/<account>/<category>
const CATEGORY_NAMES = new Set(['albums', 'groups', 'channels']);

// vimeo.com/<folder kind>/<name>
const FOLDER_KINDS = new Set(['album', 'groups', 'channels']);

const ALBUM_FOLDER = 'album';
const VIDEOS_SEGMENT = 'videos';

interface LinkBase {
  /** The link as it was found */
  raw: string;
  /** Normalized URL in its original case, used for navigation and equality */
  url: string;
}

export interface VideoLink extends LinkBase {
  kind: 'video';
  videoId: number;
}

export interface AccountLink extends LinkBase {
  kind: 'account';
  account: string;
}

export interface CategoryLink extends LinkBase {
  kind: 'category';
  account: string;
  category: string;
}

export interface VideosLink extends LinkBase {
  kind: 'videos';
  account: string;
  category: typeof VIDEOS_SEGMENT;
}

export interface FolderLink extends LinkBase {
  kind: 'folder';
  folderKind: string;
  name: string;
}

export interface SystemLink extends LinkBase {
  kind: 'system';
}

export interface GenericLink extends LinkBase {
  kind: 'generic';
}

export type LinkNode =
  | VideoLink
  | AccountLink
  | CategoryLink
  | VideosLink
  | FolderLink
  | SystemLink
  | GenericLink;

const isNumeric = (segment: string) => /^\d+$/.test(segment);

function normalize(raw: string): string {
  let url = raw.trim();
  if (!url.includes('/')) {
    url = `${SITE_URL}/${url}`;
  }
  url = url.replace(/\/+$/, '');

  // Keep the scheme's double slash, collapse the rest
  const slashIndex = url.indexOf('/') + 1;
  return url.slice(0, slashIndex) + url.slice(slashIndex).replace(/\/{2,}/g, '/');
}

/**
 * Turn a link found on the site (or a bare video ID) into a typed node.
 *
 * Classification works on a lower-cased copy; the node's `url` keeps the
 * original case since account and folder slugs are case-sensitive on
 * navigation.
 */
export function classifyLink(raw: string): LinkNode {
  let url = normalize(raw);
  const lower = url.toLowerCase();
  const domainIndex = lower.indexOf(SITE_DOMAIN);
  if (domainIndex < 0) {
    throw new InvalidLinkError(`Invalid ${SITE_DOMAIN} URL: ${raw}`);
  }

  let segments = lower
    .slice(domainIndex + SITE_DOMAIN.length + 1)
    .split('/')
    .filter(Boolean);

  // Share links embed the video ID as the last segment
  if ((segments.length === 3 || segments.length === 4) && isNumeric(segments[segments.length - 1])) {
    segments = segments.slice(-1);
    url = `${SITE_URL}/${segments[0]}`;
  }

  if (segments.length === 3 && segments[2] === VIDEOS_SEGMENT) {
    segments = segments.slice(0, 2);
  }

  const base = { raw, url };
  const [first, second] = segments;

  if (
    segments.length === 0 ||
    (SYSTEM_PAGES.has(first) && (segments.length === 1 || !FOLDER_KINDS.has(first)))
  ) {
    return { ...base, kind: 'system' };
  }

  if (segments.length === 1) {
    return isNumeric(first)
      ? { ...base, kind: 'video', videoId: Number.parseInt(first, 10) }
      : { ...base, kind: 'account', account: first };
  }

  if (segments.length === 2) {
    if (CATEGORY_NAMES.has(second)) {
      return { ...base, kind: 'category', account: first, category: second };
    }
    if (second === VIDEOS_SEGMENT) {
      return { ...base, kind: 'videos', account: first, category: VIDEOS_SEGMENT };
    }
    if (FOLDER_KINDS.has(first)) {
      // Channels and groups paginate under a videos sub-path, albums do not
      const folderUrl = first !== ALBUM_FOLDER && !url.toLowerCase().endsWith(`/${VIDEOS_SEGMENT}`)
        ? `${url}/${VIDEOS_SEGMENT}`
        : url;
      return { ...base, url: folderUrl, kind: 'folder', folderKind: first, name: second };
    }
  }

  return { ...base, kind: 'generic' };
}

/** Contents of the provenance shortcut written into account and folder directories */
export function shortcutContents(node: LinkNode): string {
  const source = node.url.replace(/\/videos$/i, '');
  return `[InternetShortcut]\nURL=${source}\n`;
}

/** An href as the browser would follow it from `base`, or null when it is not a URL */
export function resolveHref(href: string, base: string): string | null {
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}

export function videoUrl(videoId: number): string {
  return `${SITE_URL}/${videoId}`;
}
