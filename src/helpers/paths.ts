import path from 'path';

/** Archive entries whose joined path ends with this marker are never written. */
export const RESERVED_SUFFIX = '...';

const TEMPLATE_MARKERS = /[{}]/;

/**
 * Normalize an extracted file path for a filesystem that only allows a colon
 * as the volume marker (e.g. `sdmc:/`).
 *
 * Everything up to and including the first colon is kept as-is. Every later
 * colon becomes a space, and any run of spaces in that remainder is collapsed
 * to a single one.
 */
export function sanitizeEntryPath(rawPath: string): string {
  const firstColon = rawPath.indexOf(':');
  const volume = firstColon === -1 ? '' : rawPath.slice(0, firstColon + 1);
  const rest = firstColon === -1 ? rawPath : rawPath.slice(firstColon + 1);

  return volume + rest.replace(/:/g, ' ').replace(/ {2,}/g, ' ');
}

export function hasReservedSuffix(filePath: string): boolean {
  return filePath.endsWith(RESERVED_SUFFIX);
}

export function isDirectoryMarker(filePath: string): boolean {
  return filePath.endsWith('/');
}

export function hasTemplateMarkers(url: string): boolean {
  return TEMPLATE_MARKERS.test(url);
}

/**
 * The file name a directory-style destination receives: whatever follows
 * the last `/` of the URL. Returns null when the URL has no `/` or ends in one.
 */
export function fileNameFromUrl(url: string): string | null {
  const lastSlash = url.lastIndexOf('/');
  if (lastSlash === -1) return null;
  const name = url.slice(lastSlash + 1);
  return name.length > 0 ? name : null;
}

export function parentDirectory(filePath: string): string {
  return path.posix.dirname(filePath);
}

export function withTrailingSeparator(dir: string): string {
  return dir.endsWith('/') ? dir : `${dir}/`;
}

/**
 * True when `target` resolves to `root` itself or somewhere beneath it.
 */
export function isWithinRoot(target: string, root: string): boolean {
  const resolvedRoot = path.posix.resolve(root);
  const resolvedTarget = path.posix.resolve(target);
  return resolvedTarget === resolvedRoot
    || resolvedTarget.startsWith(withTrailingSeparator(resolvedRoot));
}
