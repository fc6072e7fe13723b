/**
 * @file fileUri - Document path <-> viewer URI conversion
 * @description The viewer's registry keys documents by URI string, so the
 * escaping here has to match what the viewer produces for the same file.
 */

import path from 'path';

// Characters GLib leaves unescaped in file URIs, besides RFC 3986 unreserved ones.
const SAFE_CHARACTERS = new Set("%/:=&?~#+!$,;'@()*[]");
const UNRESERVED_PATTERN = /^[A-Za-z0-9\-_.~]$/;

/**
 * Absolute path -> file:// URI. Relative paths are resolved against cwd;
 * symlinks are not followed.
 */
export function toFileUri(filePath: string): string {
  const absolute = path.resolve(filePath);
  let encoded = '';
  for (const ch of absolute) {
    encoded += UNRESERVED_PATTERN.test(ch) || SAFE_CHARACTERS.has(ch) ? ch : encodeURIComponent(ch);
  }
  return `file://${encoded}`;
}

/**
 * file:// URI -> path. Anything that is not a file URI comes back unchanged,
 * so a viewer reporting bare paths still works.
 */
export function fromFileUri(uri: string): string {
  if (!uri.startsWith('file://')) {
    return uri;
  }
  const rest = uri.slice('file://'.length);
  // file://host/path: keep only the path
  const pathStart = rest.startsWith('/') ? 0 : rest.indexOf('/');
  const encodedPath = pathStart === -1 ? '' : rest.slice(pathStart);
  try {
    return decodeURIComponent(encodedPath);
  } catch {
    // Malformed escapes: hand back the raw text rather than guess
    return encodedPath;
  }
}
