/**
 * Normalizes a folder path inside a drive to `/a/b` form. The drive root is the empty string.
 *
 * @example
 * normalizeFolderPath('Shared Documents/Policies/'); // "/Shared Documents/Policies"
 * normalizeFolderPath('/');                         // ""
 */
export function normalizeFolderPath(folderPath: string | undefined): string {
  const segments = (folderPath ?? '').split('/').filter(Boolean);
  return segments.length > 0 ? `/${segments.join('/')}` : '';
}

export function joinFolderPath(parent: string, childName: string): string {
  return `${normalizeFolderPath(parent)}/${childName}`;
}

// Path-based addressing (`root:/path:`) needs every segment percent-encoded on its own.
export function encodeDrivePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}
