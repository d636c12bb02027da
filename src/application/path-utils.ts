export function hasUriScheme(value: string): boolean {
  return /^[a-zA-Z][a-zA-Z\d+\-.]*:/.test(value);
}

export function filePathToFileUrl(path: string): string {
  const normalized = path.replaceAll('\\', '/');
  if (isWindowsDrivePath(normalized)) {
    return `file:///${encodeURI(normalized)}`;
  }
  return `file://${encodeURI(normalized)}`;
}

export function baseDirectoryFileUrl(path: string): string {
  const normalized = path.replaceAll('\\', '/');
  const slashIndex = normalized.lastIndexOf('/');
  const directory = slashIndex === -1 ? './' : normalized.slice(0, slashIndex + 1);
  return filePathToFileUrl(directory);
}

export function isWindowsDrivePath(path: string): boolean {
  return /^[a-zA-Z]:\//.test(path);
}
