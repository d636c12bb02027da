import { baseDirectoryFileUrl, hasUriScheme, isWindowsDrivePath } from './path-utils';

const ALLOWED_EXTERNAL_PROTOCOLS = new Set(['http:', 'https:', 'mailto:']);

export type TargetIntent =
  | { type: 'none' }
  | { type: 'blocked-external-protocol'; protocol: string }
  | { type: 'open-external-url'; url: string }
  | { type: 'open-local-file'; path: string };

export function resolveTargetIntent(input: {
  target: string;
  reportPath: string | null;
}): TargetIntent {
  const target = input.target.trim();
  if (!target) {
    return { type: 'none' };
  }

  if (/^www\./i.test(target)) {
    return { type: 'open-external-url', url: `https://${target}` };
  }

  if (isWindowsDrivePath(target.replaceAll('\\', '/')) || target.startsWith('/')) {
    return { type: 'open-local-file', path: target };
  }

  if (!hasUriScheme(target)) {
    return { type: 'open-local-file', path: resolveRelativePath(target, input.reportPath) };
  }

  try {
    const url = new URL(target);
    const protocol = url.protocol.toLowerCase();
    if (protocol === 'file:') {
      const path = fileUrlToPath(url);
      return path ? { type: 'open-local-file', path } : { type: 'none' };
    }
    if (ALLOWED_EXTERNAL_PROTOCOLS.has(protocol)) {
      return { type: 'open-external-url', url: target };
    }
    return { type: 'blocked-external-protocol', protocol };
  } catch {
    return { type: 'none' };
  }
}

export function isExternalUrl(target: string): boolean {
  return resolveTargetIntent({ target, reportPath: null }).type === 'open-external-url';
}

function resolveRelativePath(target: string, reportPath: string | null): string {
  if (!reportPath) {
    return target;
  }
  try {
    const relative = encodeURI(target.replaceAll('\\', '/'));
    return fileUrlToPath(new URL(relative, baseDirectoryFileUrl(reportPath)));
  } catch {
    return target;
  }
}

function decodeUriComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function fileUrlToPath(url: URL): string {
  const decodedPath = decodeUriComponent(url.pathname);
  const host = url.hostname;
  if (host) {
    const normalizedPath = decodedPath.startsWith('/') ? decodedPath : `/${decodedPath}`;
    return `//${host}${normalizedPath}`;
  }

  if (/^\/[a-zA-Z]:\//.test(decodedPath)) {
    return decodedPath.slice(1);
  }

  return decodedPath;
}
