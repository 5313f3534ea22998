/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}
