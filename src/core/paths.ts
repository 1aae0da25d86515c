export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

/**
 * Cuts an absolute build path down to the repository-relative form used in
 * identities: `/work/proj/src/theory/a.cpp` -> `src/theory/a.cpp`.
 * A known project root is stripped first; otherwise the path is cut at the
 * first occurrence of the marker.
 */
export function simplifyProjectPath(file: string, marker: string, projectRoot?: string): string {
  const p = toPosixPath(file);
  if (projectRoot) {
    const root = toPosixPath(projectRoot).replace(/\/+$/, '');
    if (p.startsWith(root + '/')) return p.slice(root.length + 1);
  }
  if (p.startsWith(marker)) return p;
  const idx = p.indexOf(`/${marker}`);
  if (idx < 0) return p;
  return p.slice(idx + 1);
}

export function isProjectSource(file: string, marker: string, excluded: readonly string[]): boolean {
  const p = toPosixPath(file);
  if (!p.includes(marker)) return false;
  return !excluded.some((frag) => p.includes(frag));
}

export function hasExtension(file: string, extensions: readonly string[]): boolean {
  const lower = file.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}
