/**
 * Dotted numeric versions ("1.10.163", "1.28.6") as found in crash log headers.
 * Missing trailing components compare as zero, so 1.37 == 1.37.0.
 */

export type Version = readonly number[];

export const NULL_VERSION: Version = [0, 0, 0];

/** "1.28.6" → [1, 28, 6]; anything that is not a dotted number → null */
export function parseVersion(text: string): Version | null {
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)*$/.test(trimmed)) return null;
  return trimmed.split(".").map(part => parseInt(part, 10));
}

/**
 * Pull the version out of a header line such as "Buffout 4 v1.28.6 Feb 12 2023".
 * The last whitespace-separated token starting with "v" wins.
 */
export function parseVersionText(line: string): Version {
  let candidate = "";
  for (const token of line.trim().split(/\s+/)) {
    if (token.startsWith("v") && token.length > 1) candidate = token.slice(1);
  }
  return (candidate && parseVersion(candidate)) || NULL_VERSION;
}

export function compareVersions(a: Version, b: Version): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function formatVersion(version: Version): string {
  return version.join(".");
}
