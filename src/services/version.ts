// src/services/version.ts
export const BUMP_TYPES = ["patch", "minor", "major"] as const;
export type BumpType = (typeof BUMP_TYPES)[number];

export type Version = {
  major: number;
  minor: number;
  patch: number;
};

/** Tag used when the repository has no semantic version tag yet. */
export const BASELINE_VERSION: Version = { major: 0, minor: 1, patch: 0 };

const TAG_RE = /^v?(\d+)\.(\d+)\.(\d+)$/;

/** `v1.2.3` or `1.2.3` → triple; anything else → null. */
export function parseTag(tag: string): Version | null {
  const m = TAG_RE.exec(tag.trim());
  if (!m) return null;
  return { major: Number(m[1]), minor: Number(m[2]), patch: Number(m[3]) };
}

export function formatTag(v: Version): string {
  return `v${v.major}.${v.minor}.${v.patch}`;
}

export function compareVersions(a: Version, b: Version): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function bumpVersion(v: Version, type: BumpType): Version {
  switch (type) {
    case "major":
      return { major: v.major + 1, minor: 0, patch: 0 };
    case "minor":
      return { major: v.major, minor: v.minor + 1, patch: 0 };
    case "patch":
      return { major: v.major, minor: v.minor, patch: v.patch + 1 };
  }
}

/** Highest semantic version among `tags`; non-semantic tags are skipped. */
export function latestVersion(tags: readonly string[]): Version | null {
  let best: Version | null = null;
  for (const tag of tags) {
    const v = parseTag(tag);
    if (v && (!best || compareVersions(v, best) > 0)) best = v;
  }
  return best;
}

/**
 * Next tag after the highest semantic tag in `existingTags`.
 * With no semantic tag at all the baseline `v0.1.0` is returned unbumped.
 */
export function nextTag(existingTags: readonly string[], bumpType: BumpType): string {
  const latest = latestVersion(existingTags);
  return formatTag(latest ? bumpVersion(latest, bumpType) : BASELINE_VERSION);
}
