import { createHash } from 'node:crypto';
import type { PackManifest } from '../schemas/pack-manifest.schema.js';

export interface Changelog {
  added: string[];
  removed: string[];
  updated: { name: string; from: string; to: string }[];
}

/** First 7 hex chars of the SHA-1 over sorted `id:version` lines. */
export function computeContentHash(versions: Record<string, string>): string {
  const lines = Object.entries(versions)
    .map(([id, version]) => `${id}:${version}`)
    .sort();
  return createHash('sha1').update(lines.join('\n')).digest('hex').slice(0, 7);
}

export function formatBuildDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildChangelog(current: PackManifest, previous: PackManifest | undefined): Changelog {
  if (!previous) {
    return { added: [], removed: [], updated: [] };
  }
  const added: string[] = [];
  const updated: Changelog['updated'] = [];
  for (const [id, component] of Object.entries(current.components)) {
    const before = previous.components[id];
    if (!before) {
      added.push(component.name);
    } else if (before.version !== component.version) {
      updated.push({ name: component.name, from: before.version, to: component.version });
    }
  }
  const removed = Object.entries(previous.components)
    .filter(([id]) => !(id in current.components))
    .map(([, component]) => component.name);
  return { added, removed, updated };
}

/** Markdown summary shipped next to the pack manifest. */
export function renderSummary(
  manifest: PackManifest,
  changelog: Changelog | undefined,
  comment?: string
): string {
  const lines: string[] = [
    `# ${manifest.packName}`,
    '',
    `Built: ${manifest.buildDate}`,
    `Content hash: ${manifest.contentHash}`,
    `Builder: ${manifest.builderVersion}`,
  ];

  if (comment?.trim()) {
    lines.push('', '## Notes', '', comment.trim());
  }

  if (changelog) {
    const hasChanges =
      changelog.added.length + changelog.removed.length + changelog.updated.length > 0;
    lines.push('', '## Changes since last build', '');
    if (!hasChanges) {
      lines.push('No changes.');
    }
    for (const name of changelog.added) lines.push(`- Added ${name}`);
    for (const { name, from, to } of changelog.updated) lines.push(`- Updated ${name}: ${from} -> ${to}`);
    for (const name of changelog.removed) lines.push(`- Removed ${name}`);
  }

  const byCategory = new Map<string, string[]>();
  for (const component of Object.values(manifest.components)) {
    const entries = byCategory.get(component.category) ?? [];
    entries.push(`- ${component.name} (${component.version})`);
    byCategory.set(component.category, entries);
  }

  lines.push('', '## Components');
  for (const category of [...byCategory.keys()].sort()) {
    lines.push('', `### ${category}`, '', ...(byCategory.get(category) ?? []).sort());
  }

  return lines.join('\n') + '\n';
}
