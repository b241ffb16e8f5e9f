import { describe, it, expect } from 'vitest';
import {
  buildChangelog,
  computeContentHash,
  formatBuildDate,
  renderSummary,
} from '../pack-summary.js';
import type { PackComponent, PackManifest } from '../../schemas/pack-manifest.schema.js';

function component(name: string, version: string, category: string): PackComponent {
  return { name, version, category, source: `github:example-org/${name}`, files: [] };
}

const current: PackManifest = {
  packName: 'PACK-2026-03-01-ff062ef',
  buildDate: '2026-03-01T10:00:00.000Z',
  builderVersion: '0.1.0',
  contentHash: 'ff062ef',
  components: {
    hekate: component('Hekate', 'v6.2.0', 'Bootloaders'),
    sigpatches: component('Sigpatches', 'v2', 'Patches'),
    ftpd: component('ftpd', '3.1', 'Homebrew'),
  },
};

const previous: PackManifest = {
  ...current,
  components: {
    hekate: component('Hekate', 'v6.1.0', 'Bootloaders'),
    oldtool: component('Old Tool', 'v1', 'Homebrew'),
    ftpd: component('ftpd', '3.1', 'Homebrew'),
  },
};

describe('computeContentHash', () => {
  it('hashes sorted id:version lines', () => {
    expect(computeContentHash({ sigpatches: 'v2', hekate: 'v6.2.0' })).toBe('ff062ef');
    expect(computeContentHash({ hekate: 'v6.2.0', NXThemesInstaller: 'v2.7.1' })).toBe('30505af');
  });

  it('changes when a version changes', () => {
    expect(computeContentHash({ hekate: 'v6.2.0' })).toBe('e0ed813');
    expect(computeContentHash({ hekate: 'v6.2.1' })).not.toBe('e0ed813');
  });
});

describe('formatBuildDate', () => {
  it('uses the UTC calendar date', () => {
    expect(formatBuildDate(new Date('2026-03-01T23:30:00Z'))).toBe('2026-03-01');
  });
});

describe('buildChangelog', () => {
  it('lists added, updated and removed components by name', () => {
    expect(buildChangelog(current, previous)).toEqual({
      added: ['Sigpatches'],
      removed: ['Old Tool'],
      updated: [{ name: 'Hekate', from: 'v6.1.0', to: 'v6.2.0' }],
    });
  });

  it('is empty without a previous build', () => {
    expect(buildChangelog(current, undefined)).toEqual({ added: [], removed: [], updated: [] });
  });
});

describe('renderSummary', () => {
  it('renders notes, changes and components grouped by category', () => {
    const summary = renderSummary(current, buildChangelog(current, previous), '  Fresh build  ');
    expect(summary).toBe(
      [
        '# PACK-2026-03-01-ff062ef',
        '',
        'Built: 2026-03-01T10:00:00.000Z',
        'Content hash: ff062ef',
        'Builder: 0.1.0',
        '',
        '## Notes',
        '',
        'Fresh build',
        '',
        '## Changes since last build',
        '',
        '- Added Sigpatches',
        '- Updated Hekate: v6.1.0 -> v6.2.0',
        '- Removed Old Tool',
        '',
        '## Components',
        '',
        '### Bootloaders',
        '',
        '- Hekate (v6.2.0)',
        '',
        '### Homebrew',
        '',
        '- ftpd (3.1)',
        '',
        '### Patches',
        '',
        '- Sigpatches (v2)',
        '',
      ].join('\n')
    );
  });

  it('says so when nothing changed and skips blank notes', () => {
    const summary = renderSummary(current, buildChangelog(current, current), '   ');
    expect(summary).toContain('## Changes since last build\n\nNo changes.\n');
    expect(summary).not.toContain('## Notes');
  });

  it('omits the changes section for a first build', () => {
    expect(renderSummary(current, undefined)).not.toContain('## Changes since last build');
  });
});
