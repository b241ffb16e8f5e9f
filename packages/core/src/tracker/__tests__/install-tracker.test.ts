import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { InstallTracker, trashFolderName } from '../install-tracker.js';
import { ErrorCode, ManifestCorruptError } from '../../errors.js';
import { listFiles, makeTempDir, readText, removeDir } from '../../__tests__/fixtures.js';

async function put(root: string, relPath: string, content: string): Promise<void> {
  const path = join(root, ...relPath.split('/'));
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
}

describe('InstallTracker', () => {
  let root: string;
  let clock: number;
  let tracker: InstallTracker;

  beforeEach(async () => {
    root = await makeTempDir('tracker');
    clock = 1000;
    tracker = new InstallTracker(root, () => clock);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('recordInstall', () => {
    it('stores the owned paths with metadata and the install time', async () => {
      const ini = 'bootloader/hekate_ipl.ini';
      const { entry } = await tracker.recordInstall('hekate', [ini, ini], {
        name: 'Hekate',
        version: 'v6.2.0',
      });
      expect(entry).toEqual({
        componentId: 'hekate',
        installedAt: 1000,
        ownedPaths: ['bootloader/hekate_ipl.ini'],
        name: 'Hekate',
        version: 'v6.2.0',
      });
      expect(await tracker.listInstalled()).toEqual([entry]);
    });

    it('deletes paths the new install no longer owns', async () => {
      await put(root, 'a', 'a');
      await put(root, 'b', 'b');
      await tracker.recordInstall('c', ['a', 'b']);
      await put(root, 'c', 'c');

      clock = 2000;
      const result = await tracker.recordInstall('c', ['b', 'c']);

      expect(result.removedPaths).toEqual(['a']);
      expect(result.entry.ownedPaths).toEqual(['b', 'c']);
      expect(await listFiles(root)).toEqual(['.packwright/manifest.json', 'b', 'c']);
      expect(await tracker.listInstalled()).toEqual([
        { componentId: 'c', installedAt: 2000, ownedPaths: ['b', 'c'] },
      ]);
    });

    it('keeps stale paths another component still owns', async () => {
      await put(root, 'shared.ini', 's');
      await put(root, 'old.bin', 'o');
      await tracker.recordInstall('x', ['shared.ini', 'old.bin']);
      await tracker.recordInstall('y', ['shared.ini']);

      const result = await tracker.recordInstall('x', []);

      expect(result.removedPaths).toEqual(['old.bin']);
      expect(result.warnings).toEqual(['Kept shared.ini: also owned by another component']);
      expect(await readText(root, 'shared.ini')).toBe('s');
    });

    it('keeps a stale directory when new paths live inside it', async () => {
      await put(root, 'switch/tool/tool.nro', 'n');
      await tracker.recordInstall('tool', ['switch/tool']);
      const result = await tracker.recordInstall('tool', ['switch/tool/tool.nro']);
      expect(result.removedPaths).toEqual([]);
      expect(await readText(root, 'switch/tool/tool.nro')).toBe('n');
    });
  });

  describe('trash and restore', () => {
    beforeEach(async () => {
      await put(root, 'a.txt', 'A');
      await put(root, 'dir/b.txt', 'B');
      await tracker.recordInstall('c', ['a.txt', 'dir/b.txt']);
      clock = 2000;
    });

    it('moves owned files into quarantine and forgets the install', async () => {
      const [result] = await tracker.moveToTrash(['c']);

      expect(result).toEqual({
        componentId: 'c',
        status: 'ok',
        paths: ['a.txt', 'dir/b.txt'],
        warnings: [],
        failures: [],
      });
      expect(await tracker.listInstalled()).toEqual([]);
      expect(await tracker.listTrashed()).toEqual([
        {
          componentId: 'c',
          originalRelativePath: 'a.txt',
          trashRelativePath: 'c/2000/a.txt',
          movedAt: 2000,
        },
        {
          componentId: 'c',
          originalRelativePath: 'dir/b.txt',
          trashRelativePath: 'c/2000/dir/b.txt',
          movedAt: 2000,
        },
      ]);
      expect(await readText(root, '.packwright/trash/c/2000/dir/b.txt')).toBe('B');
      await expect(access(join(root, 'a.txt'))).rejects.toThrow();
    });

    it('groups trashed entries with the snapshot taken at trash time', async () => {
      await tracker.moveToTrash(['c']);
      const [trashed] = await tracker.listTrashedComponents();
      expect(trashed?.componentId).toBe('c');
      expect(trashed?.movedAt).toBe(2000);
      expect(trashed?.entries).toHaveLength(2);
      expect(trashed?.snapshot).toEqual({
        componentId: 'c',
        installedAt: 1000,
        ownedPaths: ['a.txt', 'dir/b.txt'],
      });
    });

    it('restores files byte-identical and the manifest entry unchanged', async () => {
      const [before] = await tracker.listInstalled();
      await tracker.moveToTrash(['c']);
      clock = 3000;

      const [result] = await tracker.restore(['c']);

      expect(result?.status).toBe('ok');
      expect(result?.paths).toEqual(['a.txt', 'dir/b.txt']);
      expect(await readText(root, 'a.txt')).toBe('A');
      expect(await readText(root, 'dir/b.txt')).toBe('B');
      expect(await tracker.listInstalled()).toEqual([before]);
      expect(await tracker.listTrashed()).toEqual([]);
    });

    it('treats a second restore as a no-op', async () => {
      await tracker.moveToTrash(['c']);
      await tracker.restore(['c']);

      const [again] = await tracker.restore(['c']);

      expect(again).toEqual({
        componentId: 'c',
        status: 'noop',
        paths: [],
        warnings: [],
        failures: [],
      });
      expect(await tracker.listInstalled()).toHaveLength(1);
    });

    it('leaves conflicting files in the trash and restores the rest', async () => {
      await tracker.moveToTrash(['c']);
      await put(root, 'a.txt', 'someone else');

      const [result] = await tracker.restore(['c']);

      expect(result?.status).toBe('partial');
      expect(result?.paths).toEqual(['dir/b.txt']);
      expect(result?.failures).toEqual([
        {
          path: 'a.txt',
          code: ErrorCode.RESTORE_CONFLICT,
          message: 'a.txt already exists with different content',
        },
      ]);
      expect(await readText(root, 'a.txt')).toBe('someone else');
      expect((await tracker.listInstalled())[0]?.ownedPaths).toEqual(['dir/b.txt']);
      expect((await tracker.listTrashed()).map((e) => e.originalRelativePath)).toEqual(['a.txt']);
    });

    it('completes a conflicted restore once the conflict is cleared', async () => {
      await tracker.moveToTrash(['c']);
      await put(root, 'a.txt', 'someone else');
      await tracker.restore(['c']);
      await removeDir(join(root, 'a.txt'));

      const [result] = await tracker.restore(['c']);

      expect(result?.status).toBe('ok');
      expect(await tracker.listInstalled()).toEqual([
        { componentId: 'c', installedAt: 1000, ownedPaths: ['a.txt', 'dir/b.txt'] },
      ]);
      expect(await tracker.listTrashed()).toEqual([]);
    });

    it('counts an identical file at the destination as restored', async () => {
      await tracker.moveToTrash(['c']);
      await put(root, 'a.txt', 'A');

      const [result] = await tracker.restore(['c']);

      expect(result?.status).toBe('ok');
      expect(await listFiles(join(root, '.packwright', 'trash'))).toEqual([]);
    });

    it('purges the previous trashed copy when trashing again', async () => {
      await tracker.moveToTrash(['c']);
      await put(root, 'a.txt', 'A2');
      await tracker.recordInstall('c', ['a.txt']);
      clock = 4000;

      const [result] = await tracker.moveToTrash(['c']);

      expect(result?.warnings).toEqual(["Purged an older trashed copy of 'c'"]);
      expect(await listFiles(join(root, '.packwright', 'trash'))).toEqual(['c/4000/a.txt']);
    });

    it('purges trashed files for good', async () => {
      await tracker.moveToTrash(['c']);

      const [result] = await tracker.purgeTrash(['c']);

      expect(result?.status).toBe('ok');
      expect(result?.paths).toEqual(['a.txt', 'dir/b.txt']);
      expect(await tracker.listTrashed()).toEqual([]);
      expect(await listFiles(join(root, '.packwright', 'trash'))).toEqual([]);
      const [restore] = await tracker.restore(['c']);
      expect(restore?.error?.code).toBe(ErrorCode.COMPONENT_NOT_TRASHED);
    });
  });

  it('keeps the quarantine of an id nested under another id apart from it', async () => {
    await put(root, 'x.txt', 'x');
    await put(root, 'y.txt', 'y');
    await tracker.recordInstall('a/b', ['x.txt']);
    await tracker.recordInstall('a', ['y.txt']);
    clock = 3000;
    await tracker.moveToTrash(['a/b', 'a']);

    await tracker.purgeTrash(['a']);
    expect(await listFiles(join(root, '.packwright', 'trash'))).toEqual(['a%2Fb/3000/x.txt']);

    const [restored] = await tracker.restore(['a/b']);
    expect(restored?.status).toBe('ok');
    expect(restored?.paths).toEqual(['x.txt']);
    expect(await readText(root, 'x.txt')).toBe('x');
  });

  it('encodes component ids into single folder names', () => {
    expect(trashFolderName('hekate')).toBe('hekate');
    expect(trashFolderName('a/b.c*')).toBe('a%2Fb%2Ec%2A');
    expect(trashFolderName('..')).toBe('%2E%2E');
  });

  it('records missing files as missing and does not restore them', async () => {
    await put(root, 'a.txt', 'A');
    await tracker.recordInstall('c', ['a.txt', 'gone.txt']);

    const [trashed] = await tracker.moveToTrash(['c']);
    expect(trashed?.paths).toEqual(['a.txt']);
    expect(trashed?.warnings).toEqual(['gone.txt was already missing']);

    const [restored] = await tracker.restore(['c']);
    expect(restored?.warnings).toEqual(['gone.txt was missing when trashed and was not restored']);
    expect((await tracker.listInstalled())[0]?.ownedPaths).toEqual(['a.txt']);
  });

  it('reports unknown components per id without throwing', async () => {
    const [trash] = await tracker.moveToTrash(['nope']);
    expect(trash).toEqual({
      componentId: 'nope',
      status: 'failed',
      paths: [],
      warnings: [],
      failures: [],
      error: { code: ErrorCode.COMPONENT_NOT_INSTALLED, message: "'nope' is not installed" },
    });
    const [purge] = await tracker.purgeTrash(['nope']);
    expect(purge?.error?.code).toBe(ErrorCode.COMPONENT_NOT_TRASHED);
  });

  describe('corrupt state', () => {
    it('refuses to read an unparseable manifest', async () => {
      await put(root, '.packwright/manifest.json', '{ not json');
      await expect(tracker.listInstalled()).rejects.toBeInstanceOf(ManifestCorruptError);
      await expect(tracker.recordInstall('c', ['a'])).rejects.toMatchObject({
        code: ErrorCode.MANIFEST_CORRUPT,
      });
    });

    it('refuses a manifest that does not match the schema', async () => {
      await put(root, '.packwright/manifest.json', JSON.stringify({ version: 1, components: [{}] }));
      await expect(tracker.listInstalled()).rejects.toMatchObject({
        code: ErrorCode.MANIFEST_CORRUPT,
      });
    });

    it('refuses to trash while the trash index is unreadable', async () => {
      await tracker.recordInstall('c', []);
      await put(root, '.packwright/trash.json', '[]');
      await expect(tracker.moveToTrash(['c'])).rejects.toMatchObject({
        code: ErrorCode.MANIFEST_CORRUPT,
      });
      expect(await tracker.listInstalled()).toHaveLength(1);
    });
  });
});
