import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ComponentRegistry,
  assetPlan,
  loadRegistry,
  parseComponentDefinition,
  saveRegistry,
} from '../registry.js';
import { ErrorCode } from '../../errors.js';

const hekate = {
  id: 'hekate',
  name: 'Hekate',
  category: 'Bootloaders',
  source: {
    kind: 'release',
    repoOwner: 'example-org',
    repoName: 'hekate',
    assetPattern: 'hekate_ctcaer_*.zip',
  },
  processingSteps: [{ action: 'extract_all_to_root' }],
};

const installer = {
  id: 'NXThemesInstaller',
  source: { kind: 'direct', url: 'https://downloads.example.test/v2.7.1/NXThemesInstaller.nro' },
  processingSteps: [{ action: 'copy_to_derived_folder', targetPath: 'switch/' }],
};

describe('parseComponentDefinition', () => {
  it('applies defaults for optional fields', () => {
    const definition = parseComponentDefinition(installer);
    expect(definition.name).toBe('');
    expect(definition.category).toBe('Uncategorized');
    expect(definition.description).toBe('');
    expect(definition.resolvedAsset).toBeUndefined();
  });

  it('defaults processing steps to an empty list', () => {
    const { processingSteps } = parseComponentDefinition({ ...hekate, processingSteps: undefined });
    expect(processingSteps).toEqual([]);
  });

  it('reports an unknown action as UNSUPPORTED_ACTION with the component id', () => {
    expect(() =>
      parseComponentDefinition({ ...hekate, processingSteps: [{ action: 'unzip_everything' }] })
    ).toThrow(
      expect.objectContaining({
        code: ErrorCode.UNSUPPORTED_ACTION,
        message: "Component hekate: step 0 uses unsupported action 'unzip_everything'",
      })
    );
  });

  it('rejects a step missing a required field as DEFINITION_INVALID', () => {
    expect(() =>
      parseComponentDefinition({ ...hekate, processingSteps: [{ action: 'extract_all_to_path' }] })
    ).toThrow(expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID }));
  });

  it('rejects an empty asset pattern and an unknown source kind', () => {
    expect(() =>
      parseComponentDefinition({ ...hekate, source: { ...hekate.source, assetPattern: ' ' } })
    ).toThrow(expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID }));
    expect(() => parseComponentDefinition({ ...hekate, source: { kind: 'ftp' } })).toThrow(
      expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID })
    );
  });

  describe('several assets per release', () => {
    const atmosphere = {
      id: 'atmosphere',
      source: {
        kind: 'release',
        repoOwner: 'example-org',
        repoName: 'atmosphere',
        assets: [
          { assetPattern: 'atmosphere-*.zip' },
          {
            assetPattern: 'fusee.bin',
            processingSteps: [{ action: 'copy_single_file', targetPath: 'bootloader/payloads' }],
          },
        ],
      },
    };

    it('plans one part per listed asset with its own steps', () => {
      expect(assetPlan(parseComponentDefinition(atmosphere))).toEqual([
        { assetPattern: 'atmosphere-*.zip', processingSteps: [] },
        {
          assetPattern: 'fusee.bin',
          processingSteps: [{ action: 'copy_single_file', targetPath: 'bootloader/payloads' }],
        },
      ]);
    });

    it('plans a single part from the component steps otherwise', () => {
      expect(assetPlan(parseComponentDefinition(hekate))).toEqual([
        { processingSteps: [{ action: 'extract_all_to_root' }] },
      ]);
    });

    it('requires exactly one of assetPattern and assets', () => {
      expect(() =>
        parseComponentDefinition({
          ...atmosphere,
          source: { ...atmosphere.source, assetPattern: '*.zip' },
        })
      ).toThrow(expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID }));
      expect(() =>
        parseComponentDefinition({
          ...hekate,
          source: { kind: 'release', repoOwner: 'example-org', repoName: 'hekate' },
        })
      ).toThrow(expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID }));
    });

    it('refuses component-level steps next to per-asset steps', () => {
      expect(() =>
        parseComponentDefinition({ ...atmosphere, processingSteps: [{ action: 'extract_all_to_root' }] })
      ).toThrow(
        expect.objectContaining({
          code: ErrorCode.DEFINITION_INVALID,
          message: expect.stringContaining('processingSteps go inside each entry of source.assets'),
        })
      );
    });

    it('reports an unknown action inside an asset with its position', () => {
      const broken = {
        ...atmosphere,
        source: {
          ...atmosphere.source,
          assets: [{ assetPattern: '*.zip', processingSteps: [{ action: 'flash' }] }],
        },
      };
      expect(() => parseComponentDefinition(broken)).toThrow(
        expect.objectContaining({
          code: ErrorCode.UNSUPPORTED_ACTION,
          message: "Component atmosphere: asset 0 step 0 uses unsupported action 'flash'",
        })
      );
    });
  });

  it('labels definitions without an id by index', () => {
    expect(() => parseComponentDefinition({ source: installer.source }, 4)).toThrow(
      expect.objectContaining({ message: expect.stringContaining('for component #4') })
    );
  });
});

describe('ComponentRegistry', () => {
  it('refuses duplicate ids', () => {
    expect(() => ComponentRegistry.fromRaw([hekate, hekate])).toThrow(
      expect.objectContaining({ code: ErrorCode.DEFINITION_INVALID })
    );
  });

  it('looks components up by id', () => {
    const registry = ComponentRegistry.fromRaw([hekate, installer]);
    expect(registry.size).toBe(2);
    expect(registry.ids()).toEqual(['hekate', 'NXThemesInstaller']);
    expect(registry.get('missing')).toBeUndefined();
    expect(() => registry.require('missing')).toThrow(
      expect.objectContaining({ code: ErrorCode.COMPONENT_NOT_FOUND })
    );
  });

  it('records resolutions and keeps the previous version when the asset has none', () => {
    const registry = ComponentRegistry.fromRaw([hekate]);
    registry.recordResolution('hekate', {
      downloadUrl: 'https://example.test/hekate_ctcaer_6.2.zip',
      version: 'v6.2.0',
      filename: 'hekate_ctcaer_6.2.zip',
    });
    registry.recordResolution('hekate', {
      downloadUrl: 'https://example.test/hekate.zip',
      filename: 'hekate.zip',
    });
    const definition = registry.require('hekate');
    expect(definition.resolvedVersion).toBe('v6.2.0');
    expect(definition.resolvedAsset?.filename).toBe('hekate.zip');
  });
});

describe('loadRegistry / saveRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'packwright-registry-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips definitions through the registry file', async () => {
    const file = join(dir, 'components.json');
    await writeFile(file, JSON.stringify({ components: [hekate, installer] }));

    const registry = await loadRegistry(file);
    registry.recordResolution('NXThemesInstaller', {
      downloadUrl: installer.source.url,
      version: 'v2.7.1',
      filename: 'NXThemesInstaller.nro',
    });
    await saveRegistry(file, registry);

    const saved: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(saved).toMatchObject({
      components: [{ id: 'hekate' }, { id: 'NXThemesInstaller', resolvedVersion: 'v2.7.1' }],
    });
    const reloaded = await loadRegistry(file);
    expect(reloaded.require('NXThemesInstaller').resolvedAsset?.version).toBe('v2.7.1');
  });

  it('writes back only the cached resolution onto the records as written', async () => {
    const file = join(dir, 'components.json');
    await writeFile(file, JSON.stringify({ components: [installer] }));

    const registry = await loadRegistry(file);
    registry.recordResolution('NXThemesInstaller', {
      downloadUrl: installer.source.url,
      version: 'v2.7.1',
      filename: 'NXThemesInstaller.nro',
    });
    await saveRegistry(file, registry);

    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual({
      components: [
        {
          ...installer,
          resolvedVersion: 'v2.7.1',
          resolvedAsset: {
            downloadUrl: installer.source.url,
            version: 'v2.7.1',
            filename: 'NXThemesInstaller.nro',
          },
        },
      ],
    });
  });

  it('reports a missing file as IO_FILE_NOT_FOUND', async () => {
    await expect(loadRegistry(join(dir, 'absent.json'))).rejects.toMatchObject({
      code: ErrorCode.IO_FILE_NOT_FOUND,
    });
  });

  it('reports malformed JSON as DEFINITION_INVALID', async () => {
    const file = join(dir, 'components.json');
    await writeFile(file, '{ "components": [');
    await expect(loadRegistry(file)).rejects.toMatchObject({ code: ErrorCode.DEFINITION_INVALID });
  });
});
