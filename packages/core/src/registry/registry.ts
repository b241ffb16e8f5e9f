import { readFile, writeFile } from 'node:fs/promises';
import { PackwrightError, ErrorCode } from '../errors.js';
import { validate } from '../utils/validation.js';
import { errorMessage, extractErrnoCode } from '../utils/error-utils.js';
import {
  ComponentDefinitionSchema,
  RegistryFileSchema,
  STEP_ACTIONS,
} from '../schemas/component.schema.js';
import type { ComponentDefinition, ResolvedAsset, Step } from '../schemas/component.schema.js';

function isKnownAction(action: unknown): boolean {
  return STEP_ACTIONS.some((known) => known === action);
}

function describeId(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return `#${String(index)}`;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Every raw step list of a definition, labelled for error messages. */
function rawStepLists(raw: RawRecord): Array<{ where: string; steps: unknown }> {
  const lists = [{ where: '', steps: raw.processingSteps }];
  const source = raw.source;
  if (isRecord(source) && Array.isArray(source.assets)) {
    source.assets.forEach((asset: unknown, assetIndex) => {
      if (isRecord(asset)) {
        lists.push({ where: `asset ${String(assetIndex)} `, steps: asset.processingSteps });
      }
    });
  }
  return lists;
}

/**
 * Reject unknown step actions before schema validation so they surface as
 * UNSUPPORTED_ACTION rather than a generic union mismatch.
 */
function assertKnownActions(raw: unknown, label: string): void {
  if (!isRecord(raw)) return;
  for (const { where, steps } of rawStepLists(raw)) {
    if (!Array.isArray(steps)) continue;
    steps.forEach((step: unknown, stepIndex) => {
      const action = isRecord(step) ? step.action : undefined;
      if (!isKnownAction(action)) {
        throw new PackwrightError(
          `Component ${label}: ${where}step ${String(stepIndex)} uses unsupported action '${String(action)}'`,
          ErrorCode.UNSUPPORTED_ACTION,
          `Component ${label} has an unknown processing step '${String(action)}'. Supported: ${STEP_ACTIONS.join(', ')}`,
          { componentId: label, stepIndex }
        );
      }
    });
  }
}

export function parseComponentDefinition(raw: unknown, index = 0): ComponentDefinition {
  const label = describeId(raw, index);
  assertKnownActions(raw, label);
  return validate(
    ComponentDefinitionSchema,
    raw,
    `component ${label}`,
    ErrorCode.DEFINITION_INVALID
  );
}

/** One asset of a component and the steps that place it. */
export interface AssetPlan {
  /** Overrides the source's own `assetPattern`; unset for single-asset components. */
  assetPattern?: string;
  processingSteps: Step[];
}

/** The assets a component installs, in order. Single-asset components yield one plan. */
export function assetPlan(definition: ComponentDefinition): AssetPlan[] {
  const { source } = definition;
  if (source.kind === 'release' && source.assets) {
    return source.assets.map((asset) => ({
      assetPattern: asset.assetPattern,
      processingSteps: asset.processingSteps,
    }));
  }
  return [{ processingSteps: definition.processingSteps }];
}

function cacheFields(
  definition: ComponentDefinition
): Pick<ComponentDefinition, 'resolvedVersion' | 'resolvedAsset'> {
  const fields: Pick<ComponentDefinition, 'resolvedVersion' | 'resolvedAsset'> = {};
  if (definition.resolvedVersion !== undefined) fields.resolvedVersion = definition.resolvedVersion;
  if (definition.resolvedAsset !== undefined) fields.resolvedAsset = definition.resolvedAsset;
  return fields;
}

export class ComponentRegistry {
  private readonly definitions = new Map<string, ComponentDefinition>();
  /** Records as read from the registry file, written back with only the cache fields updated. */
  private readonly records = new Map<string, RawRecord>();

  constructor(definitions: ComponentDefinition[] = []) {
    for (const definition of definitions) {
      if (this.definitions.has(definition.id)) {
        throw new PackwrightError(
          `Duplicate component id '${definition.id}'`,
          ErrorCode.DEFINITION_INVALID,
          `Component id '${definition.id}' is defined more than once`,
          { componentId: definition.id }
        );
      }
      this.definitions.set(definition.id, definition);
    }
  }

  static fromRaw(rawDefinitions: unknown[]): ComponentRegistry {
    const parsed = rawDefinitions.map((raw, i) => ({
      raw,
      definition: parseComponentDefinition(raw, i),
    }));
    const registry = new ComponentRegistry(parsed.map((p) => p.definition));
    for (const { raw, definition } of parsed) {
      if (isRecord(raw)) registry.records.set(definition.id, raw);
    }
    return registry;
  }

  get size(): number {
    return this.definitions.size;
  }

  list(): ComponentDefinition[] {
    return [...this.definitions.values()];
  }

  ids(): string[] {
    return [...this.definitions.keys()];
  }

  get(id: string): ComponentDefinition | undefined {
    return this.definitions.get(id);
  }

  require(id: string): ComponentDefinition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new PackwrightError(
        `Unknown component '${id}'`,
        ErrorCode.COMPONENT_NOT_FOUND,
        `Component '${id}' is not in the registry`,
        { componentId: id }
      );
    }
    return definition;
  }

  /** Refresh the cached resolution for a component. */
  recordResolution(id: string, asset: ResolvedAsset): void {
    const definition = this.require(id);
    this.definitions.set(id, {
      ...definition,
      resolvedVersion: asset.version ?? definition.resolvedVersion,
      resolvedAsset: asset,
    });
  }

  toJSON(): { components: unknown[] } {
    return {
      components: this.list().map((definition) => {
        const record = this.records.get(definition.id);
        return record ? { ...record, ...cacheFields(definition) } : definition;
      }),
    };
  }
}

export async function loadRegistry(filePath: string): Promise<ComponentRegistry> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (extractErrnoCode(error) === 'ENOENT') {
      throw new PackwrightError(
        `Registry file not found: ${filePath}`,
        ErrorCode.IO_FILE_NOT_FOUND,
        `Cannot find the component registry at ${filePath}`,
        { path: filePath }
      );
    }
    throw PackwrightError.fromError(error, ErrorCode.IO_PERMISSION_DENIED);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new PackwrightError(
      `Registry file is not valid JSON: ${errorMessage(error)}`,
      ErrorCode.DEFINITION_INVALID,
      `The component registry ${filePath} is not valid JSON`,
      { path: filePath }
    );
  }

  const file = validate(RegistryFileSchema, parsed, 'registry file', ErrorCode.DEFINITION_INVALID);
  return ComponentRegistry.fromRaw(file.components);
}

export async function saveRegistry(filePath: string, registry: ComponentRegistry): Promise<void> {
  await writeFile(filePath, JSON.stringify(registry.toJSON(), null, 2) + '\n', 'utf-8');
}
