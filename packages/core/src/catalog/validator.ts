/**
 * tuneup core — Catalog Document Validator
 *
 * Turns a parsed catalog document (catalog.json) into a Catalog. Structural
 * validation is exhaustive: every problem in the document is reported, each
 * with the entry it was found in, before anything is built.
 *
 * Source bytes for FileCopy resources are supplied by the caller through
 * `loadSource`, keeping this module free of I/O. A source that cannot be
 * found is not a validation error: the resource is built with
 * `desired: null` and the Planner reports it as SourceMissing, so one
 * missing file does not block the rest of the run.
 */

import {
  ENVIRONMENT_FILE,
  ResourceKind,
  Trigger,
  type Confirmation,
  type Precondition,
  type Resource,
} from '../types/resource.js';
import type { RuntimeCheck } from '../types/verification.js';
import { Catalog } from './catalog.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

export type SourceLoader = (source: string) => Uint8Array | null;

/** Targets used when an entry of these kinds names none. */
const DEFAULT_TARGETS: Partial<Record<ResourceKind, string>> = {
  [ResourceKind.EnvVar]: ENVIRONMENT_FILE,
  [ResourceKind.MountOption]: '/etc/fstab',
  [ResourceKind.InitramfsHook]: '/etc/mkinitcpio.conf',
};

const RESOURCE_KINDS = new Set<string>(Object.values(ResourceKind));
const TRIGGERS = new Set<string>(Object.values(Trigger));

function isResourceKind(value: unknown): value is ResourceKind {
  return typeof value === 'string' && RESOURCE_KINDS.has(value);
}

function isTrigger(value: string): value is Trigger {
  return TRIGGERS.has(value);
}

// ---------------------------------------------------------------------------
// Field reader
// ---------------------------------------------------------------------------

type Json = Readonly<Record<string, unknown>>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads typed fields off one JSON object, collecting errors instead of throwing. */
class FieldReader {
  constructor(
    private readonly obj: Json,
    private readonly context: string,
    private readonly errors: ValidationError[],
  ) {}

  fail(message: string): void {
    this.errors.push({ message, context: this.context });
  }

  string(key: string): string {
    const v = this.obj[key];
    if (typeof v === 'string' && v !== '') return v;
    this.fail(`"${key}" must be a non-empty string`);
    return '';
  }

  optionalString(key: string): string | undefined {
    const v = this.obj[key];
    if (v === undefined) return undefined;
    if (typeof v === 'string' && v !== '') return v;
    this.fail(`"${key}" must be a non-empty string when given`);
    return undefined;
  }

  boolean(key: string, fallback: boolean): boolean {
    const v = this.obj[key];
    if (v === undefined) return fallback;
    if (typeof v === 'boolean') return v;
    this.fail(`"${key}" must be a boolean`);
    return fallback;
  }

  array(key: string): ReadonlyArray<unknown> {
    const v = this.obj[key];
    if (v === undefined) return [];
    if (Array.isArray(v)) return v;
    this.fail(`"${key}" must be an array`);
    return [];
  }

  strings(key: string): ReadonlyArray<string> {
    const items = this.array(key);
    const out: string[] = [];
    for (const item of items) {
      if (typeof item === 'string') out.push(item);
      else this.fail(`"${key}" must contain only strings`);
    }
    return out;
  }

  preconditions(): ReadonlyArray<Precondition> {
    const out: Precondition[] = [];
    for (const item of this.array('preconditions')) {
      const p = readPrecondition(item);
      if (p === null) this.fail(`invalid precondition: ${JSON.stringify(item)}`);
      else out.push(p);
    }
    return out;
  }
}

function readPrecondition(item: unknown): Precondition | null {
  if (!isObject(item)) return null;
  const str = (key: string): string | null => {
    const v = item[key];
    return typeof v === 'string' && v !== '' ? v : null;
  };
  const kind = item['kind'];
  switch (kind) {
    case 'package-installed': {
      const name = str('name');
      return name === null ? null : { kind, name };
    }
    case 'package-missing': {
      const name = str('name');
      return name === null ? null : { kind, name };
    }
    case 'luks-present':
      return { kind };
    case 'no-lvm':
      return { kind };
    case 'not-btrfs-subvolumes':
      return { kind };
    case 'pci-vendor': {
      const vendorId = str('vendorId');
      if (vendorId === null || !/^(0x)?[0-9a-fA-F]{4}$/.test(vendorId)) return null;
      return { kind: 'pci-vendor', vendorId: vendorId.replace(/^0x/, '').toLowerCase(), label: str('label') ?? undefined };
    }
    case 'path-exists': {
      const path = str('path');
      return path === null ? null : { kind: 'path-exists', path };
    }
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

function readResource(raw: unknown, index: number, loadSource: SourceLoader, errors: ValidationError[]): Resource | null {
  if (!isObject(raw)) {
    errors.push({ message: 'resource must be an object', context: `resources[${index}]` });
    return null;
  }
  const idValue = raw['id'];
  const context = typeof idValue === 'string' ? `resource ${idValue}` : `resources[${index}]`;
  const f = new FieldReader(raw, context, errors);
  const before = errors.length;

  const id = f.string('id');
  const kind = raw['kind'];
  if (!isResourceKind(kind)) {
    f.fail(`unknown kind: ${JSON.stringify(kind)}`);
    return null;
  }
  const defaultTarget = DEFAULT_TARGETS[kind];
  const target = defaultTarget === undefined ? f.string('target') : (f.optionalString('target') ?? defaultTarget);

  const triggers: Trigger[] = [];
  for (const t of f.strings('triggers')) {
    if (isTrigger(t)) triggers.push(t);
    else f.fail(`unknown trigger: ${t}`);
  }

  let confirmation: Confirmation | undefined;
  const rawConfirmation = raw['confirmation'];
  if (rawConfirmation !== undefined) {
    if (isObject(rawConfirmation)) {
      const c = new FieldReader(rawConfirmation, `${context} confirmation`, errors);
      const prompt = c.string('prompt');
      const onDecline = rawConfirmation['onDecline'] ?? 'skip';
      if (onDecline === 'halt' || onDecline === 'skip') confirmation = { prompt, onDecline };
      else c.fail('"onDecline" must be "halt" or "skip"');
    } else {
      f.fail('"confirmation" must be an object');
    }
  }

  const base = {
    id,
    target,
    description: f.optionalString('description'),
    preconditions: f.preconditions(),
    requiresSudo: f.boolean('requiresSudo', true),
    requiresReboot: f.boolean('requiresReboot', false),
    triggers,
    confirmation,
    checks: f.strings('checks'),
  };

  let resource: Resource;
  switch (kind) {
    case ResourceKind.FileCopy: {
      const source = f.string('source');
      resource = { ...base, kind, source, desired: source === '' ? null : loadSource(source) };
      break;
    }
    case ResourceKind.TextPatch:
    case ResourceKind.EnvVar: {
      const key = f.string('key');
      const value = raw['value'];
      if (typeof value !== 'string') f.fail('"value" must be a string');
      if (/[\s=]/.test(key)) f.fail(`"key" must not contain whitespace or '=': ${key}`);
      resource = { ...base, kind, desired: { key, value: typeof value === 'string' ? value : '' } };
      break;
    }
    case ResourceKind.KernelParam: {
      const token = f.string('token');
      if (/\s/.test(token)) f.fail(`"token" must be a single token: ${token}`);
      resource = { ...base, kind, desired: { token, variable: f.optionalString('variable') } };
      break;
    }
    case ResourceKind.MountOption:
      resource = { ...base, kind, desired: { mountPoint: f.string('mountPoint'), option: f.string('option') } };
      break;
    case ResourceKind.InitramfsHook:
      resource = { ...base, kind, desired: { hook: f.string('hook'), before: f.optionalString('before') } };
      break;
    case ResourceKind.ServiceMask:
    case ResourceKind.ServiceEnable:
      resource = { ...base, kind };
      break;
    case ResourceKind.PackagePresent:
    case ResourceKind.PackageAbsent:
      resource = { ...base, kind };
      break;
  }

  return errors.length === before ? resource : null;
}

// ---------------------------------------------------------------------------
// Runtime checks
// ---------------------------------------------------------------------------

function readRuntimeCheck(raw: unknown, index: number, errors: ValidationError[]): RuntimeCheck | null {
  if (!isObject(raw)) {
    errors.push({ message: 'runtime check must be an object', context: `runtimeChecks[${index}]` });
    return null;
  }
  const idValue = raw['id'];
  const f = new FieldReader(raw, typeof idValue === 'string' ? `runtime check ${idValue}` : `runtimeChecks[${index}]`, errors);
  const before = errors.length;
  const base = {
    id: f.string('id'),
    preconditions: f.preconditions(),
    requiresReboot: f.boolean('requiresReboot', false),
  };

  let check: RuntimeCheck | null = null;
  switch (raw['kind']) {
    case 'cmdline-token':
      check = { ...base, kind: 'cmdline-token', token: f.string('token') };
      break;
    case 'attribute': {
      const match = raw['match'] ?? 'equals';
      if (match !== 'equals' && match !== 'selected') {
        f.fail('"match" must be "equals" or "selected"');
        break;
      }
      check = { ...base, kind: 'attribute', path: f.string('path'), expected: f.string('expected'), match };
      break;
    }
    case 'unit-active':
      check = { ...base, kind: 'unit-active', unit: f.string('unit'), expectActive: f.boolean('expectActive', true) };
      break;
    default:
      f.fail(`unknown kind: ${JSON.stringify(raw['kind'])}`);
  }
  return errors.length === before ? check : null;
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export function parseCatalogDocument(doc: unknown, loadSource: SourceLoader): ValidationResult<Catalog> {
  if (!isObject(doc)) {
    return { ok: false, errors: [{ message: 'catalog document must be a JSON object' }] };
  }
  const errors: ValidationError[] = [];
  const root = new FieldReader(doc, 'catalog', errors);

  const resources: Resource[] = [];
  root.array('resources').forEach((raw, i) => {
    const r = readResource(raw, i, loadSource, errors);
    if (r !== null) resources.push(r);
  });

  const checks: RuntimeCheck[] = [];
  root.array('runtimeChecks').forEach((raw, i) => {
    const c = readRuntimeCheck(raw, i, errors);
    if (c !== null) checks.push(c);
  });

  const seen = new Set<string>();
  for (const id of [...resources.map((r) => r.id), ...checks.map((c) => c.id)]) {
    if (seen.has(id)) errors.push({ message: `duplicate id: ${id}`, context: 'catalog' });
    seen.add(id);
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: new Catalog(resources, checks) };
}
