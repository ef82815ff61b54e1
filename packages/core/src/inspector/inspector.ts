/**
 * tuneup core — State Inspector
 *
 * Reads the current truth for one resource and returns a SystemFact. Never
 * mutates. Any query that errors (unreadable file, package manager or
 * service manager unavailable) yields presence 'unknown'; callers must not
 * treat that as absent.
 */

import { createHash } from 'node:crypto';
import {
  ResourceKind,
  type FileBackedResource,
  type PackageResource,
  type Resource,
  type UnitResource,
} from '../types/resource.js';
import { UnitState, type SystemFact } from '../types/facts.js';
import type { PackageManager, ServiceManager, SystemFs } from '../adapters/index.js';
import { decodeText } from '../matching/render.js';
import { findKeyLine } from '../matching/key-value.js';
import { configuredTokens, tokenState } from '../matching/cmdline.js';
import { findMount } from '../matching/fstab.js';
import { findHooks, hookConflict } from '../matching/mkinitcpio.js';
import { errorMessage } from '../errors.js';

export interface InspectorDeps {
  readonly fs: SystemFs;
  readonly packages: PackageManager;
  readonly services: ServiceManager;
}

export function sha256(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class StateInspector {
  constructor(private readonly deps: InspectorDeps) {}

  async inspect(resource: Resource): Promise<SystemFact> {
    switch (resource.kind) {
      case ResourceKind.ServiceMask:
      case ResourceKind.ServiceEnable:
        return this.inspectUnit(resource);
      case ResourceKind.PackagePresent:
      case ResourceKind.PackageAbsent:
        return this.inspectPackage(resource);
      default:
        return this.inspectFile(resource);
    }
  }

  // -------------------------------------------------------------------------
  // File-backed kinds
  // -------------------------------------------------------------------------

  private async inspectFile(resource: FileBackedResource): Promise<SystemFact> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.deps.fs.read(resource.target);
    } catch (err: unknown) {
      return unknown(resource.id, `cannot read ${resource.target}: ${errorMessage(err)}`);
    }
    if (bytes === null) {
      return { resourceId: resource.id, presence: 'absent', matches: false, rawValue: null, content: null };
    }
    const text = decodeText(bytes);

    if (resource.kind === ResourceKind.FileCopy) {
      const current = sha256(bytes);
      const matches = resource.desired !== null && sha256(resource.desired) === current;
      return {
        resourceId: resource.id,
        presence: 'present',
        matches,
        rawValue: `sha256:${current}`,
        content: text ?? undefined,
      };
    }
    if (text === null) {
      return {
        resourceId: resource.id,
        presence: 'present',
        matches: false,
        rawValue: null,
        unsafe: `${resource.target} is not valid UTF-8`,
      };
    }

    switch (resource.kind) {
      case ResourceKind.TextPatch:
      case ResourceKind.EnvVar: {
        const line = findKeyLine(text, resource.desired.key);
        return {
          resourceId: resource.id,
          presence: line === null ? 'absent' : 'present',
          matches: line !== null && line.value === resource.desired.value,
          rawValue: line?.line ?? null,
          content: text,
        };
      }

      case ResourceKind.KernelParam: {
        const lookup = configuredTokens(text, resource.desired.variable);
        if (!lookup.found) {
          return {
            resourceId: resource.id,
            presence: 'absent',
            matches: false,
            rawValue: null,
            content: text,
            unsafe: lookup.unsafe,
          };
        }
        const state = tokenState(lookup.tokens, resource.desired.token);
        return {
          resourceId: resource.id,
          presence: state.present ? 'present' : 'absent',
          matches: state.matches,
          rawValue: state.current.length > 0 ? state.current.join(' ') : null,
          content: text,
        };
      }

      case ResourceKind.MountOption: {
        const lookup = findMount(text, resource.desired.mountPoint);
        if (!lookup.found) {
          return {
            resourceId: resource.id,
            presence: 'absent',
            matches: false,
            rawValue: null,
            content: text,
            unsafe: lookup.unsafe ?? `no fstab entry for ${resource.desired.mountPoint}`,
          };
        }
        return {
          resourceId: resource.id,
          presence: 'present',
          matches: lookup.entry.options.includes(resource.desired.option),
          rawValue: lookup.entry.options.join(','),
          content: text,
        };
      }

      case ResourceKind.InitramfsHook: {
        const lookup = findHooks(text);
        if (!lookup.found) {
          return { resourceId: resource.id, presence: 'absent', matches: false, rawValue: null, content: text, unsafe: lookup.unsafe };
        }
        const rawValue = `HOOKS=(${lookup.hooks.join(' ')})`;
        const conflict = hookConflict(lookup.hooks, resource.desired.hook);
        if (conflict !== null) {
          return { resourceId: resource.id, presence: 'present', matches: false, rawValue, content: text, unsafe: conflict };
        }
        return {
          resourceId: resource.id,
          presence: 'present',
          matches: lookup.hooks.includes(resource.desired.hook),
          rawValue,
          content: text,
        };
      }
    }
  }

  // -------------------------------------------------------------------------
  // Units and packages
  // -------------------------------------------------------------------------

  private async inspectUnit(resource: UnitResource): Promise<SystemFact> {
    const state = await this.deps.services.enablementState(resource.target);
    if (state === UnitState.Unknown) return unknown(resource.id, UnitState.Unknown);

    const desired = resource.kind === ResourceKind.ServiceMask ? UnitState.Masked : UnitState.Enabled;
    return {
      resourceId: resource.id,
      presence: state === UnitState.NotFound ? 'absent' : 'present',
      matches: state === desired,
      rawValue: state,
    };
  }

  private async inspectPackage(resource: PackageResource): Promise<SystemFact> {
    const installed = await this.deps.packages.isInstalled(resource.target);
    if (installed === null) return unknown(resource.id, 'package manager unavailable');

    // For PackageAbsent, "matches" means the package is gone.
    const matches = resource.kind === ResourceKind.PackagePresent ? installed : !installed;
    return {
      resourceId: resource.id,
      presence: installed ? 'present' : 'absent',
      matches,
      rawValue: installed ? 'installed' : 'not installed',
    };
  }
}

function unknown(resourceId: string, rawValue: string): SystemFact {
  return { resourceId, presence: 'unknown', matches: false, rawValue };
}
