/**
 * Desired content of a file-backed resource's target, given its current
 * text. Used by the Planner for diffs and by the Executor at apply time, so
 * several resources editing one file compose instead of overwriting each
 * other.
 */

import { ResourceKind, type FileBackedResource } from '../types/resource.js';
import { renderKeyValue } from './key-value.js';
import { renderKernelParam } from './cmdline.js';
import { renderMountOption } from './fstab.js';
import { renderHook } from './mkinitcpio.js';

const encoder = new TextEncoder();
// A byte-order mark stays in the text so that re-encoding writes it back.
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** UTF-8 text of a file, or null when the bytes are not valid UTF-8. */
export function decodeText(bytes: Uint8Array): string | null {
  try {
    return decoder.decode(bytes);
  } catch (err: unknown) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

/**
 * Rendered target bytes, or null when nothing can be rendered (a FileCopy
 * whose source is missing).
 */
export function renderDesired(resource: FileBackedResource, current: string | null): Uint8Array | null {
  switch (resource.kind) {
    case ResourceKind.FileCopy:
      return resource.desired;
    case ResourceKind.TextPatch:
    case ResourceKind.EnvVar:
      return encoder.encode(renderKeyValue(current, resource.desired.key, resource.desired.value));
    case ResourceKind.KernelParam:
      return encoder.encode(renderKernelParam(current, resource.desired.token, resource.desired.variable));
    case ResourceKind.MountOption:
      return encoder.encode(
        renderMountOption(current ?? '', resource.desired.mountPoint, resource.desired.option),
      );
    case ResourceKind.InitramfsHook:
      return encoder.encode(renderHook(current ?? '', resource.desired.hook, resource.desired.before));
  }
}
