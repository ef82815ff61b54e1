/**
 * tuneup core — Verifier
 *
 * Two independent read-only passes. Both may run any number of times; they
 * never plan or execute anything.
 *
 * Static pass: re-inspects every catalog resource (config-file truth) and
 * checks each `checks` substring in file targets.
 *
 * Runtime pass: live facts that only reflect reality once changes took
 * effect: the running kernel command line, sysfs attributes, unit active
 * states. Derived checks are added for every KernelParam (token on
 * /proc/cmdline), ServiceEnable (unit active) and ServiceMask (unit
 * inactive); the catalog adds attribute checks. A check on a
 * reboot-requiring subject reports Info, not Fail, while the reboot marker
 * is newer than the current boot.
 *
 * Each dual-representation resource is verified on its own, so a kernel
 * token that is set next to a missing modprobe option file yields one Pass
 * and one Fail.
 */

import type { RebootTracker, ServiceManager, SystemFs } from '../adapters/index.js';
import { ResourceKind, isFileBacked, type Precondition, type Resource } from '../types/resource.js';
import type { SystemFacts } from '../types/facts.js';
import {
  VerificationStatus,
  type RuntimeCheck,
  type VerificationResult,
  type VerifyPass,
} from '../types/verification.js';
import { StatusTag } from '../types/run.js';
import type { Catalog } from '../catalog/catalog.js';
import { evaluatePreconditions } from '../catalog/preconditions.js';
import type { StateInspector } from '../inspector/inspector.js';
import type { RunLogger } from '../logging/run-log.js';
import { decodeText } from '../matching/render.js';
import { splitTokens, tokenState } from '../matching/cmdline.js';
import { errorMessage } from '../errors.js';

export const PROC_CMDLINE = '/proc/cmdline';

export interface VerifierDeps {
  readonly catalog: Catalog;
  readonly inspector: StateInspector;
  readonly fs: SystemFs;
  readonly services: ServiceManager;
  readonly reboot: RebootTracker;
  readonly log: RunLogger;
}

const STATUS_TAGS: Readonly<Record<VerificationStatus, StatusTag>> = {
  [VerificationStatus.Pass]: StatusTag.Ok,
  [VerificationStatus.Fail]: StatusTag.Fail,
  [VerificationStatus.Skipped]: StatusTag.Info,
  [VerificationStatus.Info]: StatusTag.Info,
};

/** Runtime checks implied by the catalog's resources, followed by its declared ones. */
export function runtimeChecksFor(catalog: Catalog): RuntimeCheck[] {
  const derived: RuntimeCheck[] = [];
  for (const r of catalog.all()) {
    const base = { id: `${r.id}@runtime`, preconditions: r.preconditions, requiresReboot: r.requiresReboot };
    switch (r.kind) {
      case ResourceKind.KernelParam:
        derived.push({ ...base, kind: 'cmdline-token', token: r.desired.token, requiresReboot: true });
        break;
      case ResourceKind.ServiceEnable:
        derived.push({ ...base, kind: 'unit-active', unit: r.target, expectActive: true });
        break;
      case ResourceKind.ServiceMask:
        derived.push({ ...base, kind: 'unit-active', unit: r.target, expectActive: false });
        break;
      default:
        break;
    }
  }
  return [...derived, ...catalog.runtimeChecks()];
}

/** The bracketed choice in `mq-deadline kyber [none]`, or null. */
export function selectedChoice(text: string): string | null {
  const m = /\[([^\]]+)\]/.exec(text);
  return m === null ? null : (m[1] ?? null);
}

export class Verifier {
  constructor(private readonly deps: VerifierDeps) {}

  async verify(pass: VerifyPass, facts: SystemFacts): Promise<VerificationResult[]> {
    const results: VerificationResult[] = [];
    if (pass !== 'runtime') results.push(...(await this.verifyStatic(facts)));
    if (pass !== 'static') results.push(...(await this.verifyRuntime(facts)));
    return results;
  }

  // -------------------------------------------------------------------------
  // Static pass
  // -------------------------------------------------------------------------

  async verifyStatic(facts: SystemFacts): Promise<VerificationResult[]> {
    const results: VerificationResult[] = [];
    for (const resource of this.deps.catalog.all()) {
      const skipped = this.outOfScope(resource.id, describeDesired(resource), resource.preconditions, facts);
      if (skipped !== null) {
        results.push(this.emit(skipped));
        continue;
      }

      const fact = await this.deps.inspector.inspect(resource);
      const expected = describeDesired(resource);
      if (fact.presence === 'unknown') {
        results.push(this.emit({ subjectId: resource.id, expected, actual: `unknown (${fact.rawValue ?? ''})`, status: VerificationStatus.Fail }));
      } else {
        results.push(this.emit({
          subjectId: resource.id,
          expected,
          actual: fact.rawValue ?? fact.presence,
          status: fact.matches ? VerificationStatus.Pass : VerificationStatus.Fail,
        }));
      }

      if (isFileBacked(resource) && resource.checks.length > 0) {
        const content = fact.content ?? null;
        for (const needle of resource.checks) {
          const found = content !== null && content.includes(needle);
          results.push(this.emit({
            subjectId: `${resource.id}#${needle}`,
            expected: `contains "${needle}"`,
            actual: content === null ? 'file missing' : found ? 'found' : 'not found',
            status: found ? VerificationStatus.Pass : VerificationStatus.Fail,
          }));
        }
      }
    }
    return results;
  }

  // -------------------------------------------------------------------------
  // Runtime pass
  // -------------------------------------------------------------------------

  async verifyRuntime(facts: SystemFacts): Promise<VerificationResult[]> {
    const rebootPending = await this.rebootPending();
    let cmdline: string[] | null | undefined;

    const results: VerificationResult[] = [];
    for (const check of runtimeChecksFor(this.deps.catalog)) {
      const skipped = this.outOfScope(check.id, describeCheck(check), check.preconditions, facts);
      if (skipped !== null) {
        results.push(this.emit(skipped));
        continue;
      }

      let result: VerificationResult;
      switch (check.kind) {
        case 'cmdline-token': {
          if (cmdline === undefined) cmdline = await this.readTokens(PROC_CMDLINE);
          const state = cmdline === null ? null : tokenState(cmdline, check.token);
          result = {
            subjectId: check.id,
            expected: describeCheck(check),
            actual: state === null ? `${PROC_CMDLINE} unreadable` : state.current.join(' ') || 'absent',
            status: state?.matches === true ? VerificationStatus.Pass : VerificationStatus.Fail,
          };
          break;
        }
        case 'attribute': {
          const text = await this.readText(check.path);
          const actual = text === null ? null : check.match === 'selected' ? selectedChoice(text) : text.trim();
          result = {
            subjectId: check.id,
            expected: describeCheck(check),
            actual: text === null ? 'missing' : (actual ?? 'no selection'),
            status: actual === check.expected ? VerificationStatus.Pass : VerificationStatus.Fail,
          };
          break;
        }
        case 'unit-active': {
          const state = await this.deps.services.activeState(check.unit);
          const ok = check.expectActive ? state === 'active' : state === 'inactive' || state === 'failed';
          result = {
            subjectId: check.id,
            expected: describeCheck(check),
            actual: state,
            status: state !== 'unknown' && ok ? VerificationStatus.Pass : VerificationStatus.Fail,
          };
          break;
        }
      }

      if (result.status === VerificationStatus.Fail && check.requiresReboot && rebootPending) {
        result = { ...result, status: VerificationStatus.Info, detail: 'pending reboot' };
      }
      results.push(this.emit(result));
    }
    return results;
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private outOfScope(
    subjectId: string,
    expected: string,
    preconditions: ReadonlyArray<Precondition>,
    facts: SystemFacts,
  ): VerificationResult | null {
    const pre = evaluatePreconditions(preconditions, facts);
    if (pre.met) return null;
    return { subjectId, expected, actual: pre.reason, status: VerificationStatus.Skipped };
  }

  private async rebootPending(): Promise<boolean> {
    const since = await this.deps.reboot.pendingSince();
    if (since === null) return false;
    const booted = await this.deps.reboot.bootedAt();
    return booted === null || Date.parse(booted) < Date.parse(since);
  }

  private async readText(path: string): Promise<string | null> {
    try {
      const bytes = await this.deps.fs.read(path);
      if (bytes === null) return null;
      const text = decodeText(bytes);
      if (text === null) this.deps.log.record('verify', `${path} is not valid UTF-8`);
      return text;
    } catch (err: unknown) {
      this.deps.log.record('verify', `cannot read ${path}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async readTokens(path: string): Promise<string[] | null> {
    const text = await this.readText(path);
    return text === null ? null : splitTokens(text);
  }

  private emit(result: VerificationResult): VerificationResult {
    const detail = result.detail === undefined ? '' : ` [${result.detail}]`;
    const message = result.status === VerificationStatus.Pass
      ? result.expected
      : `expected ${result.expected}, got ${result.actual}${detail}`;
    this.deps.log.status(STATUS_TAGS[result.status], result.subjectId, message);
    return result;
  }
}

function describeDesired(resource: Resource): string {
  switch (resource.kind) {
    case ResourceKind.FileCopy:
      return `${resource.target} matches ${resource.source}`;
    case ResourceKind.TextPatch:
    case ResourceKind.EnvVar:
      return `${resource.desired.key}=${resource.desired.value} in ${resource.target}`;
    case ResourceKind.KernelParam:
      return `${resource.desired.token} in ${resource.desired.variable ?? resource.target}`;
    case ResourceKind.MountOption:
      return `${resource.desired.option} on ${resource.desired.mountPoint}`;
    case ResourceKind.InitramfsHook:
      return `${resource.desired.hook} in HOOKS`;
    case ResourceKind.ServiceMask:
      return `${resource.target} masked`;
    case ResourceKind.ServiceEnable:
      return `${resource.target} enabled`;
    case ResourceKind.PackagePresent:
      return `${resource.target} installed`;
    case ResourceKind.PackageAbsent:
      return `${resource.target} not installed`;
  }
}

function describeCheck(check: RuntimeCheck): string {
  switch (check.kind) {
    case 'cmdline-token':
      return `${check.token} on running kernel`;
    case 'attribute':
      return check.match === 'selected' ? `[${check.expected}] in ${check.path}` : `${check.path} = ${check.expected}`;
    case 'unit-active':
      return `${check.unit} ${check.expectActive ? 'active' : 'inactive'}`;
  }
}
