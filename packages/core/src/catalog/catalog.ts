/**
 * tuneup core — Resource Catalog
 *
 * An immutable value built once at startup and passed explicitly to every
 * component. Resource order is the catalog's declaration order; the Planner
 * keeps it within each execution phase.
 */

import type { Resource, ResourceKind } from '../types/resource.js';
import type { SystemFacts } from '../types/facts.js';
import type { RuntimeCheck } from '../types/verification.js';
import { evaluatePreconditions } from './preconditions.js';

export class Catalog {
  private readonly byId: ReadonlyMap<string, Resource>;

  /**
   * @throws {Error} if two resources or two runtime checks share an id
   */
  constructor(
    private readonly resources: ReadonlyArray<Resource>,
    private readonly checks: ReadonlyArray<RuntimeCheck> = [],
  ) {
    const byId = new Map<string, Resource>();
    for (const r of resources) {
      if (byId.has(r.id)) throw new Error(`Duplicate resource id in catalog: ${r.id}`);
      byId.set(r.id, r);
    }
    const checkIds = new Set<string>();
    for (const c of checks) {
      if (checkIds.has(c.id) || byId.has(c.id)) throw new Error(`Duplicate runtime check id in catalog: ${c.id}`);
      checkIds.add(c.id);
    }
    this.byId = byId;
    Object.freeze(this);
  }

  all(): ReadonlyArray<Resource> {
    return this.resources;
  }

  resourcesFor(kind: ResourceKind): ReadonlyArray<Resource> {
    return this.resources.filter((r) => r.kind === kind);
  }

  get(id: string): Resource | undefined {
    return this.byId.get(id);
  }

  isInScope(resource: Resource, facts: SystemFacts): boolean {
    return evaluatePreconditions(resource.preconditions, facts).met;
  }

  runtimeChecks(): ReadonlyArray<RuntimeCheck> {
    return this.checks;
  }

  /** Package names any precondition refers to, for fact collection. */
  referencedPackages(): ReadonlyArray<string> {
    const names = new Set<string>();
    for (const p of this.allPreconditions()) {
      if (p.kind === 'package-installed' || p.kind === 'package-missing') names.add(p.name);
    }
    return [...names].sort();
  }

  /** Paths any precondition refers to, for fact collection. */
  referencedPaths(): ReadonlyArray<string> {
    const paths = new Set<string>();
    for (const p of this.allPreconditions()) {
      if (p.kind === 'path-exists') paths.add(p.path);
    }
    return [...paths].sort();
  }

  private allPreconditions() {
    return [
      ...this.resources.flatMap((r) => r.preconditions),
      ...this.checks.flatMap((c) => c.preconditions),
    ];
  }
}
