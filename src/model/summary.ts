import type { ImpactLevel, PlanChange } from './change.js';

/** The four action buckets tracked per resource type; `read` has none. */
export type CountedAction = 'create' | 'update' | 'delete' | 'no-op';

export interface ResourceTypeCounts {
  total: number;
  create: number;
  update: number;
  delete: number;
  'no-op': number;
}

/**
 * Per-type counts in first-seen order. Wraps a private copy of the entries and
 * exposes only the read side of a Map, so a summary's breakdown cannot be
 * changed after aggregation.
 */
export class ResourceBreakdown implements ReadonlyMap<string, Readonly<ResourceTypeCounts>> {
  private readonly entriesByType: Map<string, Readonly<ResourceTypeCounts>>;

  constructor(entries: Iterable<readonly [string, ResourceTypeCounts]> = []) {
    this.entriesByType = new Map();
    for (const [type, counts] of entries) {
      this.entriesByType.set(type, Object.freeze({ ...counts }));
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByType.size;
  }

  get(resourceType: string): Readonly<ResourceTypeCounts> | undefined {
    return this.entriesByType.get(resourceType);
  }

  has(resourceType: string): boolean {
    return this.entriesByType.has(resourceType);
  }

  forEach(
    callback: (value: Readonly<ResourceTypeCounts>, key: string, map: ReadonlyMap<string, Readonly<ResourceTypeCounts>>) => void,
    thisArg?: unknown,
  ): void {
    for (const [key, value] of this.entriesByType) {
      callback.call(thisArg, value, key, this);
    }
  }

  entries() {
    return this.entriesByType.entries();
  }

  keys() {
    return this.entriesByType.keys();
  }

  values() {
    return this.entriesByType.values();
  }

  [Symbol.iterator]() {
    return this.entriesByType.entries();
  }
}

export interface PlanSummary {
  readonly totalResources: number;
  readonly resourcesToCreate: number;
  readonly resourcesToUpdate: number;
  readonly resourcesToDelete: number;
  readonly resourcesNoChange: number;
  /** Keyed by resource type, in first-seen order */
  readonly resourceBreakdown: ResourceBreakdown;
  readonly impactAnalysis: Readonly<Record<ImpactLevel, number>>;
  readonly changes: readonly PlanChange[];
}
