import type { ChangeAction, ImpactLevel, PlanChange } from '../model/change.js';
import type { RawChange, RawResourceChange } from './schema.js';

export interface ActionClassification {
  action: ChangeAction;
  impactLevel: ImpactLevel;
}

export interface ParsedAddress {
  resourceType: string;
  resourceName: string;
}

/**
 * Canonical action by fixed priority: delete > create > update > read > no-op.
 * The position of a tag in the raw list never matters, so a replacement
 * (["create","delete"] or ["delete","create"]) resolves to delete.
 */
export function resolveAction(actions: readonly string[]): ChangeAction {
  if (actions.includes('delete')) return 'delete';
  if (actions.includes('create')) return 'create';
  if (actions.includes('update')) return 'update';
  if (actions.includes('read')) return 'read';
  return 'no-op';
}

/** Impact follows the resolved action; only an update looks back at the raw tags. */
export function resolveImpact(action: ChangeAction, actions: readonly string[]): ImpactLevel {
  switch (action) {
    case 'delete':
      return 'high';
    case 'update':
      return actions.includes('replace') ? 'high' : 'medium';
    case 'create':
    case 'read':
    case 'no-op':
      return 'low';
  }
}

/** Single pass over the raw tags so action and impact cannot disagree. */
export function classifyActions(actions: readonly string[]): ActionClassification {
  const action = resolveAction(actions);
  return { action, impactLevel: resolveImpact(action, actions) };
}

export function parseAddress(address: string): ParsedAddress {
  const dot = address.indexOf('.');
  if (dot === -1) {
    return { resourceType: address, resourceName: address };
  }
  return {
    resourceType: address.slice(0, dot),
    resourceName: address.slice(dot + 1),
  };
}

function replacementFields(change: RawChange): string[] | undefined {
  if (change.replace) return [...change.replace];
  if (change.replace_paths) {
    return change.replace_paths.map(path => path.map(step => String(step)).join('.'));
  }
  return undefined;
}

export function normalizeChange(raw: RawResourceChange): PlanChange {
  const address = raw.address ?? '';
  const change: RawChange = raw.change ?? {};
  const { action, impactLevel } = classifyActions(change.actions ?? []);
  const { resourceType, resourceName } = parseAddress(address);
  const fieldsAfter = change.after ?? null;

  const normalized: PlanChange = {
    address,
    resourceType,
    resourceName,
    action,
    impactLevel,
    fieldsBefore: change.before ?? null,
    fieldsAfter,
    fieldsAfterOrEmpty: fieldsAfter ?? {},
  };

  const replaced = replacementFields(change);
  return Object.freeze(replaced ? { ...normalized, replacementFields: replaced } : normalized);
}
