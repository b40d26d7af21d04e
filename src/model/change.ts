export type ChangeAction = 'create' | 'update' | 'delete' | 'no-op' | 'read';

export type ImpactLevel = 'low' | 'medium' | 'high';

export const CHANGE_ACTIONS: readonly ChangeAction[] = ['create', 'update', 'delete', 'no-op', 'read'];

export const IMPACT_LEVELS: readonly ImpactLevel[] = ['high', 'medium', 'low'];

/** Severity rank; only used for recommendations and the minimum-impact filter. */
export const IMPACT_SEVERITY: Readonly<Record<ImpactLevel, number>> = {
  low: 1,
  medium: 2,
  high: 3,
};

export type FieldSnapshot = Readonly<Record<string, unknown>>;

export interface PlanChange {
  readonly address: string;
  readonly resourceType: string;
  /** Everything after the first dot, e.g. "private.0" for "aws_subnet.private.0" */
  readonly resourceName: string;
  readonly action: ChangeAction;
  readonly impactLevel: ImpactLevel;
  readonly fieldsBefore: FieldSnapshot | null;
  readonly fieldsAfter: FieldSnapshot | null;
  readonly fieldsAfterOrEmpty: FieldSnapshot;
  readonly replacementFields?: readonly string[];
}

export function isChangeAction(value: string): value is ChangeAction {
  return CHANGE_ACTIONS.some(action => action === value);
}

export function isImpactLevel(value: string): value is ImpactLevel {
  return IMPACT_LEVELS.some(level => level === value);
}
