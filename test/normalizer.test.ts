import { describe, it, expect } from 'vitest';
import {
  classifyActions,
  normalizeChange,
  parseAddress,
  resolveAction,
  resolveImpact,
} from '../src/plan/normalizer.js';

describe('resolveAction', () => {
  it('maps single tags to their action', () => {
    expect(resolveAction(['delete'])).toBe('delete');
    expect(resolveAction(['create'])).toBe('create');
    expect(resolveAction(['update'])).toBe('update');
    expect(resolveAction(['read'])).toBe('read');
    expect(resolveAction(['no-op'])).toBe('no-op');
  });

  it('uses priority, not position, when several tags are present', () => {
    expect(resolveAction(['create', 'delete'])).toBe('delete');
    expect(resolveAction(['delete', 'create'])).toBe('delete');
    expect(resolveAction(['update', 'create'])).toBe('create');
    expect(resolveAction(['read', 'update'])).toBe('update');
  });

  it('falls back to no-op for empty or unknown tags', () => {
    expect(resolveAction([])).toBe('no-op');
    expect(resolveAction(['forget'])).toBe('no-op');
  });
});

describe('resolveImpact', () => {
  it('rates deletions high and creations low', () => {
    expect(resolveImpact('delete', ['delete'])).toBe('high');
    expect(resolveImpact('create', ['create'])).toBe('low');
  });

  it('rates updates medium unless a replace tag is present', () => {
    expect(resolveImpact('update', ['update'])).toBe('medium');
    expect(resolveImpact('update', ['update', 'replace'])).toBe('high');
  });

  it('rates reads and no-ops low', () => {
    expect(resolveImpact('read', ['read'])).toBe('low');
    expect(resolveImpact('no-op', [])).toBe('low');
  });
});

describe('classifyActions', () => {
  it('resolves a replacement to a high impact delete', () => {
    expect(classifyActions(['create', 'delete'])).toEqual({ action: 'delete', impactLevel: 'high' });
  });

  it('ignores replace when create outranks update', () => {
    expect(classifyActions(['update', 'create', 'replace'])).toEqual({ action: 'create', impactLevel: 'low' });
  });
});

describe('parseAddress', () => {
  it('splits on the first dot', () => {
    expect(parseAddress('aws_instance.web')).toEqual({ resourceType: 'aws_instance', resourceName: 'web' });
  });

  it('keeps further dots in the name', () => {
    expect(parseAddress('aws_subnet.private.0')).toEqual({ resourceType: 'aws_subnet', resourceName: 'private.0' });
  });

  it('passes through an address without a dot', () => {
    expect(parseAddress('invalid')).toEqual({ resourceType: 'invalid', resourceName: 'invalid' });
    expect(parseAddress('')).toEqual({ resourceType: '', resourceName: '' });
  });
});

describe('normalizeChange', () => {
  it('builds a change from a create record', () => {
    const change = normalizeChange({
      address: 'aws_instance.web',
      change: { actions: ['create'], before: null, after: { instance_type: 't3.micro' } },
    });

    expect(change).toEqual({
      address: 'aws_instance.web',
      resourceType: 'aws_instance',
      resourceName: 'web',
      action: 'create',
      impactLevel: 'low',
      fieldsBefore: null,
      fieldsAfter: { instance_type: 't3.micro' },
      fieldsAfterOrEmpty: { instance_type: 't3.micro' },
    });
  });

  it('defaults the after snapshot to an empty object for deletions', () => {
    const change = normalizeChange({
      address: 'aws_instance.old',
      change: { actions: ['delete'], before: { instance_type: 't2.micro' }, after: null },
    });

    expect(change.fieldsAfter).toBeNull();
    expect(change.fieldsAfterOrEmpty).toEqual({});
    expect(change.fieldsBefore).toEqual({ instance_type: 't2.micro' });
    expect(change.impactLevel).toBe('high');
  });

  it('tolerates a record with no address and no change', () => {
    const change = normalizeChange({});

    expect(change.address).toBe('');
    expect(change.resourceType).toBe('');
    expect(change.resourceName).toBe('');
    expect(change.action).toBe('no-op');
    expect(change.impactLevel).toBe('low');
    expect(change.fieldsBefore).toBeNull();
    expect(change.replacementFields).toBeUndefined();
  });

  it('keeps replacement fields from replace', () => {
    const change = normalizeChange({
      address: 'aws_db_instance.main',
      change: { actions: ['delete', 'create'], replace: ['engine_version'], replace_paths: [['identifier']] },
    });
    expect(change.replacementFields).toEqual(['engine_version']);
  });

  it('joins replace_paths into field names', () => {
    const change = normalizeChange({
      address: 'aws_launch_template.app',
      change: { actions: ['delete', 'create'], replace_paths: [['block_device_mappings', 0, 'ebs'], ['image_id']] },
    });
    expect(change.replacementFields).toEqual(['block_device_mappings.0.ebs', 'image_id']);
  });

  it('returns a frozen value', () => {
    const change = normalizeChange({ address: 'null_resource.x', change: { actions: ['no-op'] } });
    expect(Object.isFrozen(change)).toBe(true);
  });
});
