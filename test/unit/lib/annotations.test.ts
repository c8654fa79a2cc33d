import { describe, it, expect } from '@jest/globals';
import {
  changedAnnotationKeys,
  containsAnnotations,
  mergeAnnotations,
} from '../../../src/lib/annotations';

describe('mergeAnnotations', () => {
  const existing = { owner: 'team-a', 'deployment.kubernetes.io/int': '1' };
  const incoming = { 'deployment.kubernetes.io/int': '5', 'deployment.kubernetes.io/str': 'nginx' };

  it('lets incoming values win and keeps unrelated existing keys', () => {
    expect(mergeAnnotations(existing, incoming)).toEqual({
      owner: 'team-a',
      'deployment.kubernetes.io/int': '5',
      'deployment.kubernetes.io/str': 'nginx',
    });
  });

  it('is idempotent when the same annotations are applied again', () => {
    const once = mergeAnnotations(existing, incoming);
    expect(mergeAnnotations(once, incoming)).toEqual(once);
  });

  it('treats missing existing annotations as empty', () => {
    expect(mergeAnnotations(undefined, { a: '1' })).toEqual({ a: '1' });
  });

  it('does not mutate its inputs', () => {
    const before = { ...existing };
    const result = mergeAnnotations(existing, incoming);
    expect(existing).toEqual(before);
    expect(result).not.toBe(existing);
    expect(result).not.toBe(incoming);
  });
});

describe('containsAnnotations', () => {
  it('requires every expected key with the same value', () => {
    expect(containsAnnotations({ a: '1', b: '2' }, { a: '1' })).toBe(true);
    expect(containsAnnotations({ a: '1' }, { a: '2' })).toBe(false);
    expect(containsAnnotations({}, { a: '1' })).toBe(false);
    expect(containsAnnotations({ a: '1' }, {})).toBe(true);
  });
});

describe('changedAnnotationKeys', () => {
  it('lists added and changed keys only', () => {
    expect(changedAnnotationKeys({ a: '1', b: '2' }, { a: '1', b: '3', c: '4' })).toEqual(['b', 'c']);
  });
});
