import { describe, it, expect } from 'vitest';
import { find, findExisting, findPath } from '../find';
import { MissingPathError } from '../errors';

const data = {
  repository: {
    id: 'R_test1',
    ref: null,
    pullRequests: {
      pageInfo: { hasNextPage: false, endCursor: 'c1' },
      nodes: []
    },
    'dotted.key': 'literal'
  }
};

describe('findPath', () => {
  it('should return the deepest value when every segment exists', () => {
    expect(findPath('repository.pullRequests.pageInfo.endCursor', data)).toEqual({
      found: true,
      value: 'c1'
    });
  });

  it('should return falsy leaf values as found', () => {
    expect(findPath('repository.pullRequests.pageInfo.hasNextPage', data)).toEqual({
      found: true,
      value: false
    });
    expect(findPath('repository.pullRequests.nodes', data)).toEqual({ found: true, value: [] });
  });

  it('should distinguish a null relation from an absent key', () => {
    expect(findPath('repository.ref.target.oid', data)).toEqual({
      found: false,
      reason: 'null',
      at: 'ref'
    });
    expect(findPath('repository.owner.login', data)).toEqual({
      found: false,
      reason: 'absent',
      at: 'owner'
    });
  });

  it('should treat a non-object intermediate as absent', () => {
    expect(findPath('repository.id.length', data)).toEqual({
      found: false,
      reason: 'absent',
      at: 'length'
    });
  });

  it('should match keys literally', () => {
    expect(findPath('repository.dotted', data)).toEqual({
      found: false,
      reason: 'absent',
      at: 'dotted'
    });
  });
});

describe('find', () => {
  it('should return the value or undefined', () => {
    expect(find('repository.id', data)).toBe('R_test1');
    expect(find('repository.ref.target', data)).toBeUndefined();
    expect(find('nothing', null)).toBeUndefined();
  });
});

describe('findExisting', () => {
  it('should return the value when present', () => {
    expect(findExisting('repository.pullRequests.pageInfo', data)).toEqual({
      hasNextPage: false,
      endCursor: 'c1'
    });
  });

  it('should throw MissingPathError naming the path', () => {
    expect(() => findExisting('repository.ref.target.oid', data)).toThrow(MissingPathError);
    expect(() => findExisting('repository.ref.target.oid', data)).toThrow(
      "Expected path 'repository.ref.target.oid' is missing (stopped at 'ref')"
    );
  });
});
