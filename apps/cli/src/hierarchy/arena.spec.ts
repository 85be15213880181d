import { HierarchyCycleError, ObjectNotFoundError } from '../platform/errors';
import { HierarchyArena } from './arena';

function arenaOf(...keys: string[]): HierarchyArena<string> {
  const arena = new HierarchyArena<string>();
  for (const key of keys) arena.add(key, key.toUpperCase());
  return arena;
}

describe('HierarchyArena', () => {
  it('should track owning parents, children and roots', () => {
    const arena = arenaOf('root', 'a', 'b', 'shared');
    arena.link('root', 'a');
    arena.link('a', 'b');
    arena.link('root', 'shared', 'reference');

    expect(arena.parentOf('b')).toBe('a');
    expect(arena.parentOf('shared')).toBeUndefined();
    expect(arena.childrenOf('root')).toEqual([
      { parent: 'root', child: 'a', kind: 'owned' },
      { parent: 'root', child: 'shared', kind: 'reference' },
    ]);
    expect(arena.roots()).toEqual(['root', 'shared']);
  });

  it('should reject a link closing a cycle and name the chain', () => {
    const arena = arenaOf('a', 'b', 'c');
    arena.link('a', 'b');
    arena.link('b', 'c');

    expect(() => arena.link('c', 'a')).toThrow(new HierarchyCycleError(['c', 'a', 'b', 'c']));
    expect(() => arena.link('a', 'a')).toThrow(HierarchyCycleError);
    expect(() => arena.link('c', 'a', 'reference')).toThrow(HierarchyCycleError);
    expect(arena.childrenOf('c')).toEqual([]);
  });

  it('should refuse links to unknown nodes', () => {
    const arena = arenaOf('a');
    expect(() => arena.link('a', 'ghost')).toThrow(ObjectNotFoundError);
  });

  it('should move a node when it gets a new owning parent', () => {
    const arena = arenaOf('p1', 'p2', 'child');
    arena.link('p1', 'child');
    arena.link('p2', 'child');

    expect(arena.parentOf('child')).toBe('p2');
    expect(arena.childrenOf('p1')).toEqual([]);
  });

  it('should list the owned subtree parents first', () => {
    const arena = arenaOf('root', 'a', 'a1', 'b', 'ref');
    arena.link('root', 'a');
    arena.link('a', 'a1');
    arena.link('root', 'b');
    arena.link('b', 'ref', 'reference');

    expect(arena.ownedSubtree('root')).toEqual(['root', 'a', 'a1', 'b']);
  });

  it('should delete the owned subtree but keep referenced nodes', () => {
    const arena = arenaOf('root', 'owned', 'grandchild', 'referenced', 'other');
    arena.link('root', 'owned');
    arena.link('owned', 'grandchild');
    arena.link('root', 'referenced', 'reference');
    arena.link('other', 'referenced', 'reference');

    expect(arena.remove('root')).toEqual(['root', 'owned', 'grandchild']);
    expect(arena.keys().sort()).toEqual(['other', 'referenced']);
    expect(arena.childrenOf('other')).toEqual([{ parent: 'other', child: 'referenced', kind: 'reference' }]);
    expect(arena.remove('root')).toEqual([]);
  });

  it('should unlink a deleted node from its owner', () => {
    const arena = arenaOf('root', 'child');
    arena.link('root', 'child');

    arena.remove('child');

    expect(arena.childrenOf('root')).toEqual([]);
    expect(arena.keys()).toEqual(['root']);
  });
});
