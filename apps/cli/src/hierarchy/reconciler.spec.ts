import type { RuleSet } from '@sqconf/types';
import { createLogger, LogEntry, setLogHandler, resetLogHandler } from '../logger';
import {
  applyMemberDiff,
  applyRuleDiff,
  diffMembers,
  diffRules,
  flatten,
  hierarchize,
  isEmptyRuleDiff,
  sameActivation,
} from './reconciler';

interface Item {
  key: string;
  parent?: string;
}

const keyOf = (item: Item) => item.key;
const parentOf = (item: Item) => item.parent;

describe('hierarchize', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => resetLogHandler());

  it('should nest children under their parents', () => {
    const forest = hierarchize<Item>(
      [{ key: 'child', parent: 'root' }, { key: 'root' }, { key: 'grandchild', parent: 'child' }],
      keyOf,
      parentOf
    );

    expect(forest).toHaveLength(1);
    expect(forest[0].key).toBe('root');
    expect(forest[0].children.map((c) => c.key)).toEqual(['child']);
    expect(forest[0].children[0].children.map((c) => c.key)).toEqual(['grandchild']);
  });

  it('should keep an element with an unknown parent as a root and log it', () => {
    const forest = hierarchize<Item>([{ key: 'orphan', parent: 'missing' }], keyOf, parentOf, createLogger());

    expect(forest.map((n) => n.key)).toEqual(['orphan']);
    expect(entries.map((e) => e.message)).toEqual(["Parent 'missing' of 'orphan' not found, treating it as a root"]);
  });

  it('should break cycles by keeping the closing element as a root', () => {
    const forest = hierarchize<Item>(
      [
        { key: 'a', parent: 'b' },
        { key: 'b', parent: 'a' },
      ],
      keyOf,
      parentOf,
      createLogger()
    );

    expect(forest.map((n) => n.key)).toEqual(['b']);
    expect(forest[0].children.map((c) => c.key)).toEqual(['a']);
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe("Hierarchy cycle detected: a -> b -> a, treating 'b' as a root");
  });

  it('should be undone by flatten', () => {
    const flat: Item[] = [{ key: 'root' }, { key: 'a', parent: 'root' }, { key: 'b', parent: 'a' }];
    const forest = hierarchize(flat, keyOf, parentOf);

    const restored = flatten(forest, (value, parent) => ({ key: value.key, ...(parent ? { parent } : {}) }));

    expect(restored).toEqual(flat);
  });
});

describe('rule diffs', () => {
  const parent: RuleSet = {
    'java:S1': { severity: 'MAJOR' },
    'java:S2': { severity: 'MINOR', params: { max: '10' } },
    'java:S3': { severity: 'INFO' },
  };
  const child: RuleSet = {
    'java:S1': { severity: 'MAJOR' },
    'java:S2': { severity: 'MINOR', params: { max: '20' } },
    'java:S4': { severity: 'BLOCKER' },
  };

  it('should list added, modified and removed rules', () => {
    expect(diffRules(child, parent)).toEqual({
      added: { 'java:S4': { severity: 'BLOCKER' } },
      modified: { 'java:S2': { severity: 'MINOR', params: { max: '20' } } },
      removed: ['java:S3'],
    });
  });

  it('should rebuild the child from the parent and the diff', () => {
    expect(applyRuleDiff(parent, diffRules(child, parent))).toEqual(child);
  });

  it('should find no difference between identical sets', () => {
    expect(isEmptyRuleDiff(diffRules(parent, parent))).toBe(true);
  });

  it('should compare severities and parameters', () => {
    expect(sameActivation({ severity: 'MAJOR' }, { severity: 'MAJOR', params: {} })).toBe(true);
    expect(sameActivation({ severity: 'MAJOR' }, { severity: 'MINOR' })).toBe(false);
    expect(sameActivation({ severity: 'MAJOR', params: { a: '1' } }, { severity: 'MAJOR', params: { a: '2' } })).toBe(
      false
    );
  });
});

describe('member diffs', () => {
  it('should compute and apply set differences', () => {
    const diff = diffMembers(['p1', 'p3', 'p4'], ['p1', 'p2']);

    expect(diff).toEqual({ added: ['p3', 'p4'], removed: ['p2'] });
    expect(applyMemberDiff(['p1', 'p2'], diff)).toEqual(['p1', 'p3', 'p4']);
  });
});
