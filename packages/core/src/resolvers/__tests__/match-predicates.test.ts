import { describe, it, expect } from 'vitest';
import { createProjectPredicates, exactName, firstContaining, pickUnique, shallowestPath } from '../match-predicates.js';

const identity = (value: string) => value;

describe('pickUnique', () => {
  it('short-circuits a single candidate', () => {
    expect(pickUnique(['only'], [])).toEqual({ winner: 'only', predicate: 'single', heuristic: false });
  });

  it('uses the first predicate that leaves exactly one candidate', () => {
    const outcome = pickUnique(['alpha', 'alphabet', 'beta'], [exactName('ALPHA', identity), firstContaining('b', identity)]);
    expect(outcome).toEqual({ winner: 'alpha', predicate: 'exact', heuristic: false });
  });

  it('applies every predicate to the full candidate set', () => {
    const outcome = pickUnique(['a/x', 'a/x', 'b'], [exactName('a/x', identity), firstContaining('b', identity)]);
    expect(outcome.winner).toBe('b');
    expect(outcome.predicate).toBe('contains');
  });

  it('returns no winner when nothing narrows to one', () => {
    expect(pickUnique(['a', 'b'], [exactName('c', identity)])).toEqual({ heuristic: false });
    expect(pickUnique([], [shallowestPath()])).toEqual({ heuristic: false });
  });

  it('flags heuristic picks', () => {
    const outcome = pickUnique(['/w/b/c/P.csproj', '/w/a/P.csproj'], [shallowestPath()]);
    expect(outcome).toEqual({ winner: '/w/a/P.csproj', predicate: 'shallowest', heuristic: true });
  });
});

describe('createProjectPredicates', () => {
  it('skips the prefixed rule without a namespace prefix', () => {
    const names = createProjectPredicates([{ kind: 'exact' }, { kind: 'prefixed' }, { kind: 'shallowest' }], 'P', '')
      .map((predicate) => predicate.name);
    expect(names).toEqual(['exact', 'shallowest']);
  });

  it('keeps the configured order', () => {
    const names = createProjectPredicates(
      [{ kind: 'shallowest' }, { kind: 'glob', pattern: '{pattern}*' }, { kind: 'prefixed' }],
      'Api',
      'Kernel.'
    ).map((predicate) => predicate.name);
    expect(names).toEqual(['shallowest', 'glob:Api*', 'prefixed']);
  });
});
