import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  applyPatchToClasses,
  buildPatchSet,
  concatPatchSets,
  createPatch,
  describePatch,
  isValidClassToken,
  mergePatches,
} from '../../../src/domain/patches/patch-set.js';
import { parsePatchProposal, toPatchInput } from '../../../src/domain/patches/patch-schema.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const TOKENS = ['a', 'b', 'c', 'd', 'e', 'z-10', 'relative'];

describe('mergePatches', () => {
  it('unions adds and lets a later add cancel an earlier remove', () => {
    const earlier = createPatch({ selector: '#x', add: ['a', 'b'], remove: ['c'], rationale: 'first' });
    const later = createPatch({ selector: '#x', add: ['c'], remove: ['b'], rationale: 'second' });

    const merged = mergePatches(earlier, later);

    expect([...merged.classesToAdd]).toEqual(['a', 'b', 'c']);
    expect([...merged.classesToRemove]).toEqual(['b']);
    expect(merged.rationale).toBe('first; second');
  });

  it('keeps a single rationale when both patches share it', () => {
    const p = createPatch({ selector: '#x', add: ['a'], rationale: 'same' });
    expect(mergePatches(p, p).rationale).toBe('same');
  });

  it('has the same effect as applying both patches in order', () => {
    fc.assert(
      fc.property(
        fc.subarray(TOKENS),
        fc.subarray(TOKENS),
        fc.subarray(TOKENS),
        fc.subarray(TOKENS),
        fc.subarray(TOKENS),
        (existing, addA, removeA, addB, removeB) => {
          const earlier = createPatch({ selector: '#x', add: addA, remove: removeA, rationale: '' });
          const later = createPatch({ selector: '#x', add: addB, remove: removeB, rationale: '' });

          const sequential = applyPatchToClasses(applyPatchToClasses(existing, earlier), later);
          const merged = applyPatchToClasses(existing, mergePatches(earlier, later));

          expect([...merged].sort()).toEqual([...sequential].sort());
        },
      ),
    );
  });

  it('never loses an add that no patch removes', () => {
    fc.assert(
      fc.property(fc.subarray(TOKENS), fc.subarray(TOKENS), (addA, addB) => {
        const merged = mergePatches(
          createPatch({ selector: '#x', add: addA, rationale: '' }),
          createPatch({ selector: '#x', add: addB, rationale: '' }),
        );
        for (const cls of [...addA, ...addB]) expect(merged.classesToAdd.has(cls)).toBe(true);
        expect(merged.classesToRemove.size).toBe(0);
      }),
    );
  });
});

describe('buildPatchSet', () => {
  it('orders by priority and folds same-selector patches at their first position', () => {
    const set = buildPatchSet([
      { patch: createPatch({ selector: '#b', add: ['z-10'], rationale: 'layer' }), priority: 20 },
      { patch: createPatch({ selector: '#a', add: ['block'], rationale: 'show' }), priority: 5 },
      { patch: createPatch({ selector: '#b', add: ['relative'], rationale: 'position' }), priority: 10 },
    ]);

    expect(set.patches.map((p) => p.selector)).toEqual(['#a', '#b']);
    const b = set.patches[1];
    expect(b && [...b.classesToAdd]).toEqual(['relative', 'z-10']);
    expect(b?.rationale).toBe('position; layer');
  });

  it('keeps insertion order for equal priorities', () => {
    const set = buildPatchSet([
      { patch: createPatch({ selector: '#second', add: ['a'], rationale: '' }), priority: 1 },
      { patch: createPatch({ selector: '#first', add: ['a'], rationale: '' }), priority: 1 },
    ]);
    expect(set.patches.map((p) => p.selector)).toEqual(['#second', '#first']);
  });

  it('concatenates sets with the later set taking precedence', () => {
    const earlier = buildPatchSet([{ patch: createPatch({ selector: '#x', add: ['hidden'], rationale: '' }), priority: 50 }]);
    const later = buildPatchSet([{ patch: createPatch({ selector: '#x', remove: ['hidden'], rationale: '' }), priority: 1 }]);

    const combined = concatPatchSets(earlier, later);
    expect(applyPatchToClasses(['p-2'], combined.patches[0] ?? createPatch({ selector: '', rationale: '' }))).toEqual(['p-2']);
  });
});

describe('applyPatchToClasses', () => {
  it('appends missing adds in order, then drops removes', () => {
    const patch = createPatch({ selector: '#x', add: ['opacity-100', 'p-2'], remove: ['opacity-0'], rationale: '' });
    expect(applyPatchToClasses(['p-2', 'opacity-0', 'text-sm'], patch)).toEqual(['p-2', 'text-sm', 'opacity-100']);
  });
});

describe('describePatch', () => {
  it('lists adds and removes', () => {
    expect(describePatch(createPatch({ selector: '#a', add: ['block'], remove: ['hidden'], rationale: '' }))).toBe(
      '#a +[block] -[hidden]',
    );
    expect(describePatch(createPatch({ selector: '#a', rationale: '' }))).toBe('#a (no-op)');
  });
});

describe('isValidClassToken', () => {
  it.each([
    ['hover:bg-red-500', true],
    ['[transform-style:preserve-3d]', true],
    ['bg-black/50', true],
    ['two words', false],
    ['quo"te', false],
    ['<script>', false],
    ['', false],
  ])('%s -> %s', (token, expected) => {
    expect(isValidClassToken(token)).toBe(expected);
  });
});

describe('parsePatchProposal', () => {
  it('parses and merges a well-formed proposal', () => {
    const set = expectOk(
      parsePatchProposal([
        { selector: '#go', add: ['ring-2'], rationale: 'focus ring' },
        { selector: '#go', remove: ['opacity-50'] },
      ]),
      'parsing proposal',
    );

    expect(set.patches).toHaveLength(1);
    expect(set.patches.map(toPatchInput)).toEqual([
      { selector: '#go', add: ['ring-2'], remove: ['opacity-50'], rationale: 'focus ring' },
    ]);
  });

  it('reports schema issues by path', () => {
    const issues = expectErr(parsePatchProposal([{ selector: '  ', add: ['x'] }]), 'parsing proposal');
    expect(issues).toEqual(['0.selector: selector must not be empty']);
  });

  it('rejects a non-array proposal', () => {
    const issues = expectErr(parsePatchProposal({ selector: '#a' }), 'parsing proposal');
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith('(root): ')).toBe(true);
  });
});
