/**
 * Class-level patches and their deterministic merge.
 *
 * Merge rule for two patches on the same selector (earlier, later):
 * - adds are a strict union
 * - removes are applied after adds, so an earlier add removed later ends up removed
 * - a later add cancels an earlier remove of the same class
 */

export interface Patch {
  readonly selector: string;
  readonly classesToAdd: ReadonlySet<string>;
  readonly classesToRemove: ReadonlySet<string>;
  readonly rationale: string;
}

export interface PatchSet {
  /** One patch per selector, in ascending rule priority then insertion order. */
  readonly patches: readonly Patch[];
}

export interface PrioritizedPatch {
  readonly patch: Patch;
  readonly priority: number;
}

export function createPatch(input: {
  readonly selector: string;
  readonly add?: Iterable<string>;
  readonly remove?: Iterable<string>;
  readonly rationale: string;
}): Patch {
  return {
    selector: input.selector,
    classesToAdd: new Set(input.add ?? []),
    classesToRemove: new Set(input.remove ?? []),
    rationale: input.rationale,
  };
}

export const EMPTY_PATCH_SET: PatchSet = { patches: [] };

export function isEmptyPatchSet(set: PatchSet): boolean {
  return set.patches.length === 0;
}

export function mergePatches(earlier: Patch, later: Patch): Patch {
  const add = new Set([...earlier.classesToAdd, ...later.classesToAdd]);
  const remove = new Set<string>();
  for (const cls of earlier.classesToRemove) {
    if (!later.classesToAdd.has(cls)) remove.add(cls);
  }
  for (const cls of later.classesToRemove) remove.add(cls);

  return {
    selector: earlier.selector,
    classesToAdd: add,
    classesToRemove: remove,
    rationale: joinRationale(earlier.rationale, later.rationale),
  };
}

/**
 * Orders by priority (stable on insertion order) and folds same-selector patches
 * into the position of their first occurrence.
 */
export function buildPatchSet(entries: readonly PrioritizedPatch[]): PatchSet {
  const ordered = entries
    .map((entry, index) => ({ ...entry, index }))
    .sort((a, b) => a.priority - b.priority || a.index - b.index);

  const bySelector = new Map<string, Patch>();
  for (const { patch } of ordered) {
    const existing = bySelector.get(patch.selector);
    bySelector.set(patch.selector, existing ? mergePatches(existing, patch) : patch);
  }

  // Map iteration order is first-insertion order, which is the sorted order above.
  return { patches: [...bySelector.values()] };
}

/** Appends `later` after `earlier`, as if every later patch had a higher priority. */
export function concatPatchSets(earlier: PatchSet, later: PatchSet): PatchSet {
  return buildPatchSet([
    ...earlier.patches.map((patch) => ({ patch, priority: 0 })),
    ...later.patches.map((patch) => ({ patch, priority: 1 })),
  ]);
}

/** Result of applying one patch to an existing class list, order preserved. */
export function applyPatchToClasses(existing: readonly string[], patch: Patch): string[] {
  const next = [...existing];
  for (const cls of patch.classesToAdd) {
    if (!next.includes(cls)) next.push(cls);
  }
  return next.filter((cls) => !patch.classesToRemove.has(cls));
}

export function describePatch(patch: Patch): string {
  const parts: string[] = [];
  if (patch.classesToAdd.size > 0) parts.push(`+[${[...patch.classesToAdd].join(' ')}]`);
  if (patch.classesToRemove.size > 0) parts.push(`-[${[...patch.classesToRemove].join(' ')}]`);
  return `${patch.selector} ${parts.join(' ') || '(no-op)'}`;
}

function joinRationale(a: string, b: string): string {
  if (a === b || b.length === 0) return a;
  if (a.length === 0) return b;
  return `${a}; ${b}`;
}

const CLASS_TOKEN = /^[^\s"'<>`]+$/;

/** A class token that can be written into a double- or single-quoted attribute unchanged. */
export function isValidClassToken(token: string): boolean {
  return CLASS_TOKEN.test(token);
}
