import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Patch, PatchSet } from './patch-set.js';
import { buildPatchSet, createPatch } from './patch-set.js';

/**
 * Wire shape for patches proposed by an external fixer.
 * Sets travel as arrays; ordering of the proposal is preserved.
 */
export const PatchInputSchema = z.object({
  selector: z.string().trim().min(1, 'selector must not be empty'),
  add: z.array(z.string().min(1)).default([]),
  remove: z.array(z.string().min(1)).default([]),
  rationale: z.string().default(''),
});

export type PatchInput = z.input<typeof PatchInputSchema>;

export const PatchProposalSchema = z.array(PatchInputSchema).max(200, 'proposal exceeds 200 patches');

/** Returns the proposal as a PatchSet, or the schema issues as `path: message` lines. */
export function parsePatchProposal(value: unknown): Result<PatchSet, readonly string[]> {
  const parsed = PatchProposalSchema.safeParse(value);
  if (!parsed.success) {
    return err(parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }

  const patches: Patch[] = parsed.data.map((input) =>
    createPatch({ selector: input.selector, add: input.add, remove: input.remove, rationale: input.rationale }),
  );
  return ok(buildPatchSet(patches.map((patch) => ({ patch, priority: 0 }))));
}

export function toPatchInput(patch: Patch): z.output<typeof PatchInputSchema> {
  return {
    selector: patch.selector,
    add: [...patch.classesToAdd],
    remove: [...patch.classesToRemove],
    rationale: patch.rationale,
  };
}
