import type { GenerativeFixerPort, GenerativeProposal, GenerativeRequest } from '../../src/ports/generative-fixer.port.js';
import type { PatchInput } from '../../src/domain/patches/patch-schema.js';

/**
 * Returns scripted proposals in order (the last one repeats) and records requests.
 * A proposal of `null` makes the call reject.
 */
export class ScriptedGenerativeFixer implements GenerativeFixerPort {
  readonly requests: GenerativeRequest[] = [];

  constructor(private readonly proposals: readonly (GenerativeProposal | null)[] = [{ patches: [] }]) {}

  get calls(): number {
    return this.requests.length;
  }

  propose(request: GenerativeRequest): Promise<GenerativeProposal> {
    const proposal = this.proposals[Math.min(this.requests.length, this.proposals.length - 1)];
    this.requests.push(request);
    if (proposal === undefined || proposal === null) {
      return Promise.reject(new Error('generative backend unavailable'));
    }
    return Promise.resolve(proposal);
  }
}

export function proposal(patches: readonly PatchInput[], usage?: GenerativeProposal['usage']): GenerativeProposal {
  return usage ? { patches, usage } : { patches };
}
