import { describe, it, expect } from 'vitest';
import { Classifier } from '../../../src/application/services/classifier.js';
import type { ClassifiedError } from '../../../src/domain/defects/classified-error.js';
import { defineRepairConfig } from '../../../src/config/app-config.js';
import type { InteractionReportInput } from '../../../src/domain/validation/interaction-report.js';
import { InteractionReportSchema } from '../../../src/domain/validation/interaction-report.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const config = expectOk(defineRepairConfig(), 'default config');
const classifier = new Classifier();

function classify(markup: string, report: InteractionReportInput | null = null): readonly ClassifiedError[] {
  const parsed = report === null ? null : InteractionReportSchema.parse(report);
  return expectOk(classifier.classify(markup, parsed, config), 'classify');
}

function summary(errors: readonly ClassifiedError[]): string[] {
  return errors.map((e) => `${e.kind.kind}@${e.selector}`);
}

describe('Classifier', () => {
  describe('input guards', () => {
    it('rejects empty and whitespace-only documents', () => {
      expect(expectErr(classifier.classify('', null, config), 'classify').code).toBe('EMPTY_DOCUMENT');
      expect(expectErr(classifier.classify(' \n ', null, config), 'classify').code).toBe('EMPTY_DOCUMENT');
    });

    it('rejects documents over the byte limit', () => {
      const small = expectOk(defineRepairConfig({ maxDocumentBytes: 10 }), 'config');
      const error = expectErr(classifier.classify('<p>0123456789</p>', null, small), 'classify');
      expect(error).toEqual({ code: 'DOCUMENT_TOO_LARGE', message: 'Document is 17 bytes; limit is 10' });
    });
  });

  describe('visibility', () => {
    it('reports each suppressing class with static confidence', () => {
      const errors = classify('<button id="a" class="opacity-0 hidden invisible">A</button>');

      expect(summary(errors)).toEqual(['invisible_opacity@#a', 'invisible_display@#a', 'invisible_visibility@#a']);
      expect(errors.every((e) => e.confidence === 0.8 && e.evidence === 'static' && !e.requiresGenerative)).toBe(true);
      expect(errors[0]?.style.opacity).toBe(0);
    });

    it('ignores variant-prefixed classes', () => {
      expect(classify('<button id="b" class="md:hidden hover:opacity-0">B</button>')).toEqual([]);
    });

    it('ignores content that is never rendered', () => {
      expect(classify('<template><button class="opacity-0">t</button></template>')).toEqual([]);
    });
  });

  describe('pointer routing', () => {
    const BLOCKED = [
      '<div class="relative">',
      '<button id="buy" class="relative z-10">Buy</button>',
      '<div id="veil" class="absolute inset-0 z-20 bg-black/50"></div>',
      '</div>',
    ].join('');

    it('attributes a covered element to the overlay above it', () => {
      const errors = classify(BLOCKED);

      expect(summary(errors)).toEqual(['pointer_blocked@#buy', 'decorative_overlay@#veil']);
      const [blocked, decorative] = errors;
      expect(blocked?.kind).toEqual({ family: 'pointer_routing', kind: 'pointer_blocked', blockerLayerIndex: 20, victim: null });
      expect(blocked?.blockingElement).toBe('#veil');
      expect(blocked?.rationale).toBe('Covered by an overlay at layer 20');
      expect(decorative?.kind).toEqual({
        family: 'pointer_routing',
        kind: 'decorative_overlay',
        blockerLayerIndex: 20,
        victim: '#buy',
      });
    });

    it('does not flag an overlay confined to another container', () => {
      expect(classify('<section class="relative"><div class="absolute inset-0"></div></section><button id="x">X</button>')).toEqual(
        [],
      );
    });

    it('does not flag a pass-through overlay', () => {
      expect(
        classify('<div class="relative"><button id="b">B</button><div class="absolute inset-0 z-50 pointer-events-none"></div></div>'),
      ).toEqual([]);
    });

    it('flags elements under an ancestor that disables pointer events', () => {
      expect(summary(classify('<div class="pointer-events-none"><a href="/x" id="lnk">x</a></div>'))).toEqual([
        'pointer_intercepted@#lnk',
      ]);
      expect(classify('<div class="pointer-events-none"><a href="/x" class="pointer-events-auto">x</a></div>')).toEqual([]);
    });
  });

  describe('stacking', () => {
    it('flags a positioned sibling that stacks above the element', () => {
      const errors = classify(
        '<div class="relative"><button id="b" class="relative">B</button><div class="absolute top-0 left-0 z-50">Menu</div></div>',
      );

      expect(summary(errors)).toEqual(['stacking_conflict@#b']);
      expect(errors[0]?.kind).toEqual({ family: 'stacking', kind: 'stacking_conflict', role: 'content', blockerLayerIndex: 50 });
      expect(errors[0]?.blockingElement).toBe('div.absolute.top-0.left-0');
    });

    it('flags a positioned element without a layer among layered siblings', () => {
      const errors = classify(
        '<div role="dialog" class="relative"><button id="m" class="absolute">M</button><span class="relative z-10">s</span></div>',
      );
      expect(errors.map((e) => e.kind)).toEqual([
        { family: 'stacking', kind: 'stacking_missing', role: 'dialog', blockerLayerIndex: null },
      ]);
    });
  });

  describe('spatial transforms', () => {
    it('flags a hidden backface when the container has no 3-D context', () => {
      const errors = classify(
        '<div class="group"><button id="card" class="rotate-y-180 [backface-visibility:hidden]">Flip</button></div>',
      );
      expect(errors.map((e) => e.kind)).toEqual([
        {
          family: 'spatial_transform',
          kind: 'transform_backface',
          offendingClasses: ['rotate-y-180', '[backface-visibility:hidden]'],
          container: 'div.group',
        },
      ]);
    });

    it('accepts a flipped face inside a preserve-3d container', () => {
      expect(
        classify(
          '<div class="[transform-style:preserve-3d]"><button class="rotate-y-180 [backface-visibility:hidden]">Flip</button></div>',
        ),
      ).toEqual([]);
    });

    it('flags off-screen translations only', () => {
      expect(summary(classify('<button id="off" class="-translate-x-full">x</button>'))).toEqual(['transform_offscreen@#off']);
      expect(classify('<button class="translate-x-4">x</button>')).toEqual([]);
    });
  });

  describe('scripts', () => {
    it('flags references to ids that do not exist, for the generative fixer', () => {
      const errors = classify(
        `<button id="go">Go</button><script>document.getElementById('status'); document.querySelector('#go');</script>`,
      );

      expect(summary(errors)).toEqual(['script_missing_reference@script']);
      expect(errors[0]?.kind).toEqual({ family: 'script_fault', kind: 'script_missing_reference', message: 'No element with id "status"' });
      expect(errors[0]?.requiresGenerative).toBe(true);
    });
  });

  describe('with an interaction report', () => {
    const failing = (selector: string, status: 'no_visual_change' | 'intercepted' | 'timeout' = 'no_visual_change') => ({
      elements: [{ selector, status, globalCoverage: 0, localCoverage: 0 }],
    });

    it('raises confidence when rendering confirms a static finding', () => {
      const errors = classify('<button id="a" class="opacity-0">A</button>', failing('#a'));
      expect(errors.map((e) => [e.kind.kind, e.evidence, e.confidence])).toEqual([
        ['invisible_opacity', 'static_and_rendered', 0.95],
      ]);
    });

    it('calls an unexplained silent element missing feedback', () => {
      const errors = classify('<button id="b" class="px-2">B</button>', failing('#b'));
      expect(errors.map((e) => [e.kind.kind, e.evidence, e.confidence, e.requiresGenerative])).toEqual([
        ['feedback_missing', 'rendered', 0.85, true],
      ]);
    });

    it('calls it too subtle when feedback classes exist or some change was measured', () => {
      expect(summary(classify('<button id="b" class="hover:bg-blue-500">B</button>', failing('#b')))).toEqual([
        'feedback_too_subtle@#b',
      ]);

      const measured = classify('<button id="c">C</button>', {
        elements: [{ selector: '#c', status: 'responsive', globalCoverage: 0.01, localCoverage: 0.1 }],
      });
      expect(measured[0]?.kind).toEqual({
        family: 'feedback_intensity',
        kind: 'feedback_too_subtle',
        globalCoverage: 0.01,
        localCoverage: 0.1,
      });
      expect(measured[0]?.requiresGenerative).toBe(false);
    });

    it('maps interception and timeouts', () => {
      const intercepted = classify('<button id="b">B</button>', {
        elements: [{ selector: '#b', status: 'intercepted', globalCoverage: 0, localCoverage: 0, blockingElement: '#ghost' }],
      });
      expect(intercepted[0]?.kind.kind).toBe('pointer_blocked');
      expect(intercepted[0]?.blockingElement).toBe('#ghost');

      const timedOut = classify('<button id="b">B</button>', failing('#b', 'timeout'));
      expect(timedOut.map((e) => [e.kind.kind, e.confidence])).toEqual([['unknown', 0.4]]);
    });

    it('keeps the reported selector when it matches nothing', () => {
      const errors = classify('<button id="b">B</button>', failing('#elsewhere'));
      expect(errors.map((e) => [e.selector, e.elementTag])).toEqual([['#elsewhere', 'unknown']]);
    });

    it('ignores passing and untested elements', () => {
      const errors = classify('<button id="b">B</button>', {
        elements: [
          { selector: '#b', status: 'responsive', globalCoverage: 0.2, localCoverage: 0.6 },
          { selector: '#x', status: 'not_tested', globalCoverage: 0, localCoverage: 0 },
        ],
      });
      expect(errors).toEqual([]);
    });

    it('turns reported script errors into defects', () => {
      const errors = classify('<button id="b">B</button>', { elements: [], scriptErrors: ['ReferenceError: x is not defined'] });
      expect(errors.map((e) => [e.kind, e.selector])).toEqual([
        [{ family: 'script_fault', kind: 'script_runtime_error', message: 'ReferenceError: x is not defined' }, 'script'],
      ]);
    });
  });

  it('is deterministic', () => {
    const markup =
      '<div class="relative"><button id="buy" class="relative z-10 opacity-0">Buy</button><div class="absolute inset-0 z-20"></div></div>';
    expect(classify(markup)).toEqual(classify(markup));
  });
});
