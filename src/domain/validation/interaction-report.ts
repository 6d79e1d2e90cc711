import { z } from 'zod';

/**
 * Per-element interaction outcome reported by the rendering environment.
 * Coverage values are fractions of changed pixels: viewport-wide and element-local.
 */
export const InteractionStatusSchema = z.enum([
  'responsive',
  'no_visual_change',
  'intercepted',
  'timeout',
  'error',
  'not_tested',
]);

export type InteractionStatus = z.infer<typeof InteractionStatusSchema>;

const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().min(0),
  height: z.number().min(0),
});

export const ElementOutcomeSchema = z.object({
  selector: z.string().min(1),
  status: InteractionStatusSchema,
  globalCoverage: z.number().min(0).max(1),
  localCoverage: z.number().min(0).max(1),
  blockingElement: z.string().min(1).nullable().default(null),
  boundingBox: BoundingBoxSchema.nullable().default(null),
});

export type ElementOutcome = z.infer<typeof ElementOutcomeSchema>;

export const InteractionReportSchema = z.object({
  elements: z.array(ElementOutcomeSchema),
  scriptErrors: z.array(z.string()).default([]),
  captures: z
    .object({
      before: z.string().optional(),
      after: z.string().optional(),
    })
    .optional(),
});

/** Shape a Validator returns (defaults not yet applied). */
export type InteractionReportInput = z.input<typeof InteractionReportSchema>;
export type InteractionReport = z.infer<typeof InteractionReportSchema>;
