import { z } from "zod";

export const MaskDecisionSchema = z
  .object({
    active: z.boolean(),
    source_dir: z.string(),
    mask_count: z.number().int().nonnegative(),
    image_count: z.number().int().nonnegative(),
    extension: z.string(),
  })
  .refine((d) => !d.active || (d.mask_count > 0 && d.source_dir.length > 0), {
    message: "an active mask decision needs a source directory and at least one mask",
  });

export type MaskDecision = z.infer<typeof MaskDecisionSchema>;

export const MaskNoteLevelSchema = z.enum(["info", "warning"]);

export type MaskNoteLevel = z.infer<typeof MaskNoteLevelSchema>;

export interface MaskNote {
  readonly level: MaskNoteLevel;
  readonly message: string;
}

/**
 * A mask decision together with the diagnostics that explain it.
 */
export interface MaskResolution {
  readonly decision: MaskDecision;
  readonly notes: readonly MaskNote[];
}
