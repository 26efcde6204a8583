/**
 * Conversion Options
 *
 * Schemas and defaults for fusion, import and export. Every public entry
 * point parses its options through these, so partial objects are fine.
 */

import { z } from "zod";
import { ERROR_CODES, MeshlibError } from "./errors.js";
import {
  DEFAULT_MAX_BONES_PER_SUBMESH,
  FUSION_CELL_SIZE,
  FUSION_EPSILON,
  MAX_SUBMESH_VERTICES,
} from "./types.js";

export const fusionOptionsSchema = z
  .object({
    /** Per-component position tolerance */
    epsilon: z.number().nonnegative().default(FUSION_EPSILON),
    /** Spatial hash cell edge; must not be smaller than epsilon */
    cellSize: z.number().positive().default(FUSION_CELL_SIZE),
    /** Channels compared for fusion; all channels when omitted */
    attributes: z.array(z.string()).optional(),
  })
  .refine((o) => o.cellSize >= o.epsilon, {
    message: "cellSize must be at least epsilon",
    path: ["cellSize"],
  });

export type FusionOptions = z.infer<typeof fusionOptionsSchema>;
export type FusionOptionsInput = z.input<typeof fusionOptionsSchema>;

export const importOptionsSchema = z.object({
  fuseVertices: z.boolean().default(true),
  fusion: fusionOptionsSchema.default({}),
  strict: z.boolean().default(false),
});

export type ImportOptions = z.infer<typeof importOptionsSchema>;
export type ImportOptionsInput = z.input<typeof importOptionsSchema>;

export const exportOptionsSchema = z.object({
  maxVerticesPerSubmesh: z
    .number()
    .int()
    .min(3)
    .max(MAX_SUBMESH_VERTICES)
    .default(MAX_SUBMESH_VERTICES),
  maxBonesPerSubmesh: z.number().int().positive().default(
    DEFAULT_MAX_BONES_PER_SUBMESH,
  ),
  skinned: z.boolean().default(false),
  strict: z.boolean().default(true),
});

export type ExportOptions = z.infer<typeof exportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof exportOptionsSchema>;

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  name: string,
  input: unknown,
): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MeshlibError(
      `Invalid ${name} options: ${issues}`,
      ERROR_CODES.INVALID_OPTIONS,
      { options: name },
    );
  }
  return result.data;
}

export function parseFusionOptions(input?: FusionOptionsInput): FusionOptions {
  return parseWith(fusionOptionsSchema, "fusion", input);
}

export function parseImportOptions(input?: ImportOptionsInput): ImportOptions {
  return parseWith(importOptionsSchema, "import", input);
}

export function parseExportOptions(input?: ExportOptionsInput): ExportOptions {
  return parseWith(exportOptionsSchema, "export", input);
}
