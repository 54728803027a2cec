/**
 * Zod validation for tool definitions registered with the ToolEngine
 */

import { z } from "zod";

export const ToolParamSchema = z
  .object({
    name: z.string().min(1).max(100),
    description: z.string().max(500).optional(),
    schema: z.record(z.unknown()).optional(),
    optional: z.boolean().optional(),
  })
  .strict();

export const ToolDefSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .max(100)
      .regex(/^[A-Za-z_$][\w$]*$/, "Tool name must be a valid identifier"),
    description: z.string().max(500).optional(),
    params: z.array(ToolParamSchema).default([]),
  })
  .strict()
  .superRefine((def, ctx) => {
    const seen = new Set<string>();
    let sawOptional = false;
    def.params.forEach((param, index) => {
      if (seen.has(param.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["params", index, "name"], message: `Duplicate parameter "${param.name}"` });
      }
      seen.add(param.name);
      if (sawOptional && !param.optional) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["params", index], message: "Required parameters must precede optional ones" });
      }
      sawOptional = sawOptional || Boolean(param.optional);
    });
  });

export type ToolDef = z.infer<typeof ToolDefSchema>;
export type ToolDefInput = z.input<typeof ToolDefSchema>;

/**
 * Validate a tool definition
 * @throws Error listing every schema issue
 */
export function validateToolDef(def: unknown): ToolDef {
  const parsed = ToolDefSchema.safeParse(def);
  if (!parsed.success) {
    throw new Error(
      "Invalid tool definition: " + parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}
