import { z } from "zod";
import { InvalidOptionsError } from "../import/errors";

export const MAX_HEADER_ROW = 100;

export const processOptionsSchema = z.object({
  sheetName: z
    .string()
    .optional()
    .default("")
    .transform((value) => value.trim()),
  headerRow: z.coerce.number().int().min(0).max(MAX_HEADER_ROW).default(0)
});

export type ProcessOptions = z.infer<typeof processOptionsSchema>;

export const parseProcessOptions = (input: unknown): ProcessOptions => {
  const parsed = processOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    );
  }
  return parsed.data;
};
