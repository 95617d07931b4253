/**
 * Engine configuration: defaults plus validation of caller overrides.
 */

import { z } from "zod";
import { InvalidInputError } from "../errors.ts";
import type { EngineConfig, SuggestionMarkers } from "./types.ts";

export const DEFAULT_MARKERS: SuggestionMarkers = {
  headerPrefix: "/*========== Suggestion",
  footer: "*///======== End of Suggestion",
};

const markersSchema = z
  .object({
    headerPrefix: z.string().min(1).default(DEFAULT_MARKERS.headerPrefix),
    footer: z.string().min(1).default(DEFAULT_MARKERS.footer),
  })
  .refine((m) => !/[\r\n]/.test(m.headerPrefix) && !/[\r\n]/.test(m.footer), {
    message: "Markers must fit on a single line",
  })
  // GOTCHA: the block is found by prefix match, so neither marker may
  // be a prefix of the other.
  .refine(
    (m) => !m.headerPrefix.startsWith(m.footer) && !m.footer.startsWith(m.headerPrefix),
    { message: "Header and footer markers must be distinguishable" },
  );

export const engineConfigSchema = z.object({
  markers: markersSchema.default({}),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Fill in defaults and validate. Throws InvalidInputError. */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("engine configuration", formatIssues(parsed.error));
  }
  return parsed.data;
}
