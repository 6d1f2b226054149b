import { z } from "zod";

const primitiveSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
  z.array(z.number()),
  z.array(z.boolean()),
]);

export const featureDefinitionSchema = z.object({
  factory: z.string().min(1),
  implements: z.string().min(1),
  args: z.array(primitiveSchema).default([]),
  kwargs: z.record(primitiveSchema).default({}),
  default: z.boolean().default(false),
});

export const featuresConfigSchema = z.object({
  version: z.number().int(),
  features: z.record(featureDefinitionSchema),
});

/** One entry under `features` as written in a config file. */
export type FeatureDefinitionJson = z.input<typeof featureDefinitionSchema>;
export type FeaturesConfigJson = z.input<typeof featuresConfigSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}
