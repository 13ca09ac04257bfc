import { z } from 'zod';

export const coverageZoneSchema = z.object({
  /** Delivery fee in SAR */
  fee: z.number().nonnegative(),

  /** Arabic delivery time estimate, e.g. "30-45 دقيقة" */
  eta: z.string().min(1),
});

/**
 * Zod schema for the coverage file (data/coverage_zones.json).
 * Key order is the suggestion order.
 */
export const coverageFileSchema = z.object({
  zones: z.record(z.string().min(1), coverageZoneSchema),
});

export type CoverageZone = z.infer<typeof coverageZoneSchema>;

/**
 * Validate the coverage file contents.
 * Throws a descriptive error if validation fails.
 */
export function validateCoverage(data: unknown, filename?: string): Record<string, CoverageZone> {
  const result = coverageFileSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = filename ? ` in ${filename}` : '';
    throw new Error(`Invalid coverage definition${source}:\n${errors}`);
  }

  return result.data.zones;
}
