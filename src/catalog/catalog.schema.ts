import { z } from 'zod';

/**
 * Zod schema for a single menu item.
 */
export const catalogItemSchema = z.object({
  /** Stable identifier referenced by order lines */
  id: z.string().min(1),

  /** Arabic display name shown to the customer */
  displayName: z.string().min(1),

  /** Base unit price in SAR */
  price: z.number().nonnegative(),

  category: z.string().min(1),

  description: z.string().default(''),

  /** Items marked unavailable stay searchable but cannot be ordered */
  available: z.boolean().default(true),

  /** Size name → unit price, for items sold in several sizes */
  sizePrices: z.record(z.string().min(1), z.number().nonnegative()).optional(),
});

/**
 * Zod schema for the menu JSON file (data/menu.json).
 */
export const catalogFileSchema = z
  .object({
    items: z.array(catalogItemSchema).min(1),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['items', index, 'id'],
          message: `Duplicate item id "${item.id}"`,
        });
      }
      seen.add(item.id);
    });
  });

export type CatalogItem = z.infer<typeof catalogItemSchema>;
export type CatalogItemInput = z.input<typeof catalogItemSchema>;

/**
 * Validate the menu file contents.
 * Throws a descriptive error if validation fails.
 */
export function validateCatalog(data: unknown, filename?: string): CatalogItem[] {
  const result = catalogFileSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = filename ? ` in ${filename}` : '';
    throw new Error(`Invalid menu definition${source}:\n${errors}`);
  }

  return result.data.items;
}
