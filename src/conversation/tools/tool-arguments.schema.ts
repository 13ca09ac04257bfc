import { z } from 'zod';

import { OrderError } from '../../common/errors/order-error';
import { AR } from '../../common/messages/ar';

/**
 * Every tool the model can call. Dispatch is an exhaustive switch over this set.
 */
export const TOOL_NAMES = [
  'set_order_mode',
  'set_customer_name',
  'set_phone_number',
  'set_customer_info',
  'add_pending_item',
  'check_delivery_district',
  'set_delivery_address',
  'get_order_summary',
  'search_menu',
  'get_item_details',
  'add_to_order',
  'modify_order_item',
  'remove_from_order',
  'get_current_order',
  'calculate_total',
  'confirm_order',
  'transfer_to_location',
  'transfer_to_ordering',
  'transfer_to_checkout',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

// ── Shared fields ────────────────────────────────────────

/** Models send null or blank strings for omitted values */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const requiredText = z.string().trim().min(1);

/** Range is checked by the ledger so the error kind stays `InvalidQuantity` */
const quantity = z.number().default(1);

const lineSelector = {
  item_name: optionalText,
  item_index: z.number().int().nullish(),
};

const hasSelector = (args: { item_name?: string; item_index?: number | null }) =>
  args.item_name !== undefined || (args.item_index !== undefined && args.item_index !== null);

// ── Per-tool schemas ─────────────────────────────────────

export const setOrderModeArgs = z.object({ mode: z.enum(['delivery', 'pickup']) });

export const setCustomerNameArgs = z.object({ name: requiredText });

export const setPhoneNumberArgs = z.object({ phone: requiredText });

export const setCustomerInfoArgs = z
  .object({ name: optionalText, phone: optionalText })
  .refine((args) => args.name !== undefined || args.phone !== undefined, {
    message: 'name or phone is required',
  });

export const addPendingItemArgs = z.object({ text: requiredText, quantity });

export const checkDeliveryDistrictArgs = z.object({ district: requiredText });

export const setDeliveryAddressArgs = z.object({
  street_name: optionalText,
  building_number: optionalText,
  additional_info: optionalText,
});

export const searchMenuArgs = z.object({ query: requiredText });

export const getItemDetailsArgs = z.object({ item_id: requiredText });

export const addToOrderArgs = z.object({
  item_id: requiredText,
  quantity,
  size: optionalText,
  notes: optionalText,
});

export const modifyOrderItemArgs = z
  .object({
    ...lineSelector,
    quantity: z.number().nullish(),
    size: optionalText,
    notes: optionalText,
  })
  .refine(hasSelector, { message: 'item_name or item_index is required' });

export const removeFromOrderArgs = z
  .object(lineSelector)
  .refine(hasSelector, { message: 'item_name or item_index is required' });

export const confirmOrderArgs = z.object({
  customer_name: optionalText,
  phone_number: optionalText,
});

export const noArgs = z.object({});

/**
 * Parses a raw JSON argument string against a tool's schema.
 * Malformed JSON and schema violations are `InvalidToolArguments`.
 */
export function parseToolArguments<S extends z.ZodTypeAny>(
  tool: ToolName,
  schema: S,
  raw: string,
): z.output<S> {
  let data: unknown;
  try {
    data = raw.trim() ? JSON.parse(raw) : {};
  } catch {
    throw new OrderError('InvalidToolArguments', AR.INVALID_ARGUMENTS, {
      tool,
      issues: ['arguments are not valid JSON'],
    });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map(
      (e: z.ZodIssue) => `${e.path.join('.') || '(root)'}: ${e.message}`,
    );
    throw new OrderError('InvalidToolArguments', AR.INVALID_ARGUMENTS, { tool, issues });
  }
  return result.data;
}
