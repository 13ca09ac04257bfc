import { ToolDefinition } from '../../inference/interfaces';
import { Stage } from '../../session/interfaces';

import { ToolName } from './tool-arguments.schema';

const NO_PARAMETERS = { type: 'object', properties: {} };

const LINE_SELECTOR = {
  item_name: {
    type: 'string',
    description: 'Name or partial name of the line, e.g. "كرك" or "برجر لحم". Preferred.',
  },
  item_index: {
    type: 'integer',
    description: '1-based line number from get_current_order. Use when the name is ambiguous.',
  },
};

/**
 * LLM-visible definitions. Parameters are JSON schemas; arguments are validated
 * again on arrival.
 */
export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
  // ── Session ────────────────────────────────────────────
  set_order_mode: {
    name: 'set_order_mode',
    description:
      'Set delivery or pickup. Call only when the mode is unset or the customer changes it.',
    parameters: {
      type: 'object',
      properties: { mode: { type: 'string', enum: ['delivery', 'pickup'] } },
      required: ['mode'],
    },
  },
  set_customer_name: {
    name: 'set_customer_name',
    description: "Store the customer's name.",
    parameters: {
      type: 'object',
      properties: { name: { type: 'string' } },
      required: ['name'],
    },
  },
  set_phone_number: {
    name: 'set_phone_number',
    description: "Store the customer's phone number.",
    parameters: {
      type: 'object',
      properties: { phone: { type: 'string' } },
      required: ['phone'],
    },
  },
  set_customer_info: {
    name: 'set_customer_info',
    description: 'Store or change the customer name and/or phone number.',
    parameters: {
      type: 'object',
      properties: { name: { type: 'string' }, phone: { type: 'string' } },
    },
  },
  add_pending_item: {
    name: 'add_pending_item',
    description:
      'Record an item the customer asked for before ordering starts, e.g. text="كبسة لحم", quantity=2.',
    parameters: {
      type: 'object',
      properties: {
        text: { type: 'string' },
        quantity: { type: 'integer', minimum: 1, maximum: 10 },
      },
      required: ['text'],
    },
  },

  // ── Location ───────────────────────────────────────────
  check_delivery_district: {
    name: 'check_delivery_district',
    description: 'Check whether a district is inside the delivery coverage and get fee and time.',
    parameters: {
      type: 'object',
      properties: { district: { type: 'string', description: 'District name, e.g. "النرجس"' } },
      required: ['district'],
    },
  },
  set_delivery_address: {
    name: 'set_delivery_address',
    description:
      'Store street, building and optional directions. Only after the district is confirmed.',
    parameters: {
      type: 'object',
      properties: {
        street_name: { type: 'string', description: 'e.g. "شارع الأمير محمد"' },
        building_number: { type: 'string', description: 'e.g. "23" or "فيلا 5"' },
        additional_info: { type: 'string', description: 'e.g. "الدور الثاني"' },
      },
    },
  },
  get_order_summary: {
    name: 'get_order_summary',
    description: 'Counts of ordered and pending items plus mode and address flags.',
    parameters: NO_PARAMETERS,
  },

  // ── Menu and ledger ────────────────────────────────────
  search_menu: {
    name: 'search_menu',
    description: 'Search the menu. Always search before adding an item.',
    parameters: {
      type: 'object',
      properties: { query: { type: 'string', description: 'Arabic query, e.g. "برجر دجاج"' } },
      required: ['query'],
    },
  },
  get_item_details: {
    name: 'get_item_details',
    description: 'Full details of one menu item, including sizes and availability.',
    parameters: {
      type: 'object',
      properties: { item_id: { type: 'string' } },
      required: ['item_id'],
    },
  },
  add_to_order: {
    name: 'add_to_order',
    description: 'Add a menu item to the order using the item_id returned by search_menu.',
    parameters: {
      type: 'object',
      properties: {
        item_id: { type: 'string' },
        quantity: { type: 'integer', minimum: 1, maximum: 10 },
        size: { type: 'string', description: 'Size option when the item has sizes' },
        notes: { type: 'string', description: 'e.g. "بدون بصل"' },
      },
      required: ['item_id'],
    },
  },
  modify_order_item: {
    name: 'modify_order_item',
    description: 'Change quantity, size or notes of a line already in the order.',
    parameters: {
      type: 'object',
      properties: {
        ...LINE_SELECTOR,
        quantity: { type: 'integer', minimum: 1, maximum: 10 },
        size: { type: 'string' },
        notes: { type: 'string' },
      },
    },
  },
  remove_from_order: {
    name: 'remove_from_order',
    description: 'Remove a line from the order.',
    parameters: { type: 'object', properties: LINE_SELECTOR },
  },
  get_current_order: {
    name: 'get_current_order',
    description: 'Numbered order lines with subtotal.',
    parameters: NO_PARAMETERS,
  },

  // ── Checkout ───────────────────────────────────────────
  calculate_total: {
    name: 'calculate_total',
    description: 'Subtotal, delivery fee and total with an Arabic breakdown.',
    parameters: NO_PARAMETERS,
  },
  confirm_order: {
    name: 'confirm_order',
    description:
      'Confirm and finalize the order. Requires the real customer name and phone, never placeholders.',
    parameters: {
      type: 'object',
      properties: {
        customer_name: { type: 'string' },
        phone_number: { type: 'string' },
      },
    },
  },

  // ── Handoff ────────────────────────────────────────────
  transfer_to_location: {
    name: 'transfer_to_location',
    description: 'Hand the conversation to the delivery location assistant.',
    parameters: NO_PARAMETERS,
  },
  transfer_to_ordering: {
    name: 'transfer_to_ordering',
    description: 'Hand the conversation to the ordering assistant.',
    parameters: NO_PARAMETERS,
  },
  transfer_to_checkout: {
    name: 'transfer_to_checkout',
    description: 'Hand the conversation to the checkout assistant when the customer is done.',
    parameters: NO_PARAMETERS,
  },
};

/**
 * Tool surface of each stage.
 */
export const STAGE_TOOLS: Record<Stage, readonly ToolName[]> = {
  greeting: [
    'set_order_mode',
    'set_customer_name',
    'set_phone_number',
    'add_pending_item',
    'transfer_to_location',
    'transfer_to_ordering',
  ],
  location: [
    'check_delivery_district',
    'set_delivery_address',
    'set_order_mode',
    'get_order_summary',
    'transfer_to_ordering',
    'transfer_to_checkout',
  ],
  ordering: [
    'search_menu',
    'get_item_details',
    'add_to_order',
    'get_current_order',
    'remove_from_order',
    'modify_order_item',
    'set_customer_name',
    'set_phone_number',
    'set_order_mode',
    'transfer_to_checkout',
    'transfer_to_location',
  ],
  checkout: [
    'calculate_total',
    'confirm_order',
    'set_customer_info',
    'set_order_mode',
    'get_current_order',
    'transfer_to_ordering',
    'transfer_to_location',
  ],
};

export function getStageTools(stage: Stage): ToolDefinition[] {
  return STAGE_TOOLS[stage].map((name) => TOOL_DEFINITIONS[name]);
}

export function isToolAvailable(stage: Stage, name: ToolName): boolean {
  return STAGE_TOOLS[stage].includes(name);
}
