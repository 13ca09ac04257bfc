/**
 * All recoverable and terminal failure kinds raised by the ordering core.
 */
export const ORDER_ERROR_KINDS = [
  'InvalidQuantity',
  'ItemNotFound',
  'ItemUnavailable',
  'InvalidSize',
  'DistrictNotCovered',
  'AddressIncomplete',
  'CustomerInfoMissing',
  'SessionClosed',
  'InferenceUnavailable',
  'EmptyOrder',
  'InvalidToolArguments',
  'ToolNotAvailable',
] as const;

export type OrderErrorKind = (typeof ORDER_ERROR_KINDS)[number];

/**
 * Error raised by ledger, catalog, coverage and session operations.
 * `details` is forwarded to the model as part of the structured tool result.
 */
export class OrderError extends Error {
  constructor(
    public readonly kind: OrderErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'OrderError';
  }
}

export function isOrderError(error: unknown, kind?: OrderErrorKind): error is OrderError {
  return error instanceof OrderError && (kind === undefined || error.kind === kind);
}
