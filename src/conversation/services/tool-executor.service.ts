import { randomBytes } from 'crypto';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { format } from 'date-fns';
import { z } from 'zod';

import { CatalogService } from '../../catalog/catalog.service';
import { CatalogResolverService } from '../../catalog/services';
import { ORDER_LOG_EVENT, OrderLogEvent } from '../../common/events/order-log.event';
import { isOrderError, OrderError, OrderErrorKind } from '../../common/errors/order-error';
import { AR } from '../../common/messages/ar';
import { CoverageService } from '../../coverage/coverage.service';
import { ToolCall } from '../../inference/interfaces';
import { SessionRecord, Stage } from '../../session/interfaces';
import { LedgerLine, lineTotal } from '../../session/order-ledger';
import {
  addPendingItem,
  assertActive,
  assertReadyForCheckout,
  completeOrder,
  confirmDistrict,
  deliveryFee,
  fullAddress,
  isPlaceholder,
  setAddress,
  setCustomerName,
  setCustomerPhone,
  setMode,
} from '../../session/session-record';
import {
  addPendingItemArgs,
  addToOrderArgs,
  checkDeliveryDistrictArgs,
  confirmOrderArgs,
  getItemDetailsArgs,
  isToolAvailable,
  isToolName,
  modifyOrderItemArgs,
  noArgs,
  parseToolArguments,
  removeFromOrderArgs,
  searchMenuArgs,
  setCustomerInfoArgs,
  setCustomerNameArgs,
  setDeliveryAddressArgs,
  setOrderModeArgs,
  setPhoneNumberArgs,
} from '../tools';

/**
 * JSON object returned to the model as the tool result.
 */
export type ToolResult = Record<string, unknown>;

export interface ToolExecution {
  tool: string;
  ok: boolean;
  result: ToolResult;
  errorKind?: OrderErrorKind;
}

/** Used when a confirmed district carries no estimate */
const DEFAULT_DELIVERY_ETA = '30-45 دقيقة';

/**
 * `ORD-yyyyMMdd-XXXX` with four random uppercase hex digits.
 */
export function generateOrderId(now: Date = new Date()): string {
  return `ORD-${format(now, 'yyyyMMdd')}-${randomBytes(2).toString('hex').toUpperCase()}`;
}

/**
 * Applies model-issued tool calls to a Session Record.
 *
 * `OrderError`s become structured `{ success: false, error, message }` results so
 * the stage can recover, except `SessionClosed`, which is rethrown to end the turn.
 * Anything else is a bug and is rethrown as is.
 */
@Injectable()
export class ToolExecutorService {
  private readonly logger = new Logger(ToolExecutorService.name);
  private readonly humanContact: string;

  constructor(
    private readonly catalogService: CatalogService,
    private readonly resolver: CatalogResolverService,
    private readonly coverageService: CoverageService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.humanContact = this.configService.get<string>('support.humanContact', '920001234');
  }

  async execute(session: SessionRecord, stage: Stage, call: ToolCall): Promise<ToolExecution> {
    const startedAt = Date.now();

    try {
      const result: ToolResult = { success: true, ...(await this.dispatch(session, stage, call)) };
      this.logToolCall(session.id, stage, call, startedAt, { ok: true, result });
      return { tool: call.name, ok: true, result };
    } catch (error) {
      if (!isOrderError(error)) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`[${session.id}] Tool ${call.name} failed unexpectedly: ${errorMessage}`);
        throw error;
      }

      this.logger.warn(`[${session.id}] Tool ${call.name} → ${error.kind}: ${error.message}`);
      this.logToolCall(session.id, stage, call, startedAt, {
        ok: false,
        errorKind: error.kind,
        message: error.message,
      });

      if (error.kind === 'SessionClosed') {
        throw error;
      }

      return {
        tool: call.name,
        ok: false,
        errorKind: error.kind,
        result: { success: false, error: error.kind, message: error.message, ...error.details },
      };
    }
  }

  // ── Dispatch ────────────────────────────────────────────

  private async dispatch(session: SessionRecord, stage: Stage, call: ToolCall): Promise<ToolResult> {
    const name = call.name;
    if (!isToolName(name) || !isToolAvailable(stage, name)) {
      throw new OrderError('ToolNotAvailable', AR.TOOL_NOT_AVAILABLE(name), { tool: name, stage });
    }

    const raw = call.arguments;
    switch (name) {
      case 'set_order_mode':
        return this.setOrderMode(session, parseToolArguments(name, setOrderModeArgs, raw));
      case 'set_customer_name':
        return this.setCustomerName(session, parseToolArguments(name, setCustomerNameArgs, raw));
      case 'set_phone_number':
        return this.setPhoneNumber(session, parseToolArguments(name, setPhoneNumberArgs, raw));
      case 'set_customer_info':
        return this.setCustomerInfo(session, parseToolArguments(name, setCustomerInfoArgs, raw));
      case 'add_pending_item':
        return this.addPendingItem(session, parseToolArguments(name, addPendingItemArgs, raw));
      case 'check_delivery_district':
        return this.checkDeliveryDistrict(
          session,
          parseToolArguments(name, checkDeliveryDistrictArgs, raw),
        );
      case 'set_delivery_address':
        return this.setDeliveryAddress(
          session,
          parseToolArguments(name, setDeliveryAddressArgs, raw),
        );
      case 'get_order_summary':
        parseToolArguments(name, noArgs, raw);
        return this.getOrderSummary(session);
      case 'search_menu':
        return this.searchMenu(parseToolArguments(name, searchMenuArgs, raw));
      case 'get_item_details':
        return this.getItemDetails(parseToolArguments(name, getItemDetailsArgs, raw));
      case 'add_to_order':
        return this.addToOrder(session, parseToolArguments(name, addToOrderArgs, raw));
      case 'modify_order_item':
        return this.modifyOrderItem(session, parseToolArguments(name, modifyOrderItemArgs, raw));
      case 'remove_from_order':
        return this.removeFromOrder(session, parseToolArguments(name, removeFromOrderArgs, raw));
      case 'get_current_order':
        parseToolArguments(name, noArgs, raw);
        return this.getCurrentOrder(session);
      case 'calculate_total':
        parseToolArguments(name, noArgs, raw);
        return this.calculateTotal(session);
      case 'confirm_order':
        return this.confirmOrder(session, parseToolArguments(name, confirmOrderArgs, raw));
      case 'transfer_to_location':
        return this.requestHandoff(session, 'location');
      case 'transfer_to_ordering':
        return this.requestHandoff(session, 'ordering');
      case 'transfer_to_checkout':
        return this.requestHandoff(session, 'checkout');
      default: {
        const unhandled: never = name;
        throw new Error(`Unhandled tool: ${String(unhandled)}`);
      }
    }
  }

  // ── Session tools ───────────────────────────────────────

  private setOrderMode(
    session: SessionRecord,
    args: z.output<typeof setOrderModeArgs>,
  ): ToolResult {
    assertActive(session);
    const changed = setMode(session, args.mode);
    const label = args.mode === 'delivery' ? AR.MODE_DELIVERY : AR.MODE_PICKUP;

    return {
      mode: args.mode,
      changed,
      requiresLocation: args.mode === 'delivery' && !session.location.locationConfirmed,
      ...(args.mode === 'pickup' ? { pickupEta: AR.PICKUP_ETA } : {}),
      message: changed ? AR.MODE_SET(label) : AR.MODE_UNCHANGED(label),
    };
  }

  private setCustomerName(
    session: SessionRecord,
    args: z.output<typeof setCustomerNameArgs>,
  ): ToolResult {
    assertActive(session);
    const changed = setCustomerName(session, args.name);
    return {
      name: session.customer.name,
      alreadySet: !changed,
      message: changed ? AR.NAME_SET(args.name) : AR.ALREADY_SET,
    };
  }

  private setPhoneNumber(
    session: SessionRecord,
    args: z.output<typeof setPhoneNumberArgs>,
  ): ToolResult {
    assertActive(session);
    const changed = setCustomerPhone(session, args.phone);
    return {
      phone: session.customer.phone,
      alreadySet: !changed,
      message: changed ? AR.PHONE_SET(args.phone) : AR.ALREADY_SET,
    };
  }

  private setCustomerInfo(
    session: SessionRecord,
    args: z.output<typeof setCustomerInfoArgs>,
  ): ToolResult {
    assertActive(session);
    const updated: string[] = [];
    const messages: string[] = [];

    if (args.name !== undefined && setCustomerName(session, args.name)) {
      updated.push('name');
      messages.push(AR.NAME_SET(args.name));
    }
    if (args.phone !== undefined && setCustomerPhone(session, args.phone)) {
      updated.push('phone');
      messages.push(AR.PHONE_SET(args.phone));
    }

    return {
      name: session.customer.name ?? null,
      phone: session.customer.phone ?? null,
      updated,
      message: messages.length > 0 ? messages.join('، ') : AR.ALREADY_SET,
    };
  }

  private addPendingItem(
    session: SessionRecord,
    args: z.output<typeof addPendingItemArgs>,
  ): ToolResult {
    assertActive(session);
    const item = addPendingItem(session, args.text, args.quantity);
    return {
      item,
      pendingCount: session.pendingItems.length,
      message: AR.PENDING_ADDED(item.text, item.quantity),
    };
  }

  // ── Location tools ──────────────────────────────────────

  private checkDeliveryDistrict(
    session: SessionRecord,
    args: z.output<typeof checkDeliveryDistrictArgs>,
  ): ToolResult {
    assertActive(session);
    const match = this.coverageService.check(args.district);
    confirmDistrict(session, match);

    return {
      covered: true,
      district: match.district,
      deliveryFee: match.fee,
      eta: match.eta,
      message: AR.DISTRICT_COVERED(match.district, match.fee, match.eta),
    };
  }

  private setDeliveryAddress(
    session: SessionRecord,
    args: z.output<typeof setDeliveryAddressArgs>,
  ): ToolResult {
    assertActive(session);
    const missing = setAddress(session, {
      street: args.street_name,
      building: args.building_number,
      notes: args.additional_info,
    });

    return {
      fullAddress: fullAddress(session.location),
      addressComplete: session.location.addressComplete,
      missingFields: missing,
      message: missing.length === 0 ? AR.ADDRESS_SAVED : AR.ADDRESS_PARTIAL(missing),
    };
  }

  private getOrderSummary(session: SessionRecord): ToolResult {
    return {
      linesCount: session.ledger.items.length,
      itemCount: session.ledger.itemCount,
      hasPending: session.pendingItems.length > 0,
      pendingCount: session.pendingItems.length,
      mode: session.mode,
      locationConfirmed: session.location.locationConfirmed,
      addressComplete: session.location.addressComplete,
    };
  }

  // ── Menu and ledger tools ───────────────────────────────

  private async searchMenu(args: z.output<typeof searchMenuArgs>): Promise<ToolResult> {
    const result = await this.resolver.search(args.query);

    if (result.kind === 'not_found') {
      return {
        found: false,
        count: 0,
        items: [],
        message: AR.MENU_NO_RESULTS(args.query),
      };
    }

    return {
      found: true,
      matchKind: result.kind,
      confidence: Number(result.confidence.toFixed(3)),
      needsConfirmation: result.needsConfirmation,
      count: result.items.length,
      items: result.items.map(({ item, score }) => ({
        id: item.id,
        name: item.displayName,
        price: item.price,
        category: item.category,
        available: item.available,
        sizes: item.sizePrices ?? null,
        score: Number(score.toFixed(3)),
      })),
      ...(result.needsConfirmation ? { message: AR.MENU_CONFIRM } : {}),
    };
  }

  private getItemDetails(args: z.output<typeof getItemDetailsArgs>): ToolResult {
    const item = this.catalogService.require(args.item_id);
    return {
      item: {
        id: item.id,
        name: item.displayName,
        price: item.price,
        category: item.category,
        description: item.description,
        available: item.available,
        sizes: item.sizePrices ?? null,
      },
    };
  }

  private addToOrder(session: SessionRecord, args: z.output<typeof addToOrderArgs>): ToolResult {
    assertActive(session);
    const line = session.ledger.add(args.item_id, args.quantity, args.size, args.notes);
    return {
      item: this.lineView(line, session.ledger.items.length),
      subtotal: session.ledger.total(),
      message: AR.ITEM_ADDED(line.quantity, line.displayName),
    };
  }

  private modifyOrderItem(
    session: SessionRecord,
    args: z.output<typeof modifyOrderItemArgs>,
  ): ToolResult {
    assertActive(session);
    const selector = args.item_index ?? args.item_name ?? '';
    const index = session.ledger.resolve(selector);
    const line = session.ledger.modify(index + 1, {
      ...(args.quantity !== null && args.quantity !== undefined ? { quantity: args.quantity } : {}),
      ...(args.size !== undefined ? { size: args.size } : {}),
      ...(args.notes !== undefined ? { notes: args.notes } : {}),
    });

    return {
      item: this.lineView(line, index + 1),
      subtotal: session.ledger.total(),
      message: AR.ITEM_MODIFIED(line.displayName),
    };
  }

  private removeFromOrder(
    session: SessionRecord,
    args: z.output<typeof removeFromOrderArgs>,
  ): ToolResult {
    assertActive(session);
    const removed = session.ledger.remove(args.item_index ?? args.item_name ?? '');
    return {
      removed: { id: removed.catalogId, name: removed.displayName, quantity: removed.quantity },
      subtotal: session.ledger.total(),
      message: AR.ITEM_REMOVED(removed.displayName),
    };
  }

  private getCurrentOrder(session: SessionRecord): ToolResult {
    const { ledger } = session;
    if (ledger.isEmpty) {
      return { items: [], subtotal: 0, itemCount: 0, formattedSummary: AR.ORDER_EMPTY };
    }

    const summary = ledger.items.map((line, i) =>
      AR.SUMMARY_LINE(i + 1, line.quantity, this.lineLabel(line), lineTotal(line)),
    );
    summary.push(AR.SUMMARY_SUBTOTAL(ledger.total()));

    return {
      items: ledger.items.map((line, i) => this.lineView(line, i + 1)),
      subtotal: ledger.total(),
      itemCount: ledger.itemCount,
      formattedSummary: summary.join('\n'),
    };
  }

  // ── Checkout tools ──────────────────────────────────────

  private calculateTotal(session: SessionRecord): ToolResult {
    const subtotal = session.ledger.total();
    const fee = deliveryFee(session);
    const total = subtotal + fee;

    const breakdown = [AR.SUMMARY_SUBTOTAL(subtotal)];
    if (session.mode === 'delivery') {
      breakdown.push(AR.SUMMARY_DELIVERY(fee));
    }
    breakdown.push(AR.SUMMARY_TOTAL(total));

    return {
      subtotal,
      deliveryFee: fee,
      total,
      mode: session.mode,
      breakdown: breakdown.join('\n'),
    };
  }

  private confirmOrder(session: SessionRecord, args: z.output<typeof confirmOrderArgs>): ToolResult {
    assertActive(session);
    if (args.customer_name && !isPlaceholder(args.customer_name)) {
      setCustomerName(session, args.customer_name);
    }
    if (args.phone_number && !isPlaceholder(args.phone_number)) {
      setCustomerPhone(session, args.phone_number);
    }

    assertReadyForCheckout(session);

    const orderId = generateOrderId();
    const total = session.ledger.total() + deliveryFee(session);
    const eta =
      session.mode === 'pickup' ? AR.PICKUP_ETA : (session.location.eta ?? DEFAULT_DELIVERY_ETA);

    completeOrder(session, orderId);
    this.logger.log(`[${session.id}] Order ${orderId} confirmed (${total} SAR)`);
    this.eventEmitter.emit(
      ORDER_LOG_EVENT,
      new OrderLogEvent(session.id, 'session_closed', { reason: 'completed', orderId }),
    );

    return {
      orderId,
      customerName: session.customer.name,
      phone: session.customer.phone,
      mode: session.mode,
      ...(session.mode === 'delivery' ? { address: fullAddress(session.location) } : {}),
      total,
      eta,
      sessionEnded: true,
      message: AR.ORDER_CONFIRMED(orderId, total, eta, this.humanContact),
    };
  }

  // ── Handoff tools ───────────────────────────────────────

  private requestHandoff(session: SessionRecord, stage: Stage): ToolResult {
    assertActive(session);
    session.handoffRequest = stage;
    return { requestedStage: stage, message: AR.HANDOFF_REQUESTED };
  }

  // ── Helpers ─────────────────────────────────────────────

  private lineLabel(line: Readonly<LedgerLine>): string {
    const size = line.size ? ` ${line.size}` : '';
    const notes = line.notes ? ` (${line.notes})` : '';
    return `${line.displayName}${size}${notes}`;
  }

  private lineView(line: Readonly<LedgerLine>, index: number) {
    return {
      index,
      id: line.catalogId,
      name: line.displayName,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      total: lineTotal(line),
      size: line.size ?? null,
      notes: line.notes ?? null,
    };
  }

  private logToolCall(
    sessionId: string,
    stage: Stage,
    call: ToolCall,
    startedAt: number,
    outcome: { ok: boolean; result?: ToolResult; errorKind?: OrderErrorKind; message?: string },
  ): void {
    this.eventEmitter.emit(
      ORDER_LOG_EVENT,
      new OrderLogEvent(sessionId, 'tool_call', {
        stage,
        tool: call.name,
        arguments: parseLoggedArguments(call.arguments),
        durationMs: Date.now() - startedAt,
        ...outcome,
      }),
    );
  }
}

function parseLoggedArguments(raw: string): unknown {
  try {
    return raw.trim() ? JSON.parse(raw) : {};
  } catch {
    return raw;
  }
}
