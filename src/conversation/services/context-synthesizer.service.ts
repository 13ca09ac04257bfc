import { Injectable } from '@nestjs/common';

import { PendingHandoff, PendingItem, SessionRecord, Stage } from '../../session/interfaces';
import { lineTotal } from '../../session/order-ledger';
import { takePendingItems } from '../../session/session-record';

const UNSET = 'غير محدد';

/**
 * Builds the per-turn state block and handoff summaries from a Session Record.
 * Output depends only on record fields, so identical records give identical text.
 */
@Injectable()
export class ContextSynthesizerService {
  /**
   * `<SESSION_STATE>` block injected as the first input message of every turn.
   */
  stateBlock(session: SessionRecord): string {
    const { customer, location, ledger } = session;
    const lines: string[] = ['<SESSION_STATE>'];

    // Customer
    lines.push(`اسم العميل: ${customer.name ?? UNSET}`);
    lines.push(`رقم الجوال: ${customer.phone ?? UNSET}`);

    // Mode
    if (session.mode === 'delivery') {
      lines.push('نوع الطلب: توصيل ✓');
    } else if (session.mode === 'pickup') {
      lines.push('نوع الطلب: استلام ✓');
    } else {
      lines.push(`نوع الطلب: ${UNSET}`);
    }

    // Location
    if (session.mode === 'delivery') {
      if (location.locationConfirmed && location.district) {
        lines.push(`الحي: ${location.district} ✓`);
        lines.push(`الشارع: ${location.street ?? `${UNSET} ⚠️`}`);
        lines.push(`رقم المبنى: ${location.building ?? `${UNSET} ⚠️`}`);
        if (location.notes) {
          lines.push(`ملاحظات العنوان: ${location.notes}`);
        }
        lines.push(
          location.addressComplete
            ? 'العنوان مكتمل: نعم ✓'
            : 'العنوان مكتمل: لا ⚠️ (مطلوب الشارع ورقم المبنى)',
        );
        lines.push(`رسوم التوصيل: ${location.deliveryFee} ريال`);
        lines.push(`الوقت المتوقع: ${location.eta ?? UNSET}`);
      } else {
        lines.push('الموقع: غير محدد بعد ⚠️');
      }
    }

    // Ledger
    if (ledger.isEmpty) {
      lines.push('الطلب الحالي: فارغ');
    } else {
      lines.push('الطلب الحالي:');
      ledger.items.forEach((line, index) => {
        const size = line.size ? ` ${line.size}` : '';
        const notes = line.notes ? ` (${line.notes})` : '';
        lines.push(
          `  ${index + 1}. ${line.quantity} × ${line.displayName}${size}${notes} - ${lineTotal(line)} ريال`,
        );
      });
      lines.push(`المجموع الفرعي: ${ledger.total()} ريال`);
    }

    // Pending items
    if (session.pendingItems.length > 0) {
      lines.push(`⚠️ طلب معلق: "${formatPendingItems(session.pendingItems)}"`);
    }

    // Constraints
    if (session.constraints.size > 0) {
      lines.push('قيود مهمة:');
      for (const constraint of session.constraints) {
        lines.push(`  ⚠️ ${constraint}`);
      }
    }

    lines.push('</SESSION_STATE>');
    return lines.join('\n');
  }

  /**
   * Section appended to every stage's instructions while constraints exist.
   */
  constraintsSection(session: SessionRecord): string {
    if (session.constraints.size === 0) {
      return '';
    }

    const lines = [
      '## Customer constraints (must be respected in every suggestion and item added)',
      ...[...session.constraints].map((constraint) => `- ${constraint}`),
    ];
    return lines.join('\n');
  }

  /**
   * Handoff for a stage change. Pending items are consumed into the directive
   * when ordering starts.
   */
  createHandoff(
    session: SessionRecord,
    from: Stage | null,
    to: Stage,
    lastUtterance?: string,
  ): PendingHandoff {
    const pending = to === 'ordering' ? takePendingItems(session) : [];
    return {
      from,
      to,
      directive: handoffDirective(from, to, pending),
      ...(lastUtterance ? { lastUtterance } : {}),
    };
  }

  /**
   * First input message of the new stage: fresh state block, the customer's
   * last message and the one-line task directive. Nothing else from the
   * outgoing stage is carried over.
   */
  handoffSummary(session: SessionRecord, handoff: PendingHandoff): string {
    const parts = [this.stateBlock(session)];
    if (handoff.lastUtterance) {
      parts.push(`رسالة العميل: ${handoff.lastUtterance}`);
    }
    parts.push(handoff.directive);
    return parts.join('\n\n');
  }
}

export function formatPendingItems(items: PendingItem[]): string {
  return items.map((item) => `${item.quantity} × ${item.text}`).join('، ');
}

/**
 * One-line task for the incoming stage, specialised by where the customer came from.
 */
export function handoffDirective(from: Stage | null, to: Stage, pending: PendingItem[] = []): string {
  switch (to) {
    case 'greeting':
      return 'مهمتك: رحّب بالعميل واسأله توصيل ولا استلام.';

    case 'location':
      if (from === 'checkout') {
        return 'مهمتك: ⚠️ العميل يريد توصيل. تحقق من الحي باستخدام check_delivery_district ثم أكمل العنوان وحوّل للتأكيد.';
      }
      if (from === 'ordering') {
        return 'مهمتك: العميل يريد تغيير من استلام إلى توصيل. اسأله عن الحي.';
      }
      return 'مهمتك: تحقق من موقع التوصيل. العميل يريد توصيل.';

    case 'ordering':
      if (pending.length > 0) {
        return `مهمتك: العميل طلب سابقاً "${formatPendingItems(pending)}". ابحث عن هذه الأصناف وأضفها للطلب أولاً، ولا تسأله ماذا يريد أن يطلب.`;
      }
      if (from === 'checkout') {
        return 'مهمتك: ⚠️ العميل يريد تعديل طلبه. ساعده في التعديل ثم أكمل للتأكيد.';
      }
      return 'مهمتك: ساعد العميل في طلبه.';

    case 'checkout':
      if (from === 'location') {
        return 'مهمتك: ⚠️ تم تأكيد موقع التوصيل. اعرض ملخص الطلب واطلب التأكيد النهائي.';
      }
      return 'مهمتك: اعرض ملخص الطلب وأكده مع العميل.';
  }
}
