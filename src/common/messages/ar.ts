/**
 * Arabic user-facing message strings.
 * All channel replies and tool messages should reference strings from this file.
 */
export const AR = {
  // Conversation
  GREETING: 'أهلاً وسهلاً في البيت العربي! 👋 تبي توصيل ولا استلام؟',
  ERROR_GENERIC: 'عذراً، حدث خطأ. حاول مرة أخرى.',
  INFERENCE_UNAVAILABLE: (contact: string) =>
    `عذراً، النظام مشغول حالياً. حاول بعد شوي أو اتصل على ${contact} 🙏`,
  SESSION_CLOSED: (contact: string) =>
    `طلبك تم تأكيده وانتهت هذه الجلسة ✅ لأي استفسار اتصل على ${contact}`,
  ORDER_TOO_COMPLEX: (added: string[]) =>
    added.length > 0
      ? `عذراً، الطلب معقد شوي 😅 أضفت: ${added.join('، ')}. ممكن تكمل بعدد أقل من الأصناف؟`
      : 'عذراً، الطلب معقد شوي 😅 ممكن تطلب أصناف أقل في كل رسالة؟',

  // Order mode
  MODE_DELIVERY: 'توصيل',
  MODE_PICKUP: 'استلام من الفرع',
  MODE_SET: (label: string) => `تم اختيار ${label} ✓`,
  MODE_UNCHANGED: (label: string) => `${label} مختار مسبقاً ✓`,

  // Customer info
  NAME_SET: (name: string) => `تم حفظ الاسم: ${name}`,
  PHONE_SET: (phone: string) => `تم حفظ الجوال: ${phone}`,
  ALREADY_SET: 'محفوظ مسبقاً ✓',
  CUSTOMER_INFO_MISSING: (missing: string[]) => `نحتاج ${missing.join(' و')} لتأكيد الطلب`,

  // Pending items
  PENDING_ADDED: (text: string, quantity: number) => `تم تسجيل ${quantity} × ${text} للطلب`,

  // Location
  DISTRICT_COVERED: (district: string, fee: number, eta: string) =>
    `${district} ضمن نطاق التوصيل ✓ رسوم التوصيل ${fee} ريال، الوقت المتوقع ${eta}`,
  DISTRICT_NOT_COVERED: (district: string, suggestions: string[]) =>
    `عذراً، ${district} خارج نطاق التوصيل. الأحياء المتاحة: ${suggestions.join('، ')}. أو تبي استلام؟`,
  DISTRICT_REQUIRED: 'حدد الحي أولاً',
  ADDRESS_SAVED: 'تم حفظ العنوان ✓',
  ADDRESS_PARTIAL: (missing: string[]) => `تم الحفظ، باقي: ${missing.join(' و')}`,
  FIELD_DISTRICT: 'الحي',
  FIELD_STREET: 'اسم الشارع',
  FIELD_BUILDING: 'رقم المبنى',
  FIELD_NAME: 'الاسم',
  FIELD_PHONE: 'رقم الجوال',

  // Ledger
  ITEM_ADDED: (quantity: number, name: string) => `تمت إضافة ${quantity} × ${name} ✓`,
  ITEM_MODIFIED: (name: string) => `تم تعديل ${name} ✓`,
  ITEM_REMOVED: (name: string) => `تم حذف ${name} من الطلب`,
  INVALID_QUANTITY: 'الكمية لازم تكون من 1 إلى 10',
  ITEM_NOT_FOUND: 'الصنف غير موجود',
  ITEM_NOT_IN_ORDER: (selector: string) => `ما لقيت "${selector}" في طلبك`,
  ITEM_UNAVAILABLE: (name: string) => `عذراً، ${name} غير متوفر حالياً`,
  INVALID_SIZE: (size: string, options: string[]) =>
    `الحجم "${size}" غير متاح. الأحجام المتاحة: ${options.join('، ')}`,
  ORDER_EMPTY: 'الطلب فارغ، أضف أصناف أولاً',
  ORDER_CLOSED: 'الطلب مؤكد ولا يمكن تعديله',

  // Menu
  MENU_NO_RESULTS: (query: string) => `ما لقينا "${query}" في المنيو`,
  MENU_CONFIRM: 'فيه أكثر من خيار، تأكد مع العميل أي واحد يقصد',

  // Checkout
  CURRENCY: 'ريال',
  SUMMARY_LINE: (index: number, quantity: number, name: string, total: number) =>
    `${index}. ${quantity} × ${name} = ${total} ريال`,
  SUMMARY_SUBTOTAL: (subtotal: number) => `المجموع: ${subtotal} ريال`,
  SUMMARY_DELIVERY: (fee: number) => `رسوم التوصيل: ${fee} ريال`,
  SUMMARY_TOTAL: (total: number) => `الإجمالي: ${total} ريال`,
  ORDER_CONFIRMED: (orderId: string, total: number, eta: string, contact: string) =>
    `تم تأكيد طلبك ✅\nرقم الطلب: ${orderId}\nالإجمالي: ${total} ريال\nالوقت المتوقع: ${eta}\nللاستفسار: ${contact}`,
  PICKUP_ETA: '20-25 دقيقة',

  // Handoff
  HANDOFF_REQUESTED: 'جاري التحويل',
  TOOL_NOT_AVAILABLE: (tool: string) => `الأداة ${tool} غير متاحة في هذه المرحلة`,
  INVALID_ARGUMENTS: 'مدخلات الأداة غير صحيحة',
} as const;
