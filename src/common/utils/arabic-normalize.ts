// ────────────────────────────────────────────────────────
// Arabic text normalization shared by menu search, order
// line matching and delivery district matching.
// ────────────────────────────────────────────────────────

const TASHKEEL = /[\u0610-\u061A\u064B-\u065F\u0670\u06D6-\u06ED]/g;
const TATWEEL = /\u0640/g;
const ALEF_FORMS = /[\u0622\u0623\u0625\u0671]/g;
const LAM_ALEF_LIGATURES = /[\uFEF5-\uFEFC]/g;

/** Dialect letters that are spelled interchangeably in food names. */
const PHONETIC_GROUPS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['ج', ['ق', 'ك']],
  ['ز', ['س', 'ذ']],
  ['ا', ['ى']],
];

/** Common food spelling variants (canonical → variants). */
const FOOD_SPELLING_VARIANTS: Readonly<Record<string, readonly string[]>> = {
  برجر: ['برقر', 'بركر', 'برغر', 'بيرجر', 'بورجر'],
  بيتزا: ['بيتسا', 'بيتزه', 'بيتزة'],
  شاورما: ['شورما', 'شوارما', 'شويرما', 'شاورمه'],
  كابتشينو: ['كبتشينو', 'كابوتشينو', 'كابتشينه'],
  سندويش: ['سندوتش', 'ساندويش', 'سندويتش'],
  بطاطس: ['بطاطا', 'بطاطص'],
  همبرجر: ['هامبرجر', 'همبرقر', 'هامبورجر', 'هامبورغر'],
};

/**
 * Standard normalization: strip diacritics and tatweel, unify alef and hamza
 * carriers, teh marbuta → heh, expand lam-alef ligatures, lower-case and
 * collapse whitespace.
 */
export function normalizeArabic(text: string | undefined | null): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFC')
    .replace(LAM_ALEF_LIGATURES, 'لا')
    .replace(TASHKEEL, '')
    .replace(TATWEEL, '')
    .replace(ALEF_FORMS, 'ا')
    .replace(/ؤ/g, 'و')
    .replace(/ئ/g, 'ي')
    .replace(/ة/g, 'ه')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

const NORMALIZED_VARIANTS: ReadonlyArray<readonly [string, readonly string[]]> = Object.entries(
  FOOD_SPELLING_VARIANTS,
).map(([canonical, variants]) => [
  normalizeArabic(canonical),
  variants.map((v) => normalizeArabic(v)),
]);

function fixFoodSpelling(word: string): string {
  for (const [canonical, variants] of NORMALIZED_VARIANTS) {
    if (variants.includes(word)) {
      return canonical;
    }
  }

  for (const [canonical, variants] of NORMALIZED_VARIANTS) {
    const variant = variants.find((v) => word.includes(v));
    if (variant) {
      return word.replace(variant, canonical);
    }
  }

  return word;
}

function foldPhonetic(text: string): string {
  let result = text;
  for (const [canonical, variants] of PHONETIC_GROUPS) {
    for (const variant of variants) {
      result = result.split(variant).join(canonical);
    }
  }
  return result;
}

/**
 * Search normalization: standard normalization, then food spelling fixes,
 * then phonetic folding. Apply to both the query and the indexed text.
 */
export function normalizeForSearch(text: string | undefined | null): string {
  const normalized = normalizeArabic(text);
  if (!normalized) {
    return '';
  }

  const fixed = normalized.split(' ').map(fixFoodSpelling).join(' ');
  return foldPhonetic(fixed);
}

/**
 * Split normalized text into words.
 */
export function tokenize(text: string): string[] {
  return text.split(' ').filter((t) => t.length > 0);
}
