/**
 * Keyword lists the extractors match against (lowercase, substring match).
 */

export const REQUIREMENT_KEYWORDS = [
  'recommend',
  'required',
  'requirement',
  'years',
  'transcript',
  'essay',
  'teacher',
  'recommendation',
  'testing',
  'sat',
  'act',
] as const

export const DEADLINE_KEYWORDS = [
  'deadline',
  'early',
  'regular',
  'decision',
  'single-choice',
  'financial aid',
  'questbridge',
  'due',
] as const

export const MONTH_ABBREVIATIONS = [
  'nov',
  'jan',
  'feb',
  'mar',
  'apr',
  'may',
  'dec',
  'oct',
  'sep',
  'aug',
  'jul',
  'jun',
] as const

/** Anchor texts that are site navigation rather than programs */
export const NAVIGATION_KEYWORDS = [
  'apply',
  'admission',
  'financial',
  'contact',
  'login',
  'search',
  'privacy',
  'cookie',
  'menu',
] as const

export const DISCIPLINE_KEYWORDS = [
  'studies',
  'engineering',
  'science',
  'mathematics',
  'history',
  'economics',
  'biology',
  'computer',
  'physics',
  'chemistry',
  'philosophy',
  'political',
  'sociology',
  'psychology',
  'language',
  'literature',
  'art',
  'music',
  'anthropology',
] as const
