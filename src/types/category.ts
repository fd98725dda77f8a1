export const CATEGORIES = ["A", "B", "C"] as const;

export type Category = (typeof CATEGORIES)[number];

export const UNLABELED = "unlabeled";

export type CategoryBucket = Category | typeof UNLABELED;

export const CATEGORY_BUCKETS: readonly CategoryBucket[] = [...CATEGORIES, UNLABELED];

export type PerBucket<T> = Record<CategoryBucket, T>;

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/** Case-insensitive A/B/C; anything else is unlabeled (null). */
export function normalizeCategory(value: unknown): Category | null {
  if (typeof value !== "string") return null;
  const upper = value.trim().toUpperCase();
  return isCategory(upper) ? upper : null;
}

export function bucketFor(category: Category | null): CategoryBucket {
  return category ?? UNLABELED;
}
