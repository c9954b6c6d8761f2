import type { GarmentClass, StyleCategory } from "outfit-harmony-shared";

/** Style classifier output classes, indexed as the model emits them */
export const GARMENT_CLASSES: readonly GarmentClass[] = [
  "t-shirt",
  "shirt",
  "hoodie",
  "jacket",
  "jeans",
  "casual-pants",
  "sneakers",
  "leather-shoes",
];

export type StyleCategoryMap = Readonly<Record<string, ReadonlySet<string>>>;

export const DEFAULT_STYLE_CATEGORIES: Readonly<Record<StyleCategory, ReadonlySet<string>>> = {
  formal: new Set<GarmentClass>(["shirt", "jacket", "leather-shoes"]),
  casual: new Set<GarmentClass>(["t-shirt", "hoodie", "jeans", "casual-pants", "sneakers"]),
};

export class InvalidClassIndexError extends Error {
  constructor(public readonly index: number) {
    super(`Invalid garment class index ${index}; expected 0-${GARMENT_CLASSES.length - 1}`);
    this.name = "InvalidClassIndexError";
  }
}

export function getGarmentClass(index: number): GarmentClass {
  if (!Number.isInteger(index) || index < 0 || index >= GARMENT_CLASSES.length) {
    throw new InvalidClassIndexError(index);
  }
  return GARMENT_CLASSES[index];
}

/** First category whose members include the label, or "unknown". */
export function styleCategoryOf(
  label: string | null | undefined,
  categories: StyleCategoryMap = DEFAULT_STYLE_CATEGORIES
): string {
  if (!label) {
    return "unknown";
  }
  const normalized = label.trim().toLowerCase();
  for (const [category, members] of Object.entries(categories)) {
    if (members.has(normalized)) {
      return category;
    }
  }
  return "unknown";
}
