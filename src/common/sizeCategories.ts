import type { SizeCategory } from '../types/organizer';

const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;

export const DEFAULT_SIZE_CATEGORY_NAMES = ['light', 'medium', 'heavy'] as const;

export const DEFAULT_SIZE_CATEGORIES: SizeCategory[] = [
  { name: 'light', minBytes: 0 },
  { name: 'medium', minBytes: 10 * MIB },
  { name: 'heavy', minBytes: 100 * MIB },
];

const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  b: 1,
  kb: KIB,
  k: KIB,
  mb: MIB,
  m: MIB,
  gb: GIB,
  g: GIB,
  tb: GIB * 1024,
  t: GIB * 1024,
};

/**
 * Parses "10MB", "1.5 GB", "512kb" or a plain byte count. Units are binary.
 */
export const parseByteSize = (value: string): number | null => {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-zA-Z]*)\s*$/.exec(value);
  if (!match) {
    return null;
  }
  const multiplier = UNIT_MULTIPLIERS[match[2].toLowerCase()];
  if (multiplier === undefined) {
    return null;
  }
  return Math.round(Number.parseFloat(match[1]) * multiplier);
};

export const validateSizeCategories = (categories: SizeCategory[]): string[] => {
  const issues: string[] = [];
  if (categories.length === 0) {
    issues.push('At least one size category is required');
    return issues;
  }
  if (categories[0].minBytes !== 0) {
    issues.push(`First size category "${categories[0].name}" must start at 0 bytes`);
  }
  const seen = new Set<string>();
  categories.forEach((category, index) => {
    if (!category.name.trim() || /[\\/]/.test(category.name)) {
      issues.push(`Invalid size category name "${category.name}"`);
    }
    if (seen.has(category.name)) {
      issues.push(`Duplicate size category name "${category.name}"`);
    }
    seen.add(category.name);
    if (!Number.isSafeInteger(category.minBytes) || category.minBytes < 0) {
      issues.push(`Size category "${category.name}" has an invalid lower bound`);
    }
    const previous = categories[index - 1];
    if (previous && category.minBytes <= previous.minBytes) {
      issues.push(
        `Size category "${category.name}" must start above "${previous.name}" (${previous.minBytes} bytes)`,
      );
    }
  });
  return issues;
};

/**
 * Builds categories from the lower bounds of every category after the first.
 * Two thresholds give light/medium/heavy; other counts get numbered names.
 */
export const buildSizeCategories = (
  thresholds: number[],
  names?: readonly string[],
): SizeCategory[] => {
  const resolvedNames =
    names ??
    (thresholds.length === DEFAULT_SIZE_CATEGORY_NAMES.length - 1
      ? DEFAULT_SIZE_CATEGORY_NAMES
      : Array.from({ length: thresholds.length + 1 }, (_, index) => `size_${index + 1}`));
  if (resolvedNames.length !== thresholds.length + 1) {
    throw new Error(
      `Expected ${thresholds.length + 1} category names for ${thresholds.length} thresholds, got ${resolvedNames.length}`,
    );
  }
  return resolvedNames.map((name, index) => ({
    name,
    minBytes: index === 0 ? 0 : thresholds[index - 1],
  }));
};

/**
 * Category i covers [minBytes_i, minBytes_i+1); the last one is unbounded.
 * Assumes a list that passed validateSizeCategories.
 */
export const categoryForSize = (size: number, categories: SizeCategory[]): SizeCategory => {
  if (!Number.isFinite(size) || size < 0) {
    throw new RangeError(`File size must be a non-negative number, got ${size}`);
  }
  let match = categories[0];
  for (const category of categories) {
    if (size >= category.minBytes) {
      match = category;
    } else {
      break;
    }
  }
  return match;
};
