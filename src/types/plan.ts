/**
 * Plan Catalog Types
 */

/**
 * Separator used when a feature list is stored as text
 */
export const FEATURE_SEPARATOR = ';';

/**
 * Largest price a numeric(10, 2) column holds
 */
export const MAX_PLAN_PRICE = 99_999_999.99;

/**
 * Purchasable plan. Immutable once created.
 */
export interface Plan {
  id: string;
  name: string;
  price: number;
  description: string;
  features: string[];
  createdAt: Date;
}

export interface CreatePlanParams {
  name: string;
  price: number;
  description?: string;
  features?: string[];
}

/**
 * Parse a stored feature list into a set of feature names, keeping first-seen
 * order
 */
export function parseFeatureList(text: string | null): string[] {
  if (text === null || text === '') {
    return [];
  }
  const seen = new Set<string>();
  for (const token of text.split(FEATURE_SEPARATOR)) {
    const feature = token.trim();
    if (feature !== '') {
      seen.add(feature);
    }
  }
  return [...seen];
}

export function serializeFeatureList(features: readonly string[]): string {
  return parseFeatureList(features.join(FEATURE_SEPARATOR)).join(
    FEATURE_SEPARATOR
  );
}

/**
 * True when the price has no more than two decimal places
 */
export function hasCentPrecision(price: number): boolean {
  const cents = price * 100;
  return Math.abs(cents - Math.round(cents)) < 1e-6;
}
