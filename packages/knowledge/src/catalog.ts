import catalogData from './catalog.json';

/** Traditions and topic categories the knowledge service accepts. */
export interface KnowledgeCatalog {
  religions: readonly string[];
  philosophies: readonly string[];
  categories: Readonly<Record<string, string>>;
  /** Participants used when an interfaith dialogue names none. */
  interfaithDefaults: readonly string[];
}

export const DEFAULT_CATALOG: KnowledgeCatalog = catalogData;

export function isReligion(catalog: KnowledgeCatalog, value: string): boolean {
  return catalog.religions.includes(value);
}

export function isPhilosophy(catalog: KnowledgeCatalog, value: string): boolean {
  return catalog.philosophies.includes(value);
}

export function describeCategory(catalog: KnowledgeCatalog, category: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(catalog.categories, category)
    ? catalog.categories[category]
    : undefined;
}
