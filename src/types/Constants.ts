const KnownCategories = [
  'domus',
  'powerlines',
  'partitions',
  'zones',
  'system',
] as const;

type KnownCategory = (typeof KnownCategories)[number];

// Fetch order at startup. Only affects log ordering.
const CatalogOrder: readonly KnownCategory[] = KnownCategories;

// Category names as the session client knows them for getSensor().
const SensorGroups = new Map<string, string>([
  ['powerlines', 'POWER_LINES'],
  ['partitions', 'PARTITIONS'],
  ['zones', 'ZONES'],
]);

const NameFields = ['NM', 'LBL', 'DES'];

const UnknownState = 'unknown';

function isKnownCategory(category: string): category is KnownCategory {
  return KnownCategories.some(known => known === category);
}

export {
  KnownCategories,
  CatalogOrder,
  SensorGroups,
  NameFields,
  UnknownState,
  isKnownCategory,
};
export type {KnownCategory};
