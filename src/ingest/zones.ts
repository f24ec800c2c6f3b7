/**
 * Zone and hub canonicalization.
 *
 * Provider feeds name the same settlement point several ways ("LZ_NORTH", "North Zone",
 * "HB North Hub"). Everything stored is keyed by the canonical name.
 */

export const CANONICAL_ZONES = [
  'NORTH',
  'SOUTH',
  'HOUSTON',
  'WEST',
  'HB_NORTH',
  'HB_SOUTH',
  'HB_HOUSTON',
  'HB_WEST',
] as const;

export type CanonicalZone = (typeof CANONICAL_ZONES)[number];

// Keys are in cleaned form (upper case, separators as underscores).
export const ZONE_ALIASES: Readonly<Record<string, CanonicalZone>> = {
  NORTH_ZONE: 'NORTH',
  SOUTH_ZONE: 'SOUTH',
  HOUSTON_ZONE: 'HOUSTON',
  WEST_ZONE: 'WEST',
  LZ_NORTH: 'NORTH',
  LZ_SOUTH: 'SOUTH',
  LZ_HOUSTON: 'HOUSTON',
  LZ_WEST: 'WEST',
  HB_NORTH_HUB: 'HB_NORTH',
  HB_SOUTH_HUB: 'HB_SOUTH',
  HB_HOUSTON_HUB: 'HB_HOUSTON',
  HB_WEST_HUB: 'HB_WEST',
  NORTH_HUB: 'HB_NORTH',
  SOUTH_HUB: 'HB_SOUTH',
  HOUSTON_HUB: 'HB_HOUSTON',
  WEST_HUB: 'HB_WEST',
};

const STRIPPABLE_PREFIXES = ['LZ_', 'HZ_', 'HZON_', 'LOAD_ZONE_', 'HB_'];

export type ZoneNormalizer = (raw: string | null | undefined) => string | null;

export function cleanZoneName(raw: string): string {
  return raw.trim().toUpperCase().replace(/[-\s]+/g, '_');
}

/**
 * Build a normalizer over the built-in table plus configured aliases. Configured alias
 * targets must themselves resolve to a canonical zone; others are ignored.
 */
export function createZoneNormalizer(extraAliases: Record<string, string> = {}): ZoneNormalizer {
  const canonical = new Set<string>(CANONICAL_ZONES);
  const aliases = new Map<string, string>(Object.entries(ZONE_ALIASES));

  for (const [alias, target] of Object.entries(extraAliases)) {
    const cleanedTarget = cleanZoneName(target);
    const resolved = canonical.has(cleanedTarget) ? cleanedTarget : aliases.get(cleanedTarget);
    if (resolved) {
      aliases.set(cleanZoneName(alias), resolved);
    }
  }

  const lookup = (value: string): string | null => {
    if (canonical.has(value)) return value;
    return aliases.get(value) ?? null;
  };

  return (raw) => {
    if (raw == null) return null;
    const value = cleanZoneName(raw);
    if (!value) return null;

    const direct = lookup(value);
    if (direct) return direct;

    for (const prefix of STRIPPABLE_PREFIXES) {
      if (value.startsWith(prefix)) {
        const candidate = lookup(value.slice(prefix.length));
        if (candidate) return candidate;
      }
    }
    return null;
  };
}

export const normalizeZone: ZoneNormalizer = createZoneNormalizer();

