import { UnknownRoleTypeError } from '../common/errors';

export const ROLE_ORDER = ['Leader', 'Guardian', 'Assassin', 'Traitor'] as const;

export type RoleType = (typeof ROLE_ORDER)[number];

export const CUSTOM_PRESET = 'custom';

export type Distribution = Record<RoleType, number>;

export type RoleTypeConfig = {
  count: number;
  /** Card names eligible for dealing. Empty means every card of the type. */
  enabledCards: Set<string>;
};

export type RoleConfiguration = {
  presetName: string;
  minPlayers: number;
  maxPlayers: number;
  allowLeaderlessGame: boolean;
  hideRoleDistribution: boolean;
  fullyRandomRoles: boolean;
  roleTypes: Record<RoleType, RoleTypeConfig>;
};

export type Preset = {
  name: string;
  description: string;
  distributions: ReadonlyMap<number, Distribution>;
};

/** Built-in table used when a room has no role configuration. */
export const STANDARD_DISTRIBUTIONS: Readonly<Record<number, Distribution>> = {
  1: { Leader: 1, Guardian: 0, Assassin: 0, Traitor: 0 },
  2: { Leader: 1, Guardian: 0, Assassin: 0, Traitor: 1 },
  3: { Leader: 1, Guardian: 1, Assassin: 0, Traitor: 1 },
  4: { Leader: 1, Guardian: 2, Assassin: 0, Traitor: 1 },
  5: { Leader: 1, Guardian: 2, Assassin: 1, Traitor: 1 },
  6: { Leader: 1, Guardian: 2, Assassin: 2, Traitor: 1 },
  7: { Leader: 1, Guardian: 3, Assassin: 2, Traitor: 1 },
  8: { Leader: 1, Guardian: 3, Assassin: 2, Traitor: 2 },
};

export function parseRoleType(name: string): RoleType {
  const match = ROLE_ORDER.find(r => r.toLowerCase() === name.trim().toLowerCase());
  if (!match) throw new UnknownRoleTypeError(name);
  return match;
}

export function emptyDistribution(): Distribution {
  return { Leader: 0, Guardian: 0, Assassin: 0, Traitor: 0 };
}

export function totalRoles(dist: Distribution): number {
  return ROLE_ORDER.reduce((sum, r) => sum + dist[r], 0);
}

export function countsOf(config: RoleConfiguration): Distribution {
  const dist = emptyDistribution();
  for (const r of ROLE_ORDER) dist[r] = config.roleTypes[r].count;
  return dist;
}

export function cloneRoleConfiguration(config: RoleConfiguration): RoleConfiguration {
  const copy = (r: RoleType): RoleTypeConfig => ({
    count: config.roleTypes[r].count,
    enabledCards: new Set(config.roleTypes[r].enabledCards),
  });
  return {
    ...config,
    roleTypes: {
      Leader: copy('Leader'),
      Guardian: copy('Guardian'),
      Assassin: copy('Assassin'),
      Traitor: copy('Traitor'),
    },
  };
}

export function isCustom(config: RoleConfiguration): boolean {
  return config.presetName === CUSTOM_PRESET;
}
