import { ServerConfig, buildServerConfig } from '../config/server.config';
import { CardService, createCardPool } from '../game/card.service';
import { RoleConfigService } from '../game/role-config.service';
import { RolesService } from '../game/roles.service';
import { Card } from '../types/card.types';
import { RoleType } from '../types/role.types';
import { RandomSource, seededRandom } from '../utils/random';

let nextId = 1;

function card(name: string, roleType: RoleType): Card {
  return { id: nextId++, name, roleType, text: `${name} text`, rarity: 'common' };
}

export const TEST_CARDS: readonly Card[] = [
  card('Crown', 'Leader'),
  card('Scepter', 'Leader'),
  card('Shield', 'Guardian'),
  card('Lantern', 'Guardian'),
  card('Anchor', 'Guardian'),
  card('Banner', 'Guardian'),
  card('Dagger', 'Assassin'),
  card('Garrote', 'Assassin'),
  card('Vial', 'Assassin'),
  card('Mask', 'Traitor'),
  card('Coin', 'Traitor'),
];

/** Presets with entries for 4 and 6 players only, next to the built-in standard. */
export const SPARSE_PRESETS = {
  sparse: {
    description: 'Entries for 4 and 6 players',
    distributions: {
      '4': { leader: 1, guardian: 2, traitor: 1 },
      '6': { leader: 1, guardian: 3, assassin: 1, traitor: 1 },
    },
  },
  crowded: {
    description: 'More than one leader per entry',
    distributions: {
      '3': { leader: 2, guardian: 1 },
    },
  },
};

export function testConfig(server: Record<string, unknown> = {}): ServerConfig {
  return buildServerConfig({ server, roles: { presets: SPARSE_PRESETS } });
}

export type TestServices = {
  config: ServerConfig;
  random: RandomSource;
  cards: CardService;
  roleConfig: RoleConfigService;
  roles: RolesService;
};

export function createTestServices(seed = 'test-seed', cards: readonly Card[] = TEST_CARDS): TestServices {
  const config = testConfig();
  const random = seededRandom(seed);
  const cardService = new CardService(createCardPool(cards));
  const roleConfig = new RoleConfigService(config, cardService);
  const roles = new RolesService(roleConfig, cardService, random);
  return { config, random, cards: cardService, roleConfig, roles };
}
