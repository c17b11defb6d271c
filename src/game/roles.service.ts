import { Inject, Injectable, Logger } from '@nestjs/common';

import { Player } from '../types/player.types';
import { Distribution, ROLE_ORDER, RoleConfiguration, emptyDistribution } from '../types/role.types';
import { RANDOM_SOURCE, RandomSource, shuffle } from '../utils/random';
import { CardService } from './card.service';
import { ConfiguredStrategy, DistributionStrategy, FixedTableStrategy } from './distribution.strategy';
import { RoleConfigService } from './role-config.service';

export type AssignmentResult = {
  strategy: string;
  distribution: Distribution;
  assigned: number;
  /** Active players left without a card. */
  unassigned: Player[];
  hiddenPreset?: string;
};

/**
 * Deals role cards to players. Mutates the given player objects in place and
 * takes no lock of its own: callers dealing into a live room go through
 * `Room.assignRoles`, which holds the room's write lock for the whole deal.
 */
@Injectable()
export class RolesService {
  private readonly logger = new Logger(RolesService.name);

  constructor(
    private readonly roleConfigService: RoleConfigService,
    private readonly cards: CardService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  /** Picks the strategy from whether a configuration is supplied. */
  assign(players: Player[], roleConfig?: RoleConfiguration): AssignmentResult {
    return roleConfig ? this.assignRolesWithConfig(players, roleConfig) : this.assignRoles(players);
  }

  assignRolesWithConfig(players: Player[], roleConfig: RoleConfiguration): AssignmentResult {
    const strategy = new ConfiguredStrategy(roleConfig, this.roleConfigService, this.random);
    const result = this.deal(players, strategy);
    return strategy.hiddenPreset ? { ...result, hiddenPreset: strategy.hiddenPreset } : result;
  }

  /** Built-in table, every card eligible. */
  assignRoles(players: Player[]): AssignmentResult {
    return this.deal(players, new FixedTableStrategy(this.cards));
  }

  /**
   * Never throws. When the distribution is short of players, or a type runs
   * out of eligible cards, the remaining players stay roleless and are
   * reported in `unassigned`.
   */
  private deal(players: Player[], strategy: DistributionStrategy): AssignmentResult {
    const active = players.filter(p => !p.isHost);
    for (const p of active) {
      p.role = null;
      p.roleRevealed = false;
    }

    if (active.length === 0) {
      return { strategy: strategy.name, distribution: emptyDistribution(), assigned: 0, unassigned: [] };
    }

    const seats = shuffle(active, this.random);
    const distribution = strategy.resolve(seats.length);
    const used = new Set<string>();
    let next = 0;

    // Leader first, so a short table still gets its Leader
    for (const roleType of ROLE_ORDER) {
      if (next >= seats.length) break;

      const needed = distribution[roleType];
      if (needed <= 0) continue;

      let dealt = 0;
      for (const card of shuffle(strategy.eligibleCards(roleType), this.random)) {
        if (dealt >= needed || next >= seats.length) break;
        if (used.has(card.name)) continue;

        const player = seats[next++];
        player.role = card;
        player.roleRevealed = card.roleType === 'Leader';
        used.add(card.name);
        dealt++;
      }

      if (dealt < needed && next < seats.length) {
        this.logger.warn(`Only ${dealt} of ${needed} ${roleType} cards could be dealt`);
      }
    }

    const unassigned = seats.slice(next);
    if (unassigned.length > 0) {
      this.logger.warn(
        `${unassigned.length} player(s) left without a role: ${unassigned.map(p => p.name).join(', ')}`,
      );
    }

    this.logger.log(
      `Dealt ${next} role(s) with ${strategy.name}: ` + ROLE_ORDER.map(r => `${r}=${distribution[r]}`).join(' '),
    );
    return { strategy: strategy.name, distribution, assigned: next, unassigned };
  }
}
