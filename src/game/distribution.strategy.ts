import { Logger } from '@nestjs/common';

import { GameError } from '../common/errors';
import { Card } from '../types/card.types';
import {
  Distribution,
  ROLE_ORDER,
  RoleConfiguration,
  RoleType,
  STANDARD_DISTRIBUTIONS,
  cloneRoleConfiguration,
  countsOf,
  emptyDistribution,
} from '../types/role.types';
import { RandomSource, pickOne } from '../utils/random';
import { CardService } from './card.service';
import { RoleConfigService } from './role-config.service';

/**
 * Decides how many of each role type a deal needs and which cards may be
 * used. The dealer owns everything else (hosts, seating, card uniqueness).
 */
export interface DistributionStrategy {
  readonly name: string;
  resolve(activeCount: number): Distribution;
  eligibleCards(roleType: RoleType): readonly Card[];
}

export const HIDDEN_PRESET_CANDIDATES = ['standard', 'assassination', 'guardian'] as const;

export const RANDOM_ROLE_WEIGHTS: Readonly<Distribution> = {
  Leader: 1,
  Guardian: 3,
  Assassin: 2,
  Traitor: 1,
};

/** Leader plus Guardians for everyone else. */
export function leaderAndGuardians(activeCount: number): Distribution {
  const dist = emptyDistribution();
  if (activeCount > 0) dist.Leader = 1;
  if (activeCount > 1) dist.Guardian = activeCount - 1;
  return dist;
}

export class FixedTableStrategy implements DistributionStrategy {
  readonly name = 'fixed-table';

  constructor(private readonly cards: CardService) {}

  resolve(activeCount: number): Distribution {
    const entry = STANDARD_DISTRIBUTIONS[activeCount];
    return entry ? { ...entry } : leaderAndGuardians(activeCount);
  }

  eligibleCards(roleType: RoleType): readonly Card[] {
    return this.cards.getCards(roleType);
  }
}

export class ConfiguredStrategy implements DistributionStrategy {
  readonly name: string;
  private readonly logger = new Logger(ConfiguredStrategy.name);

  /** Preset drawn in hidden-distribution mode, once `resolve` has run. */
  hiddenPreset?: string;

  constructor(
    private readonly roleConfig: RoleConfiguration,
    private readonly roleConfigService: RoleConfigService,
    private readonly random: RandomSource,
  ) {
    if (roleConfig.hideRoleDistribution) this.name = 'hidden-preset';
    else if (roleConfig.fullyRandomRoles) this.name = 'fully-random';
    else this.name = roleConfig.presetName;
  }

  resolve(activeCount: number): Distribution {
    if (this.roleConfig.hideRoleDistribution) return this.resolveHidden(activeCount);
    if (this.roleConfig.fullyRandomRoles) return this.resolveFullyRandom(activeCount);

    try {
      return this.roleConfigService.getDistributionForPlayerCount(this.roleConfig, activeCount);
    } catch (err) {
      if (!(err instanceof GameError)) throw err;
      this.logger.warn(`Falling back to configured counts: ${err.message}`);
      const dist = countsOf(this.roleConfig);
      if (dist.Leader > 1) dist.Leader = 1;
      if (dist.Leader === 0 && !this.roleConfig.allowLeaderlessGame) dist.Leader = 1;
      return dist;
    }
  }

  eligibleCards(roleType: RoleType): readonly Card[] {
    return this.roleConfigService.eligibleCards(this.roleConfig, roleType);
  }

  private resolveHidden(activeCount: number): Distribution {
    const presetName = pickOne(HIDDEN_PRESET_CANDIDATES, this.random) ?? 'standard';
    this.hiddenPreset = presetName;
    this.logger.log(`Hidden distribution: drew preset '${presetName}' for ${activeCount} players`);

    const drawn = cloneRoleConfiguration(this.roleConfig);
    drawn.presetName = presetName;
    try {
      return this.roleConfigService.getDistributionForPlayerCount(drawn, activeCount);
    } catch (err) {
      if (!(err instanceof GameError)) throw err;
      this.logger.warn(`Preset '${presetName}' unusable (${err.message}), dealing Leader and Guardians`);
      return leaderAndGuardians(activeCount);
    }
  }

  /**
   * Configured counts are ignored. One Leader is always placed unless
   * leaderless play is allowed; the rest are weighted draws, and a Leader is
   * never drawn twice.
   */
  private resolveFullyRandom(activeCount: number): Distribution {
    const dist = emptyDistribution();
    if (activeCount === 0) return dist;
    if (!this.roleConfig.allowLeaderlessGame) dist.Leader = 1;

    const weighted = ROLE_ORDER.flatMap(r => Array<RoleType>(RANDOM_ROLE_WEIGHTS[r]).fill(r));
    for (let slot = dist.Leader; slot < activeCount; slot++) {
      const pool = dist.Leader > 0 ? weighted.filter(r => r !== 'Leader') : weighted;
      const role = pickOne(pool, this.random);
      if (role) dist[role]++;
    }

    this.logger.log(
      `Fully random distribution for ${activeCount} players: ` +
        ROLE_ORDER.map(r => `${r}=${dist[r]}`).join(' '),
    );
    return dist;
  }
}
