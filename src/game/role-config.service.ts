import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  ConfigurationError,
  PresetNotFoundError,
  TooManyRolesError,
} from '../common/errors';
import { RoleDefinition, SERVER_CONFIG, ServerConfig } from '../config/server.config';
import { Card } from '../types/card.types';
import {
  CUSTOM_PRESET,
  Distribution,
  Preset,
  ROLE_ORDER,
  RoleConfiguration,
  RoleType,
  countsOf,
  isCustom,
  totalRoles,
} from '../types/role.types';
import { CardService } from './card.service';

export type AutoScaleResult = { canScale: boolean; details: string };

type ResolvedPreset = {
  preset: Preset;
  sourceCount: number;
  /** Preset entry after leader normalisation, before resizing. */
  base: Distribution;
  adapted: Distribution;
};

// Sort rank for role definitions, lower first
const CATEGORY_ORDER: Record<RoleType, number> = {
  Leader: 1,
  Guardian: 2,
  Traitor: 3,
  Assassin: 4,
};

/**
 * Turns a room's role configuration into per-role-type counts, and owns the
 * editing rules for configurations.
 */
@Injectable()
export class RoleConfigService {
  private readonly logger = new Logger(RoleConfigService.name);

  constructor(
    @Inject(SERVER_CONFIG) private readonly config: ServerConfig,
    private readonly cards: CardService,
  ) {}

  /* ---------------------------------- */
  /* Construction                       */
  /* ---------------------------------- */

  createFromPreset(presetName: string, maxPlayers: number): RoleConfiguration {
    const preset = this.config.getPreset(presetName);
    if (!preset) throw new PresetNotFoundError(presetName);

    const minPlayers = Math.min(maxPlayers, ...preset.distributions.keys());
    const roleConfig = this.blankConfiguration(presetName, minPlayers, maxPlayers);

    const exact = preset.distributions.get(maxPlayers);
    if (exact) {
      for (const r of ROLE_ORDER) roleConfig.roleTypes[r].count = exact[r];
    }
    return roleConfig;
  }

  createDefaultConfiguration(): RoleConfiguration {
    const { minPlayersPerRoom, maxPlayersPerRoom } = this.config.server;
    const roleConfig = this.blankConfiguration(CUSTOM_PRESET, minPlayersPerRoom, maxPlayersPerRoom);
    roleConfig.roleTypes.Leader.count = 1;
    return roleConfig;
  }

  private blankConfiguration(presetName: string, minPlayers: number, maxPlayers: number): RoleConfiguration {
    const typeConfig = (r: RoleType) => ({
      count: 0,
      enabledCards: new Set(this.cards.getCards(r).map(c => c.name)),
    });

    return {
      presetName,
      minPlayers,
      maxPlayers,
      allowLeaderlessGame: false,
      hideRoleDistribution: false,
      fullyRandomRoles: false,
      roleTypes: {
        Leader: typeConfig('Leader'),
        Guardian: typeConfig('Guardian'),
        Assassin: typeConfig('Assassin'),
        Traitor: typeConfig('Traitor'),
      },
    };
  }

  /* ---------------------------------- */
  /* Distribution                       */
  /* ---------------------------------- */

  /**
   * Custom configurations return their counts untouched (fewer roles than
   * players is left for room validation to report). Presets resolve the exact
   * or nearest entry and resize it to `playerCount` through Guardian.
   *
   * @throws PresetNotFoundError, TooManyRolesError, ConfigurationError
   */
  getDistributionForPlayerCount(roleConfig: RoleConfiguration, playerCount: number): Distribution {
    if (isCustom(roleConfig)) {
      const dist = countsOf(roleConfig);
      if (dist.Leader > 1) {
        throw new ConfigurationError(
          `cannot have more than 1 leader, got ${dist.Leader}`,
          'roleTypes.Leader.count',
        );
      }
      const total = totalRoles(dist);
      if (total > playerCount) throw new TooManyRolesError(total, playerCount);
      return dist;
    }

    const resolved = this.resolvePreset(roleConfig, playerCount);
    if (totalRoles(resolved.adapted) !== playerCount) {
      this.logger.warn(
        `Preset ${roleConfig.presetName}: ${resolved.sourceCount}-player entry only shrinks to ` +
          `${totalRoles(resolved.adapted)} roles for ${playerCount} players`,
      );
    }
    return resolved.adapted;
  }

  canAutoScale(roleConfig: RoleConfiguration, targetPlayers: number): AutoScaleResult {
    const name = roleConfig.presetName;
    if (isCustom(roleConfig)) {
      return { canScale: false, details: 'Custom configurations do not support auto-scaling' };
    }

    const preset = this.config.getPreset(name);
    if (!preset) return { canScale: false, details: `Preset '${name}' not found` };
    if (preset.distributions.size === 0) {
      return { canScale: false, details: `Preset '${name}' has no distributions` };
    }

    if (preset.distributions.has(targetPlayers)) {
      const configured = totalRoles(countsOf(roleConfig));
      return {
        canScale: true,
        details: `Can scale from ${configured} to ${targetPlayers} players using ${name} preset`,
      };
    }

    const { sourceCount, base, adapted } = this.resolvePreset(roleConfig, targetPlayers);
    if (totalRoles(adapted) !== targetPlayers) {
      return {
        canScale: false,
        details: `Cannot adapt ${sourceCount}-player ${name} preset to ${targetPlayers} players`,
      };
    }

    const baseTotal = totalRoles(base);
    if (baseTotal < targetPlayers) {
      return {
        canScale: true,
        details:
          `Can scale to ${targetPlayers} players by adding ${targetPlayers - baseTotal} ` +
          `guardian role(s) to ${sourceCount}-player ${name} preset`,
      };
    }
    return {
      canScale: true,
      details: `Can scale to ${targetPlayers} players by adapting ${sourceCount}-player ${name} preset`,
    };
  }

  private resolvePreset(roleConfig: RoleConfiguration, playerCount: number): ResolvedPreset {
    const preset = this.config.getPreset(roleConfig.presetName);
    if (!preset) throw new PresetNotFoundError(roleConfig.presetName);

    const sourceCount = nearestPlayerCount(preset, playerCount);
    const entry = sourceCount === undefined ? undefined : preset.distributions.get(sourceCount);
    if (sourceCount === undefined || !entry) {
      throw new ConfigurationError(`preset '${preset.name}' has no distributions`, 'presetName');
    }

    const base = { ...entry };
    if (base.Leader > 1) base.Leader = 1;
    if (base.Leader === 0 && !roleConfig.allowLeaderlessGame) base.Leader = 1;

    // Guardian is the only type that grows or shrinks
    const adapted = { ...base };
    let total = totalRoles(adapted);
    if (total < playerCount) {
      adapted.Guardian += playerCount - total;
    }
    while (total > playerCount && adapted.Guardian > 1) {
      adapted.Guardian--;
      total--;
    }

    return { preset, sourceCount, base, adapted };
  }

  /* ---------------------------------- */
  /* Validation                         */
  /* ---------------------------------- */

  /** @throws ConfigurationError naming the offending field */
  validateConfiguration(roleConfig: RoleConfiguration): void {
    if (!isCustom(roleConfig) && !this.config.getPreset(roleConfig.presetName)) {
      throw new PresetNotFoundError(roleConfig.presetName);
    }

    for (const r of ROLE_ORDER) {
      const { count } = roleConfig.roleTypes[r];
      if (count < 0) {
        throw new ConfigurationError(`${r}: count cannot be negative`, `roleTypes.${r}.count`);
      }
      if (count === 0) continue;

      const enabled = this.eligibleCards(roleConfig, r).length;
      if (count > enabled) {
        throw new ConfigurationError(
          `${r}: need ${count} cards but only ${enabled} are enabled`,
          `roleTypes.${r}.enabledCards`,
        );
      }
    }

    const leaders = roleConfig.roleTypes.Leader.count;
    if (leaders > 1) {
      throw new ConfigurationError(`cannot have more than 1 leader, got ${leaders}`, 'roleTypes.Leader.count');
    }
    if (leaders === 0 && !roleConfig.allowLeaderlessGame) {
      throw new ConfigurationError('must have a leader role', 'roleTypes.Leader.count');
    }

    const { minPlayersPerRoom, maxPlayersPerRoom } = this.config.server;
    if (roleConfig.minPlayers < minPlayersPerRoom) {
      throw new ConfigurationError(
        `minimum players ${roleConfig.minPlayers} is less than server minimum ${minPlayersPerRoom}`,
        'minPlayers',
      );
    }
    if (roleConfig.maxPlayers > maxPlayersPerRoom) {
      throw new ConfigurationError(
        `maximum players ${roleConfig.maxPlayers} exceeds server maximum ${maxPlayersPerRoom}`,
        'maxPlayers',
      );
    }
  }

  /** Cards of one type the configuration allows to be dealt. */
  eligibleCards(roleConfig: RoleConfiguration | undefined, roleType: RoleType): readonly Card[] {
    const all = this.cards.getCards(roleType);
    const enabled = roleConfig?.roleTypes[roleType].enabledCards;
    if (!enabled || enabled.size === 0) return all;
    return all.filter(c => enabled.has(c.name));
  }

  /* ---------------------------------- */
  /* Editing                            */
  /* ---------------------------------- */

  adjustRoleCount(roleConfig: RoleConfiguration, roleType: RoleType, delta: number): number {
    const typeConfig = roleConfig.roleTypes[roleType];
    const cap = roleType === 'Leader' ? 1 : Number.POSITIVE_INFINITY;
    const next = Math.min(Math.max(0, typeConfig.count + delta), cap);

    if (next !== typeConfig.count) {
      typeConfig.count = next;
      roleConfig.presetName = CUSTOM_PRESET;
      this.recalculatePlayerLimits(roleConfig);
    }
    return typeConfig.count;
  }

  /** Flips one card's eligibility and returns whether it is now enabled. */
  toggleCard(roleConfig: RoleConfiguration, roleType: RoleType, cardName: string): boolean {
    const card = this.cards.findCard(cardName);
    if (!card || card.roleType !== roleType) {
      throw new ConfigurationError(`unknown ${roleType} card: ${cardName}`, `roleTypes.${roleType}.enabledCards`);
    }

    const typeConfig = roleConfig.roleTypes[roleType];
    if (typeConfig.enabledCards.size === 0) {
      typeConfig.enabledCards = new Set(this.cards.getCards(roleType).map(c => c.name));
    }

    const enabled = typeConfig.enabledCards;
    if (!enabled.has(cardName)) {
      enabled.add(cardName);
      return true;
    }
    if (enabled.size === 1) {
      throw new ConfigurationError(
        `${roleType}: at least one card must stay enabled`,
        `roleTypes.${roleType}.enabledCards`,
      );
    }
    enabled.delete(cardName);
    return false;
  }

  setLeaderless(roleConfig: RoleConfiguration, allow: boolean): void {
    roleConfig.allowLeaderlessGame = allow;
    if (!allow && roleConfig.roleTypes.Leader.count === 0) {
      this.logger.debug('Leaderless play disabled with no Leader configured, restoring one Leader');
      roleConfig.roleTypes.Leader.count = 1;
      roleConfig.presetName = CUSTOM_PRESET;
      this.recalculatePlayerLimits(roleConfig);
    }
  }

  setRoleModes(
    roleConfig: RoleConfiguration,
    modes: { hideRoleDistribution?: boolean; fullyRandomRoles?: boolean },
  ): void {
    if (modes.hideRoleDistribution !== undefined) roleConfig.hideRoleDistribution = modes.hideRoleDistribution;
    if (modes.fullyRandomRoles !== undefined) roleConfig.fullyRandomRoles = modes.fullyRandomRoles;
  }

  recalculatePlayerLimits(roleConfig: RoleConfiguration): void {
    const { minPlayersPerRoom, maxPlayersPerRoom } = this.config.server;
    const total = totalRoles(countsOf(roleConfig));

    const minPlayers = Math.max(total, minPlayersPerRoom);
    let maxPlayers = Math.min(Math.max(total, minPlayers), maxPlayersPerRoom);
    if (!isCustom(roleConfig)) maxPlayers = maxPlayersPerRoom;

    roleConfig.minPlayers = minPlayers;
    roleConfig.maxPlayers = maxPlayers;
  }

  /** Always-revealed roles first, then by category, then by display name. */
  getSortedRoleDefinitions(): { name: string; definition: RoleDefinition }[] {
    const rank = (def: RoleDefinition) => {
      const category = ROLE_ORDER.find(r => r.toLowerCase() === def.category.toLowerCase());
      return category ? CATEGORY_ORDER[category] : ROLE_ORDER.length + 1;
    };

    return Object.entries(this.config.roleDefinitions)
      .map(([name, definition]) => ({ name, definition }))
      .sort((a, b) => {
        if (a.definition.alwaysRevealed !== b.definition.alwaysRevealed) {
          return a.definition.alwaysRevealed ? -1 : 1;
        }
        const byCategory = rank(a.definition) - rank(b.definition);
        if (byCategory !== 0) return byCategory;
        return a.definition.displayName.localeCompare(b.definition.displayName);
      });
  }
}

/** Exact key when present, else the closest key; ties go to the smaller key. */
export function nearestPlayerCount(preset: Preset, playerCount: number): number | undefined {
  if (preset.distributions.has(playerCount)) return playerCount;

  let best: number | undefined;
  for (const count of [...preset.distributions.keys()].sort((a, b) => a - b)) {
    if (best === undefined || Math.abs(count - playerCount) < Math.abs(best - playerCount)) {
      best = count;
    }
  }
  return best;
}
