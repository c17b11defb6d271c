import { ConfigurationError, PresetNotFoundError, TooManyRolesError } from '../common/errors';
import { buildServerConfig } from '../config/server.config';
import { createTestServices } from '../testing/fixtures';
import { Distribution, RoleConfiguration, countsOf, totalRoles } from '../types/role.types';
import { RoleConfigService, nearestPlayerCount } from './role-config.service';

function custom(service: RoleConfigService, counts: Partial<Distribution>) {
  const roleConfig = service.createDefaultConfiguration();
  roleConfig.roleTypes.Leader.count = counts.Leader ?? 0;
  roleConfig.roleTypes.Guardian.count = counts.Guardian ?? 0;
  roleConfig.roleTypes.Assassin.count = counts.Assassin ?? 0;
  roleConfig.roleTypes.Traitor.count = counts.Traitor ?? 0;
  return roleConfig;
}

describe('RoleConfigService', () => {
  let service: RoleConfigService;

  beforeEach(() => {
    service = createTestServices().roleConfig;
  });

  describe('createFromPreset', () => {
    it('copies the exact entry for the room size', () => {
      const roleConfig = service.createFromPreset('standard', 5);

      expect(roleConfig.presetName).toBe('standard');
      expect(roleConfig.minPlayers).toBe(1);
      expect(roleConfig.maxPlayers).toBe(5);
      expect(roleConfig.roleTypes.Assassin.count).toBe(1);
      expect([...roleConfig.roleTypes.Traitor.enabledCards]).toEqual(['Mask', 'Coin']);
    });

    it('leaves counts at zero without an exact entry', () => {
      const roleConfig = service.createFromPreset('sparse', 5);
      expect(roleConfig.minPlayers).toBe(4);
      expect(totalRoles(countsOf(roleConfig))).toBe(0);
    });

    it('rejects unknown presets', () => {
      expect(() => service.createFromPreset('ghost', 5)).toThrow(new PresetNotFoundError('ghost'));
      expect(() => service.createFromPreset('ghost', 5)).toThrow("preset 'ghost' not found");
    });
  });

  it('creates a custom default with one Leader', () => {
    const roleConfig = service.createDefaultConfiguration();

    expect(roleConfig.presetName).toBe('custom');
    expect(roleConfig.minPlayers).toBe(1);
    expect(roleConfig.maxPlayers).toBe(20);
    expect(roleConfig.roleTypes.Leader.count).toBe(1);
    expect(roleConfig.roleTypes.Guardian.count).toBe(0);
    expect(roleConfig.roleTypes.Guardian.enabledCards.size).toBe(4);
  });

  describe('getDistributionForPlayerCount', () => {
    it.each([1, 2, 3, 4, 5, 6, 7, 8])('sizes the standard preset to %i players', n => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('standard', n), n);
      expect(totalRoles(dist)).toBe(n);
      expect(dist.Leader).toBe(1);
    });

    it('uses the standard five-player table', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('standard', 5), 5);
      expect(dist).toEqual({ Leader: 1, Guardian: 2, Assassin: 1, Traitor: 1 });
    });

    it('grows the nearest smaller entry on a tie', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('sparse', 5), 5);
      expect(dist).toEqual({ Leader: 1, Guardian: 3, Assassin: 0, Traitor: 1 });
    });

    it('shrinks a larger entry through Guardian', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('sparse', 3), 3);
      expect(dist).toEqual({ Leader: 1, Guardian: 1, Assassin: 0, Traitor: 1 });
    });

    it('stops shrinking at one Guardian', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('sparse', 2), 2);
      expect(dist).toEqual({ Leader: 1, Guardian: 1, Assassin: 0, Traitor: 1 });
    });

    it('grows past the largest entry', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('sparse', 9), 9);
      expect(dist).toEqual({ Leader: 1, Guardian: 6, Assassin: 1, Traitor: 1 });
    });

    it('clamps preset Leaders to one', () => {
      const dist = service.getDistributionForPlayerCount(service.createFromPreset('crowded', 3), 3);
      expect(dist).toEqual({ Leader: 1, Guardian: 2, Assassin: 0, Traitor: 0 });
    });

    it('returns custom counts untouched', () => {
      const dist = service.getDistributionForPlayerCount(custom(service, { Leader: 1, Guardian: 1 }), 4);
      expect(dist).toEqual({ Leader: 1, Guardian: 1, Assassin: 0, Traitor: 0 });
    });

    it('allows a leaderless custom configuration', () => {
      const roleConfig = custom(service, { Guardian: 2, Traitor: 1 });
      roleConfig.allowLeaderlessGame = true;

      expect(service.getDistributionForPlayerCount(roleConfig, 3)).toEqual({
        Leader: 0,
        Guardian: 2,
        Assassin: 0,
        Traitor: 1,
      });
      expect(() => service.validateConfiguration(roleConfig)).not.toThrow();
    });

    it('rejects more roles than players', () => {
      const roleConfig = custom(service, { Leader: 1, Guardian: 3, Assassin: 1, Traitor: 1 });
      expect(() => service.getDistributionForPlayerCount(roleConfig, 4)).toThrow(new TooManyRolesError(6, 4));
      expect(() => service.getDistributionForPlayerCount(roleConfig, 4)).toThrow(
        'too many roles (6) for player count (4)',
      );
    });

    it('rejects two Leaders in a custom configuration', () => {
      const roleConfig = custom(service, { Leader: 2 });
      expect(() => service.getDistributionForPlayerCount(roleConfig, 4)).toThrow(
        'cannot have more than 1 leader, got 2',
      );
    });

    it('rejects a missing preset', () => {
      const roleConfig = service.createFromPreset('standard', 5);
      roleConfig.presetName = 'ghost';
      expect(() => service.getDistributionForPlayerCount(roleConfig, 5)).toThrow(PresetNotFoundError);
    });

    it('rejects a preset without any entries', () => {
      const config = buildServerConfig({ roles: { presets: { empty: { distributions: {} } } } });
      const empty = new RoleConfigService(config, createTestServices().cards);
      const roleConfig = empty.createFromPreset('empty', 5);

      expect(() => empty.getDistributionForPlayerCount(roleConfig, 5)).toThrow(
        new ConfigurationError("preset 'empty' has no distributions", 'presetName'),
      );
    });
  });

  describe('canAutoScale', () => {
    it('scales to an exact entry', () => {
      expect(service.canAutoScale(service.createFromPreset('sparse', 6), 4)).toEqual({
        canScale: true,
        details: 'Can scale from 6 to 4 players using sparse preset',
      });
    });

    it('adds Guardians to a smaller entry', () => {
      expect(service.canAutoScale(service.createFromPreset('sparse', 4), 5)).toEqual({
        canScale: true,
        details: 'Can scale to 5 players by adding 1 guardian role(s) to 4-player sparse preset',
      });
      expect(service.canAutoScale(service.createFromPreset('sparse', 6), 9)).toEqual({
        canScale: true,
        details: 'Can scale to 9 players by adding 3 guardian role(s) to 6-player sparse preset',
      });
    });

    it('adapts a larger entry', () => {
      expect(service.canAutoScale(service.createFromPreset('sparse', 4), 3)).toEqual({
        canScale: true,
        details: 'Can scale to 3 players by adapting 4-player sparse preset',
      });
    });

    it('reports entries that cannot shrink far enough', () => {
      expect(service.canAutoScale(service.createFromPreset('sparse', 4), 2)).toEqual({
        canScale: false,
        details: 'Cannot adapt 4-player sparse preset to 2 players',
      });
    });

    it('never scales custom configurations', () => {
      expect(service.canAutoScale(service.createDefaultConfiguration(), 5)).toEqual({
        canScale: false,
        details: 'Custom configurations do not support auto-scaling',
      });
    });

    it('reports a missing preset', () => {
      const roleConfig = service.createFromPreset('standard', 5);
      roleConfig.presetName = 'ghost';
      expect(service.canAutoScale(roleConfig, 5)).toEqual({ canScale: false, details: "Preset 'ghost' not found" });
    });
  });

  describe('validateConfiguration', () => {
    it('accepts the standard preset', () => {
      expect(() => service.validateConfiguration(service.createFromPreset('standard', 8))).not.toThrow();
    });

    it('needs enough enabled cards per type', () => {
      const roleConfig = custom(service, { Leader: 1, Traitor: 3 });
      expect(() => service.validateConfiguration(roleConfig)).toThrow('Traitor: need 3 cards but only 2 are enabled');
    });

    it('counts only enabled cards', () => {
      const roleConfig = custom(service, { Leader: 1, Assassin: 2 });
      roleConfig.roleTypes.Assassin.enabledCards = new Set(['Dagger']);
      expect(() => service.validateConfiguration(roleConfig)).toThrow('Assassin: need 2 cards but only 1 are enabled');
    });

    it('rejects negative counts', () => {
      const roleConfig = custom(service, { Leader: 1, Guardian: -1 });
      expect(() => service.validateConfiguration(roleConfig)).toThrow('Guardian: count cannot be negative');
    });

    it('needs a Leader unless leaderless play is allowed', () => {
      const roleConfig = custom(service, { Guardian: 2 });
      expect(() => service.validateConfiguration(roleConfig)).toThrow('must have a leader role');

      roleConfig.allowLeaderlessGame = true;
      expect(() => service.validateConfiguration(roleConfig)).not.toThrow();
    });

    it('keeps player bounds within the server limits', () => {
      const low = service.createDefaultConfiguration();
      low.minPlayers = 0;
      expect(() => service.validateConfiguration(low)).toThrow('minimum players 0 is less than server minimum 1');

      const high = service.createDefaultConfiguration();
      high.maxPlayers = 25;
      expect(() => service.validateConfiguration(high)).toThrow('maximum players 25 exceeds server maximum 20');
    });

    it('names the offending field', () => {
      const roleConfig = custom(service, { Guardian: 2 });
      let caught: unknown;
      try {
        service.validateConfiguration(roleConfig);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.field).toBe('roleTypes.Leader.count');
    });
  });

  describe('editing', () => {
    let roleConfig: RoleConfiguration;

    beforeEach(() => {
      roleConfig = service.createFromPreset('standard', 5);
    });

    it('switches to custom and resizes the bounds when a count changes', () => {
      expect(service.adjustRoleCount(roleConfig, 'Guardian', 1)).toBe(3);
      expect(roleConfig.presetName).toBe('custom');
      expect(roleConfig.minPlayers).toBe(6);
      expect(roleConfig.maxPlayers).toBe(6);
    });

    it('caps the Leader at one and floors counts at zero', () => {
      expect(service.adjustRoleCount(roleConfig, 'Leader', 5)).toBe(1);
      expect(roleConfig.presetName).toBe('standard');
      expect(service.adjustRoleCount(roleConfig, 'Traitor', -5)).toBe(0);
      expect(roleConfig.presetName).toBe('custom');
    });

    it('toggles cards on and off', () => {
      expect(service.toggleCard(roleConfig, 'Guardian', 'Shield')).toBe(false);
      expect(roleConfig.roleTypes.Guardian.enabledCards.has('Shield')).toBe(false);
      expect(service.toggleCard(roleConfig, 'Guardian', 'Shield')).toBe(true);
    });

    it('treats an empty card set as every card', () => {
      roleConfig.roleTypes.Guardian.enabledCards = new Set();
      expect(service.eligibleCards(roleConfig, 'Guardian')).toHaveLength(4);

      expect(service.toggleCard(roleConfig, 'Guardian', 'Shield')).toBe(false);
      expect([...roleConfig.roleTypes.Guardian.enabledCards]).toEqual(['Lantern', 'Anchor', 'Banner']);
    });

    it('keeps at least one card enabled', () => {
      expect(service.toggleCard(roleConfig, 'Leader', 'Crown')).toBe(false);
      expect(() => service.toggleCard(roleConfig, 'Leader', 'Scepter')).toThrow(
        'Leader: at least one card must stay enabled',
      );
    });

    it('rejects cards of another type', () => {
      expect(() => service.toggleCard(roleConfig, 'Guardian', 'Dagger')).toThrow('unknown Guardian card: Dagger');
    });

    it('filters eligible cards by the enabled set', () => {
      roleConfig.roleTypes.Assassin.enabledCards = new Set(['Vial']);
      expect(service.eligibleCards(roleConfig, 'Assassin').map(c => c.name)).toEqual(['Vial']);
      expect(service.eligibleCards(undefined, 'Assassin')).toHaveLength(3);
    });

    it('restores a Leader when leaderless play is turned off', () => {
      roleConfig.roleTypes.Leader.count = 0;
      service.setLeaderless(roleConfig, true);
      expect(roleConfig.roleTypes.Leader.count).toBe(0);

      service.setLeaderless(roleConfig, false);
      expect(roleConfig.allowLeaderlessGame).toBe(false);
      expect(roleConfig.roleTypes.Leader.count).toBe(1);
      expect(roleConfig.presetName).toBe('custom');
    });

    it('sets only the modes given', () => {
      service.setRoleModes(roleConfig, { fullyRandomRoles: true });
      expect(roleConfig.fullyRandomRoles).toBe(true);
      expect(roleConfig.hideRoleDistribution).toBe(false);
    });

    it('keeps the server maximum for presets', () => {
      service.recalculatePlayerLimits(roleConfig);
      expect(roleConfig.minPlayers).toBe(5);
      expect(roleConfig.maxPlayers).toBe(20);
    });
  });

  it('sorts role definitions by reveal, then category', () => {
    expect(service.getSortedRoleDefinitions().map(d => d.name)).toEqual([
      'leader',
      'guardian',
      'traitor',
      'assassin',
    ]);
  });
});

describe('nearestPlayerCount', () => {
  const { config } = createTestServices();
  const sparse = config.getPreset('sparse');

  it('prefers the exact key, then the closest, then the smaller', () => {
    if (!sparse) throw new Error('sparse preset missing');
    expect(nearestPlayerCount(sparse, 6)).toBe(6);
    expect(nearestPlayerCount(sparse, 7)).toBe(6);
    expect(nearestPlayerCount(sparse, 5)).toBe(4);
    expect(nearestPlayerCount(sparse, 1)).toBe(4);
  });
});
