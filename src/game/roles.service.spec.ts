import { createTestServices } from '../testing/fixtures';
import { Player, createPlayer } from '../types/player.types';
import { RoleConfigService } from './role-config.service';
import { RolesService } from './roles.service';

function table(count: number, hosts = 0): Player[] {
  const players: Player[] = [];
  for (let i = 0; i < hosts; i++) players.push(createPlayer(`host-${i}`, `Host ${i}`, `s-host-${i}`, true));
  for (let i = 0; i < count; i++) players.push(createPlayer(`p-${i}`, `Player ${i}`, `s-${i}`));
  return players;
}

function customConfig(service: RoleConfigService, guardians: number, traitors: number) {
  const roleConfig = service.createDefaultConfiguration();
  service.adjustRoleCount(roleConfig, 'Guardian', guardians);
  service.adjustRoleCount(roleConfig, 'Traitor', traitors);
  return roleConfig;
}

describe('RolesService', () => {
  let roles: RolesService;
  let roleConfig: RoleConfigService;

  beforeEach(() => {
    ({ roles, roleConfig } = createTestServices('deal'));
  });

  it('deals the built-in table to everyone but the hosts', () => {
    const players = table(5, 1);
    const result = roles.assignRoles(players);

    expect(result.strategy).toBe('fixed-table');
    expect(result.distribution).toEqual({ Leader: 1, Guardian: 2, Assassin: 1, Traitor: 1 });
    expect(result.assigned).toBe(5);
    expect(result.unassigned).toEqual([]);

    expect(players[0].role).toBeNull();
    const dealt = players.filter(p => !p.isHost).map(p => p.role?.roleType).sort();
    expect(dealt).toEqual(['Assassin', 'Guardian', 'Guardian', 'Leader', 'Traitor']);
  });

  it('never deals the same card twice', () => {
    const players = table(8);
    roles.assignRoles(players);

    const names = players.map(p => p.role?.name);
    expect(new Set(names).size).toBe(8);
  });

  it('reveals the Leader and nobody else', () => {
    const players = table(6);
    roles.assignRoles(players);

    const revealed = players.filter(p => p.roleRevealed);
    expect(revealed).toHaveLength(1);
    expect(revealed[0].role?.roleType).toBe('Leader');
  });

  it('leaves players without a card when a type runs out', () => {
    const players = table(10);
    const result = roles.assignRoles(players);

    expect(result.distribution).toEqual({ Leader: 1, Guardian: 9, Assassin: 0, Traitor: 0 });
    expect(result.assigned).toBe(5);
    expect(result.unassigned).toHaveLength(5);
    expect(result.unassigned.every(p => p.role === null)).toBe(true);
  });

  it('clears roles from an earlier deal', () => {
    const players = table(10);
    roles.assignRoles(players);
    roles.assignRoles(players);

    expect(players.filter(p => p.role !== null)).toHaveLength(5);
  });

  it('deals nothing to a table of hosts', () => {
    const result = roles.assignRoles(table(0, 2));
    expect(result.assigned).toBe(0);
    expect(result.distribution).toEqual({ Leader: 0, Guardian: 0, Assassin: 0, Traitor: 0 });
  });

  it('deals a custom configuration seat by seat', () => {
    const fixed = new RolesService(roleConfig, createTestServices().cards, () => 0);
    const players = table(4);

    const result = fixed.assign(players, customConfig(roleConfig, 2, 1));

    expect(result.strategy).toBe('custom');
    expect(players.map(p => p.role?.name)).toEqual(['Coin', 'Scepter', 'Lantern', 'Anchor']);
    expect(players.map(p => p.roleRevealed)).toEqual([false, true, false, false]);
  });

  it('deals a single Leader when a custom configuration asks for two', () => {
    const config = customConfig(roleConfig, 1, 0);
    config.roleTypes.Leader.count = 2;

    const players = table(3);
    const result = roles.assignRolesWithConfig(players, config);

    expect(result.distribution).toEqual({ Leader: 1, Guardian: 1, Assassin: 0, Traitor: 0 });
    expect(result.assigned).toBe(2);
    expect(result.unassigned).toHaveLength(1);
    expect(players.filter(p => p.role?.roleType === 'Leader')).toHaveLength(1);
    expect(players.filter(p => p.roleRevealed)).toHaveLength(1);
  });

  it('deals a leaderless table', () => {
    const config = customConfig(roleConfig, 2, 1);
    roleConfig.adjustRoleCount(config, 'Leader', -1);
    config.allowLeaderlessGame = true;

    const players = table(3);
    const result = roles.assignRolesWithConfig(players, config);

    expect(result.distribution).toEqual({ Leader: 0, Guardian: 2, Assassin: 0, Traitor: 1 });
    expect(players.some(p => p.role?.roleType === 'Leader')).toBe(false);
    expect(players.some(p => p.roleRevealed)).toBe(false);
  });

  it('deals only enabled cards', () => {
    const config = customConfig(roleConfig, 2, 0);
    config.roleTypes.Guardian.enabledCards = new Set(['Shield', 'Banner']);

    const players = table(3);
    roles.assign(players, config);

    const guardians = players.filter(p => p.role?.roleType === 'Guardian').map(p => p.role?.name);
    expect(guardians.sort()).toEqual(['Banner', 'Shield']);
  });

  it('reports the preset drawn for a hidden distribution', () => {
    const fixed = new RolesService(roleConfig, createTestServices().cards, () => 0);
    const config = roleConfig.createFromPreset('standard', 5);
    config.hideRoleDistribution = true;

    const result = fixed.assign(table(5), config);

    expect(result.strategy).toBe('hidden-preset');
    expect(result.hiddenPreset).toBe('standard');
    expect(result.assigned).toBe(5);
  });
});
