import {
  ConfigurationError,
  DuplicateNameError,
  InvalidTransitionError,
  RoomFullError,
} from '../common/errors';
import type { RoleConfigService } from '../game/role-config.service';
import type { AssignmentResult, RolesService } from '../game/roles.service';
import { Player } from '../types/player.types';
import { RoleConfiguration, countsOf, isCustom, totalRoles } from '../types/role.types';
import { GameState, RoomOptions, ValidationState } from '../types/room.types';
import { RoomLock } from './room.lock';

const TRANSITIONS: Record<GameState, readonly GameState[]> = {
  lobby: ['countdown', 'ended'],
  countdown: ['playing', 'ended'],
  playing: ['ended'],
  ended: [],
};

export class Room {
  readonly code: string;
  readonly maxPlayers: number;
  readonly createdAt = new Date();

  private _state: GameState = 'lobby';
  private readonly players = new Map<string, Player>();
  private _roleConfig?: RoleConfiguration;
  private _ownerId: string | null = null;

  private _startedAt: Date | null = null;
  private _countdownRemaining = 0;
  private _leaderRevealed = false;

  private validationVersion = 0;
  private lastValidatedAt = 0;

  private readonly lock: RoomLock;

  constructor(options: RoomOptions) {
    this.code = options.code;
    this.maxPlayers = options.maxPlayers;
    this._roleConfig = options.roleConfig;
    this.lock = new RoomLock(options.code);
  }

  /* ---------------------------------- */
  /* Membership                         */
  /* ---------------------------------- */

  /**
   * Check and insert happen in one write section, so two joins can never
   * both pass the capacity check. Hosts skip the capacity check.
   *
   * @throws DuplicateNameError, RoomFullError
   */
  addPlayer(player: Player): void {
    this.lock.write(() => {
      const name = player.name.toLowerCase();
      for (const p of this.players.values()) {
        if (p.id !== player.id && p.name.toLowerCase() === name) {
          throw new DuplicateNameError(player.name);
        }
      }

      const existing = this.players.get(player.id);
      const seated = this.countActive() - (existing && !existing.isHost ? 1 : 0);
      if (!player.isHost && seated >= this.maxPlayers) {
        throw new RoomFullError(this.maxPlayers);
      }

      this.players.set(player.id, player);
    });
  }

  removePlayer(playerId: string): void {
    this.lock.write(() => {
      this.players.delete(playerId);
      if (this._ownerId === playerId) {
        this._ownerId = this.players.keys().next().value ?? null;
      }
    });
  }

  getPlayer(playerId: string): Player | undefined {
    return this.lock.read(() => this.players.get(playerId));
  }

  /** Live player objects, not copies. */
  getPlayers(): Player[] {
    return this.lock.read(() => [...this.players.values()]);
  }

  /** Live non-host player objects. */
  getActivePlayers(): Player[] {
    return this.lock.read(() => [...this.players.values()].filter(p => !p.isHost));
  }

  getActivePlayerCount(): number {
    return this.lock.read(() => this.countActive());
  }

  getLeader(): Player | undefined {
    return this.lock.read(() => [...this.players.values()].find(p => p.role?.roleType === 'Leader'));
  }

  /** The room owner if still present, else the first player flagged as host. */
  getHost(): Player | undefined {
    return this.lock.read(() => {
      const owner = this._ownerId ? this.players.get(this._ownerId) : undefined;
      return owner ?? [...this.players.values()].find(p => p.isHost);
    });
  }

  get ownerId(): string | null {
    return this.lock.read(() => this._ownerId);
  }

  setOwner(playerId: string): void {
    this.lock.write(() => {
      this._ownerId = playerId;
    });
  }

  private countActive(): number {
    let count = 0;
    for (const p of this.players.values()) if (!p.isHost) count++;
    return count;
  }

  /* ---------------------------------- */
  /* Lifecycle                          */
  /* ---------------------------------- */

  get state(): GameState {
    return this.lock.read(() => this._state);
  }

  get countdownRemaining(): number {
    return this.lock.read(() => this._countdownRemaining);
  }

  get startedAt(): Date | null {
    return this.lock.read(() => this._startedAt);
  }

  get leaderRevealed(): boolean {
    return this.lock.read(() => this._leaderRevealed);
  }

  /** Lobby with at least one non-host player. Role counts are not checked. */
  canStart(): boolean {
    return this.lock.read(() => this._state === 'lobby' && this.countActive() >= 1);
  }

  canTransition(next: GameState): boolean {
    return this.lock.read(() => TRANSITIONS[this._state].includes(next));
  }

  /** @throws InvalidTransitionError for anything but a forward edge */
  transition(next: GameState, countdownSeconds = 0): void {
    this.lock.write(() => {
      if (!TRANSITIONS[this._state].includes(next)) {
        throw new InvalidTransitionError(this._state, next);
      }
      this._state = next;

      if (next === 'countdown') {
        this._startedAt = new Date();
        this._countdownRemaining = countdownSeconds;
      } else if (next === 'playing') {
        this._countdownRemaining = 0;
        this._leaderRevealed = true;
      } else if (next === 'ended') {
        this._countdownRemaining = 0;
      }
    });
  }

  tickCountdown(remaining: number): void {
    this.lock.write(() => {
      if (this._state !== 'countdown') throw new InvalidTransitionError(this._state, 'countdown');
      this._countdownRemaining = Math.max(0, remaining);
    });
  }

  /* ---------------------------------- */
  /* Role configuration                 */
  /* ---------------------------------- */

  get roleConfig(): RoleConfiguration | undefined {
    return this.lock.read(() => this._roleConfig);
  }

  setRoleConfig(roleConfig: RoleConfiguration | undefined): void {
    this.lock.write(() => {
      this._roleConfig = roleConfig;
    });
  }

  /** Edits the configuration in place under the write lock. */
  updateRoleConfig<T>(fn: (roleConfig: RoleConfiguration) => T): T {
    return this.lock.write(() => {
      if (!this._roleConfig) throw new ConfigurationError('no role configuration set', 'roleConfig');
      return fn(this._roleConfig);
    });
  }

  /**
   * Checks the active player count against the configuration's bounds, then
   * the configuration itself.
   *
   * @throws ConfigurationError
   */
  validateRoleConfig(roleService: RoleConfigService): void {
    this.lock.read(() => {
      const roleConfig = this._roleConfig;
      if (!roleConfig) throw new ConfigurationError('no role configuration set', 'roleConfig');

      const active = this.countActive();
      if (active < roleConfig.minPlayers) {
        throw new ConfigurationError(`need at least ${roleConfig.minPlayers} players, have ${active}`, 'minPlayers');
      }
      if (active > roleConfig.maxPlayers) {
        throw new ConfigurationError(`maximum ${roleConfig.maxPlayers} players allowed, have ${active}`, 'maxPlayers');
      }
      roleService.validateConfiguration(roleConfig);
    });
  }

  /** Deals roles to the current players while holding the write lock. */
  assignRoles(roles: RolesService): AssignmentResult {
    return this.lock.write(() => roles.assign([...this.players.values()], this._roleConfig));
  }

  /* ---------------------------------- */
  /* Validation                         */
  /* ---------------------------------- */

  /**
   * Start-readiness snapshot for the lobby UI. Every call gets a new,
   * strictly increasing version; the snapshot itself is never cached.
   */
  getValidationState(roleService?: RoleConfigService): ValidationState {
    const { version, timestamp } = this.lock.write(() => {
      this.validationVersion++;
      this.lastValidatedAt = Math.max(Date.now(), this.lastValidatedAt);
      return { version: this.validationVersion, timestamp: new Date(this.lastValidatedAt) };
    });

    return this.lock.read(() => {
      const active = this.countActive();
      const state: ValidationState = {
        version,
        timestamp,
        canStart: false,
        validationMessage: '',
        canAutoScale: false,
        autoScaleDetails: '',
        requiredRoles: active,
        configuredRoles: 0,
      };

      if (this._state !== 'lobby') {
        return { ...state, validationMessage: 'Game is not in lobby state' };
      }
      if (active < 1) {
        return { ...state, validationMessage: 'Need at least 1 player to start' };
      }

      const roleConfig = this._roleConfig;
      if (!roleConfig) return { ...state, canStart: true };

      const counts = countsOf(roleConfig);
      const configured = totalRoles(counts);
      state.configuredRoles = configured;

      // Both modes size their distribution at deal time and always place a
      // Leader unless leaderless play is on, so the leader check is skipped too
      if (roleConfig.hideRoleDistribution || roleConfig.fullyRandomRoles) {
        return { ...state, canStart: true };
      }

      if (counts.Leader === 0 && !roleConfig.allowLeaderlessGame) {
        return { ...state, validationMessage: 'Leader role is required (or enable leaderless games)' };
      }

      if (configured === active) return { ...state, canStart: true };
      if (configured > active) {
        return { ...state, validationMessage: `Too many roles configured (${configured}) for ${active} players` };
      }

      // Only a preset short of roles can grow to the table
      const shortfall = `Not enough roles configured (${configured}) for ${active} players`;
      if (isCustom(roleConfig)) {
        return {
          ...state,
          validationMessage: shortfall,
          autoScaleDetails: 'Custom configurations do not support auto-scaling',
        };
      }
      if (!roleService) return { ...state, validationMessage: shortfall };

      const { canScale, details } = roleService.canAutoScale(roleConfig, active);
      if (canScale) {
        return {
          ...state,
          canStart: true,
          canAutoScale: true,
          autoScaleDetails: details,
          validationMessage: `Will auto-scale roles from ${configured} to ${active} players`,
        };
      }
      return { ...state, autoScaleDetails: details, validationMessage: `${shortfall}. ${details}` };
    });
  }
}
