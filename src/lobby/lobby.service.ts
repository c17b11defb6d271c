import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';

import {
  ConfigurationError,
  DuplicateNameError,
  GameError,
  InvalidTransitionError,
  RoomBusyError,
  RoomFullError,
} from '../common/errors';
import { SERVER_CONFIG, ServerConfig } from '../config/server.config';
import { CardService } from '../game/card.service';
import { CountdownService } from '../game/countdown.service';
import { RoleConfigService } from '../game/role-config.service';
import { AssignmentResult, RolesService } from '../game/roles.service';
import { Room } from '../room/room';
import { RoomManager } from '../room/room.manager';
import { Player, createPlayer } from '../types/player.types';
import { ROLE_ORDER, RoleConfiguration, countsOf, parseRoleType, totalRoles } from '../types/role.types';
import { ValidationState } from '../types/room.types';
import { CatalogView, LobbyError, LobbyEvent, toRoleView, toRoomView } from './lobby.types';

export type CreateRoomInput = {
  sessionId: string;
  playerName: string;
  maxPlayers?: number;
  presetName?: string;
  /** Create as a non-playing host. */
  asHost?: boolean;
};

export type JoinRoomInput = {
  roomCode: string;
  /** A session already seated in the room takes its seat back. */
  sessionId: string;
  playerName: string;
  asHost?: boolean;
};

export type RoleModes = { hideRoleDistribution?: boolean; fullyRandomRoles?: boolean };

/**
 * Lobby actions keyed by session. Players are identified by their session
 * id, and every state change is published on `events$`.
 */
@Injectable()
export class LobbyService implements OnModuleDestroy {
  private readonly logger = new Logger(LobbyService.name);
  private readonly events = new Subject<LobbyEvent>();

  readonly events$: Observable<LobbyEvent> = this.events.asObservable();

  constructor(
    @Inject(SERVER_CONFIG) private readonly config: ServerConfig,
    private readonly rooms: RoomManager,
    private readonly roleConfigService: RoleConfigService,
    private readonly roles: RolesService,
    private readonly countdown: CountdownService,
    private readonly cards: CardService,
  ) {}

  onModuleDestroy() {
    this.events.complete();
  }

  /* ---------------------------------- */
  /* Membership                         */
  /* ---------------------------------- */

  createRoom(input: CreateRoomInput): { room: Room; player: Player } {
    this.leaveCurrentRoom(input.sessionId);

    const room = this.rooms.create({ maxPlayers: input.maxPlayers });
    const player = createPlayer(input.sessionId, input.playerName, input.sessionId, input.asHost ?? false);

    try {
      if (input.presetName) {
        room.setRoleConfig(this.presetConfiguration(input.presetName, room.maxPlayers));
      }
      room.addPlayer(player);
    } catch (err) {
      this.rooms.delete(room.code);
      throw toLobbyError(err);
    }
    room.setOwner(player.id);

    this.logger.log(`Room ${room.code} created by ${player.name} (max ${room.maxPlayers})`);
    this.publishRoom(room);
    this.system(room, `${player.name} created the room`);
    return { room, player };
  }

  /** @throws LobbyError ROOM_NOT_FOUND, INVALID_PHASE, ROOM_FULL, DUPLICATE_NAME */
  joinRoom(input: JoinRoomInput): { room: Room; player: Player; rejoined: boolean } {
    const room = this.rooms.get(input.roomCode);
    if (!room) throw new LobbyError('ROOM_NOT_FOUND', `room ${input.roomCode} not found`);

    const seated = room.getPlayer(input.sessionId);
    if (seated) return { room, player: this.rejoin(room, seated), rejoined: true };

    if (room.state !== 'lobby') {
      throw new LobbyError('INVALID_PHASE', 'game already started');
    }

    const current = this.rooms.findByPlayer(input.sessionId);
    if (current && current !== room) this.leaveCurrentRoom(input.sessionId);

    const player = createPlayer(input.sessionId, input.playerName, input.sessionId, input.asHost ?? false);
    guard(() => room.addPlayer(player));

    this.logger.log(`${player.name} joined room ${room.code}`);
    this.publishRoom(room);
    this.system(room, `${player.name} joined the lobby`);
    return { room, player, rejoined: false };
  }

  /** Seat, name and dealt card stay as they were. */
  private rejoin(room: Room, player: Player): Player {
    this.logger.log(`${player.name} reconnected to room ${room.code}`);
    this.publishRoom(room);
    if (player.role) {
      this.events.next({
        type: 'role_assigned',
        roomCode: room.code,
        sessionId: player.sessionId,
        role: toRoleView(player.role),
        revealed: player.roleRevealed,
      });
    }
    this.system(room, `${player.name} reconnected`);
    return player;
  }

  /**
   * A dropped connection. In the lobby, or once the game has ended, the
   * player leaves. During the countdown and the game they keep their seat
   * and card until the same session joins again.
   */
  disconnect(sessionId: string): void {
    const room = this.rooms.findByPlayer(sessionId);
    if (!room) return;

    if (room.state === 'lobby' || room.state === 'ended') {
      this.leaveRoom(sessionId);
      return;
    }
    const player = room.getPlayer(sessionId);
    this.logger.log(`${player?.name ?? sessionId} disconnected from room ${room.code}, seat kept`);
  }

  /** No-op for a session that is not in a room. */
  leaveRoom(sessionId: string): void {
    const room = this.rooms.findByPlayer(sessionId);
    if (!room) return;

    const player = room.getPlayer(sessionId);
    room.removePlayer(sessionId);

    if (room.getPlayers().length === 0) {
      this.countdown.cancel(room.code);
      this.rooms.delete(room.code);
      this.logger.log(`Room ${room.code} closed`);
      this.events.next({ type: 'room_closed', roomCode: room.code });
      return;
    }

    this.publishRoom(room);
    if (player) this.system(room, `${player.name} left the lobby`);
  }

  /* ---------------------------------- */
  /* Role configuration                 */
  /* ---------------------------------- */

  setPreset(sessionId: string, presetName: string): RoleConfiguration {
    const room = this.ownedLobby(sessionId);
    const previous = room.roleConfig;

    const roleConfig = guard(() => this.presetConfiguration(presetName, room.maxPlayers));
    if (previous) {
      roleConfig.allowLeaderlessGame = previous.allowLeaderlessGame;
      roleConfig.hideRoleDistribution = previous.hideRoleDistribution;
      roleConfig.fullyRandomRoles = previous.fullyRandomRoles;
    }
    room.setRoleConfig(roleConfig);

    this.publishRoom(room);
    return roleConfig;
  }

  /** Returns the new count. Editing a count turns the configuration custom. */
  adjustRoleCount(sessionId: string, roleTypeName: string, delta: number): number {
    const room = this.ownedLobby(sessionId);
    const count = guard(() => {
      const roleType = parseRoleType(roleTypeName);
      this.ensureRoleConfig(room);
      return room.updateRoleConfig(c => this.roleConfigService.adjustRoleCount(c, roleType, delta));
    });

    this.publishRoom(room);
    return count;
  }

  /** Returns whether the card is now enabled. */
  toggleCard(sessionId: string, roleTypeName: string, cardName: string): boolean {
    const room = this.ownedLobby(sessionId);
    const enabled = guard(() => {
      const roleType = parseRoleType(roleTypeName);
      this.ensureRoleConfig(room);
      return room.updateRoleConfig(c => this.roleConfigService.toggleCard(c, roleType, cardName));
    });

    this.publishRoom(room);
    return enabled;
  }

  setLeaderless(sessionId: string, allow: boolean): void {
    const room = this.ownedLobby(sessionId);
    guard(() => {
      this.ensureRoleConfig(room);
      room.updateRoleConfig(c => this.roleConfigService.setLeaderless(c, allow));
    });
    this.publishRoom(room);
  }

  setRoleModes(sessionId: string, modes: RoleModes): void {
    const room = this.ownedLobby(sessionId);
    guard(() => {
      this.ensureRoleConfig(room);
      room.updateRoleConfig(c => this.roleConfigService.setRoleModes(c, modes));
    });
    this.publishRoom(room);
  }

  /** Presets, role definitions and cards a client needs to draw the setup screen. */
  getCatalog(): CatalogView {
    const presets = this.config.presetNames().flatMap(id => {
      const preset = this.config.getPreset(id);
      if (!preset) return [];
      return [{
        id,
        name: preset.name,
        description: preset.description,
        playerCounts: [...preset.distributions.keys()].sort((a, b) => a - b),
      }];
    });

    return {
      presets,
      roles: this.roleConfigService.getSortedRoleDefinitions().map(({ name, definition }) => ({
        id: name,
        displayName: definition.displayName,
        category: definition.category,
        alwaysRevealed: definition.alwaysRevealed,
      })),
      cards: this.cards.allCards().map(toRoleView),
    };
  }

  roomOf(sessionId: string): Room | undefined {
    return this.rooms.findByPlayer(sessionId);
  }

  getValidation(roomCode: string): ValidationState {
    const room = this.rooms.get(roomCode);
    if (!room) throw new LobbyError('ROOM_NOT_FOUND', `room ${roomCode} not found`);
    return room.getValidationState(this.roleConfigService);
  }

  /* ---------------------------------- */
  /* Game flow                          */
  /* ---------------------------------- */

  /**
   * Validates, deals every active player a card and starts the countdown.
   * Roles go out to their owners before the countdown begins.
   *
   * @throws LobbyError NOT_OWNER, INVALID_PHASE, CANNOT_START
   */
  startGame(sessionId: string): AssignmentResult {
    const room = this.ownedLobby(sessionId);

    const validation = room.getValidationState(this.roleConfigService);
    if (!validation.canStart) {
      throw new LobbyError('CANNOT_START', validation.validationMessage);
    }

    const roleConfig = room.roleConfig;
    if (roleConfig) {
      try {
        if (roleConfig.hideRoleDistribution || roleConfig.fullyRandomRoles || validation.canAutoScale) {
          this.roleConfigService.validateConfiguration(roleConfig);
        } else {
          room.validateRoleConfig(this.roleConfigService);
        }
      } catch (err) {
        if (err instanceof ConfigurationError) throw new LobbyError('CANNOT_START', err.message);
        throw err;
      }
    }

    const result = guard(() => room.assignRoles(this.roles));
    for (const player of room.getPlayers()) {
      this.events.next({
        type: 'role_assigned',
        roomCode: room.code,
        sessionId: player.sessionId,
        role: player.role ? toRoleView(player.role) : null,
        revealed: player.roleRevealed,
      });
    }

    const seconds = this.config.server.countdownSeconds;
    guard(() =>
      this.countdown.start(room, seconds, {
        onTick: remaining => this.events.next({ type: 'countdown', roomCode: room.code, remaining }),
        onComplete: () => this.onPlaying(room),
      }),
    );

    this.logger.log(`Room ${room.code} starting with ${result.assigned} role(s) via ${result.strategy}`);
    if (room.state === 'countdown') {
      this.events.next({ type: 'countdown', roomCode: room.code, remaining: seconds });
      this.publishRoom(room);
    }
    return result;
  }

  endGame(sessionId: string): void {
    const room = this.ownedRoom(sessionId);
    if (!room.canTransition('ended')) {
      throw new LobbyError('INVALID_PHASE', `cannot end a game in ${room.state} state`);
    }

    this.countdown.cancel(room.code);
    guard(() => room.transition('ended'));

    this.logger.log(`Room ${room.code} ended`);
    this.publishRoom(room);
    this.system(room, 'The game has ended');
  }

  private onPlaying(room: Room) {
    this.publishRoom(room);
    const leader = room.getLeader();
    this.system(room, leader ? `${leader.name} is the Leader` : 'There is no Leader this game');
  }

  /* ---------------------------------- */
  /* Helpers                            */
  /* ---------------------------------- */

  private ownedRoom(sessionId: string): Room {
    const room = this.rooms.findByPlayer(sessionId);
    if (!room) throw new LobbyError('ROOM_NOT_FOUND', 'you are not in a room');
    if (room.ownerId !== sessionId) {
      throw new LobbyError('NOT_OWNER', 'only the room owner can do that');
    }
    return room;
  }

  private ownedLobby(sessionId: string): Room {
    const room = this.ownedRoom(sessionId);
    if (room.state !== 'lobby') {
      throw new LobbyError('INVALID_PHASE', `room is in ${room.state} state`);
    }
    return room;
  }

  /** Rooms without a configuration start editing from the standard preset. */
  private ensureRoleConfig(room: Room) {
    if (room.roleConfig) return;
    room.setRoleConfig(this.presetConfiguration('standard', room.maxPlayers));
  }

  /** Presets without an entry for the room size take the adapted nearest entry. */
  private presetConfiguration(presetName: string, maxPlayers: number): RoleConfiguration {
    const roleConfig = this.roleConfigService.createFromPreset(presetName, maxPlayers);
    if (totalRoles(countsOf(roleConfig)) === 0) {
      const dist = this.roleConfigService.getDistributionForPlayerCount(roleConfig, maxPlayers);
      for (const r of ROLE_ORDER) roleConfig.roleTypes[r].count = dist[r];
    }
    return roleConfig;
  }

  private leaveCurrentRoom(sessionId: string) {
    if (this.rooms.findByPlayer(sessionId)) this.leaveRoom(sessionId);
  }

  private publishRoom(room: Room) {
    this.events.next({ type: 'room_state', roomCode: room.code, room: toRoomView(room) });
    this.events.next({
      type: 'validation_state',
      roomCode: room.code,
      validation: room.getValidationState(this.roleConfigService),
    });
  }

  private system(room: Room, message: string) {
    this.events.next({ type: 'system_message', roomCode: room.code, message });
  }
}

function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toLobbyError(err);
  }
}

function toLobbyError(err: unknown): unknown {
  if (err instanceof LobbyError || !(err instanceof GameError)) return err;

  if (err instanceof RoomFullError) return new LobbyError('ROOM_FULL', err.message);
  if (err instanceof DuplicateNameError) return new LobbyError('DUPLICATE_NAME', err.message);
  if (err instanceof RoomBusyError) return new LobbyError('ROOM_BUSY', err.message);
  if (err instanceof InvalidTransitionError) return new LobbyError('INVALID_PHASE', err.message);
  return new LobbyError('INVALID_CONFIG', err.message);
}
