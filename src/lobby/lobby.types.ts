import { Room } from '../room/room';
import { Card, winCondition } from '../types/card.types';
import { ROLE_ORDER, RoleConfiguration, RoleType } from '../types/role.types';
import { GameState, ValidationState } from '../types/room.types';

export type LobbyErrorCode =
  | 'BAD_REQUEST'
  | 'ROOM_NOT_FOUND'
  | 'ROOM_FULL'
  | 'ROOM_BUSY'
  | 'NOT_OWNER'
  | 'INVALID_PHASE'
  | 'DUPLICATE_NAME'
  | 'INVALID_CONFIG'
  | 'CANNOT_START';

/** What a client gets back when a lobby action is refused. */
export class LobbyError extends Error {
  constructor(readonly code: LobbyErrorCode, message: string) {
    super(message);
    this.name = 'LobbyError';
  }
}

export type PlayerView = {
  id: string;
  name: string;
  isHost: boolean;
  isOwner: boolean;
  /** Only set for roles revealed to the table. */
  role: string | null;
};

export type RoleConfigView = {
  presetName: string;
  minPlayers: number;
  maxPlayers: number;
  allowLeaderlessGame: boolean;
  hideRoleDistribution: boolean;
  fullyRandomRoles: boolean;
  roleTypes: Record<RoleType, { count: number; enabledCards: string[] }>;
};

export type RoomView = {
  code: string;
  state: GameState;
  maxPlayers: number;
  countdownRemaining: number;
  players: PlayerView[];
  roleConfig: RoleConfigView | null;
};

export type RoleView = {
  name: string;
  roleType: RoleType;
  text: string;
  flavor?: string;
  winCondition: string;
};

export type CatalogView = {
  presets: { id: string; name: string; description: string; playerCounts: number[] }[];
  roles: { id: string; displayName: string; category: string; alwaysRevealed: boolean }[];
  cards: RoleView[];
};

export type LobbyEvent =
  | { type: 'room_state'; roomCode: string; room: RoomView }
  | { type: 'validation_state'; roomCode: string; validation: ValidationState }
  | { type: 'role_assigned'; roomCode: string; sessionId: string; role: RoleView | null; revealed: boolean }
  | { type: 'countdown'; roomCode: string; remaining: number }
  | { type: 'system_message'; roomCode: string; message: string }
  | { type: 'room_closed'; roomCode: string };

export function toRoleConfigView(roleConfig: RoleConfiguration): RoleConfigView {
  const typeView = (r: RoleType) => ({
    count: roleConfig.roleTypes[r].count,
    enabledCards: [...roleConfig.roleTypes[r].enabledCards].sort(),
  });

  return {
    presetName: roleConfig.presetName,
    minPlayers: roleConfig.minPlayers,
    maxPlayers: roleConfig.maxPlayers,
    allowLeaderlessGame: roleConfig.allowLeaderlessGame,
    hideRoleDistribution: roleConfig.hideRoleDistribution,
    fullyRandomRoles: roleConfig.fullyRandomRoles,
    roleTypes: {
      Leader: typeView(ROLE_ORDER[0]),
      Guardian: typeView(ROLE_ORDER[1]),
      Assassin: typeView(ROLE_ORDER[2]),
      Traitor: typeView(ROLE_ORDER[3]),
    },
  };
}

export function toRoleView(card: Card): RoleView {
  const view: RoleView = {
    name: card.name,
    roleType: card.roleType,
    text: card.text,
    winCondition: winCondition(card.roleType),
  };
  if (card.flavor !== undefined) view.flavor = card.flavor;
  return view;
}

export function toRoomView(room: Room): RoomView {
  const ownerId = room.ownerId;
  const revealed = room.leaderRevealed;
  const roleConfig = room.roleConfig;

  return {
    code: room.code,
    state: room.state,
    maxPlayers: room.maxPlayers,
    countdownRemaining: room.countdownRemaining,
    players: room.getPlayers().map(p => ({
      id: p.id,
      name: p.name,
      isHost: p.isHost,
      isOwner: p.id === ownerId,
      role: revealed && p.roleRevealed && p.role ? p.role.name : null,
    })),
    roleConfig: roleConfig ? toRoleConfigView(roleConfig) : null,
  };
}
