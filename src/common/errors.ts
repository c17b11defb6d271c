export type ErrorCode =
  | 'ROOM_FULL'
  | 'DUPLICATE_NAME'
  | 'ROOM_BUSY'
  | 'INVALID_TRANSITION'
  | 'INVALID_CONFIG'
  | 'PRESET_NOT_FOUND'
  | 'TOO_MANY_ROLES'
  | 'UNKNOWN_ROLE_TYPE'
  | 'CARD_POOL';

export abstract class GameError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Room

export class RoomFullError extends GameError {
  readonly code = 'ROOM_FULL';

  constructor(readonly maxPlayers: number) {
    super('room is full');
  }
}

export class DuplicateNameError extends GameError {
  readonly code = 'DUPLICATE_NAME';

  constructor(readonly playerName: string) {
    super('a player with that name already exists in the room');
  }
}

export class RoomBusyError extends GameError {
  readonly code = 'ROOM_BUSY';

  constructor(roomCode: string) {
    super(`room ${roomCode} is locked by another operation`);
  }
}

export class InvalidTransitionError extends GameError {
  readonly code = 'INVALID_TRANSITION';

  constructor(readonly from: string, readonly to: string) {
    super(`cannot move from ${from} to ${to}`);
  }
}

// Configuration

export class ConfigurationError extends GameError {
  readonly code: ErrorCode = 'INVALID_CONFIG';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class PresetNotFoundError extends ConfigurationError {
  readonly code = 'PRESET_NOT_FOUND';

  constructor(readonly presetName: string) {
    super(`preset '${presetName}' not found`, 'presetName');
  }
}

export class TooManyRolesError extends ConfigurationError {
  readonly code = 'TOO_MANY_ROLES';

  constructor(readonly totalRoles: number, readonly playerCount: number) {
    super(`too many roles (${totalRoles}) for player count (${playerCount})`, 'roleTypes');
  }
}

export class UnknownRoleTypeError extends ConfigurationError {
  readonly code = 'UNKNOWN_ROLE_TYPE';

  constructor(readonly roleTypeName: string) {
    super(`unknown role type: ${roleTypeName}`, 'roleType');
  }
}

export class CardPoolError extends GameError {
  readonly code = 'CARD_POOL';
}
