import { RoleConfiguration } from './role.types';

export type GameState = 'lobby' | 'countdown' | 'playing' | 'ended';

export type RoomOptions = {
  code: string;
  maxPlayers: number;
  roleConfig?: RoleConfiguration;
};

export type ValidationState = {
  version: number;
  timestamp: Date;
  canStart: boolean;
  validationMessage: string;
  canAutoScale: boolean;
  autoScaleDetails: string;
  requiredRoles: number;
  configuredRoles: number;
};
