import { Inject, Injectable } from '@nestjs/common';

import { SERVER_CONFIG, ServerConfig } from '../config/server.config';
import { RoleConfiguration } from '../types/role.types';
import { RANDOM_SOURCE, RandomSource } from '../utils/random';
import { generateRoomId } from '../utils/id.utils';
import { Room } from './room';

@Injectable()
export class RoomManager {
  private rooms = new Map<string, Room>();

  constructor(
    @Inject(SERVER_CONFIG) private readonly config: ServerConfig,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  create(options: { maxPlayers?: number; roleConfig?: RoleConfiguration } = {}): Room {
    const { defaultGameSize, maxPlayersPerRoom } = this.config.server;
    const room = new Room({
      code: this.nextCode(),
      maxPlayers: Math.min(options.maxPlayers ?? defaultGameSize, maxPlayersPerRoom),
      roleConfig: options.roleConfig,
    });
    this.rooms.set(room.code, room);
    return room;
  }

  get(code: string) {
    return this.rooms.get(code.toUpperCase());
  }

  delete(code: string) {
    this.rooms.delete(code.toUpperCase());
  }

  findByPlayer(playerId: string): Room | undefined {
    for (const room of this.rooms.values()) {
      if (room.getPlayer(playerId)) return room;
    }
  }

  get size() {
    return this.rooms.size;
  }

  private nextCode(): string {
    for (let i = 0; i < 20; i++) {
      const code = generateRoomId(this.config.server.roomCodeLength, this.random);
      if (!this.rooms.has(code)) return code;
    }
    throw new Error('No room code available');
  }
}
