import { Logger, OnModuleDestroy } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Subscription } from 'rxjs';
import { Server, Socket } from 'socket.io';
import { z } from 'zod';

import { LobbyService } from '../lobby/lobby.service';
import { LobbyError, LobbyEvent, toRoomView } from '../lobby/lobby.types';

const playerName = z.string().trim().min(1).max(32);
const sessionId = z.string().trim().min(8).max(64);

const createRoomSchema = z.object({
  playerName,
  sessionId: sessionId.optional(),
  maxPlayers: z.number().int().min(1).optional(),
  presetName: z.string().min(1).optional(),
  asHost: z.boolean().optional(),
});

const joinRoomSchema = z.object({
  roomCode: z.string().trim().min(1),
  playerName,
  sessionId: sessionId.optional(),
  asHost: z.boolean().optional(),
});

const presetSchema = z.object({ presetName: z.string().min(1) });
const roleCountSchema = z.object({ roleType: z.string().min(1), delta: z.number().int() });
const toggleCardSchema = z.object({ roleType: z.string().min(1), cardName: z.string().min(1) });
const leaderlessSchema = z.object({ allow: z.boolean() });
const roleModesSchema = z.object({
  hideRoleDistribution: z.boolean().optional(),
  fullyRandomRoles: z.boolean().optional(),
});

type Ack = { ok: true; [key: string]: unknown } | { ok: false; code: string; message: string };

@WebSocketGateway({ cors: { origin: '*' } })
export class LobbyGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect, OnModuleDestroy
{
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(LobbyGateway.name);
  private subscription?: Subscription;
  private users = 0;
  // socket id -> session id, for sockets that have created or joined a room
  private readonly sessions = new Map<string, string>();

  constructor(private readonly lobby: LobbyService) {}

  afterInit() {
    this.subscription = this.lobby.events$.subscribe(event => this.dispatch(event));
  }

  onModuleDestroy() {
    this.subscription?.unsubscribe();
  }

  /* ---------------------------------- */
  /* Connection lifecycle               */
  /* ---------------------------------- */

  handleConnection(client: Socket) {
    this.users++;
    this.logger.log(`Connected: ${client.id} | users=${this.users}`);
  }

  handleDisconnect(client: Socket) {
    this.users--;
    this.logger.log(`Disconnected: ${client.id} | users=${this.users}`);

    const sessionId = this.sessionOf(client);
    this.sessions.delete(client.id);
    if (![...this.sessions.values()].includes(sessionId)) {
      this.lobby.disconnect(sessionId);
    }
  }

  /* ---------------------------------- */
  /* Room management                    */
  /* ---------------------------------- */

  @SubscribeMessage('create_room')
  handleCreateRoom(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const input = parse(createRoomSchema, payload);
      const sessionId = this.bindSession(client, input.sessionId);
      const previous = this.lobby.roomOf(sessionId);
      const { room } = this.lobby.createRoom({ ...input, sessionId });

      if (previous) void client.leave(previous.code);
      void client.join(room.code);
      this.sendRoom(client, room.code);
      return { roomCode: room.code, sessionId };
    });
  }

  @SubscribeMessage('join_room')
  handleJoinRoom(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const input = parse(joinRoomSchema, payload);
      const sessionId = this.bindSession(client, input.sessionId);
      const previous = this.lobby.roomOf(sessionId);
      const { room, rejoined } = this.lobby.joinRoom({ ...input, sessionId });

      if (previous && previous !== room) void client.leave(previous.code);
      void client.join(room.code);
      this.sendRoom(client, room.code);
      return { roomCode: room.code, sessionId, rejoined };
    });
  }

  @SubscribeMessage('leave_room')
  handleLeaveRoom(@ConnectedSocket() client: Socket): Ack {
    return this.run(client, () => {
      const sessionId = this.sessionOf(client);
      const room = this.lobby.roomOf(sessionId);
      this.lobby.leaveRoom(sessionId);
      if (room) void client.leave(room.code);
      return {};
    });
  }

  /* ---------------------------------- */
  /* Role configuration                 */
  /* ---------------------------------- */

  @SubscribeMessage('get_catalog')
  handleGetCatalog(@ConnectedSocket() client: Socket): Ack {
    return this.run(client, () => ({ catalog: this.lobby.getCatalog() }));
  }

  @SubscribeMessage('set_preset')
  handleSetPreset(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const { presetName } = parse(presetSchema, payload);
      this.lobby.setPreset(this.sessionOf(client), presetName);
      return {};
    });
  }

  @SubscribeMessage('adjust_role_count')
  handleAdjustRoleCount(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const { roleType, delta } = parse(roleCountSchema, payload);
      return { count: this.lobby.adjustRoleCount(this.sessionOf(client), roleType, delta) };
    });
  }

  @SubscribeMessage('toggle_role_card')
  handleToggleCard(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const { roleType, cardName } = parse(toggleCardSchema, payload);
      return { enabled: this.lobby.toggleCard(this.sessionOf(client), roleType, cardName) };
    });
  }

  @SubscribeMessage('set_leaderless')
  handleSetLeaderless(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      const { allow } = parse(leaderlessSchema, payload);
      this.lobby.setLeaderless(this.sessionOf(client), allow);
      return {};
    });
  }

  @SubscribeMessage('set_role_modes')
  handleSetRoleModes(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): Ack {
    return this.run(client, () => {
      this.lobby.setRoleModes(this.sessionOf(client), parse(roleModesSchema, payload));
      return {};
    });
  }

  /* ---------------------------------- */
  /* Game flow                          */
  /* ---------------------------------- */

  @SubscribeMessage('start_game')
  handleStartGame(@ConnectedSocket() client: Socket): Ack {
    return this.run(client, () => {
      const result = this.lobby.startGame(this.sessionOf(client));
      return { assigned: result.assigned };
    });
  }

  @SubscribeMessage('end_game')
  handleEndGame(@ConnectedSocket() client: Socket): Ack {
    return this.run(client, () => {
      this.lobby.endGame(this.sessionOf(client));
      return {};
    });
  }

  /* ---------------------------------- */
  /* Emits                              */
  /* ---------------------------------- */

  private dispatch(event: LobbyEvent) {
    switch (event.type) {
      case 'room_state':
        this.server.to(event.roomCode).emit('room_state', event.room);
        break;
      case 'validation_state':
        this.server.to(event.roomCode).emit('validation_state', event.validation);
        break;
      case 'role_assigned':
        this.server.to(event.sessionId).emit('role_assigned', { role: event.role, revealed: event.revealed });
        break;
      case 'countdown':
        this.server.to(event.roomCode).emit('countdown', { remaining: event.remaining });
        break;
      case 'system_message':
        this.server.to(event.roomCode).emit('system_message', { message: event.message });
        break;
      case 'room_closed':
        this.server.in(event.roomCode).socketsLeave(event.roomCode);
        break;
    }
  }

  private sessionOf(client: Socket): string {
    return this.sessions.get(client.id) ?? client.id;
  }

  /**
   * Ties the socket to a session. A socket's own id is its session unless the
   * client sends the id it was given earlier, which puts it back in its seat.
   */
  private bindSession(client: Socket, requested?: string): string {
    const sessionId = requested ?? client.id;
    const previous = this.sessions.get(client.id);
    if (previous && previous !== sessionId && previous !== client.id) void client.leave(previous);

    this.sessions.set(client.id, sessionId);
    // role_assigned is sent to the session's room
    if (sessionId !== client.id) void client.join(sessionId);
    return sessionId;
  }

  private sendRoom(client: Socket, roomCode: string) {
    const room = this.lobby.roomOf(this.sessionOf(client));
    if (!room || room.code !== roomCode) return;

    client.emit('room_joined', { roomCode });
    client.emit('room_state', toRoomView(room));
    client.emit('validation_state', this.lobby.getValidation(roomCode));
  }

  private run(client: Socket, fn: () => Record<string, unknown>): Ack {
    try {
      return { ...fn(), ok: true };
    } catch (err) {
      if (!(err instanceof LobbyError)) {
        this.logger.error(`Unhandled error for ${client.id}`, err instanceof Error ? err.stack : String(err));
        client.emit('error', { code: 'INTERNAL', message: 'internal server error' });
        return { ok: false, code: 'INTERNAL', message: 'internal server error' };
      }

      this.logger.debug(`${client.id}: ${err.code} ${err.message}`);
      client.emit('error', { code: err.code, message: err.message });
      return { ok: false, code: err.code, message: err.message };
    }
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LobbyError('BAD_REQUEST', `${issue.path.join('.') || 'payload'}: ${issue.message}`);
  }
  return parsed.data;
}
