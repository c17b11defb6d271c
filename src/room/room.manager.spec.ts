import { testConfig } from '../testing/fixtures';
import { createPlayer } from '../types/player.types';
import { seededRandom } from '../utils/random';
import { RoomManager } from './room.manager';

describe('RoomManager', () => {
  let rooms: RoomManager;

  beforeEach(() => {
    rooms = new RoomManager(testConfig(), seededRandom('rooms'));
  });

  it('creates lobby rooms under fresh codes', () => {
    const a = rooms.create();
    const b = rooms.create({ maxPlayers: 8 });

    expect(a.code).toMatch(/^[A-Z2-9]{5}$/);
    expect(a.code).not.toBe(b.code);
    expect(a.state).toBe('lobby');
    expect(a.maxPlayers).toBe(5);
    expect(b.maxPlayers).toBe(8);
    expect(rooms.size).toBe(2);
  });

  it('caps the room size at the server maximum', () => {
    expect(rooms.create({ maxPlayers: 50 }).maxPlayers).toBe(20);
  });

  it('uses the configured code length', () => {
    const long = new RoomManager(testConfig({ roomCodeLength: 7 }), seededRandom('rooms'));
    expect(long.create().code).toHaveLength(7);
  });

  it('looks rooms up by code, ignoring case', () => {
    const room = rooms.create();
    expect(rooms.get(room.code.toLowerCase())).toBe(room);
    expect(rooms.get('ZZZZZ')).toBeUndefined();
  });

  it('finds the room a player sits in', () => {
    const room = rooms.create();
    rooms.create();
    room.addPlayer(createPlayer('p-1', 'Ada', 's-1'));

    expect(rooms.findByPlayer('p-1')).toBe(room);
    expect(rooms.findByPlayer('p-2')).toBeUndefined();
  });

  it('forgets deleted rooms', () => {
    const room = rooms.create();
    rooms.delete(room.code);
    expect(rooms.get(room.code)).toBeUndefined();
    expect(rooms.size).toBe(0);
  });

  it('gives up when every code it draws is taken', () => {
    const stuck = new RoomManager(testConfig(), () => 0);
    expect(stuck.create().code).toBe('AAAAA');
    expect(() => stuck.create()).toThrow('No room code available');
  });
});
