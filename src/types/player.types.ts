import { Card } from './card.types';

/**
 * A room member. Rooms hand out these objects by reference, so a caller
 * holding one sees role assignment and other updates as they happen.
 */
export type Player = {
  id: string;
  name: string;
  sessionId: string;
  /** Hosts watch the game: no role, no seat against the room limit. */
  isHost: boolean;
  role: Card | null;
  roleRevealed: boolean;
  joinedAt: Date;
};

export function createPlayer(
  id: string,
  name: string,
  sessionId: string,
  isHost = false,
): Player {
  return {
    id,
    name,
    sessionId,
    isHost,
    role: null,
    roleRevealed: false,
    joinedAt: new Date(),
  };
}
