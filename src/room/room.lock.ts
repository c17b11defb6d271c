import { RoomBusyError } from '../common/errors';

/**
 * Reader/writer guard for one room. Sections run synchronously, so two
 * sections can only overlap when one is entered from inside another; a write
 * never shares the room with any other section.
 */
export class RoomLock {
  private readers = 0;
  private writing = false;

  constructor(private readonly roomCode: string) {}

  read<T>(fn: () => T): T {
    if (this.writing) throw new RoomBusyError(this.roomCode);
    this.readers++;
    try {
      return fn();
    } finally {
      this.readers--;
    }
  }

  write<T>(fn: () => T): T {
    if (this.writing || this.readers > 0) throw new RoomBusyError(this.roomCode);
    this.writing = true;
    try {
      return fn();
    } finally {
      this.writing = false;
    }
  }
}
