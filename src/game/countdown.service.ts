import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

import { Room } from '../room/room';

export type CountdownHandlers = {
  onTick?: (remaining: number) => void;
  onComplete?: () => void;
};

@Injectable()
export class CountdownService implements OnModuleDestroy {
  private readonly logger = new Logger(CountdownService.name);
  private timers = new Map<string, NodeJS.Timeout>();

  /**
   * Moves the room into `countdown`, ticks once a second and moves it into
   * `playing` when the count reaches zero. A room that leaves `countdown`
   * some other way (ended by its owner) stops the timer silently.
   *
   * @throws InvalidTransitionError when the room is not in the lobby
   */
  start(room: Room, seconds: number, handlers: CountdownHandlers = {}) {
    this.cancel(room.code);
    room.transition('countdown', seconds);
    this.logger.log(`Room ${room.code}: countdown ${seconds}s`);

    if (seconds <= 0) {
      this.complete(room, handlers);
      return;
    }

    let remaining = seconds;
    const timer = setInterval(() => {
      if (room.state !== 'countdown') {
        this.cancel(room.code);
        return;
      }

      remaining--;
      room.tickCountdown(remaining);
      handlers.onTick?.(remaining);

      if (remaining <= 0) {
        this.cancel(room.code);
        this.complete(room, handlers);
      }
    }, 1_000);

    this.timers.set(room.code, timer);
  }

  isRunning(roomCode: string) {
    return this.timers.has(roomCode);
  }

  cancel(roomCode: string) {
    const timer = this.timers.get(roomCode);
    if (!timer) return;

    clearInterval(timer);
    this.timers.delete(roomCode);
  }

  cancelAll() {
    for (const code of [...this.timers.keys()]) this.cancel(code);
  }

  onModuleDestroy() {
    this.cancelAll();
  }

  private complete(room: Room, handlers: CountdownHandlers) {
    room.transition('playing');
    this.logger.log(`Room ${room.code}: playing`);
    handlers.onComplete?.();
  }
}
