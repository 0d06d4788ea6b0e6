/**
 * Gapless cursor over an audio clock: each buffer starts where the previous one ends,
 * or now if playback has fallen behind.
 */
export class PlaybackScheduler {
  private cursor = 0;

  constructor(private readonly now: () => number) {}

  scheduleNext(durationSec: number): number {
    const start = Math.max(this.now(), this.cursor);
    this.cursor = start + durationSec;
    return start;
  }

  get nextStartTime(): number {
    return this.cursor;
  }

  reset() {
    this.cursor = 0;
  }
}
