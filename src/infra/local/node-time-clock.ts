import type { TimeClockPort } from '../../ports/time-clock.port.js';

export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }
}
