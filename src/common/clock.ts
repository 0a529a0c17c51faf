import { Injectable } from '@nestjs/common';

export interface TimerHandle {
  cancel(): void;
}

/**
 * Time source for everything that waits or timestamps. Injected so backoff,
 * timeouts and cooldowns can be driven without real delays.
 */
export abstract class Clock {
  abstract now(): Date;
  abstract setTimer(callback: () => void, delayMs: number): TimerHandle;
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const timer = setTimeout(callback, delayMs);
    timer.unref();
    return { cancel: () => clearTimeout(timer) };
  }
}

/**
 * Calendar date (YYYY-MM-DD) of `date` in `timeZone`.
 */
export function calendarDate(date: Date, timeZone = 'UTC'): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date);
}
