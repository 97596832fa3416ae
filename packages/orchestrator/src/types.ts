import type { Logger } from 'pino';
import type { Delay } from '@vmboot/core';

export interface BootOrchestratorOptions {
  /**
   * How long to leave the media mounted after the reset before ejecting it
   * again. 0 or undefined skips both the wait and the final eject.
   */
  dwellMs?: number;
  delay?: Delay;
  logger?: Logger;
}
