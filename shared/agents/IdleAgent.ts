/**
 * @file IdleAgent.ts
 * @description Intent producer that never acts. Players it controls stand at
 * spawn and let the simulated buy pick their loadout.
 */

import { IDLE, type Intent, type IntentProvider } from '../types/IntentTypes.js';

export class IdleAgent implements IntentProvider {
  decide(): Intent {
    return IDLE;
  }
}
