import { EventEmitter } from 'eventemitter3';
import type { BotEvents } from '../types.js';

/** eventemitter3 keyed by the BotEvents map, so listeners are checked against their payloads. */
export class BotEmitter extends EventEmitter<BotEvents> {}

export const botEmitter = new BotEmitter();
