import { setTimeout } from 'node:timers/promises';

/**
 * shorthand to timer's setTimeout.
 * Usage: await sleep(1000);
 */
export const sleep = setTimeout;
