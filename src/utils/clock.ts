// src/utils/clock.ts

/** Milliseconds since the Unix epoch. Injected everywhere time matters so tests can steer it. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
