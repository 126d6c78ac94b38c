/**
 * Source of the current instant. All expiry and "in the past" checks read it.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
