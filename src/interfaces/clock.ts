/** Source of the current instant. Injected so rotation and timestamps can be tested. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
