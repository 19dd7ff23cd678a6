/**
 * Wall clock used for expiry decisions, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
