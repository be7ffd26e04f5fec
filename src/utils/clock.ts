/**
 * Time source for services that make time-based decisions
 * (lockout windows, session expiry, rate-limit windows)
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
