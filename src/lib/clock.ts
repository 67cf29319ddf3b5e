/**
 * Service clock. Injected so expiry can be evaluated against a fixed instant.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
