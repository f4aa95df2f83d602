/** Source of the current time. Injected so expiry checks can be tested. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
