/**
 * Promise-based delay. Every wait in the client goes through this so tests
 * can swap it for an instant one.
 */
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
