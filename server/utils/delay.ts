export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
