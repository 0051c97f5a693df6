export type SleepFunction = (ms: number) => Promise<void>;

export const sleep: SleepFunction = ms => new Promise(resolve => setTimeout(resolve, ms));
