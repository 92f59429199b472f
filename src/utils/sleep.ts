export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
