export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const ONE_HOUR_MS = 60 * 60 * 1000;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const systemClock: Clock = () => Date.now();
