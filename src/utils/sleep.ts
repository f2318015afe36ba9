/**
 * 指定ミリ秒間スリープする
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export type SleepFn = (ms: number) => Promise<void>;
