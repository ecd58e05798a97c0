/**
 * Resolve after `ms` milliseconds. Zero or negative values resolve on the next tick.
 */
export default function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
