export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential backoff: initialDelay, 2x, 4x, ...
export function backoffDelay(attempt: number, initialDelay: number): number {
  return initialDelay * Math.pow(2, attempt - 1);
}
