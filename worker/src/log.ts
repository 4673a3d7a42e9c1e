/**
 * Console logging with ISO timestamps
 */

function stamp(): string {
  return `[${new Date().toISOString()}]`;
}

export function log(message: string): void {
  console.log(`${stamp()} ${message}`);
}

export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`${stamp()} ${message}`);
  } else {
    console.error(`${stamp()} ${message}`, error);
  }
}

export async function trace<T>(label: string, inner: () => Promise<T>): Promise<T> {
  const start = performance.now();
  try {
    const result = await inner();
    const duration = performance.now() - start;
    log(`${label} - ${duration.toFixed(1)}ms`);
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logError(`${label} - ERR ${error} - ${duration.toFixed(1)}ms`);
    throw error;
  }
}
