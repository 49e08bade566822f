/**
 * Delay utility for async operations
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(resolve, ms);
    timer.unref(); // Prevent Jest hanging
  });
}

/**
 * Format a `host:port` pair the way member configs and connection strings expect it
 */
export function hostAndPort(host: string, port: number): string {
  return `${host}:${port}`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
