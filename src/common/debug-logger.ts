export function isDebugVerbose(): boolean {
  return process.env.DEBUG_VERBOSE?.toLowerCase() === 'true';
}

export function debugLog(...args: unknown[]): void {
  if (isDebugVerbose()) {
    console.log(...args);
  }
}
