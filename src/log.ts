let enabled = false;

// stdout belongs to the interactive session, so event lines go to stderr.
export function setLogEnabled(value: boolean): void {
  enabled = value;
}

export function log(event: string, data: Record<string, unknown> = {}): void {
  if (!enabled) return;
  const payload = {
    ts: new Date().toISOString(),
    event,
    ...data
  };
  console.error(JSON.stringify(payload));
}

export function logError(event: string, error: unknown, data: Record<string, unknown> = {}): void {
  const message = error instanceof Error ? error.message : String(error);
  log(event, { ...data, error: message });
}
