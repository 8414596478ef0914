export type AuditEvent = { ts: number; event: string; meta?: Record<string, unknown> };

// Bounded, newest-first; nothing here survives a restart.
export class AuditLog {
  private readonly events: AuditEvent[] = [];

  constructor(private readonly capacity = 1000) {}

  record(event: string, meta?: Record<string, unknown>) {
    this.events.unshift(meta ? { ts: Date.now(), event, meta } : { ts: Date.now(), event });
    if (this.events.length > this.capacity) this.events.length = this.capacity;
  }

  list(limit = 200) {
    return this.events.slice(0, Math.max(0, limit));
  }
}
