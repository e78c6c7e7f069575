export type OperationKind = 'backup' | 'write-config' | 'metadata' | 'startup-project';

export type TrackedOperationStatus = 'pending' | 'applied' | 'skipped' | 'failed';

export type OperationId = string;

export interface Operation {
  kind: OperationKind;
  description: string;
  /** File the operation touches, when it touches one. */
  path?: string;
}

export interface TrackedOperation extends Operation {
  id: OperationId;
  status: TrackedOperationStatus;
  reason?: string;
  timestamp: number;
}

export interface TrackOperationOptions {
  status?: TrackedOperationStatus;
  reason?: string;
}

export class OperationTracker {
  private readonly order: OperationId[] = [];
  private readonly items = new Map<OperationId, TrackedOperation>();
  private counter = 0;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  get size(): number {
    return this.order.length;
  }

  track(operation: Operation, options: TrackOperationOptions = {}): OperationId {
    const id = this.generateId(operation.kind);
    this.order.push(id);
    this.items.set(id, {
      ...operation,
      id,
      status: options.status ?? 'pending',
      reason: options.reason,
      timestamp: this.now(),
    });
    return id;
  }

  markApplied(id: OperationId): void {
    this.updateStatus(id, 'applied');
  }

  markSkipped(id: OperationId, reason?: string): void {
    this.updateStatus(id, 'skipped', reason);
  }

  markFailed(id: OperationId, reason?: string): void {
    this.updateStatus(id, 'failed', reason);
  }

  get(id: OperationId): TrackedOperation | undefined {
    const record = this.items.get(id);
    return record ? { ...record } : undefined;
  }

  /**
   * Return operations in the order they were captured.
   */
  toArray(): TrackedOperation[] {
    return this.order
      .map((id) => this.items.get(id))
      .filter((value): value is TrackedOperation => Boolean(value))
      .map((record) => ({ ...record }));
  }

  clear(): void {
    this.items.clear();
    this.order.splice(0, this.order.length);
    this.counter = 0;
  }

  private generateId(prefix: string): OperationId {
    this.counter += 1;
    return `${prefix}-${this.counter}`;
  }

  private updateStatus(id: OperationId, status: TrackedOperationStatus, reason?: string): void {
    const existing = this.items.get(id);
    if (!existing) {
      return;
    }

    this.items.set(id, {
      ...existing,
      status,
      reason: reason ?? existing.reason,
      timestamp: this.now(),
    });
  }
}
