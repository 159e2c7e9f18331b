export interface DeliveryStatsSnapshot {
  readonly totalSent: number;
  readonly failedDeliveries: number;
  readonly lastFailureTime: Date | undefined;
  readonly lastFailureReason: string | undefined;
}

/**
 * Per-connection delivery counters. Counters only grow; the last failure
 * time and reason are replaced together.
 */
export class DeliveryStats {
  private sent = 0;
  private failed = 0;
  private lastFailure: { readonly time: Date; readonly reason: string } | undefined;

  recordSuccess(): void {
    this.sent++;
  }

  recordFailure(reason: string, at: Date = new Date()): void {
    this.failed++;
    this.lastFailure = { time: at, reason };
  }

  get totalSent(): number {
    return this.sent;
  }

  get failedDeliveries(): number {
    return this.failed;
  }

  snapshot(): DeliveryStatsSnapshot {
    return {
      totalSent: this.sent,
      failedDeliveries: this.failed,
      lastFailureTime: this.lastFailure?.time,
      lastFailureReason: this.lastFailure?.reason,
    };
  }
}
