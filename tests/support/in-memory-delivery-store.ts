import { DeliveryStatus, ScheduledDelivery } from '@/domains/delivery/delivery.model';
import { ClaimDto, CreateDeliveryDto, DeliveryStore, FailureDto } from '@/domains/delivery/delivery.types';

const copy = (row: ScheduledDelivery): ScheduledDelivery => Object.assign(new ScheduledDelivery(), row);

/**
 * DeliveryStore over a Map. Each operation yields once and then checks and
 * writes without yielding, like a single conditional UPDATE.
 */
export class InMemoryDeliveryStore implements DeliveryStore {
  private rows = new Map<string, ScheduledDelivery>();
  private sequence = 0;

  seed(data: Partial<ScheduledDelivery> & CreateDeliveryDto): ScheduledDelivery {
    const now = new Date(0);
    const row = Object.assign(new ScheduledDelivery(), {
      id: `delivery-${++this.sequence}`,
      nextAttemptAt: data.scheduledAt,
      status: DeliveryStatus.PENDING,
      attemptCount: 0,
      lastError: null,
      contentFingerprint: null,
      content: null,
      receiptId: null,
      claimToken: null,
      claimedBy: null,
      claimedAt: null,
      sentAt: null,
      createdAt: now,
      updatedAt: now,
      ...data,
    });
    this.rows.set(row.id, row);
    return copy(row);
  }

  all(): ScheduledDelivery[] {
    return [...this.rows.values()].map(copy);
  }

  get(id: string): ScheduledDelivery | undefined {
    const row = this.rows.get(id);
    return row ? copy(row) : undefined;
  }

  async insertIfAbsent(data: CreateDeliveryDto): Promise<boolean> {
    await Promise.resolve();
    for (const row of this.rows.values()) {
      if (row.idempotencyKey === data.idempotencyKey) {
        return false;
      }
    }
    this.seed(data);
    return true;
  }

  async findById(id: string): Promise<ScheduledDelivery | null> {
    await Promise.resolve();
    return this.get(id) ?? null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<ScheduledDelivery | null> {
    await Promise.resolve();
    const row = [...this.rows.values()].find(candidate => candidate.idempotencyKey === idempotencyKey);
    return row ? copy(row) : null;
  }

  async findDue(now: Date, limit: number): Promise<ScheduledDelivery[]> {
    await Promise.resolve();
    return [...this.rows.values()]
      .filter(row => row.status === DeliveryStatus.PENDING && row.nextAttemptAt.getTime() <= now.getTime())
      .sort((a, b) => a.nextAttemptAt.getTime() - b.nextAttemptAt.getTime())
      .slice(0, limit)
      .map(copy);
  }

  async findStaleClaims(claimedBefore: Date, limit: number): Promise<ScheduledDelivery[]> {
    await Promise.resolve();
    return [...this.rows.values()]
      .filter(
        row =>
          row.status === DeliveryStatus.IN_PROGRESS &&
          row.claimedAt !== null &&
          row.claimedAt.getTime() < claimedBefore.getTime()
      )
      .slice(0, limit)
      .map(copy);
  }

  async claim(id: string, claim: ClaimDto): Promise<boolean> {
    await Promise.resolve();
    const row = this.rows.get(id);
    if (!row || row.status !== DeliveryStatus.PENDING || row.nextAttemptAt.getTime() > claim.now.getTime()) {
      return false;
    }
    Object.assign(row, {
      status: DeliveryStatus.IN_PROGRESS,
      claimToken: claim.token,
      claimedBy: claim.workerId,
      claimedAt: claim.now,
    });
    return true;
  }

  async saveContent(id: string, token: string, content: string, fingerprint: string): Promise<boolean> {
    return this.updateClaimed(id, token, row => {
      row.content = content;
      row.contentFingerprint = fingerprint;
    });
  }

  async release(id: string, token: string, nextAttemptAt: Date): Promise<boolean> {
    return this.updateClaimed(id, token, row => {
      Object.assign(row, {
        status: DeliveryStatus.PENDING,
        nextAttemptAt,
        claimToken: null,
        claimedBy: null,
        claimedAt: null,
      });
    });
  }

  async markSent(id: string, token: string, receiptId: string, sentAt: Date): Promise<boolean> {
    return this.updateClaimed(id, token, row => {
      Object.assign(row, {
        status: DeliveryStatus.SENT,
        attemptCount: row.attemptCount + 1,
        receiptId,
        sentAt,
        lastError: null,
      });
    });
  }

  async recordFailure(id: string, token: string, failure: FailureDto): Promise<boolean> {
    return this.updateClaimed(id, token, row => {
      if (failure.retryAt === null) {
        row.status = DeliveryStatus.FAILED;
      } else {
        Object.assign(row, {
          status: DeliveryStatus.PENDING,
          nextAttemptAt: failure.retryAt,
          claimToken: null,
          claimedBy: null,
          claimedAt: null,
        });
      }
      if (failure.countAttempt) {
        row.attemptCount += 1;
      }
      row.lastError = failure.error;
    });
  }

  async cancel(id: string, token?: string): Promise<boolean> {
    if (token !== undefined) {
      return this.updateClaimed(id, token, row => {
        row.status = DeliveryStatus.CANCELLED;
      });
    }

    await Promise.resolve();
    const row = this.rows.get(id);
    if (!row || (row.status !== DeliveryStatus.PENDING && row.status !== DeliveryStatus.IN_PROGRESS)) {
      return false;
    }
    row.status = DeliveryStatus.CANCELLED;
    return true;
  }

  private async updateClaimed(id: string, token: string, mutate: (row: ScheduledDelivery) => void): Promise<boolean> {
    await Promise.resolve();
    const row = this.rows.get(id);
    if (!row || row.status !== DeliveryStatus.IN_PROGRESS || row.claimToken !== token) {
      return false;
    }
    mutate(row);
    return true;
  }
}
