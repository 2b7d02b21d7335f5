import { DeliveryStatus, ScheduledDelivery } from './delivery.model';

export interface CreateDeliveryDto {
  subscriberId: string;
  deliveryDate: string;
  idempotencyKey: string;
  scheduledAt: Date;
  windowEndsAt: Date;
}

export interface ClaimDto {
  token: string;
  workerId: string;
  now: Date;
}

export interface FailureDto {
  error: string;
  /**
   * When to try again; null finalizes the delivery as failed
   */
  retryAt: Date | null;
  /**
   * false when the delivery is abandoned without having made an attempt
   */
  countAttempt: boolean;
}

/**
 * Persistence for scheduled deliveries.
 *
 * Every mutation is a single conditional update. Methods taking a claim token
 * only affect a row that is still in_progress under that token, and resolve to
 * false when the claim has been lost.
 */
export interface DeliveryStore {
  /**
   * Insert unless a delivery with the same idempotency key exists. Resolves to true when created.
   */
  insertIfAbsent(data: CreateDeliveryDto): Promise<boolean>;
  findById(id: string): Promise<ScheduledDelivery | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<ScheduledDelivery | null>;
  findDue(now: Date, limit: number): Promise<ScheduledDelivery[]>;
  findStaleClaims(claimedBefore: Date, limit: number): Promise<ScheduledDelivery[]>;

  /**
   * pending -> in_progress, only while pending and due
   */
  claim(id: string, claim: ClaimDto): Promise<boolean>;
  saveContent(id: string, token: string, content: string, fingerprint: string): Promise<boolean>;
  /**
   * in_progress -> pending without counting an attempt
   */
  release(id: string, token: string, nextAttemptAt: Date): Promise<boolean>;
  markSent(id: string, token: string, receiptId: string, sentAt: Date): Promise<boolean>;
  recordFailure(id: string, token: string, failure: FailureDto): Promise<boolean>;
  /**
   * With a token: in_progress -> cancelled for that claim.
   * Without: pending or in_progress -> cancelled.
   */
  cancel(id: string, token?: string): Promise<boolean>;
}

export interface DeliveryStatusDto {
  id: string;
  subscriberId: string;
  deliveryDate: string;
  scheduledAt: string;
  status: DeliveryStatus;
  attemptCount: number;
  nextAttemptAt: string | null;
  lastError: string | null;
  contentFingerprint: string | null;
  receiptId: string | null;
  sentAt: string | null;
}
