import { DataSource, LessThan, LessThanOrEqual, Repository, UpdateResult } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { DeliveryStatus, ScheduledDelivery } from './delivery.model';
import { ClaimDto, CreateDeliveryDto, DeliveryStore, FailureDto } from './delivery.types';

const affected = (result: UpdateResult): boolean => (result.affected ?? 0) > 0;

export class DeliveryRepository implements DeliveryStore {
  private _repository: Repository<ScheduledDelivery> | null = null;

  constructor(private readonly dataSource: DataSource) {}

  private get repository(): Repository<ScheduledDelivery> {
    if (!this._repository) {
      this._repository = this.dataSource.getRepository(ScheduledDelivery);
    }
    return this._repository;
  }

  insertIfAbsent = async (data: CreateDeliveryDto): Promise<boolean> => {
    const result = await this.repository
      .createQueryBuilder()
      .insert()
      .into(ScheduledDelivery)
      .values({
        ...data,
        nextAttemptAt: data.scheduledAt,
        status: DeliveryStatus.PENDING,
        attemptCount: 0,
      })
      .orIgnore()
      .returning(['id'])
      .execute();

    // ON CONFLICT DO NOTHING returns no row
    const rows: unknown = result.raw;
    return Array.isArray(rows) && rows.length > 0;
  };

  findById = async (id: string): Promise<ScheduledDelivery | null> => {
    return await this.repository.findOne({ where: { id } });
  };

  findByIdempotencyKey = async (idempotencyKey: string): Promise<ScheduledDelivery | null> => {
    return await this.repository.findOne({ where: { idempotencyKey } });
  };

  findDue = async (now: Date, limit: number): Promise<ScheduledDelivery[]> => {
    return await this.repository.find({
      where: {
        status: DeliveryStatus.PENDING,
        nextAttemptAt: LessThanOrEqual(now),
      },
      order: { nextAttemptAt: 'ASC' },
      take: limit,
    });
  };

  findStaleClaims = async (claimedBefore: Date, limit: number): Promise<ScheduledDelivery[]> => {
    return await this.repository.find({
      where: {
        status: DeliveryStatus.IN_PROGRESS,
        claimedAt: LessThan(claimedBefore),
      },
      order: { claimedAt: 'ASC' },
      take: limit,
    });
  };

  claim = async (id: string, claim: ClaimDto): Promise<boolean> => {
    const result = await this.repository
      .createQueryBuilder()
      .update(ScheduledDelivery)
      .set({
        status: DeliveryStatus.IN_PROGRESS,
        claimToken: claim.token,
        claimedBy: claim.workerId,
        claimedAt: claim.now,
      })
      .where('id = :id', { id })
      .andWhere('status = :status', { status: DeliveryStatus.PENDING })
      .andWhere('next_attempt_at <= :now', { now: claim.now })
      .execute();

    return affected(result);
  };

  saveContent = async (id: string, token: string, content: string, fingerprint: string): Promise<boolean> => {
    return await this.updateClaimed(id, token, { content, contentFingerprint: fingerprint });
  };

  release = async (id: string, token: string, nextAttemptAt: Date): Promise<boolean> => {
    return await this.updateClaimed(id, token, {
      status: DeliveryStatus.PENDING,
      nextAttemptAt,
      claimToken: null,
      claimedBy: null,
      claimedAt: null,
    });
  };

  markSent = async (id: string, token: string, receiptId: string, sentAt: Date): Promise<boolean> => {
    return await this.updateClaimed(id, token, {
      status: DeliveryStatus.SENT,
      attemptCount: () => 'attempt_count + 1',
      receiptId,
      sentAt,
      lastError: null,
    });
  };

  recordFailure = async (id: string, token: string, failure: FailureDto): Promise<boolean> => {
    const { retryAt } = failure;
    const next: QueryDeepPartialEntity<ScheduledDelivery> =
      retryAt === null
        ? { status: DeliveryStatus.FAILED }
        : { status: DeliveryStatus.PENDING, nextAttemptAt: retryAt, claimToken: null, claimedBy: null, claimedAt: null };

    return await this.updateClaimed(id, token, {
      ...next,
      ...(failure.countAttempt ? { attemptCount: () => 'attempt_count + 1' } : {}),
      lastError: failure.error,
    });
  };

  cancel = async (id: string, token?: string): Promise<boolean> => {
    if (token !== undefined) {
      return await this.updateClaimed(id, token, { status: DeliveryStatus.CANCELLED });
    }

    const result = await this.repository
      .createQueryBuilder()
      .update(ScheduledDelivery)
      .set({ status: DeliveryStatus.CANCELLED })
      .where('id = :id', { id })
      .andWhere('status IN (:...statuses)', {
        statuses: [DeliveryStatus.PENDING, DeliveryStatus.IN_PROGRESS],
      })
      .execute();

    return affected(result);
  };

  private updateClaimed = async (
    id: string,
    token: string,
    values: QueryDeepPartialEntity<ScheduledDelivery>
  ): Promise<boolean> => {
    const result = await this.repository
      .createQueryBuilder()
      .update(ScheduledDelivery)
      .set(values)
      .where('id = :id', { id })
      .andWhere('status = :status', { status: DeliveryStatus.IN_PROGRESS })
      .andWhere('claim_token = :token', { token })
      .execute();

    return affected(result);
  };
}
