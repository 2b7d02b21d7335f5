import { DateTime } from 'luxon';
import { DataSource, MoreThanOrEqual, Repository } from 'typeorm';
import { Clock, HistoryStore, systemClock } from '@/shared/types';
import { MessageHistory } from './message-history.model';

/**
 * Fingerprints of messages already sent, consulted by generation to avoid repeats.
 * Only entries within the retention period are returned; deleting older rows is
 * left to housekeeping outside this service.
 */
export class MessageHistoryRepository implements HistoryStore {
  private _repository: Repository<MessageHistory> | null = null;

  constructor(
    private readonly dataSource: DataSource,
    private readonly retentionDays: number,
    private readonly clock: Clock = systemClock
  ) {}

  private get repository(): Repository<MessageHistory> {
    if (!this._repository) {
      this._repository = this.dataSource.getRepository(MessageHistory);
    }
    return this._repository;
  }

  recentFingerprints = async (subscriberId: string, limit: number): Promise<string[]> => {
    const since = DateTime.fromJSDate(this.clock()).minus({ days: this.retentionDays }).toJSDate();

    const entries = await this.repository.find({
      select: { fingerprint: true },
      where: { subscriberId, recordedAt: MoreThanOrEqual(since) },
      order: { recordedAt: 'DESC' },
      take: limit,
    });

    return entries.map(entry => entry.fingerprint);
  };

  record = async (subscriberId: string, fingerprint: string): Promise<void> => {
    await this.repository.insert({ subscriberId, fingerprint });
  };
}
