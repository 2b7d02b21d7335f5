import { DataSource, Repository } from 'typeorm';
import { Subscriber, SubscriberDirectory } from '@/shared/types';
import { SubscriberEntity } from './subscriber.model';

export interface DefaultWindow {
  startHour: number;
  endHour: number;
}

export const toSubscriber = (entity: SubscriberEntity, defaults: DefaultWindow): Subscriber => ({
  id: entity.id,
  phoneNumber: entity.phoneNumber,
  timezone: entity.timezone,
  windowStartHour: entity.windowStartHour ?? defaults.startHour,
  windowEndHour: entity.windowEndHour ?? defaults.endHour,
  active: entity.isActive && !entity.deletedAt,
});

/**
 * Read-only view over the subscribers table owned by user management
 */
export class SubscriberRepository implements SubscriberDirectory {
  private _repository: Repository<SubscriberEntity> | null = null;

  constructor(
    private readonly dataSource: DataSource,
    private readonly defaults: DefaultWindow
  ) {}

  private get repository(): Repository<SubscriberEntity> {
    if (!this._repository) {
      this._repository = this.dataSource.getRepository(SubscriberEntity);
    }
    return this._repository;
  }

  listActiveSubscribers = async (): Promise<Subscriber[]> => {
    // soft-deleted rows are excluded by find()
    const entities = await this.repository.find({ where: { isActive: true } });
    return entities.map(entity => toSubscriber(entity, this.defaults));
  };

  findSubscriber = async (id: string): Promise<Subscriber | null> => {
    const entity = await this.repository.findOne({ where: { id }, withDeleted: true });
    return entity ? toSubscriber(entity, this.defaults) : null;
  };
}
