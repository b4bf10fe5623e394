import { DataSource, Repository } from 'typeorm';
import { Injectable } from '../../shared/decorators';
import { RegimeChange } from '../../domain/entities/regime-change.entity';
import {
  IRegimeChangeRepository,
  RecordRegimeChange,
} from '../../domain/interfaces/repositories.interface';

@Injectable()
export class RegimeChangeRepository implements IRegimeChangeRepository {
  private readonly repository: Repository<RegimeChange>;

  constructor(dataSource: DataSource) {
    this.repository = dataSource.getRepository(RegimeChange);
  }

  async record(change: RecordRegimeChange): Promise<RegimeChange> {
    const entity = this.repository.create({
      fromRegime: change.fromRegime,
      toRegime: change.toRegime,
      notified: change.notified,
      changedAt: change.changedAt,
    });
    return this.repository.save(entity);
  }

  async findRecent(limit: number): Promise<RegimeChange[]> {
    return this.repository.find({ order: { changedAt: 'DESC', id: 'DESC' }, take: limit });
  }
}
