import { DataSource, Repository } from 'typeorm';
import { Injectable } from '../../shared/decorators';
import { KeyValueEntry } from '../../domain/entities/key-value-entry.entity';
import { IKeyValueStore, KeyValueWrite } from '../../domain/interfaces/repositories.interface';

@Injectable()
export class KeyValueRepository implements IKeyValueStore {
  private readonly repository: Repository<KeyValueEntry>;

  constructor(private readonly dataSource: DataSource) {
    this.repository = dataSource.getRepository(KeyValueEntry);
  }

  async get(key: string): Promise<string | null> {
    const entry = await this.repository.findOneBy({ key });
    return entry?.value ?? null;
  }

  async set(key: string, value: string | null): Promise<void> {
    await this.write(this.repository, [key, value]);
  }

  async setMany(writes: readonly KeyValueWrite[]): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(KeyValueEntry);
      for (const entry of writes) {
        await this.write(repository, entry);
      }
    });
  }

  private async write(
    repository: Repository<KeyValueEntry>,
    [key, value]: KeyValueWrite,
  ): Promise<void> {
    if (value === null) {
      await repository.delete({ key });
      return;
    }
    await repository.save(repository.create({ key, value }));
  }
}
