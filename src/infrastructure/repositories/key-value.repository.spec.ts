import { DataSource, EntityManager, Repository } from 'typeorm';
import { KeyValueEntry } from '../../domain/entities/key-value-entry.entity';
import { KeyValueRepository } from './key-value.repository';

type RepositoryMock = Pick<Repository<KeyValueEntry>, 'findOneBy' | 'delete' | 'save' | 'create'>;

function repositoryMock(): jest.Mocked<RepositoryMock> {
  return {
    findOneBy: jest.fn(),
    delete: jest.fn(),
    save: jest.fn(),
    create: jest.fn(),
  };
}

function setup() {
  const mock = repositoryMock();
  const transactional = repositoryMock();
  const transaction = jest.fn(async (run: (manager: EntityManager) => Promise<void>) =>
    run({ getRepository: () => transactional } as unknown as EntityManager),
  );
  const dataSource = { getRepository: () => mock, transaction } as unknown as DataSource;
  return { repository: new KeyValueRepository(dataSource), mock, transactional, transaction };
}

describe('KeyValueRepository', () => {
  it('returns null for a missing key', async () => {
    const { repository, mock } = setup();
    mock.findOneBy.mockResolvedValue(null);

    await expect(repository.get('missing')).resolves.toBeNull();
    expect(mock.findOneBy).toHaveBeenCalledWith({ key: 'missing' });
  });

  it('returns the stored value', async () => {
    const { repository, mock } = setup();
    const entry = new KeyValueEntry();
    entry.key = 'macro_regime.last_known';
    entry.value = 'RISK-ON';
    mock.findOneBy.mockResolvedValue(entry);

    await expect(repository.get('macro_regime.last_known')).resolves.toBe('RISK-ON');
  });

  it('upserts a value', async () => {
    const { repository, mock } = setup();
    const entry = new KeyValueEntry();
    mock.create.mockReturnValue(entry);

    await repository.set('k', 'v');

    expect(mock.create).toHaveBeenCalledWith({ key: 'k', value: 'v' });
    expect(mock.save).toHaveBeenCalledWith(entry);
  });

  it('deletes the key when the value is null', async () => {
    const { repository, mock } = setup();

    await repository.set('k', null);

    expect(mock.delete).toHaveBeenCalledWith({ key: 'k' });
    expect(mock.save).not.toHaveBeenCalled();
  });

  it('applies a batch inside one transaction', async () => {
    const { repository, mock, transactional, transaction } = setup();
    transactional.create.mockImplementation((fields) => Object.assign(new KeyValueEntry(), fields));

    await repository.setMany([
      ['macro_regime.last_known', 'RISK-OFF'],
      ['macro_regime.last_change_at', '2026-03-01T00:00:00.000Z'],
      ['stale', null],
    ]);

    expect(transaction).toHaveBeenCalledTimes(1);
    expect(transactional.save).toHaveBeenCalledTimes(2);
    expect(transactional.save).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ key: 'macro_regime.last_known', value: 'RISK-OFF' }),
    );
    expect(transactional.save).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ key: 'macro_regime.last_change_at', value: '2026-03-01T00:00:00.000Z' }),
    );
    expect(transactional.delete).toHaveBeenCalledWith({ key: 'stale' });
    expect(mock.save).not.toHaveBeenCalled();
  });

  it('propagates a failed batch', async () => {
    const { repository, transactional } = setup();
    transactional.create.mockImplementation((fields) => Object.assign(new KeyValueEntry(), fields));
    transactional.save.mockRejectedValueOnce(new Error('SQLITE_BUSY'));

    await expect(repository.setMany([['k', 'v']])).rejects.toThrow('SQLITE_BUSY');
  });
});
