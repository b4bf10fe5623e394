import { Inject, Injectable } from '../../shared/decorators';
import { IRegimeChangeRepository } from '../../domain/interfaces/repositories.interface';
import { RegimeChange } from '../../domain/entities/regime-change.entity';

@Injectable()
export class GetRegimeHistoryUseCase {
  constructor(
    @Inject('IRegimeChangeRepository')
    private readonly regimeChangeRepository: IRegimeChangeRepository,
  ) {}

  public async execute(limit: number = 10): Promise<RegimeChange[]> {
    return this.regimeChangeRepository.findRecent(limit);
  }
}
