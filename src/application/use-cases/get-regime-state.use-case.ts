import { Inject, Injectable } from '../../shared/decorators';
import { IRegimeChangeTracker } from '../../domain/interfaces/services.interface';
import { RegimeTrackerState } from '../../domain/types/market-regime.type';

@Injectable()
export class GetRegimeStateUseCase {
  constructor(
    @Inject('IRegimeChangeTracker')
    private readonly tracker: IRegimeChangeTracker,
  ) {}

  public async execute(): Promise<RegimeTrackerState> {
    return this.tracker.getState();
  }
}
