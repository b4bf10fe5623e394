import { Inject, Injectable } from '../../shared/decorators';
import { IRegimeChangeTracker } from '../../domain/interfaces/services.interface';
import { RegimeTrackerState } from '../../domain/types/market-regime.type';
import { NotificationsDto } from '../dto/notifications.dto';

@Injectable()
export class SetRegimeNotificationsUseCase {
  constructor(
    @Inject('IRegimeChangeTracker')
    private readonly tracker: IRegimeChangeTracker,
  ) {}

  public async execute(dto: NotificationsDto): Promise<RegimeTrackerState> {
    return this.tracker.setNotificationsEnabled(dto.enabled);
  }
}
