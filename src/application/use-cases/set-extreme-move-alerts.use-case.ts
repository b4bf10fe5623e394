import { Inject, Injectable } from '../../shared/decorators';
import { IExtremeMoveTracker } from '../../domain/interfaces/services.interface';
import { ExtremeMoveSettings } from '../../domain/types/extreme-move.type';
import { ExtremeMoveAlertsDto } from '../dto/extreme-move-alerts.dto';

@Injectable()
export class SetExtremeMoveAlertsUseCase {
  constructor(
    @Inject('IExtremeMoveTracker')
    private readonly tracker: IExtremeMoveTracker,
  ) {}

  public async execute(dto: ExtremeMoveAlertsDto): Promise<ExtremeMoveSettings> {
    return this.tracker.setAlertsEnabled(dto.severity, dto.enabled);
  }
}
