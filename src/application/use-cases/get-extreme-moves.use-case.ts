import { Inject, Injectable } from '../../shared/decorators';
import { IExtremeMoveTracker } from '../../domain/interfaces/services.interface';
import { ExtremeMove, ExtremeMoveSettings } from '../../domain/types/extreme-move.type';

export interface ExtremeMoveReport {
  settings: ExtremeMoveSettings;
  /** Newest first. */
  moves: ExtremeMove[];
}

@Injectable()
export class GetExtremeMovesUseCase {
  constructor(
    @Inject('IExtremeMoveTracker')
    private readonly tracker: IExtremeMoveTracker,
  ) {}

  public async execute(limit: number = 10): Promise<ExtremeMoveReport> {
    const [settings, moves] = await Promise.all([this.tracker.getSettings(), this.tracker.getHistory(limit)]);
    return { settings, moves };
  }
}
