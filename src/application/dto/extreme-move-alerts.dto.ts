import { IsBoolean, IsIn } from 'class-validator';
import { MOVE_SEVERITIES, MoveSeverity } from '../../domain/types/extreme-move.type';

export class ExtremeMoveAlertsDto {
  @IsIn(MOVE_SEVERITIES, { message: `severity must be one of ${MOVE_SEVERITIES.join(', ')}` })
  severity!: MoveSeverity;

  @IsBoolean({ message: 'enabled must be a boolean' })
  enabled!: boolean;
}
