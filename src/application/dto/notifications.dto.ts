import { IsBoolean } from 'class-validator';

export class NotificationsDto {
  @IsBoolean({ message: 'enabled must be a boolean' })
  enabled!: boolean;
}
