import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { MarketRegime } from '../types/market-regime.type';

@Entity('regime_changes')
export class RegimeChange {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'from_regime', type: 'varchar' })
  fromRegime!: MarketRegime;

  @Column({ name: 'to_regime', type: 'varchar' })
  toRegime!: MarketRegime;

  // false when notifications were disabled at the time of the change
  @Column({ type: 'boolean', default: true })
  notified!: boolean;

  @Column({ name: 'changed_at', type: 'datetime' })
  @Index()
  changedAt!: Date;
}
