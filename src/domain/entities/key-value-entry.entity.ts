import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

@Entity('key_value_entries')
export class KeyValueEntry {
  @PrimaryColumn({ type: 'varchar' })
  key!: string;

  @Column({ type: 'text', nullable: true })
  value!: string | null;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
