import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { CAFE_TABLE } from './cafe.table';

@Entity(CAFE_TABLE)
export class CafeEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 250 })
  name!: string;

  @Column({ type: 'varchar', length: 500 })
  map_url!: string;

  @Column({ type: 'varchar', length: 500 })
  img_url!: string;

  @Column({ type: 'varchar', length: 250 })
  location!: string;

  @Column({ type: 'boolean' })
  has_sockets!: boolean;

  @Column({ type: 'boolean' })
  has_toilet!: boolean;

  @Column({ type: 'boolean' })
  has_wifi!: boolean;

  @Column({ type: 'boolean' })
  can_take_calls!: boolean;

  @Column({ type: 'varchar', length: 250, nullable: true })
  seats!: string | null; // "20-30"

  @Column({ type: 'varchar', length: 250, nullable: true })
  coffee_price!: string | null; // "$5"
}
