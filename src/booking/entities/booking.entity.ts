import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  DeleteDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
  ValueTransformer,
} from 'typeorm';
import { User } from '../../auth/entities/user.entity';
import { RoomType } from './room-type.enum';

// pg returns numeric columns as strings
const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : parseFloat(value)),
};

@Entity('booking')
@Index(['owner_id'])
@Index(['room_number', 'booking_start_date'])
export class Booking {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 20 })
  room_type!: RoomType;

  @Column({ type: 'int' })
  room_number!: number;

  @Column({ type: 'timestamptz' })
  booking_start_date!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  booking_end_date!: Date | null;

  @Column({
    type: 'numeric',
    precision: 10,
    scale: 2,
    transformer: numericTransformer,
  })
  cost!: number;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: 'boolean', default: false })
  cancelled!: boolean;

  @Column({ type: 'uuid', nullable: true })
  owner_id!: string | null;

  @ManyToOne(() => User, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'owner_id' })
  owner?: User;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @Column({ type: 'varchar', length: 255 })
  created_by!: string;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @Column({ type: 'varchar', length: 255 })
  updated_by!: string;

  @DeleteDateColumn({ type: 'timestamptz', nullable: true })
  deleted_at!: Date | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  deleted_by!: string | null;
}
