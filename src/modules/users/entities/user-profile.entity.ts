import { Entity, PrimaryColumn, Column, OneToOne, ManyToOne, JoinColumn } from 'typeorm';
import { User } from '../../auth/entities/user.entity';
import { Role } from './role.entity';

@Entity('user_profiles')
export class UserProfile {
  @PrimaryColumn({ type: 'uuid' })
  user_id!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  first_name!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  last_name!: string;

  @Column({ type: 'varchar', length: 500, default: '' })
  avatar!: string;

  @Column({ type: 'varchar', length: 20, default: '' })
  phone_number!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  country!: string;

  @Column({ type: 'varchar', length: 10, default: 'en' })
  language_preference!: string;

  @Column({ type: 'varchar', length: 50, default: 'UTC' })
  timezone!: string;

  @Column({ type: 'uuid', nullable: true })
  role_id?: string | null;

  // Relations
  @OneToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;

  @ManyToOne(() => Role, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'role_id' })
  role?: Role | null;
}
