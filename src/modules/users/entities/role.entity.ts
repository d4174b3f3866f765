import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

export type RoleName = 'Admin' | 'Teacher' | 'Student';

export const ROLE_NAMES: readonly RoleName[] = ['Admin', 'Teacher', 'Student'];

export function isRoleName(value: unknown): value is RoleName {
  return typeof value === 'string' && ROLE_NAMES.some((name) => name === value);
}

@Entity('roles')
export class Role {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20, unique: true })
  name!: RoleName;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'boolean', default: true })
  active!: boolean;
}
