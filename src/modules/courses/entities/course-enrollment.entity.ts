import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { User } from '../../auth/entities/user.entity';
import { Course } from './course.entity';

export type EnrollmentStatus = 'enrolled' | 'completed' | 'dropped' | 'suspended';

@Entity('course_enrollments')
@Unique('uq_course_enrollments_student_course', ['student_id', 'course_id'])
export class CourseEnrollment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  student_id!: string;

  @Column({ type: 'uuid' })
  course_id!: string;

  @Column({ type: 'varchar', length: 20, default: 'enrolled' })
  status!: EnrollmentStatus;

  @Column({ type: 'boolean', default: true })
  is_active!: boolean;

  @Column({ type: 'integer', default: 0 })
  progress_percentage!: number;

  @CreateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  enrolled_at!: Date;

  @Column({ type: 'timestamp with time zone', nullable: true })
  completed_at?: Date | null;

  @Column({ type: 'timestamp with time zone', nullable: true })
  last_accessed_at?: Date | null;

  @UpdateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  updated_at!: Date;

  // Relations
  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: User;

  @ManyToOne(() => Course, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course?: Course;
}
