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
import { Lesson } from '../../courses/entities/lesson.entity';
import { ColumnNumericTransformer } from '../../../common/utils/numeric.transformer';

@Entity('lesson_progress')
@Unique('uq_lesson_progress_student_lesson', ['student_id', 'lesson_id'])
export class LessonProgress {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  student_id!: string;

  @Column({ type: 'uuid' })
  lesson_id!: string;

  @Column({ type: 'boolean', default: false })
  is_completed!: boolean;

  @Column({ type: 'numeric', precision: 5, scale: 2, default: 0, transformer: new ColumnNumericTransformer() })
  completion_percentage!: number;

  @Column({ type: 'integer', default: 0 })
  time_spent_minutes!: number;

  @CreateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  started_at!: Date;

  @Column({ type: 'timestamp with time zone', nullable: true })
  completed_at?: Date | null;

  @UpdateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  updated_at!: Date;

  // Relations
  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: User;

  @ManyToOne(() => Lesson, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'lesson_id' })
  lesson?: Lesson;
}
