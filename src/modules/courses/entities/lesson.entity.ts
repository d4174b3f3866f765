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
import { CourseModule } from './course-module.entity';

export type LessonType = 'video' | 'text' | 'quiz' | 'assignment' | 'live';

export const LESSON_TYPES: readonly LessonType[] = ['video', 'text', 'quiz', 'assignment', 'live'];

@Entity('lessons')
@Unique('uq_lessons_module_order', ['module_id', 'order'])
export class Lesson {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  module_id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'varchar', length: 20, default: 'video' })
  lesson_type!: LessonType;

  @Column({ type: 'text', default: '' })
  content!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  video_url?: string | null;

  @Column({ type: 'integer', default: 0 })
  duration_minutes!: number;

  @Column({ type: 'integer', default: 0 })
  order!: number;

  @Column({ type: 'boolean', default: false })
  is_published!: boolean;

  @Column({ type: 'boolean', default: false })
  is_free_preview!: boolean;

  @CreateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  updated_at!: Date;

  // Relations
  @ManyToOne(() => CourseModule, (module) => module.lessons, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'module_id' })
  module?: CourseModule;
}
