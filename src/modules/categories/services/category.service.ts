import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Category, CourseCategory } from '../entities';
import { CreateCategoryDto, UpdateCategoryDto } from '../dto';
import { Course } from '../../courses/entities/course.entity';
import { DuplicateCategoryException, ResourceNotFoundException } from '../../../common/exceptions';
import { isUniqueViolation } from '../../../common/utils/database-error.util';

export interface CategoryView {
  id: string;
  title: string;
  icon_src: string | null;
  description: string;
  is_active: boolean;
  courses_count: number;
}

@Injectable()
export class CategoryService {
  private readonly logger = new Logger(CategoryService.name);

  constructor(
    @InjectRepository(Category)
    private categoryRepository: Repository<Category>,
    @InjectRepository(CourseCategory)
    private courseCategoryRepository: Repository<CourseCategory>,
    @InjectRepository(Course)
    private courseRepository: Repository<Course>,
  ) {}

  /** Active categories, alphabetically, with their published course counts. */
  async listCategories(): Promise<CategoryView[]> {
    const categories = await this.categoryRepository.find({ where: { is_active: true }, order: { title: 'ASC' } });
    const counts = await this.countPublishedCourses(categories.map((category) => category.id));
    return categories.map((category) => toCategoryView(category, counts.get(category.id) ?? 0));
  }

  async getCategory(categoryId: string): Promise<CategoryView> {
    const category = await this.requireCategory(categoryId);
    const counts = await this.countPublishedCourses([category.id]);
    return toCategoryView(category, counts.get(category.id) ?? 0);
  }

  async createCategory(dto: CreateCategoryDto): Promise<CategoryView> {
    const category = await this.saveUnique(
      this.categoryRepository.create({
        title: dto.title.trim(),
        icon_src: dto.icon_src ?? null,
        description: dto.description ?? '',
        is_active: dto.is_active ?? true,
      }),
    );

    this.logger.log(`Category created: ${category.title}`);
    return toCategoryView(category, 0);
  }

  async updateCategory(categoryId: string, dto: UpdateCategoryDto): Promise<CategoryView> {
    const category = await this.requireCategory(categoryId);

    Object.assign(category, dto);
    if (dto.title !== undefined) {
      category.title = dto.title.trim();
    }
    await this.saveUnique(category);

    this.logger.log(`Category updated: ${category.id}`);
    return this.getCategory(category.id);
  }

  async deleteCategory(categoryId: string): Promise<void> {
    const category = await this.requireCategory(categoryId);
    await this.categoryRepository.remove(category);
    this.logger.log(`Category deleted: ${categoryId}`);
  }

  private async countPublishedCourses(categoryIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>(categoryIds.map((id) => [id, 0]));
    if (categoryIds.length === 0) {
      return counts;
    }

    const links = await this.courseCategoryRepository.find({ where: { category_id: In(categoryIds) } });
    const courseIds = [...new Set(links.map((link) => link.course_id))];
    const published = courseIds.length
      ? await this.courseRepository.find({ where: { id: In(courseIds), is_published: true } })
      : [];
    const publishedIds = new Set(published.map((course) => course.id));

    for (const link of links) {
      if (publishedIds.has(link.course_id)) {
        counts.set(link.category_id, (counts.get(link.category_id) ?? 0) + 1);
      }
    }
    return counts;
  }

  private async requireCategory(categoryId: string): Promise<Category> {
    const category = await this.categoryRepository.findOne({ where: { id: categoryId } });
    if (!category) {
      throw new ResourceNotFoundException('Category');
    }
    return category;
  }

  private async saveUnique(category: Category): Promise<Category> {
    try {
      return await this.categoryRepository.save(category);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateCategoryException();
      }
      throw error;
    }
  }
}

function toCategoryView(category: Category, coursesCount: number): CategoryView {
  return {
    id: category.id,
    title: category.title,
    icon_src: category.icon_src ?? null,
    description: category.description,
    is_active: category.is_active,
    courses_count: coursesCount,
  };
}
