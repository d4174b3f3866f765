import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { CategoryService } from './services/category.service';
import { CreateCategoryDto, UpdateCategoryDto } from './dto';
import { Public, Roles } from '../../common/decorators';

@ApiTags('Categories')
@Controller('categories')
export class CategoryController {
  constructor(private readonly categoryService: CategoryService) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'List active categories' })
  @ApiResponse({ status: 200, description: 'Categories with published course counts' })
  async listCategories() {
    return this.categoryService.listCategories();
  }

  @Public()
  @Get(':id')
  @ApiOperation({ summary: 'Get a category' })
  @ApiResponse({ status: 200, description: 'Category retrieved successfully' })
  @ApiResponse({ status: 404, description: 'Category not found' })
  async getCategory(@Param('id', ParseUUIDPipe) categoryId: string) {
    return this.categoryService.getCategory(categoryId);
  }

  @Post()
  @Roles('Admin')
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a category (admin only)' })
  @ApiResponse({ status: 201, description: 'Category created successfully' })
  @ApiResponse({ status: 409, description: 'Title already used' })
  async createCategory(@Body() dto: CreateCategoryDto) {
    const category = await this.categoryService.createCategory(dto);
    return {
      success: true,
      data: category,
      message: 'Category created successfully',
      timestamp: new Date().toISOString(),
    };
  }

  @Put(':id')
  @Roles('Admin')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a category (admin only)' })
  @ApiResponse({ status: 200, description: 'Category updated successfully' })
  async updateCategory(@Param('id', ParseUUIDPipe) categoryId: string, @Body() dto: UpdateCategoryDto) {
    const category = await this.categoryService.updateCategory(categoryId, dto);
    return {
      success: true,
      data: category,
      message: 'Category updated successfully',
      timestamp: new Date().toISOString(),
    };
  }

  @Delete(':id')
  @Roles('Admin')
  @ApiBearerAuth()
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a category (admin only)' })
  @ApiResponse({ status: 204, description: 'Category deleted' })
  async deleteCategory(@Param('id', ParseUUIDPipe) categoryId: string) {
    await this.categoryService.deleteCategory(categoryId);
  }
}
