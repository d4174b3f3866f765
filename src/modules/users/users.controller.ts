import { Controller, Get, Put, Body, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { UsersService } from './services/users.service';
import { ListUsersByRoleDto, UpdateProfileDto } from './dto';
import { Roles, CurrentUser } from '../../common/decorators';
import { AuthUser, requireUser } from '../auth/interfaces/auth-user.interface';

@ApiTags('Users')
@ApiBearerAuth()
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('profile')
  @ApiOperation({ summary: 'Get current user profile' })
  @ApiResponse({ status: 200, description: 'Profile retrieved successfully' })
  @ApiResponse({ status: 401, description: 'Authentication required' })
  async getProfile(@CurrentUser() user: AuthUser | null) {
    return this.usersService.getProfile(requireUser(user).sub);
  }

  @Put('profile')
  @ApiOperation({ summary: 'Update current user profile' })
  @ApiResponse({ status: 200, description: 'Profile updated successfully' })
  @ApiResponse({ status: 400, description: 'Validation error' })
  async updateProfile(@CurrentUser() user: AuthUser | null, @Body() dto: UpdateProfileDto) {
    return this.usersService.updateProfile(requireUser(user).sub, dto);
  }

  @Get('by-role')
  @Roles('Admin')
  @ApiOperation({ summary: 'List users holding a role (admin only)' })
  @ApiResponse({ status: 200, description: 'Users retrieved successfully' })
  @ApiResponse({ status: 403, description: 'Permission denied' })
  async listByRole(@Query() query: ListUsersByRoleDto) {
    return this.usersService.listUsersByRole(query.role, query.page, query.page_size);
  }
}
