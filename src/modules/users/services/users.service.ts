import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { User } from '../../auth/entities/user.entity';
import { Role, RoleName, UserProfile, isRoleName } from '../entities';
import { UpdateProfileDto } from '../dto';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { ResourceNotFoundException } from '../../../common/exceptions';
import { PaginationResult, PaginationUtil } from '../../../common/utils/pagination.util';

export interface ProfileView {
  user_id: string;
  email: string;
  first_name: string;
  last_name: string;
  full_name: string;
  avatar: string;
  phone_number: string;
  country: string;
  language_preference: string;
  timezone: string;
  role: RoleName | null;
  is_staff: boolean;
  email_verified: boolean;
  date_joined: Date;
  last_login: Date | null;
}

export interface UserSummary {
  id: string;
  email: string;
  full_name: string;
}

export function displayName(email: string, profile?: Pick<UserProfile, 'first_name' | 'last_name'> | null): string {
  const fullName = `${profile?.first_name ?? ''} ${profile?.last_name ?? ''}`.trim();
  return fullName || email;
}

/**
 * Users service: profile reads and writes, role resolution and the
 * per-request caller identity used by the JWT strategy.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    @InjectRepository(UserProfile)
    private profileRepository: Repository<UserProfile>,
    @InjectRepository(Role)
    private roleRepository: Repository<Role>,
  ) {}

  /**
   * Caller identity for an authenticated request, or null when the
   * account no longer exists or is inactive.
   */
  async findAuthUser(userId: string): Promise<AuthUser | null> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user || !user.is_active) {
      return null;
    }

    const profile = await this.profileRepository.findOne({ where: { user_id: userId } });
    return {
      sub: user.id,
      email: user.email,
      role: await this.roleNameOf(profile),
      is_staff: user.is_staff,
    };
  }

  /** Active role with the given name, or null. */
  async findActiveRole(name: RoleName, repository: Repository<Role> = this.roleRepository): Promise<Role | null> {
    return repository.findOne({ where: { name, active: true } });
  }

  async getProfile(userId: string): Promise<ProfileView> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      throw new ResourceNotFoundException('User');
    }

    const profile = await this.profileRepository.findOne({ where: { user_id: userId } });
    return this.toProfileView(user, profile, await this.roleNameOf(profile));
  }

  async updateProfile(userId: string, dto: UpdateProfileDto): Promise<ProfileView> {
    this.logger.log(`Updating profile for user: ${userId}`);

    let profile = await this.profileRepository.findOne({ where: { user_id: userId } });
    if (!profile) {
      profile = this.profileRepository.create({ user_id: userId });
    }

    Object.assign(profile, dto);
    await this.profileRepository.save(profile);

    return this.getProfile(userId);
  }

  async listUsersByRole(role: RoleName, page?: number, pageSize?: number): Promise<PaginationResult<ProfileView>> {
    const options = PaginationUtil.validatePaginationOptions(page, pageSize);
    const roleRow = await this.roleRepository.findOne({ where: { name: role } });
    if (!roleRow) {
      return PaginationUtil.createPaginationResult([], 0, options.page, options.limit);
    }

    const [profiles, total] = await this.profileRepository.findAndCount({
      where: { role_id: roleRow.id },
      order: { user_id: 'ASC' },
      skip: PaginationUtil.getSkip(options.page, options.limit),
      take: options.limit,
    });

    const users = await this.findUsersByIds(profiles.map((profile) => profile.user_id));
    const views = profiles.flatMap((profile) => {
      const user = users.get(profile.user_id);
      return user ? [this.toProfileView(user, profile, role)] : [];
    });

    return PaginationUtil.createPaginationResult(views, total, options.page, options.limit);
  }

  /** Display summaries keyed by user id. */
  async findSummaries(userIds: string[]): Promise<Map<string, UserSummary>> {
    const users = await this.findUsersByIds(userIds);
    const profiles = userIds.length
      ? await this.profileRepository.find({ where: { user_id: In(userIds) } })
      : [];
    const profileByUser = new Map(profiles.map((profile) => [profile.user_id, profile]));

    const summaries = new Map<string, UserSummary>();
    for (const user of users.values()) {
      summaries.set(user.id, {
        id: user.id,
        email: user.email,
        full_name: displayName(user.email, profileByUser.get(user.id)),
      });
    }
    return summaries;
  }

  private async findUsersByIds(userIds: string[]): Promise<Map<string, User>> {
    if (userIds.length === 0) {
      return new Map();
    }
    const users = await this.userRepository.find({ where: { id: In(userIds) } });
    return new Map(users.map((user) => [user.id, user]));
  }

  private async roleNameOf(profile: UserProfile | null): Promise<RoleName | null> {
    if (!profile?.role_id) {
      return null;
    }
    const role = await this.roleRepository.findOne({ where: { id: profile.role_id } });
    return role && isRoleName(role.name) ? role.name : null;
  }

  toProfileView(user: User, profile: UserProfile | null, role: RoleName | null): ProfileView {
    return {
      user_id: user.id,
      email: user.email,
      first_name: profile?.first_name ?? '',
      last_name: profile?.last_name ?? '',
      full_name: displayName(user.email, profile),
      avatar: profile?.avatar ?? '',
      phone_number: profile?.phone_number ?? '',
      country: profile?.country ?? '',
      language_preference: profile?.language_preference ?? 'en',
      timezone: profile?.timezone ?? 'UTC',
      role,
      is_staff: user.is_staff,
      email_verified: user.email_verified,
      date_joined: user.date_joined,
      last_login: user.last_login ?? null,
    };
  }
}
