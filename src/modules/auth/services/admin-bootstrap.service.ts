import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { User } from '../entities';
import { Role, UserProfile } from '../../users/entities';
import { UsersService } from '../../users/services/users.service';
import { PasswordService } from './password.service';
import { getBootstrapAdminConfig } from '../../../config/admin.config';

/**
 * Seeds a staff account with the Admin role from ADMIN_EMAIL /
 * ADMIN_PASSWORD when no user with that email exists yet.
 */
@Injectable()
export class AdminBootstrapService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminBootstrapService.name);

  constructor(
    private configService: ConfigService,
    @InjectRepository(User)
    private userRepository: Repository<User>,
    @InjectDataSource()
    private dataSource: DataSource,
    private usersService: UsersService,
    private passwordService: PasswordService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.ensureAdmin();
  }

  async ensureAdmin(): Promise<User | null> {
    const config = getBootstrapAdminConfig(this.configService);
    if (!config) {
      return null;
    }

    const existing = await this.userRepository.findOne({ where: { email: config.email } });
    if (existing) {
      return existing;
    }

    const passwordHash = await this.passwordService.hash(config.password);

    const user = await this.dataSource.transaction(async (manager) => {
      const userRepository = manager.getRepository(User);
      const profileRepository = manager.getRepository(UserProfile);

      const user = await userRepository.save(
        userRepository.create({
          email: config.email,
          password_hash: passwordHash,
          is_active: true,
          is_staff: true,
          email_verified: true,
        }),
      );

      const role = await this.usersService.findActiveRole('Admin', manager.getRepository(Role));
      await profileRepository.save(profileRepository.create({ user_id: user.id, role_id: role?.id ?? null }));
      return user;
    });

    this.logger.log(`Bootstrap admin created: ${config.email}`);
    return user;
  }
}
