import { Test } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { AdminBootstrapService } from './admin-bootstrap.service';
import { PasswordService } from './password.service';
import { User } from '../entities';
import { Role, UserProfile } from '../../users/entities';
import { UsersService } from '../../users/services/users.service';
import { InMemoryDataSource, InMemoryRepository } from '../../../testing/in-memory-repository';

describe('AdminBootstrapService', () => {
  let users: InMemoryRepository<User>;
  let profiles: InMemoryRepository<UserProfile>;
  let roles: InMemoryRepository<Role>;
  let adminRole: Role;

  async function createService(config: Record<string, string>): Promise<AdminBootstrapService> {
    const dataSource = new InMemoryDataSource()
      .register(User, users)
      .register(UserProfile, profiles)
      .register(Role, roles);

    const moduleRef = await Test.createTestingModule({
      providers: [
        AdminBootstrapService,
        UsersService,
        { provide: getRepositoryToken(User), useValue: users },
        { provide: getRepositoryToken(UserProfile), useValue: profiles },
        { provide: getRepositoryToken(Role), useValue: roles },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: ConfigService, useValue: new ConfigService(config) },
        { provide: PasswordService, useValue: { hash: jest.fn(async (password: string) => `hashed:${password}`) } },
      ],
    }).compile();

    return moduleRef.get(AdminBootstrapService);
  }

  const adminConfig = { ADMIN_EMAIL: 'Admin@Example.com', ADMIN_PASSWORD: 'test-password' };

  beforeEach(async () => {
    users = new InMemoryRepository(() => new User(), { unique: [['email']] });
    profiles = new InMemoryRepository(() => new UserProfile(), { primaryKey: 'user_id' });
    roles = new InMemoryRepository(() => new Role(), { unique: [['name']] });

    adminRole = await roles.save(roles.create({ name: 'Admin', description: '', active: true }));
    await roles.save(roles.create({ name: 'Student', description: '', active: true }));
  });

  it('does nothing without both credentials configured', async () => {
    const service = await createService({ ADMIN_EMAIL: 'admin@example.com' });

    await expect(service.ensureAdmin()).resolves.toBeNull();
    expect(users.all).toHaveLength(0);
  });

  it('creates a verified staff account with an Admin profile', async () => {
    const service = await createService(adminConfig);

    const user = await service.ensureAdmin();

    expect(users.all).toEqual([
      expect.objectContaining({
        id: user?.id,
        email: 'admin@example.com',
        password_hash: 'hashed:test-password',
        is_staff: true,
        is_active: true,
        email_verified: true,
      }),
    ]);
    expect(profiles.all).toEqual([expect.objectContaining({ user_id: user?.id, role_id: adminRole.id })]);
  });

  it('returns the existing account and writes nothing when the email is taken', async () => {
    const existing = await users.save(
      users.create({
        email: 'admin@example.com',
        password_hash: 'hashed:earlier',
        is_active: true,
        is_staff: false,
        email_verified: false,
      }),
    );
    const service = await createService(adminConfig);

    await expect(service.ensureAdmin()).resolves.toMatchObject({ id: existing.id, password_hash: 'hashed:earlier' });
    expect(users.all).toHaveLength(1);
    expect(profiles.all).toHaveLength(0);
  });

  it('rolls back the account when the profile cannot be written', async () => {
    jest.spyOn(profiles, 'save').mockRejectedValueOnce(new Error('profile write failed'));
    const service = await createService(adminConfig);

    await expect(service.ensureAdmin()).rejects.toThrow('profile write failed');
    expect(users.all).toHaveLength(0);
  });
});
