import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { EmailVerificationToken, PasswordResetToken, User } from './entities';
import { Role, UserProfile } from '../users/entities';
import { ChangePasswordDto, RegisterDto, ResetPasswordDto } from './dto';
import { getJwtRefreshConfig, JwtPayload, JwtRefreshPayload } from '../../config/jwt.config';
import { PasswordService } from './services/password.service';
import { PurgeResult, TokenService } from './services/token.service';
import { MailService } from '../mail/mail.service';
import { ProfileView, UsersService } from '../users/services/users.service';
import {
  AuthenticationRequiredException,
  EmailAlreadyRegisteredException,
  InvalidCredentialsException,
  ValidationFailedException,
} from '../../common/exceptions';
import { isUniqueViolation } from '../../common/utils/database-error.util';

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface AuthResult extends TokenPair {
  user_id: string;
  email: string;
}

export interface LoginResult extends AuthResult {
  profile: ProfileView;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    @InjectDataSource()
    private dataSource: DataSource,
    private jwtService: JwtService,
    private configService: ConfigService,
    private passwordService: PasswordService,
    private tokenService: TokenService,
    private usersService: UsersService,
    private mailService: MailService,
  ) {}

  async register(dto: RegisterDto): Promise<AuthResult> {
    assertPasswordsMatch(dto.password, dto.password_confirm, 'password_confirm');
    const email = normalizeEmail(dto.email);

    if (await this.userRepository.findOne({ where: { email } })) {
      throw new EmailAlreadyRegisteredException();
    }

    const passwordHash = await this.passwordService.hash(dto.password);

    const { user, verificationToken, roleName } = await this.createAccount(dto, email, passwordHash);

    this.logger.log(`Registered user ${user.id} (${email})`);
    await this.mailService.sendVerificationEmail(email, verificationToken.token);

    return { user_id: user.id, email, ...(await this.issueTokens(user, roleName)) };
  }

  // A concurrent registration can pass the pre-check; the unique email index settles it.
  private async createAccount(dto: RegisterDto, email: string, passwordHash: string) {
    try {
      return await this.dataSource.transaction(async (manager) => {
        const userRepository = manager.getRepository(User);
        const profileRepository = manager.getRepository(UserProfile);

        const user = await userRepository.save(
          userRepository.create({
            email,
            password_hash: passwordHash,
            is_active: true,
            is_staff: false,
            email_verified: false,
          }),
        );

        const role = await this.usersService.findActiveRole(dto.role_name ?? 'Student', manager.getRepository(Role));
        await profileRepository.save(
          profileRepository.create({
            user_id: user.id,
            first_name: dto.first_name ?? '',
            last_name: dto.last_name ?? '',
            phone_number: dto.phone_number ?? '',
            country: dto.country ?? '',
            role_id: role?.id ?? null,
          }),
        );

        const verificationToken = await this.tokenService.issueEmailVerification(
          user.id,
          manager.getRepository(EmailVerificationToken),
        );

        return { user, verificationToken, roleName: role?.name ?? null };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new EmailAlreadyRegisteredException();
      }
      throw error;
    }
  }

  async login(email: string, password: string): Promise<LoginResult> {
    const user = await this.userRepository.findOne({ where: { email: normalizeEmail(email) } });

    if (!user || !user.is_active || !(await this.passwordService.verify(password, user.password_hash))) {
      this.logger.warn(`Failed login for ${normalizeEmail(email)}`);
      throw new InvalidCredentialsException();
    }

    user.last_login = new Date();
    await this.userRepository.save(user);

    const profile = await this.usersService.getProfile(user.id);
    this.logger.log(`User ${user.id} logged in`);

    return {
      user_id: user.id,
      email: user.email,
      ...(await this.issueTokens(user, profile.role)),
      profile,
    };
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const { secret } = getJwtRefreshConfig(this.configService);

    let payload: JwtRefreshPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtRefreshPayload>(refreshToken, { secret });
    } catch (error) {
      this.logger.warn(`Rejected refresh token: ${error instanceof Error ? error.message : String(error)}`);
      throw new AuthenticationRequiredException('Invalid refresh token');
    }

    if (payload.type !== 'refresh') {
      throw new AuthenticationRequiredException('Invalid refresh token');
    }

    const caller = await this.usersService.findAuthUser(payload.sub);
    const user = caller ? await this.userRepository.findOne({ where: { id: caller.sub } }) : null;
    if (!caller || !user) {
      throw new AuthenticationRequiredException('Invalid refresh token');
    }

    return this.issueTokens(user, caller.role);
  }

  logout(userId: string): { message: string } {
    this.logger.log(`User ${userId} logged out`);
    return { message: 'Logout successful' };
  }

  async changePassword(userId: string, dto: ChangePasswordDto): Promise<TokenPair & { message: string }> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      throw new AuthenticationRequiredException();
    }

    if (!(await this.passwordService.verify(dto.old_password, user.password_hash))) {
      throw new ValidationFailedException('Old password is incorrect', {
        old_password: ['Old password is incorrect'],
      });
    }
    assertPasswordsMatch(dto.new_password, dto.new_password_confirm, 'new_password_confirm');

    user.password_hash = await this.passwordService.hash(dto.new_password);
    await this.userRepository.save(user);
    this.logger.log(`Password changed for user ${userId}`);

    const caller = await this.usersService.findAuthUser(userId);
    return { message: 'Password changed successfully', ...(await this.issueTokens(user, caller?.role ?? null)) };
  }

  async verifyEmail(token: string): Promise<{ message: string }> {
    await this.tokenService.consumeEmailVerification(token);
    return { message: 'Email verified successfully' };
  }

  async resendVerification(userId: string): Promise<{ message: string }> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      throw new AuthenticationRequiredException();
    }
    if (user.email_verified) {
      throw new ValidationFailedException('Email is already verified');
    }

    const token = await this.tokenService.issueEmailVerification(user.id);
    await this.mailService.sendVerificationEmail(user.email, token.token);
    return { message: 'Verification email sent' };
  }

  async forgotPassword(email: string): Promise<{ message: string }> {
    const user = await this.userRepository.findOne({ where: { email: normalizeEmail(email) } });
    if (!user) {
      throw new ValidationFailedException('No user found with this email address', {
        email: ['No user found with this email address'],
      });
    }

    const token = await this.tokenService.issuePasswordReset(user.id);
    await this.mailService.sendPasswordResetEmail(user.email, token.token);
    return { message: 'Password reset email sent' };
  }

  async resetPassword(dto: ResetPasswordDto): Promise<{ message: string }> {
    assertPasswordsMatch(dto.new_password, dto.new_password_confirm, 'new_password_confirm');
    const passwordHash = await this.passwordService.hash(dto.new_password);

    // The password is written only once the token is claimed.
    const userId = await this.dataSource.transaction(async (manager) => {
      const claimedBy = await this.tokenService.consumePasswordReset(
        dto.token,
        new Date(),
        manager.getRepository(PasswordResetToken),
      );
      await manager.getRepository(User).update({ id: claimedBy }, { password_hash: passwordHash });
      return claimedBy;
    });

    this.logger.log(`Password reset for user ${userId}`);
    return { message: 'Password reset successfully' };
  }

  purgeExpiredTokens(): Promise<PurgeResult> {
    return this.tokenService.purgeExpired(new Date());
  }

  private async issueTokens(user: User, role: JwtPayload['role']): Promise<TokenPair> {
    const payload: JwtPayload = { sub: user.id, email: user.email, role };
    const refreshPayload: JwtRefreshPayload = { sub: user.id, type: 'refresh' };
    const refreshConfig = getJwtRefreshConfig(this.configService);

    const [access, refresh] = await Promise.all([
      this.jwtService.signAsync(payload),
      this.jwtService.signAsync(refreshPayload, {
        secret: refreshConfig.secret,
        expiresIn: refreshConfig.expiresIn,
      }),
    ]);

    return { access, refresh };
  }
}

function assertPasswordsMatch(password: string, confirmation: string, field: string): void {
  if (password !== confirmation) {
    throw new ValidationFailedException("Password fields didn't match", {
      [field]: ["Password fields didn't match"],
    });
  }
}
