import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { EmailVerificationToken, PasswordResetToken, User } from '../entities';
import {
  TokenAlreadyUsedException,
  TokenExpiredException,
  TokenNotFoundException,
} from '../../../common/exceptions';

export type TokenKind = 'email_verification' | 'password_reset';

const HOUR_MS = 60 * 60 * 1000;

export const TOKEN_TTL_MS: Record<TokenKind, number> = {
  email_verification: 24 * HOUR_MS,
  password_reset: HOUR_MS,
};

/** A token is still valid at exactly `created_at + ttl`. */
export function isTokenExpired(kind: TokenKind, createdAt: Date, now: Date = new Date()): boolean {
  return now.getTime() > createdAt.getTime() + TOKEN_TTL_MS[kind];
}

export interface PurgeResult {
  email_verification: number;
  password_reset: number;
}

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    @InjectRepository(EmailVerificationToken)
    private verificationRepository: Repository<EmailVerificationToken>,
    @InjectRepository(PasswordResetToken)
    private resetRepository: Repository<PasswordResetToken>,
    @InjectRepository(User)
    private userRepository: Repository<User>,
  ) {}

  /**
   * Replaces any outstanding verification token of the user.
   * Pass `repository` to run inside a caller's transaction.
   */
  async issueEmailVerification(
    userId: string,
    repository: Repository<EmailVerificationToken> = this.verificationRepository,
  ): Promise<EmailVerificationToken> {
    await repository.delete({ user_id: userId });

    const token = await repository.save(
      repository.create({ user_id: userId, token: uuidv4(), created_at: new Date() }),
    );

    this.logger.log(`Issued email verification token for user ${userId}`);
    return token;
  }

  async issuePasswordReset(userId: string): Promise<PasswordResetToken> {
    const token = await this.resetRepository.save(
      this.resetRepository.create({ user_id: userId, token: uuidv4(), used: false, created_at: new Date() }),
    );

    this.logger.log(`Issued password reset token for user ${userId}`);
    return token;
  }

  async validateEmailVerification(value: string, now = new Date()): Promise<EmailVerificationToken> {
    const token = await this.verificationRepository.findOne({ where: { token: value } });
    if (!token) {
      throw new TokenNotFoundException();
    }
    if (isTokenExpired('email_verification', token.created_at, now)) {
      throw new TokenExpiredException();
    }
    return token;
  }

  async validatePasswordReset(
    value: string,
    now = new Date(),
    repository: Repository<PasswordResetToken> = this.resetRepository,
  ): Promise<PasswordResetToken> {
    const token = await repository.findOne({ where: { token: value } });
    if (!token) {
      throw new TokenNotFoundException();
    }
    if (token.used) {
      throw new TokenAlreadyUsedException();
    }
    if (isTokenExpired('password_reset', token.created_at, now)) {
      throw new TokenExpiredException();
    }
    return token;
  }

  async consumeEmailVerification(value: string, now = new Date()): Promise<string> {
    const token = await this.validateEmailVerification(value, now);

    await this.verificationRepository.delete({ id: token.id });
    await this.userRepository.update({ id: token.user_id }, { email_verified: true });

    this.logger.log(`Email verified for user ${token.user_id}`);
    return token.user_id;
  }

  /**
   * Claims a reset token. The claim is a conditional update on `used`, so
   * of two concurrent consumers only one succeeds. Pass `repository` to
   * run inside a caller's transaction.
   */
  async consumePasswordReset(
    value: string,
    now = new Date(),
    repository: Repository<PasswordResetToken> = this.resetRepository,
  ): Promise<string> {
    const token = await this.validatePasswordReset(value, now, repository);

    const { affected } = await repository.update({ id: token.id, used: false }, { used: true });
    if (!affected) {
      throw new TokenAlreadyUsedException();
    }

    this.logger.log(`Password reset token consumed for user ${token.user_id}`);
    return token.user_id;
  }

  async purgeExpired(now = new Date()): Promise<PurgeResult> {
    const verification = await this.verificationRepository.delete({
      created_at: LessThan(new Date(now.getTime() - TOKEN_TTL_MS.email_verification)),
    });
    const reset = await this.resetRepository.delete({
      created_at: LessThan(new Date(now.getTime() - TOKEN_TTL_MS.password_reset)),
    });

    const result: PurgeResult = {
      email_verification: verification.affected ?? 0,
      password_reset: reset.affected ?? 0,
    };
    this.logger.log(`Purged expired tokens: ${JSON.stringify(result)}`);
    return result;
  }
}
