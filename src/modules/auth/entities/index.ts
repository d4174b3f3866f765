export { User } from './user.entity';
export { EmailVerificationToken } from './email-verification-token.entity';
export { PasswordResetToken } from './password-reset-token.entity';
