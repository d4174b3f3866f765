import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Resend } from 'resend';
import { getMailConfig, MailConfig } from '../../config/mail.config';

/**
 * Outbound transactional mail through the Resend API.
 * Delivery failures are logged and reported as `false`; they never
 * propagate to the operation that triggered the message.
 */
@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly mailConfig: MailConfig;
  private readonly resend: Resend | null;

  constructor(private readonly configService: ConfigService) {
    this.mailConfig = getMailConfig(this.configService);
    this.resend = this.mailConfig.apiKey ? new Resend(this.mailConfig.apiKey) : null;

    if (!this.resend) {
      this.logger.warn('RESEND_API_KEY not set, outgoing mail will be skipped');
    }
  }

  get frontendUrl(): string {
    return this.mailConfig.frontendUrl;
  }

  async send(to: string, subject: string, text: string): Promise<boolean> {
    if (!this.resend) {
      this.logger.log(`Mail skipped (no transport): "${subject}" -> ${to}`);
      return false;
    }

    try {
      const result = await this.resend.emails.send({
        from: `${this.mailConfig.fromName} <${this.mailConfig.fromEmail}>`,
        to: [to],
        subject,
        text,
      });

      if (result.error) {
        this.logger.error(`Failed to send "${subject}" to ${to}: ${result.error.message}`);
        return false;
      }

      this.logger.log(`Mail sent: ${result.data?.id ?? 'unknown id'} -> ${to}`);
      return true;
    } catch (error) {
      this.logger.error(`Mail transport error for ${to}`, error instanceof Error ? error.stack : String(error));
      return false;
    }
  }

  sendVerificationEmail(to: string, token: string): Promise<boolean> {
    const link = `${this.frontendUrl}/verify-email?token=${token}`;
    return this.send(
      to,
      'Verify your email address',
      `Welcome! Confirm your email address by opening the link below:\n\n${link}\n\nThe link expires in 24 hours.`,
    );
  }

  sendPasswordResetEmail(to: string, token: string): Promise<boolean> {
    const link = `${this.frontendUrl}/reset-password?token=${token}`;
    return this.send(
      to,
      'Reset your password',
      `A password reset was requested for your account. Open the link below to choose a new password:\n\n${link}\n\nThe link expires in 1 hour. If you did not request this, ignore this email.`,
    );
  }

  sendCourseCompletedEmail(to: string, courseTitle: string): Promise<boolean> {
    return this.send(
      to,
      `You completed ${courseTitle}`,
      `Congratulations! You have completed every lesson in "${courseTitle}".`,
    );
  }
}
