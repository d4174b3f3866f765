import { ConfigService } from '@nestjs/config';

export interface MailConfig {
  apiKey?: string;
  fromEmail: string;
  fromName: string;
  frontendUrl: string;
}

export const getMailConfig = (configService: ConfigService): MailConfig => {
  const from = configService.get<string>('MAIL_FROM') || 'Learning Platform <no-reply@example.com>';

  // Parse "Name <email>" into its parts
  const emailMatch = from.match(/^(.+?)\s*<(.+?)>$/);

  return {
    apiKey: configService.get<string>('RESEND_API_KEY') || undefined,
    fromEmail: emailMatch ? emailMatch[2].trim() : from,
    fromName: emailMatch ? emailMatch[1].trim() : 'Learning Platform',
    frontendUrl: (configService.get<string>('FRONTEND_URL') || 'http://localhost:3000').replace(/\/$/, ''),
  };
};

export default getMailConfig;
